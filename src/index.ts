#!/usr/bin/env node
import { runMain } from 'citty';
import validate from './commands/validate.js';
import { showBanner } from './ui/banner.js';

const isHelp = process.argv.includes('--help') || process.argv.includes('-h');

if (isHelp) {
  showBanner();
}

runMain(validate).then(() => {
  // The validate command exits with its own code; this covers --help and --version.
  process.exit(0);
});
