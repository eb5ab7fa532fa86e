import { readFileSync } from 'node:fs';
import figlet from 'figlet';
import pc from 'picocolors';

interface PackageInfo {
  version?: unknown;
}

function readPackageInfo(): PackageInfo {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return {};
    return { version: 'version' in parsed ? parsed.version : undefined };
  } catch {
    return {};
  }
}

// Resolves from both src/ui and dist/ui
const pkg = readPackageInfo();

let LOGO: string;
try {
  LOGO = figlet.textSync('commitgate', { font: 'Slant' });
} catch {
  LOGO = 'commitgate';
}

export function getVersion(): string {
  return typeof pkg.version === 'string' ? pkg.version : 'unknown';
}

export function showBanner(): void {
  console.log(pc.cyan(`\n${LOGO}`));
  console.log(`  ${pc.dim(`v${getVersion()}`)} ${pc.dim('—')} ${pc.dim('conventional commit gate')}`);
  console.log();
}
