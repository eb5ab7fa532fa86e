import { defineCommand } from 'citty';
import pc from 'picocolors';
import { getVersion } from '../ui/banner.js';
import {
  configExists,
  getConfigPath,
  getDefaultConfig,
  isValidIssueKey,
  loadConfig,
  writeConfig,
} from '../utils/config.js';
import { error, info, success } from '../utils/logger.js';
import { readStdin, resolveMessage } from '../utils/message.js';
import { formatJsonReport, formatReport, getExitCode } from '../utils/report.js';
import { validateCommitMessage } from '../utils/validator.js';

export interface ValidateArgs {
  file?: string;
  message?: string;
  strict?: boolean;
  json?: boolean;
  init?: boolean;
  issueKey?: string;
}

export interface ValidateIO {
  cwd: string;
  print: (line: string) => void;
  readStdin: () => string;
  stdinIsTTY: boolean;
  color: boolean;
}

function defaultIO(): ValidateIO {
  return {
    cwd: process.cwd(),
    print: (line) => console.log(line),
    readStdin,
    stdinIsTTY: process.stdin.isTTY === true,
    color: pc.isColorSupported,
  };
}

function initConfig(issueKey: string | undefined, cwd: string): 0 | 1 {
  if (configExists(cwd)) {
    error(`${getConfigPath(cwd)} already exists.`);
    return 1;
  }
  const config = getDefaultConfig();
  writeConfig(issueKey ? { ...config, issueKey } : config, cwd);
  success(`Created ${getConfigPath(cwd)}`);
  return 0;
}

/**
 * Validate one commit message and print the result. Returns the process exit
 * code; file and configuration problems return 1 before validation runs.
 */
export function runValidate(args: ValidateArgs, io: ValidateIO = defaultIO()): 0 | 1 {
  if (args.issueKey !== undefined && !isValidIssueKey(args.issueKey)) {
    error(
      `Invalid issue key "${args.issueKey}". Expected uppercase letters, digits or underscores, e.g. "PROJ".`,
    );
    return 1;
  }

  if (args.init) {
    return initConfig(args.issueKey, io.cwd);
  }

  const loaded = loadConfig(io.cwd);
  if (!loaded.ok) {
    error(loaded.error);
    return 1;
  }

  const issueKey = args.issueKey ?? loaded.config.issueKey;
  const strict = args.strict === true || loaded.config.strict;

  if (!args.message && !args.file && !args.json && io.stdinIsTTY) {
    info('Reading commit message from standard input (Ctrl+D to finish)...');
  }

  const source = resolveMessage({ message: args.message, file: args.file }, io.readStdin);
  if (!source.ok) {
    error(source.error);
    return 1;
  }

  const result = validateCommitMessage(source.text, { issueKey });

  if (args.json) {
    io.print(formatJsonReport(result, strict));
  } else {
    const colors = pc.createColors(io.color);
    for (const line of formatReport(result, { strict, issueKey, colors })) {
      io.print(line);
    }
  }

  return getExitCode(result, strict);
}

export default defineCommand({
  meta: {
    name: 'commitgate',
    version: getVersion(),
    description:
      'Validate a commit message against Conventional Commits, requiring issue IDs on user-facing changes.',
  },
  args: {
    file: {
      type: 'positional',
      description: 'File containing the commit message (reads stdin when omitted)',
      required: false,
    },
    message: {
      type: 'string',
      alias: 'm',
      description: 'Commit message to validate (takes priority over the file)',
    },
    strict: {
      type: 'boolean',
      description: 'Treat warnings as errors',
      default: false,
    },
    json: {
      type: 'boolean',
      description: 'Print a JSON report instead of text',
      default: false,
    },
    'issue-key': {
      type: 'string',
      description: 'JIRA project key for issue IDs (default: S3CSI)',
    },
    init: {
      type: 'boolean',
      description: 'Write a .commitgaterc.json with the default settings',
      default: false,
    },
  },
  run({ args }) {
    const code = runValidate({
      file: args.file,
      message: args.message,
      strict: args.strict,
      json: args.json,
      init: args.init,
      issueKey: args['issue-key'],
    });
    process.exit(code);
  },
});
