import { readFileSync } from 'node:fs';
import type { MessageSource } from '../types.js';

export interface MessageArgs {
  message?: string;
  file?: string;
}

export function readStdin(): string {
  return readFileSync(process.stdin.fd, 'utf-8');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Resolve the commit message text. `--message` wins over the file argument,
 * and standard input is read only when neither is given.
 */
export function resolveMessage(args: MessageArgs, stdin: () => string = readStdin): MessageSource {
  if (args.message) {
    return { ok: true, origin: 'argument', text: args.message };
  }

  if (args.file) {
    try {
      return { ok: true, origin: 'file', text: readFileSync(args.file, 'utf-8') };
    } catch (err) {
      if (isMissingFile(err)) {
        return { ok: false, error: `Error: Commit file '${args.file}' not found` };
      }
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, error: `Error reading commit file: ${reason}` };
    }
  }

  return { ok: true, origin: 'stdin', text: stdin() };
}
