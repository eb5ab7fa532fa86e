import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { CommitGateConfig } from '../types.js';
import { DEFAULT_ISSUE_KEY } from './validator.js';

const CONFIG_FILENAME = '.commitgaterc.json';

const ISSUE_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export type ConfigResult = { ok: true; config: CommitGateConfig } | { ok: false; error: string };

export function getConfigPath(cwd = process.cwd()): string {
  return join(cwd, CONFIG_FILENAME);
}

export function configExists(cwd = process.cwd()): boolean {
  return existsSync(getConfigPath(cwd));
}

export function isValidIssueKey(key: string): boolean {
  return ISSUE_KEY_PATTERN.test(key);
}

export function getDefaultConfig(): CommitGateConfig {
  return {
    issueKey: DEFAULT_ISSUE_KEY,
    strict: false,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read `.commitgaterc.json`. A missing file yields the defaults; a file that
 * exists but cannot be used is an error.
 */
export function loadConfig(cwd = process.cwd()): ConfigResult {
  const path = getConfigPath(cwd);
  const config = getDefaultConfig();
  if (!existsSync(path)) return { ok: true, config };

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Invalid ${CONFIG_FILENAME}: ${reason}` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: `Invalid ${CONFIG_FILENAME}: expected a JSON object.` };
  }

  const { issueKey, strict } = parsed;
  if (issueKey !== undefined) {
    if (typeof issueKey !== 'string' || !isValidIssueKey(issueKey)) {
      return {
        ok: false,
        error: `Invalid issueKey ${JSON.stringify(issueKey)} in ${CONFIG_FILENAME}. Expected uppercase letters, digits or underscores, e.g. "PROJ".`,
      };
    }
    config.issueKey = issueKey;
  }

  if (strict !== undefined) {
    if (typeof strict !== 'boolean') {
      return { ok: false, error: `Invalid ${CONFIG_FILENAME}: strict must be true or false.` };
    }
    config.strict = strict;
  }

  return { ok: true, config };
}

export function writeConfig(config: CommitGateConfig, cwd = process.cwd()): void {
  const path = getConfigPath(cwd);
  writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
}
