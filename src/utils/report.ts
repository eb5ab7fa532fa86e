import pc from 'picocolors';
import type { ValidationReport, ValidationResult } from '../types.js';
import { getCommitExamples } from './validator.js';

export type Colors = ReturnType<typeof pc.createColors>;

export interface ReportOptions {
  strict: boolean;
  issueKey?: string;
  colors?: Colors;
}

const INDENT = '   ';

export function getExitCode(result: ValidationResult, strict: boolean): 0 | 1 {
  return !result.valid || (strict && result.warnings.length > 0) ? 1 : 0;
}

export function buildReport(result: ValidationResult, strict: boolean): ValidationReport {
  return {
    valid: result.valid,
    strict,
    exitCode: getExitCode(result, strict),
    errors: result.errors,
    warnings: result.warnings,
  };
}

function indentLines(entry: string): string[] {
  return entry.split('\n').map((line) => `${INDENT}${line}`);
}

/**
 * Render a validation result as the lines printed by the CLI.
 */
export function formatReport(result: ValidationResult, options: ReportOptions): string[] {
  const c = options.colors ?? pc;
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push(c.red(c.bold('✖ Commit message validation failed:')));
    for (const entry of result.errors) {
      lines.push(...indentLines(entry).map((line) => c.red(line)));
    }
    lines.push('');
  }

  if (result.warnings.length > 0) {
    lines.push(c.yellow(c.bold('⚠ Commit message warnings:')));
    for (const entry of result.warnings) {
      lines.push(...indentLines(entry).map((line) => c.yellow(line)));
    }
    lines.push('');
  }

  if (result.valid) {
    lines.push(
      c.green(
        result.warnings.length === 0
          ? '✔ Commit message is valid!'
          : '✔ Commit message is valid (with warnings)',
      ),
    );
  }

  if (getExitCode(result, options.strict) === 1) {
    lines.push('', c.bold('Conventional Commit Examples:'));
    for (const example of getCommitExamples(options.issueKey)) {
      lines.push(`${INDENT}${c.cyan(example)}`);
    }
  }

  return lines;
}

export function formatJsonReport(result: ValidationResult, strict: boolean): string {
  return JSON.stringify(buildReport(result, strict), null, 2);
}
