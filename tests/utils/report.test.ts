import pc from 'picocolors';
import { describe, expect, it } from 'vitest';
import { buildReport, formatJsonReport, formatReport, getExitCode } from '../../src/utils/report.js';
import { validateCommitMessage } from '../../src/utils/validator.js';

const colors = pc.createColors(false);

const EXAMPLE_LINES = [
  '',
  'Conventional Commit Examples:',
  '   feat(S3CSI-123): add custom S3 endpoint support',
  '   fix(S3CSI-456): resolve authentication timeout issue',
  '   docs: update installation guide',
  '   chore(deps): bump mkdocs from 1.5.0 to 1.6.0',
  '   breaking(S3CSI-789): remove deprecated API endpoints',
];

const STYLE_WARNING_LINES = [
  '⚠ Commit message warnings:',
  "   Description should start with lowercase letter (imperative mood). E.g., 'add feature' not 'Add feature'",
  '   Description should not end with a period',
  "   Use imperative mood: 'add' not 'added', 'fix' not 'fixed'",
  '',
];

describe('getExitCode', () => {
  const clean = { valid: true, errors: [], warnings: [] };
  const warned = { valid: true, errors: [], warnings: ['Description should not end with a period'] };
  const failed = { valid: false, errors: ['Description must be at least 10 characters long'], warnings: [] };

  it('passes valid results', () => {
    expect(getExitCode(clean, false)).toBe(0);
    expect(getExitCode(clean, true)).toBe(0);
  });

  it('only fails warnings in strict mode', () => {
    expect(getExitCode(warned, false)).toBe(0);
    expect(getExitCode(warned, true)).toBe(1);
  });

  it('always fails invalid results', () => {
    expect(getExitCode(failed, false)).toBe(1);
    expect(getExitCode(failed, true)).toBe(1);
  });
});

describe('formatReport', () => {
  it('prints only the success banner for a clean message', () => {
    const result = validateCommitMessage('docs: update installation guide');
    expect(formatReport(result, { strict: false, colors })).toEqual(['✔ Commit message is valid!']);
  });

  it('prints warnings and the qualified success banner', () => {
    const result = validateCommitMessage('Fix(S3CSI-5): Added new retry logic.');
    expect(formatReport(result, { strict: false, colors })).toEqual([
      ...STYLE_WARNING_LINES,
      '✔ Commit message is valid (with warnings)',
    ]);
  });

  it('adds the examples when strict mode fails on warnings', () => {
    const result = validateCommitMessage('Fix(S3CSI-5): Added new retry logic.');
    expect(formatReport(result, { strict: true, colors })).toEqual([
      ...STYLE_WARNING_LINES,
      '✔ Commit message is valid (with warnings)',
      ...EXAMPLE_LINES,
    ]);
  });

  it('indents every line of a multi-line error', () => {
    const result = validateCommitMessage('feat: add custom endpoint support');
    expect(formatReport(result, { strict: false, colors })).toEqual([
      '✖ Commit message validation failed:',
      "   User-facing commit type 'feat' requires an issue ID.",
      '   Include issue ID in scope: feat(S3CSI-123): description',
      '   Or reference GitHub issue in footer: Closes #123',
      '',
      ...EXAMPLE_LINES,
    ]);
  });

  it('prints errors and warnings together', () => {
    const result = validateCommitMessage('chore(random!!): bump deps');
    expect(formatReport(result, { strict: false, colors })).toEqual([
      '✖ Commit message validation failed:',
      '   Description must be at least 10 characters long',
      '',
      '⚠ Commit message warnings:',
      "   Scope 'random!!' doesn't look like an issue ID or component name",
      '',
      ...EXAMPLE_LINES,
    ]);
  });

  it('uses the configured issue key in the examples', () => {
    const result = validateCommitMessage('docs: x');
    const lines = formatReport(result, { strict: false, issueKey: 'OPS', colors });
    expect(lines.at(-5)).toBe('   feat(OPS-123): add custom S3 endpoint support');
    expect(lines.at(-1)).toBe('   breaking(OPS-789): remove deprecated API endpoints');
  });
});

describe('JSON report', () => {
  it('carries the strict flag and exit code', () => {
    const result = validateCommitMessage('Fix(S3CSI-5): Added new retry logic.');
    expect(buildReport(result, true)).toEqual({
      valid: true,
      strict: true,
      exitCode: 1,
      errors: [],
      warnings: result.warnings,
    });
  });

  it('serialises to parseable JSON', () => {
    const result = validateCommitMessage('feat: add custom endpoint support');
    expect(JSON.parse(formatJsonReport(result, false))).toEqual({
      valid: false,
      strict: false,
      exitCode: 1,
      errors: result.errors,
      warnings: [],
    });
  });
});
