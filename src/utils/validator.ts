import type {
  CommitType,
  DevelopmentType,
  ParsedSubject,
  UserFacingType,
  ValidationResult,
  ValidatorOptions,
} from '../types.js';

/**
 * Commit message validator.
 *
 * Subjects follow Conventional Commits (https://www.conventionalcommits.org/):
 * `<type>[(<scope>)]: <description>`. User-facing types must reference an
 * issue, either as a JIRA-style key in the scope or a `#123` reference
 * anywhere in the message.
 */

export const DEFAULT_ISSUE_KEY = 'S3CSI';

export const USER_FACING_TYPES: ReadonlySet<UserFacingType> = new Set<UserFacingType>([
  'feat',
  'fix',
  'perf',
  'security',
  'breaking',
]);

export const DEVELOPMENT_TYPES: ReadonlySet<DevelopmentType> = new Set<DevelopmentType>([
  'docs',
  'test',
  'ci',
  'chore',
  'refactor',
  'style',
  'build',
  'revert',
]);

export const ALL_TYPES: readonly CommitType[] = [...USER_FACING_TYPES, ...DEVELOPMENT_TYPES].sort();

export const MIN_DESCRIPTION_LENGTH = 10;
export const MAX_DESCRIPTION_LENGTH = 72;

const PAST_TENSE_PREFIXES = ['added', 'fixed', 'updated', 'changed'];

// <type>[(<scope>)]: <description>
const SUBJECT_PATTERN = /^(?<type>[\p{L}\p{N}_]+)(?:\((?<scope>[^)]+)\))?: (?<description>[^\n]+)$/u;

// Issue numbers are ASCII digits only
const GITHUB_ISSUE_PATTERN = /#\d+/;

const COMPONENT_NAME_PATTERN = /^[\p{L}\p{N}]+$/u;

interface IssuePatterns {
  key: string;
  anywhere: RegExp;
  exact: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildIssuePatterns(key: string): IssuePatterns {
  const escaped = escapeRegExp(key);
  return {
    key,
    anywhere: new RegExp(`${escaped}-\\d+`),
    exact: new RegExp(`^${escaped}-\\d+$`),
  };
}

const DEFAULT_ISSUE_PATTERNS = buildIssuePatterns(DEFAULT_ISSUE_KEY);

function issuePatternsFor(key: string | undefined): IssuePatterns {
  if (!key || key === DEFAULT_ISSUE_KEY) return DEFAULT_ISSUE_PATTERNS;
  return buildIssuePatterns(key);
}

const userFacingLookup: ReadonlySet<string> = USER_FACING_TYPES;
const developmentLookup: ReadonlySet<string> = DEVELOPMENT_TYPES;

export function isUserFacingType(type: string): type is UserFacingType {
  return userFacingLookup.has(type);
}

export function isDevelopmentType(type: string): type is DevelopmentType {
  return developmentLookup.has(type);
}

/**
 * Example subjects shown when a message is rejected.
 */
export function getCommitExamples(issueKey = DEFAULT_ISSUE_KEY): string[] {
  return [
    `feat(${issueKey}-123): add custom S3 endpoint support`,
    `fix(${issueKey}-456): resolve authentication timeout issue`,
    'docs: update installation guide',
    'chore(deps): bump mkdocs from 1.5.0 to 1.6.0',
    `breaking(${issueKey}-789): remove deprecated API endpoints`,
  ];
}

/**
 * Split a raw message into its meaningful lines, dropping blank lines and
 * `#` template comments.
 */
export function getContentLines(message: string): string[] {
  return message
    .trim()
    .split(/\r?\n/)
    .filter((line) => {
      const trimmed = line.trim();
      return trimmed.length > 0 && !trimmed.startsWith('#');
    });
}

/**
 * Parse a subject line. Returns null if it does not follow
 * `type(scope): description`.
 */
export function parseSubject(line: string): ParsedSubject | null {
  const groups = SUBJECT_PATTERN.exec(line)?.groups;
  if (!groups?.type || groups.description === undefined) return null;
  return {
    type: groups.type,
    scope: groups.scope,
    description: groups.description,
  };
}

function checkIssueId(
  type: CommitType,
  scope: string,
  message: string,
  patterns: IssuePatterns,
  errors: string[],
  warnings: string[],
): void {
  const hasJiraId = scope.length > 0 && patterns.anywhere.test(scope);
  const hasGithubIssue = GITHUB_ISSUE_PATTERN.test(message);

  if (isUserFacingType(type)) {
    if (!hasJiraId && !hasGithubIssue) {
      errors.push(
        [
          `User-facing commit type '${type}' requires an issue ID.`,
          `Include issue ID in scope: ${type}(${patterns.key}-123): description`,
          'Or reference GitHub issue in footer: Closes #123',
        ].join('\n'),
      );
    } else if (hasJiraId && !patterns.exact.test(scope)) {
      errors.push(
        `Invalid JIRA issue format in scope. Expected: ${patterns.key}-123, got: ${scope}`,
      );
    }
    return;
  }

  // Issue IDs are optional for development types
  if (scope && !hasJiraId && !COMPONENT_NAME_PATTERN.test(scope.replace(/[-_]/g, ''))) {
    warnings.push(`Scope '${scope}' doesn't look like an issue ID or component name`);
  }
}

function checkDescriptionStyle(description: string, warnings: string[]): void {
  if (/^\p{Lu}/u.test(description)) {
    warnings.push(
      "Description should start with lowercase letter (imperative mood). E.g., 'add feature' not 'Add feature'",
    );
  }

  if (description.endsWith('.')) {
    warnings.push('Description should not end with a period');
  }

  const lower = description.toLowerCase();
  if (PAST_TENSE_PREFIXES.some((word) => lower.startsWith(word))) {
    warnings.push("Use imperative mood: 'add' not 'added', 'fix' not 'fixed'");
  }
}

function fail(error: string): ValidationResult {
  return { valid: false, errors: [error], warnings: [] };
}

/**
 * Validate a commit message.
 *
 * Empty messages, malformed subjects and unknown types stop validation with a
 * single error. Past that point every check runs, so one call reports every
 * problem at once.
 */
export function validateCommitMessage(
  message: string,
  options: ValidatorOptions = {},
): ValidationResult {
  const lines = getContentLines(message);
  const subject = lines[0];
  if (subject === undefined) {
    return fail('Commit message cannot be empty (ignoring template comments)');
  }

  const parsed = parseSubject(subject);
  if (!parsed) {
    return fail(
      [
        'Invalid commit format. Expected: type(scope): description',
        `Got: ${subject}`,
        'Examples:',
        ...getCommitExamples(options.issueKey).slice(0, 3).map((example) => `  ${example}`),
      ].join('\n'),
    );
  }

  const type = parsed.type.toLowerCase();
  if (!isUserFacingType(type) && !isDevelopmentType(type)) {
    return fail(`Invalid commit type '${type}'. Valid types: ${ALL_TYPES.join(', ')}`);
  }

  const errors: string[] = [];
  const warnings: string[] = [];
  const { description } = parsed;

  const length = [...description].length;
  if (length < MIN_DESCRIPTION_LENGTH) {
    errors.push(`Description must be at least ${MIN_DESCRIPTION_LENGTH} characters long`);
  }
  if (length > MAX_DESCRIPTION_LENGTH) {
    warnings.push(
      `Description should be ${MAX_DESCRIPTION_LENGTH} characters or less for better readability`,
    );
  }

  checkIssueId(
    type,
    parsed.scope ?? '',
    message,
    issuePatternsFor(options.issueKey),
    errors,
    warnings,
  );
  checkDescriptionStyle(description, warnings);

  return { valid: errors.length === 0, errors, warnings };
}
