export type UserFacingType = 'feat' | 'fix' | 'perf' | 'security' | 'breaking';

export type DevelopmentType =
  | 'docs'
  | 'test'
  | 'ci'
  | 'chore'
  | 'refactor'
  | 'style'
  | 'build'
  | 'revert';

export type CommitType = UserFacingType | DevelopmentType;

export interface ParsedSubject {
  type: string;
  scope?: string;
  description: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: readonly string[];
  warnings: readonly string[];
}

export interface ValidatorOptions {
  issueKey?: string;
}

export interface CommitGateConfig {
  issueKey: string;
  strict: boolean;
}

export type MessageOrigin = 'argument' | 'file' | 'stdin';

export type MessageSource =
  | { ok: true; origin: MessageOrigin; text: string }
  | { ok: false; error: string };

export interface ValidationReport extends ValidationResult {
  strict: boolean;
  exitCode: 0 | 1;
}
