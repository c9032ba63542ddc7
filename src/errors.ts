/**
 * Error taxonomy.
 *
 * Per-file and per-task errors are collected by the Scanner and Applier into
 * their result objects. Store integrity errors propagate to the command.
 */

export type ErrorCode =
  | 'marker-imbalance'
  | 'missing-definition'
  | 'target-not-found'
  | 'backup-failed'
  | 'uniqueness-violation'
  | 'invalid-transition'
  | 'store-corrupted'
  | 'config-invalid'
  | 'task-not-found'
  | 'invalid-suggestion';

export abstract class DocmarkError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Start/end delimiters that do not pair up in one file. */
export class MarkerImbalanceError extends DocmarkError {
  readonly code = 'marker-imbalance';

  constructor(
    message: string,
    readonly filePath: string,
    readonly line: number,
  ) {
    super(`${filePath}:${line}: ${message}`);
  }
}

/** A class/function block without a definition, or a comment block without code. */
export class MissingDefinitionError extends DocmarkError {
  readonly code = 'missing-definition';

  constructor(
    message: string,
    readonly filePath: string,
    readonly line: number,
  ) {
    super(`${filePath}:${line}: ${message}`);
  }
}

export class TargetNotFoundError extends DocmarkError {
  readonly code = 'target-not-found';
}

export class BackupFailedError extends DocmarkError {
  readonly code = 'backup-failed';
}

export class UniquenessViolation extends DocmarkError {
  readonly code = 'uniqueness-violation';
}

export class InvalidTransitionError extends DocmarkError {
  readonly code = 'invalid-transition';
}

export class StoreCorruptedError extends DocmarkError {
  readonly code = 'store-corrupted';
}

/** Suggestion text that cannot be turned into documentation. */
export class InvalidSuggestionError extends DocmarkError {
  readonly code = 'invalid-suggestion';
}

export class ConfigError extends DocmarkError {
  readonly code = 'config-invalid';
}

export class TaskNotFoundError extends DocmarkError {
  readonly code = 'task-not-found';

  constructor(readonly taskId: number) {
    super(`Task ${taskId} not found`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system error carrying `code`, e.g. ENOENT or EEXIST. */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
