/**
 * Puzzle Domain Errors - Structured error types above the rule engine
 *
 * The engine reports its own failures through EngineError (see
 * ../engine/errors). This module covers what sits around it: stored puzzle
 * lookup, storage I/O, configuration and the CLI.
 *
 * Usage:
 * ```typescript
 * import { PuzzleNotFoundError, isPuzzleError } from './PuzzleDomainErrors';
 *
 * throw new PuzzleNotFoundError('daily-8', { dir: './puzzles' });
 *
 * if (isPuzzleError(error)) {
 *   process.exitCode = error.exitCode;
 * }
 * ```
 *
 * @module PuzzleDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes are prefixed by category:
 * - PUZZLE_*: Stored puzzle errors
 * - CONFIGURATION_ERROR / INTERNAL_ERROR: Process-level failures
 */
export enum PuzzleErrorCode {
  // Stored Puzzle Errors
  PUZZLE_NOT_FOUND = 'PUZZLE_NOT_FOUND',
  PUZZLE_INVALID_ID = 'PUZZLE_INVALID_ID',
  PUZZLE_STORAGE_FAILED = 'PUZZLE_STORAGE_FAILED',

  // Internal Errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Process exit codes reported by the CLI for each error type.
 */
export const ERROR_EXIT_CODE: Record<PuzzleErrorCode, number> = {
  [PuzzleErrorCode.PUZZLE_NOT_FOUND]: 3,
  [PuzzleErrorCode.PUZZLE_INVALID_ID]: 2,
  [PuzzleErrorCode.PUZZLE_STORAGE_FAILED]: 4,
  [PuzzleErrorCode.CONFIGURATION_ERROR]: 78,
  [PuzzleErrorCode.INTERNAL_ERROR]: 1,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for puzzle domain errors.
 */
export class PuzzleError extends Error {
  /** Error code for programmatic handling */
  readonly code: PuzzleErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: PuzzleErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PuzzleError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, PuzzleError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODE[this.code] ?? 1;
  }

  /** Serialize to a JSON-safe object for logs */
  toJSON(): PuzzleErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a PuzzleError.
 */
export interface PuzzleErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

export class PuzzleNotFoundError extends PuzzleError {
  constructor(puzzleId: string, context: Record<string, unknown> = {}) {
    super(PuzzleErrorCode.PUZZLE_NOT_FOUND, `Puzzle not found: ${puzzleId}`, {
      puzzleId,
      ...context,
    });
    this.name = 'PuzzleNotFoundError';
    Object.setPrototypeOf(this, PuzzleNotFoundError.prototype);
  }
}

/**
 * Error for ids that would escape the store directory or are empty.
 */
export class InvalidPuzzleIdError extends PuzzleError {
  constructor(puzzleId: string, context: Record<string, unknown> = {}) {
    super(
      PuzzleErrorCode.PUZZLE_INVALID_ID,
      `Invalid puzzle id "${puzzleId}": use letters, digits, "_" or "-"`,
      { puzzleId, ...context }
    );
    this.name = 'InvalidPuzzleIdError';
    Object.setPrototypeOf(this, InvalidPuzzleIdError.prototype);
  }
}

export class PuzzleStorageError extends PuzzleError {
  constructor(operation: string, reason: string, context: Record<string, unknown> = {}) {
    super(PuzzleErrorCode.PUZZLE_STORAGE_FAILED, `Puzzle ${operation} failed: ${reason}`, {
      operation,
      reason,
      ...context,
    });
    this.name = 'PuzzleStorageError';
    Object.setPrototypeOf(this, PuzzleStorageError.prototype);
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Error for environment variables that fail validation at startup.
 */
export class ConfigurationError extends PuzzleError {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[], context: Record<string, unknown> = {}) {
    super(PuzzleErrorCode.CONFIGURATION_ERROR, 'Invalid environment configuration', {
      issues,
      ...context,
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a PuzzleError.
 */
export function isPuzzleError(error: unknown): error is PuzzleError {
  return error instanceof PuzzleError;
}

/**
 * Exit code for an error; 1 for anything that is not a PuzzleError.
 */
export function getExitCode(error: unknown): number {
  if (isPuzzleError(error)) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Wrap an unknown error in a PuzzleError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): PuzzleError {
  if (isPuzzleError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new PuzzleError(PuzzleErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
