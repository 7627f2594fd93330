/**
 * Engine Domain Errors - Structured error types for the rules engine and
 * puzzle generator.
 *
 * Error Categories:
 * - **BoardConstraintViolation**: coordinates outside the grid
 * - **MalformedPuzzleDefinition**: a definition that does not partition the
 *   grid into connected zones, or whose canonical solution breaks the rules
 * - **GenerationError**: the generator could not produce a puzzle
 * - **InvalidState**: board counters out of sync with the cells (a bug)
 *
 * Player actions that break a rule (occupied cell, illegal placement, ...)
 * are not errors: the RuleEngine reports them as failed outcomes. These
 * classes cover the cases where the caller handed the engine something it
 * cannot work with.
 *
 * Usage:
 * ```typescript
 * import { GenerationError, EngineErrorCode } from './errors';
 *
 * throw new GenerationError(
 *   EngineErrorCode.GENERATOR_UNSATISFIABLE,
 *   'No queen placement exists for a 3x3 grid',
 *   { size: 3 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - BOARD_*: Grid geometry issues
 * - PUZZLE_*: Puzzle definition issues
 * - GENERATOR_*: Puzzle generation failures
 * - STATE_*: Board state corruption
 */
export enum EngineErrorCode {
  // Board Constraint Violations
  /** Coordinate outside [0, size) */
  BOARD_INVALID_COORDINATE = 'BOARD_INVALID_COORDINATE',

  // Puzzle Definition Errors
  /** Zones do not partition the grid, are disconnected, or the solution is invalid */
  PUZZLE_MALFORMED_DEFINITION = 'PUZZLE_MALFORMED_DEFINITION',

  // Generator Errors
  /** No queen placement satisfies the row/column/corner constraints */
  GENERATOR_UNSATISFIABLE = 'GENERATOR_UNSATISFIABLE',
  /** Requested size is outside the supported range */
  GENERATOR_INVALID_SIZE = 'GENERATOR_INVALID_SIZE',
  /** A seed placement handed to zone generation breaks the rules */
  GENERATOR_INVALID_SOLUTION = 'GENERATOR_INVALID_SOLUTION',
  /** Every construction attempt failed to yield a single-solution puzzle */
  GENERATOR_EXHAUSTED = 'GENERATOR_EXHAUSTED',

  // State Errors
  /** Incremental counters disagree with the cell marks */
  STATE_INVARIANT_BROKEN = 'STATE_INVARIANT_BROKEN',

  // Internal Errors
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  BOARD_: 'Board geometry constraint violation',
  PUZZLE_: 'Malformed puzzle definition',
  GENERATOR_: 'Puzzle generation failure',
  STATE_: 'Corrupted or unexpected board state',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'RuleEngine', 'ZoneGrowth') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for coordinates outside the grid.
 *
 * The input-translation layer should never produce these, but the engine
 * refuses them rather than reading past its arrays.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * One problem found while validating a puzzle definition.
 */
export interface PuzzleDefinitionIssue {
  path: string;
  message: string;
}

/**
 * Error for a puzzle definition that breaks the partition invariants.
 *
 * All issues found in one validation pass are reported together so that a
 * hand-edited puzzle file can be fixed in one go.
 */
export class MalformedPuzzleDefinition extends EngineError {
  readonly issues: ReadonlyArray<PuzzleDefinitionIssue>;

  constructor(issues: ReadonlyArray<PuzzleDefinitionIssue>, domain: string = 'PuzzleDefinition') {
    const summary = issues
      .slice(0, 3)
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    const more = issues.length > 3 ? ` (+${issues.length - 3} more)` : '';
    super(
      EngineErrorCode.PUZZLE_MALFORMED_DEFINITION,
      `Malformed puzzle definition: ${summary}${more}`,
      { issues },
      domain
    );
    this.name = 'MalformedPuzzleDefinition';
    this.issues = issues;
    Object.setPrototypeOf(this, MalformedPuzzleDefinition.prototype);
  }
}

/**
 * Error for puzzle generation failures.
 */
export class GenerationError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Generator'
  ) {
    super(code, message, context, domain);
    this.name = 'GenerationError';
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * Error for corrupted board state.
 *
 * Only raised by the invariant checker; seeing one means the incremental
 * bookkeeping has a bug.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isMalformedPuzzleDefinition(error: unknown): error is MalformedPuzzleDefinition {
  return error instanceof MalformedPuzzleDefinition;
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create the standard out-of-range coordinate error.
 */
export function invalidCoordinate(
  position: { x: number; y: number },
  size: number,
  domain: string = 'Board'
): BoardConstraintViolation {
  return new BoardConstraintViolation(
    EngineErrorCode.BOARD_INVALID_COORDINATE,
    `Coordinate (${position.x}, ${position.y}) is outside the ${size}x${size} grid`,
    { position, size },
    domain
  );
}
