import type {
  BoardState,
  CellMark,
  PlacementChecks,
  Position,
  PuzzleDefinition,
  ZoneId,
} from '../types/puzzle';

// Re-export types used in the engine interface
export type { BoardState, CellMark, PlacementChecks, Position, PuzzleDefinition, ZoneId };

// ═══════════════════════════════════════════════════════════════════════════
// ACTION OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Codes for player actions the engine refused. These are returned, never
 * thrown: a refused action leaves the board exactly as it was.
 */
export enum ValidationErrorCode {
  /** Target cell is outside the grid */
  INVALID_COORDINATE = 'INVALID_COORDINATE',
  /** Placement or cross toggle on a cell that already holds a queen */
  CELL_OCCUPIED = 'CELL_OCCUPIED',
  /** Removal from a cell without a queen */
  NOT_A_QUEEN = 'NOT_A_QUEEN',
  /** At least one of the four placement rules failed */
  PLACEMENT_ILLEGAL = 'PLACEMENT_ILLEGAL',
}

/**
 * Outcome of a validation step or an engine action.
 *
 * Failed placements carry the four per-rule checks so the view can
 * highlight which rule was broken.
 *
 * @example
 * ```typescript
 * const outcome = engine.placeQueen(1, 1);
 * if (!outcome.valid && outcome.checks && !outcome.checks.cornerOk) {
 *   highlightCorners({ x: 1, y: 1 });
 * }
 * ```
 */
export type ValidationOutcome<T = void> =
  | { valid: true; data: T }
  | {
      valid: false;
      code: ValidationErrorCode;
      reason: string;
      position: Position;
      checks?: PlacementChecks;
    };

/**
 * Type guard to check if a ValidationOutcome is successful.
 */
export function isValidOutcome<T>(
  outcome: ValidationOutcome<T>
): outcome is { valid: true; data: T } {
  return outcome.valid === true;
}

/**
 * Helper to create a successful validation outcome.
 */
export function validOutcome<T>(data: T): ValidationOutcome<T> {
  return { valid: true, data };
}

/**
 * Helper to create a failed validation outcome.
 */
export function invalidOutcome<T = void>(
  code: ValidationErrorCode,
  reason: string,
  position: Position,
  checks?: PlacementChecks
): ValidationOutcome<T> {
  return checks
    ? { valid: false, code, reason, position: { ...position }, checks }
    : { valid: false, code, reason, position: { ...position } };
}

/**
 * The state of a cell after an applied action.
 */
export interface CellUpdate {
  position: Position;
  mark: CellMark;
  /** True iff all N queens are now placed. */
  solved: boolean;
}

export type ActionOutcome = ValidationOutcome<CellUpdate>;

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type EngineEventType = 'CELL_CHANGED' | 'PUZZLE_SOLVED' | 'BOARD_RESET';

export interface CellChangedEvent {
  type: 'CELL_CHANGED';
  position: Position;
  previous: CellMark;
  mark: CellMark;
}

export interface PuzzleSolvedEvent {
  type: 'PUZZLE_SOLVED';
  queens: Position[];
}

export interface BoardResetEvent {
  type: 'BOARD_RESET';
}

export type EngineEvent = CellChangedEvent | PuzzleSolvedEvent | BoardResetEvent;

export type EngineEventListener = (event: EngineEvent) => void;

// ═══════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

export interface RuleEngineOptions {
  /**
   * Re-scan the board after every mutation and throw on counter drift.
   * Defaults to the QUEENS_DEBUG_INVARIANTS environment flag.
   */
  verifyInvariants?: boolean;
  /**
   * Receives errors thrown by event listeners. A failing listener never
   * aborts an action or keeps later listeners from running. Defaults to
   * console.error.
   */
  onListenerError?: (error: unknown, event: EngineEvent) => void;
}
