/**
 * Core data model for Queens puzzles.
 *
 * Coordinates follow the (x, y) convention used throughout the engine:
 * `x` is the row index and `y` the column index, both in `[0, size)`.
 */

export interface Position {
  x: number;
  y: number;
}

/**
 * Opaque zone identifier in `[0, size)`. Display colours or labels are the
 * view layer's business; the engine only compares ids.
 */
export type ZoneId = number;

/**
 * Tri-state cell mark. A cross is a player annotation meaning "no queen
 * here" and never participates in rule checks.
 */
export type CellMark = 'empty' | 'queen' | 'cross';

/**
 * Immutable puzzle description consumed by the RuleEngine and produced by
 * the generator or by the puzzle file parser.
 */
export interface PuzzleDefinition {
  readonly size: number;
  /** `zoneOf[row][col]` */
  readonly zoneOf: ReadonlyArray<ReadonlyArray<ZoneId>>;
  /** One queen per row, column and zone with no diagonal contact. */
  readonly canonicalSolution?: ReadonlyArray<Position>;
}

/**
 * Mutable per-session board state. Counters are maintained incrementally by
 * the placement mutators and must always agree with `cells`.
 */
export interface BoardState {
  readonly size: number;
  /** `cells[row][col]` */
  cells: CellMark[][];
  rowCounts: number[];
  colCounts: number[];
  /** Queen currently held by each zone, indexed by ZoneId. */
  zoneOccupants: Array<Position | null>;
  queenCount: number;
  /** `true` where the queen on the cell replaced a cross; removal restores it. */
  coveredCrosses: boolean[][];
}

/**
 * Per-rule result of evaluating a prospective queen placement.
 */
export interface PlacementChecks {
  rowOk: boolean;
  columnOk: boolean;
  colorZoneOk: boolean;
  cornerOk: boolean;
}

export type PlacementRule = keyof PlacementChecks;

export const PLACEMENT_RULES: readonly PlacementRule[] = [
  'rowOk',
  'columnOk',
  'colorZoneOk',
  'cornerOk',
] as const;

export const positionToString = (pos: Position): string => `${pos.x},${pos.y}`;

export const positionsEqual = (a: Position, b: Position): boolean =>
  a.x === b.x && a.y === b.y;

/** True when two cells touch corner to corner. */
export const isDiagonallyAdjacent = (a: Position, b: Position): boolean =>
  Math.abs(a.x - b.x) === 1 && Math.abs(a.y - b.y) === 1;

export function allChecksPass(checks: PlacementChecks): boolean {
  return checks.rowOk && checks.columnOk && checks.colorZoneOk && checks.cornerOk;
}
