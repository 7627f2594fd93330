import {
  BoardState,
  CellMark,
  Position,
  PuzzleDefinition,
  isDiagonallyAdjacent,
} from '../types/puzzle';
import { EngineErrorCode, InvalidState } from './errors';

/**
 * Brute-force counterparts of the RuleEngine's incremental bookkeeping.
 *
 * None of this runs on the hot path. The engine calls
 * assertBoardInvariants only in debug mode; puzzle verification and tests
 * use the pairwise scan to cross-check the incremental answers.
 */

export type RuleName = 'row' | 'column' | 'zone' | 'corner';

export interface RuleConflict {
  rule: RuleName;
  a: Position;
  b: Position;
}

/** Queen cells in row-major order. */
export function listQueens(cells: ReadonlyArray<ReadonlyArray<CellMark>>): Position[] {
  const queens: Position[] = [];
  cells.forEach((row, x) => {
    row.forEach((mark, y) => {
      if (mark === 'queen') {
        queens.push({ x, y });
      }
    });
  });
  return queens;
}

/**
 * Every pair of queens that breaks a rule, one entry per (pair, rule).
 */
export function findRuleConflicts(
  definition: PuzzleDefinition,
  queens: ReadonlyArray<Position>
): RuleConflict[] {
  const conflicts: RuleConflict[] = [];
  for (let i = 0; i < queens.length; i++) {
    for (let j = i + 1; j < queens.length; j++) {
      const a = queens[i];
      const b = queens[j];
      if (a.x === b.x) conflicts.push({ rule: 'row', a, b });
      if (a.y === b.y) conflicts.push({ rule: 'column', a, b });
      if (definition.zoneOf[a.x][a.y] === definition.zoneOf[b.x][b.y]) {
        conflicts.push({ rule: 'zone', a, b });
      }
      if (isDiagonallyAdjacent(a, b)) conflicts.push({ rule: 'corner', a, b });
    }
  }
  return conflicts;
}

/**
 * True iff `queens` is a complete solution: exactly N queens, pairwise
 * satisfying all four rules.
 */
export function isValidSolution(
  definition: PuzzleDefinition,
  queens: ReadonlyArray<Position>
): boolean {
  return (
    queens.length === definition.size && findRuleConflicts(definition, queens).length === 0
  );
}

/**
 * Solved check by full pairwise scan of the cells.
 */
export function isSolvedByScan(
  definition: PuzzleDefinition,
  cells: ReadonlyArray<ReadonlyArray<CellMark>>
): boolean {
  return isValidSolution(definition, listQueens(cells));
}

/**
 * Recount the board from its cells and compare with the incremental
 * counters. Throws InvalidState describing the first mismatch.
 */
export function assertBoardInvariants(board: BoardState, definition: PuzzleDefinition): void {
  const n = board.size;
  const rows = new Array<number>(n).fill(0);
  const cols = new Array<number>(n).fill(0);
  const zoneQueens: Position[][] = Array.from({ length: n }, () => []);

  const queens = listQueens(board.cells);
  for (const q of queens) {
    rows[q.x] += 1;
    cols[q.y] += 1;
    zoneQueens[definition.zoneOf[q.x][q.y]].push(q);
  }

  const fail = (message: string, context: Record<string, unknown>): never => {
    throw new InvalidState(EngineErrorCode.STATE_INVARIANT_BROKEN, message, context, 'BoardInvariants');
  };

  if (queens.length !== board.queenCount) {
    fail('Queen count out of sync', { expected: queens.length, actual: board.queenCount });
  }

  for (let i = 0; i < n; i++) {
    if (rows[i] !== board.rowCounts[i]) {
      fail(`Row ${i} count out of sync`, { expected: rows[i], actual: board.rowCounts[i] });
    }
    if (cols[i] !== board.colCounts[i]) {
      fail(`Column ${i} count out of sync`, { expected: cols[i], actual: board.colCounts[i] });
    }
    if (rows[i] > 1 || cols[i] > 1) {
      fail(`Line ${i} holds more than one queen`, { rowQueens: rows[i], colQueens: cols[i] });
    }
  }

  board.coveredCrosses.forEach((row, x) =>
    row.forEach((covered, y) => {
      if (covered && board.cells[x][y] !== 'queen') {
        fail(`Covered cross at (${x}, ${y}) without a queen`, { x, y, mark: board.cells[x][y] });
      }
    })
  );

  zoneQueens.forEach((held, zone) => {
    const occupant = board.zoneOccupants[zone];
    if (held.length > 1) {
      fail(`Zone ${zone} holds more than one queen`, { zone, queens: held });
    }
    const expected = held.length === 1 ? held[0] : null;
    const matches =
      expected === null
        ? occupant === null
        : occupant !== null && occupant.x === expected.x && occupant.y === expected.y;
    if (!matches) {
      fail(`Zone ${zone} occupant out of sync`, { zone, expected, actual: occupant });
    }
  });
}
