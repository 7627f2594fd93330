import { Position, isDiagonallyAdjacent } from '../types/puzzle';
import { EngineErrorCode, GenerationError } from '../engine/errors';
import { isValidPosition } from '../engine/validators/utils';
import { SeededRNG, generateGameSeed } from '../utils/rng';
import { MAX_GENERATED_SIZE } from './constants';

export interface SolutionSearchOptions {
  /** Source of randomness. Takes precedence over `seed`. */
  rng?: SeededRNG;
  seed?: number;
}

/**
 * Pick a random queen placement for an empty n×n board: one queen per row
 * and column with no two queens touching corners. Zones play no part here;
 * they are grown around the placement afterwards.
 *
 * The search assigns one row per column, left to right. Distinct rows keep
 * the row rule; the corner rule reduces to "neighbouring columns never hold
 * rows one apart". Candidate rows are tried in shuffled order.
 *
 * @returns queens sorted by column
 */
export function generateSolution(n: number, options: SolutionSearchOptions = {}): Position[] {
  if (!Number.isInteger(n) || n < 1 || n > MAX_GENERATED_SIZE) {
    throw new GenerationError(
      EngineErrorCode.GENERATOR_INVALID_SIZE,
      `Puzzle size must be an integer between 1 and ${MAX_GENERATED_SIZE}, got ${n}`,
      { size: n }
    );
  }

  const rng = options.rng ?? new SeededRNG(options.seed ?? generateGameSeed());
  const rows: number[] = [];
  const usedRows = new Array<boolean>(n).fill(false);

  const compatible = (row: number, col: number): boolean =>
    !usedRows[row] && (col === 0 || Math.abs(row - rows[col - 1]) !== 1);

  // Forward check: the next column must keep at least one candidate row.
  const nextColumnOpen = (col: number): boolean => {
    if (col >= n) return true;
    for (let row = 0; row < n; row++) {
      if (compatible(row, col)) return true;
    }
    return false;
  };

  const assign = (col: number): boolean => {
    if (col === n) return true;
    const order = rng.shuffle(Array.from({ length: n }, (_, i) => i));
    for (const row of order) {
      if (!compatible(row, col)) continue;
      rows.push(row);
      usedRows[row] = true;
      if (nextColumnOpen(col + 1) && assign(col + 1)) {
        return true;
      }
      usedRows[row] = false;
      rows.pop();
    }
    return false;
  };

  if (!assign(0)) {
    throw new GenerationError(
      EngineErrorCode.GENERATOR_UNSATISFIABLE,
      `No queen placement exists for a ${n}x${n} board`,
      { size: n }
    );
  }

  return rows.map((row, col) => ({ x: row, y: col }));
}

/**
 * True iff `positions` holds exactly n in-range queens, one per row and
 * column, with no two diagonally adjacent.
 */
export function isNonAttackingPlacement(n: number, positions: ReadonlyArray<Position>): boolean {
  if (positions.length !== n) return false;
  const rows = new Set<number>();
  const cols = new Set<number>();
  for (const p of positions) {
    if (!isValidPosition(p, n)) return false;
    rows.add(p.x);
    cols.add(p.y);
  }
  if (rows.size !== n || cols.size !== n) return false;

  for (let i = 0; i < positions.length; i++) {
    for (let j = i + 1; j < positions.length; j++) {
      if (isDiagonallyAdjacent(positions[i], positions[j])) return false;
    }
  }
  return true;
}
