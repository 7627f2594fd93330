/**
 * Test Fixtures and Utilities
 * Common puzzle definitions and helper functions for Queens tests
 */

import * as path from 'path';
import { Position, PuzzleDefinition, ZoneId } from '../../src/shared/types/puzzle';
import { createPuzzleDefinition } from '../../src/shared/puzzle/definition';

/**
 * Position helper - creates a position object
 */
export function pos(x: number, y: number): Position {
  return { x, y };
}

/**
 * Position string converter
 */
export function posStr(x: number, y: number): string {
  return `${x},${y}`;
}

/**
 * The 4×4 walkthrough puzzle.
 *
 *   A A B B
 *   C A D B
 *   C C D D
 *   C C D D
 *
 * Unique solution: (0,1) (1,3) (2,0) (3,2).
 */
export const SCENARIO_4_ZONES: Position[][] = [
  [pos(0, 0), pos(0, 1), pos(1, 1)],
  [pos(0, 2), pos(0, 3), pos(1, 3)],
  [pos(1, 0), pos(2, 0), pos(2, 1), pos(3, 0), pos(3, 1)],
  [pos(1, 2), pos(2, 2), pos(2, 3), pos(3, 2), pos(3, 3)],
];

export const SCENARIO_4_SOLUTION: Position[] = [pos(0, 1), pos(1, 3), pos(2, 0), pos(3, 2)];

export function createScenario4(withSolution: boolean = true): PuzzleDefinition {
  return createPuzzleDefinition(
    4,
    SCENARIO_4_ZONES,
    withSolution ? SCENARIO_4_SOLUTION : undefined
  );
}

/**
 * Zone i is row i. Valid for any size, but every queen placement that keeps
 * the row, column and corner rules solves it, so it is far from unique.
 */
export function createRowStripeDefinition(size: number): PuzzleDefinition {
  const zoneOf: ZoneId[][] = Array.from({ length: size }, (_, x) =>
    new Array<ZoneId>(size).fill(x)
  );
  return { size, zoneOf };
}

/**
 * 5×5 puzzle with a unique solution (0,0) (1,2) (2,4) (3,1) (4,3): four
 * single-cell zones on the queens and one zone for everything else.
 */
export function createSingleton5(): PuzzleDefinition {
  const solution = [pos(0, 0), pos(1, 2), pos(2, 4), pos(3, 1), pos(4, 3)];
  const zoneOf: ZoneId[][] = Array.from({ length: 5 }, () => new Array<ZoneId>(5).fill(4));
  solution.slice(0, 4).forEach((q, zone) => {
    zoneOf[q.x][q.y] = zone;
  });
  return { size: 5, zoneOf, canonicalSolution: solution };
}

export const PUZZLE_FIXTURE_DIR = path.resolve(__dirname, '../fixtures/puzzles');

export function puzzleFixturePath(name: string): string {
  return path.join(PUZZLE_FIXTURE_DIR, name);
}
