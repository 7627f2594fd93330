import { BoardState, CellMark, Position, PuzzleDefinition } from '../../types/puzzle';

/**
 * Board-level mutators. Unlike the validators these write through to the
 * session's BoardState in place so every update stays O(1); callers must
 * run the matching validator first.
 *
 * Each mutator returns the mark the cell held before the update.
 */

/**
 * Write a queen at `position` and bump the row, column and zone bookkeeping.
 * A cross under the queen is remembered so removal can put it back.
 */
export function applyQueenPlacement(
  board: BoardState,
  definition: PuzzleDefinition,
  position: Position
): CellMark {
  const previous = board.cells[position.x][position.y];
  const zone = definition.zoneOf[position.x][position.y];

  board.cells[position.x][position.y] = 'queen';
  board.coveredCrosses[position.x][position.y] = previous === 'cross';
  board.rowCounts[position.x] += 1;
  board.colCounts[position.y] += 1;
  board.zoneOccupants[zone] = { x: position.x, y: position.y };
  board.queenCount += 1;

  return previous;
}

/**
 * Remove the queen at `position`, exactly undoing applyQueenPlacement.
 */
export function applyQueenRemoval(
  board: BoardState,
  definition: PuzzleDefinition,
  position: Position
): CellMark {
  const previous = board.cells[position.x][position.y];
  const zone = definition.zoneOf[position.x][position.y];

  board.cells[position.x][position.y] = board.coveredCrosses[position.x][position.y]
    ? 'cross'
    : 'empty';
  board.coveredCrosses[position.x][position.y] = false;
  board.rowCounts[position.x] -= 1;
  board.colCounts[position.y] -= 1;
  board.zoneOccupants[zone] = null;
  board.queenCount -= 1;

  return previous;
}

/**
 * Flip empty and cross. Counters are untouched: crosses are scratch marks.
 */
export function applyCrossToggle(board: BoardState, position: Position): CellMark {
  const previous = board.cells[position.x][position.y];
  board.cells[position.x][position.y] = previous === 'cross' ? 'empty' : 'cross';
  return previous;
}
