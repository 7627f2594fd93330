import { BoardState, CellMark, Position, PuzzleDefinition } from '../types/puzzle';

/**
 * Creates a pristine BoardState for a new session on `definition`: every
 * cell empty, every counter zero, no zone occupied.
 *
 * The definition is assumed to have been validated already (see
 * createPuzzleDefinition); its zone count equals its size.
 */
export function createInitialBoardState(definition: PuzzleDefinition): BoardState {
  const n = definition.size;
  return {
    size: n,
    cells: Array.from({ length: n }, () => new Array<CellMark>(n).fill('empty')),
    rowCounts: new Array<number>(n).fill(0),
    colCounts: new Array<number>(n).fill(0),
    zoneOccupants: new Array<Position | null>(n).fill(null),
    queenCount: 0,
    coveredCrosses: Array.from({ length: n }, () => new Array<boolean>(n).fill(false)),
  };
}

/**
 * Deep copy of a BoardState, for snapshots handed outside the engine.
 */
export function cloneBoardState(board: BoardState): BoardState {
  return {
    size: board.size,
    cells: board.cells.map((row) => [...row]),
    rowCounts: [...board.rowCounts],
    colCounts: [...board.colCounts],
    zoneOccupants: board.zoneOccupants.map((p) => (p ? { x: p.x, y: p.y } : null)),
    queenCount: board.queenCount,
    coveredCrosses: board.coveredCrosses.map((row) => [...row]),
  };
}
