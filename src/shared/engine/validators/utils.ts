import { Position } from '../../types/puzzle';

/**
 * Checks if a position is within the bounds of an N×N grid. Non-integer
 * coordinates are rejected too, since they would index past the arrays.
 */
export function isValidPosition(pos: Position, size: number): boolean {
  return (
    Number.isInteger(pos.x) &&
    Number.isInteger(pos.y) &&
    pos.x >= 0 &&
    pos.x < size &&
    pos.y >= 0 &&
    pos.y < size
  );
}

const DIAGONAL_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1],
];

const ORTHOGONAL_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

/**
 * The up-to-4 corner neighbours of `pos`, clipped to the grid.
 */
export function getDiagonalNeighbors(pos: Position, size: number): Position[] {
  return offsetNeighbors(pos, size, DIAGONAL_OFFSETS);
}

/**
 * The up-to-4 edge neighbours of `pos`, clipped to the grid. Zone
 * connectivity is defined over these.
 */
export function getOrthogonalNeighbors(pos: Position, size: number): Position[] {
  return offsetNeighbors(pos, size, ORTHOGONAL_OFFSETS);
}

function offsetNeighbors(
  pos: Position,
  size: number,
  offsets: ReadonlyArray<readonly [number, number]>
): Position[] {
  const result: Position[] = [];
  for (const [dx, dy] of offsets) {
    const next = { x: pos.x + dx, y: pos.y + dy };
    if (isValidPosition(next, size)) {
      result.push(next);
    }
  }
  return result;
}
