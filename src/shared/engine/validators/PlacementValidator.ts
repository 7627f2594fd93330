import {
  BoardState,
  PlacementChecks,
  Position,
  PuzzleDefinition,
  PLACEMENT_RULES,
  PlacementRule,
  allChecksPass,
} from '../../types/puzzle';
import { invalidCoordinate } from '../errors';
import { ValidationErrorCode, ValidationOutcome, invalidOutcome, validOutcome } from '../types';
import { getDiagonalNeighbors, isValidPosition } from './utils';

/**
 * Evaluate the four placement rules for a queen at `pos` against the current
 * board, ignoring whatever mark `pos` itself holds.
 *
 * Row, column and zone legality read the running counters; the corner rule
 * looks at no more than four neighbours. Nothing here scans a row or zone.
 *
 * Throws a BoardConstraintViolation for coordinates outside the grid.
 */
export function queryPlacement(
  board: BoardState,
  definition: PuzzleDefinition,
  pos: Position
): PlacementChecks {
  if (!isValidPosition(pos, board.size)) {
    throw invalidCoordinate(pos, board.size, 'PlacementValidator');
  }

  const selfIsQueen = board.cells[pos.x][pos.y] === 'queen';
  // A queen already on `pos` counts once in its own row, column and zone.
  const own = selfIsQueen ? 1 : 0;

  const zone = definition.zoneOf[pos.x][pos.y];
  const occupant = board.zoneOccupants[zone];

  return {
    rowOk: board.rowCounts[pos.x] - own === 0,
    columnOk: board.colCounts[pos.y] - own === 0,
    colorZoneOk: occupant === null || (selfIsQueen && occupant.x === pos.x && occupant.y === pos.y),
    cornerOk: getDiagonalNeighbors(pos, board.size).every(
      (n) => board.cells[n.x][n.y] !== 'queen'
    ),
  };
}

/**
 * Validate placing a queen at `pos`. Crosses do not block placement.
 */
export function validateQueenPlacement(
  board: BoardState,
  definition: PuzzleDefinition,
  pos: Position
): ValidationOutcome<PlacementChecks> {
  if (!isValidPosition(pos, board.size)) {
    return invalidOutcome(
      ValidationErrorCode.INVALID_COORDINATE,
      `Cell (${pos.x}, ${pos.y}) is off the board`,
      pos
    );
  }

  if (board.cells[pos.x][pos.y] === 'queen') {
    return invalidOutcome(
      ValidationErrorCode.CELL_OCCUPIED,
      `Cell (${pos.x}, ${pos.y}) already holds a queen`,
      pos
    );
  }

  const checks = queryPlacement(board, definition, pos);
  if (!allChecksPass(checks)) {
    return invalidOutcome(
      ValidationErrorCode.PLACEMENT_ILLEGAL,
      `Queen at (${pos.x}, ${pos.y}) breaks ${describeFailedRules(checks)}`,
      pos,
      checks
    );
  }

  return validOutcome(checks);
}

/**
 * Validate removing the queen at `pos`.
 */
export function validateQueenRemoval(board: BoardState, pos: Position): ValidationOutcome {
  if (!isValidPosition(pos, board.size)) {
    return invalidOutcome(
      ValidationErrorCode.INVALID_COORDINATE,
      `Cell (${pos.x}, ${pos.y}) is off the board`,
      pos
    );
  }

  if (board.cells[pos.x][pos.y] !== 'queen') {
    return invalidOutcome(
      ValidationErrorCode.NOT_A_QUEEN,
      `Cell (${pos.x}, ${pos.y}) holds no queen`,
      pos
    );
  }

  return validOutcome(undefined);
}

/**
 * Validate toggling a cross at `pos`. Only queens block it.
 */
export function validateCrossToggle(board: BoardState, pos: Position): ValidationOutcome {
  if (!isValidPosition(pos, board.size)) {
    return invalidOutcome(
      ValidationErrorCode.INVALID_COORDINATE,
      `Cell (${pos.x}, ${pos.y}) is off the board`,
      pos
    );
  }

  if (board.cells[pos.x][pos.y] === 'queen') {
    return invalidOutcome(
      ValidationErrorCode.CELL_OCCUPIED,
      `Cell (${pos.x}, ${pos.y}) holds a queen; remove it before marking a cross`,
      pos
    );
  }

  return validOutcome(undefined);
}

const RULE_NAMES: Record<PlacementRule, string> = {
  rowOk: 'row',
  columnOk: 'column',
  colorZoneOk: 'zone',
  cornerOk: 'corner',
};

function describeFailedRules(checks: PlacementChecks): string {
  const failed = PLACEMENT_RULES.filter((rule) => !checks[rule]).map((rule) => RULE_NAMES[rule]);
  return `the ${failed.join(', ')} rule${failed.length > 1 ? 's' : ''}`;
}
