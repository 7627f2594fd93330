/**
 * PlacementValidator Unit Tests
 *
 * Tests the placement validation logic on raw board states:
 * - per-rule checks from queryPlacement, including a queen evaluating itself
 * - queen placement refusals and their reasons
 * - queen removal and cross toggle preconditions
 */

import {
  queryPlacement,
  validateCrossToggle,
  validateQueenPlacement,
  validateQueenRemoval,
} from '../../../src/shared/engine/validators/PlacementValidator';
import { createInitialBoardState } from '../../../src/shared/engine/initialState';
import { applyQueenPlacement } from '../../../src/shared/engine/mutators/PlacementMutator';
import { BoardConstraintViolation } from '../../../src/shared/engine/errors';
import { ValidationErrorCode } from '../../../src/shared/engine/types';
import { BoardState, PuzzleDefinition } from '../../../src/shared/types/puzzle';
import { createScenario4, pos } from '../../utils/fixtures';

describe('PlacementValidator', () => {
  let definition: PuzzleDefinition;
  let board: BoardState;

  beforeEach(() => {
    definition = createScenario4();
    board = createInitialBoardState(definition);
  });

  describe('queryPlacement', () => {
    it('passes every rule on an empty board', () => {
      expect(queryPlacement(board, definition, pos(2, 2))).toEqual({
        rowOk: true,
        columnOk: true,
        colorZoneOk: true,
        cornerOk: true,
      });
    });

    it('reports row, column and corner failures around a queen', () => {
      applyQueenPlacement(board, definition, pos(1, 1));

      expect(queryPlacement(board, definition, pos(1, 3)).rowOk).toBe(false);
      expect(queryPlacement(board, definition, pos(3, 1)).columnOk).toBe(false);
      expect(queryPlacement(board, definition, pos(2, 2))).toEqual({
        rowOk: true,
        columnOk: true,
        colorZoneOk: true,
        cornerOk: false,
      });
    });

    it('reports a zone failure anywhere in the occupied zone', () => {
      applyQueenPlacement(board, definition, pos(1, 0));

      // (3,1) is zone C like (1,0) but shares no line or corner with it.
      expect(queryPlacement(board, definition, pos(3, 1))).toEqual({
        rowOk: true,
        columnOk: true,
        colorZoneOk: false,
        cornerOk: true,
      });
    });

    it('lets a queen evaluate its own cell as legal', () => {
      applyQueenPlacement(board, definition, pos(0, 1));
      expect(queryPlacement(board, definition, pos(0, 1))).toEqual({
        rowOk: true,
        columnOk: true,
        colorZoneOk: true,
        cornerOk: true,
      });
    });

    it('ignores crosses', () => {
      board.cells[1][2] = 'cross';
      expect(queryPlacement(board, definition, pos(0, 1)).cornerOk).toBe(true);
    });

    it('throws for off-board coordinates', () => {
      expect(() => queryPlacement(board, definition, pos(4, 4))).toThrow(
        BoardConstraintViolation
      );
    });
  });

  describe('validateQueenPlacement', () => {
    it('returns the checks on success', () => {
      expect(validateQueenPlacement(board, definition, pos(0, 1))).toEqual({
        valid: true,
        data: { rowOk: true, columnOk: true, colorZoneOk: true, cornerOk: true },
      });
    });

    it('names a single broken rule in the singular', () => {
      applyQueenPlacement(board, definition, pos(0, 1));
      const outcome = validateQueenPlacement(board, definition, pos(3, 1));

      expect(outcome).toEqual({
        valid: false,
        code: ValidationErrorCode.PLACEMENT_ILLEGAL,
        reason: 'Queen at (3, 1) breaks the column rule',
        position: { x: 3, y: 1 },
        checks: { rowOk: true, columnOk: false, colorZoneOk: true, cornerOk: true },
      });
    });

    it('lists several broken rules in rule order', () => {
      applyQueenPlacement(board, definition, pos(0, 2));
      // (0,3): same row, same zone B, no corner contact.
      const outcome = validateQueenPlacement(board, definition, pos(0, 3));

      expect(outcome).toMatchObject({
        valid: false,
        reason: 'Queen at (0, 3) breaks the row, zone rules',
      });
    });

    it('refuses off-board and occupied cells without checks', () => {
      expect(validateQueenPlacement(board, definition, pos(0, -1))).toEqual({
        valid: false,
        code: ValidationErrorCode.INVALID_COORDINATE,
        reason: 'Cell (0, -1) is off the board',
        position: { x: 0, y: -1 },
      });

      applyQueenPlacement(board, definition, pos(2, 2));
      expect(validateQueenPlacement(board, definition, pos(2, 2))).toEqual({
        valid: false,
        code: ValidationErrorCode.CELL_OCCUPIED,
        reason: 'Cell (2, 2) already holds a queen',
        position: { x: 2, y: 2 },
      });
    });

    it('accepts a placement over a cross', () => {
      board.cells[3][3] = 'cross';
      expect(validateQueenPlacement(board, definition, pos(3, 3)).valid).toBe(true);
    });
  });

  describe('validateQueenRemoval', () => {
    it('accepts a cell holding a queen', () => {
      applyQueenPlacement(board, definition, pos(1, 3));
      expect(validateQueenRemoval(board, pos(1, 3))).toEqual({ valid: true, data: undefined });
    });

    it('refuses empty, crossed and off-board cells', () => {
      board.cells[0][0] = 'cross';
      expect(validateQueenRemoval(board, pos(0, 0))).toMatchObject({
        valid: false,
        code: ValidationErrorCode.NOT_A_QUEEN,
        reason: 'Cell (0, 0) holds no queen',
      });
      expect(validateQueenRemoval(board, pos(1, 1))).toMatchObject({
        code: ValidationErrorCode.NOT_A_QUEEN,
      });
      expect(validateQueenRemoval(board, pos(9, 0))).toMatchObject({
        code: ValidationErrorCode.INVALID_COORDINATE,
        reason: 'Cell (9, 0) is off the board',
      });
    });
  });

  describe('validateCrossToggle', () => {
    it('accepts empty and crossed cells', () => {
      expect(validateCrossToggle(board, pos(2, 1)).valid).toBe(true);
      board.cells[2][1] = 'cross';
      expect(validateCrossToggle(board, pos(2, 1)).valid).toBe(true);
    });

    it('refuses a queen cell and off-board cells', () => {
      applyQueenPlacement(board, definition, pos(2, 1));
      expect(validateCrossToggle(board, pos(2, 1))).toEqual({
        valid: false,
        code: ValidationErrorCode.CELL_OCCUPIED,
        reason: 'Cell (2, 1) holds a queen; remove it before marking a cross',
        position: { x: 2, y: 1 },
      });
      expect(validateCrossToggle(board, pos(-1, -1))).toMatchObject({
        code: ValidationErrorCode.INVALID_COORDINATE,
      });
    });
  });
});
