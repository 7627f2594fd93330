/**
 * Test suite for src/shared/engine/initialState.ts
 *
 * Tests createInitialBoardState, which creates a pristine board for a new
 * session, and cloneBoardState, which produces the snapshots handed out by
 * the RuleEngine.
 */

import {
  cloneBoardState,
  createInitialBoardState,
} from '../../../src/shared/engine/initialState';
import { createRowStripeDefinition, createScenario4 } from '../../utils/fixtures';

describe('initialState', () => {
  describe('createInitialBoardState', () => {
    it('creates an empty N×N board with zeroed counters', () => {
      const board = createInitialBoardState(createScenario4());

      expect(board).toEqual({
        size: 4,
        cells: [
          ['empty', 'empty', 'empty', 'empty'],
          ['empty', 'empty', 'empty', 'empty'],
          ['empty', 'empty', 'empty', 'empty'],
          ['empty', 'empty', 'empty', 'empty'],
        ],
        rowCounts: [0, 0, 0, 0],
        colCounts: [0, 0, 0, 0],
        zoneOccupants: [null, null, null, null],
        queenCount: 0,
        coveredCrosses: [
          [false, false, false, false],
          [false, false, false, false],
          [false, false, false, false],
          [false, false, false, false],
        ],
      });
    });

    it('allocates independent rows', () => {
      const board = createInitialBoardState(createRowStripeDefinition(3));
      board.cells[0][0] = 'cross';
      expect(board.cells[1][0]).toBe('empty');
      expect(board.cells[2][0]).toBe('empty');
    });

    it('handles the single-cell puzzle', () => {
      const board = createInitialBoardState({ size: 1, zoneOf: [[0]] });
      expect(board.cells).toEqual([['empty']]);
      expect(board.zoneOccupants).toEqual([null]);
    });
  });

  describe('cloneBoardState', () => {
    it('produces an equal board that shares no mutable structure', () => {
      const board = createInitialBoardState(createScenario4());
      board.cells[0][1] = 'queen';
      board.rowCounts[0] = 1;
      board.colCounts[1] = 1;
      board.zoneOccupants[0] = { x: 0, y: 1 };
      board.queenCount = 1;

      const copy = cloneBoardState(board);
      expect(copy).toEqual(board);

      copy.cells[0][1] = 'empty';
      copy.rowCounts[0] = 0;
      copy.colCounts[1] = 0;
      const occupant = copy.zoneOccupants[0];
      if (occupant) occupant.x = 3;

      expect(board.cells[0][1]).toBe('queen');
      expect(board.rowCounts[0]).toBe(1);
      expect(board.colCounts[1]).toBe(1);
      expect(board.zoneOccupants[0]).toEqual({ x: 0, y: 1 });
    });
  });
});
