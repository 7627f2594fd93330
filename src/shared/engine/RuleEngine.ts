import {
  ActionOutcome,
  BoardState,
  CellMark,
  CellUpdate,
  EngineEvent,
  EngineEventListener,
  PlacementChecks,
  Position,
  PuzzleDefinition,
  RuleEngineOptions,
  validOutcome,
} from './types';
import {
  queryPlacement,
  validateCrossToggle,
  validateQueenPlacement,
  validateQueenRemoval,
} from './validators/PlacementValidator';
import {
  applyCrossToggle,
  applyQueenPlacement,
  applyQueenRemoval,
} from './mutators/PlacementMutator';
import { cloneBoardState, createInitialBoardState } from './initialState';
import { assertBoardInvariants, listQueens } from './boardInvariants';
import { invalidCoordinate } from './errors';
import { isValidPosition } from './validators/utils';
import { assertValidPuzzleDefinition } from '../puzzle/definition';
import { isInvariantDebugEnabled } from '../utils/envFlags';

/**
 * Rule engine for one play session on one puzzle.
 *
 * Owns the BoardState exclusively. Every action is validated first and then
 * applied in full, so a refused action never leaves a partial update
 * behind. Refusals come back as `{ valid: false }` outcomes; only a
 * malformed definition (at construction) or an off-board query throws.
 *
 * The engine knows nothing about rendering: the view subscribes to events
 * and maps zone ids to colours on its own.
 */
export class RuleEngine {
  private readonly definition: PuzzleDefinition;
  private board: BoardState;
  private readonly verifyInvariants: boolean;
  private readonly listeners = new Set<EngineEventListener>();
  private readonly onListenerError: (error: unknown, event: EngineEvent) => void;

  constructor(definition: PuzzleDefinition, options: RuleEngineOptions = {}) {
    assertValidPuzzleDefinition(definition);
    this.definition = definition;
    this.board = createInitialBoardState(definition);
    this.verifyInvariants = options.verifyInvariants ?? isInvariantDebugEnabled();
    this.onListenerError =
      options.onListenerError ??
      ((error) => {
        console.error('[RuleEngine] Listener error:', error);
      });
  }

  public get size(): number {
    return this.definition.size;
  }

  public get queenCount(): number {
    return this.board.queenCount;
  }

  public getDefinition(): PuzzleDefinition {
    return this.definition;
  }

  /** Deep copy of the current board. */
  public getBoardState(): BoardState {
    return cloneBoardState(this.board);
  }

  public getCellMark(x: number, y: number): CellMark {
    const pos = { x, y };
    if (!isValidPosition(pos, this.board.size)) {
      throw invalidCoordinate(pos, this.board.size, 'RuleEngine');
    }
    return this.board.cells[x][y];
  }

  /** Queens currently on the board, in row-major order. */
  public getQueens(): Position[] {
    return listQueens(this.board.cells);
  }

  /**
   * Evaluate the four rules for a queen at (x, y) without touching the
   * board. Throws BoardConstraintViolation for off-board coordinates.
   */
  public queryPlacement(x: number, y: number): PlacementChecks {
    return queryPlacement(this.board, this.definition, { x, y });
  }

  public placeQueen(x: number, y: number): ActionOutcome {
    const pos = { x, y };
    const validation = validateQueenPlacement(this.board, this.definition, pos);
    if (!validation.valid) {
      return validation;
    }

    const previous = applyQueenPlacement(this.board, this.definition, pos);
    const update = this.afterMutation(pos, previous);
    if (update.solved) {
      this.emit({ type: 'PUZZLE_SOLVED', queens: this.getQueens() });
    }
    return validOutcome(update);
  }

  public removeQueen(x: number, y: number): ActionOutcome {
    const pos = { x, y };
    const validation = validateQueenRemoval(this.board, pos);
    if (!validation.valid) {
      return validation;
    }

    const previous = applyQueenRemoval(this.board, this.definition, pos);
    return validOutcome(this.afterMutation(pos, previous));
  }

  public toggleCross(x: number, y: number): ActionOutcome {
    const pos = { x, y };
    const validation = validateCrossToggle(this.board, pos);
    if (!validation.valid) {
      return validation;
    }

    const previous = applyCrossToggle(this.board, pos);
    return validOutcome(this.afterMutation(pos, previous));
  }

  /**
   * True iff N queens are placed. The validators never let two queens share
   * a row, column or zone or touch corners, so no pairwise scan is needed.
   */
  public isSolved(): boolean {
    return this.board.queenCount === this.definition.size;
  }

  /** Clear every mark and start the session over. */
  public reset(): void {
    this.board = createInitialBoardState(this.definition);
    this.emit({ type: 'BOARD_RESET' });
  }

  /**
   * Register a listener for board events. Returns the unsubscribe function.
   * Events fire after the board has changed; a listener that throws is
   * reported through `onListenerError` and the action still succeeds.
   */
  public subscribe(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private afterMutation(pos: Position, previous: CellMark): CellUpdate {
    if (this.verifyInvariants) {
      assertBoardInvariants(this.board, this.definition);
    }
    const mark = this.board.cells[pos.x][pos.y];
    this.emit({ type: 'CELL_CHANGED', position: { ...pos }, previous, mark });
    return { position: { ...pos }, mark, solved: this.isSolved() };
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.onListenerError(err, event);
      }
    }
  }
}
