// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// Adapters (CLI, presentation layer, services) should only import the engine
// through this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - STABLE: Changes inside the engine don't break adapters
// - TYPE-SAFE: All inputs/outputs have explicit TypeScript types
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Position,
  ZoneId,
  CellMark,
  PuzzleDefinition,
  BoardState,
  PlacementChecks,
  PlacementRule,
} from '../types/puzzle';
export {
  PLACEMENT_RULES,
  positionToString,
  positionsEqual,
  isDiagonallyAdjacent,
  allChecksPass,
} from '../types/puzzle';

export type {
  ValidationOutcome,
  CellUpdate,
  ActionOutcome,
  EngineEventType,
  CellChangedEvent,
  PuzzleSolvedEvent,
  BoardResetEvent,
  EngineEvent,
  EngineEventListener,
  RuleEngineOptions,
} from './types';
export { ValidationErrorCode, isValidOutcome, validOutcome, invalidOutcome } from './types';

// =============================================================================
// ENGINE
// =============================================================================

export { RuleEngine } from './RuleEngine';
export { createInitialBoardState, cloneBoardState } from './initialState';

// =============================================================================
// VALIDATION & MUTATION
// =============================================================================

export {
  queryPlacement,
  validateQueenPlacement,
  validateQueenRemoval,
  validateCrossToggle,
} from './validators/PlacementValidator';
export {
  applyQueenPlacement,
  applyQueenRemoval,
  applyCrossToggle,
} from './mutators/PlacementMutator';
export {
  isValidPosition,
  getDiagonalNeighbors,
  getOrthogonalNeighbors,
} from './validators/utils';

// =============================================================================
// BRUTE-FORCE CHECKS (debug mode, verification, tests)
// =============================================================================

export type { RuleName, RuleConflict } from './boardInvariants';
export {
  listQueens,
  findRuleConflicts,
  isValidSolution,
  isSolvedByScan,
  assertBoardInvariants,
} from './boardInvariants';

// =============================================================================
// ERRORS
// =============================================================================

export type { EngineErrorJSON, PuzzleDefinitionIssue } from './errors';
export {
  EngineErrorCode,
  ERROR_CATEGORY_DESCRIPTIONS,
  EngineError,
  BoardConstraintViolation,
  MalformedPuzzleDefinition,
  GenerationError,
  InvalidState,
  isEngineError,
  isBoardConstraintViolation,
  isMalformedPuzzleDefinition,
  isGenerationError,
  isInvalidState,
  wrapEngineError,
  invalidCoordinate,
} from './errors';
