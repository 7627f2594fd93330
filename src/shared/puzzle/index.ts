// Puzzle construction: definitions, generation and solving.

export {
  MAX_PUZZLE_SIZE,
  MAX_GENERATED_SIZE,
  DEFAULT_MAX_ATTEMPTS,
  defaultMaxRepairs,
} from './constants';
export {
  createPuzzleDefinition,
  validatePuzzleDefinition,
  assertValidPuzzleDefinition,
  getZoneCells,
  isZoneConnected,
} from './definition';
export type { SolveOptions, SolveResult } from './solver';
export { solvePuzzle, countSolutions, hasUniqueSolution } from './solver';
export type { SolutionSearchOptions } from './solutionSearch';
export { generateSolution, isNonAttackingPlacement } from './solutionSearch';
export { growZones, repairAlternative, buildSingletonZones } from './zoneGrowth';
export type { GenerationOptions, GenerationDiagnostics, GeneratedPuzzle } from './PuzzleGenerator';
export { generatePuzzle, generateZones } from './PuzzleGenerator';
