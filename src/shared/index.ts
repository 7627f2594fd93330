// Library entry point: the rule engine, puzzle construction and the puzzle
// file format. Server-side pieces (config, logging, storage) are not part of
// it, so importing the library never reads the environment.

export * from './engine';
export * from './puzzle';
export {
  PUZZLE_FORMAT_VERSION,
  ZodPuzzleFileSchema,
  validatePuzzleFile,
  parsePuzzle,
  toPuzzleFile,
  serializePuzzle,
} from './validation/puzzleSchemas';
export type { PuzzleFile } from './validation/puzzleSchemas';
export { SeededRNG, generateGameSeed } from './utils/rng';
export * from './errors';
