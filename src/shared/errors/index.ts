/**
 * Shared Errors Module
 *
 * Structured error types for everything outside the rule engine.
 *
 * @module errors
 */

export {
  // Error codes
  PuzzleErrorCode,
  ERROR_EXIT_CODE,
  // Base class
  PuzzleError,
  type PuzzleErrorJSON,
  // Specific errors
  PuzzleNotFoundError,
  InvalidPuzzleIdError,
  PuzzleStorageError,
  ConfigurationError,
  type ConfigurationIssue,
  // Utilities
  isPuzzleError,
  getExitCode,
  wrapError,
} from './PuzzleDomainErrors';
