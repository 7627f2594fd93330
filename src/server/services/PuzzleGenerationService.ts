import { PuzzleDefinition, positionsEqual } from '../../shared/types/puzzle';
import { PuzzleDefinitionIssue, wrapEngineError } from '../../shared/engine/errors';
import { GenerationDiagnostics, generatePuzzle } from '../../shared/puzzle/PuzzleGenerator';
import { validatePuzzleDefinition } from '../../shared/puzzle/definition';
import { solvePuzzle } from '../../shared/puzzle/solver';
import { generateGameSeed } from '../../shared/utils/rng';
import { config } from '../config';
import { InvalidPuzzleIdError } from '../../shared/errors';
import { logger } from '../utils/logger';
import { PuzzleStore, isValidPuzzleId } from '../storage/PuzzleStore';

/**
 * Generator limits, normally taken from the `generator` config section.
 */
export interface GeneratorSettings {
  maxAttempts: number;
  maxRepairs?: number;
  seed?: number;
}

export interface GenerateRequest {
  size?: number;
  seed?: number;
  /** Store the puzzle under this id; derived from size and seed when absent. */
  id?: string;
}

export interface GeneratedPuzzleRecord {
  id: string;
  file: string;
  definition: PuzzleDefinition;
  diagnostics: GenerationDiagnostics;
}

export interface VerificationReport {
  valid: boolean;
  issues: PuzzleDefinitionIssue[];
  /** Solutions found, counting no further than 2. */
  solutionCount: number;
  unique: boolean;
  /** Whether the stored solution is the one the solver found; null when none is stored. */
  matchesStoredSolution: boolean | null;
}

/**
 * Generates, stores and verifies puzzles.
 *
 * Applies the configured defaults and limits, and logs generator
 * diagnostics so that slow sizes or frequent fallbacks show up in the logs.
 */
export class PuzzleGenerationService {
  constructor(
    private readonly store: PuzzleStore,
    private readonly settings: GeneratorSettings = config.generator,
    private readonly defaultSize: number = config.puzzles.defaultSize
  ) {}

  async generate(request: GenerateRequest = {}): Promise<GeneratedPuzzleRecord> {
    const size = request.size ?? this.defaultSize;
    const seed = request.seed ?? this.settings.seed ?? generateGameSeed();
    const id = request.id ?? `queens-${size}-${seed}`;
    if (!isValidPuzzleId(id)) {
      throw new InvalidPuzzleIdError(id);
    }

    const startTime = Date.now();
    let result: ReturnType<typeof generatePuzzle>;
    try {
      result = generatePuzzle(size, {
        seed,
        maxAttempts: this.settings.maxAttempts,
        ...(this.settings.maxRepairs !== undefined ? { maxRepairs: this.settings.maxRepairs } : {}),
      });
    } catch (err) {
      const error = wrapEngineError(err, 'PuzzleGenerationService', { size, seed });
      logger.error('Puzzle generation failed', { size, seed, code: error.code, error });
      throw error;
    }

    const durationMs = Date.now() - startTime;
    logger.info('Puzzle generated', {
      puzzleId: id,
      size,
      durationMs,
      ...result.diagnostics,
    });
    if (result.diagnostics.usedFallback) {
      logger.warn('Generator fell back to singleton zones', {
        puzzleId: id,
        size,
        seed,
        attempts: result.diagnostics.attempts,
      });
    }

    const file = await this.store.save(id, result.definition);
    return { id, file, definition: result.definition, diagnostics: result.diagnostics };
  }

  /**
   * Check a definition's invariants and whether it has exactly one solution.
   */
  verify(definition: PuzzleDefinition): VerificationReport {
    const issues = validatePuzzleDefinition(definition);
    if (issues.length > 0) {
      logger.warn('Puzzle failed validation', { issues });
      return {
        valid: false,
        issues,
        solutionCount: 0,
        unique: false,
        matchesStoredSolution: null,
      };
    }

    const { solutions, nodesExplored } = solvePuzzle(definition, { maxSolutions: 2 });
    const stored = definition.canonicalSolution;
    let matchesStoredSolution: boolean | null = null;
    if (stored) {
      const found = solutions[0];
      matchesStoredSolution =
        solutions.length === 1 && stored.every((q) => found.some((p) => positionsEqual(p, q)));
    }

    logger.debug('Puzzle verified', {
      size: definition.size,
      solutionCount: solutions.length,
      nodesExplored,
    });

    return {
      valid: true,
      issues: [],
      solutionCount: solutions.length,
      unique: solutions.length === 1,
      matchesStoredSolution,
    };
  }
}
