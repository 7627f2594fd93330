import { Position, PuzzleDefinition, ZoneId, positionToString } from '../types/puzzle';
import { EngineErrorCode, GenerationError } from '../engine/errors';
import { SeededRNG, generateGameSeed } from '../utils/rng';
import { DEFAULT_MAX_ATTEMPTS, MAX_GENERATED_SIZE, defaultMaxRepairs } from './constants';
import { assertValidPuzzleDefinition } from './definition';
import { solvePuzzle } from './solver';
import { SolutionSearchOptions, generateSolution, isNonAttackingPlacement } from './solutionSearch';
import { buildSingletonZones, growZones, repairAlternative } from './zoneGrowth';

export interface GenerationOptions extends SolutionSearchOptions {
  /** Full regrowths tried before the singleton fallback. */
  maxAttempts?: number;
  /** Repairs tried on one grown layout before regrowing. */
  maxRepairs?: number;
}

export interface GenerationDiagnostics {
  /** Seed the RNG was built from; absent when the caller supplied an RNG. */
  seed?: number;
  attempts: number;
  repairs: number;
  usedFallback: boolean;
  /** Search nodes spent across every uniqueness check. */
  solverNodes: number;
}

export interface GeneratedPuzzle {
  definition: PuzzleDefinition;
  diagnostics: GenerationDiagnostics;
}

interface ZoneBuildResult {
  definition: PuzzleDefinition;
  attempts: number;
  repairs: number;
  usedFallback: boolean;
  solverNodes: number;
}

/**
 * Produce a complete puzzle of size n with exactly one solution.
 *
 * @example
 * const { definition, diagnostics } = generatePuzzle(8, { seed: 42 });
 * new RuleEngine(definition);
 */
export function generatePuzzle(n: number, options: GenerationOptions = {}): GeneratedPuzzle {
  const seed = options.rng ? undefined : options.seed ?? generateGameSeed();
  const rng = options.rng ?? new SeededRNG(seed ?? 0);

  const solution = generateSolution(n, { rng });
  const result = buildZones(n, solution, rng, options);

  return {
    definition: result.definition,
    diagnostics: {
      ...(seed !== undefined ? { seed } : {}),
      attempts: result.attempts,
      repairs: result.repairs,
      usedFallback: result.usedFallback,
      solverNodes: result.solverNodes,
    },
  };
}

/**
 * Partition the grid into n connected zones so that `solution` is the
 * puzzle's only solution. The returned definition carries the solution as
 * its canonical solution, sorted by row.
 */
export function generateZones(
  n: number,
  solution: ReadonlyArray<Position>,
  options: GenerationOptions = {}
): PuzzleDefinition {
  const rng = options.rng ?? new SeededRNG(options.seed ?? generateGameSeed());
  return buildZones(n, solution, rng, options).definition;
}

function buildZones(
  n: number,
  solution: ReadonlyArray<Position>,
  rng: SeededRNG,
  options: GenerationOptions
): ZoneBuildResult {
  if (!Number.isInteger(n) || n < 1 || n > MAX_GENERATED_SIZE) {
    throw new GenerationError(
      EngineErrorCode.GENERATOR_INVALID_SIZE,
      `Puzzle size must be an integer between 1 and ${MAX_GENERATED_SIZE}, got ${n}`,
      { size: n }
    );
  }
  if (!isNonAttackingPlacement(n, solution)) {
    throw new GenerationError(
      EngineErrorCode.GENERATOR_INVALID_SOLUTION,
      'Seed placement must hold one queen per row and column with no touching corners',
      { size: n, solution: solution.map(positionToString) }
    );
  }

  // Zone i is seeded at the queen of column i.
  const queens = [...solution].sort((a, b) => a.y - b.y).map((p) => ({ x: p.x, y: p.y }));
  const canonicalKeys = new Set(queens.map(positionToString));
  const maxAttempts = Math.max(0, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const maxRepairs = Math.max(0, options.maxRepairs ?? defaultMaxRepairs(n));

  let attempts = 0;
  let repairs = 0;
  let solverNodes = 0;

  const finish = (zoneOf: ZoneId[][], usedFallback: boolean): ZoneBuildResult => {
    const definition: PuzzleDefinition = {
      size: n,
      zoneOf,
      canonicalSolution: [...queens].sort((a, b) => a.x - b.x),
    };
    assertValidPuzzleDefinition(definition);

    const check = solvePuzzle(definition, { maxSolutions: 2 });
    solverNodes += check.nodesExplored;
    if (check.solutions.length !== 1) {
      throw new GenerationError(
        EngineErrorCode.GENERATOR_EXHAUSTED,
        `Zone layout for size ${n} admits ${check.solutions.length} solutions`,
        { size: n, attempts, repairs, usedFallback }
      );
    }
    return { definition, attempts, repairs, usedFallback, solverNodes };
  };

  while (attempts < maxAttempts) {
    attempts += 1;
    const zoneOf = growZones(n, queens, rng);

    for (let round = 0; ; round++) {
      const result = solvePuzzle({ size: n, zoneOf }, { maxSolutions: 2 });
      solverNodes += result.nodesExplored;
      const alternative = result.solutions.find(
        (candidate) => !candidate.every((p) => canonicalKeys.has(positionToString(p)))
      );
      if (!alternative) {
        return finish(zoneOf, false);
      }
      if (round >= maxRepairs || !repairAlternative(zoneOf, queens, alternative, rng)) {
        break;
      }
      repairs += 1;
    }
  }

  const fallback = buildSingletonZones(n, queens);
  if (fallback === null) {
    throw new GenerationError(
      EngineErrorCode.GENERATOR_EXHAUSTED,
      `Could not build a single-solution layout for size ${n}`,
      { size: n, attempts, repairs }
    );
  }
  return finish(fallback, true);
}
