/**
 * PuzzleGenerator tests
 *
 * Every generated puzzle must partition the grid into N connected zones,
 * carry its canonical solution, and admit no other solution. Replaying the
 * canonical solution through a RuleEngine must solve it.
 */

import { generatePuzzle, generateZones } from '../../../src/shared/puzzle/PuzzleGenerator';
import { validatePuzzleDefinition } from '../../../src/shared/puzzle/definition';
import { solvePuzzle } from '../../../src/shared/puzzle/solver';
import { RuleEngine } from '../../../src/shared/engine/RuleEngine';
import { EngineErrorCode, GenerationError } from '../../../src/shared/engine/errors';
import { SeededRNG } from '../../../src/shared/utils/rng';
import { PuzzleDefinition } from '../../../src/shared/types/puzzle';
import { pos } from '../../utils/fixtures';

function expectUniquePuzzle(definition: PuzzleDefinition): void {
  expect(validatePuzzleDefinition(definition)).toEqual([]);
  const { solutions, exhaustive } = solvePuzzle(definition, { maxSolutions: 2 });
  expect(exhaustive).toBe(true);
  expect(solutions).toEqual([definition.canonicalSolution]);
}

describe('PuzzleGenerator', () => {
  describe('generatePuzzle', () => {
    it.each([1, 4, 5, 6, 7, 8, 9, 10])('builds a single-solution puzzle for n=%i', (n) => {
      const { definition, diagnostics } = generatePuzzle(n, { seed: 2024 + n });

      expect(definition.size).toBe(n);
      expectUniquePuzzle(definition);
      expect(diagnostics.seed).toBe(2024 + n);
      expect(diagnostics.attempts).toBeGreaterThanOrEqual(1);
      expect(diagnostics.solverNodes).toBeGreaterThan(0);
    });

    it('builds a 12×12 puzzle', () => {
      const { definition } = generatePuzzle(12, { seed: 12 });
      expectUniquePuzzle(definition);
    });

    it('keeps grown zones on large boards instead of falling back', () => {
      const runs: Array<{ n: number; seed: number; usedFallback: boolean }> = [];
      for (let n = 8; n <= 12; n++) {
        for (let seed = 0; seed < 5; seed++) {
          const { definition, diagnostics } = generatePuzzle(n, { seed });
          expectUniquePuzzle(definition);
          runs.push({ n, seed, usedFallback: diagnostics.usedFallback });
        }
      }

      expect(runs.filter((run) => run.usedFallback).length).toBeLessThanOrEqual(1);
    }, 60_000);

    it('stores the canonical solution sorted by row', () => {
      const { definition } = generatePuzzle(8, { seed: 99 });
      expect(definition.canonicalSolution?.map((p) => p.x)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('is reproducible from a seed', () => {
      const a = generatePuzzle(8, { seed: 77 });
      const b = generatePuzzle(8, { seed: 77 });
      expect(a.definition).toEqual(b.definition);
      expect(a.diagnostics).toEqual(b.diagnostics);
    });

    it('omits the seed from diagnostics when an RNG is supplied', () => {
      const { diagnostics } = generatePuzzle(6, { rng: new SeededRNG(4) });
      expect(diagnostics.seed).toBeUndefined();
      expect('seed' in diagnostics).toBe(false);
    });

    it('falls back to singleton zones when no regrowth is allowed', () => {
      const { definition, diagnostics } = generatePuzzle(7, { seed: 5, maxAttempts: 0 });

      expect(diagnostics).toMatchObject({ attempts: 0, repairs: 0, usedFallback: true });
      expectUniquePuzzle(definition);
      const zoneSizes = new Array<number>(7).fill(0);
      definition.zoneOf.forEach((row) => row.forEach((zone) => (zoneSizes[zone] += 1)));
      expect(zoneSizes.filter((count) => count === 1)).toHaveLength(6);
    });

    it('still produces a unique puzzle without repairs', () => {
      const { definition } = generatePuzzle(8, { seed: 31, maxRepairs: 0, maxAttempts: 3 });
      expectUniquePuzzle(definition);
    });

    it('yields puzzles a RuleEngine session can solve', () => {
      const { definition } = generatePuzzle(9, { seed: 9 });
      const engine = new RuleEngine(definition);

      const outcomes = (definition.canonicalSolution ?? []).map((q) => engine.placeQueen(q.x, q.y));

      expect(outcomes).toHaveLength(9);
      outcomes.forEach((o) => expect(o.valid).toBe(true));
      expect(engine.isSolved()).toBe(true);
    });

    it.each([2, 3])('reports n=%i as unsatisfiable', (n) => {
      expect(() => generatePuzzle(n, { seed: 1 })).toThrow(
        `No queen placement exists for a ${n}x${n} board`
      );
    });

    it('rejects sizes above the generator limit', () => {
      expect(() => generatePuzzle(13, { seed: 1 })).toThrow(GenerationError);
    });
  });

  describe('generateZones', () => {
    const solution = [pos(0, 1), pos(1, 3), pos(2, 0), pos(3, 2)];

    it('grows zones around a given placement', () => {
      const definition = generateZones(4, solution, { seed: 3 });

      expectUniquePuzzle(definition);
      expect(definition.canonicalSolution).toEqual(solution);
    });

    it('accepts the placement in any order', () => {
      const shuffled = [solution[2], solution[0], solution[3], solution[1]];
      const definition = generateZones(4, shuffled, { seed: 3 });
      expect(definition.canonicalSolution).toEqual(solution);
    });

    it('rejects a placement that breaks the rules', () => {
      const touching = [pos(0, 0), pos(1, 1), pos(2, 3), pos(3, 2)];
      try {
        generateZones(4, touching, { seed: 1 });
        throw new Error('expected GenerationError');
      } catch (err) {
        expect(err).toBeInstanceOf(GenerationError);
        expect(err).toMatchObject({
          code: EngineErrorCode.GENERATOR_INVALID_SOLUTION,
          message: 'Seed placement must hold one queen per row and column with no touching corners',
        });
      }
    });

    it('rejects a size the placement does not fit', () => {
      expect(() => generateZones(0, [], { seed: 1 })).toThrow(
        'Puzzle size must be an integer between 1 and 12, got 0'
      );
    });
  });
});
