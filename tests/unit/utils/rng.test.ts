import { SeededRNG, generateGameSeed } from '../../../src/shared/utils/rng';

describe('SeededRNG', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new SeededRNG(12345);
    const b = new SeededRNG(12345);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('diverges for different seeds', () => {
    const a = new SeededRNG(1);
    const b = new SeededRNG(2);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).not.toEqual(seqB);
  });

  it('produces floats in [0, 1)', () => {
    const rng = new SeededRNG(0);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('nextInt stays within bounds and reaches every value', () => {
    const rng = new SeededRNG(99);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const value = rng.nextInt(6);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(6);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('shuffle returns a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5, 6, 7, 8];
    const shuffled = new SeededRNG(7).shuffle(input);

    expect(input).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(input);
    expect(new SeededRNG(7).shuffle(input)).toEqual(shuffled);
  });

  it('treats seeds modulo 2^32', () => {
    expect(new SeededRNG(2 ** 32 + 5).next()).toBe(new SeededRNG(5).next());
  });
});

describe('generateGameSeed', () => {
  it('returns an unsigned 32-bit integer', () => {
    for (let i = 0; i < 20; i++) {
      const seed = generateGameSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThan(2 ** 32);
    }
  });
});
