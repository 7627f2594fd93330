/** Largest grid a puzzle definition may describe. */
export const MAX_PUZZLE_SIZE = 32;

/**
 * Largest grid the generator will attempt. Uniqueness verification is an
 * exhaustive search, which stays fast for the sizes people actually play.
 */
export const MAX_GENERATED_SIZE = 12;

/** Regrowth attempts before falling back to the singleton-zone layout. */
export const DEFAULT_MAX_ATTEMPTS = 20;

/** Repairs per attempt when the caller does not choose: 4·N². */
export function defaultMaxRepairs(size: number): number {
  return 4 * size * size;
}
