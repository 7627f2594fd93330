// Shared helpers for reading environment flags. The core engine stays free
// of the server config module, so debug switches it honours are read here
// directly from process.env when one exists.

// Type-safe process.env access that works in both Node and browser contexts
type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * When enabled, the RuleEngine re-scans the whole board after every
 * mutation and throws if the incremental counters drifted.
 */
export function isInvariantDebugEnabled(): boolean {
  return flagEnabled('QUEENS_DEBUG_INVARIANTS');
}
