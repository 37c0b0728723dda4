// Shared helpers for reading environment flags. Keeping this logic
// centralised means config, logging and tests agree on what counts as
// "enabled" and on when the code is running under Jest.

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

export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * is configured differently.
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
 * Forces debug-level logging regardless of LOG_LEVEL.
 * Set PUZZLE_DEBUG=1 to enable.
 */
export function isPuzzleDebugEnabled(): boolean {
  return flagEnabled('PUZZLE_DEBUG');
}
