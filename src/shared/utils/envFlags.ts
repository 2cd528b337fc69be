// Shared helpers for reading environment flags. Hosts that bundle the engine
// for the browser are expected to shim process.env; without one every flag
// reads as unset.

type ProcessEnv = Record<string, string | undefined>;

export function getProcessEnv(): ProcessEnv {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return {};
}

export function readEnv(name: string): string | undefined {
  const value = getProcessEnv()[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * has been set to something else.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function parseFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

export function flagEnabled(name: string): boolean {
  return parseFlag(readEnv(name));
}
