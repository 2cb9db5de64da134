import { AuthzError, StorageUnavailableError } from './errors.js';

export const DEFAULT_STORAGE_TIMEOUT_MS = 2_000;

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs a storage call under a timeout. Domain errors raised by the store pass
 * through; anything else becomes StorageUnavailableError.
 */
export async function guardStorage<T>(
  label: string,
  operation: () => Promise<T>,
  timeoutMs: number = DEFAULT_STORAGE_TIMEOUT_MS,
): Promise<T> {
  try {
    return await withTimeout(Promise.resolve().then(operation), timeoutMs, label);
  } catch (err) {
    if (err instanceof AuthzError) throw err;
    throw new StorageUnavailableError(label, err);
  }
}
