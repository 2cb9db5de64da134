import { describe, it, expect } from 'vitest';
import { StorageUnavailableError, UnknownPositionError } from '../errors.js';
import { guardStorage } from '../storage-guard.js';

describe('guardStorage', () => {
  it('should pass results through', async () => {
    await expect(guardStorage('positions.list', async () => [1, 2])).resolves.toEqual([1, 2]);
  });

  it('should wrap driver errors as StorageUnavailable', async () => {
    const err = await guardStorage('positions.list', async () => {
      throw new Error('SQLITE_BUSY');
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageUnavailableError);
    expect((err as StorageUnavailableError).operation).toBe('positions.list');
    expect((err as StorageUnavailableError).message).toBe('Storage unavailable during positions.list: SQLITE_BUSY');
    expect((err as StorageUnavailableError).statusCode).toBe(503);
  });

  it('should wrap synchronous throws too', async () => {
    await expect(
      guardStorage('users.exists', () => {
        throw new Error('closed');
      }),
    ).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('should let domain errors through unchanged', async () => {
    await expect(
      guardStorage('positions.findById', async () => {
        throw new UnknownPositionError('pos-1');
      }),
    ).rejects.toBeInstanceOf(UnknownPositionError);
  });

  it('should time out slow storage', async () => {
    const err = await guardStorage('positions.list', () => new Promise<never>(() => undefined), 20).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(StorageUnavailableError);
    expect((err as StorageUnavailableError).message).toBe(
      'Storage unavailable during positions.list: positions.list timed out after 20ms',
    );
  });
});
