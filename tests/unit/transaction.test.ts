import { describe, it, expect, vi } from 'vitest';
import { withTransaction } from '../../src/db/transaction.js';
import { createMockPool, queryTexts } from '../fixtures/pg-test.js';

describe('withTransaction', () => {
  it('commits and returns the callback result', async () => {
    const pool = createMockPool();
    const result = await withTransaction(pool, async (client) => {
      await client.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(queryTexts(pool)).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(pool._mockClient.release).toHaveBeenCalledWith(undefined);
  });

  it('rolls back and rethrows the callback error', async () => {
    const pool = createMockPool();
    const failure = new Error('insert failed');
    pool._failOn('INSERT', failure);

    await expect(
      withTransaction(pool, async (client) => {
        await client.query('INSERT INTO t VALUES (1)');
      }),
    ).rejects.toBe(failure);
    expect(queryTexts(pool)).toEqual(['BEGIN', 'INSERT INTO t VALUES (1)', 'ROLLBACK']);
    expect(pool._mockClient.release).toHaveBeenCalledWith(undefined);
  });

  it('keeps the original error when ROLLBACK fails too', async () => {
    const pool = createMockPool();
    const failure = new Error('insert failed');
    const rollbackFailure = new Error('connection terminated');
    pool._failOn('INSERT', failure);
    pool._failOn('ROLLBACK', rollbackFailure);
    const log = vi.fn();

    await expect(
      withTransaction(
        pool,
        async (client) => {
          await client.query('INSERT INTO t VALUES (1)');
        },
        log,
      ),
    ).rejects.toBe(failure);

    expect(log).toHaveBeenCalledWith('error', {
      event: 'transaction_rollback_failed',
      error: 'connection terminated',
      cause: 'insert failed',
    });
    expect(pool._mockClient.release).toHaveBeenCalledWith(rollbackFailure);
  });

  it('rethrows the original error without a log sink', async () => {
    const pool = createMockPool();
    const failure = new Error('commit failed');
    pool._failOn('COMMIT', failure);
    pool._failOn('ROLLBACK', new Error('connection terminated'));

    await expect(withTransaction(pool, async () => 'never')).rejects.toBe(failure);
    expect(pool._mockClient.release).toHaveBeenCalledTimes(1);
  });
});
