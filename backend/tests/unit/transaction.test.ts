import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { withTransaction } from '../../src/database/transaction';
import { TransactionError } from '../../src/errors';
import { countRows, createTestPool, TestPool } from '../helpers/database';

const insertUser = `
  INSERT INTO users (id, name, email, password)
  VALUES ('5b0d3a4e-7f57-4bde-9a66-0d1d3e1f2a01', 'alice', 'alice@example.com', 'hashed-test-password')
`;

describe('withTransaction', () => {
  let pool: TestPool;

  beforeEach(() => {
    pool = createTestPool();
  });

  afterEach(async () => {
    await pool.end();
  });

  it('commits the work and returns its result', async () => {
    const result = await withTransaction(pool, 'Create user', async (client) => {
      await client.query(insertUser);
      return 'done';
    });

    expect(result).toBe('done');
    expect(await countRows(pool, 'users')).toBe(1);
  });

  it('rolls back every statement when a later one fails', async () => {
    const attempt = withTransaction(pool, 'Create user twice', async (client) => {
      await client.query(insertUser);
      throw new Error('second statement failed');
    });

    await expect(attempt).rejects.toBeInstanceOf(TransactionError);
    expect(await countRows(pool, 'users')).toBe(0);
  });

  it('wraps the failure with the label and keeps the cause', async () => {
    const cause = new Error('boom');

    const error = await withTransaction(pool, 'Expired link sweep', async () => {
      throw cause;
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransactionError);
    expect(error).toMatchObject({ message: 'Expired link sweep failed and was rolled back', cause });
  });

  it('rolls back and rethrows a connection lost mid-scope unchanged', async () => {
    const lost = Object.assign(new Error('Connection terminated unexpectedly'), { code: 'ECONNRESET' });

    const attempt = withTransaction(pool, 'Create user', async (client) => {
      await client.query(insertUser);
      throw lost;
    });

    await expect(attempt).rejects.toBe(lost);
    expect(await countRows(pool, 'users')).toBe(0);
  });

  it('propagates a connection failure unchanged', async () => {
    const unavailable = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
    pool.connect = async () => {
      throw unavailable;
    };
    const work = vi.fn();

    await expect(withTransaction(pool, 'Create user', work)).rejects.toBe(unavailable);
    expect(work).not.toHaveBeenCalled();
  });
});
