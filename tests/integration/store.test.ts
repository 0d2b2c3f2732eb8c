import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestStore } from '../helpers/store';
import { Store } from '../../src/connections/db/store';

describe('store transactions', () => {
  let store: Store;

  beforeEach(async () => {
    store = await createTestStore();
  });

  afterEach(async () => {
    await store.close();
  });

  const manufacturerNames = async (): Promise<string[]> => {
    const result = await store.query<{ name: string }>('SELECT name FROM manufacturers ORDER BY name');
    return result.rows.map((row) => row.name);
  };

  it('commits every statement of the unit and returns its result', async () => {
    const result = await store.transaction(async (db) => {
      await db.query('INSERT INTO manufacturers (name) VALUES ($1)', ['Audi']);
      await db.query('INSERT INTO manufacturers (name) VALUES ($1)', ['BMW']);
      return 'done';
    });

    expect(result).toBe('done');
    expect(await manufacturerNames()).toEqual(['Audi', 'BMW']);
  });

  it('rolls the unit back and rethrows the original error', async () => {
    const failure = new Error('stop here');

    await expect(
      store.transaction(async (db) => {
        await db.query('INSERT INTO manufacturers (name) VALUES ($1)', ['Audi']);
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(await manufacturerNames()).toEqual([]);
  });

  it('rolls back when a statement violates a constraint', async () => {
    await store.query('INSERT INTO manufacturers (name) VALUES ($1)', ['Kia']);

    await expect(
      store.transaction(async (db) => {
        await db.query('INSERT INTO manufacturers (name) VALUES ($1)', ['Nissan']);
        await db.query('INSERT INTO manufacturers (name) VALUES ($1)', ['Kia']);
      })
    ).rejects.toMatchObject({ code: '23505' });

    expect(await manufacturerNames()).toEqual(['Kia']);
  });

  it('keeps working after a failed unit', async () => {
    await expect(
      store.transaction(async () => {
        throw new Error('first unit fails');
      })
    ).rejects.toThrow('first unit fails');

    await store.transaction(async (db) => {
      await db.query('INSERT INTO manufacturers (name) VALUES ($1)', ['Ford']);
    });

    expect(await manufacturerNames()).toEqual(['Ford']);
  });
});
