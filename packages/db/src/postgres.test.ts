import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const fakePg = vi.hoisted(() => {
  type PoolErrorListener = (error: Error) => void;

  class FakePoolClient {
    public readonly statements: string[] = [];

    public readonly failingStatements = new Set<string>();

    public readonly release = vi.fn();

    public readonly query = vi.fn(async (text: string) => {
      this.statements.push(text);

      if (this.failingStatements.has(text)) {
        throw new Error(`${text} failed`);
      }

      return { rows: [{ ok: 1 }], rowCount: 1 };
    });
  }

  class FakePool {
    public static readonly instances: FakePool[] = [];

    public readonly client = new FakePoolClient();

    public readonly errorListeners: PoolErrorListener[] = [];

    public constructor(public readonly options: unknown) {
      FakePool.instances.push(this);
    }

    public on(event: string, listener: PoolErrorListener): this {
      if (event === 'error') {
        this.errorListeners.push(listener);
      }

      return this;
    }

    public async connect(): Promise<FakePoolClient> {
      return this.client;
    }

    public async query(): Promise<{ rows: unknown[]; rowCount: number }> {
      return { rows: [], rowCount: 0 };
    }

    public async end(): Promise<void> {
      return undefined;
    }
  }

  return { FakePool };
});

vi.mock('pg', () => {
  return {
    default: {
      Pool: fakePg.FakePool,
    },
  };
});

import { createPostgresDatabase } from './postgres';

const observabilityContext = {
  service: 'api-server',
  environment: 'test',
};

const latestPool = (): InstanceType<typeof fakePg.FakePool> => {
  const pool = fakePg.FakePool.instances.at(-1);

  if (pool === undefined) {
    throw new Error('expected a pool to be created');
  }

  return pool;
};

describe('createPostgresDatabase', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs idle client errors instead of letting them escape', () => {
    createPostgresDatabase({ databaseUrl: 'postgres://db.example.test/activities', observabilityContext });
    const pool = latestPool();

    expect(pool.errorListeners).toHaveLength(1);
    pool.errorListeners[0]?.(new Error('terminating connection due to administrator command'));

    const payload: unknown = JSON.parse(String(vi.mocked(console.error).mock.calls[0]?.[0]));
    expect(payload).toMatchObject({
      level: 'error',
      event: 'database_pool_error',
      detail: 'terminating connection due to administrator command',
    });
  });

  it('commits on one client with rewritten placeholders and releases it', async () => {
    const db = createPostgresDatabase({
      databaseUrl: 'postgres://db.example.test/activities',
      observabilityContext,
    });
    const pool = latestPool();

    const row = await db.transaction(
      (tx) => tx.prepare('SELECT ? AS ok').bind(1).first<{ ok: number }>(),
      { readOnly: true },
    );

    expect(row).toEqual({ ok: 1 });
    expect(pool.client.statements).toEqual([
      'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY',
      'SELECT $1 AS ok',
      'COMMIT',
    ]);
    expect(pool.client.release).toHaveBeenCalledWith(undefined);
  });

  it('rolls back and rethrows the original error', async () => {
    const db = createPostgresDatabase({
      databaseUrl: 'postgres://db.example.test/activities',
      observabilityContext,
    });
    const pool = latestPool();

    await expect(
      db.transaction(async () => {
        throw new Error('insert failed');
      }),
    ).rejects.toThrow('insert failed');

    expect(pool.client.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(pool.client.release).toHaveBeenCalledWith(undefined);
  });

  it('keeps the original error and discards the client when ROLLBACK fails', async () => {
    const db = createPostgresDatabase({
      databaseUrl: 'postgres://db.example.test/activities',
      observabilityContext,
    });
    const pool = latestPool();
    pool.client.failingStatements.add('ROLLBACK');

    await expect(
      db.transaction(async () => {
        throw new Error('insert failed');
      }),
    ).rejects.toThrow('insert failed');

    expect(pool.client.release).toHaveBeenCalledTimes(1);
    const releaseArgument: unknown = pool.client.release.mock.calls[0]?.[0];
    expect(releaseArgument).toBeInstanceOf(Error);
    expect(releaseArgument).toMatchObject({ message: 'ROLLBACK failed' });
    const payload: unknown = JSON.parse(String(vi.mocked(console.error).mock.calls[0]?.[0]));
    expect(payload).toMatchObject({
      event: 'database_rollback_failed',
      detail: 'ROLLBACK failed',
    });
  });
});
