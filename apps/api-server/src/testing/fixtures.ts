import type { ObservabilityContext } from '@activityhub/core-domain';
import { ensureSchema, type ClosableSqlDatabase } from '@activityhub/db';
import { createSqliteDatabase } from '@activityhub/db/sqlite';
import { encodeUnsignedIdentityToken } from '@activityhub/identity';

export const TEST_AUDIENCE = 'test-client-id';

export const testObservabilityContext: ObservabilityContext = {
  service: 'api-server',
  environment: 'test',
};

export interface TestClock {
  now: () => Date;
  advanceSeconds: (seconds: number) => void;
}

/**
 * Starts at 2026-02-10T15:00:00.000Z and only moves when advanced.
 */
export const createTestClock = (): TestClock => {
  let current = Date.parse('2026-02-10T15:00:00.000Z');

  return {
    now: () => new Date(current),
    advanceSeconds: (seconds) => {
      current += seconds * 1000;
    },
  };
};

export const createTestDatabase = async (): Promise<ClosableSqlDatabase> => {
  const db = createSqliteDatabase({ filename: ':memory:' });
  await ensureSchema(db);
  return db;
};

export const identityToken = (
  email: string,
  input: {
    clock: TestClock;
    name?: string | undefined;
  },
): string => {
  const nowEpochSeconds = Math.floor(input.clock.now().getTime() / 1000);

  return encodeUnsignedIdentityToken({
    iss: 'https://accounts.example.test',
    aud: TEST_AUDIENCE,
    exp: nowEpochSeconds + 3600,
    iat: nowEpochSeconds,
    email,
    email_verified: true,
    ...(input.name === undefined ? {} : { name: input.name }),
  });
};
