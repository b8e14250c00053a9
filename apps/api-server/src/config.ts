import type { ObservabilityContext } from '@activityhub/core-domain';
import type { ClosableSqlDatabase } from '@activityhub/db';
import { createPostgresDatabase, isPostgresUrl } from '@activityhub/db/postgres';
import { createSqliteDatabase, sqliteFilenameFromUrl } from '@activityhub/db/sqlite';
import {
  createTokenInfoIdentityVerifier,
  createUnsignedTokenIdentityVerifier,
  type IdentityVerifier,
} from '@activityhub/identity';
import { parseAppConfig, type AppConfig } from '@activityhub/validation';

export const loadAppConfig = (env: Readonly<Record<string, string | undefined>>): AppConfig => {
  return parseAppConfig(env);
};

export const createDatabaseFromUrl = (
  databaseUrl: string,
  observabilityContext: ObservabilityContext,
): ClosableSqlDatabase => {
  if (isPostgresUrl(databaseUrl)) {
    return createPostgresDatabase({
      databaseUrl,
      observabilityContext,
    });
  }

  const sqliteFilename = sqliteFilenameFromUrl(databaseUrl);

  if (sqliteFilename !== null) {
    return createSqliteDatabase({
      filename: sqliteFilename,
    });
  }

  throw new Error('DATABASE_URL must start with postgres://, postgresql:// or sqlite:');
};

export const createIdentityVerifierFromConfig = (
  identity: AppConfig['identity'],
): IdentityVerifier => {
  if (identity.allowUnsignedTokens) {
    return createUnsignedTokenIdentityVerifier({
      audience: identity.audience,
    });
  }

  return createTokenInfoIdentityVerifier({
    audience: identity.audience,
    endpoint: identity.tokenInfoUrl,
  });
};
