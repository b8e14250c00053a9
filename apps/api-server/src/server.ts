import 'dotenv/config';

import { logError, logInfo, logWarn, type ObservabilityContext } from '@activityhub/core-domain';
import { ensureSchema } from '@activityhub/db';
import { serve } from '@hono/node-server';
import { API_SERVICE_NAME, createApp } from './app';
import { createDatabaseFromUrl, createIdentityVerifierFromConfig, loadAppConfig } from './config';

const main = async (): Promise<void> => {
  const config = loadAppConfig(process.env);
  const observabilityContext: ObservabilityContext = {
    service: API_SERVICE_NAME,
    environment: config.appEnv,
  };
  const db = createDatabaseFromUrl(config.databaseUrl, observabilityContext);
  await ensureSchema(db);

  if (config.identity.allowUnsignedTokens) {
    logWarn(observabilityContext, 'identity_unsigned_tokens_enabled');
  }

  const app = createApp({
    db,
    identityVerifier: createIdentityVerifierFromConfig(config.identity),
    appEnv: config.appEnv,
    openGrantBootstrap: config.openGrantBootstrap,
    scoreRange: config.scoreRange,
    corsAllowedOrigins: config.corsAllowedOrigins,
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
    },
    (info) => {
      logInfo(observabilityContext, 'server_started', {
        port: info.port,
        openGrantBootstrap: config.openGrantBootstrap,
      });
    },
  );

  const shutdown = (signal: string): void => {
    logInfo(observabilityContext, 'server_stopping', { signal });
    server.close(() => {
      db.close().then(
        () => {
          logInfo(observabilityContext, 'server_stopped', { signal });
        },
        (error: unknown) => {
          logError(observabilityContext, 'database_close_failed', {
            detail: error instanceof Error ? error.message : 'Unknown error',
          });
          process.exitCode = 1;
        },
      );
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
};

main().catch((error: unknown) => {
  logError(
    {
      service: API_SERVICE_NAME,
      environment: process.env.APP_ENV ?? 'development',
    },
    'server_start_failed',
    {
      detail: error instanceof Error ? error.message : 'Unknown error',
    },
  );
  process.exitCode = 1;
});
