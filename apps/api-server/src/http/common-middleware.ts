import {
  IdentityVerificationError,
  logError,
  logInfo,
  logWarn,
  type ObservabilityContext,
} from '@activityhub/core-domain';
import type { SqlDatabase } from '@activityhub/db';
import type { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppEnv } from '../app';
import { errorResponseFor } from './error-responses';

interface RegisterCommonMiddlewareInput {
  app: Hono<AppEnv>;
  db: SqlDatabase;
  observabilityContext: ObservabilityContext;
  corsAllowedOrigins: readonly string[];
}

export const registerCommonMiddleware = (input: RegisterCommonMiddlewareInput): void => {
  const { app, db, observabilityContext, corsAllowedOrigins } = input;

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    const requestUrl = new URL(c.req.url);

    await next();
    const elapsedMs = Date.now() - startedAt;

    logInfo(observabilityContext, 'http_request', {
      method: c.req.method,
      path: requestUrl.pathname,
      status: c.res.status,
      elapsedMs,
    });
  });

  app.use(
    '/api/*',
    cors({
      origin: [...corsAllowedOrigins],
      allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'OPTIONS'],
      allowHeaders: ['Authorization', 'Content-Type'],
      credentials: true,
    }),
  );

  app.onError((error, c) => {
    const requestUrl = new URL(c.req.url);
    const response = errorResponseFor(error);

    if (error instanceof IdentityVerificationError) {
      logWarn(observabilityContext, 'identity_verification_failed', {
        method: c.req.method,
        path: requestUrl.pathname,
        reason: error.reason,
      });
    } else if (response.severity === 'unexpected') {
      logError(observabilityContext, 'api_error', {
        method: c.req.method,
        path: requestUrl.pathname,
        detail: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    return c.json(response.body, response.status);
  });

  app.notFound((c) => {
    return c.json(
      {
        error: 'Not found',
      },
      404,
    );
  });

  app.get('/', (c) => {
    return c.json({
      service: observabilityContext.service,
      status: 'ok',
    });
  });

  app.get('/healthz', async (c) => {
    let database: 'ok' | 'unavailable' = 'ok';

    try {
      await db.prepare('SELECT 1 AS ok').first<{ ok: number }>();
    } catch (error: unknown) {
      database = 'unavailable';
      logError(observabilityContext, 'healthz_database_check_failed', {
        detail: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    return c.json(
      {
        service: observabilityContext.service,
        status: database === 'ok' ? 'ok' : 'degraded',
        environment: observabilityContext.environment,
        database,
      },
      database === 'ok' ? 200 : 503,
    );
  });
};
