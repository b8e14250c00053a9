import {
  DEFAULT_SCORE_RANGE,
  type ObservabilityContext,
  type ScoreRange,
  type VerifiedIdentity,
} from '@activityhub/core-domain';
import type { SqlDatabase } from '@activityhub/db';
import type { IdentityVerifier } from '@activityhub/identity';
import { Hono, type Context } from 'hono';
import { createActivityRegistry } from './activities/activity-registry';
import { createAuthorizationService } from './auth/authorization-service';
import { createIdentityAccessHelpers } from './auth/identity-access';
import { createDashboardQueryService } from './dashboard/dashboard-query';
import { registerCommonMiddleware } from './http/common-middleware';
import { registerActivityRoutes } from './routes/activity-routes';
import { registerDashboardRoutes } from './routes/dashboard-routes';
import { registerInstructorRoutes } from './routes/instructor-routes';
import { registerSubmissionRoutes } from './routes/submission-routes';
import { createSubmissionLedger } from './submissions/submission-ledger';

export interface AppVariables {
  identity: VerifiedIdentity;
}

export interface AppEnv {
  Variables: AppVariables;
}

export type AppContext = Context<AppEnv>;

export const API_SERVICE_NAME = 'api-server';

const DEFAULT_CORS_ALLOWED_ORIGINS = ['http://localhost:3000', 'http://localhost:8080'];

export interface AppDependencies {
  db: SqlDatabase;
  identityVerifier: IdentityVerifier;
  appEnv: string;
  openGrantBootstrap?: boolean | undefined;
  scoreRange?: ScoreRange | undefined;
  corsAllowedOrigins?: readonly string[] | undefined;
  now?: (() => Date) | undefined;
}

export const createApp = (dependencies: AppDependencies): Hono<AppEnv> => {
  const { db, identityVerifier, now } = dependencies;
  const app = new Hono<AppEnv>();
  const observabilityContext: ObservabilityContext = {
    service: API_SERVICE_NAME,
    environment: dependencies.appEnv,
  };

  const authorization = createAuthorizationService({
    db,
    observabilityContext,
    openGrantBootstrap: dependencies.openGrantBootstrap ?? false,
    now,
  });
  const activityRegistry = createActivityRegistry({
    db,
    observabilityContext,
    now,
  });
  const submissionLedger = createSubmissionLedger({
    db,
    observabilityContext,
    scoreRange: dependencies.scoreRange ?? DEFAULT_SCORE_RANGE,
    now,
  });
  const dashboardQuery = createDashboardQueryService({
    db,
    authorization,
  });
  const { requireIdentity } = createIdentityAccessHelpers({ identityVerifier });

  registerCommonMiddleware({
    app,
    db,
    observabilityContext,
    corsAllowedOrigins: dependencies.corsAllowedOrigins ?? DEFAULT_CORS_ALLOWED_ORIGINS,
  });
  registerActivityRoutes({
    app,
    activityRegistry,
    requireIdentity,
  });
  registerInstructorRoutes({
    app,
    authorization,
    requireIdentity,
  });
  registerSubmissionRoutes({
    app,
    submissionLedger,
    requireIdentity,
  });
  registerDashboardRoutes({
    app,
    dashboardQuery,
    requireIdentity,
  });

  return app;
};
