import type { Hono, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../app';
import type { DashboardQueryService } from '../dashboard/dashboard-query';

interface RegisterDashboardRoutesInput {
  app: Hono<AppEnv>;
  dashboardQuery: DashboardQueryService;
  requireIdentity: MiddlewareHandler<AppEnv>;
}

export const registerDashboardRoutes = (input: RegisterDashboardRoutesInput): void => {
  const { app, dashboardQuery, requireIdentity } = input;

  app.get('/api/dashboard', requireIdentity, async (c) => {
    const identity = c.get('identity');
    const view = await dashboardQuery.activitiesAndSubmissionsFor(identity.email);

    return c.json({
      instructor: identity,
      activities: view.activities,
    });
  });
};
