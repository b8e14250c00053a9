import {
  parseActivityListQuery,
  parseActivityPathParams,
  parseCreateActivityRequest,
  parseSetActivityEnabledRequest,
} from '@activityhub/validation';
import type { Hono, MiddlewareHandler } from 'hono';
import type { ActivityRegistry } from '../activities/activity-registry';
import type { AppEnv } from '../app';
import { readRequestFields } from '../http/request-fields';

interface RegisterActivityRoutesInput {
  app: Hono<AppEnv>;
  activityRegistry: ActivityRegistry;
  requireIdentity: MiddlewareHandler<AppEnv>;
}

export const registerActivityRoutes = (input: RegisterActivityRoutesInput): void => {
  const { app, activityRegistry, requireIdentity } = input;

  app.get('/api/activities', async (c) => {
    const query = parseActivityListQuery({
      enabledOnly: c.req.query('enabledOnly'),
    });
    const activities = await activityRegistry.listActivitySummaries({
      enabledOnly: query.enabledOnly ?? true,
    });

    return c.json({
      activities,
    });
  });

  app.post('/api/activities', requireIdentity, async (c) => {
    const request = parseCreateActivityRequest(await readRequestFields(c));
    const activity = await activityRegistry.createActivity(request, c.get('identity'));

    return c.json(
      {
        activity,
      },
      201,
    );
  });

  app.patch('/api/activities/:activityId', requireIdentity, async (c) => {
    const pathParams = parseActivityPathParams(c.req.param());
    const request = parseSetActivityEnabledRequest(await readRequestFields(c));
    const activity = await activityRegistry.setEnabled(
      pathParams.activityId,
      request.enabled,
      c.get('identity').email,
    );

    return c.json({
      activity,
    });
  });
};
