import { UnauthorizedError } from '@activityhub/core-domain';
import { parseActivityPathParams, parseGrantInstructorRequest } from '@activityhub/validation';
import type { Hono, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../app';
import type { AuthorizationService } from '../auth/authorization-service';
import { readRequestFields } from '../http/request-fields';

interface RegisterInstructorRoutesInput {
  app: Hono<AppEnv>;
  authorization: AuthorizationService;
  requireIdentity: MiddlewareHandler<AppEnv>;
}

export const registerInstructorRoutes = (input: RegisterInstructorRoutesInput): void => {
  const { app, authorization, requireIdentity } = input;

  app.get('/api/activities/:activityId/instructors', requireIdentity, async (c) => {
    const pathParams = parseActivityPathParams(c.req.param());
    const callerEmail = c.get('identity').email;

    if (!(await authorization.isInstructorFor(callerEmail, pathParams.activityId))) {
      throw new UnauthorizedError(
        `"${callerEmail}" is not an instructor of activity "${pathParams.activityId}"`,
        {
          activityId: pathParams.activityId,
          email: callerEmail,
        },
      );
    }

    return c.json({
      instructors: await authorization.instructorsFor(pathParams.activityId),
    });
  });

  app.post('/api/activities/:activityId/instructors', requireIdentity, async (c) => {
    const pathParams = parseActivityPathParams(c.req.param());
    const request = parseGrantInstructorRequest(await readRequestFields(c));
    const result = await authorization.grant(
      {
        email: request.email,
        name: request.name,
        activityId: pathParams.activityId,
      },
      c.get('identity').email,
    );

    return c.json(
      {
        grant: result.grant,
        created: result.created,
      },
      result.created ? 201 : 200,
    );
  });
};
