import { UnauthorizedError } from '@activityhub/core-domain';
import {
  parseEmailPathParams,
  parseSetScoreRequest,
  parseSubmissionPathParams,
  parseSubmitRequest,
} from '@activityhub/validation';
import type { Hono, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../app';
import { readRequestFields } from '../http/request-fields';
import type { SubmissionLedger } from '../submissions/submission-ledger';

interface RegisterSubmissionRoutesInput {
  app: Hono<AppEnv>;
  submissionLedger: SubmissionLedger;
  requireIdentity: MiddlewareHandler<AppEnv>;
}

export const registerSubmissionRoutes = (input: RegisterSubmissionRoutesInput): void => {
  const { app, submissionLedger, requireIdentity } = input;

  app.post('/api/submissions', requireIdentity, async (c) => {
    const request = parseSubmitRequest(await readRequestFields(c));
    const result = await submissionLedger.submit({
      ...request,
      email: c.get('identity').email,
    });

    return c.json({
      submission: result.submission,
      created: result.created,
      tokenWrites: result.tokenWrites,
    });
  });

  app.put('/api/activities/:activityId/submissions/:userId/score', requireIdentity, async (c) => {
    const pathParams = parseSubmissionPathParams(c.req.param());
    const request = parseSetScoreRequest(await readRequestFields(c));
    const submission = await submissionLedger.setScore(
      {
        activityId: pathParams.activityId,
        userId: pathParams.userId,
        score: request.score,
      },
      c.get('identity').email,
    );

    return c.json({
      submission,
    });
  });

  app.get('/api/activities/:activityId/submissions/:userId', requireIdentity, async (c) => {
    const pathParams = parseSubmissionPathParams(c.req.param());
    const submission = await submissionLedger.getSubmissionForInstructor(
      pathParams.activityId,
      pathParams.userId,
      c.get('identity').email,
    );

    return c.json({
      submission,
    });
  });

  app.get('/api/submissions/by-email/:email', requireIdentity, async (c) => {
    const pathParams = parseEmailPathParams(c.req.param());
    const callerEmail = c.get('identity').email;

    if (pathParams.email !== callerEmail) {
      throw new UnauthorizedError('Submissions can only be listed for your own email', {
        email: pathParams.email,
      });
    }

    return c.json({
      submissions: await submissionLedger.listByEmail(pathParams.email),
    });
  });
};
