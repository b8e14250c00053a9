import {
  insertActivity,
  insertInstructorGrant,
  updateSubmissionScore,
  upsertSubmission,
  type ClosableSqlDatabase,
} from '@activityhub/db';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createAuthorizationService } from '../auth/authorization-service';
import { createTestDatabase, testObservabilityContext } from '../testing/fixtures';
import { createDashboardQueryService, type DashboardQueryService } from './dashboard-query';

const NOW_ISO = '2026-02-10T15:00:00.000Z';

describe('dashboard query', () => {
  let db: ClosableSqlDatabase;

  const createService = (): DashboardQueryService => {
    return createDashboardQueryService({
      db,
      authorization: createAuthorizationService({
        db,
        observabilityContext: testObservabilityContext,
        openGrantBootstrap: false,
      }),
    });
  };

  beforeEach(async () => {
    db = await createTestDatabase();

    for (const activityId of ['rust101', 'python101', 'go101']) {
      await insertActivity(db, { activityId, name: activityId, enabled: true, nowIso: NOW_ISO });
    }

    await insertInstructorGrant(db, {
      email: 'prof@example.edu',
      name: 'Prof',
      activityId: 'python101',
      nowIso: NOW_ISO,
    });
    await insertInstructorGrant(db, { email: 'ta@example.edu', activityId: 'python101', nowIso: NOW_ISO });
    await insertInstructorGrant(db, { email: 'prof@example.edu', activityId: 'rust101', nowIso: NOW_ISO });
    await insertInstructorGrant(db, { email: 'other@example.edu', activityId: 'go101', nowIso: NOW_ISO });

    for (const userId of ['s2', 's1']) {
      await upsertSubmission(db, {
        userId,
        activityId: 'python101',
        name: userId,
        email: `${userId}@example.edu`,
        notebookRef: `uploads/${userId}.ipynb`,
        nowIso: NOW_ISO,
      });
    }

    await upsertSubmission(db, {
      userId: 's3',
      activityId: 'go101',
      name: 's3',
      email: 's3@example.edu',
      notebookRef: 'uploads/s3.ipynb',
      nowIso: NOW_ISO,
    });
    await updateSubmissionScore(db, {
      userId: 's1',
      activityId: 'python101',
      score: 95.5,
      gradedBy: 'prof@example.edu',
      nowIso: NOW_ISO,
    });
  });

  afterEach(async () => {
    await db.close();
  });

  it('returns only the activities the caller is authorized for, ordered by id', async () => {
    const view = await createService().activitiesAndSubmissionsFor('Prof@Example.edu');

    expect(view.email).toBe('prof@example.edu');
    expect(view.activities.map((entry) => entry.activity.activityId)).toEqual(['python101', 'rust101']);
  });

  it('includes instructors and submissions of each activity', async () => {
    const view = await createService().activitiesAndSubmissionsFor('prof@example.edu');
    const [python, rust] = view.activities;

    expect(python?.instructors.map((grant) => grant.email)).toEqual(['prof@example.edu', 'ta@example.edu']);
    expect(python?.submissions.map((submission) => [submission.userId, submission.score])).toEqual([
      ['s1', 95.5],
      ['s2', null],
    ]);
    expect(python?.submissions[0]?.gradedBy).toBe('prof@example.edu');
    expect(rust?.instructors.map((grant) => grant.email)).toEqual(['prof@example.edu']);
    expect(rust?.submissions).toEqual([]);
  });

  it('takes the activity set from the authorization service', async () => {
    const service = createDashboardQueryService({
      db,
      authorization: {
        authorizedActivities: async () => new Set(['rust101', 'missing']),
      },
    });

    const view = await service.activitiesAndSubmissionsFor('prof@example.edu');

    expect(view.activities.map((entry) => entry.activity.activityId)).toEqual(['rust101']);
  });

  it('returns no activities for a caller without grants', async () => {
    const view = await createService().activitiesAndSubmissionsFor('s1@example.edu');

    expect(view).toEqual({
      email: 's1@example.edu',
      activities: [],
    });
  });
});
