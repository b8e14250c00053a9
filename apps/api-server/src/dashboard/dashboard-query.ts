import {
  normalizeEmail,
  type Activity,
  type InstructorGrant,
  type Submission,
} from '@activityhub/core-domain';
import {
  findActivityById,
  listInstructorsForActivity,
  listSubmissionsForActivity,
  type SqlDatabase,
} from '@activityhub/db';
import type { AuthorizationService } from '../auth/authorization-service';

export interface DashboardActivity {
  activity: Activity;
  instructors: InstructorGrant[];
  submissions: Submission[];
}

export interface DashboardView {
  email: string;
  activities: DashboardActivity[];
}

export interface DashboardQueryService {
  activitiesAndSubmissionsFor: (callerEmail: string) => Promise<DashboardView>;
}

export const createDashboardQueryService = (input: {
  db: SqlDatabase;
  authorization: Pick<AuthorizationService, 'authorizedActivities'>;
}): DashboardQueryService => {
  const { db, authorization } = input;

  return {
    activitiesAndSubmissionsFor: async (callerEmail) => {
      const email = normalizeEmail(callerEmail);
      // Read before the transaction opens: the authorization service queries through `db`.
      const activityIds = [...(await authorization.authorizedActivities(email))].sort();

      return db.transaction(
        async (tx) => {
          const activities: DashboardActivity[] = [];

          for (const activityId of activityIds) {
            const activity = await findActivityById(tx, activityId);

            if (activity === null) {
              continue;
            }

            activities.push({
              activity,
              instructors: await listInstructorsForActivity(tx, activityId),
              submissions: await listSubmissionsForActivity(tx, activityId),
            });
          }

          return {
            email,
            activities,
          };
        },
        {
          readOnly: true,
        },
      );
    },
  };
};
