import {
  NotFoundError,
  UnauthorizedError,
  logInfo,
  normalizeEmail,
  type InstructorGrant,
  type ObservabilityContext,
} from '@activityhub/core-domain';
import {
  countInstructorsForActivity,
  findInstructorGrant,
  insertInstructorGrant,
  listActivitiesForInstructor,
  listInstructorsForActivity,
  lockActivity,
  type SqlDatabase,
} from '@activityhub/db';

export interface GrantInstructorInput {
  email: string;
  name?: string | null | undefined;
  activityId: string;
}

export interface GrantInstructorResult {
  grant: InstructorGrant;
  created: boolean;
}

export interface AuthorizationService {
  grant: (input: GrantInstructorInput, callerEmail: string) => Promise<GrantInstructorResult>;
  isInstructorFor: (email: string, activityId: string) => Promise<boolean>;
  authorizedActivities: (email: string) => Promise<ReadonlySet<string>>;
  instructorsFor: (activityId: string) => Promise<InstructorGrant[]>;
}

export interface CreateAuthorizationServiceInput {
  db: SqlDatabase;
  observabilityContext: ObservabilityContext;
  /**
   * When true, any verified caller may grant any email on any existing activity. When false,
   * only existing instructors may grant, except on an activity that has no instructors yet.
   */
  openGrantBootstrap: boolean;
  now?: (() => Date) | undefined;
}

export const createAuthorizationService = (
  input: CreateAuthorizationServiceInput,
): AuthorizationService => {
  const { db, observabilityContext, openGrantBootstrap } = input;
  const now = input.now ?? (() => new Date());

  const requireGrantPermission = async (
    tx: SqlDatabase,
    callerEmail: string,
    activityId: string,
  ): Promise<void> => {
    if (openGrantBootstrap) {
      return;
    }

    const callerGrant = await findInstructorGrant(tx, {
      email: callerEmail,
      activityId,
    });

    if (callerGrant !== null) {
      return;
    }

    const instructorCount = await countInstructorsForActivity(tx, activityId);

    if (instructorCount > 0) {
      throw new UnauthorizedError(`"${callerEmail}" is not an instructor of activity "${activityId}"`, {
        activityId,
        email: callerEmail,
      });
    }
  };

  return {
    grant: async (grantInput, callerEmail) => {
      const email = normalizeEmail(grantInput.email);
      const caller = normalizeEmail(callerEmail);

      return db.transaction(async (tx) => {
        const activity = await lockActivity(tx, grantInput.activityId);

        if (activity === null) {
          throw new NotFoundError(`Activity "${grantInput.activityId}" not found`, {
            activityId: grantInput.activityId,
          });
        }

        await requireGrantPermission(tx, caller, activity.activityId);

        const inserted = await insertInstructorGrant(tx, {
          email,
          activityId: activity.activityId,
          name: grantInput.name,
          nowIso: now().toISOString(),
        });

        if (inserted !== null) {
          logInfo(observabilityContext, 'instructor_granted', {
            activityId: activity.activityId,
            email,
            grantedBy: caller,
          });

          return {
            grant: inserted,
            created: true,
          };
        }

        const existing = await findInstructorGrant(tx, {
          email,
          activityId: activity.activityId,
        });

        if (existing === null) {
          throw new Error(`Unable to grant "${email}" on activity "${activity.activityId}"`);
        }

        return {
          grant: existing,
          created: false,
        };
      });
    },
    isInstructorFor: async (email, activityId) => {
      const grant = await findInstructorGrant(db, {
        email: normalizeEmail(email),
        activityId,
      });
      return grant !== null;
    },
    authorizedActivities: async (email) => {
      const activities = await listActivitiesForInstructor(db, normalizeEmail(email));
      return new Set(activities.map((activity) => activity.activityId));
    },
    instructorsFor: (activityId) => {
      return listInstructorsForActivity(db, activityId);
    },
  };
};
