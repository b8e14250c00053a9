import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  logInfo,
  normalizeEmail,
  type Activity,
  type ActivitySummary,
  type ObservabilityContext,
  type VerifiedIdentity,
} from '@activityhub/core-domain';
import {
  findInstructorGrant,
  insertActivity,
  insertInstructorGrant,
  listActivitiesPage,
  listActivitySummariesPage,
  lockActivity,
  updateActivityEnabled,
  type SqlDatabase,
} from '@activityhub/db';

const DEFAULT_PAGE_SIZE = 100;

export interface CreateActivityInput {
  activityId: string;
  name: string;
  enabled?: boolean | undefined;
  gradingArtifactRef?: string | undefined;
}

export interface ListActivitiesOptions {
  enabledOnly?: boolean | undefined;
  pageSize?: number | undefined;
}

export interface ActivityRegistry {
  createActivity: (input: CreateActivityInput, createdBy?: VerifiedIdentity) => Promise<Activity>;
  /**
   * Pages through activities in id order as they are consumed. Each iteration starts again from
   * the first page.
   */
  listActivities: (options?: ListActivitiesOptions) => AsyncIterable<Activity>;
  listActivitySummaries: (options: { enabledOnly: boolean }) => Promise<ActivitySummary[]>;
  setEnabled: (activityId: string, enabled: boolean, callerEmail: string) => Promise<Activity>;
}

export interface CreateActivityRegistryInput {
  db: SqlDatabase;
  observabilityContext: ObservabilityContext;
  now?: (() => Date) | undefined;
}

const resolvePageSize = (pageSize: number | undefined): number => {
  const resolved = pageSize ?? DEFAULT_PAGE_SIZE;

  if (!Number.isInteger(resolved) || resolved < 1) {
    throw new ValidationError('pageSize must be a positive integer', [
      {
        path: 'pageSize',
        message: 'Expected a positive integer',
      },
    ]);
  }

  return resolved;
};

export const createActivityRegistry = (input: CreateActivityRegistryInput): ActivityRegistry => {
  const { db, observabilityContext } = input;
  const now = input.now ?? (() => new Date());

  return {
    createActivity: async (activityInput, createdBy) => {
      const nowIso = now().toISOString();

      const activity = await db.transaction(async (tx) => {
        const inserted = await insertActivity(tx, {
          activityId: activityInput.activityId,
          name: activityInput.name,
          enabled: activityInput.enabled ?? true,
          gradingArtifactRef: activityInput.gradingArtifactRef,
          nowIso,
        });

        if (inserted === null) {
          throw new ConflictError(`Activity "${activityInput.activityId}" already exists`, {
            activityId: activityInput.activityId,
          });
        }

        if (createdBy !== undefined) {
          await insertInstructorGrant(tx, {
            email: normalizeEmail(createdBy.email),
            activityId: inserted.activityId,
            name: createdBy.name,
            nowIso,
          });
        }

        return inserted;
      });

      logInfo(observabilityContext, 'activity_created', {
        activityId: activity.activityId,
        enabled: activity.enabled,
        createdBy: createdBy === undefined ? null : normalizeEmail(createdBy.email),
      });

      return activity;
    },
    listActivities: (options = {}) => {
      const pageSize = resolvePageSize(options.pageSize);
      const enabledOnly = options.enabledOnly ?? false;

      return {
        async *[Symbol.asyncIterator]() {
          let afterActivityId: string | null = null;

          for (;;) {
            const page = await listActivitiesPage(db, {
              afterActivityId,
              limit: pageSize,
              enabledOnly,
            });

            yield* page;

            const lastActivity = page[page.length - 1];

            if (page.length < pageSize || lastActivity === undefined) {
              return;
            }

            afterActivityId = lastActivity.activityId;
          }
        },
      };
    },
    listActivitySummaries: async (options) => {
      const summaries: ActivitySummary[] = [];
      let afterActivityId: string | null = null;

      for (;;) {
        const page = await listActivitySummariesPage(db, {
          afterActivityId,
          limit: DEFAULT_PAGE_SIZE,
          enabledOnly: options.enabledOnly,
        });
        summaries.push(...page);

        const lastSummary = page[page.length - 1];

        if (page.length < DEFAULT_PAGE_SIZE || lastSummary === undefined) {
          return summaries;
        }

        afterActivityId = lastSummary.activityId;
      }
    },
    setEnabled: async (activityId, enabled, callerEmail) => {
      const caller = normalizeEmail(callerEmail);

      const activity = await db.transaction(async (tx) => {
        const locked = await lockActivity(tx, activityId);

        if (locked === null) {
          throw new NotFoundError(`Activity "${activityId}" not found`, { activityId });
        }

        const callerGrant = await findInstructorGrant(tx, {
          email: caller,
          activityId,
        });

        if (callerGrant === null) {
          throw new UnauthorizedError(`"${caller}" is not an instructor of activity "${activityId}"`, {
            activityId,
            email: caller,
          });
        }

        const updated = await updateActivityEnabled(tx, {
          activityId,
          enabled,
          nowIso: now().toISOString(),
        });

        if (updated === null) {
          throw new NotFoundError(`Activity "${activityId}" not found`, { activityId });
        }

        return updated;
      });

      logInfo(observabilityContext, 'activity_enabled_changed', {
        activityId,
        enabled,
        changedBy: caller,
      });

      return activity;
    },
  };
};
