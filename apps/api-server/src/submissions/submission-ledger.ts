import {
  ActivityDisabledError,
  DEFAULT_SCORE_RANGE,
  NotFoundError,
  UnauthorizedError,
  assertScoreInRange,
  classifyTokenWrite,
  logInfo,
  logWarn,
  normalizeEmail,
  type ObservabilityContext,
  type ScoreRange,
  type Submission,
  type SubmissionWithActivity,
  type TokenWriteOutcome,
  type WriteOnceToken,
} from '@activityhub/core-domain';
import {
  findInstructorGrant,
  findSubmission,
  listSubmissionsByEmail,
  lockActivity,
  updateSubmissionScore,
  upsertSubmission,
  type SqlDatabase,
} from '@activityhub/db';

export interface SubmitInput {
  userId: string;
  name: string;
  activityId: string;
  email: string;
  notebookRef: string;
  prequizToken?: string | undefined;
  postquizToken?: string | undefined;
}

export interface SubmitResult {
  submission: Submission;
  created: boolean;
  tokenWrites: {
    prequizToken: TokenWriteOutcome;
    postquizToken: TokenWriteOutcome;
  };
}

export interface SetScoreInput {
  activityId: string;
  userId: string;
  score: number;
}

export interface SubmissionLedger {
  submit: (input: SubmitInput) => Promise<SubmitResult>;
  setScore: (input: SetScoreInput, callerEmail: string) => Promise<Submission>;
  listByEmail: (email: string) => Promise<SubmissionWithActivity[]>;
  getSubmissionForInstructor: (
    activityId: string,
    userId: string,
    callerEmail: string,
  ) => Promise<Submission>;
}

export interface CreateSubmissionLedgerInput {
  db: SqlDatabase;
  observabilityContext: ObservabilityContext;
  scoreRange?: ScoreRange | undefined;
  now?: (() => Date) | undefined;
}

const UNSET_TOKEN: WriteOnceToken = {
  state: 'unset',
};

const submissionNotFound = (activityId: string, userId: string): NotFoundError => {
  return new NotFoundError(`Submission for user "${userId}" on activity "${activityId}" not found`, {
    activityId,
    userId,
  });
};

const notAnInstructor = (email: string, activityId: string): UnauthorizedError => {
  return new UnauthorizedError(`"${email}" is not an instructor of activity "${activityId}"`, {
    activityId,
    email,
  });
};

export const createSubmissionLedger = (input: CreateSubmissionLedgerInput): SubmissionLedger => {
  const { db, observabilityContext } = input;
  const scoreRange = input.scoreRange ?? DEFAULT_SCORE_RANGE;
  const now = input.now ?? (() => new Date());

  return {
    submit: async (submitInput) => {
      const result = await db.transaction(async (tx): Promise<SubmitResult> => {
        // Serialises submissions per activity so the read below matches the row the upsert hits.
        const activity = await lockActivity(tx, submitInput.activityId);

        if (activity === null) {
          throw new NotFoundError(`Activity "${submitInput.activityId}" not found`, {
            activityId: submitInput.activityId,
          });
        }

        if (!activity.enabled) {
          throw new ActivityDisabledError(activity.activityId);
        }

        const existing = await findSubmission(tx, {
          userId: submitInput.userId,
          activityId: activity.activityId,
        });
        const submission = await upsertSubmission(tx, {
          userId: submitInput.userId,
          activityId: activity.activityId,
          name: submitInput.name,
          email: normalizeEmail(submitInput.email),
          notebookRef: submitInput.notebookRef,
          prequizToken: submitInput.prequizToken,
          postquizToken: submitInput.postquizToken,
          nowIso: now().toISOString(),
        });

        // The guarded insert finds no enabled activity when it was disabled after the read above.
        if (submission === null) {
          throw new ActivityDisabledError(activity.activityId);
        }

        return {
          submission,
          created: existing === null,
          tokenWrites: {
            prequizToken: classifyTokenWrite({
              previous: existing?.prequizToken ?? UNSET_TOKEN,
              stored: submission.prequizToken,
              incoming: submitInput.prequizToken,
            }),
            postquizToken: classifyTokenWrite({
              previous: existing?.postquizToken ?? UNSET_TOKEN,
              stored: submission.postquizToken,
              incoming: submitInput.postquizToken,
            }),
          },
        };
      });

      for (const [token, outcome] of Object.entries(result.tokenWrites)) {
        if (outcome === 'ignored') {
          logWarn(observabilityContext, 'submission_token_write_ignored', {
            activityId: result.submission.activityId,
            userId: result.submission.userId,
            token,
          });
        }
      }

      logInfo(observabilityContext, 'submission_recorded', {
        activityId: result.submission.activityId,
        userId: result.submission.userId,
        created: result.created,
      });

      return result;
    },
    setScore: async (scoreInput, callerEmail) => {
      assertScoreInRange(scoreInput.score, scoreRange);
      const caller = normalizeEmail(callerEmail);

      const submission = await db.transaction(async (tx) => {
        const callerGrant = await findInstructorGrant(tx, {
          email: caller,
          activityId: scoreInput.activityId,
        });

        if (callerGrant === null) {
          throw notAnInstructor(caller, scoreInput.activityId);
        }

        const updated = await updateSubmissionScore(tx, {
          activityId: scoreInput.activityId,
          userId: scoreInput.userId,
          score: scoreInput.score,
          gradedBy: caller,
          nowIso: now().toISOString(),
        });

        if (updated === null) {
          throw submissionNotFound(scoreInput.activityId, scoreInput.userId);
        }

        return updated;
      });

      logInfo(observabilityContext, 'submission_scored', {
        activityId: submission.activityId,
        userId: submission.userId,
        score: submission.score,
        gradedBy: caller,
      });

      return submission;
    },
    listByEmail: (email) => {
      return listSubmissionsByEmail(db, normalizeEmail(email));
    },
    getSubmissionForInstructor: (activityId, userId, callerEmail) => {
      const caller = normalizeEmail(callerEmail);

      return db.transaction(
        async (tx) => {
          const callerGrant = await findInstructorGrant(tx, {
            email: caller,
            activityId,
          });

          if (callerGrant === null) {
            throw notAnInstructor(caller, activityId);
          }

          const submission = await findSubmission(tx, {
            userId,
            activityId,
          });

          if (submission === null) {
            throw submissionNotFound(activityId, userId);
          }

          return submission;
        },
        {
          readOnly: true,
        },
      );
    },
  };
};
