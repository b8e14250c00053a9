import { ValidationError } from './errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export interface Activity {
  activityId: string;
  name: string;
  enabled: boolean;
  gradingArtifactRef: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ActivitySummary extends Activity {
  instructorCount: number;
  submissionCount: number;
}

export interface InstructorGrant {
  email: string;
  activityId: string;
  name: string | null;
  createdAt: string;
}

/**
 * Quiz tokens are written at most once. An `unset` token accepts the first value it is given;
 * a `set` token keeps its value for the lifetime of the submission.
 */
export type WriteOnceToken =
  | {
      state: 'unset';
    }
  | {
      state: 'set';
      value: string;
    };

export type TokenWriteOutcome = 'absent' | 'written' | 'unchanged' | 'ignored';

export interface Submission {
  userId: string;
  activityId: string;
  name: string;
  email: string;
  prequizToken: WriteOnceToken;
  postquizToken: WriteOnceToken;
  notebookRef: string;
  score: number | null;
  gradedBy: string | null;
  gradedAt: string | null;
  submittedAt: string;
  updatedAt: string;
}

/**
 * A submission as its owner sees it, with the activity it belongs to.
 */
export interface SubmissionWithActivity extends Submission {
  activityName: string;
  activityEnabled: boolean;
}

export interface VerifiedIdentity {
  email: string;
  name: string | null;
}

export interface ScoreRange {
  min: number;
  max: number;
}

export const DEFAULT_SCORE_RANGE: ScoreRange = {
  min: 0,
  max: 100,
};

export const normalizeEmail = (email: string): string => {
  return email.trim().toLowerCase();
};

export const writeOnceToken = (value: string | null): WriteOnceToken => {
  if (value === null) {
    return {
      state: 'unset',
    };
  }

  return {
    state: 'set',
    value,
  };
};

/**
 * Classifies an incoming token write by comparing it with the token the write left stored.
 * `previous` only separates a first write from a repeat of the stored value.
 */
export const classifyTokenWrite = (input: {
  previous: WriteOnceToken;
  stored: WriteOnceToken;
  incoming: string | undefined;
}): TokenWriteOutcome => {
  if (input.incoming === undefined) {
    return 'absent';
  }

  if (input.stored.state === 'unset' || input.stored.value !== input.incoming) {
    return 'ignored';
  }

  return input.previous.state === 'set' ? 'unchanged' : 'written';
};

export const assertScoreInRange = (score: number, range: ScoreRange): void => {
  if (!Number.isFinite(score)) {
    throw new ValidationError('Score must be a finite number', [
      {
        path: 'score',
        message: 'Expected a finite number',
      },
    ]);
  }

  if (score < range.min || score > range.max) {
    throw new ValidationError(`Score must be between ${String(range.min)} and ${String(range.max)}`, [
      {
        path: 'score',
        message: `Expected a value in [${String(range.min)}, ${String(range.max)}]`,
      },
    ]);
  }
};

export {
  ActivityDisabledError,
  ConflictError,
  DomainError,
  IdentityVerificationError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  isDomainError,
  type DomainErrorKey,
  type DomainErrorKind,
  type ValidationIssue,
} from './errors';

export {
  logError,
  logInfo,
  logWarn,
  type ObservabilityContext,
  type ObservabilityFields,
  type ObservabilityLevel,
} from './observability';
