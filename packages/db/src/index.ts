import {
  writeOnceToken,
  type Activity,
  type ActivitySummary,
  type InstructorGrant,
  type Submission,
  type SubmissionWithActivity,
} from '@activityhub/core-domain';

export interface SqlExecutionMeta {
  rowsRead?: number | undefined;
  rowsWritten?: number | undefined;
  durationMs?: number | undefined;
}

export interface SqlRunResult {
  success: boolean;
  meta: SqlExecutionMeta;
}

export interface SqlQueryResult<T> extends SqlRunResult {
  results: T[];
}

export interface SqlPreparedStatement {
  bind(...params: unknown[]): SqlPreparedStatement;
  first<T>(): Promise<T | null>;
  all<T>(): Promise<SqlQueryResult<T>>;
  run(): Promise<SqlRunResult>;
}

export interface SqlTransactionOptions {
  /**
   * Read-only transactions see one snapshot for every statement and take no write lock.
   */
  readOnly?: boolean | undefined;
}

export interface SqlDatabase {
  prepare(sql: string): SqlPreparedStatement;
  /**
   * Runs `fn` in one transaction, committing when it resolves and rolling back when it rejects.
   * Calling `transaction` on the handle passed to `fn` joins the outer transaction.
   */
  transaction<T>(fn: (tx: SqlDatabase) => Promise<T>, options?: SqlTransactionOptions): Promise<T>;
}

export interface ClosableSqlDatabase extends SqlDatabase {
  close(): Promise<void>;
}

/**
 * Creates the tables when they do not exist yet. The DDL is shared by SQLite and Postgres, so
 * flags are INTEGER 0/1 and timestamps are ISO-8601 TEXT.
 */
export const ensureSchema = async (db: SqlDatabase): Promise<void> => {
  await db
    .prepare(
      `
      CREATE TABLE IF NOT EXISTS activities (
        activity_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        enabled INTEGER NOT NULL DEFAULT 1 CHECK (enabled IN (0, 1)),
        grading_artifact_ref TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `,
    )
    .run();

  await db
    .prepare(
      `
      CREATE TABLE IF NOT EXISTS instructor_grants (
        email TEXT NOT NULL,
        activity_id TEXT NOT NULL,
        name TEXT,
        created_at TEXT NOT NULL,
        PRIMARY KEY (email, activity_id),
        FOREIGN KEY (activity_id) REFERENCES activities (activity_id)
      )
    `,
    )
    .run();

  await db
    .prepare(
      `
      CREATE INDEX IF NOT EXISTS idx_instructor_grants_activity
        ON instructor_grants (activity_id)
    `,
    )
    .run();

  await db
    .prepare(
      `
      CREATE TABLE IF NOT EXISTS submissions (
        user_id TEXT NOT NULL,
        activity_id TEXT NOT NULL,
        name TEXT NOT NULL,
        email TEXT NOT NULL,
        prequiz_token TEXT,
        postquiz_token TEXT,
        notebook_ref TEXT NOT NULL,
        score DOUBLE PRECISION,
        graded_by TEXT,
        graded_at TEXT,
        submitted_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (user_id, activity_id),
        FOREIGN KEY (activity_id) REFERENCES activities (activity_id)
      )
    `,
    )
    .run();

  await db
    .prepare(
      `
      CREATE INDEX IF NOT EXISTS idx_submissions_email
        ON submissions (email)
    `,
    )
    .run();
};

interface ActivityRow {
  activityId: string;
  name: string;
  enabled: number | boolean;
  gradingArtifactRef: string | null;
  createdAt: string;
  updatedAt: string;
}

interface ActivitySummaryRow extends ActivityRow {
  instructorCount: number | string;
  submissionCount: number | string;
}

interface InstructorGrantRow {
  email: string;
  activityId: string;
  name: string | null;
  createdAt: string;
}

interface SubmissionRow {
  userId: string;
  activityId: string;
  name: string;
  email: string;
  prequizToken: string | null;
  postquizToken: string | null;
  notebookRef: string;
  score: number | null;
  gradedBy: string | null;
  gradedAt: string | null;
  submittedAt: string;
  updatedAt: string;
}

interface SubmissionWithActivityRow extends SubmissionRow {
  activityName: string;
  activityEnabled: number | boolean;
}

interface CountRow {
  total: number | string;
}

// Postgres folds unquoted aliases to lower case, so every camelCase alias is quoted.
const ACTIVITY_COLUMNS = `
  activity_id AS "activityId",
  name,
  enabled,
  grading_artifact_ref AS "gradingArtifactRef",
  created_at AS "createdAt",
  updated_at AS "updatedAt"
`;

const INSTRUCTOR_GRANT_COLUMNS = `
  email,
  activity_id AS "activityId",
  name,
  created_at AS "createdAt"
`;

const SUBMISSION_COLUMNS = `
  user_id AS "userId",
  activity_id AS "activityId",
  name,
  email,
  prequiz_token AS "prequizToken",
  postquiz_token AS "postquizToken",
  notebook_ref AS "notebookRef",
  score,
  graded_by AS "gradedBy",
  graded_at AS "gradedAt",
  submitted_at AS "submittedAt",
  updated_at AS "updatedAt"
`;

const isTruthyFlag = (value: number | boolean): boolean => {
  return value === 1 || value === true;
};

// COUNT(*) comes back from Postgres as a bigint string.
const toCount = (value: number | string): number => {
  return typeof value === 'number' ? value : Number.parseInt(value, 10);
};

const mapActivityRow = (row: ActivityRow): Activity => {
  return {
    activityId: row.activityId,
    name: row.name,
    enabled: isTruthyFlag(row.enabled),
    gradingArtifactRef: row.gradingArtifactRef,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
};

const mapActivitySummaryRow = (row: ActivitySummaryRow): ActivitySummary => {
  return {
    ...mapActivityRow(row),
    instructorCount: toCount(row.instructorCount),
    submissionCount: toCount(row.submissionCount),
  };
};

const mapInstructorGrantRow = (row: InstructorGrantRow): InstructorGrant => {
  return {
    email: row.email,
    activityId: row.activityId,
    name: row.name,
    createdAt: row.createdAt,
  };
};

const mapSubmissionRow = (row: SubmissionRow): Submission => {
  return {
    userId: row.userId,
    activityId: row.activityId,
    name: row.name,
    email: row.email,
    prequizToken: writeOnceToken(row.prequizToken),
    postquizToken: writeOnceToken(row.postquizToken),
    notebookRef: row.notebookRef,
    score: row.score,
    gradedBy: row.gradedBy,
    gradedAt: row.gradedAt,
    submittedAt: row.submittedAt,
    updatedAt: row.updatedAt,
  };
};

const mapSubmissionWithActivityRow = (row: SubmissionWithActivityRow): SubmissionWithActivity => {
  return {
    ...mapSubmissionRow(row),
    activityName: row.activityName,
    activityEnabled: isTruthyFlag(row.activityEnabled),
  };
};

export interface InsertActivityInput {
  activityId: string;
  name: string;
  enabled: boolean;
  gradingArtifactRef?: string | undefined;
  nowIso?: string | undefined;
}

/**
 * Inserts a new activity. Resolves to null when the id is already taken; existing rows are
 * never modified.
 */
export const insertActivity = async (
  db: SqlDatabase,
  input: InsertActivityInput,
): Promise<Activity | null> => {
  const nowIso = input.nowIso ?? new Date().toISOString();
  const row = await db
    .prepare(
      `
      INSERT INTO activities (
        activity_id,
        name,
        enabled,
        grading_artifact_ref,
        created_at,
        updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (activity_id) DO NOTHING
      RETURNING ${ACTIVITY_COLUMNS}
    `,
    )
    .bind(
      input.activityId,
      input.name,
      input.enabled ? 1 : 0,
      input.gradingArtifactRef ?? null,
      nowIso,
      nowIso,
    )
    .first<ActivityRow>();

  return row === null ? null : mapActivityRow(row);
};

export const findActivityById = async (
  db: SqlDatabase,
  activityId: string,
): Promise<Activity | null> => {
  const row = await db
    .prepare(
      `
      SELECT ${ACTIVITY_COLUMNS}
      FROM activities
      WHERE activity_id = ?
      LIMIT 1
    `,
    )
    .bind(activityId)
    .first<ActivityRow>();

  return row === null ? null : mapActivityRow(row);
};

/**
 * Takes the activity's row lock for the rest of the transaction with a no-op write, so that
 * authorization checks and grant inserts for one activity run one at a time.
 */
export const lockActivity = async (
  db: SqlDatabase,
  activityId: string,
): Promise<Activity | null> => {
  const row = await db
    .prepare(
      `
      UPDATE activities
      SET updated_at = updated_at
      WHERE activity_id = ?
      RETURNING ${ACTIVITY_COLUMNS}
    `,
    )
    .bind(activityId)
    .first<ActivityRow>();

  return row === null ? null : mapActivityRow(row);
};

export const updateActivityEnabled = async (
  db: SqlDatabase,
  input: {
    activityId: string;
    enabled: boolean;
    nowIso?: string | undefined;
  },
): Promise<Activity | null> => {
  const row = await db
    .prepare(
      `
      UPDATE activities
      SET
        enabled = ?,
        updated_at = ?
      WHERE activity_id = ?
      RETURNING ${ACTIVITY_COLUMNS}
    `,
    )
    .bind(input.enabled ? 1 : 0, input.nowIso ?? new Date().toISOString(), input.activityId)
    .first<ActivityRow>();

  return row === null ? null : mapActivityRow(row);
};

export interface ActivityPageInput {
  afterActivityId: string | null;
  limit: number;
  enabledOnly: boolean;
}

const activityPageFilter = (input: ActivityPageInput, alias: string): {
  where: string;
  params: unknown[];
} => {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (input.afterActivityId !== null) {
    conditions.push(`${alias}.activity_id > ?`);
    params.push(input.afterActivityId);
  }

  if (input.enabledOnly) {
    conditions.push(`${alias}.enabled = 1`);
  }

  return {
    where: conditions.length === 0 ? '' : `WHERE ${conditions.join(' AND ')}`,
    params,
  };
};

/**
 * Reads one page of activities ordered by id, starting after `afterActivityId`.
 */
export const listActivitiesPage = async (
  db: SqlDatabase,
  input: ActivityPageInput,
): Promise<Activity[]> => {
  const filter = activityPageFilter(input, 'a');
  const result = await db
    .prepare(
      `
      SELECT
        a.activity_id AS "activityId",
        a.name,
        a.enabled,
        a.grading_artifact_ref AS "gradingArtifactRef",
        a.created_at AS "createdAt",
        a.updated_at AS "updatedAt"
      FROM activities a
      ${filter.where}
      ORDER BY a.activity_id ASC
      LIMIT ?
    `,
    )
    .bind(...filter.params, input.limit)
    .all<ActivityRow>();

  return result.results.map(mapActivityRow);
};

export const listActivitySummariesPage = async (
  db: SqlDatabase,
  input: ActivityPageInput,
): Promise<ActivitySummary[]> => {
  const filter = activityPageFilter(input, 'a');
  const result = await db
    .prepare(
      `
      SELECT
        a.activity_id AS "activityId",
        a.name,
        a.enabled,
        a.grading_artifact_ref AS "gradingArtifactRef",
        a.created_at AS "createdAt",
        a.updated_at AS "updatedAt",
        (
          SELECT COUNT(*)
          FROM instructor_grants g
          WHERE g.activity_id = a.activity_id
        ) AS "instructorCount",
        (
          SELECT COUNT(*)
          FROM submissions s
          WHERE s.activity_id = a.activity_id
        ) AS "submissionCount"
      FROM activities a
      ${filter.where}
      ORDER BY a.activity_id ASC
      LIMIT ?
    `,
    )
    .bind(...filter.params, input.limit)
    .all<ActivitySummaryRow>();

  return result.results.map(mapActivitySummaryRow);
};

/**
 * Inserts a grant. Resolves to null when the instructor already holds one for the activity; the
 * stored display name is kept in that case.
 */
export const insertInstructorGrant = async (
  db: SqlDatabase,
  input: {
    email: string;
    activityId: string;
    name?: string | null | undefined;
    nowIso?: string | undefined;
  },
): Promise<InstructorGrant | null> => {
  const row = await db
    .prepare(
      `
      INSERT INTO instructor_grants (
        email,
        activity_id,
        name,
        created_at
      )
      VALUES (?, ?, ?, ?)
      ON CONFLICT (email, activity_id) DO NOTHING
      RETURNING ${INSTRUCTOR_GRANT_COLUMNS}
    `,
    )
    .bind(input.email, input.activityId, input.name ?? null, input.nowIso ?? new Date().toISOString())
    .first<InstructorGrantRow>();

  return row === null ? null : mapInstructorGrantRow(row);
};

export const findInstructorGrant = async (
  db: SqlDatabase,
  input: {
    email: string;
    activityId: string;
  },
): Promise<InstructorGrant | null> => {
  const row = await db
    .prepare(
      `
      SELECT ${INSTRUCTOR_GRANT_COLUMNS}
      FROM instructor_grants
      WHERE email = ?
        AND activity_id = ?
      LIMIT 1
    `,
    )
    .bind(input.email, input.activityId)
    .first<InstructorGrantRow>();

  return row === null ? null : mapInstructorGrantRow(row);
};

export const countInstructorsForActivity = async (
  db: SqlDatabase,
  activityId: string,
): Promise<number> => {
  const row = await db
    .prepare(
      `
      SELECT COUNT(*) AS total
      FROM instructor_grants
      WHERE activity_id = ?
    `,
    )
    .bind(activityId)
    .first<CountRow>();

  return row === null ? 0 : toCount(row.total);
};

export const listInstructorsForActivity = async (
  db: SqlDatabase,
  activityId: string,
): Promise<InstructorGrant[]> => {
  const result = await db
    .prepare(
      `
      SELECT ${INSTRUCTOR_GRANT_COLUMNS}
      FROM instructor_grants
      WHERE activity_id = ?
      ORDER BY email ASC
    `,
    )
    .bind(activityId)
    .all<InstructorGrantRow>();

  return result.results.map(mapInstructorGrantRow);
};

/**
 * Lists the activities an instructor holds a grant for, ordered by activity id.
 */
export const listActivitiesForInstructor = async (
  db: SqlDatabase,
  email: string,
): Promise<Activity[]> => {
  const result = await db
    .prepare(
      `
      SELECT
        a.activity_id AS "activityId",
        a.name,
        a.enabled,
        a.grading_artifact_ref AS "gradingArtifactRef",
        a.created_at AS "createdAt",
        a.updated_at AS "updatedAt"
      FROM instructor_grants g
      INNER JOIN activities a
        ON a.activity_id = g.activity_id
      WHERE g.email = ?
      ORDER BY a.activity_id ASC
    `,
    )
    .bind(email)
    .all<ActivityRow>();

  return result.results.map(mapActivityRow);
};

export const findSubmission = async (
  db: SqlDatabase,
  input: {
    userId: string;
    activityId: string;
  },
): Promise<Submission | null> => {
  const row = await db
    .prepare(
      `
      SELECT ${SUBMISSION_COLUMNS}
      FROM submissions
      WHERE user_id = ?
        AND activity_id = ?
      LIMIT 1
    `,
    )
    .bind(input.userId, input.activityId)
    .first<SubmissionRow>();

  return row === null ? null : mapSubmissionRow(row);
};

export interface UpsertSubmissionInput {
  userId: string;
  activityId: string;
  name: string;
  email: string;
  notebookRef: string;
  prequizToken?: string | undefined;
  postquizToken?: string | undefined;
  nowIso?: string | undefined;
}

/**
 * Creates or refreshes a submission in one statement, only while the activity exists and is
 * enabled. Stored quiz tokens win over incoming ones, and score columns are left untouched.
 * Resolves to null when the activity guard fails.
 */
export const upsertSubmission = async (
  db: SqlDatabase,
  input: UpsertSubmissionInput,
): Promise<Submission | null> => {
  const nowIso = input.nowIso ?? new Date().toISOString();
  const row = await db
    .prepare(
      `
      INSERT INTO submissions (
        user_id,
        activity_id,
        name,
        email,
        prequiz_token,
        postquiz_token,
        notebook_ref,
        submitted_at,
        updated_at
      )
      SELECT ?, ?, ?, ?, ?, ?, ?, ?, ?
      WHERE EXISTS (
        SELECT 1
        FROM activities
        WHERE activity_id = ?
          AND enabled = 1
      )
      ON CONFLICT (user_id, activity_id)
      DO UPDATE SET
        name = excluded.name,
        email = excluded.email,
        notebook_ref = excluded.notebook_ref,
        prequiz_token = COALESCE(submissions.prequiz_token, excluded.prequiz_token),
        postquiz_token = COALESCE(submissions.postquiz_token, excluded.postquiz_token),
        updated_at = excluded.updated_at
      RETURNING ${SUBMISSION_COLUMNS}
    `,
    )
    .bind(
      input.userId,
      input.activityId,
      input.name,
      input.email,
      input.prequizToken ?? null,
      input.postquizToken ?? null,
      input.notebookRef,
      nowIso,
      nowIso,
      input.activityId,
    )
    .first<SubmissionRow>();

  return row === null ? null : mapSubmissionRow(row);
};

/**
 * Records a score only when `gradedBy` holds a grant for the submission's activity. Resolves to
 * null when the submission is missing or the grant check fails.
 */
export const updateSubmissionScore = async (
  db: SqlDatabase,
  input: {
    userId: string;
    activityId: string;
    score: number;
    gradedBy: string;
    nowIso?: string | undefined;
  },
): Promise<Submission | null> => {
  const nowIso = input.nowIso ?? new Date().toISOString();
  const row = await db
    .prepare(
      `
      UPDATE submissions
      SET
        score = ?,
        graded_by = ?,
        graded_at = ?,
        updated_at = ?
      WHERE user_id = ?
        AND activity_id = ?
        AND EXISTS (
          SELECT 1
          FROM instructor_grants
          WHERE instructor_grants.email = ?
            AND instructor_grants.activity_id = submissions.activity_id
        )
      RETURNING ${SUBMISSION_COLUMNS}
    `,
    )
    .bind(
      input.score,
      input.gradedBy,
      nowIso,
      nowIso,
      input.userId,
      input.activityId,
      input.gradedBy,
    )
    .first<SubmissionRow>();

  return row === null ? null : mapSubmissionRow(row);
};

export const listSubmissionsForActivity = async (
  db: SqlDatabase,
  activityId: string,
): Promise<Submission[]> => {
  const result = await db
    .prepare(
      `
      SELECT ${SUBMISSION_COLUMNS}
      FROM submissions
      WHERE activity_id = ?
      ORDER BY user_id ASC
    `,
    )
    .bind(activityId)
    .all<SubmissionRow>();

  return result.results.map(mapSubmissionRow);
};

export const listSubmissionsByEmail = async (
  db: SqlDatabase,
  email: string,
): Promise<SubmissionWithActivity[]> => {
  const result = await db
    .prepare(
      `
      SELECT
        s.user_id AS "userId",
        s.activity_id AS "activityId",
        s.name,
        s.email,
        s.prequiz_token AS "prequizToken",
        s.postquiz_token AS "postquizToken",
        s.notebook_ref AS "notebookRef",
        s.score,
        s.graded_by AS "gradedBy",
        s.graded_at AS "gradedAt",
        s.submitted_at AS "submittedAt",
        s.updated_at AS "updatedAt",
        a.name AS "activityName",
        a.enabled AS "activityEnabled"
      FROM submissions s
      INNER JOIN activities a
        ON a.activity_id = s.activity_id
      WHERE s.email = ?
      ORDER BY s.activity_id ASC, s.user_id ASC
    `,
    )
    .bind(email)
    .all<SubmissionWithActivityRow>();

  return result.results.map(mapSubmissionWithActivityRow);
};
