import {
  ActivityDisabledError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '@activityhub/core-domain';
import {
  findSubmission,
  insertActivity,
  insertInstructorGrant,
  listSubmissionsForActivity,
  updateActivityEnabled,
  type ClosableSqlDatabase,
} from '@activityhub/db';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createTestClock,
  createTestDatabase,
  testObservabilityContext,
  type TestClock,
} from '../testing/fixtures';
import {
  createSubmissionLedger,
  type SubmissionLedger,
  type SubmitInput,
} from './submission-ledger';

const sampleSubmitInput = (overrides?: Partial<SubmitInput>): SubmitInput => {
  return {
    userId: 's1',
    name: 'Student One',
    activityId: 'python101',
    email: 's1@example.edu',
    notebookRef: 'uploads/s1/v1.ipynb',
    ...overrides,
  };
};

describe('submission ledger', () => {
  let db: ClosableSqlDatabase;
  let clock: TestClock;
  let ledger: SubmissionLedger;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    db = await createTestDatabase();
    clock = createTestClock();
    ledger = createSubmissionLedger({
      db,
      observabilityContext: testObservabilityContext,
      now: clock.now,
    });
    await insertActivity(db, { activityId: 'python101', name: 'Intro to Python', enabled: true });
    await insertInstructorGrant(db, { email: 'prof@example.edu', activityId: 'python101' });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
  });

  describe('submit', () => {
    it('creates the submission with unset tokens and no score', async () => {
      const result = await ledger.submit(sampleSubmitInput({ email: 'S1@Example.edu' }));

      expect(result.created).toBe(true);
      expect(result.tokenWrites).toEqual({
        prequizToken: 'absent',
        postquizToken: 'absent',
      });
      expect(result.submission).toEqual({
        userId: 's1',
        activityId: 'python101',
        name: 'Student One',
        email: 's1@example.edu',
        prequizToken: { state: 'unset' },
        postquizToken: { state: 'unset' },
        notebookRef: 'uploads/s1/v1.ipynb',
        score: null,
        gradedBy: null,
        gradedAt: null,
        submittedAt: '2026-02-10T15:00:00.000Z',
        updatedAt: '2026-02-10T15:00:00.000Z',
      });
    });

    it('replaces the notebook on resubmission and keeps one row', async () => {
      await ledger.submit(sampleSubmitInput());
      clock.advanceSeconds(120);

      const result = await ledger.submit(sampleSubmitInput({ notebookRef: 'uploads/s1/v2.ipynb' }));

      expect(result.created).toBe(false);
      expect(result.submission.notebookRef).toBe('uploads/s1/v2.ipynb');
      expect(result.submission.submittedAt).toBe('2026-02-10T15:00:00.000Z');
      expect(result.submission.updatedAt).toBe('2026-02-10T15:02:00.000Z');
      expect(await listSubmissionsForActivity(db, 'python101')).toHaveLength(1);
    });

    it('writes quiz tokens once and reports ignored overwrites', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const first = await ledger.submit(sampleSubmitInput({ prequizToken: 'pre-1' }));
      const second = await ledger.submit(
        sampleSubmitInput({ prequizToken: 'pre-2', postquizToken: 'post-1' }),
      );
      const third = await ledger.submit(
        sampleSubmitInput({ prequizToken: 'pre-1', postquizToken: 'post-1' }),
      );

      expect(first.tokenWrites).toEqual({ prequizToken: 'written', postquizToken: 'absent' });
      expect(second.tokenWrites).toEqual({ prequizToken: 'ignored', postquizToken: 'written' });
      expect(third.tokenWrites).toEqual({ prequizToken: 'unchanged', postquizToken: 'unchanged' });
      expect(third.submission.prequizToken).toEqual({ state: 'set', value: 'pre-1' });
      expect(third.submission.postquizToken).toEqual({ state: 'set', value: 'post-1' });
      expect(warnSpy).toHaveBeenCalledTimes(1);
      const payload: unknown = JSON.parse(String(warnSpy.mock.calls[0]?.[0]));
      expect(payload).toMatchObject({
        level: 'warn',
        event: 'submission_token_write_ignored',
        activityId: 'python101',
        userId: 's1',
        token: 'prequizToken',
      });
    });

    it('keeps one row when the same student resubmits concurrently', async () => {
      await ledger.submit(sampleSubmitInput());

      await Promise.all([
        ledger.submit(sampleSubmitInput({ notebookRef: 'uploads/s1/v2.ipynb' })),
        ledger.submit(sampleSubmitInput({ notebookRef: 'uploads/s1/v3.ipynb' })),
      ]);

      const rows = await listSubmissionsForActivity(db, 'python101');
      expect(rows).toHaveLength(1);
      expect(['uploads/s1/v2.ipynb', 'uploads/s1/v3.ipynb']).toContain(rows[0]?.notebookRef);
    });

    it('reports the losing token of two concurrent first submissions as ignored', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const results = await Promise.all([
        ledger.submit(sampleSubmitInput({ prequizToken: 'pre-1' })),
        ledger.submit(sampleSubmitInput({ prequizToken: 'pre-2' })),
      ]);
      const winner = results.find((result) => result.created);
      const loser = results.find((result) => !result.created);

      expect(results.map((result) => result.created).sort()).toEqual([false, true]);
      expect(winner?.tokenWrites.prequizToken).toBe('written');
      expect(loser?.tokenWrites.prequizToken).toBe('ignored');
      expect(loser?.submission.prequizToken).toEqual(winner?.submission.prequizToken);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('fails with NotFound for an unknown activity', async () => {
      await expect(ledger.submit(sampleSubmitInput({ activityId: 'missing' }))).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });

    it('fails with ActivityDisabled and keeps existing submissions readable', async () => {
      await ledger.submit(sampleSubmitInput());
      await updateActivityEnabled(db, { activityId: 'python101', enabled: false });

      await expect(ledger.submit(sampleSubmitInput({ userId: 's2' }))).rejects.toBeInstanceOf(
        ActivityDisabledError,
      );
      await expect(
        ledger.submit(sampleSubmitInput({ notebookRef: 'uploads/s1/v2.ipynb' })),
      ).rejects.toMatchObject({
        kind: 'activity_disabled',
        key: { activityId: 'python101' },
      });

      const existing = await ledger.getSubmissionForInstructor('python101', 's1', 'prof@example.edu');
      expect(existing.notebookRef).toBe('uploads/s1/v1.ipynb');
      expect(await findSubmission(db, { userId: 's2', activityId: 'python101' })).toBeNull();
    });
  });

  describe('setScore', () => {
    beforeEach(async () => {
      await ledger.submit(sampleSubmitInput());
      clock.advanceSeconds(60);
    });

    it('records the score and the grader', async () => {
      const scored = await ledger.setScore(
        { activityId: 'python101', userId: 's1', score: 95.5 },
        'Prof@Example.edu',
      );

      expect(scored.score).toBe(95.5);
      expect(scored.gradedBy).toBe('prof@example.edu');
      expect(scored.gradedAt).toBe('2026-02-10T15:01:00.000Z');
    });

    it('rejects non-instructors and leaves the score unchanged', async () => {
      await ledger.setScore({ activityId: 'python101', userId: 's1', score: 95.5 }, 'prof@example.edu');

      await expect(
        ledger.setScore({ activityId: 'python101', userId: 's1', score: 10 }, 'other@example.edu'),
      ).rejects.toBeInstanceOf(UnauthorizedError);

      expect((await findSubmission(db, { userId: 's1', activityId: 'python101' }))?.score).toBe(95.5);
    });

    it('checks authorization before existence', async () => {
      await expect(
        ledger.setScore({ activityId: 'python101', userId: 's9', score: 10 }, 'other@example.edu'),
      ).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(
        ledger.setScore({ activityId: 'python101', userId: 's9', score: 10 }, 'prof@example.edu'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it.each([-0.5, 100.01, Number.NaN, Number.POSITIVE_INFINITY])(
      'rejects the out-of-range score %s',
      async (score) => {
        await expect(
          ledger.setScore({ activityId: 'python101', userId: 's1', score }, 'prof@example.edu'),
        ).rejects.toBeInstanceOf(ValidationError);
      },
    );

    it('uses the configured score range', async () => {
      const tenPointLedger = createSubmissionLedger({
        db,
        observabilityContext: testObservabilityContext,
        scoreRange: { min: 0, max: 10 },
      });

      await expect(
        tenPointLedger.setScore({ activityId: 'python101', userId: 's1', score: 11 }, 'prof@example.edu'),
      ).rejects.toThrow('Score must be between 0 and 10');
    });

    it('allows grading after the activity is disabled', async () => {
      await updateActivityEnabled(db, { activityId: 'python101', enabled: false });

      const scored = await ledger.setScore(
        { activityId: 'python101', userId: 's1', score: 0 },
        'prof@example.edu',
      );

      expect(scored.score).toBe(0);
    });

    it('keeps the score when the student resubmits', async () => {
      await ledger.setScore({ activityId: 'python101', userId: 's1', score: 80 }, 'prof@example.edu');

      const resubmitted = await ledger.submit(sampleSubmitInput({ notebookRef: 'uploads/s1/v2.ipynb' }));

      expect(resubmitted.submission.score).toBe(80);
      expect(resubmitted.submission.notebookRef).toBe('uploads/s1/v2.ipynb');
    });
  });

  describe('reads', () => {
    it('lists submissions by email with activity details', async () => {
      await insertActivity(db, { activityId: 'rust101', name: 'Intro to Rust', enabled: true });
      await ledger.submit(sampleSubmitInput());
      await ledger.submit(sampleSubmitInput({ activityId: 'rust101', userId: 'student-1' }));
      await ledger.submit(sampleSubmitInput({ userId: 's2', email: 's2@example.edu' }));

      const submissions = await ledger.listByEmail('S1@example.edu');

      expect(
        submissions.map((submission) => [submission.activityId, submission.userId, submission.activityName]),
      ).toEqual([
        ['python101', 's1', 'Intro to Python'],
        ['rust101', 'student-1', 'Intro to Rust'],
      ]);
    });

    it('only shows a submission to instructors of its activity', async () => {
      await ledger.submit(sampleSubmitInput());

      await expect(
        ledger.getSubmissionForInstructor('python101', 's1', 'other@example.edu'),
      ).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(
        ledger.getSubmissionForInstructor('python101', 's2', 'prof@example.edu'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
