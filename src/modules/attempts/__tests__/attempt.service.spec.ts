import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AccessDeniedError,
  AttemptExpiredError,
  ForbiddenError,
  InvalidReferenceError,
  InvalidStateTransitionError,
  NotPublishedError,
} from '../../../common/errors.js';
import {
  createTestContext,
  enroll,
  seedAssessment,
  seedCourse,
  TEST_TENANT,
  type TestContext,
} from '../../../testing/test-utils.js';
import { createAttemptManager, type AttemptManager } from '../attempt.service.js';
import type { Course } from '../../../common/types.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the call to throw');
}

describe('AttemptManager', () => {
  let ctx: TestContext;
  let manager: AttemptManager;
  let course: Course;

  beforeEach(() => {
    ctx = createTestContext();
    manager = createAttemptManager({
      attemptRepository: ctx.repositories.attempt,
      assessmentRepository: ctx.repositories.assessment,
      accessGuard: ctx.accessGuard,
      eventBus: ctx.eventBus,
      logger: ctx.logger,
    });
    course = seedCourse(ctx, { ownerId: 'owner-1' }).course;
    enroll(ctx, course.id, 'learner-1');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('start', () => {
    it('creates an in-progress attempt once and returns it on later calls', () => {
      const assessment = seedAssessment(ctx, course.id);

      const first = manager.start(TEST_TENANT, 'learner-1', assessment.id);
      const second = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      expect(first.created).toBe(true);
      expect(first.attempt.state).toBe('in_progress');
      expect(first.attempt.score).toBeNull();
      expect(second.created).toBe(false);
      expect(second.attempt.id).toBe(first.attempt.id);
    });

    it('yields a single attempt under concurrent starts', async () => {
      const assessment = seedAssessment(ctx, course.id);

      const results = await Promise.all(
        Array.from({ length: 10 }, () => Promise.resolve().then(() => manager.start(TEST_TENANT, 'learner-1', assessment.id))),
      );

      expect(new Set(results.map(result => result.attempt.id)).size).toBe(1);
      expect(results.filter(result => result.created)).toHaveLength(1);
      expect(ctx.repositories.attempt.listByAssessment(TEST_TENANT, assessment.id)).toHaveLength(1);
    });

    it('publishes AttemptStarted only for the creating call', async () => {
      const assessment = seedAssessment(ctx, course.id);
      const handler = vi.fn();
      ctx.eventBus.subscribe('AttemptStarted', handler);

      manager.start(TEST_TENANT, 'learner-1', assessment.id);
      manager.start(TEST_TENANT, 'learner-1', assessment.id);
      await ctx.eventBus.drain();

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('rejects assessments that are not published', () => {
      const assessment = seedAssessment(ctx, course.id, { published: false });

      expect(() => manager.start(TEST_TENANT, 'learner-1', assessment.id)).toThrow(NotPublishedError);
    });

    it('denies learners without access to the course', () => {
      const assessment = seedAssessment(ctx, course.id);

      expect(() => manager.start(TEST_TENANT, 'stranger', assessment.id)).toThrow(AccessDeniedError);
      expect(() => manager.start(TEST_TENANT, 'learner-1', 'missing')).toThrow(AccessDeniedError);
    });
  });

  describe('recordAnswer', () => {
    it('keeps only the latest answer per question', () => {
      const assessment = seedAssessment(ctx, course.id);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-b');
      const view = manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a');

      expect(view.answers).toHaveLength(1);
      expect(view.answers[0]?.choiceId).toBe('q1-a');
    });

    it('rejects questions and choices outside the assessment', () => {
      const assessment = seedAssessment(ctx, course.id);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      expect(() => manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q9', 'q1-a')).toThrow(InvalidReferenceError);
      expect(() => manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q2-a')).toThrow(InvalidReferenceError);
    });

    it('rejects answers after completion', () => {
      const assessment = seedAssessment(ctx, course.id);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);
      manager.complete(TEST_TENANT, 'learner-1', attempt.id);

      expect(() => manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a')).toThrow(InvalidStateTransitionError);
    });

    it('does not let another learner act on the attempt', () => {
      const assessment = seedAssessment(ctx, course.id);
      enroll(ctx, course.id, 'learner-2');
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      expect(() => manager.recordAnswer(TEST_TENANT, 'learner-2', attempt.id, 'q1', 'q1-a')).toThrow(AccessDeniedError);
    });
  });

  describe('complete', () => {
    it('grades one right and one wrong answer as 50', () => {
      const assessment = seedAssessment(ctx, course.id);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);
      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a');
      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q2', 'q2-a');

      const completed = manager.complete(TEST_TENANT, 'learner-1', attempt.id);

      expect(completed.state).toBe('completed');
      expect(completed.completionReason).toBe('submitted');
      expect(completed.score).toBe(50);
      expect(completed.earnedPoints).toBe(1);
      expect(completed.totalPoints).toBe(2);
    });

    it('is idempotent and announces completion once', async () => {
      const assessment = seedAssessment(ctx, course.id);
      const handler = vi.fn();
      ctx.eventBus.subscribe('AttemptCompleted', handler);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);
      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a');

      const first = manager.complete(TEST_TENANT, 'learner-1', attempt.id);
      const second = manager.complete(TEST_TENANT, 'learner-1', attempt.id);
      await ctx.eventBus.drain();

      expect(second.score).toBe(first.score);
      expect(second.completedAt).toBe(first.completedAt);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0]?.[0].payload).toEqual({
        attemptId: attempt.id,
        assessmentId: assessment.id,
        learnerId: 'learner-1',
        score: 50,
        reason: 'submitted',
      });
    });

    it('scores an assessment without points as 0', () => {
      const assessment = seedAssessment(ctx, course.id, {
        questions: [{
          kind: 'TRUE_FALSE',
          prompt: 'Ungraded warm-up',
          points: 0,
          choices: [
            { id: 'z-a', text: 'True', correct: true },
            { id: 'z-b', text: 'False', correct: false },
          ],
        }],
      });
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      expect(manager.complete(TEST_TENANT, 'learner-1', attempt.id).score).toBe(0);
    });
  });

  describe('time limits', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2025-03-01T09:00:00.000Z'));
    });

    it('stays open exactly at the deadline', () => {
      const assessment = seedAssessment(ctx, course.id, { timeLimitMinutes: 10 });
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      vi.setSystemTime(new Date('2025-03-01T09:10:00.000Z'));

      expect(manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a').state).toBe('in_progress');
    });

    it('expires an overdue attempt and grades the answers on record', () => {
      const assessment = seedAssessment(ctx, course.id, { timeLimitMinutes: 10 });
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);
      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a');

      vi.setSystemTime(new Date('2025-03-01T09:11:00.000Z'));
      const error = captureError(() => manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q2', 'q2-b'));

      expect(error).toBeInstanceOf(AttemptExpiredError);
      if (error instanceof AttemptExpiredError) {
        expect(error.toResponse()).toEqual({
          error: 'Attempt time limit exceeded',
          code: 'ATTEMPT_EXPIRED',
          attemptId: attempt.id,
          score: 50,
        });
      }
      const stored = manager.get(TEST_TENANT, 'learner-1', attempt.id);
      expect(stored.state).toBe('completed');
      expect(stored.completionReason).toBe('expired');
      expect(stored.completedAt).toBe('2025-03-01T09:11:00.000Z');
      expect(stored.answers).toHaveLength(1);
    });

    it('treats an attempt expired by an earlier call as a completed one', () => {
      const assessment = seedAssessment(ctx, course.id, { timeLimitMinutes: 1 });
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      vi.setSystemTime(new Date('2025-03-01T09:05:00.000Z'));
      expect(manager.get(TEST_TENANT, 'learner-1', attempt.id).completionReason).toBe('expired');

      expect(() => manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a'))
        .toThrow(InvalidStateTransitionError);
    });

    it('returns the expired attempt when completing after the deadline', () => {
      const assessment = seedAssessment(ctx, course.id, { timeLimitMinutes: 5 });
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      vi.setSystemTime(new Date('2025-03-01T10:00:00.000Z'));
      const completed = manager.complete(TEST_TENANT, 'learner-1', attempt.id);

      expect(completed.completionReason).toBe('expired');
      expect(completed.score).toBe(0);
    });

    it('expires overdue attempts when the owner lists them', () => {
      const assessment = seedAssessment(ctx, course.id, { timeLimitMinutes: 5 });
      manager.start(TEST_TENANT, 'learner-1', assessment.id);

      vi.setSystemTime(new Date('2025-03-01T09:30:00.000Z'));
      const [listed] = manager.listForAssessment(TEST_TENANT, 'owner-1', assessment.id);

      expect(listed?.state).toBe('completed');
      expect(listed?.completionReason).toBe('expired');
    });
  });

  describe('get', () => {
    it('lets the learner and the course owner read the attempt', () => {
      const assessment = seedAssessment(ctx, course.id);
      enroll(ctx, course.id, 'learner-2');
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      expect(manager.get(TEST_TENANT, 'learner-1', attempt.id).id).toBe(attempt.id);
      expect(manager.get(TEST_TENANT, 'owner-1', attempt.id).id).toBe(attempt.id);
      expect(() => manager.get(TEST_TENANT, 'learner-2', attempt.id)).toThrow(AccessDeniedError);
    });
  });

  describe('regrade', () => {
    it('re-runs grading against the current answer key', () => {
      const assessment = seedAssessment(ctx, course.id);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);
      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q1', 'q1-a');
      manager.recordAnswer(TEST_TENANT, 'learner-1', attempt.id, 'q2', 'q2-a');
      manager.complete(TEST_TENANT, 'learner-1', attempt.id);

      ctx.repositories.assessment.save({
        ...assessment,
        questions: assessment.questions.map(question => question.id !== 'q2' ? question : {
          ...question,
          choices: question.choices.map(choice => ({ ...choice, correct: choice.id === 'q2-a' })),
        }),
      });
      const regraded = manager.regrade(TEST_TENANT, 'owner-1', attempt.id);

      expect(regraded.score).toBe(100);
      expect(regraded.completionReason).toBe('submitted');
    });

    it('is limited to the course owner and completed attempts', () => {
      const assessment = seedAssessment(ctx, course.id);
      const { attempt } = manager.start(TEST_TENANT, 'learner-1', assessment.id);

      expect(() => manager.regrade(TEST_TENANT, 'owner-1', attempt.id)).toThrow(InvalidStateTransitionError);
      manager.complete(TEST_TENANT, 'learner-1', attempt.id);
      expect(() => manager.regrade(TEST_TENANT, 'learner-1', attempt.id)).toThrow(ForbiddenError);
    });
  });
});
