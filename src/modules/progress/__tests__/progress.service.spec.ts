import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AccessDeniedError, ForbiddenError } from '../../../common/errors.js';
import { publishLesson } from '../../courses/course.model.js';
import {
  createTestContext,
  enroll,
  seedCourse,
  TEST_TENANT,
  type TestContext,
} from '../../../testing/test-utils.js';
import { createProgressTracker, type ProgressTracker } from '../progress.service.js';

describe('ProgressTracker', () => {
  let ctx: TestContext;
  let tracker: ProgressTracker;

  beforeEach(() => {
    ctx = createTestContext();
    tracker = createProgressTracker({
      progressRepository: ctx.repositories.progress,
      courseRepository: ctx.repositories.course,
      accessGuard: ctx.accessGuard,
      eventBus: ctx.eventBus,
      logger: ctx.logger,
    });
  });

  it('reports 30 after three distinct lessons out of ten', () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 10 });
    enroll(ctx, course.id, 'learner-1');

    for (const lesson of lessons.slice(0, 3)) {
      tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lesson.id);
    }
    const aggregate = tracker.getAggregate(TEST_TENANT, 'learner-1', 'learner-1', course.id);

    expect(aggregate.completedCount).toBe(3);
    expect(aggregate.totalLessons).toBe(10);
    expect(aggregate.percentage).toBe(30);
  });

  it('counts a repeated completion signal once', async () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 4 });
    enroll(ctx, course.id, 'learner-1');
    const handler = vi.fn();
    ctx.eventBus.subscribe('LessonCompleted', handler);
    const lessonId = lessons[0]?.id ?? '';

    const first = tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessonId);
    const again = tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessonId);
    await ctx.eventBus.drain();

    expect(first.added).toBe(true);
    expect(again.added).toBe(false);
    expect(again.aggregate.completedCount).toBe(1);
    expect(again.aggregate.percentage).toBe(25);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0].payload).toEqual({
      learnerId: 'learner-1',
      courseId: course.id,
      lessonId,
      percentage: 25,
    });
  });

  it('counts concurrent duplicate signals once', async () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 2 });
    enroll(ctx, course.id, 'learner-1');
    const lessonId = lessons[1]?.id ?? '';

    const results = await Promise.all(
      Array.from({ length: 5 }, () => Promise.resolve().then(() => tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessonId))),
    );

    expect(results.filter(result => result.added)).toHaveLength(1);
    expect(tracker.getAggregate(TEST_TENANT, 'learner-1', 'learner-1', course.id).completedCount).toBe(1);
  });

  it('returns an empty aggregate before any completion, and 0 for a course without lessons', () => {
    const { course } = seedCourse(ctx);
    enroll(ctx, course.id, 'learner-1');

    const aggregate = tracker.getAggregate(TEST_TENANT, 'learner-1', 'learner-1', course.id);

    expect(aggregate.completedLessonIds).toEqual([]);
    expect(aggregate.totalLessons).toBe(0);
    expect(aggregate.percentage).toBe(0);
  });

  it('ignores draft lessons for the total and rejects completing them', () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 2, draftLessons: 2 });
    enroll(ctx, course.id, 'learner-1');

    expect(() => tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessons[3]?.id ?? '')).toThrow(AccessDeniedError);
    const { aggregate } = tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessons[0]?.id ?? '');

    expect(aggregate.totalLessons).toBe(2);
    expect(aggregate.percentage).toBe(50);
  });

  it('refreshes the lesson total when more lessons are published', () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 2, draftLessons: 2 });
    enroll(ctx, course.id, 'learner-1');
    tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessons[0]?.id ?? '');

    for (const draft of lessons.slice(2)) {
      ctx.repositories.course.saveLesson(publishLesson(draft));
    }
    const { aggregate } = tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessons[1]?.id ?? '');

    expect(aggregate.totalLessons).toBe(4);
    expect(aggregate.percentage).toBe(50);
  });

  it('denies participants without course access', () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 1 });

    expect(() => tracker.onLessonCompleted(TEST_TENANT, 'stranger', lessons[0]?.id ?? '')).toThrow(AccessDeniedError);
    expect(() => tracker.onLessonCompleted(TEST_TENANT, 'stranger', 'missing-lesson')).toThrow(AccessDeniedError);
    expect(() => tracker.getAggregate(TEST_TENANT, 'stranger', 'stranger', course.id)).toThrow(AccessDeniedError);
  });

  it('lets the owner read any learner while learners only read themselves', () => {
    const { course, lessons } = seedCourse(ctx, { publishedLessons: 2 });
    enroll(ctx, course.id, 'learner-1');
    enroll(ctx, course.id, 'learner-2');
    tracker.onLessonCompleted(TEST_TENANT, 'learner-1', lessons[0]?.id ?? '');

    expect(tracker.getAggregate(TEST_TENANT, 'owner-1', 'learner-1', course.id).percentage).toBe(50);
    expect(() => tracker.getAggregate(TEST_TENANT, 'learner-2', 'learner-1', course.id)).toThrow(AccessDeniedError);
    expect(tracker.listForCourse(TEST_TENANT, 'owner-1', course.id).map(aggregate => aggregate.learnerId)).toEqual(['learner-1']);
    expect(() => tracker.listForCourse(TEST_TENANT, 'learner-1', course.id)).toThrow(ForbiddenError);
  });
});
