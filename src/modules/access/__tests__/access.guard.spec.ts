import { beforeEach, describe, expect, it } from 'vitest';
import { AccessDeniedError, ForbiddenError } from '../../../common/errors.js';
import { createTestContext, enroll, seedCourse, TEST_TENANT, type TestContext } from '../../../testing/test-utils.js';

describe('AccessGuard', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('grants the owner and enrolled participants', () => {
    const { course } = seedCourse(ctx, { ownerId: 'owner-1' });
    enroll(ctx, course.id, 'learner-1');

    expect(ctx.accessGuard.canAccess(TEST_TENANT, 'owner-1', course)).toBe(true);
    expect(ctx.accessGuard.canAccess(TEST_TENANT, 'learner-1', course)).toBe(true);
    expect(ctx.accessGuard.canAccess(TEST_TENANT, 'stranger', course)).toBe(false);
  });

  it('denies a missing course and a course from another tenant', () => {
    const { course } = seedCourse(ctx, { ownerId: 'owner-1' });

    expect(ctx.accessGuard.canAccess(TEST_TENANT, 'owner-1', undefined)).toBe(false);
    expect(ctx.accessGuard.canAccess('tenant-2', 'owner-1', course)).toBe(false);
  });

  it('revokes access once the enrollment is removed', () => {
    const { course } = seedCourse(ctx);
    enroll(ctx, course.id, 'learner-1');
    ctx.repositories.enrollment.delete(TEST_TENANT, course.id, 'learner-1');

    expect(ctx.accessGuard.canAccess(TEST_TENANT, 'learner-1', course)).toBe(false);
  });

  it('raises the same not-found error for unknown and inaccessible courses', () => {
    const { course } = seedCourse(ctx);

    expect(() => ctx.accessGuard.requireCourseAccess(TEST_TENANT, 'stranger', course.id)).toThrow(AccessDeniedError);
    expect(() => ctx.accessGuard.requireCourseAccess(TEST_TENANT, 'owner-1', 'missing')).toThrow(AccessDeniedError);
  });

  it('requires ownership for owner-only actions', () => {
    const { course } = seedCourse(ctx);
    enroll(ctx, course.id, 'learner-1');

    expect(ctx.accessGuard.requireCourseOwner(TEST_TENANT, 'owner-1', course.id)).toEqual(course);
    expect(() => ctx.accessGuard.requireCourseOwner(TEST_TENANT, 'learner-1', course.id)).toThrow(ForbiddenError);
    expect(() => ctx.accessGuard.requireCourseOwner(TEST_TENANT, 'stranger', course.id)).toThrow(AccessDeniedError);
  });
});
