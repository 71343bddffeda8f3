import Fastify, { type FastifyBaseLogger } from 'fastify';
import { createInMemoryRepositoryBundle, type RepositoryBundle } from '../infrastructure/repositories.js';
import { createEventBus, type InMemoryEventBus } from '../common/event-bus.js';
import { createAccessGuard, type AccessGuard } from '../modules/access/access.guard.js';
import { createCourse, createLessonDraft, createModuleDraft, publishLesson } from '../modules/courses/course.model.js';
import { createEnrollment } from '../modules/enrollments/enrollment.model.js';
import { createAssessment, publishAssessment, type QuestionInput } from '../modules/assessments/assessment.model.js';
import { createParticipant } from '../modules/participants/participant.model.js';
import type { Assessment, Course, Lesson, Participant } from '../common/types.js';
import type { AppConfig } from '../config/index.js';

export const TEST_TENANT = 'tenant-1';
export const TEST_API_KEY = 'test-key';

export interface TestContext {
  repositories: RepositoryBundle;
  eventBus: InMemoryEventBus;
  accessGuard: AccessGuard;
  logger: FastifyBaseLogger;
}

export function createTestLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function createTestContext(): TestContext {
  const repositories = createInMemoryRepositoryBundle();
  const logger = createTestLogger();
  return {
    repositories,
    logger,
    eventBus: createEventBus(logger),
    accessGuard: createAccessGuard({
      courseRepository: repositories.course,
      enrollmentRepository: repositories.enrollment,
    }),
  };
}

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    server: { port: 0, host: '127.0.0.1', logLevel: 'silent', publicUrl: 'http://localhost' },
    auth: { seedKeys: [{ key: TEST_API_KEY, tenantId: TEST_TENANT }] },
    persistence: {
      provider: 'memory',
      sqlite: { dbRoot: './data/test', filePattern: '{tenantId}.db', migrationsDir: './migrations/sqlite' },
    },
    fanout: { batchSize: 2, claimTtlMs: 60_000 },
    ...overrides,
  } satisfies AppConfig;
}

export function seedParticipant(ctx: TestContext, id: string, email = `${id}@example.test`): Participant {
  return ctx.repositories.participant.save(createParticipant({ id, tenantId: TEST_TENANT, email }));
}

/** A course with one module holding `publishedLessons` published and `draftLessons` draft lessons. */
export function seedCourse(
  ctx: TestContext,
  options: { ownerId?: string; title?: string; publishedLessons?: number; draftLessons?: number } = {},
): { course: Course; lessons: Lesson[] } {
  const { ownerId = 'owner-1', title = 'Intro to Testing', publishedLessons = 0, draftLessons = 0 } = options;
  const course = ctx.repositories.course.save(createCourse({ tenantId: TEST_TENANT, ownerId, title }));
  const module = ctx.repositories.course.insertModule(
    createModuleDraft({ tenantId: TEST_TENANT, courseId: course.id, title: 'Module 1', position: 0 }),
  );
  const lessons: Lesson[] = [];
  for (let index = 0; index < publishedLessons + draftLessons; index += 1) {
    const draft = ctx.repositories.course.insertLesson(createLessonDraft({
      tenantId: TEST_TENANT,
      courseId: course.id,
      moduleId: module.id,
      title: `Lesson ${index + 1}`,
      position: index,
    }));
    lessons.push(index < publishedLessons ? ctx.repositories.course.saveLesson(publishLesson(draft)) : draft);
  }
  return { course, lessons };
}

export function enroll(ctx: TestContext, courseId: string, enrolleeId: string) {
  return ctx.repositories.enrollment.insertIfAbsent(createEnrollment({ tenantId: TEST_TENANT, courseId, enrolleeId })).record;
}

/** Two one-point questions: `q1-a` and `q2-b` are the correct choices. */
export const TWO_QUESTIONS: QuestionInput[] = [
  {
    id: 'q1',
    kind: 'MULTIPLE_CHOICE',
    prompt: 'Pick the first option',
    points: 1,
    choices: [
      { id: 'q1-a', text: 'First', correct: true },
      { id: 'q1-b', text: 'Second', correct: false },
    ],
  },
  {
    id: 'q2',
    kind: 'TRUE_FALSE',
    prompt: 'This statement is false',
    points: 1,
    choices: [
      { id: 'q2-a', text: 'True', correct: false },
      { id: 'q2-b', text: 'False', correct: true },
    ],
  },
];

export function seedAssessment(
  ctx: TestContext,
  courseId: string,
  options: { published?: boolean; timeLimitMinutes?: number; questions?: QuestionInput[] } = {},
): Assessment {
  const { published = true, timeLimitMinutes, questions = TWO_QUESTIONS } = options;
  const draft = createAssessment({ tenantId: TEST_TENANT, courseId, title: 'Checkpoint', timeLimitMinutes, questions });
  return ctx.repositories.assessment.save(published ? publishAssessment(draft) : draft);
}
