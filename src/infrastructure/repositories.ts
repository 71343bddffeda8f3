import type { AppConfig } from '../config/index.js';
import {
  createInMemoryParticipantRepository,
  createSQLiteParticipantRepository,
  type ParticipantRepository,
} from '../modules/participants/participant.repository.js';
import {
  createInMemoryCourseRepository,
  createSQLiteCourseRepository,
  type CourseRepository,
} from '../modules/courses/course.repository.js';
import {
  createInMemoryEnrollmentRepository,
  createSQLiteEnrollmentRepository,
  type EnrollmentRepository,
} from '../modules/enrollments/enrollment.repository.js';
import {
  createInMemoryAssessmentRepository,
  createSQLiteAssessmentRepository,
  type AssessmentRepository,
} from '../modules/assessments/assessment.repository.js';
import {
  createInMemoryAttemptRepository,
  createSQLiteAttemptRepository,
  type AttemptRepository,
} from '../modules/attempts/attempt.repository.js';
import {
  createInMemoryProgressRepository,
  createSQLiteProgressRepository,
  type ProgressRepository,
} from '../modules/progress/progress.repository.js';
import {
  createInMemoryNotificationRepository,
  createSQLiteNotificationRepository,
  type NotificationRepository,
} from '../modules/notifications/notification.repository.js';
import { createSQLiteTenantClient } from './sqlite/client.js';

export interface RepositoryBundle {
  participant: ParticipantRepository;
  course: CourseRepository;
  enrollment: EnrollmentRepository;
  assessment: AssessmentRepository;
  attempt: AttemptRepository;
  progress: ProgressRepository;
  notification: NotificationRepository;
  dispose?: () => void | Promise<void>;
}

export function createInMemoryRepositoryBundle(): RepositoryBundle {
  return {
    participant: createInMemoryParticipantRepository(),
    course: createInMemoryCourseRepository(),
    enrollment: createInMemoryEnrollmentRepository(),
    assessment: createInMemoryAssessmentRepository(),
    attempt: createInMemoryAttemptRepository(),
    progress: createInMemoryProgressRepository(),
    notification: createInMemoryNotificationRepository(),
    dispose: () => {},
  };
}

export function createSQLiteRepositoryBundle(config: AppConfig): RepositoryBundle {
  const client = createSQLiteTenantClient(config.persistence.sqlite);
  return {
    participant: createSQLiteParticipantRepository(client),
    course: createSQLiteCourseRepository(client),
    enrollment: createSQLiteEnrollmentRepository(client),
    assessment: createSQLiteAssessmentRepository(client),
    attempt: createSQLiteAttemptRepository(client),
    progress: createSQLiteProgressRepository(client),
    notification: createSQLiteNotificationRepository(client),
    dispose: () => client.closeAll(),
  };
}

export function createRepositoryBundleFromConfig(config: AppConfig): RepositoryBundle {
  switch (config.persistence.provider) {
    case 'memory':
      return createInMemoryRepositoryBundle();
    case 'sqlite':
    default:
      return createSQLiteRepositoryBundle(config);
  }
}
