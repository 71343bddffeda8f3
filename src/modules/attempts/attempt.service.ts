import type { FastifyBaseLogger } from 'fastify';
import type { Assessment, Attempt, CompletionReason } from '../../common/types.js';
import {
  AccessDeniedError,
  AttemptExpiredError,
  InvalidReferenceError,
  InvalidStateTransitionError,
  NotPublishedError,
} from '../../common/errors.js';
import type { InMemoryEventBus } from '../../common/event-bus.js';
import type { ConditionalWriteResult } from '../../common/repository.js';
import type { AccessGuard } from '../access/access.guard.js';
import type { AssessmentRepository } from '../assessments/assessment.repository.js';
import { findQuestion } from '../assessments/assessment.model.js';
import { gradeAttempt } from '../scoring/scoring.service.js';
import type { AttemptRepository } from './attempt.repository.js';
import { createAnswer, createAttempt, isOverdue, type AttemptView } from './attempt.model.js';

export interface AttemptManagerDependencies {
  attemptRepository: AttemptRepository;
  assessmentRepository: AssessmentRepository;
  accessGuard: AccessGuard;
  eventBus: InMemoryEventBus;
  logger: FastifyBaseLogger;
}

export interface StartResult {
  attempt: AttemptView;
  created: boolean;
}

export interface AttemptManager {
  start(tenantId: string, learnerId: string, assessmentId: string): StartResult;
  recordAnswer(tenantId: string, learnerId: string, attemptId: string, questionId: string, choiceId: string): AttemptView;
  complete(tenantId: string, learnerId: string, attemptId: string): AttemptView;
  get(tenantId: string, actorId: string, attemptId: string): AttemptView;
  listForAssessment(tenantId: string, ownerId: string, assessmentId: string): Attempt[];
  regrade(tenantId: string, ownerId: string, attemptId: string): AttemptView;
}

/**
 * Lifecycle of a single attempt per (learner, assessment):
 * absent → in_progress → completed. Time limits are enforced lazily on every call.
 */
export function createAttemptManager(deps: AttemptManagerDependencies): AttemptManager {
  const { attemptRepository, assessmentRepository, accessGuard, eventBus, logger } = deps;

  const toView = (attempt: Attempt): AttemptView => ({
    ...attempt,
    answers: attemptRepository.listAnswers(attempt.tenantId, attempt.id),
  });

  const loadAssessment = (tenantId: string, assessmentId: string): Assessment => {
    const assessment = assessmentRepository.getById(tenantId, assessmentId);
    if (!assessment) {
      throw new AccessDeniedError();
    }
    return assessment;
  };

  const finalize = (attempt: Attempt, assessment: Assessment, reason: CompletionReason): ConditionalWriteResult<Attempt> => {
    const answers = attemptRepository.listAnswers(attempt.tenantId, attempt.id);
    const result = gradeAttempt(assessment.questions, answers);
    if (result.zeroTotal) {
      logger.warn({ assessmentId: assessment.id, attemptId: attempt.id }, 'Assessment has no points; scoring attempt as 0');
    }
    const now = new Date().toISOString();
    const { record, applied } = attemptRepository.complete(attempt.tenantId, attempt.id, {
      score: result.score,
      earnedPoints: result.earnedPoints,
      totalPoints: result.totalPoints,
      gradedAt: now,
      completedAt: now,
      reason,
    });
    if (applied) {
      logger.info({ attemptId: record.id, score: record.score, reason }, 'Attempt completed');
      eventBus.publish('AttemptCompleted', record.tenantId, {
        attemptId: record.id,
        assessmentId: record.assessmentId,
        learnerId: record.learnerId,
        score: result.score,
        reason,
      });
    }
    return { record, applied };
  };

  /** `applied` is true only when this call performed the forced completion. */
  const checkExpiry = (attempt: Attempt, assessment: Assessment): ConditionalWriteResult<Attempt> => {
    if (!isOverdue(attempt, assessment)) {
      return { record: attempt, applied: false };
    }
    return finalize(attempt, assessment, 'expired');
  };

  const expireIfOverdue = (attempt: Attempt, assessment: Assessment): Attempt => checkExpiry(attempt, assessment).record;

  // Only the learner who owns the attempt, while still allowed into the course, may act on it.
  const loadOwnAttempt = (tenantId: string, learnerId: string, attemptId: string) => {
    const attempt = attemptRepository.getById(tenantId, attemptId);
    if (!attempt || attempt.learnerId !== learnerId) {
      throw new AccessDeniedError();
    }
    accessGuard.requireCourseAccess(tenantId, learnerId, attempt.courseId);
    const assessment = loadAssessment(tenantId, attempt.assessmentId);
    const { record, applied } = checkExpiry(attempt, assessment);
    return { attempt: record, assessment, expiredNow: applied };
  };

  return {
    start(tenantId, learnerId, assessmentId) {
      const assessment = loadAssessment(tenantId, assessmentId);
      accessGuard.requireCourseAccess(tenantId, learnerId, assessment.courseId);
      if (assessment.status !== 'published') {
        throw new NotPublishedError(assessment.id);
      }
      const { record, created } = attemptRepository.insertIfAbsent(createAttempt({
        tenantId,
        assessmentId: assessment.id,
        courseId: assessment.courseId,
        learnerId,
      }));
      if (created) {
        logger.info({ attemptId: record.id, assessmentId, learnerId }, 'Attempt started');
        eventBus.publish('AttemptStarted', tenantId, { attemptId: record.id, assessmentId, learnerId });
        return { attempt: toView(record), created };
      }
      return { attempt: toView(expireIfOverdue(record, assessment)), created };
    },

    recordAnswer(tenantId, learnerId, attemptId, questionId, choiceId) {
      const { attempt, assessment, expiredNow } = loadOwnAttempt(tenantId, learnerId, attemptId);
      if (attempt.state === 'completed') {
        if (expiredNow) {
          throw new AttemptExpiredError(attempt.id, attempt.score);
        }
        throw new InvalidStateTransitionError();
      }
      const question = findQuestion(assessment, questionId);
      if (!question) {
        throw new InvalidReferenceError(`Question ${questionId} does not belong to assessment ${assessment.id}`);
      }
      if (!question.choices.some(choice => choice.id === choiceId)) {
        throw new InvalidReferenceError(`Choice ${choiceId} does not belong to question ${questionId}`);
      }
      attemptRepository.upsertAnswer(createAnswer({ tenantId, attemptId: attempt.id, questionId, choiceId }));
      return toView(attempt);
    },

    complete(tenantId, learnerId, attemptId) {
      const { attempt, assessment } = loadOwnAttempt(tenantId, learnerId, attemptId);
      if (attempt.state === 'completed') {
        return toView(attempt);
      }
      return toView(finalize(attempt, assessment, 'submitted').record);
    },

    get(tenantId, actorId, attemptId) {
      const attempt = attemptRepository.getById(tenantId, attemptId);
      if (!attempt) {
        throw new AccessDeniedError();
      }
      const course = accessGuard.requireCourseAccess(tenantId, actorId, attempt.courseId);
      if (attempt.learnerId !== actorId && !accessGuard.isOwner(actorId, course)) {
        throw new AccessDeniedError();
      }
      return toView(expireIfOverdue(attempt, loadAssessment(tenantId, attempt.assessmentId)));
    },

    listForAssessment(tenantId, ownerId, assessmentId) {
      const assessment = loadAssessment(tenantId, assessmentId);
      accessGuard.requireCourseOwner(tenantId, ownerId, assessment.courseId);
      return attemptRepository
        .listByAssessment(tenantId, assessmentId)
        .map(attempt => expireIfOverdue(attempt, assessment));
    },

    regrade(tenantId, ownerId, attemptId) {
      const attempt = attemptRepository.getById(tenantId, attemptId);
      if (!attempt) {
        throw new AccessDeniedError();
      }
      accessGuard.requireCourseOwner(tenantId, ownerId, attempt.courseId);
      const assessment = loadAssessment(tenantId, attempt.assessmentId);
      const current = expireIfOverdue(attempt, assessment);
      if (current.state !== 'completed') {
        throw new InvalidStateTransitionError('Only completed attempts can be regraded');
      }
      const result = gradeAttempt(assessment.questions, attemptRepository.listAnswers(tenantId, attemptId));
      const { record } = attemptRepository.saveGrade(tenantId, attemptId, {
        score: result.score,
        earnedPoints: result.earnedPoints,
        totalPoints: result.totalPoints,
        gradedAt: new Date().toISOString(),
      });
      if (record.score !== current.score) {
        logger.info({ attemptId, previousScore: current.score, score: record.score }, 'Attempt regraded');
      }
      return toView(record);
    },
  };
}
