import { v4 as uuid } from 'uuid';
import type { Answer, Assessment, Attempt } from '../../common/types.js';

export function createAttempt(data: Pick<Attempt, 'tenantId' | 'assessmentId' | 'courseId' | 'learnerId'>): Attempt {
  const now = new Date().toISOString();
  return {
    id: uuid(),
    ...data,
    state: 'in_progress',
    startedAt: now,
    score: null,
    createdAt: now,
    updatedAt: now,
  };
}

export function createAnswer(data: Pick<Answer, 'tenantId' | 'attemptId' | 'questionId' | 'choiceId'>): Answer {
  return { ...data, answeredAt: new Date().toISOString() };
}

export function deadlineOf(attempt: Attempt, assessment: Assessment): number | undefined {
  if (!assessment.timeLimitMinutes || assessment.timeLimitMinutes <= 0) {
    return undefined;
  }
  return Date.parse(attempt.startedAt) + assessment.timeLimitMinutes * 60_000;
}

export function isOverdue(attempt: Attempt, assessment: Assessment, now: Date = new Date()): boolean {
  if (attempt.state !== 'in_progress') {
    return false;
  }
  const deadline = deadlineOf(attempt, assessment);
  return deadline !== undefined && now.getTime() > deadline;
}

export type AttemptView = Attempt & { answers: Answer[] };
