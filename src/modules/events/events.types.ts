import type { CompletionReason, ContentRef } from '../../common/types.js';

export const EVENT_TYPES = {
  AttemptStarted: 'AttemptStarted',
  AttemptCompleted: 'AttemptCompleted',
  LessonCompleted: 'LessonCompleted',
  ContentPublished: 'ContentPublished',
  NotificationFanoutCompleted: 'NotificationFanoutCompleted',
} as const;

export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];

export interface EventPayloads {
  AttemptStarted: { attemptId: string; assessmentId: string; learnerId: string };
  AttemptCompleted: { attemptId: string; assessmentId: string; learnerId: string; score: number; reason: CompletionReason };
  LessonCompleted: { learnerId: string; courseId: string; lessonId: string; percentage: number };
  ContentPublished: { courseId: string; contentRef: ContentRef };
  NotificationFanoutCompleted: { courseId: string; contentId: string; recipients: number; delivered: number; skipped: number; failed: number };
}
