import { v4 as uuid } from 'uuid';
import type { ContentRef, Course, Notification } from '../../common/types.js';

export function composeMessage(course: Course, contentRef: ContentRef): { title: string; body: string } {
  const noun = contentRef.kind === 'assessment' ? 'assessment' : 'lesson';
  return {
    title: `New ${noun} in ${course.title}`,
    body: `"${contentRef.title}" is now available.`,
  };
}

export function createNotification(input: {
  tenantId: string;
  recipientId: string;
  course: Course;
  contentRef: ContentRef;
}): Notification {
  const now = new Date().toISOString();
  const { title, body } = composeMessage(input.course, input.contentRef);
  return {
    id: uuid(),
    tenantId: input.tenantId,
    recipientId: input.recipientId,
    courseId: input.course.id,
    contentKind: input.contentRef.kind,
    contentId: input.contentRef.id,
    title,
    body,
    status: 'pending',
    deliveryAttempts: 0,
    createdAt: now,
    updatedAt: now,
  };
}

export function countUnread(notifications: Notification[]): number {
  return notifications.filter(notification => !notification.readAt).length;
}
