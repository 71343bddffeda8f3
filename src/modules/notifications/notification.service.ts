import type { FastifyBaseLogger } from 'fastify';
import type { ContentRef, Course, Notification } from '../../common/types.js';
import { AccessDeniedError } from '../../common/errors.js';
import type { InMemoryEventBus } from '../../common/event-bus.js';
import type { CourseRepository } from '../courses/course.repository.js';
import type { EnrollmentRepository } from '../enrollments/enrollment.repository.js';
import type { ParticipantRepository } from '../participants/participant.repository.js';
import type { NotificationRepository } from './notification.repository.js';
import type { Notifier } from './notifier.js';
import { countUnread, createNotification } from './notification.model.js';

export interface FanoutFailure {
  recipientId: string;
  notificationId?: string;
  reason: string;
}

export interface FanoutReport {
  courseId: string;
  contentId: string;
  recipients: number;
  delivered: number;
  skipped: number;
  failures: FanoutFailure[];
}

export interface RecipientInbox {
  notifications: Notification[];
  unreadCount: number;
}

export interface NotificationFanoutDependencies {
  notificationRepository: NotificationRepository;
  enrollmentRepository: EnrollmentRepository;
  participantRepository: ParticipantRepository;
  notifier: Notifier;
  logger: FastifyBaseLogger;
  batchSize: number;
  claimTtlMs: number;
}

export interface NotificationFanout {
  onContentPublished(tenantId: string, course: Course, contentRef: ContentRef): Promise<FanoutReport>;
  listForRecipient(tenantId: string, recipientId: string): RecipientInbox;
  markRead(tenantId: string, recipientId: string, notificationId: string): Notification;
}

type RecipientOutcome =
  | { kind: 'delivered' }
  | { kind: 'skipped' }
  | { kind: 'failed'; failure: FanoutFailure };

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createNotificationFanout(deps: NotificationFanoutDependencies): NotificationFanout {
  const { notificationRepository, enrollmentRepository, participantRepository, notifier, logger } = deps;
  const batchSize = Math.max(1, deps.batchSize);
  const claimTtlMs = Math.max(0, deps.claimTtlMs);

  const deliver = async (tenantId: string, recipientId: string, course: Course, contentRef: ContentRef): Promise<RecipientOutcome> => {
    let notificationId: string | undefined;
    try {
      const recipient = participantRepository.getById(tenantId, recipientId);
      if (!recipient) {
        return { kind: 'failed', failure: { recipientId, reason: 'Recipient not found' } };
      }

      const { record, created } = notificationRepository.insertIfAbsent(
        createNotification({ tenantId, recipientId, course, contentRef }),
      );
      notificationId = record.id;
      if (!created) {
        const now = Date.now();
        const claim = notificationRepository.claimForRetry(
          tenantId,
          record.id,
          new Date(now).toISOString(),
          new Date(now - claimTtlMs).toISOString(),
        );
        if (!claim.applied) {
          return { kind: 'skipped' };
        }
      }

      const result = await notifier.send(recipient, record.title, record.body);
      if (result.ok) {
        notificationRepository.recordDelivery(tenantId, record.id, { status: 'sent', at: new Date().toISOString() });
        return { kind: 'delivered' };
      }
      notificationRepository.recordDelivery(tenantId, record.id, {
        status: result.error.retryable === false ? 'rejected' : 'failed',
        lastError: result.error.message,
        at: new Date().toISOString(),
      });
      return { kind: 'failed', failure: { recipientId, notificationId: record.id, reason: result.error.message } };
    } catch (err) {
      const reason = describeError(err);
      if (notificationId) {
        try {
          notificationRepository.recordDelivery(tenantId, notificationId, { status: 'failed', lastError: reason, at: new Date().toISOString() });
        } catch (recordErr) {
          logger.error({ err: recordErr, notificationId }, 'Failed to record delivery failure');
        }
      }
      return { kind: 'failed', failure: { recipientId, notificationId, reason } };
    }
  };

  return {
    async onContentPublished(tenantId, course, contentRef) {
      // Recipients are the enrollments present when the fan-out starts.
      const recipientIds = enrollmentRepository.listByCourse(tenantId, course.id).map(enrollment => enrollment.enrolleeId);
      const report: FanoutReport = {
        courseId: course.id,
        contentId: contentRef.id,
        recipients: recipientIds.length,
        delivered: 0,
        skipped: 0,
        failures: [],
      };

      for (let offset = 0; offset < recipientIds.length; offset += batchSize) {
        const batch = recipientIds.slice(offset, offset + batchSize);
        const outcomes = await Promise.all(batch.map(recipientId => deliver(tenantId, recipientId, course, contentRef)));
        for (const outcome of outcomes) {
          if (outcome.kind === 'delivered') {
            report.delivered += 1;
          } else if (outcome.kind === 'skipped') {
            report.skipped += 1;
          } else {
            report.failures.push(outcome.failure);
          }
        }
      }

      if (report.failures.length > 0) {
        logger.warn({ courseId: course.id, contentId: contentRef.id, failures: report.failures }, 'Some notifications were not delivered');
      }
      return report;
    },

    listForRecipient(tenantId, recipientId) {
      const notifications = notificationRepository.listByRecipient(tenantId, recipientId);
      return { notifications, unreadCount: countUnread(notifications) };
    },

    markRead(tenantId, recipientId, notificationId) {
      const existing = notificationRepository.getById(tenantId, notificationId);
      if (!existing || existing.recipientId !== recipientId) {
        throw new AccessDeniedError();
      }
      return notificationRepository.markRead(tenantId, notificationId, new Date().toISOString()) ?? existing;
    },
  };
}

export interface FanoutSubscriberDependencies {
  eventBus: InMemoryEventBus;
  courseRepository: CourseRepository;
  notificationFanout: NotificationFanout;
  logger: FastifyBaseLogger;
}

/** Runs the fan-out whenever content is published, off the request path. */
export function registerFanoutSubscriber(deps: FanoutSubscriberDependencies) {
  const { eventBus, courseRepository, notificationFanout, logger } = deps;
  eventBus.subscribe('ContentPublished', async event => {
    const { courseId, contentRef } = event.payload;
    const course = courseRepository.getById(event.tenantId, courseId);
    if (!course) {
      logger.warn({ courseId, contentId: contentRef.id }, 'Published content references an unknown course');
      return;
    }
    const report = await notificationFanout.onContentPublished(event.tenantId, course, contentRef);
    logger.info({
      courseId,
      contentId: contentRef.id,
      recipients: report.recipients,
      delivered: report.delivered,
      skipped: report.skipped,
      failed: report.failures.length,
    }, 'Notification fan-out finished');
    eventBus.publish('NotificationFanoutCompleted', event.tenantId, {
      courseId,
      contentId: contentRef.id,
      recipients: report.recipients,
      delivered: report.delivered,
      skipped: report.skipped,
      failed: report.failures.length,
    });
  });
}
