import type { ContentKind, Notification, NotificationStatus } from '../../common/types.js';
import type { ConditionalWriteResult, InsertResult } from '../../common/repository.js';
import {
  readNumber,
  readOptionalString,
  readString,
  type SQLiteRow,
  type SQLiteTenantClient,
} from '../../infrastructure/sqlite/client.js';

export interface DeliveryOutcome {
  status: Exclude<NotificationStatus, 'pending'>;
  lastError?: string;
  at: string;
}

export interface NotificationRepository {
  /** Insert-or-fetch keyed on (recipient, content id). */
  insertIfAbsent(notification: Notification): InsertResult<Notification>;
  /**
   * Moves a notification back to pending so exactly one retry can claim it: a `failed`
   * one, or a `pending` one last touched before `staleBefore`.
   */
  claimForRetry(tenantId: string, id: string, at: string, staleBefore: string): ConditionalWriteResult<Notification>;
  recordDelivery(tenantId: string, id: string, outcome: DeliveryOutcome): Notification;
  getById(tenantId: string, id: string): Notification | undefined;
  listByRecipient(tenantId: string, recipientId: string): Notification[];
  listByContent(tenantId: string, contentId: string): Notification[];
  markRead(tenantId: string, id: string, at: string): Notification | undefined;
}

function requireNotification(notification: Notification | undefined, id: string): Notification {
  if (!notification) {
    throw new Error(`Notification ${id} does not exist`);
  }
  return notification;
}

export function createInMemoryNotificationRepository(): NotificationRepository {
  const store = new Map<string, Notification>();
  const recipientIndex = new Map<string, string>();
  const keyOf = (tenantId: string, id: string) => `${tenantId}::${id}`;
  const recipientKeyOf = (tenantId: string, recipientId: string, contentId: string) => `${tenantId}::${recipientId}::${contentId}`;

  const update = (tenantId: string, id: string, patch: Partial<Notification>) => {
    const current = requireNotification(store.get(keyOf(tenantId, id)), id);
    const next = { ...current, ...patch };
    store.set(keyOf(tenantId, id), next);
    return next;
  };

  const newestFirst = (list: Notification[]) => list.sort((a, b) => b.createdAt.localeCompare(a.createdAt));

  return {
    insertIfAbsent(notification) {
      const key = recipientKeyOf(notification.tenantId, notification.recipientId, notification.contentId);
      const existingId = recipientIndex.get(key);
      if (existingId) {
        return { record: requireNotification(store.get(keyOf(notification.tenantId, existingId)), existingId), created: false };
      }
      recipientIndex.set(key, notification.id);
      store.set(keyOf(notification.tenantId, notification.id), notification);
      return { record: notification, created: true };
    },
    claimForRetry(tenantId, id, at, staleBefore) {
      const current = requireNotification(store.get(keyOf(tenantId, id)), id);
      const abandoned = current.status === 'pending' && current.updatedAt < staleBefore;
      if (current.status !== 'failed' && !abandoned) {
        return { record: current, applied: false };
      }
      return { record: update(tenantId, id, { status: 'pending', updatedAt: at }), applied: true };
    },
    recordDelivery(tenantId, id, outcome) {
      const current = requireNotification(store.get(keyOf(tenantId, id)), id);
      return update(tenantId, id, {
        status: outcome.status,
        lastError: outcome.lastError,
        deliveryAttempts: current.deliveryAttempts + 1,
        updatedAt: outcome.at,
      });
    },
    getById(tenantId, id) {
      return store.get(keyOf(tenantId, id));
    },
    listByRecipient(tenantId, recipientId) {
      return newestFirst(Array.from(store.values()).filter(n => n.tenantId === tenantId && n.recipientId === recipientId));
    },
    listByContent(tenantId, contentId) {
      return newestFirst(Array.from(store.values()).filter(n => n.tenantId === tenantId && n.contentId === contentId));
    },
    markRead(tenantId, id, at) {
      const current = store.get(keyOf(tenantId, id));
      if (!current || current.readAt) {
        return current;
      }
      return update(tenantId, id, { readAt: at, updatedAt: at });
    },
  };
}

const SELECT_COLUMNS = `
  SELECT id, tenant_id AS tenantId, recipient_id AS recipientId, course_id AS courseId, content_kind AS contentKind,
         content_id AS contentId, title, body, status, delivery_attempts AS deliveryAttempts, last_error AS lastError,
         read_at AS readAt, created_at AS createdAt, updated_at AS updatedAt
  FROM notifications
`;

function toStatus(value: string): NotificationStatus {
  if (value === 'sent' || value === 'failed' || value === 'rejected') {
    return value;
  }
  return 'pending';
}

function toContentKind(value: string): ContentKind {
  return value === 'assessment' ? 'assessment' : 'lesson';
}

function rowToNotification(row: SQLiteRow): Notification {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    recipientId: readString(row, 'recipientId'),
    courseId: readString(row, 'courseId'),
    contentKind: toContentKind(readString(row, 'contentKind')),
    contentId: readString(row, 'contentId'),
    title: readString(row, 'title'),
    body: readString(row, 'body'),
    status: toStatus(readString(row, 'status')),
    deliveryAttempts: readNumber(row, 'deliveryAttempts'),
    lastError: readOptionalString(row, 'lastError'),
    readAt: readOptionalString(row, 'readAt'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

export function createSQLiteNotificationRepository(client: SQLiteTenantClient): NotificationRepository {
  const getById = (tenantId: string, id: string) => {
    const row = client.getConnection(tenantId).prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(tenantId, id);
    return row ? rowToNotification(row) : undefined;
  };

  return {
    insertIfAbsent(notification) {
      const db = client.getConnection(notification.tenantId);
      db.prepare(`
        INSERT INTO notifications (id, tenant_id, recipient_id, course_id, content_kind, content_id, title, body, status,
                                   delivery_attempts, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(tenant_id, recipient_id, content_id) DO NOTHING
      `).run(
        notification.id,
        notification.tenantId,
        notification.recipientId,
        notification.courseId,
        notification.contentKind,
        notification.contentId,
        notification.title,
        notification.body,
        notification.status,
        notification.deliveryAttempts,
        notification.createdAt,
        notification.updatedAt,
      );
      const row = db
        .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND recipient_id = ? AND content_id = ?`)
        .get(notification.tenantId, notification.recipientId, notification.contentId);
      const stored = requireNotification(row ? rowToNotification(row) : undefined, notification.id);
      return { record: stored, created: stored.id === notification.id };
    },
    claimForRetry(tenantId, id, at, staleBefore) {
      const { changes } = client.getConnection(tenantId).prepare(`
        UPDATE notifications SET status = 'pending', updated_at = ?
        WHERE tenant_id = ? AND id = ?
          AND (status = 'failed' OR (status = 'pending' AND updated_at < ?))
      `).run(at, tenantId, id, staleBefore);
      return { record: requireNotification(getById(tenantId, id), id), applied: changes > 0 };
    },
    recordDelivery(tenantId, id, outcome) {
      client.getConnection(tenantId).prepare(`
        UPDATE notifications
        SET status = ?, last_error = ?, delivery_attempts = delivery_attempts + 1, updated_at = ?
        WHERE tenant_id = ? AND id = ?
      `).run(outcome.status, outcome.lastError ?? null, outcome.at, tenantId, id);
      return requireNotification(getById(tenantId, id), id);
    },
    getById,
    listByRecipient(tenantId, recipientId) {
      return client.getConnection(tenantId)
        .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND recipient_id = ? ORDER BY created_at DESC`)
        .all(tenantId, recipientId)
        .map(rowToNotification);
    },
    listByContent(tenantId, contentId) {
      return client.getConnection(tenantId)
        .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND content_id = ? ORDER BY created_at DESC`)
        .all(tenantId, contentId)
        .map(rowToNotification);
    },
    markRead(tenantId, id, at) {
      client.getConnection(tenantId)
        .prepare('UPDATE notifications SET read_at = ?, updated_at = ? WHERE tenant_id = ? AND id = ? AND read_at IS NULL')
        .run(at, at, tenantId, id);
      return getById(tenantId, id);
    },
  };
}
