import type { FastifyInstance } from 'fastify';
import type { NotificationFanout } from './notification.service.js';
import { idParamsSchema, requireActor } from '../../common/http.js';

export interface NotificationRoutesOptions {
  notificationFanout: NotificationFanout;
}

export async function notificationRoutes(app: FastifyInstance, options: NotificationRoutesOptions) {
  const { notificationFanout } = options;

  app.get('/', { schema: { tags: ['Notifications'], summary: 'Notifications for the caller, newest first' } }, async req => {
    const recipientId = requireActor(req);
    return notificationFanout.listForRecipient(req.tenantId, recipientId);
  });

  app.post('/:id/read', { schema: { tags: ['Notifications'], summary: 'Mark a notification as read' } }, async req => {
    const recipientId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    return notificationFanout.markRead(req.tenantId, recipientId, id);
  });
}
