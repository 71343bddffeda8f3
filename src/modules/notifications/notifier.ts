import type { FastifyBaseLogger } from 'fastify';
import type { Participant } from '../../common/types.js';

export interface DeliveryError {
  message: string;
  /** `false` marks a permanent rejection that a later fan-out must not resend. */
  retryable?: boolean;
}

export type DeliveryResult = { ok: true } | { ok: false; error: DeliveryError };

/**
 * Boundary to the transport that actually reaches a participant (mail relay, push
 * channel). Implementations report rejection through the result; a thrown error is
 * treated the same way.
 */
export interface Notifier {
  send(recipient: Participant, title: string, body: string): Promise<DeliveryResult>;
}

export function createLoggingNotifier(logger: FastifyBaseLogger): Notifier {
  return {
    async send(recipient, title, body) {
      logger.info({ recipientId: recipient.id, email: recipient.email, title, body }, 'Notification dispatched');
      return { ok: true };
    },
  };
}
