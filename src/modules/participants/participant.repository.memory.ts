import type { Participant } from '../../common/types.js';
import type { ParticipantRepository } from './participant.repository.js';

function keyOf(tenantId: string, id: string): string {
  return `${tenantId}::${id}`;
}

function emailKeyOf(tenantId: string, email: string): string {
  return `${tenantId}::${email.trim().toLowerCase()}`;
}

export function createInMemoryParticipantRepository(): ParticipantRepository {
  const store = new Map<string, Participant>();
  const emailIndex = new Map<string, string>();

  return {
    save(participant) {
      const key = keyOf(participant.tenantId, participant.id);
      const previous = store.get(key);
      if (previous && previous.email !== participant.email) {
        emailIndex.delete(emailKeyOf(previous.tenantId, previous.email));
      }
      store.set(key, participant);
      emailIndex.set(emailKeyOf(participant.tenantId, participant.email), key);
      return participant;
    },
    getById(tenantId, id) {
      return store.get(keyOf(tenantId, id));
    },
    getByEmail(tenantId, email) {
      const key = emailIndex.get(emailKeyOf(tenantId, email));
      return key ? store.get(key) : undefined;
    },
  };
}
