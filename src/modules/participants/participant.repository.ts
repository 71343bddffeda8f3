import type { Participant } from '../../common/types.js';

export interface ParticipantRepository {
  save(participant: Participant): Participant;
  getById(tenantId: string, id: string): Participant | undefined;
  getByEmail(tenantId: string, email: string): Participant | undefined;
}

export { createInMemoryParticipantRepository } from './participant.repository.memory.js';
export { createSQLiteParticipantRepository } from './participant.repository.sqlite.js';
