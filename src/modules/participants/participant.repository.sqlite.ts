import type { Participant } from '../../common/types.js';
import { PARTICIPANT_LABELS, type ParticipantLabel } from '../../common/types.js';
import {
  readString,
  type SQLiteRow,
  type SQLiteTenantClient,
} from '../../infrastructure/sqlite/client.js';
import type { ParticipantRepository } from './participant.repository.js';

const SELECT_COLUMNS = `
  SELECT id, tenant_id AS tenantId, email, display_name AS displayName, label,
         created_at AS createdAt, updated_at AS updatedAt
  FROM participants
`;

function toLabel(value: string): ParticipantLabel {
  const label = PARTICIPANT_LABELS.find(candidate => candidate === value);
  return label ?? 'enrollee';
}

function rowToParticipant(row: SQLiteRow): Participant {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    email: readString(row, 'email'),
    displayName: readString(row, 'displayName'),
    label: toLabel(readString(row, 'label')),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

export function createSQLiteParticipantRepository(client: SQLiteTenantClient): ParticipantRepository {
  return {
    save(participant) {
      const db = client.getConnection(participant.tenantId);
      db.prepare(`
        INSERT INTO participants (id, tenant_id, email, display_name, label, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          email = excluded.email,
          display_name = excluded.display_name,
          label = excluded.label,
          updated_at = excluded.updated_at
      `).run(
        participant.id,
        participant.tenantId,
        participant.email,
        participant.displayName,
        participant.label,
        participant.createdAt,
        participant.updatedAt,
      );
      return participant;
    },
    getById(tenantId, id) {
      const row = client.getConnection(tenantId)
        .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND id = ?`)
        .get(tenantId, id);
      return row ? rowToParticipant(row) : undefined;
    },
    getByEmail(tenantId, email) {
      const row = client.getConnection(tenantId)
        .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND email = ?`)
        .get(tenantId, email.trim().toLowerCase());
      return row ? rowToParticipant(row) : undefined;
    },
  };
}
