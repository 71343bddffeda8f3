import { v4 as uuid } from 'uuid';
import type { Participant, ParticipantLabel } from '../../common/types.js';

export interface ParticipantInput {
  id?: string;
  tenantId: string;
  email: string;
  displayName?: string;
  label?: ParticipantLabel;
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function createParticipant(input: ParticipantInput): Participant {
  const now = new Date().toISOString();
  const email = normalizeEmail(input.email);
  return {
    id: input.id ?? uuid(),
    tenantId: input.tenantId,
    email,
    displayName: input.displayName?.trim() || email,
    label: input.label ?? 'enrollee',
    createdAt: now,
    updatedAt: now,
  };
}
