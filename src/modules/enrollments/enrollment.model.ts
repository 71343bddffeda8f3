import { v4 as uuid } from 'uuid';
import type { Enrollment } from '../../common/types.js';

export function createEnrollment(input: { tenantId: string; courseId: string; enrolleeId: string }): Enrollment {
  const now = new Date().toISOString();
  return { id: uuid(), ...input, createdAt: now, updatedAt: now };
}
