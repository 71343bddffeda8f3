import type { Enrollment } from '../../common/types.js';
import type { EnrollmentRepository } from './enrollment.repository.js';

function pairKey(tenantId: string, courseId: string, enrolleeId: string): string {
  return `${tenantId}::${courseId}::${enrolleeId}`;
}

export function createInMemoryEnrollmentRepository(): EnrollmentRepository {
  const store = new Map<string, Enrollment>();

  const sorted = (list: Enrollment[]) => list.sort((a, b) => a.createdAt.localeCompare(b.createdAt));

  return {
    insertIfAbsent(enrollment) {
      const key = pairKey(enrollment.tenantId, enrollment.courseId, enrollment.enrolleeId);
      const existing = store.get(key);
      if (existing) {
        return { record: existing, created: false };
      }
      store.set(key, enrollment);
      return { record: enrollment, created: true };
    },
    find(tenantId, courseId, enrolleeId) {
      return store.get(pairKey(tenantId, courseId, enrolleeId));
    },
    listByCourse(tenantId, courseId) {
      return sorted(Array.from(store.values()).filter(e => e.tenantId === tenantId && e.courseId === courseId));
    },
    delete(tenantId, courseId, enrolleeId) {
      return store.delete(pairKey(tenantId, courseId, enrolleeId));
    },
  };
}
