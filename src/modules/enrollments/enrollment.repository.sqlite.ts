import type { Enrollment } from '../../common/types.js';
import { readString, type SQLiteRow, type SQLiteTenantClient } from '../../infrastructure/sqlite/client.js';
import type { EnrollmentRepository } from './enrollment.repository.js';

const SELECT_COLUMNS = `
  SELECT id, tenant_id AS tenantId, course_id AS courseId, enrollee_id AS enrolleeId,
         created_at AS createdAt, updated_at AS updatedAt
  FROM enrollments
`;

function rowToEnrollment(row: SQLiteRow): Enrollment {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    courseId: readString(row, 'courseId'),
    enrolleeId: readString(row, 'enrolleeId'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

export function createSQLiteEnrollmentRepository(client: SQLiteTenantClient): EnrollmentRepository {
  const find = (tenantId: string, courseId: string, enrolleeId: string) => {
    const row = client.getConnection(tenantId)
      .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND course_id = ? AND enrollee_id = ?`)
      .get(tenantId, courseId, enrolleeId);
    return row ? rowToEnrollment(row) : undefined;
  };

  return {
    insertIfAbsent(enrollment) {
      client.getConnection(enrollment.tenantId).prepare(`
        INSERT INTO enrollments (id, tenant_id, course_id, enrollee_id, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(tenant_id, enrollee_id, course_id) DO NOTHING
      `).run(
        enrollment.id,
        enrollment.tenantId,
        enrollment.courseId,
        enrollment.enrolleeId,
        enrollment.createdAt,
        enrollment.updatedAt,
      );
      const stored = find(enrollment.tenantId, enrollment.courseId, enrollment.enrolleeId);
      if (!stored) {
        throw new Error(`Enrollment ${enrollment.id} was not persisted`);
      }
      return { record: stored, created: stored.id === enrollment.id };
    },
    find,
    listByCourse(tenantId, courseId) {
      return client.getConnection(tenantId)
        .prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND course_id = ? ORDER BY created_at ASC`)
        .all(tenantId, courseId)
        .map(rowToEnrollment);
    },
    delete(tenantId, courseId, enrolleeId) {
      const { changes } = client.getConnection(tenantId)
        .prepare('DELETE FROM enrollments WHERE tenant_id = ? AND course_id = ? AND enrollee_id = ?')
        .run(tenantId, courseId, enrolleeId);
      return changes > 0;
    },
  };
}
