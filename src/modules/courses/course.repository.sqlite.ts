import type { Course, CourseModule, Lesson, LessonStatus } from '../../common/types.js';
import {
  readNumber,
  readOptionalString,
  readString,
  type SQLiteRow,
  type SQLiteTenantClient,
} from '../../infrastructure/sqlite/client.js';
import type { CourseRepository } from './course.repository.js';

const COURSE_COLUMNS = `
  SELECT id, tenant_id AS tenantId, owner_id AS ownerId, title, description,
         created_at AS createdAt, updated_at AS updatedAt
  FROM courses
`;

const MODULE_COLUMNS = `
  SELECT id, tenant_id AS tenantId, course_id AS courseId, title, position, sequence,
         created_at AS createdAt, updated_at AS updatedAt
  FROM course_modules
`;

const LESSON_COLUMNS = `
  SELECT id, tenant_id AS tenantId, course_id AS courseId, module_id AS moduleId, title, position, sequence,
         status, published_at AS publishedAt, created_at AS createdAt, updated_at AS updatedAt
  FROM lessons
`;

function rowToCourse(row: SQLiteRow): Course {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    ownerId: readString(row, 'ownerId'),
    title: readString(row, 'title'),
    description: readOptionalString(row, 'description'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

function rowToModule(row: SQLiteRow): CourseModule {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    courseId: readString(row, 'courseId'),
    title: readString(row, 'title'),
    position: readNumber(row, 'position'),
    sequence: readNumber(row, 'sequence'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

function rowToLesson(row: SQLiteRow): Lesson {
  const status: LessonStatus = readString(row, 'status') === 'published' ? 'published' : 'draft';
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    courseId: readString(row, 'courseId'),
    moduleId: readString(row, 'moduleId'),
    title: readString(row, 'title'),
    position: readNumber(row, 'position'),
    sequence: readNumber(row, 'sequence'),
    status,
    publishedAt: readOptionalString(row, 'publishedAt'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

function requireRow(row: SQLiteRow | undefined, entity: string, id: string): SQLiteRow {
  if (!row) {
    throw new Error(`${entity} ${id} was not persisted`);
  }
  return row;
}

export function createSQLiteCourseRepository(client: SQLiteTenantClient): CourseRepository {
  return {
    save(course) {
      client.getConnection(course.tenantId).prepare(`
        INSERT INTO courses (id, tenant_id, owner_id, title, description, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          title = excluded.title,
          description = excluded.description,
          updated_at = excluded.updated_at
      `).run(
        course.id,
        course.tenantId,
        course.ownerId,
        course.title,
        course.description ?? null,
        course.createdAt,
        course.updatedAt,
      );
      return course;
    },
    getById(tenantId, id) {
      const row = client.getConnection(tenantId).prepare(`${COURSE_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(tenantId, id);
      return row ? rowToCourse(row) : undefined;
    },
    listByOwner(tenantId, ownerId) {
      return client.getConnection(tenantId)
        .prepare(`${COURSE_COLUMNS} WHERE tenant_id = ? AND owner_id = ? ORDER BY created_at ASC`)
        .all(tenantId, ownerId)
        .map(rowToCourse);
    },
    insertModule(draft) {
      const db = client.getConnection(draft.tenantId);
      // The sequence is computed inside the INSERT so concurrent appends cannot share one.
      db.prepare(`
        INSERT INTO course_modules (id, tenant_id, course_id, title, position, sequence, created_at, updated_at)
        SELECT ?, ?, ?, ?, ?, COALESCE(MAX(sequence), 0) + 1, ?, ?
        FROM course_modules WHERE tenant_id = ? AND course_id = ?
      `).run(
        draft.id,
        draft.tenantId,
        draft.courseId,
        draft.title,
        draft.position,
        draft.createdAt,
        draft.updatedAt,
        draft.tenantId,
        draft.courseId,
      );
      const row = db.prepare(`${MODULE_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(draft.tenantId, draft.id);
      return rowToModule(requireRow(row, 'Module', draft.id));
    },
    getModule(tenantId, courseId, moduleId) {
      const row = client.getConnection(tenantId)
        .prepare(`${MODULE_COLUMNS} WHERE tenant_id = ? AND course_id = ? AND id = ?`)
        .get(tenantId, courseId, moduleId);
      return row ? rowToModule(row) : undefined;
    },
    listModules(tenantId, courseId) {
      return client.getConnection(tenantId)
        .prepare(`${MODULE_COLUMNS} WHERE tenant_id = ? AND course_id = ? ORDER BY position ASC, sequence ASC`)
        .all(tenantId, courseId)
        .map(rowToModule);
    },
    insertLesson(draft) {
      const db = client.getConnection(draft.tenantId);
      db.prepare(`
        INSERT INTO lessons (id, tenant_id, course_id, module_id, title, position, sequence, status, published_at, created_at, updated_at)
        SELECT ?, ?, ?, ?, ?, ?, COALESCE(MAX(sequence), 0) + 1, ?, ?, ?, ?
        FROM lessons WHERE tenant_id = ? AND course_id = ?
      `).run(
        draft.id,
        draft.tenantId,
        draft.courseId,
        draft.moduleId,
        draft.title,
        draft.position,
        draft.status,
        draft.publishedAt ?? null,
        draft.createdAt,
        draft.updatedAt,
        draft.tenantId,
        draft.courseId,
      );
      const row = db.prepare(`${LESSON_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(draft.tenantId, draft.id);
      return rowToLesson(requireRow(row, 'Lesson', draft.id));
    },
    saveLesson(lesson) {
      client.getConnection(lesson.tenantId).prepare(`
        UPDATE lessons
        SET title = ?, position = ?, status = ?, published_at = ?, updated_at = ?
        WHERE tenant_id = ? AND id = ?
      `).run(
        lesson.title,
        lesson.position,
        lesson.status,
        lesson.publishedAt ?? null,
        lesson.updatedAt,
        lesson.tenantId,
        lesson.id,
      );
      return lesson;
    },
    getLesson(tenantId, lessonId) {
      const row = client.getConnection(tenantId).prepare(`${LESSON_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(tenantId, lessonId);
      return row ? rowToLesson(row) : undefined;
    },
    listLessons(tenantId, courseId) {
      return client.getConnection(tenantId)
        .prepare(`${LESSON_COLUMNS} WHERE tenant_id = ? AND course_id = ? ORDER BY position ASC, sequence ASC`)
        .all(tenantId, courseId)
        .map(rowToLesson);
    },
    countPublishedLessons(tenantId, courseId) {
      const row = client.getConnection(tenantId)
        .prepare(`SELECT COUNT(*) AS total FROM lessons WHERE tenant_id = ? AND course_id = ? AND status = 'published'`)
        .get(tenantId, courseId);
      return row ? readNumber(row, 'total') : 0;
    },
  };
}
