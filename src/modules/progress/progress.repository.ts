import type { ProgressAggregate } from '../../common/types.js';
import type { InsertResult } from '../../common/repository.js';
import {
  readNumber,
  readString,
  type SQLiteRow,
  type SQLiteTenantClient,
} from '../../infrastructure/sqlite/client.js';
import { toAggregate, type ProgressAggregateRecord } from './progress.model.js';

export interface ProgressRepository {
  /** Creates the (learner, course) aggregate with the given snapshot unless it exists. */
  ensureAggregate(record: ProgressAggregateRecord): InsertResult<ProgressAggregate>;
  /** Atomic add-if-absent on the completed set; true when the lesson was newly added. */
  addCompletedLesson(tenantId: string, learnerId: string, courseId: string, lessonId: string, completedAt: string): boolean;
  updateTotal(tenantId: string, learnerId: string, courseId: string, totalLessons: number, updatedAt: string): void;
  get(tenantId: string, learnerId: string, courseId: string): ProgressAggregate | undefined;
  listByCourse(tenantId: string, courseId: string): ProgressAggregate[];
}

export function createInMemoryProgressRepository(): ProgressRepository {
  const records = new Map<string, ProgressAggregateRecord>();
  const completions = new Map<string, Set<string>>();
  const keyOf = (tenantId: string, learnerId: string, courseId: string) => `${tenantId}::${learnerId}::${courseId}`;

  const read = (key: string) => {
    const record = records.get(key);
    return record ? toAggregate(record, Array.from(completions.get(key) ?? [])) : undefined;
  };

  return {
    ensureAggregate(record) {
      const key = keyOf(record.tenantId, record.learnerId, record.courseId);
      const created = !records.has(key);
      if (created) {
        records.set(key, { ...record });
        completions.set(key, new Set());
      }
      const stored = read(key);
      if (!stored) {
        throw new Error(`Progress aggregate ${key} was not persisted`);
      }
      return { record: stored, created };
    },
    addCompletedLesson(tenantId, learnerId, courseId, lessonId, completedAt) {
      const key = keyOf(tenantId, learnerId, courseId);
      const set = completions.get(key) ?? new Set<string>();
      completions.set(key, set);
      if (set.has(lessonId)) {
        return false;
      }
      set.add(lessonId);
      const record = records.get(key);
      if (record) {
        records.set(key, { ...record, updatedAt: completedAt });
      }
      return true;
    },
    updateTotal(tenantId, learnerId, courseId, totalLessons, updatedAt) {
      const key = keyOf(tenantId, learnerId, courseId);
      const record = records.get(key);
      if (record) {
        records.set(key, { ...record, totalLessons, updatedAt });
      }
    },
    get(tenantId, learnerId, courseId) {
      return read(keyOf(tenantId, learnerId, courseId));
    },
    listByCourse(tenantId, courseId) {
      return Array.from(records.entries())
        .filter(([, record]) => record.tenantId === tenantId && record.courseId === courseId)
        .map(([key, record]) => toAggregate(record, Array.from(completions.get(key) ?? [])))
        .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    },
  };
}

const AGGREGATE_COLUMNS = `
  SELECT tenant_id AS tenantId, learner_id AS learnerId, course_id AS courseId, total_lessons AS totalLessons,
         created_at AS createdAt, updated_at AS updatedAt
  FROM progress_aggregates
`;

function rowToRecord(row: SQLiteRow): ProgressAggregateRecord {
  return {
    tenantId: readString(row, 'tenantId'),
    learnerId: readString(row, 'learnerId'),
    courseId: readString(row, 'courseId'),
    totalLessons: readNumber(row, 'totalLessons'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

export function createSQLiteProgressRepository(client: SQLiteTenantClient): ProgressRepository {
  const completedLessonIds = (tenantId: string, learnerId: string, courseId: string) =>
    client.getConnection(tenantId).prepare(`
      SELECT lesson_id AS lessonId FROM progress_completions
      WHERE tenant_id = ? AND learner_id = ? AND course_id = ?
      ORDER BY completed_at ASC, lesson_id ASC
    `).all(tenantId, learnerId, courseId).map(row => readString(row, 'lessonId'));

  const get = (tenantId: string, learnerId: string, courseId: string) => {
    const row = client.getConnection(tenantId)
      .prepare(`${AGGREGATE_COLUMNS} WHERE tenant_id = ? AND learner_id = ? AND course_id = ?`)
      .get(tenantId, learnerId, courseId);
    return row ? toAggregate(rowToRecord(row), completedLessonIds(tenantId, learnerId, courseId)) : undefined;
  };

  return {
    ensureAggregate(record) {
      const { changes } = client.getConnection(record.tenantId).prepare(`
        INSERT INTO progress_aggregates (tenant_id, learner_id, course_id, total_lessons, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(tenant_id, learner_id, course_id) DO NOTHING
      `).run(record.tenantId, record.learnerId, record.courseId, record.totalLessons, record.createdAt, record.updatedAt);
      const stored = get(record.tenantId, record.learnerId, record.courseId);
      if (!stored) {
        throw new Error(`Progress aggregate for ${record.learnerId}/${record.courseId} was not persisted`);
      }
      return { record: stored, created: changes > 0 };
    },
    addCompletedLesson(tenantId, learnerId, courseId, lessonId, completedAt) {
      const db = client.getConnection(tenantId);
      const { changes } = db.prepare(`
        INSERT OR IGNORE INTO progress_completions (tenant_id, learner_id, course_id, lesson_id, completed_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(tenantId, learnerId, courseId, lessonId, completedAt);
      if (changes > 0) {
        db.prepare('UPDATE progress_aggregates SET updated_at = ? WHERE tenant_id = ? AND learner_id = ? AND course_id = ?')
          .run(completedAt, tenantId, learnerId, courseId);
      }
      return changes > 0;
    },
    updateTotal(tenantId, learnerId, courseId, totalLessons, updatedAt) {
      client.getConnection(tenantId)
        .prepare('UPDATE progress_aggregates SET total_lessons = ?, updated_at = ? WHERE tenant_id = ? AND learner_id = ? AND course_id = ?')
        .run(totalLessons, updatedAt, tenantId, learnerId, courseId);
    },
    get,
    listByCourse(tenantId, courseId) {
      return client.getConnection(tenantId)
        .prepare(`${AGGREGATE_COLUMNS} WHERE tenant_id = ? AND course_id = ? ORDER BY created_at ASC`)
        .all(tenantId, courseId)
        .map(rowToRecord)
        .map(record => toAggregate(record, completedLessonIds(tenantId, record.learnerId, courseId)));
    },
  };
}
