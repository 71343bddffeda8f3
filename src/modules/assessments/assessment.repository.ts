import { z } from 'zod';
import type { Assessment } from '../../common/types.js';
import {
  readOptionalNumber,
  readOptionalString,
  readString,
  type SQLiteRow,
  type SQLiteTenantClient,
} from '../../infrastructure/sqlite/client.js';

export interface AssessmentRepository {
  save(assessment: Assessment): Assessment;
  getById(tenantId: string, id: string): Assessment | undefined;
}

export function createInMemoryAssessmentRepository(): AssessmentRepository {
  const store = new Map<string, Assessment>();
  const keyOf = (tenantId: string, id: string) => `${tenantId}::${id}`;
  return {
    save(assessment) {
      store.set(keyOf(assessment.tenantId, assessment.id), assessment);
      return assessment;
    },
    getById(tenantId, id) {
      return store.get(keyOf(tenantId, id));
    },
  };
}

const storedQuestionsSchema = z.array(z.object({
  id: z.string(),
  kind: z.enum(['MULTIPLE_CHOICE', 'TRUE_FALSE']),
  prompt: z.string(),
  points: z.number(),
  choices: z.array(z.object({ id: z.string(), text: z.string(), correct: z.boolean() })),
}));

const SELECT_COLUMNS = `
  SELECT id, tenant_id AS tenantId, course_id AS courseId, title, description, status,
         published_at AS publishedAt, time_limit_minutes AS timeLimitMinutes, questions_json AS questionsJson,
         created_at AS createdAt, updated_at AS updatedAt
  FROM assessments
`;

function rowToAssessment(row: SQLiteRow): Assessment {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    courseId: readString(row, 'courseId'),
    title: readString(row, 'title'),
    description: readOptionalString(row, 'description'),
    status: readString(row, 'status') === 'published' ? 'published' : 'draft',
    publishedAt: readOptionalString(row, 'publishedAt'),
    timeLimitMinutes: readOptionalNumber(row, 'timeLimitMinutes'),
    questions: storedQuestionsSchema.parse(JSON.parse(readString(row, 'questionsJson'))),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

export function createSQLiteAssessmentRepository(client: SQLiteTenantClient): AssessmentRepository {
  return {
    save(assessment) {
      client.getConnection(assessment.tenantId).prepare(`
        INSERT INTO assessments (id, tenant_id, course_id, title, description, status, published_at, time_limit_minutes, questions_json, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          title = excluded.title,
          description = excluded.description,
          status = excluded.status,
          published_at = excluded.published_at,
          time_limit_minutes = excluded.time_limit_minutes,
          questions_json = excluded.questions_json,
          updated_at = excluded.updated_at
      `).run(
        assessment.id,
        assessment.tenantId,
        assessment.courseId,
        assessment.title,
        assessment.description ?? null,
        assessment.status,
        assessment.publishedAt ?? null,
        assessment.timeLimitMinutes ?? null,
        JSON.stringify(assessment.questions),
        assessment.createdAt,
        assessment.updatedAt,
      );
      return assessment;
    },
    getById(tenantId, id) {
      const row = client.getConnection(tenantId).prepare(`${SELECT_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(tenantId, id);
      return row ? rowToAssessment(row) : undefined;
    },
  };
}
