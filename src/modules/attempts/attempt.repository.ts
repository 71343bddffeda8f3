import type { Answer, Attempt, CompletionReason } from '../../common/types.js';
import type { ConditionalWriteResult, InsertResult } from '../../common/repository.js';
import {
  readOptionalNumber,
  readOptionalString,
  readString,
  type SQLiteRow,
  type SQLiteTenantClient,
} from '../../infrastructure/sqlite/client.js';

export interface AttemptGrade {
  score: number;
  earnedPoints: number;
  totalPoints: number;
  gradedAt: string;
}

export interface AttemptCompletion extends AttemptGrade {
  completedAt: string;
  reason: CompletionReason;
}

export interface AttemptRepository {
  /** Insert-or-fetch keyed on (learner, assessment). */
  insertIfAbsent(attempt: Attempt): InsertResult<Attempt>;
  getById(tenantId: string, id: string): Attempt | undefined;
  listByAssessment(tenantId: string, assessmentId: string): Attempt[];
  /** Moves an in-progress attempt to completed; a no-op returning the stored record otherwise. */
  complete(tenantId: string, id: string, completion: AttemptCompletion): ConditionalWriteResult<Attempt>;
  /** Replaces the grade of a completed attempt. */
  saveGrade(tenantId: string, id: string, grade: AttemptGrade): ConditionalWriteResult<Attempt>;
  upsertAnswer(answer: Answer): Answer;
  listAnswers(tenantId: string, attemptId: string): Answer[];
}

function requireAttempt(attempt: Attempt | undefined, id: string): Attempt {
  if (!attempt) {
    throw new Error(`Attempt ${id} does not exist`);
  }
  return attempt;
}

export function createInMemoryAttemptRepository(): AttemptRepository {
  const store = new Map<string, Attempt>();
  const learnerIndex = new Map<string, string>();
  const answers = new Map<string, Map<string, Answer>>();
  const keyOf = (tenantId: string, id: string) => `${tenantId}::${id}`;
  const learnerKeyOf = (tenantId: string, assessmentId: string, learnerId: string) => `${tenantId}::${assessmentId}::${learnerId}`;

  return {
    insertIfAbsent(attempt) {
      const learnerKey = learnerKeyOf(attempt.tenantId, attempt.assessmentId, attempt.learnerId);
      const existingId = learnerIndex.get(learnerKey);
      if (existingId) {
        return { record: requireAttempt(store.get(keyOf(attempt.tenantId, existingId)), existingId), created: false };
      }
      learnerIndex.set(learnerKey, attempt.id);
      store.set(keyOf(attempt.tenantId, attempt.id), attempt);
      return { record: attempt, created: true };
    },
    getById(tenantId, id) {
      return store.get(keyOf(tenantId, id));
    },
    listByAssessment(tenantId, assessmentId) {
      return Array.from(store.values())
        .filter(a => a.tenantId === tenantId && a.assessmentId === assessmentId)
        .sort((a, b) => a.startedAt.localeCompare(b.startedAt));
    },
    complete(tenantId, id, completion) {
      const current = requireAttempt(store.get(keyOf(tenantId, id)), id);
      if (current.state !== 'in_progress') {
        return { record: current, applied: false };
      }
      const next: Attempt = {
        ...current,
        state: 'completed',
        completedAt: completion.completedAt,
        completionReason: completion.reason,
        score: completion.score,
        earnedPoints: completion.earnedPoints,
        totalPoints: completion.totalPoints,
        gradedAt: completion.gradedAt,
        updatedAt: completion.completedAt,
      };
      store.set(keyOf(tenantId, id), next);
      return { record: next, applied: true };
    },
    saveGrade(tenantId, id, grade) {
      const current = requireAttempt(store.get(keyOf(tenantId, id)), id);
      if (current.state !== 'completed') {
        return { record: current, applied: false };
      }
      const next: Attempt = { ...current, ...grade, updatedAt: grade.gradedAt };
      store.set(keyOf(tenantId, id), next);
      return { record: next, applied: true };
    },
    upsertAnswer(answer) {
      const key = keyOf(answer.tenantId, answer.attemptId);
      const byQuestion = answers.get(key) ?? new Map<string, Answer>();
      byQuestion.set(answer.questionId, answer);
      answers.set(key, byQuestion);
      return answer;
    },
    listAnswers(tenantId, attemptId) {
      return Array.from(answers.get(keyOf(tenantId, attemptId))?.values() ?? []);
    },
  };
}

const ATTEMPT_COLUMNS = `
  SELECT id, tenant_id AS tenantId, assessment_id AS assessmentId, course_id AS courseId, learner_id AS learnerId,
         state, started_at AS startedAt, completed_at AS completedAt, completion_reason AS completionReason,
         score, earned_points AS earnedPoints, total_points AS totalPoints, graded_at AS gradedAt,
         created_at AS createdAt, updated_at AS updatedAt
  FROM attempts
`;

function toCompletionReason(value: string | undefined): CompletionReason | undefined {
  if (value === 'submitted' || value === 'expired') {
    return value;
  }
  return undefined;
}

function rowToAttempt(row: SQLiteRow): Attempt {
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenantId'),
    assessmentId: readString(row, 'assessmentId'),
    courseId: readString(row, 'courseId'),
    learnerId: readString(row, 'learnerId'),
    state: readString(row, 'state') === 'completed' ? 'completed' : 'in_progress',
    startedAt: readString(row, 'startedAt'),
    completedAt: readOptionalString(row, 'completedAt'),
    completionReason: toCompletionReason(readOptionalString(row, 'completionReason')),
    score: readOptionalNumber(row, 'score') ?? null,
    earnedPoints: readOptionalNumber(row, 'earnedPoints'),
    totalPoints: readOptionalNumber(row, 'totalPoints'),
    gradedAt: readOptionalString(row, 'gradedAt'),
    createdAt: readString(row, 'createdAt'),
    updatedAt: readString(row, 'updatedAt'),
  };
}

function rowToAnswer(row: SQLiteRow): Answer {
  return {
    tenantId: readString(row, 'tenantId'),
    attemptId: readString(row, 'attemptId'),
    questionId: readString(row, 'questionId'),
    choiceId: readString(row, 'choiceId'),
    answeredAt: readString(row, 'answeredAt'),
  };
}

export function createSQLiteAttemptRepository(client: SQLiteTenantClient): AttemptRepository {
  const getById = (tenantId: string, id: string) => {
    const row = client.getConnection(tenantId).prepare(`${ATTEMPT_COLUMNS} WHERE tenant_id = ? AND id = ?`).get(tenantId, id);
    return row ? rowToAttempt(row) : undefined;
  };

  return {
    insertIfAbsent(attempt) {
      const db = client.getConnection(attempt.tenantId);
      db.prepare(`
        INSERT INTO attempts (id, tenant_id, assessment_id, course_id, learner_id, state, started_at, score, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(tenant_id, learner_id, assessment_id) DO NOTHING
      `).run(
        attempt.id,
        attempt.tenantId,
        attempt.assessmentId,
        attempt.courseId,
        attempt.learnerId,
        attempt.state,
        attempt.startedAt,
        attempt.score,
        attempt.createdAt,
        attempt.updatedAt,
      );
      const row = db
        .prepare(`${ATTEMPT_COLUMNS} WHERE tenant_id = ? AND learner_id = ? AND assessment_id = ?`)
        .get(attempt.tenantId, attempt.learnerId, attempt.assessmentId);
      const stored = requireAttempt(row ? rowToAttempt(row) : undefined, attempt.id);
      return { record: stored, created: stored.id === attempt.id };
    },
    getById,
    listByAssessment(tenantId, assessmentId) {
      return client.getConnection(tenantId)
        .prepare(`${ATTEMPT_COLUMNS} WHERE tenant_id = ? AND assessment_id = ? ORDER BY started_at ASC`)
        .all(tenantId, assessmentId)
        .map(rowToAttempt);
    },
    complete(tenantId, id, completion) {
      const { changes } = client.getConnection(tenantId).prepare(`
        UPDATE attempts
        SET state = 'completed', completed_at = ?, completion_reason = ?, score = ?, earned_points = ?,
            total_points = ?, graded_at = ?, updated_at = ?
        WHERE tenant_id = ? AND id = ? AND state = 'in_progress'
      `).run(
        completion.completedAt,
        completion.reason,
        completion.score,
        completion.earnedPoints,
        completion.totalPoints,
        completion.gradedAt,
        completion.completedAt,
        tenantId,
        id,
      );
      return { record: requireAttempt(getById(tenantId, id), id), applied: changes > 0 };
    },
    saveGrade(tenantId, id, grade) {
      const { changes } = client.getConnection(tenantId).prepare(`
        UPDATE attempts
        SET score = ?, earned_points = ?, total_points = ?, graded_at = ?, updated_at = ?
        WHERE tenant_id = ? AND id = ? AND state = 'completed'
      `).run(grade.score, grade.earnedPoints, grade.totalPoints, grade.gradedAt, grade.gradedAt, tenantId, id);
      return { record: requireAttempt(getById(tenantId, id), id), applied: changes > 0 };
    },
    upsertAnswer(answer) {
      client.getConnection(answer.tenantId).prepare(`
        INSERT INTO answers (tenant_id, attempt_id, question_id, choice_id, answered_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(tenant_id, attempt_id, question_id) DO UPDATE SET
          choice_id = excluded.choice_id,
          answered_at = excluded.answered_at
      `).run(answer.tenantId, answer.attemptId, answer.questionId, answer.choiceId, answer.answeredAt);
      return answer;
    },
    listAnswers(tenantId, attemptId) {
      return client.getConnection(tenantId).prepare(`
        SELECT tenant_id AS tenantId, attempt_id AS attemptId, question_id AS questionId, choice_id AS choiceId,
               answered_at AS answeredAt
        FROM answers
        WHERE tenant_id = ? AND attempt_id = ?
        ORDER BY answered_at ASC, question_id ASC
      `).all(tenantId, attemptId).map(rowToAnswer);
    },
  };
}
