import { v4 as uuid } from 'uuid';
import type { Assessment, Choice, Question, QuestionKind } from '../../common/types.js';

export interface ChoiceInput {
  id?: string;
  text: string;
  correct: boolean;
}

export interface QuestionInput {
  id?: string;
  kind: QuestionKind;
  prompt: string;
  points: number;
  choices: ChoiceInput[];
}

export interface AssessmentInput {
  tenantId: string;
  courseId: string;
  title: string;
  description?: string;
  timeLimitMinutes?: number;
  questions: QuestionInput[];
}

export function createAssessment(input: AssessmentInput): Assessment {
  const now = new Date().toISOString();
  const questions: Question[] = input.questions.map(question => ({
    id: question.id ?? uuid(),
    kind: question.kind,
    prompt: question.prompt.trim(),
    points: question.points,
    choices: question.choices.map((choice): Choice => ({
      id: choice.id ?? uuid(),
      text: choice.text.trim(),
      correct: choice.correct,
    })),
  }));
  return {
    id: uuid(),
    tenantId: input.tenantId,
    courseId: input.courseId,
    title: input.title.trim(),
    description: input.description?.trim() || undefined,
    status: 'draft',
    timeLimitMinutes: input.timeLimitMinutes,
    questions,
    createdAt: now,
    updatedAt: now,
  };
}

export function publishAssessment(assessment: Assessment): Assessment {
  if (assessment.status === 'published') {
    return assessment;
  }
  const now = new Date().toISOString();
  return { ...assessment, status: 'published', publishedAt: now, updatedAt: now };
}

/**
 * Supported question kinds expect exactly one correct choice. The data model does
 * not enforce it, so authoring only reports the questions that deviate.
 */
export function findChoiceIntegrityIssues(assessment: Assessment): Array<{ questionId: string; correctChoices: number }> {
  return assessment.questions
    .map(question => ({ questionId: question.id, correctChoices: question.choices.filter(choice => choice.correct).length }))
    .filter(issue => issue.correctChoices !== 1);
}

export function findQuestion(assessment: Assessment, questionId: string): Question | undefined {
  return assessment.questions.find(question => question.id === questionId);
}

export type LearnerQuestionView = Omit<Question, 'choices'> & { choices: Array<Omit<Choice, 'correct'>> };

export type LearnerAssessmentView = Omit<Assessment, 'questions'> & { questions: LearnerQuestionView[] };

export function toLearnerView(assessment: Assessment): LearnerAssessmentView {
  return {
    ...assessment,
    questions: assessment.questions.map(question => ({
      ...question,
      choices: question.choices.map(({ id, text }) => ({ id, text })),
    })),
  };
}
