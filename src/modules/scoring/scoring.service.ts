import type { Answer, Question } from '../../common/types.js';

export interface GradingResult {
  earnedPoints: number;
  totalPoints: number;
  /** Percentage of total points earned, 0–100 with two decimals. */
  score: number;
  /** An assessment worth zero points always scores 0 rather than failing. */
  zeroTotal: boolean;
}

export type GradableAnswer = Pick<Answer, 'questionId' | 'choiceId'>;

/**
 * `part / whole * 100` rounded half-up to two decimals, or 0 when `whole` is not positive.
 * Computed on a x10000 scale so integer inputs never pick up binary rounding drift
 * before the half-up step.
 */
export function roundedPercentage(part: number, whole: number): number {
  if (!(whole > 0)) {
    return 0;
  }
  return Math.round((part * 10000) / whole) / 100;
}

export function gradeAttempt(questions: readonly Question[], answers: readonly GradableAnswer[]): GradingResult {
  const selected = new Map<string, string>();
  for (const answer of answers) {
    selected.set(answer.questionId, answer.choiceId);
  }
  let earnedPoints = 0;
  let totalPoints = 0;
  for (const question of questions) {
    totalPoints += question.points;
    const choiceId = selected.get(question.id);
    if (choiceId === undefined) {
      continue;
    }
    const choice = question.choices.find(candidate => candidate.id === choiceId);
    if (choice?.correct) {
      earnedPoints += question.points;
    }
  }
  return {
    earnedPoints,
    totalPoints,
    score: roundedPercentage(earnedPoints, totalPoints),
    zeroTotal: totalPoints <= 0,
  };
}
