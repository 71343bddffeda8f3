import { describe, expect, it } from 'vitest';
import { createAssessment, findChoiceIntegrityIssues, publishAssessment, toLearnerView } from '../assessment.model.js';

const assessment = createAssessment({
  tenantId: 'tenant-1',
  courseId: 'course-1',
  title: ' Unit check ',
  questions: [
    {
      id: 'q1',
      kind: 'MULTIPLE_CHOICE',
      prompt: 'Which is a prime?',
      points: 2,
      choices: [{ id: 'a', text: '4', correct: false }, { id: 'b', text: '7', correct: true }],
    },
    {
      id: 'q2',
      kind: 'MULTIPLE_CHOICE',
      prompt: 'Pick any',
      points: 1,
      choices: [{ id: 'c', text: 'x', correct: true }, { id: 'd', text: 'y', correct: true }],
    },
  ],
});

describe('assessment model', () => {
  it('starts as a trimmed draft and keeps supplied ids', () => {
    expect(assessment.title).toBe('Unit check');
    expect(assessment.status).toBe('draft');
    expect(assessment.questions.map(question => question.id)).toEqual(['q1', 'q2']);
  });

  it('publishes once', () => {
    const published = publishAssessment(assessment);

    expect(published.status).toBe('published');
    expect(published.publishedAt).toBeDefined();
    expect(publishAssessment(published)).toBe(published);
  });

  it('reports questions without exactly one correct choice', () => {
    expect(findChoiceIntegrityIssues(assessment)).toEqual([{ questionId: 'q2', correctChoices: 2 }]);
  });

  it('hides the answer key from learners', () => {
    const view = toLearnerView(assessment);

    expect(view.questions[0]?.choices).toEqual([{ id: 'a', text: '4' }, { id: 'b', text: '7' }]);
    expect(view.questions[0]?.points).toBe(2);
  });
});
