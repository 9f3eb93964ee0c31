/**
 * Questionnaire scoring
 *
 * @file src/backend/compliance-engine/src/scoring/scoring-engine.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  ErrorCode,
  QuestionType,
  type AnswerInput,
  type Question,
  type QuestionOption,
  type QuestionnaireTopic,
} from '@supplier-compliance/shared';
import {
  calculateMaxPoints,
  calculateQuestionScore,
  getFailedMustPassCount,
  getWeakestTopics,
  scoreSubmission,
  validateAnswer,
  weightedMaxPoints,
} from '@supplier-compliance/engine';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const NOW = new Date('2026-03-02T09:00:00.000Z');

type OptionSpec = Omit<QuestionOption, 'order'>;
type QuestionExtras = Partial<Pick<Question, 'isMustPass' | 'weight' | 'topicId' | 'order'>>;

function buildQuestion(id: string, type: QuestionType, specs: OptionSpec[], extras: QuestionExtras = {}): Question {
  const options = specs.map((spec, index) => ({ ...spec, order: index + 1 }));
  return {
    id,
    questionnaireId: 'questionnaire-1',
    text: `Question ${id}`,
    type,
    order: 1,
    weight: 1,
    isMustPass: false,
    options,
    maxPoints: calculateMaxPoints({ type, options }),
    createdAt: NOW,
    updatedAt: NOW,
    ...extras,
  };
}

const textQuestion = buildQuestion('q-text', QuestionType.TEXT, [], { topicId: 'topic-process', order: 1 });
const controlsQuestion = buildQuestion(
  'q-controls',
  QuestionType.MULTIPLE_CHOICE,
  [
    { id: 'mfa', text: 'Multi-factor authentication', points: 2, isCorrect: true },
    { id: 'backups', text: 'Offline backups', points: 2, isCorrect: true },
    { id: 'none', text: 'None of the above', points: 0, isCorrect: false },
  ],
  { topicId: 'topic-controls', order: 2 }
);

const topics: QuestionnaireTopic[] = [
  { id: 'topic-controls', name: 'Controls', order: 2 },
  { id: 'topic-process', name: 'Process', order: 1 },
  { id: 'topic-empty', name: 'Unused', order: 3 },
];

function answer(questionId: string, selectedOptions: string[] = [], textAnswer?: string): AnswerInput {
  return { questionId, selectedOptions, textAnswer };
}

describe('Scoring engine', () => {
  describe('calculateMaxPoints', () => {
    it('derives the max from the option configuration', () => {
      expect(textQuestion.maxPoints).toBe(1);
      expect(controlsQuestion.maxPoints).toBe(4);
      expect(
        calculateMaxPoints({
          type: QuestionType.SINGLE_CHOICE,
          options: [
            { id: 'a', text: 'A', points: 1, isCorrect: false, order: 1 },
            { id: 'b', text: 'B', points: 3, isCorrect: true, order: 2 },
          ],
        })
      ).toBe(3);
    });

    it('never derives zero', () => {
      expect(
        calculateMaxPoints({
          type: QuestionType.MULTIPLE_CHOICE,
          options: [{ id: 'a', text: 'A', points: 5, isCorrect: false, order: 1 }],
        })
      ).toBe(1);
      expect(
        calculateMaxPoints({
          type: QuestionType.YES_NO,
          options: [
            { id: 'yes', text: 'Yes', points: 0, isCorrect: true, order: 1 },
            { id: 'no', text: 'No', points: 0, isCorrect: false, order: 2 },
          ],
        })
      ).toBe(1);
    });
  });

  describe('scoreSubmission', () => {
    it('a partially answered questionnaire at 60% fails at 70 and passes at 50', () => {
      const answers = [answer('q-text', [], 'We keep a runbook'), answer('q-controls', ['mfa'])];

      const strict = scoreSubmission([textQuestion, controlsQuestion], answers, 70);
      expect(strict).toMatchObject({
        totalScore: 3,
        maxPossibleScore: 5,
        percentageScore: 60,
        passingScore: 70,
        passed: false,
        mustPassFailed: false,
      });

      const lenient = scoreSubmission([textQuestion, controlsQuestion], answers, 50);
      expect(lenient.passed).toBe(true);
    });

    it('rolls answers up per listed topic in topic order', () => {
      const result = scoreSubmission(
        [controlsQuestion, textQuestion],
        [answer('q-text', [], 'Yes'), answer('q-controls', ['mfa'])],
        70,
        topics
      );

      expect(result.topicScores).toEqual([
        { topicId: 'topic-process', topicName: 'Process', score: 1, maxScore: 1, percentage: 100 },
        { topicId: 'topic-controls', topicName: 'Controls', score: 2, maxScore: 4, percentage: 50 },
      ]);
      expect(result.answers.map((scored) => scored.questionId)).toEqual(['q-text', 'q-controls']);
    });

    it('a must-pass question below its max fails the submission at any threshold', () => {
      const mustPass = buildQuestion(
        'q-policy',
        QuestionType.SINGLE_CHOICE,
        [
          { id: 'full', text: 'Documented and reviewed', points: 3, isCorrect: true },
          { id: 'partial', text: 'Documented only', points: 1, isCorrect: false },
        ],
        { isMustPass: true }
      );

      const result = scoreSubmission([mustPass], [answer('q-policy', ['partial'])], 0);

      expect(result.mustPassFailed).toBe(true);
      expect(result.passed).toBe(false);
      expect(result.answers[0].isMustPassMet).toBe(false);
      expect(result.percentageScore).toBeCloseTo(33.333, 2);
      expect(getFailedMustPassCount(result)).toBe(1);

      const met = scoreSubmission([mustPass], [answer('q-policy', ['full'])], 100);
      expect(met.passed).toBe(true);
      expect(met.answers[0].isMustPassMet).toBe(true);
    });

    it('unanswered questions score zero and unknown question ids are ignored', () => {
      const result = scoreSubmission(
        [textQuestion, controlsQuestion],
        [answer('q-missing', ['mfa']), answer('q-controls', ['mfa', 'backups'])],
        70
      );

      expect(result.answers).toHaveLength(2);
      expect(result.answers[0]).toMatchObject({ questionId: 'q-text', pointsEarned: 0, maxPoints: 1 });
      expect(result.totalScore).toBe(4);
      expect(result.percentageScore).toBe(80);
    });

    it('the last answer for a question wins', () => {
      const result = scoreSubmission(
        [controlsQuestion],
        [answer('q-controls', ['mfa', 'backups']), answer('q-controls', ['none'])],
        70
      );

      expect(result.totalScore).toBe(0);
      expect(result.answers[0].selectedOptions).toEqual(['none']);
    });

    it('weight does not change the aggregate', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 10 }), fc.subarray(['mfa', 'backups', 'none']), (weight, selected) => {
          const weighted = { ...controlsQuestion, weight };
          const base = scoreSubmission([controlsQuestion], [answer('q-controls', selected)], 70);
          const result = scoreSubmission([weighted], [answer('q-controls', selected)], 70);

          expect(result.totalScore).toBe(base.totalScore);
          expect(result.maxPossibleScore).toBe(base.maxPossibleScore);
          expect(weightedMaxPoints(weighted)).toBe(4 * weight);
        }),
        propertyConfig
      );
    });

    it('percentage stays within 0 to 100 and passed follows the threshold', () => {
      fc.assert(
        fc.property(
          fc.subarray(['mfa', 'backups', 'none']),
          fc.option(fc.string({ maxLength: 20 }), { nil: undefined }),
          fc.integer({ min: 0, max: 100 }),
          (selected, text, passingScore) => {
            const result = scoreSubmission(
              [textQuestion, controlsQuestion],
              [answer('q-text', [], text), answer('q-controls', selected)],
              passingScore
            );

            expect(result.percentageScore).toBeGreaterThanOrEqual(0);
            expect(result.percentageScore).toBeLessThanOrEqual(100);
            expect(result.passed).toBe(result.percentageScore >= passingScore);
          }
        ),
        propertyConfig
      );
    });
  });

  describe('calculateQuestionScore', () => {
    it('selecting more options never lowers a multiple-choice score', () => {
      fc.assert(
        fc.property(fc.subarray(['mfa', 'backups', 'none']), fc.subarray(['mfa', 'backups', 'none']), (a, b) => {
          const subset = calculateQuestionScore(controlsQuestion, answer('q-controls', a));
          const superset = calculateQuestionScore(controlsQuestion, answer('q-controls', [...a, ...b]));

          expect(superset).toBeGreaterThanOrEqual(subset);
          expect(superset).toBeLessThanOrEqual(controlsQuestion.maxPoints);
        }),
        propertyConfig
      );
    });

    it('single choice needs exactly one selection', () => {
      const question = buildQuestion('q-yes-no', QuestionType.YES_NO, [
        { id: 'yes', text: 'Yes', points: 2, isCorrect: true },
        { id: 'no', text: 'No', points: 0, isCorrect: false },
      ]);

      expect(calculateQuestionScore(question, answer('q-yes-no', ['yes']))).toBe(2);
      expect(calculateQuestionScore(question, answer('q-yes-no', ['yes', 'no']))).toBe(0);
      expect(calculateQuestionScore(question, answer('q-yes-no', []))).toBe(0);
    });

    it('text answers earn the max only when not blank', () => {
      expect(calculateQuestionScore(textQuestion, answer('q-text', [], 'Quarterly reviews'))).toBe(1);
      expect(calculateQuestionScore(textQuestion, answer('q-text', [], '   '))).toBe(0);
      expect(calculateQuestionScore(textQuestion, answer('q-text'))).toBe(0);
    });
  });

  describe('validateAnswer', () => {
    it('reports the wrong shape as INVALID_ANSWER_FORMAT', () => {
      const singleChoice = buildQuestion('q-single', QuestionType.SINGLE_CHOICE, [
        { id: 'a', text: 'A', points: 1, isCorrect: true },
        { id: 'b', text: 'B', points: 0, isCorrect: false },
      ]);

      expect(() => validateAnswer(singleChoice, answer('q-single', ['a', 'b']))).toThrow(
        expect.objectContaining({ code: ErrorCode.INVALID_ANSWER_FORMAT })
      );
      expect(() => validateAnswer(controlsQuestion, answer('q-controls', []))).toThrow(
        expect.objectContaining({ code: ErrorCode.INVALID_ANSWER_FORMAT })
      );
      expect(() => validateAnswer(textQuestion, answer('q-text', [], ''))).toThrow(
        expect.objectContaining({ code: ErrorCode.INVALID_ANSWER_FORMAT })
      );
    });

    it('reports options from another question as INVALID_OPTION_ID', () => {
      expect(() => validateAnswer(controlsQuestion, answer('q-controls', ['mfa', 'firewall']))).toThrow(
        expect.objectContaining({ code: ErrorCode.INVALID_OPTION_ID })
      );
      expect(() => validateAnswer(controlsQuestion, answer('q-controls', ['mfa']))).not.toThrow();
    });
  });

  describe('reporting helpers', () => {
    it('getWeakestTopics orders by percentage', () => {
      const result = scoreSubmission(
        [textQuestion, controlsQuestion],
        [answer('q-text', [], 'Yes'), answer('q-controls', ['mfa'])],
        70,
        topics
      );

      expect(getWeakestTopics(result, 1).map((topic) => topic.topicId)).toEqual(['topic-controls']);
      expect(getWeakestTopics(result, 5)).toHaveLength(2);
      expect(getWeakestTopics(result, -1)).toEqual([]);
    });
  });
});
