/**
 * Scoring Engine
 *
 * Scores questionnaire answers per question and aggregates them into a
 * submission result with topic rollups and a pass/fail verdict.
 *
 * @tested tests/property/scoring-engine.property.test.ts
 * @edgecase unanswered questions earn 0 but their max points still count
 * @edgecase answers for unknown question ids are ignored
 */

import {
  ErrorCode,
  getOptionById,
  QuestionType,
  ValidationError,
  type AnswerInput,
  type Question,
  type QuestionnaireSubmission,
  type QuestionnaireTopic,
  type QuestionOption,
  type SubmissionAnswer,
  type TopicScore,
} from '@supplier-compliance/shared';

/**
 * Aggregated scoring result, before it is persisted as a submission
 */
export interface ScoringResult {
  answers: SubmissionAnswer[];
  topicScores: TopicScore[];
  totalScore: number;
  maxPossibleScore: number;
  percentageScore: number;
  passingScore: number;
  passed: boolean;
  mustPassFailed: boolean;
}

/**
 * Derives the maximum points a question can award from its options.
 *
 * @edgecase a derived value of 0 becomes 1 so every question carries weight
 */
export function calculateMaxPoints(question: Pick<Question, 'type' | 'options'>): number {
  let max = 0;

  if (question.options.length === 0) {
    max = 1;
  } else if (question.type === QuestionType.MULTIPLE_CHOICE) {
    max = question.options
      .filter((option) => option.isCorrect && option.points > 0)
      .reduce((sum, option) => sum + option.points, 0);
  } else {
    max = question.options.reduce((highest, option) => Math.max(highest, option.points), 0);
  }

  return max === 0 ? 1 : max;
}

/**
 * Exposed for reporting. Aggregation uses raw maxPoints.
 */
export function weightedMaxPoints(question: Pick<Question, 'maxPoints' | 'weight'>): number {
  return question.maxPoints * question.weight;
}

function requireOptions(question: Question, selected: readonly string[]): QuestionOption[] {
  return selected.map((optionId) => {
    const option = getOptionById(question, optionId);
    if (!option) {
      throw new ValidationError(
        ErrorCode.INVALID_OPTION_ID,
        `Option ${optionId} does not belong to question ${question.id}`,
        [{ field: 'selectedOptions', message: `Unknown option ${optionId}`, code: ErrorCode.INVALID_OPTION_ID }]
      );
    }
    return option;
  });
}

function formatError(question: Question, message: string): ValidationError {
  return new ValidationError(ErrorCode.INVALID_ANSWER_FORMAT, message, [
    { field: question.id, message, code: ErrorCode.INVALID_ANSWER_FORMAT },
  ]);
}

/**
 * Checks the shape of an answer against its question
 */
export function validateAnswer(question: Question, answer: Pick<AnswerInput, 'selectedOptions' | 'textAnswer'>): void {
  switch (question.type) {
    case QuestionType.SINGLE_CHOICE:
    case QuestionType.YES_NO:
      if (answer.selectedOptions.length !== 1) {
        throw formatError(question, 'Exactly one option must be selected');
      }
      requireOptions(question, answer.selectedOptions);
      return;
    case QuestionType.MULTIPLE_CHOICE:
      if (answer.selectedOptions.length === 0) {
        throw formatError(question, 'At least one option must be selected');
      }
      requireOptions(question, answer.selectedOptions);
      return;
    case QuestionType.TEXT:
      if (!answer.textAnswer || answer.textAnswer.trim() === '') {
        throw formatError(question, 'A text answer is required');
      }
      return;
  }
}

/**
 * Points earned by one answer
 *
 * @edgecase incorrect multiple-choice selections contribute nothing
 */
export function calculateQuestionScore(
  question: Question,
  answer: Pick<AnswerInput, 'selectedOptions' | 'textAnswer'>
): number {
  switch (question.type) {
    case QuestionType.SINGLE_CHOICE:
    case QuestionType.YES_NO: {
      if (answer.selectedOptions.length !== 1) {
        return 0;
      }
      return getOptionById(question, answer.selectedOptions[0])?.points ?? 0;
    }
    case QuestionType.MULTIPLE_CHOICE: {
      const selected = new Set(answer.selectedOptions);
      return question.options
        .filter((option) => option.isCorrect && selected.has(option.id))
        .reduce((sum, option) => sum + option.points, 0);
    }
    case QuestionType.TEXT:
      return answer.textAnswer && answer.textAnswer.trim() !== '' ? question.maxPoints : 0;
  }
}

function scoreAnswer(question: Question, answer: AnswerInput | undefined): SubmissionAnswer {
  const selectedOptions = answer?.selectedOptions ?? [];
  const pointsEarned = answer ? calculateQuestionScore(question, answer) : 0;

  return {
    questionId: question.id,
    topicId: question.topicId,
    selectedOptions: [...selectedOptions],
    textAnswer: answer?.textAnswer,
    pointsEarned,
    maxPoints: question.maxPoints,
    isMustPassMet: question.isMustPass ? pointsEarned >= question.maxPoints : undefined,
  };
}

function percentage(score: number, max: number): number {
  return max > 0 ? (score / max) * 100 : 0;
}

/**
 * Rolls scored answers up per topic. Only topics listed on the
 * questionnaire with a positive max score are reported.
 */
export function calculateTopicScores(
  answers: readonly SubmissionAnswer[],
  topics: readonly QuestionnaireTopic[]
): TopicScore[] {
  return [...topics]
    .sort((a, b) => a.order - b.order)
    .map((topic) => {
      const inTopic = answers.filter((answer) => answer.topicId === topic.id);
      const score = inTopic.reduce((sum, answer) => sum + answer.pointsEarned, 0);
      const maxScore = inTopic.reduce((sum, answer) => sum + answer.maxPoints, 0);
      return {
        topicId: topic.id,
        topicName: topic.name,
        score,
        maxScore,
        percentage: percentage(score, maxScore),
      };
    })
    .filter((topicScore) => topicScore.maxScore > 0);
}

/**
 * Scores a full set of answers against a questionnaire's questions.
 * When an answer list names a question twice, the last answer wins.
 */
export function scoreSubmission(
  questions: readonly Question[],
  answers: readonly AnswerInput[],
  passingScore: number,
  topics: readonly QuestionnaireTopic[] = []
): ScoringResult {
  const byQuestion = new Map<string, AnswerInput>();
  for (const answer of answers) {
    byQuestion.set(answer.questionId, answer);
  }

  const scored = [...questions]
    .sort((a, b) => a.order - b.order)
    .map((question) => scoreAnswer(question, byQuestion.get(question.id)));

  const totalScore = scored.reduce((sum, answer) => sum + answer.pointsEarned, 0);
  const maxPossibleScore = scored.reduce((sum, answer) => sum + answer.maxPoints, 0);
  const percentageScore = percentage(totalScore, maxPossibleScore);
  const mustPassFailed = scored.some((answer) => answer.isMustPassMet === false);

  return {
    answers: scored,
    topicScores: calculateTopicScores(scored, topics),
    totalScore,
    maxPossibleScore,
    percentageScore,
    passingScore,
    passed: !mustPassFailed && percentageScore >= passingScore,
    mustPassFailed,
  };
}

/**
 * Lowest-scoring topics first
 */
export function getWeakestTopics(
  submission: Pick<QuestionnaireSubmission, 'topicScores'>,
  count: number
): TopicScore[] {
  return [...submission.topicScores]
    .sort((a, b) => a.percentage - b.percentage)
    .slice(0, Math.max(0, count));
}

export function getFailedMustPassCount(submission: Pick<QuestionnaireSubmission, 'answers'>): number {
  return submission.answers.filter((answer) => answer.isMustPassMet === false).length;
}
