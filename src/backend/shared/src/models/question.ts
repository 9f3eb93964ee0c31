/**
 * Question Data Models and Zod Schemas
 *
 * Questions belong to a questionnaire and are ordered within a topic.
 * `maxPoints` is derived from the option configuration by the scoring
 * engine and is never accepted from callers.
 *
 * @tested tests/property/scoring-engine.property.test.ts
 */

import { z } from 'zod';

// Question type enumeration
export const QuestionType = {
  SINGLE_CHOICE: 'single_choice',
  MULTIPLE_CHOICE: 'multiple_choice',
  TEXT: 'text',
  YES_NO: 'yes_no',
} as const;

export type QuestionType = (typeof QuestionType)[keyof typeof QuestionType];

export const QuestionTypeSchema = z.nativeEnum(QuestionType);

export const DEFAULT_QUESTION_WEIGHT = 1;

export const QuestionOptionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1).max(1000),
  points: z.number().int().min(0),
  isCorrect: z.boolean(),
  order: z.number().int().min(1),
});

export type QuestionOption = z.infer<typeof QuestionOptionSchema>;

export const QuestionSchema = z.object({
  id: z.string().min(1),
  questionnaireId: z.string().min(1),
  topicId: z.string().optional(),
  text: z.string().min(1).max(2000),
  description: z.string().max(5000).optional(),
  helpText: z.string().max(2000).optional(),
  type: QuestionTypeSchema,
  order: z.number().int().min(1),
  weight: z.number().int().min(1),
  isMustPass: z.boolean(),
  options: z.array(QuestionOptionSchema),
  maxPoints: z.number().int().min(1),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Question = z.infer<typeof QuestionSchema>;

/**
 * Candidate answer to one question
 */
export const AnswerInputSchema = z.object({
  questionId: z.string().min(1, 'Question ID is required'),
  selectedOptions: z.array(z.string().min(1)).default([]),
  textAnswer: z.string().max(10000).optional(),
});

export type AnswerInput = z.infer<typeof AnswerInputSchema>;

export function isChoiceQuestion(question: Pick<Question, 'type'>): boolean {
  return (
    question.type === QuestionType.SINGLE_CHOICE ||
    question.type === QuestionType.MULTIPLE_CHOICE ||
    question.type === QuestionType.YES_NO
  );
}

export function isTextQuestion(question: Pick<Question, 'type'>): boolean {
  return question.type === QuestionType.TEXT;
}

export function getOptionById(
  question: Pick<Question, 'options'>,
  optionId: string
): QuestionOption | undefined {
  return question.options.find((option) => option.id === optionId);
}

const OptionInputSchema = z.object({
  id: z.string().min(1).optional(),
  text: z.string().trim().min(1, 'Option text is required').max(1000),
  points: z.number().int().min(0).default(0),
  isCorrect: z.boolean().default(false),
  order: z.number().int().min(1).optional(),
});

export type OptionInput = z.input<typeof OptionInputSchema>;

/**
 * Create question request schema
 *
 * @edgecase choice questions without options are rejected
 */
export const CreateQuestionRequestSchema = z
  .object({
    topicId: z.string().min(1).optional(),
    text: z.string().trim().min(1, 'Question text is required').max(2000),
    description: z.string().max(5000).optional(),
    helpText: z.string().max(2000).optional(),
    type: QuestionTypeSchema,
    weight: z.number().int().min(1).optional(),
    isMustPass: z.boolean().default(false),
    options: z.array(OptionInputSchema).max(50).default([]),
  })
  .refine((value) => value.type === QuestionType.TEXT || value.options.length > 0, {
    message: 'Choice questions need at least one option',
    path: ['options'],
  });

export type CreateQuestionRequest = z.input<typeof CreateQuestionRequestSchema>;

export const UpdateQuestionRequestSchema = z.object({
  topicId: z.string().min(1).optional(),
  text: z.string().trim().min(1).max(2000).optional(),
  description: z.string().max(5000).optional(),
  helpText: z.string().max(2000).optional(),
  weight: z.number().int().min(1).optional(),
  isMustPass: z.boolean().optional(),
  options: z.array(OptionInputSchema).max(50).optional(),
});

export type UpdateQuestionRequest = z.input<typeof UpdateQuestionRequestSchema>;

export const ReorderQuestionsRequestSchema = z.object({
  order: z.record(z.string(), z.number().int().min(1)),
});
