/**
 * Questionnaire Submission Data Models and Zod Schemas
 *
 * Immutable, scored snapshot of a questionnaire response.
 *
 * @tested tests/property/scoring-engine.property.test.ts
 */

import { z } from 'zod';
import { AnswerInputSchema } from './question.js';

export const SubmissionAnswerSchema = z.object({
  questionId: z.string().min(1),
  topicId: z.string().optional(),
  selectedOptions: z.array(z.string()),
  textAnswer: z.string().optional(),
  pointsEarned: z.number().int().min(0),
  maxPoints: z.number().int().min(0),
  isMustPassMet: z.boolean().optional(),
});

export type SubmissionAnswer = z.infer<typeof SubmissionAnswerSchema>;

export const TopicScoreSchema = z.object({
  topicId: z.string().min(1),
  topicName: z.string(),
  score: z.number().int().min(0),
  maxScore: z.number().int().min(0),
  percentage: z.number().min(0).max(100),
});

export type TopicScore = z.infer<typeof TopicScoreSchema>;

export const QuestionnaireSubmissionSchema = z.object({
  id: z.string().min(1),
  responseId: z.string().min(1),
  attempt: z.number().int().min(1),
  questionnaireId: z.string().min(1),
  supplierId: z.string().min(1),
  answers: z.array(SubmissionAnswerSchema),
  topicScores: z.array(TopicScoreSchema),
  totalScore: z.number().int().min(0),
  maxPossibleScore: z.number().int().min(0),
  percentageScore: z.number().min(0).max(100),
  passingScore: z.number().int().min(0).max(100),
  passed: z.boolean(),
  mustPassFailed: z.boolean(),
  startedAt: z.coerce.date(),
  submittedAt: z.coerce.date(),
  completionTimeMinutes: z.number().int().min(0),
  createdAt: z.coerce.date(),
});

export type QuestionnaireSubmission = z.infer<typeof QuestionnaireSubmissionSchema>;

export const SubmitQuestionnaireRequestSchema = z.object({
  answers: z.array(AnswerInputSchema).max(500),
});

export type SubmitQuestionnaireRequest = z.input<typeof SubmitQuestionnaireRequestSchema>;
