/**
 * Questionnaire Data Models and Zod Schemas
 *
 * Questionnaires are authored as drafts, published for use in requirements
 * and finally archived.
 */

import { z } from 'zod';

// Questionnaire status enumeration
export const QuestionnaireStatus = {
  DRAFT: 'draft',
  PUBLISHED: 'published',
  ARCHIVED: 'archived',
} as const;

export type QuestionnaireStatus = (typeof QuestionnaireStatus)[keyof typeof QuestionnaireStatus];

// Scoring mode enumeration
export const ScoringMode = {
  PERCENTAGE: 'percentage',
  POINTS: 'points',
} as const;

export type ScoringMode = (typeof ScoringMode)[keyof typeof ScoringMode];

export const QuestionnaireStatusSchema = z.nativeEnum(QuestionnaireStatus);
export const ScoringModeSchema = z.nativeEnum(ScoringMode);

export const DEFAULT_PASSING_SCORE = 70;

export const QuestionnaireTopicSchema = z.object({
  id: z.string().min(1),
  name: z.string().trim().min(1).max(200),
  order: z.number().int().min(1),
});

export type QuestionnaireTopic = z.infer<typeof QuestionnaireTopicSchema>;

export const QuestionnaireSchema = z.object({
  id: z.string().min(1),
  companyId: z.string().min(1),
  templateId: z.string().optional(),
  name: z.string().min(1).max(200),
  description: z.string().max(5000).optional(),
  status: QuestionnaireStatusSchema,
  passingScore: z.number().int().min(0).max(100),
  scoringMode: ScoringModeSchema,
  topics: z.array(QuestionnaireTopicSchema),
  questionCount: z.number().int().min(0),
  maxPossibleScore: z.number().int().min(0),
  publishedAt: z.coerce.date().optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Questionnaire = z.infer<typeof QuestionnaireSchema>;

export function isDraft(questionnaire: Questionnaire): boolean {
  return questionnaire.status === QuestionnaireStatus.DRAFT;
}

export function isPublished(questionnaire: Questionnaire): boolean {
  return questionnaire.status === QuestionnaireStatus.PUBLISHED;
}

export function getTopicById(
  questionnaire: Questionnaire,
  topicId: string
): QuestionnaireTopic | undefined {
  return questionnaire.topics.find((topic) => topic.id === topicId);
}

export const CreateQuestionnaireRequestSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  description: z.string().max(5000).optional(),
  passingScore: z.number().int().min(0).max(100).default(DEFAULT_PASSING_SCORE),
  scoringMode: ScoringModeSchema.default(ScoringMode.PERCENTAGE),
  topics: z.array(QuestionnaireTopicSchema).max(100).default([]),
});

export type CreateQuestionnaireRequest = z.input<typeof CreateQuestionnaireRequestSchema>;

export const UpdateQuestionnaireRequestSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(5000).optional(),
  passingScore: z.number().int().min(0).max(100).optional(),
  topics: z.array(QuestionnaireTopicSchema).max(100).optional(),
});

export type UpdateQuestionnaireRequest = z.input<typeof UpdateQuestionnaireRequestSchema>;

export interface QuestionnaireStats {
  total: number;
  draft: number;
  published: number;
  archived: number;
}
