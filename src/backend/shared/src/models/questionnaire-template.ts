/**
 * Questionnaire Template Data Models and Zod Schemas
 *
 * Templates carry topics and questions that a company copies into a new
 * draft questionnaire. System templates ship with the deployment and are
 * read-only. Custom templates are authored by a company as drafts and
 * published either to that company alone (local) or to everyone (global).
 *
 * @tested tests/integration/template-service.integration.test.ts
 */

import { z } from 'zod';
import { DEFAULT_PASSING_SCORE } from './questionnaire.js';
import { CreateQuestionRequestSchema } from './question.js';

export const TemplateCategory = {
  ISO27001: 'iso27001',
  GDPR: 'gdpr',
  NIS2: 'nis2',
  CUSTOM: 'custom',
} as const;

export type TemplateCategory = (typeof TemplateCategory)[keyof typeof TemplateCategory];

export const TemplateVisibility = {
  DRAFT: 'draft',
  LOCAL: 'local',
  GLOBAL: 'global',
} as const;

export type TemplateVisibility = (typeof TemplateVisibility)[keyof typeof TemplateVisibility];

/** Accepts any letter case, e.g. ISO27001 */
export const TemplateCategorySchema = z.string().trim().toLowerCase().pipe(z.nativeEnum(TemplateCategory));
export const TemplateVisibilitySchema = z.nativeEnum(TemplateVisibility);

export const DEFAULT_TEMPLATE_VERSION = '1.0';
export const DEFAULT_ESTIMATED_MINUTES = 30;

export const TemplateTopicSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  order: z.number().int().min(1),
});

export type TemplateTopic = z.infer<typeof TemplateTopicSchema>;

/** A question as it will be added to questionnaires built from the template */
export const TemplateQuestionSchema = CreateQuestionRequestSchema;

export type TemplateQuestion = z.infer<typeof TemplateQuestionSchema>;

export const QuestionnaireTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(200),
  description: z.string().max(5000).optional(),
  category: z.nativeEnum(TemplateCategory),
  version: z.string().min(1),
  isSystem: z.boolean(),
  createdByOrgId: z.string().optional(),
  createdByUserId: z.string().optional(),
  visibility: TemplateVisibilitySchema,
  defaultPassingScore: z.number().int().min(0).max(100),
  estimatedMinutes: z.number().int().min(1),
  topics: z.array(TemplateTopicSchema),
  questions: z.array(TemplateQuestionSchema),
  tags: z.array(z.string()),
  usageCount: z.number().int().min(0),
  publishedAt: z.coerce.date().optional(),
  publishedByUserId: z.string().optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type QuestionnaireTemplate = z.infer<typeof QuestionnaireTemplateSchema>;

export function isTemplatePublished(template: QuestionnaireTemplate): boolean {
  return template.visibility !== TemplateVisibility.DRAFT;
}

export function isTemplateOwnedBy(template: QuestionnaireTemplate, organizationId: string): boolean {
  return template.createdByOrgId === organizationId;
}

/**
 * System and global templates are visible to everyone; an organization
 * also sees its own templates whatever their visibility.
 */
export function canViewTemplate(template: QuestionnaireTemplate, organizationId: string): boolean {
  return (
    template.isSystem ||
    template.visibility === TemplateVisibility.GLOBAL ||
    isTemplateOwnedBy(template, organizationId)
  );
}

const TemplateTopicInputSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1, 'Topic name is required').max(200),
  description: z.string().max(2000).optional(),
  order: z.number().int().min(1).optional(),
});

export type TemplateTopicInput = z.input<typeof TemplateTopicInputSchema>;

const TagsSchema = z.array(z.string().trim().min(1).max(50)).max(20);

export const CreateTemplateRequestSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  description: z.string().max(5000).optional(),
  category: TemplateCategorySchema,
  version: z.string().trim().min(1).max(20).default(DEFAULT_TEMPLATE_VERSION),
  defaultPassingScore: z.number().int().min(0).max(100).default(DEFAULT_PASSING_SCORE),
  estimatedMinutes: z.number().int().min(1).max(1440).default(DEFAULT_ESTIMATED_MINUTES),
  topics: z.array(TemplateTopicInputSchema).max(100).default([]),
  questions: z.array(TemplateQuestionSchema).max(200).default([]),
  tags: TagsSchema.default([]),
});

export type CreateTemplateRequest = z.input<typeof CreateTemplateRequestSchema>;

export const UpdateTemplateRequestSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(5000).optional(),
  version: z.string().trim().min(1).max(20).optional(),
  defaultPassingScore: z.number().int().min(0).max(100).optional(),
  estimatedMinutes: z.number().int().min(1).max(1440).optional(),
  topics: z.array(TemplateTopicInputSchema).max(100).optional(),
  questions: z.array(TemplateQuestionSchema).max(200).optional(),
  tags: TagsSchema.optional(),
});

export type UpdateTemplateRequest = z.input<typeof UpdateTemplateRequestSchema>;

export const PublishTemplateRequestSchema = z.object({
  visibility: z.string().pipe(
    z.enum([TemplateVisibility.LOCAL, TemplateVisibility.GLOBAL], {
      errorMap: () => ({ message: 'Visibility must be local or global' }),
    })
  ),
});

export type PublishTemplateRequest = z.input<typeof PublishTemplateRequestSchema>;

export const CreateFromTemplateRequestSchema = z.object({
  templateId: z.string().min(1, 'Template ID is required'),
  name: z.string().trim().min(1).max(200).optional(),
});

export type CreateFromTemplateRequest = z.input<typeof CreateFromTemplateRequestSchema>;
