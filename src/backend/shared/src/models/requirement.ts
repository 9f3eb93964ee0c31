/**
 * Requirement Data Models and Zod Schemas
 *
 * A requirement is one compliance obligation a Company assigns to a Supplier
 * under an active relationship. The two kinds share a status machine but
 * carry different configuration, so the model is a tagged union on `type`.
 *
 * @tested tests/property/requirement-state-machine.property.test.ts
 */

import { z } from 'zod';
import { statusChangeSchema, type StatusChange } from './status-history.js';
import {
  DEFAULT_MAX_REPORT_AGE_DAYS,
  DEFAULT_MINIMUM_GRADE,
  GradeInputSchema,
  GradeSchema,
} from './verification.js';

// Requirement type enumeration
export const RequirementType = {
  QUESTIONNAIRE: 'questionnaire',
  CHECKFIX: 'checkfix',
} as const;

export type RequirementType = (typeof RequirementType)[keyof typeof RequirementType];

// Requirement status enumeration
export const RequirementStatus = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  SUBMITTED: 'submitted',
  UNDER_REVIEW: 'under_review',
  REJECTED: 'rejected',
  APPROVED: 'approved',
  EXPIRED: 'expired',
} as const;

export type RequirementStatus = (typeof RequirementStatus)[keyof typeof RequirementStatus];

// Priority enumeration
export const Priority = {
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const RequirementTypeSchema = z.nativeEnum(RequirementType);
export const RequirementStatusSchema = z.nativeEnum(RequirementStatus);
export const PrioritySchema = z.nativeEnum(Priority);

export type RequirementStatusChange = StatusChange<RequirementStatus>;

export const RequirementStatusChangeSchema = statusChangeSchema(RequirementStatusSchema);

const RequirementBaseSchema = z.object({
  id: z.string().min(1),
  relationshipId: z.string().min(1),
  companyId: z.string().min(1),
  supplierId: z.string().min(1),
  title: z.string().min(1).max(200),
  description: z.string().max(5000).optional(),
  priority: PrioritySchema,
  dueDate: z.coerce.date().optional(),
  reminderSentAt: z.coerce.date().optional(),
  status: RequirementStatusSchema,
  statusHistory: z.array(RequirementStatusChangeSchema),
  assignedByUserId: z.string().min(1),
  assignedAt: z.coerce.date(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export const QuestionnaireRequirementSchema = RequirementBaseSchema.extend({
  type: z.literal(RequirementType.QUESTIONNAIRE),
  questionnaireId: z.string().min(1),
  passingScore: z.number().int().min(0).max(100).optional(),
});

export const CheckFixRequirementSchema = RequirementBaseSchema.extend({
  type: z.literal(RequirementType.CHECKFIX),
  minimumGrade: GradeSchema,
  maxReportAgeDays: z.number().int(),
});

/**
 * Requirement schema, discriminated on `type`
 */
export const RequirementSchema = z.discriminatedUnion('type', [
  QuestionnaireRequirementSchema,
  CheckFixRequirementSchema,
]);

export type QuestionnaireRequirement = z.infer<typeof QuestionnaireRequirementSchema>;
export type CheckFixRequirement = z.infer<typeof CheckFixRequirementSchema>;
export type Requirement = z.infer<typeof RequirementSchema>;

export function isQuestionnaireRequirement(
  requirement: Requirement
): requirement is QuestionnaireRequirement {
  return requirement.type === RequirementType.QUESTIONNAIRE;
}

export function isCheckFixRequirement(requirement: Requirement): requirement is CheckFixRequirement {
  return requirement.type === RequirementType.CHECKFIX;
}

const CreateRequirementBaseSchema = z.object({
  relationshipId: z.string().min(1, 'Relationship ID is required'),
  title: z.string().trim().min(1, 'Title is required').max(200),
  description: z.string().max(5000).optional(),
  priority: PrioritySchema.optional(),
  dueDate: z.coerce.date().optional(),
});

/**
 * Create request schema
 *
 * @edgecase checkfix config falls back to grade C and 90 days when omitted
 */
export const CreateRequirementRequestSchema = z.discriminatedUnion('type', [
  CreateRequirementBaseSchema.extend({
    type: z.literal(RequirementType.QUESTIONNAIRE),
    questionnaireId: z.string().min(1, 'Questionnaire ID is required'),
    passingScore: z.number().int().min(0).max(100).optional(),
  }),
  CreateRequirementBaseSchema.extend({
    type: z.literal(RequirementType.CHECKFIX),
    minimumGrade: GradeInputSchema.default(DEFAULT_MINIMUM_GRADE),
    maxReportAgeDays: z.number().int().default(DEFAULT_MAX_REPORT_AGE_DAYS),
  }),
]);

export type CreateRequirementRequest = z.input<typeof CreateRequirementRequestSchema>;

/**
 * Update request schema. Kind-specific fields are only applied when they
 * match the requirement's type.
 */
export const UpdateRequirementRequestSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(5000).optional(),
  priority: PrioritySchema.optional(),
  dueDate: z.coerce.date().optional(),
  passingScore: z.number().int().min(0).max(100).optional(),
  minimumGrade: GradeInputSchema.optional(),
  maxReportAgeDays: z.number().int().optional(),
});

export type UpdateRequirementRequest = z.input<typeof UpdateRequirementRequestSchema>;

export interface RequirementStats {
  total: number;
  pending: number;
  inProgress: number;
  submitted: number;
  underReview: number;
  approved: number;
  rejected: number;
  expired: number;
  overdue: number;
}
