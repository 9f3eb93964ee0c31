/**
 * Supplier Response Data Models and Zod Schemas
 *
 * A response is the supplier's work product against one requirement. It
 * holds draft answers while in progress and a denormalized copy of the
 * result (score, pass verdict, grade) once submitted.
 *
 * @tested tests/integration/submission-orchestrator.integration.test.ts
 */

import { z } from 'zod';
import { GradeSchema } from './verification.js';

export const DraftAnswerSchema = z.object({
  questionId: z.string().min(1),
  selectedOptions: z.array(z.string().min(1)),
  textAnswer: z.string().optional(),
  savedAt: z.coerce.date(),
});

export type DraftAnswer = z.infer<typeof DraftAnswerSchema>;

/**
 * Result of an earlier attempt, kept when a response is reopened
 */
export const ResponseAttemptSchema = z.object({
  attempt: z.number().int().min(1),
  submissionId: z.string().optional(),
  verificationId: z.string().optional(),
  score: z.number().int().optional(),
  maxScore: z.number().int().optional(),
  passed: z.boolean().optional(),
  grade: GradeSchema.optional(),
  submittedAt: z.coerce.date().optional(),
  reviewedByUserId: z.string().optional(),
  reviewedAt: z.coerce.date().optional(),
  reviewNotes: z.string().optional(),
});

export type ResponseAttempt = z.infer<typeof ResponseAttemptSchema>;

export const SupplierResponseSchema = z.object({
  id: z.string().min(1),
  requirementId: z.string().min(1),
  supplierId: z.string().min(1),
  attempt: z.number().int().min(1),
  startedAt: z.coerce.date(),
  submittedAt: z.coerce.date().optional(),
  submissionId: z.string().optional(),
  verificationId: z.string().optional(),
  score: z.number().int().optional(),
  maxScore: z.number().int().optional(),
  passed: z.boolean().optional(),
  grade: GradeSchema.optional(),
  draftAnswers: z.array(DraftAnswerSchema),
  reviewedByUserId: z.string().optional(),
  reviewedAt: z.coerce.date().optional(),
  reviewNotes: z.string().optional(),
  previousAttempts: z.array(ResponseAttemptSchema),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type SupplierResponse = z.infer<typeof SupplierResponseSchema>;

export function isResponseSubmitted(response: SupplierResponse): boolean {
  return response.submittedAt !== undefined;
}

export function isResponseReviewed(response: SupplierResponse): boolean {
  return response.reviewedAt !== undefined;
}

/**
 * Score as a percentage of max score, 0 when no score is recorded
 */
export function responseScorePercentage(response: SupplierResponse): number {
  if (response.score === undefined || !response.maxScore) {
    return 0;
  }
  return (response.score / response.maxScore) * 100;
}

export function responseCompletionTimeMinutes(response: SupplierResponse): number {
  if (!response.submittedAt) {
    return 0;
  }
  return Math.floor((response.submittedAt.getTime() - response.startedAt.getTime()) / 60000);
}

export const SaveDraftRequestSchema = z.object({
  answers: z
    .array(
      z.object({
        questionId: z.string().min(1, 'Question ID is required'),
        selectedOptions: z.array(z.string().min(1)).default([]),
        textAnswer: z.string().max(10000).optional(),
      })
    )
    .min(1, 'At least one answer is required')
    .max(500),
});

export type SaveDraftRequest = z.input<typeof SaveDraftRequestSchema>;

export const ReviewRequestSchema = z.object({
  notes: z.string().trim().max(5000).default(''),
});

export const RejectRequestSchema = z.object({
  reason: z.string().trim().min(1, 'A reason is required').max(5000),
});
