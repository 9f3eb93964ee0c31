/**
 * Verification Data Models and Zod Schemas
 *
 * A CheckFix verification captures an externally issued security-grade
 * report for a supplier's domain, checked against the domain the supplier
 * organization has registered.
 *
 * @tested tests/property/verification-policy.property.test.ts
 */

import { z } from 'zod';

// Letter grade enumeration, best to worst
export const Grade = {
  A: 'A',
  B: 'B',
  C: 'C',
  D: 'D',
  F: 'F',
} as const;

export type Grade = (typeof Grade)[keyof typeof Grade];

export const GradeSchema = z.nativeEnum(Grade);

/**
 * Grade accepting lower-case input ("b" becomes "B")
 */
export const GradeInputSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  GradeSchema
);

/**
 * Number of days a verification stays valid after it was performed
 */
export const VERIFICATION_VALIDITY_DAYS = 30;

export const DEFAULT_MINIMUM_GRADE: Grade = Grade.C;
export const DEFAULT_MAX_REPORT_AGE_DAYS = 90;

export const CategoryGradeSchema = z.object({
  category: z.string().min(1),
  grade: z.string().min(1),
  score: z.number().int(),
});

export type CategoryGrade = z.infer<typeof CategoryGradeSchema>;

/**
 * Report payload returned by the verification provider
 */
export const VerificationReportSchema = z.object({
  reportHash: z.string().min(1),
  domain: z.string().min(1),
  reportDate: z.coerce.date(),
  overallGrade: GradeInputSchema,
  overallScore: z.number().int().min(0).max(100),
  categoryGrades: z.array(CategoryGradeSchema).default([]),
  criticalFindings: z.number().int().min(0).default(0),
  highFindings: z.number().int().min(0).default(0),
  mediumFindings: z.number().int().min(0).default(0),
  lowFindings: z.number().int().min(0).default(0),
});

export type VerificationReport = z.infer<typeof VerificationReportSchema>;

/**
 * CheckFix verification schema
 *
 * @edgecase domainMatch false makes the verification invalid regardless of grade
 */
export const CheckFixVerificationSchema = z.object({
  id: z.string().min(1),
  responseId: z.string().min(1),
  attempt: z.number().int().min(1),
  supplierId: z.string().min(1),
  domain: z.string(),
  verifiedDomain: z.string(),
  domainMatch: z.boolean(),
  reportHash: z.string().min(1),
  reportDate: z.coerce.date(),
  overallGrade: GradeSchema,
  overallScore: z.number().int(),
  categoryGrades: z.array(CategoryGradeSchema),
  criticalFindings: z.number().int().min(0),
  highFindings: z.number().int().min(0),
  mediumFindings: z.number().int().min(0),
  lowFindings: z.number().int().min(0),
  verifiedAt: z.coerce.date(),
  verificationValid: z.boolean(),
  expiresAt: z.coerce.date(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type CheckFixVerification = z.infer<typeof CheckFixVerificationSchema>;

export function totalFindings(verification: CheckFixVerification): number {
  return (
    verification.criticalFindings +
    verification.highFindings +
    verification.mediumFindings +
    verification.lowFindings
  );
}

export function hasCriticalFindings(verification: CheckFixVerification): boolean {
  return verification.criticalFindings > 0;
}

export function getCategoryGrade(
  verification: CheckFixVerification,
  category: string
): CategoryGrade | undefined {
  return verification.categoryGrades.find((grade) => grade.category === category);
}

export const SubmitVerificationRequestSchema = z.object({
  reportHash: z.string().trim().min(1, 'Report hash is required').max(256),
});

export const LinkAccountRequestSchema = z.object({
  accountId: z.string().trim().min(1, 'Account ID is required').max(256),
});

export function validateVerificationReport(data: unknown): VerificationReport {
  return VerificationReportSchema.parse(data);
}

export function safeValidateVerificationReport(
  data: unknown
): z.SafeParseReturnType<unknown, VerificationReport> {
  return VerificationReportSchema.safeParse(data);
}
