/**
 * Verification Policy
 *
 * Grade ordering, validity, report age and expiry rules for CheckFix
 * verifications, plus construction of the verification record from a
 * provider report.
 *
 * @tested tests/property/verification-policy.property.test.ts
 * @edgecase a domain mismatch fails regardless of grade
 * @edgecase maxReportAgeDays <= 0 disables the report age check
 */

import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_MAX_REPORT_AGE_DAYS,
  DEFAULT_MINIMUM_GRADE,
  ErrorCode,
  Grade,
  GradeInputSchema,
  ValidationError,
  VERIFICATION_VALIDITY_DAYS,
  type CheckFixVerification,
  type VerificationReport,
} from '@supplier-compliance/shared';

const DAY_MS = 24 * 60 * 60 * 1000;

export const GRADE_SCORES: Readonly<Record<Grade, number>> = {
  A: 5,
  B: 4,
  C: 3,
  D: 2,
  F: 1,
};

export const PASSING_GRADE: Grade = Grade.C;

export function gradeScore(grade: Grade): number {
  return GRADE_SCORES[grade];
}

/**
 * Positive when `a` is better than `b`
 */
export function compareGrades(a: Grade, b: Grade): number {
  return gradeScore(a) - gradeScore(b);
}

export function meetsMinimum(candidate: Grade, minimum: Grade): boolean {
  return gradeScore(candidate) >= gradeScore(minimum);
}

export function isPassingGrade(grade: Grade): boolean {
  return meetsMinimum(grade, PASSING_GRADE);
}

/**
 * Parses a letter grade, case-insensitively
 */
export function parseGrade(value: string): Grade {
  const result = GradeInputSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(ErrorCode.INVALID_GRADE, `Invalid grade: ${value}`, [
      { field: 'grade', message: 'Grade must be one of A, B, C, D, F', code: ErrorCode.INVALID_GRADE },
    ]);
  }
  return result.data;
}

export function domainsMatch(registered: string, reported: string): boolean {
  return registered.trim().toLowerCase() === reported.trim().toLowerCase();
}

export function isExpired(verification: Pick<CheckFixVerification, 'expiresAt'>, now: Date = new Date()): boolean {
  return now.getTime() > verification.expiresAt.getTime();
}

export function isVerificationValid(verification: CheckFixVerification, now: Date = new Date()): boolean {
  return verification.verificationValid && !isExpired(verification, now) && verification.domainMatch;
}

/**
 * Whole days since the report was issued
 */
export function reportAgeDays(verification: Pick<CheckFixVerification, 'reportDate'>, now: Date = new Date()): number {
  return Math.floor((now.getTime() - verification.reportDate.getTime()) / DAY_MS);
}

export function isReportTooOld(
  verification: Pick<CheckFixVerification, 'reportDate'>,
  maxAgeDays: number,
  now: Date = new Date()
): boolean {
  if (maxAgeDays <= 0) {
    return false;
  }
  return reportAgeDays(verification, now) > maxAgeDays;
}

export function daysUntilExpiry(verification: Pick<CheckFixVerification, 'expiresAt'>, now: Date = new Date()): number {
  return Math.trunc((verification.expiresAt.getTime() - now.getTime()) / DAY_MS);
}

/**
 * Advisory only; nothing is changed
 */
export function needsRefresh(
  verification: Pick<CheckFixVerification, 'expiresAt'>,
  daysBeforeExpiry: number,
  now: Date = new Date()
): boolean {
  return isExpired(verification, now) || daysUntilExpiry(verification, now) <= daysBeforeExpiry;
}

export function refreshVerification(verification: CheckFixVerification, now: Date = new Date()): CheckFixVerification {
  return {
    ...verification,
    verifiedAt: now,
    expiresAt: new Date(now.getTime() + VERIFICATION_VALIDITY_DAYS * DAY_MS),
    updatedAt: now,
  };
}

export interface VerificationEvaluation {
  passed: boolean;
  message: string;
}

/**
 * Evaluates a verification against requirement thresholds. Checks run in a
 * fixed order and the first failure is reported.
 */
export function evaluateVerification(
  verification: CheckFixVerification,
  minimumGrade: Grade = DEFAULT_MINIMUM_GRADE,
  maxReportAgeDays: number = DEFAULT_MAX_REPORT_AGE_DAYS,
  now: Date = new Date()
): VerificationEvaluation {
  if (!verification.verificationValid || isExpired(verification, now)) {
    return { passed: false, message: 'Verification has expired' };
  }
  if (!verification.domainMatch) {
    return { passed: false, message: 'Domain does not match organization' };
  }
  if (!meetsMinimum(verification.overallGrade, minimumGrade)) {
    return {
      passed: false,
      message: `Grade ${verification.overallGrade} does not meet minimum ${minimumGrade}`,
    };
  }
  if (isReportTooOld(verification, maxReportAgeDays, now)) {
    return {
      passed: false,
      message: `Report is ${reportAgeDays(verification, now)} days old, maximum is ${maxReportAgeDays} days`,
    };
  }
  return { passed: true, message: 'CheckFix verification successful' };
}

export function passesRequirement(
  verification: CheckFixVerification,
  minimumGrade: Grade = DEFAULT_MINIMUM_GRADE,
  maxReportAgeDays: number = DEFAULT_MAX_REPORT_AGE_DAYS,
  now: Date = new Date()
): boolean {
  return evaluateVerification(verification, minimumGrade, maxReportAgeDays, now).passed;
}

export interface VerificationContext {
  responseId: string;
  attempt: number;
  supplierId: string;
  /** Domain registered on the supplier organization */
  domain: string;
  id?: string;
  now?: Date;
}

/**
 * Builds a verification record from a provider report
 */
export function buildVerification(
  report: VerificationReport,
  context: VerificationContext
): CheckFixVerification {
  const now = context.now ?? new Date();
  return {
    id: context.id ?? uuidv4(),
    responseId: context.responseId,
    attempt: context.attempt,
    supplierId: context.supplierId,
    domain: context.domain,
    verifiedDomain: report.domain,
    domainMatch: domainsMatch(context.domain, report.domain),
    reportHash: report.reportHash,
    reportDate: report.reportDate,
    overallGrade: report.overallGrade,
    overallScore: report.overallScore,
    categoryGrades: report.categoryGrades.map((category) => ({ ...category })),
    criticalFindings: report.criticalFindings,
    highFindings: report.highFindings,
    mediumFindings: report.mediumFindings,
    lowFindings: report.lowFindings,
    verifiedAt: now,
    verificationValid: true,
    expiresAt: new Date(now.getTime() + VERIFICATION_VALIDITY_DAYS * DAY_MS),
    createdAt: now,
    updatedAt: now,
  };
}
