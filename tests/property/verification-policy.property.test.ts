/**
 * CheckFix verification policy
 *
 * @file src/backend/compliance-engine/src/verification/verification-policy.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ErrorCode, Grade, type CheckFixVerification, type VerificationReport } from '@supplier-compliance/shared';
import {
  buildVerification,
  compareGrades,
  daysUntilExpiry,
  evaluateVerification,
  gradeScore,
  isExpired,
  isPassingGrade,
  isReportTooOld,
  isVerificationValid,
  meetsMinimum,
  needsRefresh,
  parseGrade,
  passesRequirement,
  refreshVerification,
  reportAgeDays,
} from '@supplier-compliance/engine';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-03-02T09:00:00.000Z');

const gradeArb = fc.constantFrom(...Object.values(Grade));

function report(overrides: Partial<VerificationReport> = {}): VerificationReport {
  return {
    reportHash: 'report-hash-1',
    domain: 'Example.com',
    reportDate: new Date(NOW.getTime() - 10 * DAY_MS),
    overallGrade: Grade.B,
    overallScore: 78,
    categoryGrades: [{ category: 'network', grade: 'B', score: 80 }],
    criticalFindings: 0,
    highFindings: 1,
    mediumFindings: 3,
    lowFindings: 6,
    ...overrides,
  };
}

function verification(overrides: Partial<VerificationReport> = {}, domain = 'example.com'): CheckFixVerification {
  return buildVerification(report(overrides), {
    id: 'verification-1',
    responseId: 'response-1',
    attempt: 1,
    supplierId: 'supplier-1',
    domain,
    now: NOW,
  });
}

describe('Verification policy', () => {
  describe('grades', () => {
    it('orders A above F', () => {
      expect(compareGrades('A', 'B')).toBeGreaterThan(0);
      expect(compareGrades('D', 'F')).toBeGreaterThan(0);
      expect(compareGrades('F', 'C')).toBeLessThan(0);
      expect(['A', 'B', 'C'].every((grade) => isPassingGrade(parseGrade(grade)))).toBe(true);
      expect(isPassingGrade('D')).toBe(false);
      expect(Object.values(Grade).map(gradeScore)).toEqual([5, 4, 3, 2, 1]);
    });

    it('meetsMinimum is reflexive and agrees with compareGrades', () => {
      fc.assert(
        fc.property(gradeArb, gradeArb, (candidate, minimum) => {
          expect(meetsMinimum(candidate, candidate)).toBe(true);
          expect(meetsMinimum(candidate, minimum)).toBe(compareGrades(candidate, minimum) >= 0);
        }),
        propertyConfig
      );
    });

    it('parseGrade accepts any case and rejects other letters', () => {
      expect(parseGrade('b')).toBe('B');
      expect(parseGrade(' a ')).toBe('A');
      expect(() => parseGrade('E')).toThrow(expect.objectContaining({ code: ErrorCode.INVALID_GRADE }));
      expect(() => parseGrade('')).toThrow(expect.objectContaining({ code: ErrorCode.INVALID_GRADE }));
    });
  });

  describe('buildVerification', () => {
    it('copies the report and expires thirty days after verification', () => {
      const built = verification();

      expect(built).toMatchObject({
        id: 'verification-1',
        responseId: 'response-1',
        attempt: 1,
        domain: 'example.com',
        verifiedDomain: 'Example.com',
        domainMatch: true,
        overallGrade: 'B',
        verificationValid: true,
        verifiedAt: NOW,
      });
      expect(built.expiresAt).toEqual(new Date(NOW.getTime() + 30 * DAY_MS));
      expect(reportAgeDays(built, NOW)).toBe(10);
      expect(isVerificationValid(built, NOW)).toBe(true);
    });

    it('a different domain is a mismatch', () => {
      expect(verification({}, 'other.example').domainMatch).toBe(false);
    });
  });

  describe('evaluateVerification', () => {
    it('passes a B report aged 10 days against C and 90 days', () => {
      expect(evaluateVerification(verification(), 'C', 90, NOW)).toEqual({
        passed: true,
        message: 'CheckFix verification successful',
      });
    });

    it('a domain mismatch never passes whatever the grade', () => {
      fc.assert(
        fc.property(gradeArb, gradeArb, (grade, minimum) => {
          const mismatched = verification({ overallGrade: grade }, 'other.example');
          expect(evaluateVerification(mismatched, minimum, 90, NOW)).toEqual({
            passed: false,
            message: 'Domain does not match organization',
          });
        }),
        propertyConfig
      );
    });

    it('reports the grade shortfall', () => {
      expect(evaluateVerification(verification({ overallGrade: 'D' }), 'B', 90, NOW)).toEqual({
        passed: false,
        message: 'Grade D does not meet minimum B',
      });
    });

    it('reports a stale report and skips the check when the limit is not positive', () => {
      const stale = verification({ reportDate: new Date(NOW.getTime() - 120 * DAY_MS) });

      expect(evaluateVerification(stale, 'C', 90, NOW)).toEqual({
        passed: false,
        message: 'Report is 120 days old, maximum is 90 days',
      });
      expect(passesRequirement(stale, 'C', 0, NOW)).toBe(true);
      expect(passesRequirement(stale, 'C', -5, NOW)).toBe(true);
    });

    it('expiry is checked before anything else', () => {
      const built = verification({ overallGrade: 'F' }, 'other.example');
      const later = new Date(NOW.getTime() + 31 * DAY_MS);

      expect(evaluateVerification(built, 'A', 90, later).message).toBe('Verification has expired');
      expect(evaluateVerification({ ...built, verificationValid: false }, 'A', 90, NOW).message).toBe(
        'Verification has expired'
      );
    });

    it('passing implies the grade meets the minimum', () => {
      fc.assert(
        fc.property(gradeArb, gradeArb, fc.integer({ min: 0, max: 200 }), (grade, minimum, ageDays) => {
          const built = verification({ overallGrade: grade, reportDate: new Date(NOW.getTime() - ageDays * DAY_MS) });
          const { passed } = evaluateVerification(built, minimum, 90, NOW);

          expect(passed).toBe(meetsMinimum(grade, minimum) && ageDays <= 90);
        }),
        propertyConfig
      );
    });
  });

  describe('expiry helpers', () => {
    it('counts down and flags refresh inside the window', () => {
      const built = verification();
      const in25Days = new Date(NOW.getTime() + 25 * DAY_MS);

      expect(daysUntilExpiry(built, NOW)).toBe(30);
      expect(daysUntilExpiry(built, in25Days)).toBe(5);
      expect(needsRefresh(built, 7, NOW)).toBe(false);
      expect(needsRefresh(built, 7, in25Days)).toBe(true);
    });

    it('expires strictly after the validity window and ages reports in whole days', () => {
      const built = verification();

      expect(isExpired(built, new Date(NOW.getTime() + 30 * DAY_MS))).toBe(false);
      expect(isExpired(built, new Date(NOW.getTime() + 31 * DAY_MS))).toBe(true);
      expect(isReportTooOld(built, 10, NOW)).toBe(false);
      expect(isReportTooOld(built, 9, NOW)).toBe(true);
      expect(isReportTooOld(built, 0, NOW)).toBe(false);
    });

    it('refreshVerification restarts the validity window', () => {
      const later = new Date(NOW.getTime() + 40 * DAY_MS);
      const refreshed = refreshVerification(verification(), later);

      expect(refreshed.verifiedAt).toEqual(later);
      expect(refreshed.expiresAt).toEqual(new Date(later.getTime() + 30 * DAY_MS));
      expect(isVerificationValid(refreshed, later)).toBe(true);
    });
  });
});
