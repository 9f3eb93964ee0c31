/**
 * Stub Verification Client
 *
 * Deterministic stand-in used when no CheckFix API key is configured, and in
 * tests. Every report is for the same domain and grade unless overridden.
 */

import {
  ErrorCode,
  Grade,
  NotFoundError,
  type CategoryGrade,
  type VerificationReport,
} from '@supplier-compliance/shared';
import type { VerificationClient } from './verification-client.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StubVerificationClientOptions {
  domain: string;
  grade: Grade;
  score: number;
  reportAgeDays: number;
  categoryGrades: CategoryGrade[];
  findings: { critical: number; high: number; medium: number; low: number };
  accessValid: boolean;
  /** Report hashes that answer as not found */
  unknownReports: string[];
  clock: () => Date;
}

export const DEFAULT_STUB_OPTIONS: StubVerificationClientOptions = {
  domain: 'example.com',
  grade: Grade.B,
  score: 75,
  reportAgeDays: 7,
  categoryGrades: [],
  findings: { critical: 0, high: 2, medium: 5, low: 10 },
  accessValid: true,
  unknownReports: [],
  clock: () => new Date(),
};

export class StubVerificationClient implements VerificationClient {
  private options: StubVerificationClientOptions;
  public readonly calls: Array<{ method: keyof VerificationClient; argument: string }> = [];

  constructor(options: Partial<StubVerificationClientOptions> = {}) {
    this.options = { ...DEFAULT_STUB_OPTIONS, ...options };
  }

  /**
   * Changes the canned answers for subsequent calls
   */
  configure(options: Partial<StubVerificationClientOptions>): void {
    this.options = { ...this.options, ...options };
  }

  async verifyReport(reportHash: string): Promise<VerificationReport> {
    this.calls.push({ method: 'verifyReport', argument: reportHash });
    if (this.options.unknownReports.includes(reportHash)) {
      throw new NotFoundError(ErrorCode.REPORT_NOT_FOUND, 'Report', reportHash);
    }

    const { findings } = this.options;
    return {
      reportHash,
      domain: this.options.domain,
      reportDate: new Date(this.options.clock().getTime() - this.options.reportAgeDays * DAY_MS),
      overallGrade: this.options.grade,
      overallScore: this.options.score,
      categoryGrades: this.options.categoryGrades.map((category) => ({ ...category })),
      criticalFindings: findings.critical,
      highFindings: findings.high,
      mediumFindings: findings.medium,
      lowFindings: findings.low,
    };
  }

  async getAccountDomain(accountId: string): Promise<string> {
    this.calls.push({ method: 'getAccountDomain', argument: accountId });
    return this.options.domain;
  }

  async validateAccountAccess(accountId: string): Promise<boolean> {
    this.calls.push({ method: 'validateAccountAccess', argument: accountId });
    return this.options.accessValid;
  }
}
