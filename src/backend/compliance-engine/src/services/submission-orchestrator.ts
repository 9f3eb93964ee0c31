/**
 * Submission Orchestrator
 *
 * Coordinates the supplier side of a requirement (start, drafts, submit)
 * and the company side (approve, reject, request revision) across the
 * requirement, response, submission and verification repositories.
 *
 * Every precondition is checked before the first write. Submissions and
 * verifications are keyed by (responseId, attempt): a submit that finds a
 * stored result for the current attempt reuses it instead of scoring or
 * verifying again, then completes the remaining updates.
 *
 * @tested tests/integration/submission-orchestrator.integration.test.ts
 * @edgecase starting twice returns the same unsubmitted response
 * @edgecase a checkfix submission against a pending requirement starts it first
 * @edgecase reopening moves the current result into previousAttempts
 * @edgecase a submitted response reports Conflict before any other precondition
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ConflictError,
  ErrorCode,
  InvalidTransitionError,
  isCheckFixRequirement,
  isQuestionnaireRequirement,
  isResponseSubmitted,
  lastStatusChange,
  NotFoundError,
  parseWithSchema,
  RejectRequestSchema,
  RequirementStatus,
  ReviewRequestSchema,
  SaveDraftRequestSchema,
  SubmitQuestionnaireRequestSchema,
  SubmitVerificationRequestSchema,
  ValidationError,
  type AnswerInput,
  type CheckFixRequirement,
  type CheckFixVerification,
  type DraftAnswer,
  type Grade,
  type QuestionnaireRequirement,
  type QuestionnaireSubmission,
  type Requirement,
  type SaveDraftRequest,
  type SubmitQuestionnaireRequest,
  type SupplierResponse,
} from '@supplier-compliance/shared';
import * as requirementMachine from '../state-machines/requirement-state-machine.js';
import { scoreSubmission, validateAnswer } from '../scoring/scoring-engine.js';
import { buildVerification, evaluateVerification } from '../verification/verification-policy.js';
import { deliverSafely, NotificationType } from '../notifications/notifier.js';
import type { EngineDependencies } from './dependencies.js';

const MINUTE_MS = 60 * 1000;

export interface QuestionnaireSubmissionResult {
  requirement: Requirement;
  response: SupplierResponse;
  submission: QuestionnaireSubmission;
}

export interface VerificationSubmissionResult {
  requirement: Requirement;
  response: SupplierResponse;
  verification: CheckFixVerification;
  passed: boolean;
  grade: Grade;
  message: string;
}

export interface ReviewResult {
  requirement: Requirement;
  response: SupplierResponse;
}

export interface SubmissionForReview {
  requirement: Requirement;
  response: SupplierResponse | null;
  submission: QuestionnaireSubmission | null;
  verification: CheckFixVerification | null;
}

/**
 * Moves the current result into previousAttempts and starts a new attempt
 */
export function reopenResponse(response: SupplierResponse, now: Date): SupplierResponse {
  return {
    ...response,
    previousAttempts: [
      ...response.previousAttempts,
      {
        attempt: response.attempt,
        submissionId: response.submissionId,
        verificationId: response.verificationId,
        score: response.score,
        maxScore: response.maxScore,
        passed: response.passed,
        grade: response.grade,
        submittedAt: response.submittedAt,
        reviewedByUserId: response.reviewedByUserId,
        reviewedAt: response.reviewedAt,
        reviewNotes: response.reviewNotes,
      },
    ],
    attempt: response.attempt + 1,
    submittedAt: undefined,
    submissionId: undefined,
    verificationId: undefined,
    score: undefined,
    maxScore: undefined,
    passed: undefined,
    grade: undefined,
    reviewedByUserId: undefined,
    reviewedAt: undefined,
    reviewNotes: undefined,
    draftAnswers: [],
    updatedAt: now,
  };
}

function cannotSubmit(requirement: Requirement): InvalidTransitionError {
  return new InvalidTransitionError(
    'Requirement',
    requirement.status,
    RequirementStatus.SUBMITTED,
    ErrorCode.CANNOT_SUBMIT,
    `Requirement in status ${requirement.status} cannot be submitted`
  );
}

function wrongType(requirement: Requirement, expected: string): ValidationError {
  return new ValidationError(
    ErrorCode.INVALID_REQUIREMENT_TYPE,
    `Requirement ${requirement.id} is not a ${expected} requirement`,
    [{ field: 'type', message: `Expected ${expected}`, code: ErrorCode.INVALID_REQUIREMENT_TYPE }]
  );
}

export class SubmissionOrchestrator {
  constructor(private readonly deps: EngineDependencies) {}

  private get repos() {
    return this.deps.repositories;
  }

  /**
   * Opens the supplier's response to a requirement
   */
  async startResponse(requirementId: string, supplierId: string): Promise<SupplierResponse> {
    const requirement = await this.getSupplierRequirement(requirementId, supplierId);
    const existing = await this.repos.responses.getByRequirement(requirementId);

    if (existing) {
      if (isResponseSubmitted(existing)) {
        throw new ConflictError(ErrorCode.RESPONSE_ALREADY_EXISTS, 'A response has already been submitted');
      }
      if (requirement.status === RequirementStatus.IN_PROGRESS) {
        return existing;
      }
    }

    if (!requirementMachine.canStartResponse(requirement)) {
      throw new InvalidTransitionError(
        'Requirement',
        requirement.status,
        RequirementStatus.IN_PROGRESS,
        ErrorCode.CANNOT_START_RESPONSE,
        `A response cannot be started for a requirement in status ${requirement.status}`
      );
    }

    const now = this.deps.clock();
    const response = existing ?? (await this.createResponse(requirement, now));
    await this.saveRequirement(requirement, requirementMachine.start(requirement, supplierId, now), supplierId);
    return response;
  }

  async getResponse(responseId: string, supplierId: string): Promise<SupplierResponse> {
    const response = await this.repos.responses.getById(responseId);
    if (response.supplierId !== supplierId) {
      throw new NotFoundError(ErrorCode.RESPONSE_NOT_FOUND, 'Response', responseId);
    }
    return response;
  }

  /**
   * Upserts draft answers by question id
   */
  async saveDraftAnswers(
    responseId: string,
    supplierId: string,
    request: SaveDraftRequest
  ): Promise<SupplierResponse> {
    const response = await this.getResponse(responseId, supplierId);
    if (isResponseSubmitted(response)) {
      throw new ConflictError(ErrorCode.RESPONSE_ALREADY_SUBMITTED, 'Submitted responses cannot be edited');
    }
    const { answers } = parseWithSchema(SaveDraftRequestSchema, request);

    const now = this.deps.clock();
    const drafts = new Map<string, DraftAnswer>(response.draftAnswers.map((d) => [d.questionId, d]));
    for (const answer of answers) {
      drafts.set(answer.questionId, {
        questionId: answer.questionId,
        selectedOptions: [...answer.selectedOptions],
        textAnswer: answer.textAnswer,
        savedAt: now,
      });
    }

    return this.repos.responses.update({
      ...response,
      draftAnswers: [...drafts.values()],
      updatedAt: now,
    });
  }

  /**
   * Scores and submits a questionnaire response
   */
  async submitQuestionnaire(
    responseId: string,
    supplierId: string,
    request: SubmitQuestionnaireRequest
  ): Promise<QuestionnaireSubmissionResult> {
    const { answers } = parseWithSchema(SubmitQuestionnaireRequestSchema, request);
    const response = await this.getResponse(responseId, supplierId);
    const requirement = await this.repos.requirements.getById(response.requirementId);

    if (!isQuestionnaireRequirement(requirement)) {
      throw wrongType(requirement, 'questionnaire');
    }

    const stored = await this.repos.submissions.findByResponseAttempt(response.id, response.attempt);
    this.assertNotSubmitted(requirement, response, stored !== null);
    this.assertSubmittable(requirement);

    const now = this.deps.clock();
    let submission: QuestionnaireSubmission;
    if (stored) {
      this.deps.logger.info('Reusing stored submission', {
        responseId: response.id,
        attempt: response.attempt,
        submissionId: stored.id,
      });
      submission = stored;
    } else {
      submission = await this.repos.submissions.create(
        await this.score(requirement, response, answers, now)
      );
    }

    const submitted = await this.repos.responses.update({
      ...response,
      submittedAt: response.submittedAt ?? submission.submittedAt,
      submissionId: submission.id,
      score: submission.totalScore,
      maxScore: submission.maxPossibleScore,
      passed: submission.passed,
      draftAnswers: [],
      updatedAt: now,
    });

    const updatedRequirement = await this.completeSubmit(requirement, supplierId, now);
    this.deps.logger.info('Questionnaire submitted', {
      requirementId: requirement.id,
      responseId: response.id,
      attempt: response.attempt,
      percentageScore: submission.percentageScore,
      passed: submission.passed,
    });

    return { requirement: updatedRequirement, response: submitted, submission };
  }

  /**
   * Verifies a CheckFix report and submits it as the requirement's response
   */
  async submitVerification(
    requirementId: string,
    supplierId: string,
    request: { reportHash: string }
  ): Promise<VerificationSubmissionResult> {
    const { reportHash } = parseWithSchema(SubmitVerificationRequestSchema, request);
    const requirement = await this.getSupplierRequirement(requirementId, supplierId);
    if (!isCheckFixRequirement(requirement)) {
      throw wrongType(requirement, 'checkfix');
    }

    const existing = await this.repos.responses.getByRequirement(requirementId);
    const stored = existing
      ? await this.repos.verifications.findByResponseAttempt(existing.id, existing.attempt)
      : null;
    if (existing) {
      this.assertNotSubmitted(requirement, existing, stored !== null);
    }
    if (requirement.status !== RequirementStatus.PENDING) {
      this.assertSubmittable(requirement);
    }

    const organization = await this.repos.organizations.getById(supplierId);
    if (!organization.checkfixAccountId) {
      throw new ValidationError(ErrorCode.CHECKFIX_NOT_LINKED, 'No CheckFix account is linked to this supplier');
    }

    const now = this.deps.clock();
    let response: SupplierResponse;
    let verification: CheckFixVerification;
    if (existing && stored) {
      this.deps.logger.info('Reusing stored verification', {
        responseId: existing.id,
        attempt: existing.attempt,
        verificationId: stored.id,
      });
      response = existing;
      verification = stored;
    } else {
      const report = await this.deps.verificationClient.verifyReport(reportHash);
      response = existing ?? (await this.createResponse(requirement, now));
      verification = await this.repos.verifications.create(
        buildVerification(report, {
          responseId: response.id,
          attempt: response.attempt,
          supplierId,
          domain: organization.domain ?? '',
          now,
        })
      );
    }

    const evaluation = evaluateVerification(
      verification,
      requirement.minimumGrade,
      requirement.maxReportAgeDays,
      now
    );

    const submitted = await this.repos.responses.update({
      ...response,
      submittedAt: response.submittedAt ?? now,
      verificationId: verification.id,
      grade: verification.overallGrade,
      passed: evaluation.passed,
      draftAnswers: [],
      updatedAt: now,
    });

    let current: CheckFixRequirement = requirement;
    if (current.status === RequirementStatus.PENDING) {
      current = await this.saveRequirement(current, requirementMachine.start(current, supplierId, now), supplierId);
    }
    const updatedRequirement = await this.completeSubmit(current, supplierId, now);

    this.deps.logger.info('CheckFix verification submitted', {
      requirementId,
      responseId: response.id,
      grade: verification.overallGrade,
      domainMatch: verification.domainMatch,
      passed: evaluation.passed,
    });

    return {
      requirement: updatedRequirement,
      response: submitted,
      verification,
      passed: evaluation.passed,
      grade: verification.overallGrade,
      message: evaluation.message,
    };
  }

  async approve(
    requirementId: string,
    companyId: string,
    reviewerId: string,
    request: { notes?: string } = {}
  ): Promise<ReviewResult> {
    const { notes } = parseWithSchema(ReviewRequestSchema, request);
    const { requirement, response } = await this.getReviewable(requirementId, companyId);
    const now = this.deps.clock();

    const reviewed = await this.repos.responses.update({
      ...response,
      reviewedByUserId: reviewerId,
      reviewedAt: now,
      reviewNotes: notes,
      updatedAt: now,
    });
    const approved = await this.saveRequirement(
      requirement,
      requirementMachine.approve(requirement, reviewerId, notes, now),
      reviewerId
    );

    await deliverSafely(this.deps.logger, NotificationType.APPROVED, approved.id, () =>
      this.deps.notifier.notifyApproved(approved, notes)
    );
    return { requirement: approved, response: reviewed };
  }

  async reject(
    requirementId: string,
    companyId: string,
    reviewerId: string,
    request: { reason: string }
  ): Promise<ReviewResult> {
    const { reason } = parseWithSchema(RejectRequestSchema, request);
    const { requirement, response } = await this.getReviewable(requirementId, companyId);
    const now = this.deps.clock();

    const reviewed = await this.repos.responses.update({
      ...response,
      reviewedByUserId: reviewerId,
      reviewedAt: now,
      reviewNotes: reason,
      updatedAt: now,
    });
    const rejected = await this.saveRequirement(
      requirement,
      requirementMachine.reject(requirement, reviewerId, reason, now),
      reviewerId
    );

    await deliverSafely(this.deps.logger, NotificationType.REJECTED, rejected.id, () =>
      this.deps.notifier.notifyRejected(rejected, reason)
    );
    return { requirement: rejected, response: reviewed };
  }

  /**
   * Sends a submitted requirement back to the supplier and reopens the response
   */
  async requestRevision(
    requirementId: string,
    companyId: string,
    reviewerId: string,
    request: { reason: string }
  ): Promise<ReviewResult> {
    const { reason } = parseWithSchema(RejectRequestSchema, request);
    const { requirement, response } = await this.getReviewable(requirementId, companyId);
    const now = this.deps.clock();

    const reopened = await this.repos.responses.update(
      reopenResponse(
        { ...response, reviewedByUserId: reviewerId, reviewedAt: now, reviewNotes: reason },
        now
      )
    );
    const underReview = await this.saveRequirement(
      requirement,
      requirementMachine.requestRevision(requirement, reviewerId, reason, now),
      reviewerId
    );

    await deliverSafely(this.deps.logger, NotificationType.REVISION_REQUESTED, underReview.id, () =>
      this.deps.notifier.notifyRevisionRequested(underReview, reason)
    );
    return { requirement: underReview, response: reopened };
  }

  /**
   * Moves a rejected requirement back to in_progress for another attempt
   */
  async retry(requirementId: string, supplierId: string): Promise<ReviewResult> {
    const requirement = await this.getSupplierRequirement(requirementId, supplierId);
    if (requirement.status !== RequirementStatus.REJECTED) {
      throw new InvalidTransitionError('Requirement', requirement.status, RequirementStatus.IN_PROGRESS);
    }
    const response = await this.requireResponse(requirementId);

    const now = this.deps.clock();
    const reopened = await this.repos.responses.update(reopenResponse(response, now));
    const retried = await this.saveRequirement(
      requirement,
      requirementMachine.retry(requirement, supplierId, now),
      supplierId
    );
    return { requirement: retried, response: reopened };
  }

  async getSubmissionForReview(requirementId: string, companyId: string): Promise<SubmissionForReview> {
    const requirement = await this.getCompanyRequirement(requirementId, companyId);
    const response = await this.repos.responses.getByRequirement(requirementId);

    return {
      requirement,
      response,
      submission: response?.submissionId
        ? await this.repos.submissions.getById(response.submissionId)
        : null,
      verification: response?.verificationId
        ? await this.repos.verifications.getById(response.verificationId)
        : null,
    };
  }

  private async score(
    requirement: QuestionnaireRequirement,
    response: SupplierResponse,
    answers: readonly AnswerInput[],
    now: Date
  ): Promise<QuestionnaireSubmission> {
    const questionnaire = await this.repos.questionnaires.getById(requirement.questionnaireId);
    const questions = await this.repos.questions.listByQuestionnaire(questionnaire.id);
    const byId = new Map(questions.map((q) => [q.id, q]));

    for (const answer of answers) {
      const question = byId.get(answer.questionId);
      if (question) {
        validateAnswer(question, answer);
      }
    }

    const result = scoreSubmission(
      questions,
      answers,
      requirement.passingScore ?? questionnaire.passingScore,
      questionnaire.topics
    );

    return {
      id: uuidv4(),
      responseId: response.id,
      attempt: response.attempt,
      questionnaireId: questionnaire.id,
      supplierId: response.supplierId,
      ...result,
      startedAt: response.startedAt,
      submittedAt: now,
      completionTimeMinutes: Math.max(0, Math.floor((now.getTime() - response.startedAt.getTime()) / MINUTE_MS)),
      createdAt: now,
    };
  }

  private newResponse(requirement: Requirement, now: Date): SupplierResponse {
    return {
      id: uuidv4(),
      requirementId: requirement.id,
      supplierId: requirement.supplierId,
      attempt: 1,
      startedAt: now,
      draftAnswers: [],
      previousAttempts: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Inserts a first response. A concurrent start for the same requirement
   * surfaces as RESPONSE_ALREADY_EXISTS.
   */
  private async createResponse(requirement: Requirement, now: Date): Promise<SupplierResponse> {
    try {
      return await this.repos.responses.create(this.newResponse(requirement, now));
    } catch (error) {
      if (error instanceof ConflictError) {
        this.deps.logger.warn('Response insert conflicted', { requirementId: requirement.id, code: error.code });
        throw new ConflictError(ErrorCode.RESPONSE_ALREADY_EXISTS, 'A response already exists for this requirement', {
          cause: error,
        });
      }
      throw error;
    }
  }

  /**
   * A submitted response may only be carried through again while its
   * stored result is still waiting on the requirement update.
   */
  private assertNotSubmitted(requirement: Requirement, response: SupplierResponse, hasStoredResult: boolean): void {
    const resumable =
      hasStoredResult &&
      (requirement.status === RequirementStatus.PENDING ||
        requirement.status === RequirementStatus.IN_PROGRESS ||
        requirement.status === RequirementStatus.UNDER_REVIEW);
    if (isResponseSubmitted(response) && !resumable) {
      throw new ConflictError(ErrorCode.RESPONSE_ALREADY_SUBMITTED, 'This response has already been submitted');
    }
  }

  private assertSubmittable(requirement: Requirement): void {
    if (
      requirement.status !== RequirementStatus.IN_PROGRESS &&
      requirement.status !== RequirementStatus.UNDER_REVIEW
    ) {
      throw cannotSubmit(requirement);
    }
  }

  /**
   * submit from in_progress, resubmit after a revision request
   */
  private async completeSubmit<R extends Requirement>(requirement: R, supplierId: string, now: Date): Promise<R> {
    const next =
      requirement.status === RequirementStatus.UNDER_REVIEW
        ? requirementMachine.resubmit(requirement, supplierId, now)
        : requirementMachine.submit(requirement, supplierId, now);
    const saved = await this.saveRequirement(requirement, next, supplierId);

    await deliverSafely(this.deps.logger, NotificationType.SUBMISSION_RECEIVED, saved.id, () =>
      this.deps.notifier.notifySubmissionReceived(saved)
    );
    return saved;
  }

  private async getReviewable(
    requirementId: string,
    companyId: string
  ): Promise<{ requirement: Requirement; response: SupplierResponse }> {
    const requirement = await this.getCompanyRequirement(requirementId, companyId);
    if (!requirementMachine.canBeReviewed(requirement)) {
      this.deps.logger.warn('Review refused', { requirementId, status: requirement.status });
      throw new InvalidTransitionError(
        'Requirement',
        requirement.status,
        undefined,
        ErrorCode.CANNOT_REVIEW,
        `Requirement in status ${requirement.status} cannot be reviewed`
      );
    }
    return { requirement, response: await this.requireResponse(requirementId) };
  }

  private async requireResponse(requirementId: string): Promise<SupplierResponse> {
    const response = await this.repos.responses.getByRequirement(requirementId);
    if (!response) {
      throw new NotFoundError(ErrorCode.RESPONSE_NOT_FOUND, 'Response', requirementId);
    }
    return response;
  }

  private async getSupplierRequirement(id: string, supplierId: string): Promise<Requirement> {
    const requirement = await this.repos.requirements.getById(id);
    if (requirement.supplierId !== supplierId) {
      throw new NotFoundError(ErrorCode.REQUIREMENT_NOT_FOUND, 'Requirement', id);
    }
    return requirement;
  }

  private async getCompanyRequirement(id: string, companyId: string): Promise<Requirement> {
    const requirement = await this.repos.requirements.getById(id);
    if (requirement.companyId !== companyId) {
      throw new NotFoundError(ErrorCode.REQUIREMENT_NOT_FOUND, 'Requirement', id);
    }
    return requirement;
  }

  private async saveRequirement<R extends Requirement>(before: R, after: R, actorId: string): Promise<R> {
    await this.repos.requirements.update(after);
    this.deps.logger.logStateChange({
      entity: 'Requirement',
      entityId: after.id,
      fromStatus: before.status,
      toStatus: after.status,
      actorId,
      reason: lastStatusChange(after.statusHistory)?.reason,
    });
    return after;
  }
}
