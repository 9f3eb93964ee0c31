/**
 * Requirement State Machine
 *
 * Compliance workflow of a single requirement, from assignment through
 * response, review and (optionally) retry. Operations are pure and return a
 * new Requirement.
 *
 * @tested tests/property/requirement-state-machine.property.test.ts
 * @edgecase approved and expired are terminal
 * @edgecase under_review only leads back to submitted (resubmission)
 */

import { v4 as uuidv4 } from 'uuid';
import {
  appendStatusChange,
  DEFAULT_MAX_REPORT_AGE_DAYS,
  DEFAULT_MINIMUM_GRADE,
  InvalidTransitionError,
  Priority,
  RequirementStatus,
  RequirementType,
  type Grade,
  type Requirement,
} from '@supplier-compliance/shared';

const ENTITY = 'Requirement';
const DAY_MS = 24 * 60 * 60 * 1000;

export const REQUIREMENT_TRANSITIONS: Readonly<Record<RequirementStatus, readonly RequirementStatus[]>> = {
  pending: [RequirementStatus.IN_PROGRESS, RequirementStatus.EXPIRED],
  in_progress: [RequirementStatus.SUBMITTED, RequirementStatus.EXPIRED],
  submitted: [RequirementStatus.APPROVED, RequirementStatus.REJECTED, RequirementStatus.UNDER_REVIEW],
  under_review: [RequirementStatus.SUBMITTED],
  rejected: [RequirementStatus.IN_PROGRESS],
  approved: [],
  expired: [],
};

export function allowedTransitions(from: RequirementStatus): readonly RequirementStatus[] {
  return REQUIREMENT_TRANSITIONS[from];
}

export function canTransition(from: RequirementStatus, to: RequirementStatus): boolean {
  return REQUIREMENT_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RequirementStatus): boolean {
  return REQUIREMENT_TRANSITIONS[status].length === 0;
}

export function transitionStatus<R extends Requirement>(
  requirement: R,
  to: RequirementStatus,
  actorId: string,
  reason: string,
  now: Date = new Date()
): R {
  const from = requirement.status;
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(ENTITY, from, to);
  }

  return {
    ...requirement,
    status: to,
    statusHistory: appendStatusChange(requirement.statusHistory, {
      fromStatus: from,
      toStatus: to,
      changedBy: actorId,
      reason,
      changedAt: now,
    }),
    updatedAt: now,
  };
}

/**
 * Named transitions
 */
export function start<R extends Requirement>(requirement: R, actorId: string, now: Date = new Date()): R {
  return transitionStatus(requirement, RequirementStatus.IN_PROGRESS, actorId, 'Response started', now);
}

export function submit<R extends Requirement>(requirement: R, actorId: string, now: Date = new Date()): R {
  return transitionStatus(requirement, RequirementStatus.SUBMITTED, actorId, 'Response submitted', now);
}

export function approve<R extends Requirement>(
  requirement: R,
  reviewerId: string,
  notes: string,
  now: Date = new Date()
): R {
  return transitionStatus(requirement, RequirementStatus.APPROVED, reviewerId, notes || 'Approved', now);
}

export function reject<R extends Requirement>(
  requirement: R,
  reviewerId: string,
  reason: string,
  now: Date = new Date()
): R {
  return transitionStatus(requirement, RequirementStatus.REJECTED, reviewerId, reason, now);
}

export function requestRevision<R extends Requirement>(
  requirement: R,
  reviewerId: string,
  reason: string,
  now: Date = new Date()
): R {
  return transitionStatus(requirement, RequirementStatus.UNDER_REVIEW, reviewerId, reason, now);
}

export function retry<R extends Requirement>(requirement: R, actorId: string, now: Date = new Date()): R {
  return transitionStatus(requirement, RequirementStatus.IN_PROGRESS, actorId, 'Retrying after rejection', now);
}

export function resubmit<R extends Requirement>(requirement: R, actorId: string, now: Date = new Date()): R {
  return transitionStatus(requirement, RequirementStatus.SUBMITTED, actorId, 'Resubmitted after revision', now);
}

export function expire<R extends Requirement>(requirement: R, actorId: string, now: Date = new Date()): R {
  return transitionStatus(requirement, RequirementStatus.EXPIRED, actorId, 'Due date passed', now);
}

export function canStartResponse(requirement: Requirement): boolean {
  return requirement.status === RequirementStatus.PENDING;
}

export function canBeReviewed(requirement: Requirement): boolean {
  return requirement.status === RequirementStatus.SUBMITTED;
}

export function canBeUpdated(requirement: Requirement): boolean {
  return requirement.status === RequirementStatus.PENDING;
}

export function isOverdue(requirement: Requirement, now: Date = new Date()): boolean {
  if (!requirement.dueDate || isTerminal(requirement.status)) {
    return false;
  }
  return now.getTime() > requirement.dueDate.getTime();
}

/**
 * Whole days until the due date, truncated toward zero; -1 without a due date
 *
 * @edgecase negative once the due date has passed by a full day
 */
export function daysUntilDue(requirement: Requirement, now: Date = new Date()): number {
  if (!requirement.dueDate) {
    return -1;
  }
  return Math.trunc((requirement.dueDate.getTime() - now.getTime()) / DAY_MS);
}

export function needsReminder(
  requirement: Requirement,
  daysBefore: number,
  now: Date = new Date()
): boolean {
  if (!requirement.dueDate || requirement.reminderSentAt) {
    return false;
  }
  if (isTerminal(requirement.status) || requirement.status === RequirementStatus.SUBMITTED) {
    return false;
  }
  return daysUntilDue(requirement, now) <= daysBefore;
}

export function markReminderSent<R extends Requirement>(requirement: R, now: Date = new Date()): R {
  return { ...requirement, reminderSentAt: now, updatedAt: now };
}

interface CreateRequirementBase {
  relationshipId: string;
  companyId: string;
  supplierId: string;
  title: string;
  description?: string;
  priority?: Priority;
  dueDate?: Date;
  assignedByUserId: string;
  id?: string;
  now?: Date;
}

export type CreateRequirementInput =
  | (CreateRequirementBase & {
      type: typeof RequirementType.QUESTIONNAIRE;
      questionnaireId: string;
      passingScore?: number;
    })
  | (CreateRequirementBase & {
      type: typeof RequirementType.CHECKFIX;
      minimumGrade?: Grade;
      maxReportAgeDays?: number;
    });

/**
 * Builds a pending requirement with its assignment history entry
 */
export function createRequirement(input: CreateRequirementInput): Requirement {
  const now = input.now ?? new Date();
  const base = {
    id: input.id ?? uuidv4(),
    relationshipId: input.relationshipId,
    companyId: input.companyId,
    supplierId: input.supplierId,
    title: input.title,
    description: input.description,
    priority: input.priority ?? Priority.MEDIUM,
    dueDate: input.dueDate,
    status: RequirementStatus.PENDING,
    statusHistory: [
      {
        fromStatus: null,
        toStatus: RequirementStatus.PENDING,
        changedBy: input.assignedByUserId,
        reason: 'Requirement assigned',
        changedAt: now,
      },
    ],
    assignedByUserId: input.assignedByUserId,
    assignedAt: now,
    createdAt: now,
    updatedAt: now,
  };

  if (input.type === RequirementType.QUESTIONNAIRE) {
    return {
      ...base,
      type: RequirementType.QUESTIONNAIRE,
      questionnaireId: input.questionnaireId,
      passingScore: input.passingScore,
    };
  }

  return {
    ...base,
    type: RequirementType.CHECKFIX,
    minimumGrade: input.minimumGrade ?? DEFAULT_MINIMUM_GRADE,
    maxReportAgeDays: input.maxReportAgeDays ?? DEFAULT_MAX_REPORT_AGE_DAYS,
  };
}
