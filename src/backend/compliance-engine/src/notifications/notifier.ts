/**
 * Notifier
 *
 * Outbound notifications about invitations, due dates and review outcomes.
 * Delivery is best effort: a failing notifier is logged and never fails the
 * operation that triggered it.
 *
 * @tested tests/integration/reminder-scanner.integration.test.ts
 */

import type { Logger, Relationship, Requirement } from '@supplier-compliance/shared';

export const NotificationType = {
  INVITATION: 'invitation',
  REMINDER: 'reminder',
  OVERDUE: 'overdue',
  SUBMISSION_RECEIVED: 'submission_received',
  APPROVED: 'approved',
  REJECTED: 'rejected',
  REVISION_REQUESTED: 'revision_requested',
} as const;

export type NotificationType = (typeof NotificationType)[keyof typeof NotificationType];

export interface Notifier {
  notifyInvitation(relationship: Relationship): Promise<void>;
  notifyReminder(requirement: Requirement, daysUntilDue: number): Promise<void>;
  notifyOverdue(requirement: Requirement): Promise<void>;
  notifySubmissionReceived(requirement: Requirement): Promise<void>;
  notifyApproved(requirement: Requirement, notes: string): Promise<void>;
  notifyRejected(requirement: Requirement, reason: string): Promise<void>;
  notifyRevisionRequested(requirement: Requirement, reason: string): Promise<void>;
}

export interface Notification {
  type: NotificationType;
  /** Relationship or requirement id */
  subjectId: string;
  /** Organization the notification is addressed to */
  recipientOrgId?: string;
  /** Email address for invitations, before a supplier is bound */
  recipientEmail?: string;
  message: string;
  sentAt: Date;
}

/**
 * Records notifications instead of delivering them
 */
export class InMemoryNotifier implements Notifier {
  public notifications: Notification[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private record(notification: Omit<Notification, 'sentAt'>): void {
    this.notifications.push({ ...notification, sentAt: this.clock() });
  }

  async notifyInvitation(relationship: Relationship): Promise<void> {
    this.record({
      type: NotificationType.INVITATION,
      subjectId: relationship.id,
      recipientEmail: relationship.invitedEmail,
      message: 'You have been invited to a supplier compliance relationship',
    });
  }

  async notifyReminder(requirement: Requirement, daysUntilDue: number): Promise<void> {
    this.record({
      type: NotificationType.REMINDER,
      subjectId: requirement.id,
      recipientOrgId: requirement.supplierId,
      message: `"${requirement.title}" is due in ${daysUntilDue} day(s)`,
    });
  }

  async notifyOverdue(requirement: Requirement): Promise<void> {
    this.record({
      type: NotificationType.OVERDUE,
      subjectId: requirement.id,
      recipientOrgId: requirement.supplierId,
      message: `"${requirement.title}" is overdue`,
    });
  }

  async notifySubmissionReceived(requirement: Requirement): Promise<void> {
    this.record({
      type: NotificationType.SUBMISSION_RECEIVED,
      subjectId: requirement.id,
      recipientOrgId: requirement.companyId,
      message: `A response to "${requirement.title}" was submitted`,
    });
  }

  async notifyApproved(requirement: Requirement, notes: string): Promise<void> {
    this.record({
      type: NotificationType.APPROVED,
      subjectId: requirement.id,
      recipientOrgId: requirement.supplierId,
      message: notes || `"${requirement.title}" was approved`,
    });
  }

  async notifyRejected(requirement: Requirement, reason: string): Promise<void> {
    this.record({
      type: NotificationType.REJECTED,
      subjectId: requirement.id,
      recipientOrgId: requirement.supplierId,
      message: reason,
    });
  }

  async notifyRevisionRequested(requirement: Requirement, reason: string): Promise<void> {
    this.record({
      type: NotificationType.REVISION_REQUESTED,
      subjectId: requirement.id,
      recipientOrgId: requirement.supplierId,
      message: reason,
    });
  }

  byType(type: NotificationType): Notification[] {
    return this.notifications.filter((n) => n.type === type);
  }

  clear(): void {
    this.notifications = [];
  }
}

/**
 * Runs a notification and logs instead of rethrowing when it fails
 */
export async function deliverSafely(
  logger: Logger,
  type: NotificationType,
  subjectId: string,
  send: () => Promise<void>
): Promise<boolean> {
  try {
    await send();
    return true;
  } catch (error) {
    logger.error(
      'Notification delivery failed',
      error instanceof Error ? error : new Error(String(error)),
      { notificationType: type, subjectId }
    );
    return false;
  }
}
