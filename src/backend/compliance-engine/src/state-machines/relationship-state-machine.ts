/**
 * Relationship State Machine
 *
 * Lifecycle of a Company/Supplier relationship. Every operation is pure: it
 * returns a new Relationship with one history entry appended, or throws
 * without touching the input.
 *
 * @tested tests/property/relationship-state-machine.property.test.ts
 * @edgecase rejected and terminated are terminal; nothing leaves them
 */

import { v4 as uuidv4 } from 'uuid';
import {
  appendStatusChange,
  ErrorCode,
  InvalidTransitionError,
  RelationshipStatus,
  SupplierClassification,
  type Relationship,
} from '@supplier-compliance/shared';

const ENTITY = 'Relationship';

/**
 * Allowed transitions by source status
 */
export const RELATIONSHIP_TRANSITIONS: Readonly<Record<RelationshipStatus, readonly RelationshipStatus[]>> = {
  pending: [RelationshipStatus.ACTIVE, RelationshipStatus.REJECTED],
  active: [RelationshipStatus.SUSPENDED, RelationshipStatus.TERMINATED],
  suspended: [RelationshipStatus.ACTIVE, RelationshipStatus.TERMINATED],
  rejected: [],
  terminated: [],
};

export function allowedTransitions(from: RelationshipStatus): readonly RelationshipStatus[] {
  return RELATIONSHIP_TRANSITIONS[from];
}

export function canTransition(from: RelationshipStatus, to: RelationshipStatus): boolean {
  return RELATIONSHIP_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RelationshipStatus): boolean {
  return RELATIONSHIP_TRANSITIONS[status].length === 0;
}

/**
 * Moves a relationship to a new status and records the change.
 *
 * @edgecase acceptedAt is only set the first time the relationship becomes active
 */
export function transitionStatus(
  relationship: Relationship,
  to: RelationshipStatus,
  actorId: string,
  reason: string,
  now: Date = new Date()
): Relationship {
  const from = relationship.status;
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(ENTITY, from, to);
  }

  const next: Relationship = {
    ...relationship,
    status: to,
    statusHistory: appendStatusChange(relationship.statusHistory, {
      fromStatus: from,
      toStatus: to,
      changedBy: actorId,
      reason,
      changedAt: now,
    }),
    updatedAt: now,
  };

  if (to === RelationshipStatus.ACTIVE && !relationship.acceptedAt) {
    next.acceptedAt = now;
  }
  if (to === RelationshipStatus.REJECTED) {
    next.rejectedAt = now;
  }

  return next;
}

function requirePending(relationship: Relationship): void {
  if (relationship.status !== RelationshipStatus.PENDING) {
    throw new InvalidTransitionError(
      ENTITY,
      relationship.status,
      undefined,
      ErrorCode.NOT_PENDING_INVITATION,
      'Invitation is no longer pending'
    );
  }
}

/**
 * Accepts a pending invitation and binds the supplier
 */
export function accept(
  relationship: Relationship,
  supplierId: string,
  actorId: string,
  now: Date = new Date()
): Relationship {
  requirePending(relationship);
  const next = transitionStatus(relationship, RelationshipStatus.ACTIVE, actorId, 'Invitation accepted', now);
  return { ...next, supplierId };
}

export function decline(
  relationship: Relationship,
  actorId: string,
  reason: string,
  now: Date = new Date()
): Relationship {
  requirePending(relationship);
  return transitionStatus(
    relationship,
    RelationshipStatus.REJECTED,
    actorId,
    reason || 'Invitation declined',
    now
  );
}

export function suspend(
  relationship: Relationship,
  actorId: string,
  reason: string,
  now: Date = new Date()
): Relationship {
  return transitionStatus(relationship, RelationshipStatus.SUSPENDED, actorId, reason || 'Suspended', now);
}

export function reactivate(
  relationship: Relationship,
  actorId: string,
  reason: string,
  now: Date = new Date()
): Relationship {
  if (relationship.status !== RelationshipStatus.SUSPENDED) {
    throw new InvalidTransitionError(ENTITY, relationship.status, RelationshipStatus.ACTIVE);
  }
  return transitionStatus(relationship, RelationshipStatus.ACTIVE, actorId, reason || 'Reactivated', now);
}

export function terminate(
  relationship: Relationship,
  actorId: string,
  reason: string,
  now: Date = new Date()
): Relationship {
  return transitionStatus(relationship, RelationshipStatus.TERMINATED, actorId, reason || 'Terminated', now);
}

/**
 * Requirements can only be assigned to active relationships with a bound supplier
 */
export function canReceiveRequirements(relationship: Relationship): boolean {
  return relationship.status === RelationshipStatus.ACTIVE && Boolean(relationship.supplierId);
}

export interface CreateRelationshipInput {
  companyId: string;
  invitedEmail: string;
  invitedByUserId: string;
  classification?: SupplierClassification;
  notes?: string;
  servicesProvided?: string[];
  contractRef?: string;
  id?: string;
  now?: Date;
}

/**
 * Builds a new pending relationship with its creation history entry
 */
export function createRelationship(input: CreateRelationshipInput): Relationship {
  const now = input.now ?? new Date();
  return {
    id: input.id ?? uuidv4(),
    companyId: input.companyId,
    invitedEmail: input.invitedEmail.trim().toLowerCase(),
    invitedByUserId: input.invitedByUserId,
    invitedAt: now,
    status: RelationshipStatus.PENDING,
    statusHistory: [
      {
        fromStatus: null,
        toStatus: RelationshipStatus.PENDING,
        changedBy: input.invitedByUserId,
        reason: 'Invitation sent',
        changedAt: now,
      },
    ],
    classification: input.classification ?? SupplierClassification.STANDARD,
    notes: input.notes,
    servicesProvided: input.servicesProvided ?? [],
    contractRef: input.contractRef,
    createdAt: now,
    updatedAt: now,
  };
}
