/**
 * Relationship lifecycle
 *
 * Transitions outside the table are refused without touching the
 * relationship; accepted transitions append exactly one history entry.
 *
 * @file src/backend/compliance-engine/src/state-machines/relationship-state-machine.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  ErrorCode,
  ErrorKind,
  InvalidTransitionError,
  RelationshipStatus,
  type Relationship,
} from '@supplier-compliance/shared';
import { relationshipMachine } from '@supplier-compliance/engine';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const NOW = new Date('2026-03-02T09:00:00.000Z');
const LATER = new Date('2026-03-05T12:00:00.000Z');

const allStatuses = Object.values(RelationshipStatus);
const statusArb = fc.constantFrom(...allStatuses);

function relationshipIn(status: RelationshipStatus): Relationship {
  const pending = relationshipMachine.createRelationship({
    id: 'rel-1',
    companyId: 'company-1',
    invitedEmail: 'Owner@Supplier.Example.com ',
    invitedByUserId: 'company-user',
    now: NOW,
  });
  // history is irrelevant to the transition rules; only status matters here
  return status === RelationshipStatus.PENDING ? pending : { ...pending, status, supplierId: 'supplier-1' };
}

describe('Relationship state machine', () => {
  describe('createRelationship', () => {
    it('starts pending with a single creation entry and a normalized email', () => {
      const relationship = relationshipIn(RelationshipStatus.PENDING);

      expect(relationship.status).toBe('pending');
      expect(relationship.invitedEmail).toBe('owner@supplier.example.com');
      expect(relationship.classification).toBe('standard');
      expect(relationship.supplierId).toBeUndefined();
      expect(relationship.statusHistory).toEqual([
        {
          fromStatus: null,
          toStatus: 'pending',
          changedBy: 'company-user',
          reason: 'Invitation sent',
          changedAt: NOW,
        },
      ]);
    });
  });

  describe('transition table', () => {
    it('rejected and terminated are terminal', () => {
      expect(relationshipMachine.isTerminal('rejected')).toBe(true);
      expect(relationshipMachine.isTerminal('terminated')).toBe(true);
      expect(relationshipMachine.isTerminal('pending')).toBe(false);
      expect(relationshipMachine.isTerminal('active')).toBe(false);
      expect(relationshipMachine.isTerminal('suspended')).toBe(false);
    });

    it('refuses every pair outside the table and leaves the input unchanged', () => {
      fc.assert(
        fc.property(statusArb, statusArb, (from, to) => {
          fc.pre(!relationshipMachine.canTransition(from, to));
          const relationship = relationshipIn(from);
          const snapshot = structuredClone(relationship);

          let thrown: unknown;
          try {
            relationshipMachine.transitionStatus(relationship, to, 'actor', 'reason', LATER);
          } catch (error) {
            thrown = error;
          }

          expect(thrown).toBeInstanceOf(InvalidTransitionError);
          expect(thrown).toMatchObject({ kind: ErrorKind.INVALID_TRANSITION, from, to });
          expect(relationship).toEqual(snapshot);
        }),
        propertyConfig
      );
    });

    it('allowed pairs append exactly one entry and keep earlier entries', () => {
      fc.assert(
        fc.property(statusArb, statusArb, fc.string({ maxLength: 40 }), (from, to, reason) => {
          fc.pre(relationshipMachine.canTransition(from, to));
          const relationship = relationshipIn(from);

          const next = relationshipMachine.transitionStatus(relationship, to, 'actor', reason, LATER);

          expect(next.status).toBe(to);
          expect(next.updatedAt).toEqual(LATER);
          expect(next.statusHistory).toHaveLength(relationship.statusHistory.length + 1);
          expect(next.statusHistory.slice(0, -1)).toEqual(relationship.statusHistory);
          expect(next.statusHistory.at(-1)).toEqual({
            fromStatus: from,
            toStatus: to,
            changedBy: 'actor',
            reason,
            changedAt: LATER,
          });
          expect(relationship.status).toBe(from);
        }),
        propertyConfig
      );
    });
  });

  describe('named operations', () => {
    it('accept binds the supplier and records two history entries', () => {
      const pending = relationshipIn(RelationshipStatus.PENDING);
      const accepted = relationshipMachine.accept(pending, 'supplier-9', 'supplier-user', LATER);

      expect(accepted.status).toBe('active');
      expect(accepted.supplierId).toBe('supplier-9');
      expect(accepted.acceptedAt).toEqual(LATER);
      expect(accepted.statusHistory).toHaveLength(2);
      expect(accepted.statusHistory[1]).toMatchObject({
        fromStatus: 'pending',
        toStatus: 'active',
        changedBy: 'supplier-user',
        reason: 'Invitation accepted',
      });
    });

    it('decline after accept fails as no longer pending', () => {
      const accepted = relationshipMachine.accept(
        relationshipIn(RelationshipStatus.PENDING),
        'supplier-9',
        'supplier-user',
        LATER
      );

      expect(() => relationshipMachine.decline(accepted, 'supplier-user', 'changed my mind', LATER)).toThrow(
        expect.objectContaining({ code: ErrorCode.NOT_PENDING_INVITATION, kind: ErrorKind.INVALID_TRANSITION })
      );
    });

    it('decline without a reason records a default one and stamps rejectedAt', () => {
      const declined = relationshipMachine.decline(relationshipIn(RelationshipStatus.PENDING), 'u', '', LATER);

      expect(declined.status).toBe('rejected');
      expect(declined.rejectedAt).toEqual(LATER);
      expect(declined.statusHistory.at(-1)?.reason).toBe('Invitation declined');
    });

    it('reactivation keeps the original acceptedAt', () => {
      const accepted = relationshipMachine.accept(relationshipIn(RelationshipStatus.PENDING), 's', 'u', NOW);
      const suspended = relationshipMachine.suspend(accepted, 'c', 'audit overdue', LATER);
      const reactivated = relationshipMachine.reactivate(suspended, 'c', '', LATER);

      expect(reactivated.status).toBe('active');
      expect(reactivated.acceptedAt).toEqual(NOW);
      expect(reactivated.statusHistory.map((entry) => entry.toStatus)).toEqual([
        'pending',
        'active',
        'suspended',
        'active',
      ]);
      expect(reactivated.statusHistory.at(-1)?.reason).toBe('Reactivated');
    });

    it('reactivate only applies to suspended relationships', () => {
      fc.assert(
        fc.property(statusArb, (status) => {
          fc.pre(status !== RelationshipStatus.SUSPENDED);
          expect(() => relationshipMachine.reactivate(relationshipIn(status), 'c', '', LATER)).toThrow(
            InvalidTransitionError
          );
        }),
        propertyConfig
      );
    });

    it('terminate is reachable from active and suspended only', () => {
      fc.assert(
        fc.property(statusArb, (status) => {
          const attempt = () => relationshipMachine.terminate(relationshipIn(status), 'c', '', LATER);
          if (status === RelationshipStatus.ACTIVE || status === RelationshipStatus.SUSPENDED) {
            expect(attempt().status).toBe('terminated');
          } else {
            expect(attempt).toThrow(InvalidTransitionError);
          }
        }),
        propertyConfig
      );
    });
  });

  describe('canReceiveRequirements', () => {
    it('holds only for active relationships with a bound supplier', () => {
      fc.assert(
        fc.property(statusArb, (status) => {
          const relationship = relationshipIn(status);
          expect(relationshipMachine.canReceiveRequirements(relationship)).toBe(
            status === RelationshipStatus.ACTIVE
          );
        }),
        propertyConfig
      );
      const unbound: Relationship = { ...relationshipIn(RelationshipStatus.PENDING), status: 'active' };
      expect(relationshipMachine.canReceiveRequirements(unbound)).toBe(false);
    });
  });
});
