/**
 * Relationship service: invitations and lifecycle
 *
 * @file src/backend/compliance-engine/src/services/relationship-service.ts
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode, ErrorKind, type Relationship } from '@supplier-compliance/shared';
import { InMemoryNotifier, RelationshipService } from '@supplier-compliance/engine';
import {
  COMPANY_ID,
  COMPANY_USER,
  createTestWorld,
  seedActiveRelationship,
  SUPPLIER_EMAIL,
  SUPPLIER_ID,
  SUPPLIER_USER,
  type TestWorld,
} from '../fixtures/engine.js';

class FailingInvitationNotifier extends InMemoryNotifier {
  async notifyInvitation(_relationship: Relationship): Promise<void> {
    throw new Error('mail relay unavailable');
  }
}

describe('RelationshipService', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = createTestWorld();
  });

  describe('inviteSupplier', () => {
    it('creates a pending invitation, logs it and notifies the invitee', async () => {
      const relationship = await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, {
        email: '  Security@Supplier.Example.com ',
        servicesProvided: ['hosting'],
      });

      expect(relationship).toMatchObject({
        companyId: COMPANY_ID,
        invitedEmail: SUPPLIER_EMAIL,
        status: 'pending',
        classification: 'standard',
        servicesProvided: ['hosting'],
      });
      expect(world.notifier.notifications).toEqual([
        expect.objectContaining({
          type: 'invitation',
          subjectId: relationship.id,
          recipientEmail: SUPPLIER_EMAIL,
        }),
      ]);
      expect(world.logger.getLogEntries()).toContainEqual(
        expect.objectContaining({
          message: 'Relationship status changed',
          metadata: expect.objectContaining({ fromStatus: null, toStatus: 'pending', reason: 'Invitation sent' }),
        })
      );
    });

    it('refuses a duplicate invitation with a conflict', async () => {
      await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: SUPPLIER_EMAIL });

      await expect(
        world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: SUPPLIER_EMAIL.toUpperCase() })
      ).rejects.toMatchObject({ kind: ErrorKind.CONFLICT, code: ErrorCode.SUPPLIER_ALREADY_INVITED });
      expect(world.logger.getLogEntries().filter((entry) => entry.level === 'warn')).toHaveLength(1);
    });

    it('rejects an invalid email', async () => {
      await expect(
        world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: 'not-an-email' })
      ).rejects.toMatchObject({ kind: ErrorKind.VALIDATION, code: ErrorCode.INVALID_INPUT });
    });

    it('still creates the invitation when the notification fails', async () => {
      const service = new RelationshipService({ ...world.deps, notifier: new FailingInvitationNotifier() });

      const relationship = await service.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: SUPPLIER_EMAIL });

      expect(await world.repositories.relationships.getById(relationship.id)).toMatchObject({ status: 'pending' });
      expect(world.logger.getLogEntries().at(-1)).toMatchObject({
        level: 'error',
        message: 'Notification delivery failed',
        metadata: { notificationType: 'invitation', subjectId: relationship.id },
      });
    });
  });

  describe('accept and decline', () => {
    it('accepting binds the supplier and lists the company for the supplier', async () => {
      const accepted = await seedActiveRelationship(world);

      expect(accepted).toMatchObject({ status: 'active', supplierId: SUPPLIER_ID, acceptedAt: world.clock.now() });
      expect(accepted.statusHistory.map((entry) => entry.reason)).toEqual(['Invitation sent', 'Invitation accepted']);
      expect((await world.relationships.listSupplierCompanies(SUPPLIER_ID)).map((r) => r.id)).toEqual([accepted.id]);
      expect(await world.relationships.listPendingInvitations(SUPPLIER_EMAIL)).toEqual([]);
    });

    it('an invitation addressed to another email is not found', async () => {
      const invited = await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: SUPPLIER_EMAIL });

      await expect(
        world.relationships.acceptInvitation(invited.id, {
          supplierId: SUPPLIER_ID,
          actorId: SUPPLIER_USER,
          email: 'someone-else@supplier.example.com',
        })
      ).rejects.toMatchObject({ kind: ErrorKind.NOT_FOUND });
    });

    it('declining after accepting fails as no longer pending', async () => {
      const accepted = await seedActiveRelationship(world);

      await expect(
        world.relationships.declineInvitation(accepted.id, SUPPLIER_EMAIL, SUPPLIER_USER, 'Too late')
      ).rejects.toMatchObject({ kind: ErrorKind.INVALID_TRANSITION, code: ErrorCode.NOT_PENDING_INVITATION });
    });

    it('declining records the reason and leaves the supplier unbound', async () => {
      const invited = await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: SUPPLIER_EMAIL });

      const declined = await world.relationships.declineInvitation(invited.id, SUPPLIER_EMAIL, SUPPLIER_USER, 'No contract');

      expect(declined).toMatchObject({ status: 'rejected', rejectedAt: world.clock.now() });
      expect(declined.supplierId).toBeUndefined();
      expect(declined.statusHistory.at(-1)?.reason).toBe('No contract');
    });

    it('a second company relationship for the same supplier is refused', async () => {
      await seedActiveRelationship(world);
      const second = await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, {
        email: 'ops@supplier.example.com',
      });

      await expect(
        world.relationships.acceptInvitation(second.id, {
          supplierId: SUPPLIER_ID,
          actorId: SUPPLIER_USER,
          email: 'ops@supplier.example.com',
        })
      ).rejects.toMatchObject({ code: ErrorCode.RELATIONSHIP_EXISTS });
    });
  });

  describe('lifecycle', () => {
    it('suspend, reactivate and terminate walk the history', async () => {
      const active = await seedActiveRelationship(world);

      await world.relationships.suspend(active.id, COMPANY_ID, COMPANY_USER, 'Audit overdue');
      await world.relationships.reactivate(active.id, COMPANY_ID, COMPANY_USER, '');
      const terminated = await world.relationships.terminate(active.id, COMPANY_ID, COMPANY_USER, 'Contract ended');

      expect(terminated.status).toBe('terminated');
      expect(terminated.statusHistory.map((entry) => [entry.toStatus, entry.reason])).toEqual([
        ['pending', 'Invitation sent'],
        ['active', 'Invitation accepted'],
        ['suspended', 'Audit overdue'],
        ['active', 'Reactivated'],
        ['terminated', 'Contract ended'],
      ]);
      expect(await world.relationships.listSupplierCompanies(SUPPLIER_ID)).toEqual([]);
    });

    it('reactivating an active relationship is an invalid transition', async () => {
      const active = await seedActiveRelationship(world);

      await expect(world.relationships.reactivate(active.id, COMPANY_ID, COMPANY_USER, '')).rejects.toMatchObject({
        kind: ErrorKind.INVALID_TRANSITION,
        from: 'active',
        to: 'active',
      });
    });

    it('another company cannot see or change the relationship', async () => {
      const active = await seedActiveRelationship(world);

      await expect(world.relationships.getRelationship(active.id, 'company-2')).rejects.toMatchObject({
        kind: ErrorKind.NOT_FOUND,
      });
      await expect(world.relationships.suspend(active.id, 'company-2', 'intruder', 'x')).rejects.toMatchObject({
        kind: ErrorKind.NOT_FOUND,
      });
    });
  });

  describe('updates', () => {
    it('updates classification and details while not terminated', async () => {
      const active = await seedActiveRelationship(world);

      const critical = await world.relationships.updateClassification(active.id, COMPANY_ID, 'critical');
      const detailed = await world.relationships.updateDetails(active.id, COMPANY_ID, { notes: 'Hosts payroll' });

      expect(critical.classification).toBe('critical');
      expect(detailed).toMatchObject({ classification: 'critical', notes: 'Hosts payroll' });
    });

    it('rejects unknown classifications', async () => {
      const active = await seedActiveRelationship(world);

      await expect(world.relationships.updateClassification(active.id, COMPANY_ID, 'vip')).rejects.toMatchObject({
        kind: ErrorKind.VALIDATION,
        code: ErrorCode.INVALID_CLASSIFICATION,
      });
    });

    it('refuses changes to terminated relationships', async () => {
      const active = await seedActiveRelationship(world);
      await world.relationships.terminate(active.id, COMPANY_ID, COMPANY_USER, 'Ended');

      await expect(world.relationships.updateDetails(active.id, COMPANY_ID, { notes: 'x' })).rejects.toMatchObject({
        kind: ErrorKind.INVALID_TRANSITION,
        code: ErrorCode.RELATIONSHIP_TERMINATED,
      });
      await expect(
        world.relationships.updateClassification(active.id, COMPANY_ID, 'standard')
      ).rejects.toMatchObject({ code: ErrorCode.RELATIONSHIP_TERMINATED });
    });
  });

  describe('listing and stats', () => {
    it('pages, filters and counts company suppliers', async () => {
      await seedActiveRelationship(world);
      world.clock.advanceMinutes(1);
      await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, {
        email: 'b@vendor.example.com',
        classification: 'critical',
      });
      world.clock.advanceMinutes(1);
      await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, { email: 'c@vendor.example.com' });

      const firstPage = await world.relationships.listCompanySuppliers(COMPANY_ID, {}, { limit: 2 });
      expect(firstPage).toMatchObject({ totalCount: 3, page: 1, limit: 2, totalPages: 2 });
      expect(firstPage.items.map((r) => r.invitedEmail)).toEqual(['c@vendor.example.com', 'b@vendor.example.com']);

      const pending = await world.relationships.listCompanySuppliers(COMPANY_ID, { status: 'pending' });
      expect(pending.totalCount).toBe(2);

      expect(await world.relationships.getSupplierStats(COMPANY_ID)).toEqual({
        total: 3,
        pending: 2,
        active: 1,
        suspended: 0,
        rejected: 0,
        terminated: 0,
        critical: 1,
        important: 1,
        standard: 1,
      });
    });
  });
});
