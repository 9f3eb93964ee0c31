/**
 * Requirement service: assignment, editing and expiry
 *
 * @file src/backend/compliance-engine/src/services/requirement-service.ts
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode, ErrorKind, type Relationship } from '@supplier-compliance/shared';
import {
  COMPANY_ID,
  COMPANY_USER,
  createTestWorld,
  DAY_MS,
  seedActiveRelationship,
  seedPublishedQuestionnaire,
  SUPPLIER_ID,
  type TestWorld,
} from '../fixtures/engine.js';

describe('RequirementService', () => {
  let world: TestWorld;
  let relationship: Relationship;

  beforeEach(async () => {
    world = createTestWorld();
    relationship = await seedActiveRelationship(world);
  });

  const inDays = (days: number) => new Date(world.clock.now().getTime() + days * DAY_MS);

  describe('createRequirement', () => {
    it('assigns a checkfix requirement with default thresholds', async () => {
      const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Security grade',
      });

      expect(requirement).toMatchObject({
        type: 'checkfix',
        status: 'pending',
        supplierId: SUPPLIER_ID,
        companyId: COMPANY_ID,
        minimumGrade: 'C',
        maxReportAgeDays: 90,
        priority: 'medium',
      });
      expect(requirement.statusHistory).toHaveLength(1);
      expect(requirement.statusHistory[0]).toMatchObject({ reason: 'Requirement assigned', changedBy: COMPANY_USER });
    });

    it('takes the passing score from the questionnaire unless given', async () => {
      const { questionnaire } = await seedPublishedQuestionnaire(world, 75);

      const inherited = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'questionnaire',
        relationshipId: relationship.id,
        title: 'Baseline',
        questionnaireId: questionnaire.id,
      });
      const explicit = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'questionnaire',
        relationshipId: relationship.id,
        title: 'Baseline strict',
        questionnaireId: questionnaire.id,
        passingScore: 90,
      });

      expect(inherited).toMatchObject({ questionnaireId: questionnaire.id, passingScore: 75 });
      expect(explicit).toMatchObject({ passingScore: 90 });
    });

    it('refuses relationships that are not active', async () => {
      await world.relationships.suspend(relationship.id, COMPANY_ID, COMPANY_USER, 'Paused');

      await expect(
        world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
          type: 'checkfix',
          relationshipId: relationship.id,
          title: 'Security grade',
        })
      ).rejects.toMatchObject({ kind: ErrorKind.INVALID_TRANSITION, code: ErrorCode.CANNOT_RECEIVE_REQUIREMENTS });
    });

    it('hides relationships of other companies', async () => {
      await expect(
        world.requirements.createRequirement('company-2', 'other-user', {
          type: 'checkfix',
          relationshipId: relationship.id,
          title: 'Security grade',
        })
      ).rejects.toMatchObject({ kind: ErrorKind.NOT_FOUND, code: ErrorCode.RELATIONSHIP_NOT_FOUND });
    });

    it('refuses draft questionnaires', async () => {
      const draft = await world.questionnaires.createQuestionnaire(COMPANY_ID, COMPANY_USER, { name: 'Draft' });

      await expect(
        world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
          type: 'questionnaire',
          relationshipId: relationship.id,
          title: 'Baseline',
          questionnaireId: draft.id,
        })
      ).rejects.toMatchObject({ kind: ErrorKind.VALIDATION, code: ErrorCode.QUESTIONNAIRE_NOT_PUBLISHED });
    });

    it('rejects a missing title', async () => {
      await expect(
        world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
          type: 'checkfix',
          relationshipId: relationship.id,
          title: '  ',
        })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
    });
  });

  describe('reading', () => {
    it('scopes requirements to their company and supplier', async () => {
      const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Security grade',
      });

      await expect(world.requirements.getRequirement(requirement.id, { companyId: COMPANY_ID })).resolves.toMatchObject({
        id: requirement.id,
      });
      await expect(world.requirements.getRequirement(requirement.id, { supplierId: SUPPLIER_ID })).resolves.toMatchObject(
        { id: requirement.id }
      );
      await expect(world.requirements.getRequirement(requirement.id, { supplierId: 'supplier-2' })).rejects.toMatchObject({
        code: ErrorCode.REQUIREMENT_NOT_FOUND,
      });
    });

    it('shows the supplier the questionnaire without points or correctness', async () => {
      const { questionnaire, choiceQuestion } = await seedPublishedQuestionnaire(world);
      const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'questionnaire',
        relationshipId: relationship.id,
        title: 'Baseline',
        questionnaireId: questionnaire.id,
      });

      const assigned = await world.requirements.getAssignedQuestionnaire(requirement.id, SUPPLIER_ID);

      expect(assigned.questionnaire).toMatchObject({ id: questionnaire.id, name: 'Baseline security', questionCount: 2 });
      expect(assigned.questions.map((question) => question.id)).toEqual([expect.any(String), choiceQuestion.id]);
      expect(assigned.questions[1].options).toEqual([
        { id: 'mfa', text: 'Multi-factor authentication', order: 1 },
        { id: 'backups', text: 'Offline backups', order: 2 },
        { id: 'none', text: 'None of the above', order: 3 },
      ]);
    });

    it('has no questionnaire for checkfix requirements', async () => {
      const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Security grade',
      });

      await expect(world.requirements.getAssignedQuestionnaire(requirement.id, SUPPLIER_ID)).rejects.toMatchObject({
        code: ErrorCode.INVALID_REQUIREMENT_TYPE,
      });
    });
  });

  describe('updateRequirement', () => {
    it('updates a pending requirement and ignores fields of the other kind', async () => {
      const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Security grade',
      });

      const updated = await world.requirements.updateRequirement(requirement.id, COMPANY_ID, {
        title: 'Annual security grade',
        minimumGrade: 'b',
        passingScore: 50,
        priority: 'high',
      });

      expect(updated).toMatchObject({ title: 'Annual security grade', minimumGrade: 'B', priority: 'high' });
      expect(updated).not.toHaveProperty('passingScore');
    });

    it('refuses updates once work has started', async () => {
      const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Security grade',
      });
      await world.orchestrator.startResponse(requirement.id, SUPPLIER_ID);

      await expect(
        world.requirements.updateRequirement(requirement.id, COMPANY_ID, { title: 'Too late' })
      ).rejects.toMatchObject({ kind: ErrorKind.INVALID_TRANSITION, code: ErrorCode.REQUIREMENT_NOT_EDITABLE });
    });
  });

  describe('expiry and stats', () => {
    it('expires overdue open requirements and counts them', async () => {
      const overdue = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Overdue grade',
        dueDate: inDays(2),
      });
      const later = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Later grade',
        dueDate: inDays(10),
      });

      world.clock.advanceDays(3);
      expect(await world.requirements.getRequirementStats(COMPANY_ID)).toMatchObject({
        total: 2,
        pending: 2,
        expired: 0,
        overdue: 1,
      });

      const expired = await world.requirements.expireOverdue();

      expect(expired.map((r) => r.id)).toEqual([overdue.id]);
      expect(expired[0].statusHistory.at(-1)).toMatchObject({
        fromStatus: 'pending',
        toStatus: 'expired',
        changedBy: 'system',
        reason: 'Due date passed',
      });
      expect(await world.requirements.getRequirementStats(COMPANY_ID)).toMatchObject({
        pending: 1,
        expired: 1,
        overdue: 0,
      });
      expect((await world.requirements.getRequirement(later.id, { companyId: COMPANY_ID })).status).toBe('pending');
    });

    it('lists requirements for each side', async () => {
      await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
        type: 'checkfix',
        relationshipId: relationship.id,
        title: 'Security grade',
      });

      expect((await world.requirements.listCompanyRequirements(COMPANY_ID)).totalCount).toBe(1);
      expect((await world.requirements.listSupplierRequirements(SUPPLIER_ID, { type: 'checkfix' })).totalCount).toBe(1);
      expect((await world.requirements.listSupplierRequirements(SUPPLIER_ID, { type: 'questionnaire' })).totalCount).toBe(
        0
      );
    });
  });
});
