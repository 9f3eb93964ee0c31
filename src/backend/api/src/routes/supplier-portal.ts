/**
 * Supplier Portal Endpoints
 *
 * Invitations, assigned requirements and responses as seen by the supplier
 * organization of the caller.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 * @edgecase invitations are matched on the caller's email, not the organization
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  AuditAction,
  AuditResourceType,
  parseWithSchema,
  RequirementStatusSchema,
  RequirementTypeSchema,
  StatusReasonRequestSchema,
  type Relationship,
} from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type RequestScope, type ScopedHandler } from '../middleware/request-context.js';
import { parsePagination, parseQuery, recordAudit } from './common.js';

const AssignmentListQuerySchema = z.object({
  status: RequirementStatusSchema.optional(),
  type: RequirementTypeSchema.optional(),
});

export function createSupplierPortalRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);
  const canSubmit = requirePermission('submit:responses');
  const canViewAssignments = requirePermission('view:assignments');

  const auditInvitation = (scope: RequestScope, action: AuditAction, relationship: Relationship) =>
    recordAudit(ctx, scope, {
      action,
      resourceType: AuditResourceType.RELATIONSHIP,
      resourceId: relationship.id,
      changes: { after: { status: relationship.status } },
    });

  // Invitations

  router.get(
    '/invitations',
    requirePermission('view:invitations'),
    handle(async (_req, res, { user }) => {
      res.json({ items: await ctx.relationships.listPendingInvitations(user.email) });
    })
  );

  router.post(
    '/invitations/:id/accept',
    requirePermission('respond:invitations'),
    handle(async (req, res, scope) => {
      const relationship = await ctx.relationships.acceptInvitation(req.params.id, {
        supplierId: scope.user.organizationId,
        actorId: scope.user.userId,
        email: scope.user.email,
      });
      await auditInvitation(scope, AuditAction.ACCEPT, relationship);
      res.json(relationship);
    })
  );

  router.post(
    '/invitations/:id/decline',
    requirePermission('respond:invitations'),
    handle(async (req, res, scope) => {
      const { reason } = parseWithSchema(StatusReasonRequestSchema, req.body ?? {});
      const relationship = await ctx.relationships.declineInvitation(
        req.params.id,
        scope.user.email,
        scope.user.userId,
        reason
      );
      await auditInvitation(scope, AuditAction.DECLINE, relationship);
      res.json(relationship);
    })
  );

  router.get(
    '/companies',
    requirePermission('view:invitations'),
    handle(async (_req, res, { user }) => {
      res.json({ items: await ctx.relationships.listSupplierCompanies(user.organizationId) });
    })
  );

  // Requirements

  router.get(
    '/requirements',
    canViewAssignments,
    handle(async (req, res, { user }) => {
      const filter = parseQuery(AssignmentListQuerySchema, req.query);
      res.json(
        await ctx.requirements.listSupplierRequirements(user.organizationId, filter, parsePagination(req.query))
      );
    })
  );

  router.get(
    '/requirements/:id',
    canViewAssignments,
    handle(async (req, res, { user }) => {
      res.json(await ctx.requirements.getRequirement(req.params.id, { supplierId: user.organizationId }));
    })
  );

  router.get(
    '/requirements/:id/questionnaire',
    canViewAssignments,
    handle(async (req, res, { user }) => {
      res.json(await ctx.requirements.getAssignedQuestionnaire(req.params.id, user.organizationId));
    })
  );

  router.post(
    '/requirements/:id/start',
    canSubmit,
    handle(async (req, res, scope) => {
      const response = await ctx.orchestrator.startResponse(req.params.id, scope.user.organizationId);
      await recordAudit(ctx, scope, {
        action: AuditAction.CREATE,
        resourceType: AuditResourceType.RESPONSE,
        resourceId: response.id,
        changes: { after: { requirementId: response.requirementId, attempt: response.attempt } },
      });
      res.json(response);
    })
  );

  router.post(
    '/requirements/:id/retry',
    canSubmit,
    handle(async (req, res, scope) => {
      const result = await ctx.orchestrator.retry(req.params.id, scope.user.organizationId);
      await recordAudit(ctx, scope, {
        action: AuditAction.UPDATE,
        resourceType: AuditResourceType.REQUIREMENT,
        resourceId: result.requirement.id,
        changes: { after: { status: result.requirement.status, attempt: result.response.attempt } },
      });
      res.json(result);
    })
  );

  router.post(
    '/requirements/:id/checkfix',
    canSubmit,
    handle(async (req, res, scope) => {
      const result = await ctx.orchestrator.submitVerification(req.params.id, scope.user.organizationId, req.body);
      await recordAudit(ctx, scope, {
        action: AuditAction.VERIFY,
        resourceType: AuditResourceType.VERIFICATION,
        resourceId: result.verification.id,
        changes: { after: { grade: result.grade, passed: result.passed, status: result.requirement.status } },
      });
      res.json(result);
    })
  );

  // Responses

  router.get(
    '/responses/:id',
    canViewAssignments,
    handle(async (req, res, { user }) => {
      res.json(await ctx.orchestrator.getResponse(req.params.id, user.organizationId));
    })
  );

  router.post(
    '/responses/:id/draft',
    canSubmit,
    handle(async (req, res, scope) => {
      const response = await ctx.orchestrator.saveDraftAnswers(req.params.id, scope.user.organizationId, req.body);
      await recordAudit(ctx, scope, {
        action: AuditAction.UPDATE,
        resourceType: AuditResourceType.RESPONSE,
        resourceId: response.id,
        changes: { after: { draftAnswers: response.draftAnswers.length } },
      });
      res.json(response);
    })
  );

  router.post(
    '/responses/:id/submit',
    canSubmit,
    handle(async (req, res, scope) => {
      const result = await ctx.orchestrator.submitQuestionnaire(
        req.params.id,
        scope.user.organizationId,
        req.body
      );
      await recordAudit(ctx, scope, {
        action: AuditAction.SUBMIT,
        resourceType: AuditResourceType.SUBMISSION,
        resourceId: result.submission.id,
        changes: {
          after: {
            score: result.submission.totalScore,
            passed: result.submission.passed,
            status: result.requirement.status,
          },
        },
      });
      res.json(result);
    })
  );

  return router;
}
