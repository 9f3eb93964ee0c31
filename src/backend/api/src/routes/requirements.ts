/**
 * Requirement Endpoints
 *
 * Company-side assignment of requirements and review of supplier
 * submissions.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  AuditAction,
  AuditResourceType,
  RequirementStatusSchema,
  RequirementTypeSchema,
  type Requirement,
} from '@supplier-compliance/shared';
import type { ReviewResult } from '@supplier-compliance/engine';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import {
  route,
  type ApiRequest,
  type RequestScope,
  type ScopedHandler,
} from '../middleware/request-context.js';
import { parsePagination, parseQuery, recordAudit } from './common.js';

const RequirementListQuerySchema = z.object({
  status: RequirementStatusSchema.optional(),
  type: RequirementTypeSchema.optional(),
  supplierId: z.string().min(1).optional(),
  relationshipId: z.string().min(1).optional(),
});

type ReviewDecision = (req: ApiRequest, scope: RequestScope) => Promise<ReviewResult>;

export function createRequirementsRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);

  const audit = (scope: RequestScope, action: AuditAction, requirement: Requirement) =>
    recordAudit(ctx, scope, {
      action,
      resourceType: AuditResourceType.REQUIREMENT,
      resourceId: requirement.id,
      changes: { after: { status: requirement.status } },
    });

  router.post(
    '/',
    requirePermission('manage:requirements'),
    handle(async (req, res, scope) => {
      const requirement = await ctx.requirements.createRequirement(
        scope.user.organizationId,
        scope.user.userId,
        req.body
      );
      await audit(scope, AuditAction.CREATE, requirement);
      res.status(201).json(requirement);
    })
  );

  router.get(
    '/',
    requirePermission('view:requirements'),
    handle(async (req, res, scope) => {
      const filter = parseQuery(RequirementListQuerySchema, req.query);
      res.json(
        await ctx.requirements.listCompanyRequirements(
          scope.user.organizationId,
          filter,
          parsePagination(req.query)
        )
      );
    })
  );

  router.get(
    '/stats',
    requirePermission('view:requirements'),
    handle(async (_req, res, scope) => {
      res.json(await ctx.requirements.getRequirementStats(scope.user.organizationId));
    })
  );

  router.get(
    '/:id',
    requirePermission('view:requirements'),
    handle(async (req, res, scope) => {
      res.json(
        await ctx.requirements.getRequirement(req.params.id, { companyId: scope.user.organizationId })
      );
    })
  );

  router.patch(
    '/:id',
    requirePermission('manage:requirements'),
    handle(async (req, res, scope) => {
      const requirement = await ctx.requirements.updateRequirement(
        req.params.id,
        scope.user.organizationId,
        req.body
      );
      await audit(scope, AuditAction.UPDATE, requirement);
      res.json(requirement);
    })
  );

  router.get(
    '/:id/review',
    requirePermission('view:requirements'),
    handle(async (req, res, scope) => {
      res.json(await ctx.orchestrator.getSubmissionForReview(req.params.id, scope.user.organizationId));
    })
  );

  const review = (path: string, action: AuditAction, decide: ReviewDecision) =>
    router.post(
      path,
      requirePermission('review:requirements'),
      handle(async (req, res, scope) => {
        const result = await decide(req, scope);
        await audit(scope, action, result.requirement);
        res.json(result);
      })
    );

  review('/:id/approve', AuditAction.APPROVE, (req, { user }) =>
    ctx.orchestrator.approve(req.params.id, user.organizationId, user.userId, req.body)
  );
  review('/:id/reject', AuditAction.REJECT, (req, { user }) =>
    ctx.orchestrator.reject(req.params.id, user.organizationId, user.userId, req.body)
  );
  review('/:id/request-revision', AuditAction.REQUEST_REVISION, (req, { user }) =>
    ctx.orchestrator.requestRevision(req.params.id, user.organizationId, user.userId, req.body)
  );

  return router;
}
