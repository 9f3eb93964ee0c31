/**
 * Supplier Relationship Endpoints
 *
 * Company-side management of supplier relationships: invitations,
 * classification and lifecycle changes.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  AuditAction,
  AuditResourceType,
  parseWithSchema,
  RelationshipStatusSchema,
  StatusReasonRequestSchema,
  SupplierClassificationSchema,
  type Relationship,
} from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type RequestScope, type ScopedHandler } from '../middleware/request-context.js';
import { parsePagination, parseQuery, recordAudit } from './common.js';

// the service reports unknown classifications itself
const ClassificationBodySchema = z.object({ classification: z.string() });

const SupplierListQuerySchema = z.object({
  status: RelationshipStatusSchema.optional(),
  classification: SupplierClassificationSchema.optional(),
  search: z.string().trim().min(1).optional(),
});

type LifecycleChange = (id: string, companyId: string, actorId: string, reason: string) => Promise<Relationship>;

export function createSuppliersRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);

  const audit = (scope: RequestScope, action: AuditAction, relationship: Relationship) =>
    recordAudit(ctx, scope, {
      action,
      resourceType: AuditResourceType.RELATIONSHIP,
      resourceId: relationship.id,
      changes: { after: { status: relationship.status, classification: relationship.classification } },
    });

  router.post(
    '/',
    requirePermission('manage:suppliers'),
    handle(async (req, res, scope) => {
      const relationship = await ctx.relationships.inviteSupplier(
        scope.user.organizationId,
        scope.user.userId,
        req.body
      );
      await audit(scope, AuditAction.INVITE, relationship);
      res.status(201).json(relationship);
    })
  );

  router.get(
    '/',
    requirePermission('view:suppliers'),
    handle(async (req, res, scope) => {
      const filter = parseQuery(SupplierListQuerySchema, req.query);
      const page = await ctx.relationships.listCompanySuppliers(
        scope.user.organizationId,
        filter,
        parsePagination(req.query)
      );
      res.json(page);
    })
  );

  router.get(
    '/stats',
    requirePermission('view:suppliers'),
    handle(async (_req, res, scope) => {
      res.json(await ctx.relationships.getSupplierStats(scope.user.organizationId));
    })
  );

  router.get(
    '/:id',
    requirePermission('view:suppliers'),
    handle(async (req, res, scope) => {
      res.json(await ctx.relationships.getRelationship(req.params.id, scope.user.organizationId));
    })
  );

  router.patch(
    '/:id',
    requirePermission('manage:suppliers'),
    handle(async (req, res, scope) => {
      const relationship = await ctx.relationships.updateDetails(
        req.params.id,
        scope.user.organizationId,
        req.body
      );
      await audit(scope, AuditAction.UPDATE, relationship);
      res.json(relationship);
    })
  );

  router.patch(
    '/:id/classification',
    requirePermission('manage:suppliers'),
    handle(async (req, res, scope) => {
      const { classification } = parseWithSchema(ClassificationBodySchema, req.body);
      const relationship = await ctx.relationships.updateClassification(
        req.params.id,
        scope.user.organizationId,
        classification
      );
      await audit(scope, AuditAction.UPDATE, relationship);
      res.json(relationship);
    })
  );

  const lifecycle = (path: string, action: AuditAction, change: LifecycleChange) =>
    router.post(
      path,
      requirePermission('manage:suppliers'),
      handle(async (req, res, scope) => {
        const { reason } = parseWithSchema(StatusReasonRequestSchema, req.body ?? {});
        const relationship = await change(req.params.id, scope.user.organizationId, scope.user.userId, reason);
        await audit(scope, action, relationship);
        res.json(relationship);
      })
    );

  lifecycle('/:id/suspend', AuditAction.SUSPEND, (...args) => ctx.relationships.suspend(...args));
  lifecycle('/:id/reactivate', AuditAction.ACTIVATE, (...args) => ctx.relationships.reactivate(...args));
  lifecycle('/:id/terminate', AuditAction.TERMINATE, (...args) => ctx.relationships.terminate(...args));

  return router;
}
