/**
 * Organization Profile Endpoints
 *
 * The caller's own organization. Its id and type come from the token.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { AuditAction, AuditResourceType } from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type ScopedHandler } from '../middleware/request-context.js';
import { recordAudit } from './common.js';

export function createOrganizationRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);

  router.get(
    '/',
    requirePermission('view:organization'),
    handle(async (_req, res, { user }) => {
      res.json(await ctx.organizations.getOrganization(user.organizationId));
    })
  );

  router.put(
    '/',
    requirePermission('manage:organization'),
    handle(async (req, res, scope) => {
      const organization = await ctx.organizations.upsertProfile(
        scope.user.organizationId,
        scope.user.organizationType,
        req.body
      );
      await recordAudit(ctx, scope, {
        action: AuditAction.UPDATE,
        resourceType: AuditResourceType.ORGANIZATION,
        resourceId: organization.id,
        changes: { after: { name: organization.name, domain: organization.domain } },
      });
      res.json(organization);
    })
  );

  return router;
}
