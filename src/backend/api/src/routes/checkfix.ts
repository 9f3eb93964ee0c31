/**
 * CheckFix Account Endpoints
 *
 * Linking of the caller's supplier organization to a CheckFix account.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { AuditAction, AuditResourceType } from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type ScopedHandler } from '../middleware/request-context.js';
import { recordAudit } from './common.js';

export function createCheckFixRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);

  router.get(
    '/status',
    requirePermission('view:checkfix'),
    handle(async (_req, res, { user }) => {
      res.json(await ctx.verificationAccounts.getLinkStatus(user.organizationId));
    })
  );

  router.post(
    '/link',
    requirePermission('manage:checkfix'),
    handle(async (req, res, scope) => {
      const organization = await ctx.verificationAccounts.linkAccount(scope.user.organizationId, req.body);
      await recordAudit(ctx, scope, {
        action: AuditAction.UPDATE,
        resourceType: AuditResourceType.ORGANIZATION,
        resourceId: organization.id,
        changes: { after: { checkfixAccountId: organization.checkfixAccountId, domain: organization.domain } },
      });
      res.json(organization);
    })
  );

  router.delete(
    '/link',
    requirePermission('manage:checkfix'),
    handle(async (_req, res, scope) => {
      const organization = await ctx.verificationAccounts.unlinkAccount(scope.user.organizationId);
      await recordAudit(ctx, scope, {
        action: AuditAction.UPDATE,
        resourceType: AuditResourceType.ORGANIZATION,
        resourceId: organization.id,
        changes: { after: { checkfixAccountId: null } },
      });
      res.json(organization);
    })
  );

  return router;
}
