/**
 * Audit Trail Endpoints
 *
 * Read access to the audit entries recorded for the caller's organization.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { z } from 'zod';
import { AuditResourceTypeSchema, parseWithSchema } from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type ScopedHandler } from '../middleware/request-context.js';

const AuditPathSchema = z.object({
  resourceType: AuditResourceTypeSchema,
  resourceId: z.string().min(1),
});

export function createAuditRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);

  router.get(
    '/:resourceType/:resourceId',
    requirePermission('view:audit'),
    handle(async (req, res, { user }) => {
      const { resourceType, resourceId } = parseWithSchema(AuditPathSchema, req.params, 'Invalid audit resource');
      const trail = await ctx.audit.getResourceTrail(resourceType, resourceId);
      // entries written by other organizations about the same resource stay hidden
      res.json({ items: trail.filter((entry) => entry.organizationId === user.organizationId) });
    })
  );

  return router;
}
