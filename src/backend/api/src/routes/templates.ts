/**
 * Template Endpoints
 *
 * Browsing of system and shared questionnaire templates, and authoring of
 * the company's own templates.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  AuditAction,
  AuditResourceType,
  parseWithSchema,
  TemplateCategorySchema,
  type QuestionnaireTemplate,
} from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type RequestScope, type ScopedHandler } from '../middleware/request-context.js';
import { parsePagination, parseQuery, recordAudit } from './common.js';

const TemplateListQuerySchema = z.object({
  category: TemplateCategorySchema.optional(),
});

const ImportTemplateRequestSchema = z.object({
  content: z.string().min(1, 'Template file content is required'),
});

export function createTemplatesRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);
  const canView = requirePermission('view:templates');
  const canManage = requirePermission('manage:templates');

  const auditTemplate = (scope: RequestScope, action: AuditAction, template: QuestionnaireTemplate) =>
    recordAudit(ctx, scope, {
      action,
      resourceType: AuditResourceType.TEMPLATE,
      resourceId: template.id,
      changes: { after: { visibility: template.visibility, category: template.category } },
    });

  router.get(
    '/',
    canView,
    handle(async (req, res, scope) => {
      const filter = parseQuery(TemplateListQuerySchema, req.query);
      res.json(
        await ctx.templates.listAvailableTemplates(scope.user.organizationId, filter, parsePagination(req.query))
      );
    })
  );

  router.get(
    '/mine',
    canView,
    handle(async (req, res, scope) => {
      res.json(await ctx.templates.listMyTemplates(scope.user.userId, parsePagination(req.query)));
    })
  );

  router.post(
    '/',
    canManage,
    handle(async (req, res, scope) => {
      const template = await ctx.templates.createTemplate(scope.user.organizationId, scope.user.userId, req.body);
      await auditTemplate(scope, AuditAction.CREATE, template);
      res.status(201).json(template);
    })
  );

  router.post(
    '/import',
    canManage,
    handle(async (req, res, scope) => {
      const { content } = parseWithSchema(ImportTemplateRequestSchema, req.body);
      const template = await ctx.templates.importTemplate(scope.user.organizationId, scope.user.userId, content);
      await auditTemplate(scope, AuditAction.IMPORT, template);
      res.status(201).json(template);
    })
  );

  router.get(
    '/:id',
    canView,
    handle(async (req, res, scope) => {
      res.json(await ctx.templates.getTemplate(req.params.id, scope.user.organizationId));
    })
  );

  router.patch(
    '/:id',
    canManage,
    handle(async (req, res, scope) => {
      const template = await ctx.templates.updateTemplate(req.params.id, scope.user.organizationId, req.body);
      await auditTemplate(scope, AuditAction.UPDATE, template);
      res.json(template);
    })
  );

  router.delete(
    '/:id',
    canManage,
    handle(async (req, res, scope) => {
      await ctx.templates.deleteTemplate(req.params.id, scope.user.organizationId);
      await recordAudit(ctx, scope, {
        action: AuditAction.DELETE,
        resourceType: AuditResourceType.TEMPLATE,
        resourceId: req.params.id,
      });
      res.status(204).send();
    })
  );

  router.post(
    '/:id/publish',
    canManage,
    handle(async (req, res, scope) => {
      const template = await ctx.templates.publishTemplate(
        req.params.id,
        scope.user.organizationId,
        scope.user.userId,
        req.body
      );
      await auditTemplate(scope, AuditAction.PUBLISH, template);
      res.json(template);
    })
  );

  router.post(
    '/:id/unpublish',
    canManage,
    handle(async (req, res, scope) => {
      const template = await ctx.templates.unpublishTemplate(
        req.params.id,
        scope.user.organizationId,
        scope.user.userId
      );
      await auditTemplate(scope, AuditAction.UNPUBLISH, template);
      res.json(template);
    })
  );

  return router;
}
