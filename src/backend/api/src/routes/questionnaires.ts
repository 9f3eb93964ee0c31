/**
 * Questionnaire Endpoints
 *
 * Authoring of questionnaires and their questions by company users.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  AuditAction,
  AuditResourceType,
  QuestionnaireStatusSchema,
  type Questionnaire,
} from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import { requirePermission } from '../middleware/rbac.js';
import { route, type RequestScope, type ScopedHandler } from '../middleware/request-context.js';
import { parsePagination, parseQuery, recordAudit } from './common.js';

const QuestionnaireListQuerySchema = z.object({
  status: QuestionnaireStatusSchema.optional(),
});

export function createQuestionnairesRouter(ctx: ApiContext): Router {
  const router = Router();
  const handle = (handler: ScopedHandler) => route(handler, ctx.deps.logger);
  const canView = requirePermission('view:questionnaires');
  const canManage = requirePermission('manage:questionnaires');

  const auditQuestionnaire = (scope: RequestScope, action: AuditAction, questionnaire: Questionnaire) =>
    recordAudit(ctx, scope, {
      action,
      resourceType: AuditResourceType.QUESTIONNAIRE,
      resourceId: questionnaire.id,
      changes: { after: { status: questionnaire.status, questionCount: questionnaire.questionCount } },
    });

  const auditQuestion = (scope: RequestScope, action: AuditAction, questionId: string, questionnaireId: string) =>
    recordAudit(ctx, scope, {
      action,
      resourceType: AuditResourceType.QUESTION,
      resourceId: questionId,
      changes: { after: { questionnaireId } },
    });

  router.post(
    '/',
    canManage,
    handle(async (req, res, scope) => {
      const questionnaire = await ctx.questionnaires.createQuestionnaire(
        scope.user.organizationId,
        scope.user.userId,
        req.body
      );
      await auditQuestionnaire(scope, AuditAction.CREATE, questionnaire);
      res.status(201).json(questionnaire);
    })
  );

  router.post(
    '/from-template',
    canManage,
    handle(async (req, res, scope) => {
      const created = await ctx.questionnaires.createFromTemplate(
        scope.user.organizationId,
        scope.user.userId,
        req.body
      );
      await recordAudit(ctx, scope, {
        action: AuditAction.CREATE,
        resourceType: AuditResourceType.QUESTIONNAIRE,
        resourceId: created.questionnaire.id,
        changes: {
          after: { templateId: created.questionnaire.templateId, questionCount: created.questionnaire.questionCount },
        },
      });
      res.status(201).json(created);
    })
  );

  router.get(
    '/',
    canView,
    handle(async (req, res, scope) => {
      const filter = parseQuery(QuestionnaireListQuerySchema, req.query);
      res.json(
        await ctx.questionnaires.listQuestionnaires(scope.user.organizationId, filter, parsePagination(req.query))
      );
    })
  );

  router.get(
    '/stats',
    canView,
    handle(async (_req, res, scope) => {
      res.json(await ctx.questionnaires.getQuestionnaireStats(scope.user.organizationId));
    })
  );

  router.get(
    '/:id',
    canView,
    handle(async (req, res, scope) => {
      res.json(await ctx.questionnaires.getQuestionnaireWithQuestions(req.params.id, scope.user.organizationId));
    })
  );

  router.patch(
    '/:id',
    canManage,
    handle(async (req, res, scope) => {
      const questionnaire = await ctx.questionnaires.updateQuestionnaire(
        req.params.id,
        scope.user.organizationId,
        req.body
      );
      await auditQuestionnaire(scope, AuditAction.UPDATE, questionnaire);
      res.json(questionnaire);
    })
  );

  router.delete(
    '/:id',
    canManage,
    handle(async (req, res, scope) => {
      await ctx.questionnaires.deleteQuestionnaire(req.params.id, scope.user.organizationId);
      await recordAudit(ctx, scope, {
        action: AuditAction.DELETE,
        resourceType: AuditResourceType.QUESTIONNAIRE,
        resourceId: req.params.id,
      });
      res.status(204).send();
    })
  );

  router.post(
    '/:id/publish',
    canManage,
    handle(async (req, res, scope) => {
      const questionnaire = await ctx.questionnaires.publishQuestionnaire(
        req.params.id,
        scope.user.organizationId,
        scope.user.userId
      );
      await auditQuestionnaire(scope, AuditAction.PUBLISH, questionnaire);
      res.json(questionnaire);
    })
  );

  router.post(
    '/:id/archive',
    canManage,
    handle(async (req, res, scope) => {
      const questionnaire = await ctx.questionnaires.archiveQuestionnaire(
        req.params.id,
        scope.user.organizationId,
        scope.user.userId
      );
      await auditQuestionnaire(scope, AuditAction.ARCHIVE, questionnaire);
      res.json(questionnaire);
    })
  );

  // Questions

  router.post(
    '/:id/questions',
    canManage,
    handle(async (req, res, scope) => {
      const question = await ctx.questionnaires.addQuestion(req.params.id, scope.user.organizationId, req.body);
      await auditQuestion(scope, AuditAction.CREATE, question.id, req.params.id);
      res.status(201).json(question);
    })
  );

  router.put(
    '/:id/questions/order',
    canManage,
    handle(async (req, res, scope) => {
      const questions = await ctx.questionnaires.reorderQuestions(
        req.params.id,
        scope.user.organizationId,
        req.body
      );
      await recordAudit(ctx, scope, {
        action: AuditAction.UPDATE,
        resourceType: AuditResourceType.QUESTIONNAIRE,
        resourceId: req.params.id,
        changes: { after: { order: Object.fromEntries(questions.map((q) => [q.id, q.order])) } },
      });
      res.json(questions);
    })
  );

  router.patch(
    '/:id/questions/:questionId',
    canManage,
    handle(async (req, res, scope) => {
      const question = await ctx.questionnaires.updateQuestion(
        req.params.id,
        req.params.questionId,
        scope.user.organizationId,
        req.body
      );
      await auditQuestion(scope, AuditAction.UPDATE, question.id, req.params.id);
      res.json(question);
    })
  );

  router.delete(
    '/:id/questions/:questionId',
    canManage,
    handle(async (req, res, scope) => {
      await ctx.questionnaires.deleteQuestion(req.params.id, req.params.questionId, scope.user.organizationId);
      await auditQuestion(scope, AuditAction.DELETE, req.params.questionId, req.params.id);
      res.status(204).send();
    })
  );

  return router;
}
