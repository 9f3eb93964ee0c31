/**
 * Template Service
 *
 * Questionnaire templates: system templates seeded at startup and custom
 * templates a company authors, imports from a JSON file and publishes
 * locally or globally. Questionnaires are built from templates by
 * QuestionnaireService.createFromTemplate.
 *
 * @tested tests/integration/template-service.integration.test.ts
 * @edgecase system templates are read-only
 * @edgecase a template in use can be neither unpublished nor deleted
 * @edgecase a question's topic must be one of the template's topics
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  canViewTemplate,
  CreateTemplateRequestSchema,
  ConflictError,
  ErrorCode,
  formatZodIssues,
  InvalidTransitionError,
  isTemplateOwnedBy,
  isTemplatePublished,
  NotFoundError,
  paginate,
  parseWithSchema,
  PublishTemplateRequestSchema,
  TemplateVisibility,
  UpdateTemplateRequestSchema,
  ValidationError,
  type CreateTemplateRequest,
  type FieldErrorDetail,
  type PaginatedResult,
  type PaginationOptions,
  type PublishTemplateRequest,
  type QuestionnaireTemplate,
  type TemplateQuestion,
  type TemplateTopic,
  type TemplateTopicInput,
  type UpdateTemplateRequest,
} from '@supplier-compliance/shared';
import type { TemplateFilter } from '../repositories/interfaces.js';
import type { EngineDependencies } from './dependencies.js';

const SystemTemplateFileSchema = z.array(CreateTemplateRequestSchema);

type TemplateInput = z.output<typeof CreateTemplateRequestSchema>;

function buildTopics(inputs: readonly TemplateTopicInput[]): TemplateTopic[] {
  return inputs.map((input, index) => ({
    id: input.id ?? uuidv4(),
    name: input.name.trim(),
    description: input.description,
    order: input.order ?? index + 1,
  }));
}

function templateIssues(topics: readonly TemplateTopic[], questions: readonly TemplateQuestion[]): FieldErrorDetail[] {
  const issues: FieldErrorDetail[] = [];
  const seen = new Set<string>();
  topics.forEach((topic, index) => {
    if (seen.has(topic.id)) {
      issues.push({ field: `topics.${index}.id`, message: `Duplicate topic ID: ${topic.id}`, code: ErrorCode.INVALID_TEMPLATE });
    }
    seen.add(topic.id);
  });
  questions.forEach((question, index) => {
    if (question.topicId !== undefined && !seen.has(question.topicId)) {
      issues.push({
        field: `questions.${index}.topicId`,
        message: `Unknown topic: ${question.topicId}`,
        code: ErrorCode.INVALID_TEMPLATE,
      });
    }
  });
  return issues;
}

export class TemplateService {
  constructor(private readonly deps: EngineDependencies) {}

  private get repo() {
    return this.deps.repositories.templates;
  }

  /**
   * Creates a custom template as a draft owned by the organization
   */
  async createTemplate(
    organizationId: string,
    userId: string,
    request: CreateTemplateRequest
  ): Promise<QuestionnaireTemplate> {
    return this.insert(parseWithSchema(CreateTemplateRequestSchema, request), { organizationId, userId });
  }

  /**
   * Creates a draft template from the contents of a JSON template file
   */
  async importTemplate(organizationId: string, userId: string, content: string): Promise<QuestionnaireTemplate> {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(ErrorCode.INVALID_TEMPLATE, 'Template file is not valid JSON', [
        {
          field: 'content',
          message: error instanceof Error ? error.message : String(error),
          code: ErrorCode.INVALID_TEMPLATE,
        },
      ]);
    }

    const parsed = CreateTemplateRequestSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(ErrorCode.INVALID_TEMPLATE, 'Template file is incomplete', formatZodIssues(parsed.error));
    }
    return this.insert(parsed.data, { organizationId, userId });
  }

  async getTemplate(id: string, organizationId: string): Promise<QuestionnaireTemplate> {
    const template = await this.repo.getById(id);
    if (!canViewTemplate(template, organizationId)) {
      throw new NotFoundError(ErrorCode.TEMPLATE_NOT_FOUND, 'Template', id);
    }
    return template;
  }

  /**
   * Edits a draft template of the caller's organization
   */
  async updateTemplate(
    id: string,
    organizationId: string,
    request: UpdateTemplateRequest
  ): Promise<QuestionnaireTemplate> {
    const input = parseWithSchema(UpdateTemplateRequestSchema, request);
    const template = await this.getOwned(id, organizationId);
    if (isTemplatePublished(template)) {
      throw new InvalidTransitionError(
        'Template',
        template.visibility,
        undefined,
        ErrorCode.TEMPLATE_NOT_EDITABLE,
        'Only draft templates can be edited'
      );
    }

    const topics = input.topics ? buildTopics(input.topics) : template.topics;
    const questions = input.questions ?? template.questions;
    this.assertConsistent(topics, questions);

    return this.repo.update({
      ...template,
      name: input.name ?? template.name,
      description: input.description ?? template.description,
      version: input.version ?? template.version,
      defaultPassingScore: input.defaultPassingScore ?? template.defaultPassingScore,
      estimatedMinutes: input.estimatedMinutes ?? template.estimatedMinutes,
      topics,
      questions,
      tags: input.tags ?? template.tags,
      updatedAt: this.deps.clock(),
    });
  }

  async deleteTemplate(id: string, organizationId: string): Promise<void> {
    const template = await this.getOwned(id, organizationId);
    this.assertUnused(template, 'deleted');
    await this.repo.delete(id);
    this.deps.logger.info('Template deleted', { templateId: id, organizationId });
  }

  /**
   * Publishes a draft to the owning organization (local) or to everyone (global)
   *
   * @edgecase a template without topics cannot be published
   */
  async publishTemplate(
    id: string,
    organizationId: string,
    userId: string,
    request: PublishTemplateRequest
  ): Promise<QuestionnaireTemplate> {
    const { visibility } = parseWithSchema(PublishTemplateRequestSchema, request);
    const template = await this.getOwned(id, organizationId);
    if (isTemplatePublished(template)) {
      throw new InvalidTransitionError(
        'Template',
        template.visibility,
        visibility,
        ErrorCode.TEMPLATE_ALREADY_PUBLISHED,
        'Template is already published'
      );
    }
    if (template.topics.length === 0) {
      throw new ValidationError(ErrorCode.INVALID_TEMPLATE, 'A template needs at least one topic before it can be published', [
        { field: 'topics', message: 'At least one topic is required', code: ErrorCode.INVALID_TEMPLATE },
      ]);
    }

    const now = this.deps.clock();
    const published = await this.repo.update({
      ...template,
      visibility,
      publishedAt: now,
      publishedByUserId: userId,
      updatedAt: now,
    });
    this.logVisibility(template, published, userId);
    return published;
  }

  /**
   * Returns a published template to draft
   */
  async unpublishTemplate(id: string, organizationId: string, userId: string): Promise<QuestionnaireTemplate> {
    const template = await this.getOwned(id, organizationId);
    if (!isTemplatePublished(template)) {
      throw new InvalidTransitionError(
        'Template',
        template.visibility,
        TemplateVisibility.DRAFT,
        ErrorCode.TEMPLATE_NOT_PUBLISHED,
        'Template is not published'
      );
    }
    this.assertUnused(template, 'unpublished');

    const draft = await this.repo.update({
      ...template,
      visibility: TemplateVisibility.DRAFT,
      publishedAt: undefined,
      publishedByUserId: undefined,
      updatedAt: this.deps.clock(),
    });
    this.logVisibility(template, draft, userId);
    return draft;
  }

  async listAvailableTemplates(
    organizationId: string,
    filter: TemplateFilter = {},
    pagination: Partial<PaginationOptions> = {}
  ): Promise<PaginatedResult<QuestionnaireTemplate>> {
    return paginate(await this.repo.listAvailable(organizationId, filter), pagination);
  }

  async listMyTemplates(
    userId: string,
    pagination: Partial<PaginationOptions> = {}
  ): Promise<PaginatedResult<QuestionnaireTemplate>> {
    return paginate(await this.repo.listByCreator(userId), pagination);
  }

  /**
   * Inserts the read-only system templates unless some already exist.
   * Returns how many were inserted.
   */
  async seedSystemTemplates(definitions: unknown): Promise<number> {
    const inputs = parseWithSchema(SystemTemplateFileSchema, definitions, 'Invalid system template definitions');
    if ((await this.repo.countSystem()) > 0) {
      this.deps.logger.info('System templates already exist, skipping seeding');
      return 0;
    }

    for (const input of inputs) {
      await this.insert(input, null);
    }
    this.deps.logger.info('System templates seeded', { count: inputs.length });
    return inputs.length;
  }

  private async insert(
    input: TemplateInput,
    owner: { organizationId: string; userId: string } | null
  ): Promise<QuestionnaireTemplate> {
    const topics = buildTopics(input.topics);
    this.assertConsistent(topics, input.questions);

    const now = this.deps.clock();
    const template = await this.repo.create({
      id: uuidv4(),
      name: input.name,
      description: input.description,
      category: input.category,
      version: input.version,
      isSystem: owner === null,
      createdByOrgId: owner?.organizationId,
      createdByUserId: owner?.userId,
      visibility: owner === null ? TemplateVisibility.GLOBAL : TemplateVisibility.DRAFT,
      defaultPassingScore: input.defaultPassingScore,
      estimatedMinutes: input.estimatedMinutes,
      topics,
      questions: input.questions,
      tags: input.tags,
      usageCount: 0,
      publishedAt: owner === null ? now : undefined,
      createdAt: now,
      updatedAt: now,
    });

    this.deps.logger.info('Template created', {
      templateId: template.id,
      category: template.category,
      isSystem: template.isSystem,
      organizationId: owner?.organizationId,
    });
    return template;
  }

  /**
   * Visible templates of another organization are read-only to the caller
   */
  private async getOwned(id: string, organizationId: string): Promise<QuestionnaireTemplate> {
    const template = await this.getTemplate(id, organizationId);
    if (template.isSystem || !isTemplateOwnedBy(template, organizationId)) {
      throw new InvalidTransitionError(
        'Template',
        template.visibility,
        undefined,
        ErrorCode.TEMPLATE_NOT_EDITABLE,
        template.isSystem ? 'System templates cannot be changed' : 'Only the owning organization can change this template'
      );
    }
    return template;
  }

  private assertUnused(template: QuestionnaireTemplate, verb: string): void {
    if (template.usageCount > 0) {
      throw new ConflictError(
        ErrorCode.TEMPLATE_IN_USE,
        `Template has been used by ${template.usageCount} questionnaire(s) and cannot be ${verb}`
      );
    }
  }

  private assertConsistent(topics: readonly TemplateTopic[], questions: readonly TemplateQuestion[]): void {
    const issues = templateIssues(topics, questions);
    if (issues.length > 0) {
      throw new ValidationError(ErrorCode.INVALID_TEMPLATE, 'Template topics and questions do not match', issues);
    }
  }

  private logVisibility(before: QuestionnaireTemplate, after: QuestionnaireTemplate, actorId: string): void {
    this.deps.logger.logStateChange({
      entity: 'Template',
      entityId: after.id,
      fromStatus: before.visibility,
      toStatus: after.visibility,
      actorId,
    });
  }
}
