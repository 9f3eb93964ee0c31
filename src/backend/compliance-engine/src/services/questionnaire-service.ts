/**
 * Questionnaire Service
 *
 * Authoring of questionnaires and their questions. Questionnaires are
 * edited as drafts, published once they hold at least one question and
 * archived when retired.
 *
 * @tested tests/integration/questionnaire-service.integration.test.ts
 * @edgecase maxPoints is recomputed from the options on every question write
 * @edgecase a question's topic must be one of the questionnaire's topics
 * @edgecase an update cannot empty the options of a choice question
 * @edgecase only published templates the company can see are copied
 */

import { v4 as uuidv4 } from 'uuid';
import {
  canViewTemplate,
  CreateFromTemplateRequestSchema,
  CreateQuestionnaireRequestSchema,
  CreateQuestionRequestSchema,
  DEFAULT_QUESTION_WEIGHT,
  ErrorCode,
  getTopicById,
  InvalidTransitionError,
  isChoiceQuestion,
  isDraft,
  isTemplatePublished,
  NotFoundError,
  paginate,
  parseWithSchema,
  QuestionnaireStatus,
  ReorderQuestionsRequestSchema,
  ScoringMode,
  UpdateQuestionnaireRequestSchema,
  UpdateQuestionRequestSchema,
  ValidationError,
  type CreateFromTemplateRequest,
  type CreateQuestionnaireRequest,
  type CreateQuestionRequest,
  type OptionInput,
  type PaginatedResult,
  type PaginationOptions,
  type Question,
  type Questionnaire,
  type QuestionnaireStats,
  type QuestionOption,
  type UpdateQuestionnaireRequest,
  type UpdateQuestionRequest,
} from '@supplier-compliance/shared';
import { calculateMaxPoints } from '../scoring/scoring-engine.js';
import type { QuestionnaireFilter } from '../repositories/interfaces.js';
import type { EngineDependencies } from './dependencies.js';

export interface QuestionnaireWithQuestions {
  questionnaire: Questionnaire;
  questions: Question[];
}

function buildOptions(options: readonly OptionInput[]): QuestionOption[] {
  return options.map((option, index) => ({
    id: option.id ?? uuidv4(),
    text: option.text.trim(),
    points: option.points ?? 0,
    isCorrect: option.isCorrect ?? false,
    order: option.order ?? index + 1,
  }));
}

export class QuestionnaireService {
  constructor(private readonly deps: EngineDependencies) {}

  private get repo() {
    return this.deps.repositories.questionnaires;
  }

  private get questions() {
    return this.deps.repositories.questions;
  }

  async createQuestionnaire(
    companyId: string,
    actorId: string,
    request: CreateQuestionnaireRequest
  ): Promise<Questionnaire> {
    const input = parseWithSchema(CreateQuestionnaireRequestSchema, request);
    const now = this.deps.clock();

    const questionnaire = await this.repo.create({
      id: uuidv4(),
      companyId,
      name: input.name,
      description: input.description,
      status: QuestionnaireStatus.DRAFT,
      passingScore: input.passingScore,
      scoringMode: input.scoringMode,
      topics: input.topics,
      questionCount: 0,
      maxPossibleScore: 0,
      createdAt: now,
      updatedAt: now,
    });

    this.deps.logger.info('Questionnaire created', {
      questionnaireId: questionnaire.id,
      companyId,
      actorId,
    });
    return questionnaire;
  }

  /**
   * Builds a draft questionnaire from a template's topics, questions and
   * default passing score, and counts the use against the template
   */
  async createFromTemplate(
    companyId: string,
    actorId: string,
    request: CreateFromTemplateRequest
  ): Promise<QuestionnaireWithQuestions> {
    const input = parseWithSchema(CreateFromTemplateRequestSchema, request);
    const template = await this.deps.repositories.templates.getById(input.templateId);
    if (!canViewTemplate(template, companyId)) {
      throw new NotFoundError(ErrorCode.TEMPLATE_NOT_FOUND, 'Template', input.templateId);
    }
    if (!isTemplatePublished(template)) {
      throw new InvalidTransitionError(
        'Template',
        template.visibility,
        undefined,
        ErrorCode.TEMPLATE_NOT_PUBLISHED,
        'Only published templates can be used'
      );
    }

    const now = this.deps.clock();
    const questionnaireId = uuidv4();
    const questions = template.questions.map((question, index): Question => {
      const options = buildOptions(question.options);
      return {
        id: uuidv4(),
        questionnaireId,
        topicId: question.topicId,
        text: question.text,
        description: question.description,
        helpText: question.helpText,
        type: question.type,
        order: index + 1,
        weight: question.weight ?? DEFAULT_QUESTION_WEIGHT,
        isMustPass: question.isMustPass,
        options,
        maxPoints: calculateMaxPoints({ type: question.type, options }),
        createdAt: now,
        updatedAt: now,
      };
    });

    const questionnaire = await this.repo.create({
      id: questionnaireId,
      companyId,
      templateId: template.id,
      name: input.name ?? template.name,
      description: template.description,
      status: QuestionnaireStatus.DRAFT,
      passingScore: template.defaultPassingScore,
      scoringMode: ScoringMode.PERCENTAGE,
      topics: template.topics.map((topic) => ({ id: topic.id, name: topic.name, order: topic.order })),
      ...statistics(questions),
      createdAt: now,
      updatedAt: now,
    });
    for (const question of questions) {
      await this.questions.create(question);
    }
    await this.deps.repositories.templates.update({
      ...template,
      usageCount: template.usageCount + 1,
      updatedAt: now,
    });

    this.deps.logger.info('Questionnaire created from template', {
      questionnaireId,
      templateId: template.id,
      companyId,
      actorId,
      questionCount: questions.length,
    });
    return { questionnaire, questions };
  }

  async getQuestionnaire(id: string, companyId: string): Promise<Questionnaire> {
    const questionnaire = await this.repo.getById(id);
    if (questionnaire.companyId !== companyId) {
      throw new NotFoundError(ErrorCode.QUESTIONNAIRE_NOT_FOUND, 'Questionnaire', id);
    }
    return questionnaire;
  }

  async getQuestionnaireWithQuestions(id: string, companyId: string): Promise<QuestionnaireWithQuestions> {
    const questionnaire = await this.getQuestionnaire(id, companyId);
    return { questionnaire, questions: await this.questions.listByQuestionnaire(id) };
  }

  async listQuestionnaires(
    companyId: string,
    filter: QuestionnaireFilter = {},
    pagination: Partial<PaginationOptions> = {}
  ): Promise<PaginatedResult<Questionnaire>> {
    return paginate(await this.repo.listByCompany(companyId, filter), pagination);
  }

  async updateQuestionnaire(
    id: string,
    companyId: string,
    request: UpdateQuestionnaireRequest
  ): Promise<Questionnaire> {
    const input = parseWithSchema(UpdateQuestionnaireRequestSchema, request);
    const questionnaire = await this.getDraft(id, companyId);

    return this.repo.update({
      ...questionnaire,
      name: input.name ?? questionnaire.name,
      description: input.description ?? questionnaire.description,
      passingScore: input.passingScore ?? questionnaire.passingScore,
      topics: input.topics ?? questionnaire.topics,
      updatedAt: this.deps.clock(),
    });
  }

  /**
   * Publishes a draft and freezes its statistics
   *
   * @edgecase a questionnaire without questions cannot be published
   */
  async publishQuestionnaire(id: string, companyId: string, actorId: string): Promise<Questionnaire> {
    const questionnaire = await this.getQuestionnaire(id, companyId);
    if (!isDraft(questionnaire)) {
      throw new InvalidTransitionError('Questionnaire', questionnaire.status, QuestionnaireStatus.PUBLISHED);
    }

    const questions = await this.questions.listByQuestionnaire(id);
    if (questions.length === 0) {
      this.deps.logger.warn('Publish of empty questionnaire refused', { questionnaireId: id });
      throw new InvalidTransitionError(
        'Questionnaire',
        questionnaire.status,
        QuestionnaireStatus.PUBLISHED,
        ErrorCode.CANNOT_PUBLISH,
        'A questionnaire needs at least one question before it can be published'
      );
    }

    const now = this.deps.clock();
    const published = await this.repo.update({
      ...questionnaire,
      ...statistics(questions),
      status: QuestionnaireStatus.PUBLISHED,
      publishedAt: now,
      updatedAt: now,
    });

    this.deps.logger.logStateChange({
      entity: 'Questionnaire',
      entityId: id,
      fromStatus: questionnaire.status,
      toStatus: published.status,
      actorId,
    });
    return published;
  }

  async archiveQuestionnaire(id: string, companyId: string, actorId: string): Promise<Questionnaire> {
    const questionnaire = await this.getQuestionnaire(id, companyId);
    if (questionnaire.status !== QuestionnaireStatus.PUBLISHED) {
      throw new InvalidTransitionError('Questionnaire', questionnaire.status, QuestionnaireStatus.ARCHIVED);
    }

    const archived = await this.repo.update({
      ...questionnaire,
      status: QuestionnaireStatus.ARCHIVED,
      updatedAt: this.deps.clock(),
    });
    this.deps.logger.logStateChange({
      entity: 'Questionnaire',
      entityId: id,
      fromStatus: questionnaire.status,
      toStatus: archived.status,
      actorId,
    });
    return archived;
  }

  /**
   * Deletes a draft questionnaire together with its questions
   */
  async deleteQuestionnaire(id: string, companyId: string): Promise<void> {
    const questionnaire = await this.getQuestionnaire(id, companyId);
    if (!isDraft(questionnaire)) {
      throw new InvalidTransitionError(
        'Questionnaire',
        questionnaire.status,
        undefined,
        ErrorCode.QUESTIONNAIRE_NOT_DELETABLE,
        'Only draft questionnaires can be deleted'
      );
    }

    const removed = await this.questions.deleteByQuestionnaire(id);
    await this.repo.delete(id);
    this.deps.logger.info('Questionnaire deleted', { questionnaireId: id, questionsRemoved: removed });
  }

  async addQuestion(
    questionnaireId: string,
    companyId: string,
    request: CreateQuestionRequest
  ): Promise<Question> {
    const input = parseWithSchema(CreateQuestionRequestSchema, request);
    const questionnaire = await this.getDraft(questionnaireId, companyId);
    this.assertTopic(questionnaire, input.topicId);

    const existing = await this.questions.listByQuestionnaire(questionnaireId);
    const options = buildOptions(input.options);
    const now = this.deps.clock();

    const question = await this.questions.create({
      id: uuidv4(),
      questionnaireId,
      topicId: input.topicId,
      text: input.text,
      description: input.description,
      helpText: input.helpText,
      type: input.type,
      order: existing.length + 1,
      weight: input.weight ?? DEFAULT_QUESTION_WEIGHT,
      isMustPass: input.isMustPass,
      options,
      maxPoints: calculateMaxPoints({ type: input.type, options }),
      createdAt: now,
      updatedAt: now,
    });

    await this.refreshStatistics(questionnaire);
    return question;
  }

  async updateQuestion(
    questionnaireId: string,
    questionId: string,
    companyId: string,
    request: UpdateQuestionRequest
  ): Promise<Question> {
    const input = parseWithSchema(UpdateQuestionRequestSchema, request);
    const questionnaire = await this.getDraft(questionnaireId, companyId);
    const question = await this.getQuestion(questionnaireId, questionId);
    this.assertTopic(questionnaire, input.topicId);
    if (input.options && input.options.length === 0 && isChoiceQuestion(question)) {
      throw new ValidationError(ErrorCode.INVALID_INPUT, 'Request validation failed', [
        { field: 'options', message: 'Choice questions need at least one option', code: 'custom' },
      ]);
    }

    const options = input.options ? buildOptions(input.options) : question.options;
    const updated = await this.questions.update({
      ...question,
      topicId: input.topicId ?? question.topicId,
      text: input.text ?? question.text,
      description: input.description ?? question.description,
      helpText: input.helpText ?? question.helpText,
      weight: input.weight ?? question.weight,
      isMustPass: input.isMustPass ?? question.isMustPass,
      options,
      maxPoints: calculateMaxPoints({ type: question.type, options }),
      updatedAt: this.deps.clock(),
    });

    await this.refreshStatistics(questionnaire);
    return updated;
  }

  async deleteQuestion(questionnaireId: string, questionId: string, companyId: string): Promise<void> {
    const questionnaire = await this.getDraft(questionnaireId, companyId);
    await this.getQuestion(questionnaireId, questionId);
    await this.questions.delete(questionId);
    await this.refreshStatistics(questionnaire);
  }

  /**
   * Applies a question id to order mapping. Questions not named keep their order.
   */
  async reorderQuestions(
    questionnaireId: string,
    companyId: string,
    request: { order: Record<string, number> }
  ): Promise<Question[]> {
    const input = parseWithSchema(ReorderQuestionsRequestSchema, request);
    await this.getDraft(questionnaireId, companyId);

    const questions = await this.questions.listByQuestionnaire(questionnaireId);
    const known = new Set(questions.map((q) => q.id));
    for (const questionId of Object.keys(input.order)) {
      if (!known.has(questionId)) {
        throw new NotFoundError(ErrorCode.QUESTION_NOT_FOUND, 'Question', questionId);
      }
    }

    const now = this.deps.clock();
    for (const question of questions) {
      const order = input.order[question.id];
      if (order !== undefined && order !== question.order) {
        await this.questions.update({ ...question, order, updatedAt: now });
      }
    }
    return this.questions.listByQuestionnaire(questionnaireId);
  }

  async getQuestionnaireStats(companyId: string): Promise<QuestionnaireStats> {
    const questionnaires = await this.repo.listByCompany(companyId);
    const count = (status: QuestionnaireStatus) => questionnaires.filter((q) => q.status === status).length;
    return {
      total: questionnaires.length,
      draft: count(QuestionnaireStatus.DRAFT),
      published: count(QuestionnaireStatus.PUBLISHED),
      archived: count(QuestionnaireStatus.ARCHIVED),
    };
  }

  private async getDraft(id: string, companyId: string): Promise<Questionnaire> {
    const questionnaire = await this.getQuestionnaire(id, companyId);
    if (!isDraft(questionnaire)) {
      this.deps.logger.warn('Edit of non-draft questionnaire refused', {
        questionnaireId: id,
        status: questionnaire.status,
      });
      throw new InvalidTransitionError(
        'Questionnaire',
        questionnaire.status,
        undefined,
        ErrorCode.QUESTIONNAIRE_NOT_EDITABLE,
        'Only draft questionnaires can be edited'
      );
    }
    return questionnaire;
  }

  private async getQuestion(questionnaireId: string, questionId: string): Promise<Question> {
    const question = await this.questions.getById(questionId);
    if (question.questionnaireId !== questionnaireId) {
      throw new NotFoundError(ErrorCode.QUESTION_NOT_FOUND, 'Question', questionId);
    }
    return question;
  }

  private assertTopic(questionnaire: Questionnaire, topicId: string | undefined): void {
    if (topicId !== undefined && !getTopicById(questionnaire, topicId)) {
      throw new ValidationError(ErrorCode.INVALID_INPUT, `Unknown topic: ${topicId}`, [
        { field: 'topicId', message: 'Topic does not belong to the questionnaire', code: ErrorCode.INVALID_INPUT },
      ]);
    }
  }

  private async refreshStatistics(questionnaire: Questionnaire): Promise<void> {
    const questions = await this.questions.listByQuestionnaire(questionnaire.id);
    await this.repo.update({
      ...questionnaire,
      ...statistics(questions),
      updatedAt: this.deps.clock(),
    });
  }
}

function statistics(questions: readonly Question[]): Pick<Questionnaire, 'questionCount' | 'maxPossibleScore'> {
  return {
    questionCount: questions.length,
    maxPossibleScore: questions.reduce((sum, question) => sum + question.maxPoints, 0),
  };
}
