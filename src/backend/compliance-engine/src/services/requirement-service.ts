/**
 * Requirement Service
 *
 * Assignment and maintenance of requirements under active relationships.
 *
 * @tested tests/integration/requirement-service.integration.test.ts
 * @edgecase requirements can only be edited while pending
 * @edgecase questionnaire requirements need a published questionnaire owned by the company
 */

import {
  CreateRequirementRequestSchema,
  ErrorCode,
  InvalidTransitionError,
  isPublished,
  isQuestionnaireRequirement,
  NotFoundError,
  paginate,
  parseWithSchema,
  RequirementStatus,
  RequirementType,
  UpdateRequirementRequestSchema,
  ValidationError,
  type CreateRequirementRequest,
  type PaginatedResult,
  type PaginationOptions,
  type Question,
  type Questionnaire,
  type QuestionOption,
  type Requirement,
  type RequirementStats,
  type UpdateRequirementRequest,
} from '@supplier-compliance/shared';
import * as requirementMachine from '../state-machines/requirement-state-machine.js';
import { canReceiveRequirements } from '../state-machines/relationship-state-machine.js';
import type { RequirementFilter } from '../repositories/interfaces.js';
import type { EngineDependencies } from './dependencies.js';

/**
 * Who is looking at a requirement
 */
export type RequirementScope = { companyId: string } | { supplierId: string };

export const SYSTEM_ACTOR = 'system';

/**
 * Question as shown to the answering supplier; option points and
 * correctness stay with the company
 */
export interface AssignedQuestion extends Omit<Question, 'options'> {
  options: Array<Pick<QuestionOption, 'id' | 'text' | 'order'>>;
}

export interface AssignedQuestionnaire {
  questionnaire: Pick<Questionnaire, 'id' | 'name' | 'description' | 'topics' | 'questionCount'>;
  questions: AssignedQuestion[];
}

export class RequirementService {
  constructor(private readonly deps: EngineDependencies) {}

  private get repo() {
    return this.deps.repositories.requirements;
  }

  async createRequirement(
    companyId: string,
    actorId: string,
    request: CreateRequirementRequest
  ): Promise<Requirement> {
    const input = parseWithSchema(CreateRequirementRequestSchema, request);
    const { relationships, questionnaires } = this.deps.repositories;

    const relationship = await relationships.getById(input.relationshipId);
    if (relationship.companyId !== companyId) {
      throw new NotFoundError(ErrorCode.RELATIONSHIP_NOT_FOUND, 'Relationship', input.relationshipId);
    }
    const supplierId = relationship.supplierId;
    if (!canReceiveRequirements(relationship) || !supplierId) {
      this.deps.logger.warn('Requirement assignment refused', {
        relationshipId: relationship.id,
        status: relationship.status,
      });
      throw new InvalidTransitionError(
        'Relationship',
        relationship.status,
        undefined,
        ErrorCode.CANNOT_RECEIVE_REQUIREMENTS,
        'Requirements can only be assigned to active relationships'
      );
    }

    const base = {
      relationshipId: relationship.id,
      companyId,
      supplierId,
      title: input.title,
      description: input.description,
      priority: input.priority,
      dueDate: input.dueDate,
      assignedByUserId: actorId,
      now: this.deps.clock(),
    };

    let requirement: Requirement;
    if (input.type === RequirementType.QUESTIONNAIRE) {
      const questionnaire = await questionnaires.getById(input.questionnaireId);
      if (questionnaire.companyId !== companyId) {
        throw new NotFoundError(ErrorCode.QUESTIONNAIRE_NOT_FOUND, 'Questionnaire', input.questionnaireId);
      }
      if (!isPublished(questionnaire)) {
        throw new ValidationError(
          ErrorCode.QUESTIONNAIRE_NOT_PUBLISHED,
          'Only published questionnaires can be assigned',
          [{ field: 'questionnaireId', message: 'Questionnaire is not published', code: ErrorCode.QUESTIONNAIRE_NOT_PUBLISHED }]
        );
      }
      requirement = requirementMachine.createRequirement({
        ...base,
        type: RequirementType.QUESTIONNAIRE,
        questionnaireId: questionnaire.id,
        passingScore: input.passingScore ?? questionnaire.passingScore,
      });
    } else {
      requirement = requirementMachine.createRequirement({
        ...base,
        type: RequirementType.CHECKFIX,
        minimumGrade: input.minimumGrade,
        maxReportAgeDays: input.maxReportAgeDays,
      });
    }

    const saved = await this.repo.create(requirement);
    this.deps.logger.logStateChange({
      entity: 'Requirement',
      entityId: saved.id,
      fromStatus: null,
      toStatus: saved.status,
      actorId,
      reason: 'Requirement assigned',
    });
    return saved;
  }

  async getRequirement(id: string, scope: RequirementScope): Promise<Requirement> {
    const requirement = await this.repo.getById(id);
    const owned =
      'companyId' in scope
        ? requirement.companyId === scope.companyId
        : requirement.supplierId === scope.supplierId;
    if (!owned) {
      throw new NotFoundError(ErrorCode.REQUIREMENT_NOT_FOUND, 'Requirement', id);
    }
    return requirement;
  }

  /**
   * Questionnaire behind a supplier's questionnaire requirement
   */
  async getAssignedQuestionnaire(requirementId: string, supplierId: string): Promise<AssignedQuestionnaire> {
    const requirement = await this.getRequirement(requirementId, { supplierId });
    if (!isQuestionnaireRequirement(requirement)) {
      throw new ValidationError(
        ErrorCode.INVALID_REQUIREMENT_TYPE,
        'Requirement is not a questionnaire requirement'
      );
    }

    const { questionnaires, questions } = this.deps.repositories;
    const questionnaire = await questionnaires.getById(requirement.questionnaireId);
    const assigned = await questions.listByQuestionnaire(questionnaire.id);

    return {
      questionnaire: {
        id: questionnaire.id,
        name: questionnaire.name,
        description: questionnaire.description,
        topics: questionnaire.topics,
        questionCount: questionnaire.questionCount,
      },
      questions: assigned.map((question) => ({
        ...question,
        options: question.options.map(({ id, text, order }) => ({ id, text, order })),
      })),
    };
  }

  async listCompanyRequirements(
    companyId: string,
    filter: RequirementFilter = {},
    pagination: Partial<PaginationOptions> = {}
  ): Promise<PaginatedResult<Requirement>> {
    return paginate(await this.repo.listByCompany(companyId, filter), pagination);
  }

  async listSupplierRequirements(
    supplierId: string,
    filter: RequirementFilter = {},
    pagination: Partial<PaginationOptions> = {}
  ): Promise<PaginatedResult<Requirement>> {
    return paginate(await this.repo.listBySupplier(supplierId, filter), pagination);
  }

  /**
   * Updates a pending requirement. Kind-specific fields that do not match
   * the requirement's type are ignored.
   */
  async updateRequirement(
    id: string,
    companyId: string,
    request: UpdateRequirementRequest
  ): Promise<Requirement> {
    const input = parseWithSchema(UpdateRequirementRequestSchema, request);
    const requirement = await this.getRequirement(id, { companyId });
    if (!requirementMachine.canBeUpdated(requirement)) {
      throw new InvalidTransitionError(
        'Requirement',
        requirement.status,
        undefined,
        ErrorCode.REQUIREMENT_NOT_EDITABLE,
        'Requirements can only be updated while pending'
      );
    }

    const common = {
      title: input.title ?? requirement.title,
      description: input.description ?? requirement.description,
      priority: input.priority ?? requirement.priority,
      dueDate: input.dueDate ?? requirement.dueDate,
      updatedAt: this.deps.clock(),
    };

    const updated: Requirement =
      requirement.type === RequirementType.QUESTIONNAIRE
        ? { ...requirement, ...common, passingScore: input.passingScore ?? requirement.passingScore }
        : {
            ...requirement,
            ...common,
            minimumGrade: input.minimumGrade ?? requirement.minimumGrade,
            maxReportAgeDays: input.maxReportAgeDays ?? requirement.maxReportAgeDays,
          };

    return this.repo.update(updated);
  }

  /**
   * Moves overdue pending and in-progress requirements to expired
   */
  async expireOverdue(now: Date = this.deps.clock()): Promise<Requirement[]> {
    const candidates = await this.repo.listByStatuses([
      RequirementStatus.PENDING,
      RequirementStatus.IN_PROGRESS,
    ]);

    const expired: Requirement[] = [];
    for (const requirement of candidates) {
      if (!requirementMachine.isOverdue(requirement, now)) {
        continue;
      }
      const saved = await this.repo.update(requirementMachine.expire(requirement, SYSTEM_ACTOR, now));
      this.deps.logger.logStateChange({
        entity: 'Requirement',
        entityId: saved.id,
        fromStatus: requirement.status,
        toStatus: saved.status,
        actorId: SYSTEM_ACTOR,
        reason: 'Due date passed',
      });
      expired.push(saved);
    }
    return expired;
  }

  async getRequirementStats(companyId: string, now: Date = this.deps.clock()): Promise<RequirementStats> {
    const requirements = await this.repo.listByCompany(companyId);
    const count = (status: RequirementStatus) => requirements.filter((r) => r.status === status).length;

    return {
      total: requirements.length,
      pending: count(RequirementStatus.PENDING),
      inProgress: count(RequirementStatus.IN_PROGRESS),
      submitted: count(RequirementStatus.SUBMITTED),
      underReview: count(RequirementStatus.UNDER_REVIEW),
      approved: count(RequirementStatus.APPROVED),
      rejected: count(RequirementStatus.REJECTED),
      expired: count(RequirementStatus.EXPIRED),
      overdue: requirements.filter((r) => requirementMachine.isOverdue(r, now)).length,
    };
  }
}
