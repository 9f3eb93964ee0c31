/**
 * In-Memory Repositories
 *
 * Map-backed implementations of the repository interfaces. Entities are
 * stored and returned as structured clones, so callers never share state
 * with the store. Uniqueness constraints are enforced on create and update.
 *
 * @tested tests/integration/repositories.integration.test.ts
 */

import {
  ConflictError,
  ErrorCode,
  NotFoundError,
  RelationshipStatus,
  TemplateVisibility,
  type CheckFixVerification,
  type Organization,
  type Question,
  type Questionnaire,
  type QuestionnaireTemplate,
  type QuestionnaireSubmission,
  type Relationship,
  type Requirement,
  type RequirementStatus,
  type SupplierResponse,
} from '@supplier-compliance/shared';
import type {
  OrganizationRepository,
  QuestionnaireFilter,
  QuestionnaireRepository,
  QuestionRepository,
  RelationshipFilter,
  RelationshipRepository,
  Repositories,
  RequirementFilter,
  RequirementRepository,
  ResponseRepository,
  SubmissionRepository,
  TemplateFilter,
  TemplateRepository,
  VerificationRepository,
} from './interfaces.js';

/**
 * Shared id-keyed storage
 */
abstract class InMemoryStore<T extends { id: string }> {
  protected readonly items = new Map<string, T>();

  constructor(
    private readonly resourceType: string,
    private readonly notFoundCode: ErrorCode
  ) {}

  protected values(): T[] {
    return [...this.items.values()].map((item) => structuredClone(item));
  }

  protected insert(item: T): T {
    if (this.items.has(item.id)) {
      throw new ConflictError(ErrorCode.DUPLICATE_ENTITY, `${this.resourceType} ${item.id} already exists`);
    }
    this.items.set(item.id, structuredClone(item));
    return structuredClone(item);
  }

  protected replace(item: T): T {
    if (!this.items.has(item.id)) {
      throw new NotFoundError(this.notFoundCode, this.resourceType, item.id);
    }
    this.items.set(item.id, structuredClone(item));
    return structuredClone(item);
  }

  protected remove(id: string): void {
    if (!this.items.delete(id)) {
      throw new NotFoundError(this.notFoundCode, this.resourceType, id);
    }
  }

  async getById(id: string): Promise<T> {
    const item = this.items.get(id);
    if (!item) {
      throw new NotFoundError(this.notFoundCode, this.resourceType, id);
    }
    return structuredClone(item);
  }

  // For testing
  clear(): void {
    this.items.clear();
  }

  size(): number {
    return this.items.size;
  }
}

function byNewest<T extends { createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

export class InMemoryRelationshipRepository
  extends InMemoryStore<Relationship>
  implements RelationshipRepository
{
  constructor() {
    super('Relationship', ErrorCode.RELATIONSHIP_NOT_FOUND);
  }

  private assertUnique(relationship: Relationship): void {
    for (const existing of this.items.values()) {
      if (existing.id === relationship.id || existing.companyId !== relationship.companyId) {
        continue;
      }
      if (existing.invitedEmail === relationship.invitedEmail) {
        throw new ConflictError(
          ErrorCode.SUPPLIER_ALREADY_INVITED,
          'This supplier has already been invited'
        );
      }
      if (relationship.supplierId && existing.supplierId === relationship.supplierId) {
        throw new ConflictError(
          ErrorCode.RELATIONSHIP_EXISTS,
          'A relationship with this supplier already exists'
        );
      }
    }
  }

  async create(relationship: Relationship): Promise<Relationship> {
    this.assertUnique(relationship);
    return this.insert(relationship);
  }

  async update(relationship: Relationship): Promise<Relationship> {
    this.assertUnique(relationship);
    return this.replace(relationship);
  }

  async findByCompanyAndEmail(companyId: string, email: string): Promise<Relationship | null> {
    const normalized = email.trim().toLowerCase();
    return (
      this.values().find((r) => r.companyId === companyId && r.invitedEmail === normalized) ?? null
    );
  }

  async findByCompanyAndSupplier(companyId: string, supplierId: string): Promise<Relationship | null> {
    return this.values().find((r) => r.companyId === companyId && r.supplierId === supplierId) ?? null;
  }

  async listByCompany(companyId: string, filter: RelationshipFilter = {}): Promise<Relationship[]> {
    const search = filter.search?.trim().toLowerCase();
    return this.values()
      .filter((r) => r.companyId === companyId)
      .filter((r) => !filter.status || r.status === filter.status)
      .filter((r) => !filter.classification || r.classification === filter.classification)
      .filter(
        (r) =>
          !search ||
          r.invitedEmail.includes(search) ||
          (r.notes ?? '').toLowerCase().includes(search) ||
          r.servicesProvided.some((service) => service.toLowerCase().includes(search))
      )
      .sort(byNewest);
  }

  async listBySupplier(supplierId: string): Promise<Relationship[]> {
    return this.values()
      .filter((r) => r.supplierId === supplierId)
      .sort(byNewest);
  }

  async listPendingByEmail(email: string): Promise<Relationship[]> {
    const normalized = email.trim().toLowerCase();
    return this.values()
      .filter((r) => r.invitedEmail === normalized && r.status === RelationshipStatus.PENDING)
      .sort(byNewest);
  }
}

function matchesRequirementFilter(requirement: Requirement, filter: RequirementFilter): boolean {
  return (
    (!filter.status || requirement.status === filter.status) &&
    (!filter.type || requirement.type === filter.type) &&
    (!filter.supplierId || requirement.supplierId === filter.supplierId) &&
    (!filter.relationshipId || requirement.relationshipId === filter.relationshipId)
  );
}

export class InMemoryRequirementRepository
  extends InMemoryStore<Requirement>
  implements RequirementRepository
{
  constructor() {
    super('Requirement', ErrorCode.REQUIREMENT_NOT_FOUND);
  }

  async create(requirement: Requirement): Promise<Requirement> {
    return this.insert(requirement);
  }

  async update(requirement: Requirement): Promise<Requirement> {
    return this.replace(requirement);
  }

  async listByCompany(companyId: string, filter: RequirementFilter = {}): Promise<Requirement[]> {
    return this.values()
      .filter((r) => r.companyId === companyId && matchesRequirementFilter(r, filter))
      .sort(byNewest);
  }

  async listBySupplier(supplierId: string, filter: RequirementFilter = {}): Promise<Requirement[]> {
    return this.values()
      .filter((r) => r.supplierId === supplierId && matchesRequirementFilter(r, filter))
      .sort(byNewest);
  }

  async listByStatuses(statuses: readonly RequirementStatus[]): Promise<Requirement[]> {
    return this.values().filter((r) => statuses.includes(r.status));
  }
}

export class InMemoryResponseRepository
  extends InMemoryStore<SupplierResponse>
  implements ResponseRepository
{
  constructor() {
    super('Response', ErrorCode.RESPONSE_NOT_FOUND);
  }

  async create(response: SupplierResponse): Promise<SupplierResponse> {
    for (const existing of this.items.values()) {
      if (existing.requirementId === response.requirementId) {
        throw new ConflictError(
          ErrorCode.RESPONSE_ALREADY_EXISTS,
          `A response already exists for requirement ${response.requirementId}`
        );
      }
    }
    return this.insert(response);
  }

  async getByRequirement(requirementId: string): Promise<SupplierResponse | null> {
    return this.values().find((r) => r.requirementId === requirementId) ?? null;
  }

  async update(response: SupplierResponse): Promise<SupplierResponse> {
    return this.replace(response);
  }
}

export class InMemorySubmissionRepository
  extends InMemoryStore<QuestionnaireSubmission>
  implements SubmissionRepository
{
  constructor() {
    super('Submission', ErrorCode.SUBMISSION_NOT_FOUND);
  }

  async create(submission: QuestionnaireSubmission): Promise<QuestionnaireSubmission> {
    for (const existing of this.items.values()) {
      if (existing.responseId === submission.responseId && existing.attempt === submission.attempt) {
        throw new ConflictError(
          ErrorCode.SUBMISSION_EXISTS,
          `Attempt ${submission.attempt} of response ${submission.responseId} is already submitted`
        );
      }
    }
    return this.insert(submission);
  }

  async findByResponseAttempt(
    responseId: string,
    attempt: number
  ): Promise<QuestionnaireSubmission | null> {
    return this.values().find((s) => s.responseId === responseId && s.attempt === attempt) ?? null;
  }

  async listByResponse(responseId: string): Promise<QuestionnaireSubmission[]> {
    return this.values()
      .filter((s) => s.responseId === responseId)
      .sort((a, b) => a.attempt - b.attempt);
  }
}

export class InMemoryVerificationRepository
  extends InMemoryStore<CheckFixVerification>
  implements VerificationRepository
{
  constructor() {
    super('Verification', ErrorCode.VERIFICATION_NOT_FOUND);
  }

  async create(verification: CheckFixVerification): Promise<CheckFixVerification> {
    for (const existing of this.items.values()) {
      if (
        existing.responseId === verification.responseId &&
        existing.attempt === verification.attempt
      ) {
        throw new ConflictError(
          ErrorCode.VERIFICATION_EXISTS,
          `Attempt ${verification.attempt} of response ${verification.responseId} is already verified`
        );
      }
    }
    return this.insert(verification);
  }

  async update(verification: CheckFixVerification): Promise<CheckFixVerification> {
    return this.replace(verification);
  }

  async findByResponseAttempt(
    responseId: string,
    attempt: number
  ): Promise<CheckFixVerification | null> {
    return this.values().find((v) => v.responseId === responseId && v.attempt === attempt) ?? null;
  }

  async getLatestByResponse(responseId: string): Promise<CheckFixVerification | null> {
    const matches = this.values()
      .filter((v) => v.responseId === responseId)
      .sort((a, b) => b.verifiedAt.getTime() - a.verifiedAt.getTime());
    return matches[0] ?? null;
  }

  async getLatestBySupplier(supplierId: string): Promise<CheckFixVerification | null> {
    const matches = this.values()
      .filter((v) => v.supplierId === supplierId)
      .sort((a, b) => b.verifiedAt.getTime() - a.verifiedAt.getTime());
    return matches[0] ?? null;
  }
}

export class InMemoryQuestionRepository
  extends InMemoryStore<Question>
  implements QuestionRepository
{
  constructor() {
    super('Question', ErrorCode.QUESTION_NOT_FOUND);
  }

  async create(question: Question): Promise<Question> {
    return this.insert(question);
  }

  async update(question: Question): Promise<Question> {
    return this.replace(question);
  }

  async delete(id: string): Promise<void> {
    this.remove(id);
  }

  async listByQuestionnaire(questionnaireId: string): Promise<Question[]> {
    return this.values()
      .filter((q) => q.questionnaireId === questionnaireId)
      .sort((a, b) => a.order - b.order);
  }

  async deleteByQuestionnaire(questionnaireId: string): Promise<number> {
    let removed = 0;
    for (const question of [...this.items.values()]) {
      if (question.questionnaireId === questionnaireId) {
        this.items.delete(question.id);
        removed++;
      }
    }
    return removed;
  }
}

export class InMemoryQuestionnaireRepository
  extends InMemoryStore<Questionnaire>
  implements QuestionnaireRepository
{
  constructor() {
    super('Questionnaire', ErrorCode.QUESTIONNAIRE_NOT_FOUND);
  }

  async create(questionnaire: Questionnaire): Promise<Questionnaire> {
    return this.insert(questionnaire);
  }

  async update(questionnaire: Questionnaire): Promise<Questionnaire> {
    return this.replace(questionnaire);
  }

  async delete(id: string): Promise<void> {
    this.remove(id);
  }

  async listByCompany(companyId: string, filter: QuestionnaireFilter = {}): Promise<Questionnaire[]> {
    return this.values()
      .filter((q) => q.companyId === companyId && (!filter.status || q.status === filter.status))
      .sort(byNewest);
  }
}

export class InMemoryTemplateRepository
  extends InMemoryStore<QuestionnaireTemplate>
  implements TemplateRepository
{
  constructor() {
    super('Template', ErrorCode.TEMPLATE_NOT_FOUND);
  }

  async create(template: QuestionnaireTemplate): Promise<QuestionnaireTemplate> {
    return this.insert(template);
  }

  async update(template: QuestionnaireTemplate): Promise<QuestionnaireTemplate> {
    return this.replace(template);
  }

  async delete(id: string): Promise<void> {
    this.remove(id);
  }

  async listAvailable(organizationId: string, filter: TemplateFilter = {}): Promise<QuestionnaireTemplate[]> {
    return this.values()
      .filter(
        (t) =>
          (t.isSystem ||
            t.visibility === TemplateVisibility.GLOBAL ||
            (t.createdByOrgId === organizationId && t.visibility === TemplateVisibility.LOCAL)) &&
          (!filter.category || t.category === filter.category)
      )
      .sort((a, b) => Number(b.isSystem) - Number(a.isSystem) || a.name.localeCompare(b.name));
  }

  async listByCreator(userId: string): Promise<QuestionnaireTemplate[]> {
    return this.values()
      .filter((t) => t.createdByUserId === userId)
      .sort(byNewest);
  }

  async countSystem(): Promise<number> {
    return this.values().filter((t) => t.isSystem).length;
  }
}

export class InMemoryOrganizationRepository
  extends InMemoryStore<Organization>
  implements OrganizationRepository
{
  constructor() {
    super('Organization', ErrorCode.ORGANIZATION_NOT_FOUND);
  }

  async create(organization: Organization): Promise<Organization> {
    return this.insert(organization);
  }

  async update(organization: Organization): Promise<Organization> {
    return this.replace(organization);
  }
}

/**
 * Builds a full set of empty in-memory repositories
 */
export function createInMemoryRepositories(): Repositories {
  return {
    relationships: new InMemoryRelationshipRepository(),
    requirements: new InMemoryRequirementRepository(),
    responses: new InMemoryResponseRepository(),
    submissions: new InMemorySubmissionRepository(),
    verifications: new InMemoryVerificationRepository(),
    questions: new InMemoryQuestionRepository(),
    questionnaires: new InMemoryQuestionnaireRepository(),
    templates: new InMemoryTemplateRepository(),
    organizations: new InMemoryOrganizationRepository(),
  };
}
