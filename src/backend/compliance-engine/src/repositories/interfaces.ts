/**
 * Repository Interfaces
 *
 * Persistence contracts the engine depends on. Lookups by id throw
 * NotFoundError; uniqueness violations throw ConflictError.
 */

import type {
  CheckFixVerification,
  Organization,
  Question,
  Questionnaire,
  QuestionnaireStatus,
  QuestionnaireTemplate,
  QuestionnaireSubmission,
  Relationship,
  RelationshipStatus,
  Requirement,
  RequirementStatus,
  RequirementType,
  SupplierClassification,
  SupplierResponse,
  TemplateCategory,
} from '@supplier-compliance/shared';

export interface RelationshipFilter {
  status?: RelationshipStatus;
  classification?: SupplierClassification;
  /** Case-insensitive match on invited email, notes and services */
  search?: string;
}

export interface RequirementFilter {
  status?: RequirementStatus;
  type?: RequirementType;
  supplierId?: string;
  relationshipId?: string;
}

export interface QuestionnaireFilter {
  status?: QuestionnaireStatus;
}

export interface TemplateFilter {
  category?: TemplateCategory;
}

export interface RelationshipRepository {
  create(relationship: Relationship): Promise<Relationship>;
  getById(id: string): Promise<Relationship>;
  update(relationship: Relationship): Promise<Relationship>;
  findByCompanyAndEmail(companyId: string, email: string): Promise<Relationship | null>;
  findByCompanyAndSupplier(companyId: string, supplierId: string): Promise<Relationship | null>;
  listByCompany(companyId: string, filter?: RelationshipFilter): Promise<Relationship[]>;
  listBySupplier(supplierId: string): Promise<Relationship[]>;
  listPendingByEmail(email: string): Promise<Relationship[]>;
}

export interface RequirementRepository {
  create(requirement: Requirement): Promise<Requirement>;
  getById(id: string): Promise<Requirement>;
  update(requirement: Requirement): Promise<Requirement>;
  listByCompany(companyId: string, filter?: RequirementFilter): Promise<Requirement[]>;
  listBySupplier(supplierId: string, filter?: RequirementFilter): Promise<Requirement[]>;
  listByStatuses(statuses: readonly RequirementStatus[]): Promise<Requirement[]>;
}

export interface ResponseRepository {
  /** At most one response per requirement */
  create(response: SupplierResponse): Promise<SupplierResponse>;
  getById(id: string): Promise<SupplierResponse>;
  getByRequirement(requirementId: string): Promise<SupplierResponse | null>;
  update(response: SupplierResponse): Promise<SupplierResponse>;
}

export interface SubmissionRepository {
  /** At most one submission per (responseId, attempt) */
  create(submission: QuestionnaireSubmission): Promise<QuestionnaireSubmission>;
  getById(id: string): Promise<QuestionnaireSubmission>;
  findByResponseAttempt(responseId: string, attempt: number): Promise<QuestionnaireSubmission | null>;
  listByResponse(responseId: string): Promise<QuestionnaireSubmission[]>;
}

export interface VerificationRepository {
  /** At most one verification per (responseId, attempt) */
  create(verification: CheckFixVerification): Promise<CheckFixVerification>;
  getById(id: string): Promise<CheckFixVerification>;
  update(verification: CheckFixVerification): Promise<CheckFixVerification>;
  findByResponseAttempt(responseId: string, attempt: number): Promise<CheckFixVerification | null>;
  getLatestByResponse(responseId: string): Promise<CheckFixVerification | null>;
  getLatestBySupplier(supplierId: string): Promise<CheckFixVerification | null>;
}

export interface QuestionRepository {
  create(question: Question): Promise<Question>;
  getById(id: string): Promise<Question>;
  update(question: Question): Promise<Question>;
  delete(id: string): Promise<void>;
  /** Ordered by `order` */
  listByQuestionnaire(questionnaireId: string): Promise<Question[]>;
  deleteByQuestionnaire(questionnaireId: string): Promise<number>;
}

export interface QuestionnaireRepository {
  create(questionnaire: Questionnaire): Promise<Questionnaire>;
  getById(id: string): Promise<Questionnaire>;
  update(questionnaire: Questionnaire): Promise<Questionnaire>;
  delete(id: string): Promise<void>;
  listByCompany(companyId: string, filter?: QuestionnaireFilter): Promise<Questionnaire[]>;
}

export interface TemplateRepository {
  create(template: QuestionnaireTemplate): Promise<QuestionnaireTemplate>;
  getById(id: string): Promise<QuestionnaireTemplate>;
  update(template: QuestionnaireTemplate): Promise<QuestionnaireTemplate>;
  delete(id: string): Promise<void>;
  /** System templates, global ones and the organization's own published ones */
  listAvailable(organizationId: string, filter?: TemplateFilter): Promise<QuestionnaireTemplate[]>;
  listByCreator(userId: string): Promise<QuestionnaireTemplate[]>;
  countSystem(): Promise<number>;
}

export interface OrganizationRepository {
  create(organization: Organization): Promise<Organization>;
  getById(id: string): Promise<Organization>;
  update(organization: Organization): Promise<Organization>;
}

/**
 * Everything the services need, bundled for wiring
 */
export interface Repositories {
  relationships: RelationshipRepository;
  requirements: RequirementRepository;
  responses: ResponseRepository;
  submissions: SubmissionRepository;
  verifications: VerificationRepository;
  questions: QuestionRepository;
  questionnaires: QuestionnaireRepository;
  templates: TemplateRepository;
  organizations: OrganizationRepository;
}
