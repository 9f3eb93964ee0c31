/**
 * Relationship Service
 *
 * Invitation handling and lifecycle management of Company/Supplier
 * relationships. Company-facing operations are scoped to the owning company;
 * a relationship owned by someone else is reported as not found.
 *
 * @tested tests/integration/relationship-service.integration.test.ts
 */

import {
  ConflictError,
  ErrorCode,
  InvalidTransitionError,
  InviteSupplierRequestSchema,
  lastStatusChange,
  NotFoundError,
  paginate,
  parseWithSchema,
  RelationshipStatus,
  SupplierClassification,
  SupplierClassificationSchema,
  UpdateRelationshipRequestSchema,
  ValidationError,
  type InviteSupplierRequest,
  type PaginatedResult,
  type PaginationOptions,
  type Relationship,
  type SupplierStats,
  type UpdateRelationshipRequest,
} from '@supplier-compliance/shared';
import * as relationshipMachine from '../state-machines/relationship-state-machine.js';
import type { RelationshipFilter } from '../repositories/interfaces.js';
import { deliverSafely, NotificationType } from '../notifications/notifier.js';
import type { EngineDependencies } from './dependencies.js';

export interface AcceptInvitationParams {
  supplierId: string;
  actorId: string;
  /** Email of the accepting user; must match the invitation */
  email: string;
}

export class RelationshipService {
  constructor(private readonly deps: EngineDependencies) {}

  private get repo() {
    return this.deps.repositories.relationships;
  }

  /**
   * Invites a supplier by email
   *
   * @edgecase the email is trimmed and lower-cased before the duplicate check
   */
  async inviteSupplier(
    companyId: string,
    actorId: string,
    request: InviteSupplierRequest
  ): Promise<Relationship> {
    const input = parseWithSchema(InviteSupplierRequestSchema, request);
    const email = input.email.trim().toLowerCase();

    const existing = await this.repo.findByCompanyAndEmail(companyId, email);
    if (existing) {
      this.deps.logger.warn('Duplicate supplier invitation refused', { companyId, invitedEmail: email });
      throw new ConflictError(ErrorCode.SUPPLIER_ALREADY_INVITED, 'This supplier has already been invited');
    }

    const relationship = await this.repo.create(
      relationshipMachine.createRelationship({
        companyId,
        invitedEmail: email,
        invitedByUserId: actorId,
        classification: input.classification,
        notes: input.notes,
        servicesProvided: input.servicesProvided,
        contractRef: input.contractRef,
        now: this.deps.clock(),
      })
    );

    this.deps.logger.logStateChange({
      entity: 'Relationship',
      entityId: relationship.id,
      fromStatus: null,
      toStatus: relationship.status,
      actorId,
      reason: 'Invitation sent',
    });
    await deliverSafely(this.deps.logger, NotificationType.INVITATION, relationship.id, () =>
      this.deps.notifier.notifyInvitation(relationship)
    );

    return relationship;
  }

  async getRelationship(id: string, companyId: string): Promise<Relationship> {
    const relationship = await this.repo.getById(id);
    if (relationship.companyId !== companyId) {
      throw new NotFoundError(ErrorCode.RELATIONSHIP_NOT_FOUND, 'Relationship', id);
    }
    return relationship;
  }

  async listCompanySuppliers(
    companyId: string,
    filter: RelationshipFilter = {},
    pagination: Partial<PaginationOptions> = {}
  ): Promise<PaginatedResult<Relationship>> {
    const relationships = await this.repo.listByCompany(companyId, filter);
    return paginate(relationships, pagination);
  }

  async listPendingInvitations(email: string): Promise<Relationship[]> {
    return this.repo.listPendingByEmail(email.trim().toLowerCase());
  }

  /**
   * Active and suspended relationships a supplier belongs to
   */
  async listSupplierCompanies(supplierId: string): Promise<Relationship[]> {
    const relationships = await this.repo.listBySupplier(supplierId);
    return relationships.filter(
      (r) => r.status === RelationshipStatus.ACTIVE || r.status === RelationshipStatus.SUSPENDED
    );
  }

  private async getInvitation(id: string, email: string): Promise<Relationship> {
    const relationship = await this.repo.getById(id);
    if (relationship.invitedEmail !== email.trim().toLowerCase()) {
      throw new NotFoundError(ErrorCode.RELATIONSHIP_NOT_FOUND, 'Relationship', id);
    }
    return relationship;
  }

  /**
   * Accepts an invitation and binds the supplier organization
   *
   * @edgecase a company can only be bound to the same supplier once
   */
  async acceptInvitation(id: string, params: AcceptInvitationParams): Promise<Relationship> {
    const relationship = await this.getInvitation(id, params.email);
    const accepted = relationshipMachine.accept(
      relationship,
      params.supplierId,
      params.actorId,
      this.deps.clock()
    );

    const bound = await this.repo.findByCompanyAndSupplier(relationship.companyId, params.supplierId);
    if (bound && bound.id !== relationship.id) {
      throw new ConflictError(ErrorCode.RELATIONSHIP_EXISTS, 'A relationship with this company already exists');
    }

    const saved = await this.repo.update(accepted);
    this.logTransition(relationship, saved, params.actorId);
    return saved;
  }

  async declineInvitation(
    id: string,
    email: string,
    actorId: string,
    reason: string
  ): Promise<Relationship> {
    const relationship = await this.getInvitation(id, email);
    const declined = relationshipMachine.decline(relationship, actorId, reason, this.deps.clock());
    const saved = await this.repo.update(declined);
    this.logTransition(relationship, saved, actorId);
    return saved;
  }

  async updateClassification(
    id: string,
    companyId: string,
    classification: string
  ): Promise<Relationship> {
    const parsed = SupplierClassificationSchema.safeParse(classification);
    if (!parsed.success) {
      throw new ValidationError(ErrorCode.INVALID_CLASSIFICATION, `Invalid classification: ${classification}`, [
        {
          field: 'classification',
          message: `Must be one of ${Object.values(SupplierClassification).join(', ')}`,
          code: ErrorCode.INVALID_CLASSIFICATION,
        },
      ]);
    }

    const relationship = await this.getModifiable(id, companyId);
    return this.repo.update({
      ...relationship,
      classification: parsed.data,
      updatedAt: this.deps.clock(),
    });
  }

  async updateDetails(
    id: string,
    companyId: string,
    request: UpdateRelationshipRequest
  ): Promise<Relationship> {
    const input = parseWithSchema(UpdateRelationshipRequestSchema, request);
    const relationship = await this.getModifiable(id, companyId);
    return this.repo.update({
      ...relationship,
      notes: input.notes ?? relationship.notes,
      servicesProvided: input.servicesProvided ?? relationship.servicesProvided,
      contractRef: input.contractRef ?? relationship.contractRef,
      updatedAt: this.deps.clock(),
    });
  }

  async suspend(id: string, companyId: string, actorId: string, reason: string): Promise<Relationship> {
    const relationship = await this.getRelationship(id, companyId);
    return this.save(relationship, relationshipMachine.suspend(relationship, actorId, reason, this.deps.clock()), actorId);
  }

  async reactivate(id: string, companyId: string, actorId: string, reason: string): Promise<Relationship> {
    const relationship = await this.getRelationship(id, companyId);
    return this.save(
      relationship,
      relationshipMachine.reactivate(relationship, actorId, reason, this.deps.clock()),
      actorId
    );
  }

  async terminate(id: string, companyId: string, actorId: string, reason: string): Promise<Relationship> {
    const relationship = await this.getRelationship(id, companyId);
    return this.save(
      relationship,
      relationshipMachine.terminate(relationship, actorId, reason, this.deps.clock()),
      actorId
    );
  }

  async getSupplierStats(companyId: string): Promise<SupplierStats> {
    const relationships = await this.repo.listByCompany(companyId);
    const count = (predicate: (r: Relationship) => boolean) => relationships.filter(predicate).length;

    return {
      total: relationships.length,
      pending: count((r) => r.status === RelationshipStatus.PENDING),
      active: count((r) => r.status === RelationshipStatus.ACTIVE),
      suspended: count((r) => r.status === RelationshipStatus.SUSPENDED),
      rejected: count((r) => r.status === RelationshipStatus.REJECTED),
      terminated: count((r) => r.status === RelationshipStatus.TERMINATED),
      critical: count((r) => r.classification === SupplierClassification.CRITICAL),
      important: count((r) => r.classification === SupplierClassification.IMPORTANT),
      standard: count((r) => r.classification === SupplierClassification.STANDARD),
    };
  }

  private async getModifiable(id: string, companyId: string): Promise<Relationship> {
    const relationship = await this.getRelationship(id, companyId);
    if (relationship.status === RelationshipStatus.TERMINATED) {
      this.deps.logger.warn('Update of terminated relationship refused', { relationshipId: id });
      throw new InvalidTransitionError(
        'Relationship',
        relationship.status,
        undefined,
        ErrorCode.RELATIONSHIP_TERMINATED,
        'Terminated relationships cannot be modified'
      );
    }
    return relationship;
  }

  private async save(before: Relationship, after: Relationship, actorId: string): Promise<Relationship> {
    const saved = await this.repo.update(after);
    this.logTransition(before, saved, actorId);
    return saved;
  }

  private logTransition(before: Relationship, after: Relationship, actorId: string): void {
    this.deps.logger.logStateChange({
      entity: 'Relationship',
      entityId: after.id,
      fromStatus: before.status,
      toStatus: after.status,
      actorId,
      reason: lastStatusChange(after.statusHistory)?.reason,
    });
  }
}
