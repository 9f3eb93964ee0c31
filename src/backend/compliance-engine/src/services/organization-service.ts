/**
 * Organization Service
 *
 * Company and supplier profiles. The identity provider supplies the
 * organization id and type; the profile (name, domain) is registered here.
 *
 * @tested tests/integration/verification-account-service.integration.test.ts
 * @edgecase the type of an existing organization never changes
 */

import {
  ErrorCode,
  isErrorKind,
  ErrorKind,
  parseWithSchema,
  UpsertOrganizationRequestSchema,
  ValidationError,
  type Organization,
  type OrganizationType,
  type UpsertOrganizationRequest,
} from '@supplier-compliance/shared';
import type { EngineDependencies } from './dependencies.js';

export class OrganizationService {
  constructor(private readonly deps: EngineDependencies) {}

  private get repo() {
    return this.deps.repositories.organizations;
  }

  async getOrganization(id: string): Promise<Organization> {
    return this.repo.getById(id);
  }

  /**
   * Creates the organization on first call, updates its profile afterwards
   */
  async upsertProfile(
    id: string,
    type: OrganizationType,
    request: UpsertOrganizationRequest
  ): Promise<Organization> {
    const input = parseWithSchema(UpsertOrganizationRequestSchema, request);
    const existing = await this.findById(id);
    const now = this.deps.clock();

    if (!existing) {
      const created = await this.repo.create({
        id,
        name: input.name,
        type,
        domain: input.domain,
        createdAt: now,
        updatedAt: now,
      });
      this.deps.logger.info('Organization registered', { organizationId: id, type });
      return created;
    }

    if (existing.type !== type) {
      throw new ValidationError(
        ErrorCode.INVALID_INPUT,
        `Organization ${id} is registered as a ${existing.type}`,
        [{ field: 'type', message: 'Organization type cannot change', code: ErrorCode.INVALID_INPUT }]
      );
    }

    return this.repo.update({
      ...existing,
      name: input.name,
      domain: input.domain ?? existing.domain,
      updatedAt: now,
    });
  }

  private async findById(id: string): Promise<Organization | null> {
    try {
      return await this.repo.getById(id);
    } catch (error) {
      if (isErrorKind(error, ErrorKind.NOT_FOUND)) {
        return null;
      }
      throw error;
    }
  }
}
