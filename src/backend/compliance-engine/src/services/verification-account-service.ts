/**
 * Verification Account Service
 *
 * Links supplier organizations to their CheckFix account. The account's
 * domain becomes the organization's registered domain, which submitted
 * reports are matched against.
 *
 * @tested tests/integration/verification-account-service.integration.test.ts
 * @edgecase unlinking keeps the registered domain
 */

import {
  ErrorCode,
  hasCheckFixLinked,
  isSupplierOrganization,
  LinkAccountRequestSchema,
  NotFoundError,
  parseWithSchema,
  ValidationError,
  type CheckFixVerification,
  type Grade,
  type Organization,
} from '@supplier-compliance/shared';
import { passesRequirement } from '../verification/verification-policy.js';
import type { EngineDependencies } from './dependencies.js';

export interface LinkStatus {
  isLinked: boolean;
  accountId?: string;
  domain?: string;
  linkedAt?: Date;
  latestGrade?: Grade;
  latestVerifiedAt?: Date;
  verification: CheckFixVerification | null;
}

export class VerificationAccountService {
  constructor(private readonly deps: EngineDependencies) {}

  private get organizations() {
    return this.deps.repositories.organizations;
  }

  /**
   * Validates access to the account and adopts its domain
   */
  async linkAccount(organizationId: string, request: { accountId: string }): Promise<Organization> {
    const { accountId } = parseWithSchema(LinkAccountRequestSchema, request);
    const organization = await this.organizations.getById(organizationId);

    if (!isSupplierOrganization(organization)) {
      throw new ValidationError(ErrorCode.NOT_A_SUPPLIER, 'Only suppliers can link CheckFix accounts');
    }

    const { verificationClient } = this.deps;
    if (!(await verificationClient.validateAccountAccess(accountId))) {
      this.deps.logger.warn('CheckFix account link refused', { organizationId, accountId });
      throw new ValidationError(ErrorCode.INVALID_CHECKFIX_ACCOUNT, 'Invalid CheckFix account ID', [
        { field: 'accountId', message: 'Account could not be validated', code: ErrorCode.INVALID_CHECKFIX_ACCOUNT },
      ]);
    }
    const domain = await verificationClient.getAccountDomain(accountId);

    const now = this.deps.clock();
    const linked = await this.organizations.update({
      ...organization,
      checkfixAccountId: accountId,
      checkfixLinkedAt: now,
      domain,
      updatedAt: now,
    });

    this.deps.logger.info('CheckFix account linked', { organizationId, accountId, domain });
    return linked;
  }

  async unlinkAccount(organizationId: string): Promise<Organization> {
    const organization = await this.organizations.getById(organizationId);
    const unlinked = await this.organizations.update({
      ...organization,
      checkfixAccountId: undefined,
      checkfixLinkedAt: undefined,
      updatedAt: this.deps.clock(),
    });
    this.deps.logger.info('CheckFix account unlinked', { organizationId });
    return unlinked;
  }

  async getLinkStatus(organizationId: string): Promise<LinkStatus> {
    const organization = await this.organizations.getById(organizationId);
    const status: LinkStatus = {
      isLinked: hasCheckFixLinked(organization),
      accountId: organization.checkfixAccountId,
      domain: organization.domain,
      linkedAt: organization.checkfixLinkedAt,
      verification: null,
    };

    if (status.isLinked) {
      const latest = await this.deps.repositories.verifications.getLatestBySupplier(organizationId);
      if (latest) {
        status.latestGrade = latest.overallGrade;
        status.latestVerifiedAt = latest.verifiedAt;
        status.verification = latest;
      }
    }
    return status;
  }

  async checkRequirementMet(responseId: string, minimumGrade: Grade, maxReportAgeDays: number): Promise<boolean> {
    const verification = await this.deps.repositories.verifications.getLatestByResponse(responseId);
    if (!verification) {
      throw new NotFoundError(ErrorCode.VERIFICATION_NOT_FOUND, 'Verification', responseId);
    }
    return passesRequirement(verification, minimumGrade, maxReportAgeDays, this.deps.clock());
  }
}
