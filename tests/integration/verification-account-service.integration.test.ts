/**
 * Organization profiles and CheckFix account links
 *
 * @file src/backend/compliance-engine/src/services/verification-account-service.ts
 * @file src/backend/compliance-engine/src/services/organization-service.ts
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode, ErrorKind } from '@supplier-compliance/shared';
import {
  COMPANY_ID,
  COMPANY_USER,
  createTestWorld,
  seedActiveRelationship,
  seedLinkedSupplier,
  SUPPLIER_ID,
  type TestWorld,
} from '../fixtures/engine.js';

describe('OrganizationService', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = createTestWorld();
  });

  it('registers on first call and updates the profile afterwards', async () => {
    const created = await world.organizations.upsertProfile(SUPPLIER_ID, 'supplier', {
      name: ' Supplier One ',
      domain: ' Example.COM ',
    });
    expect(created).toMatchObject({ id: SUPPLIER_ID, type: 'supplier', name: 'Supplier One', domain: 'example.com' });

    world.clock.advanceMinutes(1);
    const renamed = await world.organizations.upsertProfile(SUPPLIER_ID, 'supplier', { name: 'Supplier One Ltd' });

    expect(renamed).toMatchObject({ name: 'Supplier One Ltd', domain: 'example.com', updatedAt: world.clock.now() });
    expect(renamed.createdAt).toEqual(created.createdAt);
  });

  it('never changes the type of an organization', async () => {
    await world.organizations.upsertProfile(COMPANY_ID, 'company', { name: 'Company One' });

    await expect(
      world.organizations.upsertProfile(COMPANY_ID, 'supplier', { name: 'Company One' })
    ).rejects.toMatchObject({ kind: ErrorKind.VALIDATION, message: 'Organization company-1 is registered as a company' });
  });

  it('rejects a malformed domain and reports unknown organizations', async () => {
    await expect(
      world.organizations.upsertProfile(SUPPLIER_ID, 'supplier', { name: 'Supplier One', domain: 'localhost' })
    ).rejects.toMatchObject({
      code: ErrorCode.INVALID_INPUT,
      details: [expect.objectContaining({ field: 'domain', message: 'Must be a domain name such as example.com' })],
    });
    await expect(world.organizations.getOrganization('nobody')).rejects.toMatchObject({
      code: ErrorCode.ORGANIZATION_NOT_FOUND,
    });
  });
});

describe('VerificationAccountService', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = createTestWorld();
  });

  it('linking adopts the account domain', async () => {
    await world.organizations.upsertProfile(SUPPLIER_ID, 'supplier', { name: 'Supplier One', domain: 'old.example.com' });
    world.verificationClient.configure({ domain: 'example.com' });

    const linked = await world.verificationAccounts.linkAccount(SUPPLIER_ID, { accountId: ' cf-account-1 ' });

    expect(linked).toMatchObject({
      checkfixAccountId: 'cf-account-1',
      checkfixLinkedAt: world.clock.now(),
      domain: 'example.com',
    });
    expect(world.verificationClient.calls).toEqual([
      { method: 'validateAccountAccess', argument: 'cf-account-1' },
      { method: 'getAccountDomain', argument: 'cf-account-1' },
    ]);
  });

  it('refuses accounts the provider does not validate', async () => {
    await world.organizations.upsertProfile(SUPPLIER_ID, 'supplier', { name: 'Supplier One' });
    world.verificationClient.configure({ accessValid: false });

    await expect(
      world.verificationAccounts.linkAccount(SUPPLIER_ID, { accountId: 'cf-account-1' })
    ).rejects.toMatchObject({ kind: ErrorKind.VALIDATION, code: ErrorCode.INVALID_CHECKFIX_ACCOUNT });
    expect((await world.organizations.getOrganization(SUPPLIER_ID)).checkfixAccountId).toBeUndefined();
    expect(world.logger.getLogEntries().at(-1)).toMatchObject({ level: 'warn', message: 'CheckFix account link refused' });
  });

  it('only suppliers link accounts', async () => {
    await world.organizations.upsertProfile(COMPANY_ID, 'company', { name: 'Company One' });

    await expect(
      world.verificationAccounts.linkAccount(COMPANY_ID, { accountId: 'cf-account-1' })
    ).rejects.toMatchObject({ code: ErrorCode.NOT_A_SUPPLIER });
    expect(world.verificationClient.calls).toEqual([]);
  });

  it('unlinking keeps the registered domain', async () => {
    await seedLinkedSupplier(world);

    const unlinked = await world.verificationAccounts.unlinkAccount(SUPPLIER_ID);

    expect(unlinked).toMatchObject({ domain: 'example.com', checkfixAccountId: undefined });
    expect(await world.verificationAccounts.getLinkStatus(SUPPLIER_ID)).toEqual({
      isLinked: false,
      accountId: undefined,
      domain: 'example.com',
      linkedAt: undefined,
      verification: null,
    });
  });

  it('reports the latest verification in the link status and checks requirements against it', async () => {
    await seedLinkedSupplier(world);
    const relationship = await seedActiveRelationship(world);
    const requirement = await world.requirements.createRequirement(COMPANY_ID, COMPANY_USER, {
      type: 'checkfix',
      relationshipId: relationship.id,
      title: 'Security grade',
    });
    const { verification, response } = await world.orchestrator.submitVerification(requirement.id, SUPPLIER_ID, {
      reportHash: 'report-1',
    });

    const status = await world.verificationAccounts.getLinkStatus(SUPPLIER_ID);

    expect(status).toMatchObject({
      isLinked: true,
      accountId: 'cf-account-1',
      latestGrade: 'B',
      latestVerifiedAt: world.clock.now(),
    });
    expect(status.verification?.id).toBe(verification.id);

    await expect(world.verificationAccounts.checkRequirementMet(response.id, 'C', 90)).resolves.toBe(true);
    await expect(world.verificationAccounts.checkRequirementMet(response.id, 'A', 90)).resolves.toBe(false);

    world.clock.advanceDays(31);
    await expect(world.verificationAccounts.checkRequirementMet(response.id, 'C', 90)).resolves.toBe(false);
  });

  it('has no verification to check for an unknown response', async () => {
    await expect(world.verificationAccounts.checkRequirementMet('response-x', 'C', 90)).rejects.toMatchObject({
      kind: ErrorKind.NOT_FOUND,
      code: ErrorCode.VERIFICATION_NOT_FOUND,
    });
  });
});
