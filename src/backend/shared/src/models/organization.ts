/**
 * Organization Data Models
 *
 * Companies and suppliers. Suppliers register a domain and may link a
 * CheckFix account, which grade verifications are checked against.
 */

import { z } from 'zod';

export const OrganizationType = {
  COMPANY: 'company',
  SUPPLIER: 'supplier',
} as const;

export type OrganizationType = (typeof OrganizationType)[keyof typeof OrganizationType];

export const OrganizationTypeSchema = z.nativeEnum(OrganizationType);

export const OrganizationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(200),
  type: OrganizationTypeSchema,
  domain: z.string().optional(),
  checkfixAccountId: z.string().optional(),
  checkfixLinkedAt: z.coerce.date().optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Organization = z.infer<typeof OrganizationSchema>;

export function isSupplierOrganization(organization: Organization): boolean {
  return organization.type === OrganizationType.SUPPLIER;
}

export function hasCheckFixLinked(organization: Organization): boolean {
  return Boolean(organization.checkfixAccountId);
}

/**
 * Profile an organization registers for itself
 */
export const UpsertOrganizationRequestSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  domain: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'Must be a domain name such as example.com')
    .optional(),
});

export type UpsertOrganizationRequest = z.input<typeof UpsertOrganizationRequestSchema>;
