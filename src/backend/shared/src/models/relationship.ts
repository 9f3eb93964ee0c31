/**
 * Relationship Data Models and Zod Schemas
 *
 * A relationship links a Company (the requesting organization) with a
 * Supplier (the assessed organization). It is created by invitation and the
 * supplier is bound once the invitation is accepted.
 *
 * @tested tests/property/relationship-state-machine.property.test.ts
 */

import { z } from 'zod';
import { statusChangeSchema, type StatusChange } from './status-history.js';

// Relationship status enumeration
export const RelationshipStatus = {
  PENDING: 'pending',
  ACTIVE: 'active',
  SUSPENDED: 'suspended',
  REJECTED: 'rejected',
  TERMINATED: 'terminated',
} as const;

export type RelationshipStatus = (typeof RelationshipStatus)[keyof typeof RelationshipStatus];

// Supplier risk tier enumeration
export const SupplierClassification = {
  CRITICAL: 'critical',
  IMPORTANT: 'important',
  STANDARD: 'standard',
} as const;

export type SupplierClassification =
  (typeof SupplierClassification)[keyof typeof SupplierClassification];

export const RelationshipStatusSchema = z.nativeEnum(RelationshipStatus);
export const SupplierClassificationSchema = z.nativeEnum(SupplierClassification);

export type RelationshipStatusChange = StatusChange<RelationshipStatus>;

export const RelationshipStatusChangeSchema = statusChangeSchema(RelationshipStatusSchema);

/**
 * Relationship schema
 *
 * @edgecase supplierId is absent while the invitation is pending or declined
 */
export const RelationshipSchema = z.object({
  id: z.string().min(1),
  companyId: z.string().min(1),
  supplierId: z.string().min(1).optional(),
  invitedEmail: z.string().email(),
  invitedByUserId: z.string().min(1),
  invitedAt: z.coerce.date(),
  status: RelationshipStatusSchema,
  statusHistory: z.array(RelationshipStatusChangeSchema),
  classification: SupplierClassificationSchema,
  notes: z.string().max(2000).optional(),
  servicesProvided: z.array(z.string().min(1).max(200)),
  contractRef: z.string().max(200).optional(),
  acceptedAt: z.coerce.date().optional(),
  rejectedAt: z.coerce.date().optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Relationship = z.infer<typeof RelationshipSchema>;

/**
 * Classification priority (higher is more critical)
 */
export const CLASSIFICATION_PRIORITY: Record<SupplierClassification, number> = {
  critical: 3,
  important: 2,
  standard: 1,
};

export function classificationPriority(classification: SupplierClassification): number {
  return CLASSIFICATION_PRIORITY[classification];
}

/**
 * Invite request schema
 */
export const InviteSupplierRequestSchema = z.object({
  email: z.string().trim().email('A valid supplier email is required'),
  classification: SupplierClassificationSchema.optional(),
  notes: z.string().max(2000).optional(),
  servicesProvided: z.array(z.string().min(1).max(200)).max(50).optional(),
  contractRef: z.string().max(200).optional(),
});

export type InviteSupplierRequest = z.input<typeof InviteSupplierRequestSchema>;

export const UpdateRelationshipRequestSchema = z.object({
  notes: z.string().max(2000).optional(),
  servicesProvided: z.array(z.string().min(1).max(200)).max(50).optional(),
  contractRef: z.string().max(200).optional(),
});

export type UpdateRelationshipRequest = z.input<typeof UpdateRelationshipRequestSchema>;

/**
 * Reason payload used by suspend, reactivate, terminate and decline
 */
export const StatusReasonRequestSchema = z.object({
  reason: z.string().trim().max(1000).default(''),
});

export interface SupplierStats {
  total: number;
  pending: number;
  active: number;
  suspended: number;
  rejected: number;
  terminated: number;
  critical: number;
  important: number;
  standard: number;
}
