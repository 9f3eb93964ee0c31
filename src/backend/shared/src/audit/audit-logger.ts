/**
 * Audit Trail Logger
 *
 * Records who changed what across relationships, requirements, responses,
 * questionnaires and verification links. Entries are written by the API
 * layer around every state-changing engine call.
 *
 * @tested tests/property/audit-trail.property.test.ts
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { getLogger, type Logger } from '../logging/logger.js';
import { ErrorCode, ValidationError } from '../models/errors.js';
import { formatZodIssues } from '../models/validation.js';

/**
 * Audited actions
 */
export const AuditAction = {
  CREATE: 'create',
  UPDATE: 'update',
  INVITE: 'invite',
  ACCEPT: 'accept',
  DECLINE: 'decline',
  SUSPEND: 'suspend',
  ACTIVATE: 'activate',
  TERMINATE: 'terminate',
  SUBMIT: 'submit',
  APPROVE: 'approve',
  REJECT: 'reject',
  REQUEST_REVISION: 'request_revision',
  VERIFY: 'verify',
  PUBLISH: 'publish',
  UNPUBLISH: 'unpublish',
  IMPORT: 'import',
  ARCHIVE: 'archive',
  DELETE: 'delete',
} as const;

export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

export const AuditActionSchema = z.nativeEnum(AuditAction);

/**
 * Audited resource types
 */
export const AuditResourceType = {
  RELATIONSHIP: 'relationship',
  REQUIREMENT: 'requirement',
  RESPONSE: 'response',
  SUBMISSION: 'submission',
  VERIFICATION: 'verification',
  QUESTIONNAIRE: 'questionnaire',
  QUESTION: 'question',
  TEMPLATE: 'template',
  ORGANIZATION: 'organization',
} as const;

export type AuditResourceType = (typeof AuditResourceType)[keyof typeof AuditResourceType];

export const AuditResourceTypeSchema = z.nativeEnum(AuditResourceType);

export const AuditChangesSchema = z.object({
  before: z.record(z.unknown()).optional(),
  after: z.record(z.unknown()).optional(),
});

export type AuditChanges = z.infer<typeof AuditChangesSchema>;

export const AuditEntrySchema = z.object({
  auditId: z.string().uuid(),
  timestamp: z.coerce.date(),
  correlationId: z.string().optional(),
  actorUserId: z.string().min(1),
  organizationId: z.string().min(1),
  action: AuditActionSchema,
  resourceType: AuditResourceTypeSchema,
  resourceId: z.string().min(1),
  changes: AuditChangesSchema.optional(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

/**
 * Parameters accepted by AuditLogger.record
 */
export type AuditRecordParams = Omit<AuditEntry, 'auditId' | 'timestamp'> & {
  timestamp?: Date;
};

/**
 * Storage interface for audit entries
 */
export interface AuditStorage {
  save(entry: AuditEntry): Promise<void>;
  getByResource(resourceType: AuditResourceType, resourceId: string): Promise<AuditEntry[]>;
  getByOrganization(organizationId: string, startDate?: Date, endDate?: Date): Promise<AuditEntry[]>;
  getByActor(actorUserId: string, startDate?: Date, endDate?: Date): Promise<AuditEntry[]>;
  getByCorrelationId(correlationId: string): Promise<AuditEntry[]>;
}

function withinRange(entry: AuditEntry, startDate?: Date, endDate?: Date): boolean {
  if (startDate && entry.timestamp < startDate) {
    return false;
  }
  if (endDate && entry.timestamp > endDate) {
    return false;
  }
  return true;
}

/**
 * In-memory audit storage for testing
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  async save(entry: AuditEntry): Promise<void> {
    this.entries.push(structuredClone(entry));
  }

  async getByResource(resourceType: AuditResourceType, resourceId: string): Promise<AuditEntry[]> {
    return this.entries.filter(
      (e) => e.resourceType === resourceType && e.resourceId === resourceId
    );
  }

  async getByOrganization(
    organizationId: string,
    startDate?: Date,
    endDate?: Date
  ): Promise<AuditEntry[]> {
    return this.entries.filter(
      (e) => e.organizationId === organizationId && withinRange(e, startDate, endDate)
    );
  }

  async getByActor(actorUserId: string, startDate?: Date, endDate?: Date): Promise<AuditEntry[]> {
    return this.entries.filter(
      (e) => e.actorUserId === actorUserId && withinRange(e, startDate, endDate)
    );
  }

  async getByCorrelationId(correlationId: string): Promise<AuditEntry[]> {
    return this.entries.filter((e) => e.correlationId === correlationId);
  }

  // For testing
  clear(): void {
    this.entries = [];
  }

  getAll(): AuditEntry[] {
    return [...this.entries];
  }
}

/**
 * Audit Logger
 */
export class AuditLogger {
  private readonly storage: AuditStorage;
  private readonly logger: Logger;

  constructor(storage: AuditStorage, logger: Logger = getLogger()) {
    this.storage = storage;
    this.logger = logger;
  }

  /**
   * Records one audited action
   */
  async record(params: AuditRecordParams): Promise<AuditEntry> {
    const parsed = AuditEntrySchema.safeParse({
      ...params,
      auditId: uuidv4(),
      timestamp: params.timestamp ?? new Date(),
    });
    if (!parsed.success) {
      throw new ValidationError(
        ErrorCode.INVALID_INPUT,
        'Invalid audit entry',
        formatZodIssues(parsed.error)
      );
    }

    const entry = parsed.data;
    await this.storage.save(entry);

    this.logger.info('Audit entry recorded', {
      auditId: entry.auditId,
      action: entry.action,
      resourceType: entry.resourceType,
      resourceId: entry.resourceId,
      actorUserId: entry.actorUserId,
      organizationId: entry.organizationId,
      correlationId: entry.correlationId,
    });

    return entry;
  }

  async getResourceTrail(
    resourceType: AuditResourceType,
    resourceId: string
  ): Promise<AuditEntry[]> {
    return this.storage.getByResource(resourceType, resourceId);
  }

  async getOrganizationTrail(
    organizationId: string,
    startDate?: Date,
    endDate?: Date
  ): Promise<AuditEntry[]> {
    return this.storage.getByOrganization(organizationId, startDate, endDate);
  }

  async getActorTrail(actorUserId: string, startDate?: Date, endDate?: Date): Promise<AuditEntry[]> {
    return this.storage.getByActor(actorUserId, startDate, endDate);
  }

  async getByCorrelationId(correlationId: string): Promise<AuditEntry[]> {
    return this.storage.getByCorrelationId(correlationId);
  }
}

let auditLogger: AuditLogger | null = null;
let defaultStorage: AuditStorage | null = null;

/**
 * Gets the global audit logger instance
 */
export function getAuditLogger(): AuditLogger {
  if (!auditLogger) {
    if (!defaultStorage) {
      defaultStorage = new InMemoryAuditStorage();
    }
    auditLogger = new AuditLogger(defaultStorage);
  }
  return auditLogger;
}

export function setAuditStorage(storage: AuditStorage): void {
  defaultStorage = storage;
  auditLogger = new AuditLogger(storage);
}

/**
 * Resets the audit logger (for testing)
 */
export function resetAuditLogger(): void {
  auditLogger = null;
  defaultStorage = null;
}
