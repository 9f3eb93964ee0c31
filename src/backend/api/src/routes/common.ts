/**
 * Route Helpers
 *
 * Query parsing and audit recording shared by the resource routers.
 */

import { z } from 'zod';
import {
  MAX_PAGE_LIMIT,
  parseWithSchema,
  SortDirection,
  type AuditAction,
  type AuditChanges,
  type AuditResourceType,
  type PaginationOptions,
} from '@supplier-compliance/shared';
import type { ApiContext } from '../context.js';
import type { RequestScope } from '../middleware/request-context.js';

export const PaginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(20),
  sortBy: z.string().min(1).default('createdAt'),
  sortDir: z
    .enum(['asc', 'desc'])
    .default('desc')
    .transform((dir) => (dir === 'asc' ? SortDirection.ASC : SortDirection.DESC)),
});

export function parsePagination(query: unknown): PaginationOptions {
  return parseWithSchema(PaginationQuerySchema, query, 'Invalid pagination parameters');
}

/**
 * Parses a query string with the given schema; unknown keys are ignored
 */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
  return parseWithSchema(schema, query, 'Invalid query parameters');
}

export interface AuditParams {
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  changes?: AuditChanges;
}

export async function recordAudit(ctx: ApiContext, scope: RequestScope, params: AuditParams): Promise<void> {
  await ctx.audit.record({
    correlationId: scope.correlationId,
    actorUserId: scope.user.userId,
    organizationId: scope.user.organizationId,
    ...params,
  });
}
