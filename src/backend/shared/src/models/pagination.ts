/**
 * Pagination
 *
 * Listing options and paged results used by every repository.
 */

import { z } from 'zod';

export const SortDirection = {
  ASC: 1,
  DESC: -1,
} as const;

export type SortDirection = (typeof SortDirection)[keyof typeof SortDirection];

export const MAX_PAGE_LIMIT = 100;

export const PaginationOptionsSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(20),
  sortBy: z.string().min(1).default('createdAt'),
  sortDir: z.union([z.literal(1), z.literal(-1)]).default(-1),
});

export type PaginationOptions = z.infer<typeof PaginationOptionsSchema>;

export interface PaginatedResult<T> {
  items: T[];
  totalCount: number;
  page: number;
  limit: number;
  totalPages: number;
}

export const DEFAULT_PAGINATION: PaginationOptions = {
  page: 1,
  limit: 20,
  sortBy: 'createdAt',
  sortDir: SortDirection.DESC,
};

/**
 * Fills in defaults and clamps page/limit into range
 */
export function normalizePagination(options: Partial<PaginationOptions> = {}): PaginationOptions {
  const merged = { ...DEFAULT_PAGINATION, ...options };
  return {
    page: Math.max(1, Math.floor(merged.page)),
    limit: Math.min(MAX_PAGE_LIMIT, Math.max(1, Math.floor(merged.limit))),
    sortBy: merged.sortBy,
    sortDir: merged.sortDir,
  };
}

function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (a === undefined || a === null) {
    return b === undefined || b === null ? 0 : -1;
  }
  if (b === undefined || b === null) {
    return 1;
  }
  return String(a).localeCompare(String(b));
}

/**
 * Sorts and slices an in-memory collection into a page
 */
export function paginate<T extends object>(
  items: readonly T[],
  options: Partial<PaginationOptions> = {}
): PaginatedResult<T> {
  const opts = normalizePagination(options);
  const sorted = [...items].sort((a, b) => {
    const left: unknown = Reflect.get(a, opts.sortBy);
    const right: unknown = Reflect.get(b, opts.sortBy);
    return compareValues(left, right) * opts.sortDir;
  });
  const start = (opts.page - 1) * opts.limit;

  return {
    items: sorted.slice(start, start + opts.limit),
    totalCount: items.length,
    page: opts.page,
    limit: opts.limit,
    totalPages: Math.ceil(items.length / opts.limit),
  };
}
