/**
 * Status History
 *
 * Append-only status change log shared by relationships and requirements.
 */

import { z } from 'zod';

/**
 * One recorded status change. `fromStatus` is null for the creation entry.
 */
export interface StatusChange<S extends string> {
  fromStatus: S | null;
  toStatus: S;
  changedBy: string;
  reason: string;
  changedAt: Date;
}

/**
 * Builds the zod schema of a status change for a given status enum schema
 */
export function statusChangeSchema<S extends string>(status: z.ZodType<S>) {
  return z.object({
    fromStatus: status.nullable(),
    toStatus: status,
    changedBy: z.string().min(1),
    reason: z.string(),
    changedAt: z.coerce.date(),
  });
}

/**
 * Returns a new history with the change appended. The input array is left untouched.
 */
export function appendStatusChange<S extends string>(
  history: readonly StatusChange<S>[],
  change: StatusChange<S>
): StatusChange<S>[] {
  return [...history, { ...change }];
}

/**
 * Returns the most recent change, if any
 */
export function lastStatusChange<S extends string>(
  history: readonly StatusChange<S>[]
): StatusChange<S> | undefined {
  return history.length > 0 ? history[history.length - 1] : undefined;
}
