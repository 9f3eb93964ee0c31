/**
 * Reminder Scanner
 *
 * Walks open requirements and sends due-soon reminders and overdue
 * notices. Runs when called; scheduling belongs to the host.
 *
 * @tested tests/integration/reminder-scanner.integration.test.ts
 * @edgecase a reminder is sent at most once per requirement
 * @edgecase overdue requirements are reported on every run until they leave the open statuses
 */

import { RequirementStatus } from '@supplier-compliance/shared';
import * as requirementMachine from '../state-machines/requirement-state-machine.js';
import { deliverSafely, NotificationType } from '../notifications/notifier.js';
import type { EngineDependencies } from './dependencies.js';

export const DEFAULT_REMINDER_DAYS_BEFORE = 7;

const OPEN_STATUSES = [
  RequirementStatus.PENDING,
  RequirementStatus.IN_PROGRESS,
  RequirementStatus.UNDER_REVIEW,
] as const;

export interface ReminderScanResult {
  scanned: number;
  reminded: string[];
  overdue: string[];
}

export class ReminderScanner {
  constructor(
    private readonly deps: EngineDependencies,
    private readonly daysBefore: number = DEFAULT_REMINDER_DAYS_BEFORE
  ) {}

  async run(now: Date = this.deps.clock()): Promise<ReminderScanResult> {
    const { requirements } = this.deps.repositories;
    const { logger, notifier } = this.deps;
    const open = await requirements.listByStatuses(OPEN_STATUSES);
    const result: ReminderScanResult = { scanned: open.length, reminded: [], overdue: [] };

    for (const requirement of open) {
      if (requirementMachine.isOverdue(requirement, now)) {
        const sent = await deliverSafely(logger, NotificationType.OVERDUE, requirement.id, () =>
          notifier.notifyOverdue(requirement)
        );
        if (sent) {
          result.overdue.push(requirement.id);
        }
        continue;
      }

      if (!requirementMachine.needsReminder(requirement, this.daysBefore, now)) {
        continue;
      }
      const days = requirementMachine.daysUntilDue(requirement, now);
      const sent = await deliverSafely(logger, NotificationType.REMINDER, requirement.id, () =>
        notifier.notifyReminder(requirement, days)
      );
      // Left unmarked so the next run tries again
      if (sent) {
        await requirements.update(requirementMachine.markReminderSent(requirement, now));
        result.reminded.push(requirement.id);
      }
    }

    logger.info('Reminder scan completed', {
      scanned: result.scanned,
      reminded: result.reminded.length,
      overdue: result.overdue.length,
    });
    return result;
  }
}
