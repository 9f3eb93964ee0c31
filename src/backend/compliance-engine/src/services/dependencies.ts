/**
 * Service Dependencies
 *
 * Collaborators injected into every application service.
 */

import { getLogger, type Logger } from '@supplier-compliance/shared';
import type { Repositories } from '../repositories/interfaces.js';
import { createInMemoryRepositories } from '../repositories/in-memory.js';
import type { VerificationClient } from '../verification/verification-client.js';
import { StubVerificationClient } from '../verification/stub-verification-client.js';
import { InMemoryNotifier, type Notifier } from '../notifications/notifier.js';

export interface EngineDependencies {
  repositories: Repositories;
  verificationClient: VerificationClient;
  notifier: Notifier;
  logger: Logger;
  clock: () => Date;
}

/**
 * In-memory wiring with the stub verification client; overrides win
 */
export function createEngineDependencies(
  overrides: Partial<EngineDependencies> = {}
): EngineDependencies {
  const clock = overrides.clock ?? (() => new Date());
  return {
    repositories: overrides.repositories ?? createInMemoryRepositories(),
    verificationClient: overrides.verificationClient ?? new StubVerificationClient({ clock }),
    notifier: overrides.notifier ?? new InMemoryNotifier(clock),
    logger: overrides.logger ?? getLogger(),
    clock,
  };
}
