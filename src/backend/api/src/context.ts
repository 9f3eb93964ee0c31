/**
 * API Context
 *
 * Wires the engine services, the audit trail and the logger used by the
 * routes. Tests pass overrides to share in-memory repositories and a fixed
 * clock with the app under test.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import {
  AuditLogger,
  createLogger,
  InMemoryAuditStorage,
  type AppConfig,
  type AuditStorage,
} from '@supplier-compliance/shared';
import {
  createEngineDependencies,
  HttpVerificationClient,
  OrganizationService,
  QuestionnaireService,
  RelationshipService,
  ReminderScanner,
  RequirementService,
  StubVerificationClient,
  SubmissionOrchestrator,
  TemplateService,
  VerificationAccountService,
  type EngineDependencies,
} from '@supplier-compliance/engine';

export interface ApiContext {
  config: AppConfig;
  deps: EngineDependencies;
  relationships: RelationshipService;
  requirements: RequirementService;
  questionnaires: QuestionnaireService;
  templates: TemplateService;
  organizations: OrganizationService;
  verificationAccounts: VerificationAccountService;
  orchestrator: SubmissionOrchestrator;
  reminders: ReminderScanner;
  audit: AuditLogger;
}

export interface ApiContextOverrides extends Partial<EngineDependencies> {
  auditStorage?: AuditStorage;
}

export function createApiContext(config: AppConfig, overrides: ApiContextOverrides = {}): ApiContext {
  const { auditStorage, ...engineOverrides } = overrides;
  const logger =
    engineOverrides.logger ??
    createLogger({
      minLevel: config.logLevel,
      enableConsole: config.nodeEnv !== 'test',
    });
  const clock = engineOverrides.clock ?? (() => new Date());
  const apiKey = config.checkfix.apiKey;

  const verificationClient =
    engineOverrides.verificationClient ??
    (apiKey
      ? new HttpVerificationClient(
          { baseUrl: config.checkfix.baseUrl, apiKey, timeoutMs: config.checkfix.timeoutMs },
          logger
        )
      : new StubVerificationClient({ clock }));

  if (!apiKey && !engineOverrides.verificationClient) {
    logger.warn('CHECKFIX_API_KEY not set, using stub verification client');
  }

  const deps = createEngineDependencies({ ...engineOverrides, logger, clock, verificationClient });

  return {
    config,
    deps,
    relationships: new RelationshipService(deps),
    requirements: new RequirementService(deps),
    questionnaires: new QuestionnaireService(deps),
    templates: new TemplateService(deps),
    organizations: new OrganizationService(deps),
    verificationAccounts: new VerificationAccountService(deps),
    orchestrator: new SubmissionOrchestrator(deps),
    reminders: new ReminderScanner(deps, config.reminderDaysBefore),
    audit: new AuditLogger(auditStorage ?? new InMemoryAuditStorage(), logger),
  };
}
