/**
 * Test fixtures for the compliance engine
 *
 * In-memory repositories, a stub verification client and a clock the test
 * controls, plus seeders for the common starting points.
 */

import {
  createLogger,
  LogLevel,
  OrganizationType,
  QuestionType,
  type CreateQuestionRequest,
  type Logger,
  type Question,
  type Questionnaire,
  type Relationship,
} from '@supplier-compliance/shared';
import {
  createInMemoryRepositories,
  InMemoryNotifier,
  OrganizationService,
  QuestionnaireService,
  RelationshipService,
  RequirementService,
  StubVerificationClient,
  SubmissionOrchestrator,
  TemplateService,
  VerificationAccountService,
  type EngineDependencies,
  type Repositories,
} from '@supplier-compliance/engine';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START = new Date('2026-03-02T09:00:00.000Z');

export const COMPANY_ID = 'company-1';
export const COMPANY_USER = 'company-user-1';
export const SUPPLIER_ID = 'supplier-1';
export const SUPPLIER_USER = 'supplier-user-1';
export const SUPPLIER_EMAIL = 'security@supplier.example.com';

export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current);

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * DAY_MS);
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

export interface TestWorld {
  deps: EngineDependencies;
  repositories: Repositories;
  notifier: InMemoryNotifier;
  verificationClient: StubVerificationClient;
  logger: Logger;
  clock: TestClock;
  relationships: RelationshipService;
  requirements: RequirementService;
  questionnaires: QuestionnaireService;
  templates: TemplateService;
  organizations: OrganizationService;
  verificationAccounts: VerificationAccountService;
  orchestrator: SubmissionOrchestrator;
}

export function createTestWorld(): TestWorld {
  const clock = new TestClock();
  const logger = createLogger({ enableConsole: false, minLevel: LogLevel.DEBUG });
  const repositories = createInMemoryRepositories();
  const notifier = new InMemoryNotifier(clock.now);
  const verificationClient = new StubVerificationClient({ clock: clock.now });
  const deps: EngineDependencies = { repositories, notifier, verificationClient, logger, clock: clock.now };

  return {
    deps,
    repositories,
    notifier,
    verificationClient,
    logger,
    clock,
    relationships: new RelationshipService(deps),
    requirements: new RequirementService(deps),
    questionnaires: new QuestionnaireService(deps),
    templates: new TemplateService(deps),
    organizations: new OrganizationService(deps),
    verificationAccounts: new VerificationAccountService(deps),
    orchestrator: new SubmissionOrchestrator(deps),
  };
}

/**
 * Invites SUPPLIER_EMAIL and accepts as SUPPLIER_ID
 */
export async function seedActiveRelationship(world: TestWorld): Promise<Relationship> {
  const invited = await world.relationships.inviteSupplier(COMPANY_ID, COMPANY_USER, {
    email: SUPPLIER_EMAIL,
    classification: 'important',
  });
  return world.relationships.acceptInvitation(invited.id, {
    supplierId: SUPPLIER_ID,
    actorId: SUPPLIER_USER,
    email: SUPPLIER_EMAIL,
  });
}

/**
 * Supplier organization registered for example.com with a linked account
 */
export async function seedLinkedSupplier(world: TestWorld): Promise<void> {
  await world.organizations.upsertProfile(SUPPLIER_ID, OrganizationType.SUPPLIER, {
    name: 'Supplier One',
    domain: 'example.com',
  });
  await world.verificationAccounts.linkAccount(SUPPLIER_ID, { accountId: 'cf-account-1' });
}

export const TEXT_QUESTION: CreateQuestionRequest = {
  text: 'Describe your incident response process',
  type: QuestionType.TEXT,
  topicId: 'topic-process',
};

/** Two correct options worth 2 each, one incorrect worth 0 */
export const MULTIPLE_CHOICE_QUESTION: CreateQuestionRequest = {
  text: 'Which controls are in place?',
  type: QuestionType.MULTIPLE_CHOICE,
  topicId: 'topic-controls',
  options: [
    { id: 'mfa', text: 'Multi-factor authentication', points: 2, isCorrect: true },
    { id: 'backups', text: 'Offline backups', points: 2, isCorrect: true },
    { id: 'none', text: 'None of the above', points: 0, isCorrect: false },
  ],
};

export interface SeededQuestionnaire {
  questionnaire: Questionnaire;
  textQuestion: Question;
  choiceQuestion: Question;
}

/**
 * Published questionnaire worth 5 points: a text question (1) and a
 * multiple choice question (4)
 */
export async function seedPublishedQuestionnaire(
  world: TestWorld,
  passingScore = 70
): Promise<SeededQuestionnaire> {
  const draft = await world.questionnaires.createQuestionnaire(COMPANY_ID, COMPANY_USER, {
    name: 'Baseline security',
    passingScore,
    topics: [
      { id: 'topic-process', name: 'Process', order: 1 },
      { id: 'topic-controls', name: 'Controls', order: 2 },
    ],
  });
  const textQuestion = await world.questionnaires.addQuestion(draft.id, COMPANY_ID, TEXT_QUESTION);
  const choiceQuestion = await world.questionnaires.addQuestion(draft.id, COMPANY_ID, MULTIPLE_CHOICE_QUESTION);
  const questionnaire = await world.questionnaires.publishQuestionnaire(draft.id, COMPANY_ID, COMPANY_USER);
  return { questionnaire, textQuestion, choiceQuestion };
}
