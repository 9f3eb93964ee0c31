/**
 * Service Exports
 */

export * from './dependencies.js';
export * from './relationship-service.js';
export * from './requirement-service.js';
export * from './questionnaire-service.js';
export * from './template-service.js';
export * from './verification-account-service.js';
export * from './submission-orchestrator.js';
export * from './reminder-scanner.js';
export * from './organization-service.js';
