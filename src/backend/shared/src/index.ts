/**
 * Supplier Compliance Shared Package
 *
 * Data models, schemas, error taxonomy and ambient utilities shared by the
 * compliance engine and the API.
 */

// Errors and validation
export * from './models/errors.js';
export * from './models/validation.js';

// Common model building blocks
export * from './models/status-history.js';
export * from './models/pagination.js';

// Domain models and schemas
export * from './models/organization.js';
export * from './models/relationship.js';
export * from './models/verification.js';
export * from './models/requirement.js';
export * from './models/question.js';
export * from './models/questionnaire.js';
export * from './models/questionnaire-template.js';
export * from './models/response.js';
export * from './models/submission.js';

// Logging
export * from './logging/logger.js';

// Audit trail
export * from './audit/audit-logger.js';

// Configuration
export * from './config/config.js';
