/**
 * Compliance Engine
 *
 * Relationship and requirement lifecycles, questionnaire scoring, CheckFix
 * verification and the submission workflow that ties them together.
 */

export const VERSION = '1.0.0';

export * from './state-machines/index.js';
export * from './scoring/index.js';
export * from './verification/index.js';
export * from './repositories/index.js';
export * from './notifications/index.js';
export * from './services/index.js';
