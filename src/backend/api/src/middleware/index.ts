/**
 * Middleware Exports
 *
 * Central export point for all API middleware.
 */

export * from './auth.js';
export * from './rbac.js';
export * from './error-handler.js';
export * from './request-context.js';
