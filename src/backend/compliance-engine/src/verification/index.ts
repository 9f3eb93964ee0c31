/**
 * Verification Module Exports
 *
 * Grade policy plus the HTTP and stub CheckFix clients.
 */

export * from './verification-policy.js';
export * from './verification-client.js';
export * from './stub-verification-client.js';
