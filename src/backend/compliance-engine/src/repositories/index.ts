export * from './interfaces.js';
export * from './in-memory.js';
