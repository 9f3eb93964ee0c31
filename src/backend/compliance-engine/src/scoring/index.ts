export * from './scoring-engine.js';
