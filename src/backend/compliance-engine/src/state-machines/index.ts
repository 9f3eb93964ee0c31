/**
 * State Machine Exports
 *
 * Both machines share operation names, so each is exported as a namespace.
 */

export * as relationshipMachine from './relationship-state-machine.js';
export * as requirementMachine from './requirement-state-machine.js';
export type { CreateRelationshipInput } from './relationship-state-machine.js';
export type { CreateRequirementInput } from './requirement-state-machine.js';
