export * from './types.js';
export { createResourceGroup, validateGroupSequence, validateReadinessPredicate } from './resource-group.js';
export { parseLabelSelector, matchesLabels } from './label-selector.js';
