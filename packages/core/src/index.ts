/**
 * @seqctl/core
 * Resource group model, readiness evaluation and deployment sequencing
 */

// Model
export * from './model/index.js';

// Readiness
export * from './readiness/index.js';

// Sequencer
export * from './sequencer/index.js';

// ============================================
// Operations around the sequencer
// ============================================

// Stack definition files
export * from './stack/index.js';

// Cluster validation, report and status
export * from './validation/index.js';

// Teardown
export * from './teardown/index.js';

// Human-readable output
export * from './reporting/index.js';
