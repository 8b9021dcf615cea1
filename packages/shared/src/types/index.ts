/**
 * Core types for seqctl
 */

export * from './sequence.js';
export * from './validation.js';
