/**
 * Section editors, in the order the pipeline runs them
 */
export * from './base.js';
export * from './build-file-section.js';
export * from './file-reference-section.js';
export * from './group-membership.js';
export * from './sources-build-phase.js';
