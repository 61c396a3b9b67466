/**
 * @bitforge/types - Type contracts for the bitforge flow engine
 */

// Logging
export type * from './logging.js';

// Project metadata and artifacts
export type * from './project.js';

// Flow descriptors (stage registry)
export type * from './flows.js';

// Build rules and executor plans
export type * from './rules.js';

// Stage capability interface
export type * from './stages.js';

// Resolved flow graph
export type * from './graph.js';
