/**
 * Cluster State — desired-topology validation, artifact reconciliation,
 * membership inspection and node decommission.
 */

export * from './types.js';
export * from './errors.js';
export * from './topology.js';
export * from './network.js';
export * from './render.js';
export * from './artifacts.js';
export * from './artifact-store.js';
export * from './credentials.js';
export * from './membership.js';
export * from './decommission.js';
export { withTimeout } from './timeout.js';
export { log, debug, warn, error as logError } from './logger.js';
