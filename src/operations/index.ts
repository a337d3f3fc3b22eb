/**
 * Operations Module
 *
 * One function per REST endpoint. Each performs exactly one HTTP request.
 *
 * @module operations
 */

export type { IndexOperationConfig, ControllerOperationConfig } from './types.js';

export { upsert } from './upsert.js';
export { query } from './query.js';
export { fetch } from './fetch.js';
export { update } from './update.js';
export { describeIndexStats } from './stats.js';
export {
  describeIndex,
  configureIndex,
  deleteIndex,
  listIndexes,
  createIndex,
  whoami,
} from './controller.js';
