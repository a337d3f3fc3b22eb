/**
 * Client module exports
 * @module client
 */

export { Client } from './client.js';
export { IndexClient } from './index-client.js';
export type { Connection } from './connection.js';
