/**
 * Controller Operations Module
 *
 * Index management on the environment's controller: describe, configure,
 * create, list and delete indexes, and identify the calling project.
 *
 * @module operations/controller
 */

import type { ControllerOperationConfig } from './types.js';
import {
  IndexDescriptionSchema,
  type IndexDescription,
} from '../types/index-description.js';
import type { ConfigureIndexRequest, CreateIndexRequest } from '../types/configure.js';
import { toCreateIndexBody } from '../types/configure.js';
import { ClientInfoSchema, IndexListSchema, type ClientInfo } from '../types/whoami.js';

function databasePath(name: string): string {
  return `/databases/${encodeURIComponent(name)}`;
}

/**
 * `GET /databases/{name}`. Also a cheap existence check: a missing index
 * fails with an ApiError.
 */
export async function describeIndex(
  config: ControllerOperationConfig,
  name: string
): Promise<IndexDescription> {
  return config.transport.requestJson(
    { method: 'GET', expectedStatus: 200, path: databasePath(name) },
    IndexDescriptionSchema
  );
}

/**
 * `PATCH /databases/{name}`; the service answers 202 with a text message.
 */
export async function configureIndex(
  config: ControllerOperationConfig,
  name: string,
  request: ConfigureIndexRequest
): Promise<string> {
  return config.transport.requestText({
    method: 'PATCH',
    expectedStatus: 202,
    path: databasePath(name),
    body: request,
  });
}

/**
 * `DELETE /databases/{name}`; the service answers 202 with a text message.
 */
export async function deleteIndex(
  config: ControllerOperationConfig,
  name: string
): Promise<string> {
  return config.transport.requestText({
    method: 'DELETE',
    expectedStatus: 202,
    path: databasePath(name),
  });
}

/**
 * `GET /databases`: names of the project's indexes.
 */
export async function listIndexes(config: ControllerOperationConfig): Promise<string[]> {
  return config.transport.requestJson(
    { method: 'GET', expectedStatus: 200, path: '/databases' },
    IndexListSchema
  );
}

/**
 * `POST /databases`; the service answers 201 with a text message.
 */
export async function createIndex(
  config: ControllerOperationConfig,
  request: CreateIndexRequest
): Promise<string> {
  return config.transport.requestText({
    method: 'POST',
    expectedStatus: 201,
    path: '/databases',
    body: toCreateIndexBody(request),
  });
}

/**
 * `GET /actions/whoami`: the project name behind the API key.
 */
export async function whoami(config: ControllerOperationConfig): Promise<ClientInfo> {
  return config.transport.requestJson(
    { method: 'GET', expectedStatus: 200, path: '/actions/whoami' },
    ClientInfoSchema
  );
}
