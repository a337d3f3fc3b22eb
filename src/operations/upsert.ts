/**
 * Upsert Operation Module
 *
 * Inserts or replaces vectors in one namespace. The payload goes to the
 * service unchanged: no client-side batching and no local validation, so an
 * empty vector list is a valid request.
 *
 * @module operations/upsert
 */

import type { IndexOperationConfig } from './types.js';
import type { UpsertRequest, UpsertResponse } from '../types/upsert.js';
import { UpsertResponseSchema } from '../types/upsert.js';

/**
 * Upserts vectors with `POST /vectors/upsert`
 *
 * @example
 * ```typescript
 * const response = await upsert(config, {
 *   namespace: 'docs',
 *   vectors: [
 *     { id: '1', values: [0.1, 0.2, 0.3] },
 *     { id: '2', values: [0.4, 0.5, 0.6] }
 *   ]
 * });
 * console.log(`Upserted ${response.upsertedCount} vectors`);
 * ```
 */
export async function upsert(
  config: IndexOperationConfig,
  request: UpsertRequest
): Promise<UpsertResponse> {
  return config.transport.requestJson(
    {
      method: 'POST',
      expectedStatus: 200,
      baseUrl: config.indexUrl,
      path: '/vectors/upsert',
      body: request,
    },
    UpsertResponseSchema
  );
}
