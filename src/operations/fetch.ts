/**
 * Fetch Operation Module
 *
 * Looks up vectors by ID in a single namespace.
 *
 * @module operations/fetch
 */

import type { IndexOperationConfig } from './types.js';
import type { FetchRequest, FetchResponse } from '../types/fetch.js';
import { FetchResponseSchema, fetchRequestUrl } from '../types/fetch.js';

/**
 * Fetches vectors by their IDs with `GET /vectors/fetch?ids=..&namespace=..`
 *
 * The response is keyed by ID, so duplicate IDs in the request yield a
 * single entry and unknown IDs are simply absent.
 *
 * @example
 * ```typescript
 * const response = await fetch(config, {
 *   ids: ['vec1', 'vec2'],
 *   namespace: 'my-namespace'
 * });
 * console.log(`Fetched ${Object.keys(response.vectors).length} vectors`);
 * ```
 */
export async function fetch(
  config: IndexOperationConfig,
  request: FetchRequest
): Promise<FetchResponse> {
  return config.transport.requestJson(
    {
      method: 'GET',
      expectedStatus: 200,
      baseUrl: fetchRequestUrl(request, config.indexUrl),
      path: '',
    },
    FetchResponseSchema
  );
}

