/**
 * Query Operation Module
 *
 * Similarity search within a namespace, by vector values or by the ID of a
 * stored vector.
 *
 * @module operations/query
 */

import type { IndexOperationConfig } from './types.js';
import type { QueryRequest, QueryResponse } from '../types/query.js';
import { QueryResponseSchema } from '../types/query.js';

/**
 * Queries the index with `POST /query`
 *
 * @example
 * ```typescript
 * const response = await query(config, {
 *   vector: [0.1, 0.2, 0.3],
 *   topK: 10,
 *   includeMetadata: true,
 *   filter: { category: { $eq: 'docs' } },
 * });
 * for (const match of response.matches) {
 *   console.log(match.id, match.score);
 * }
 * ```
 */
export async function query(
  config: IndexOperationConfig,
  request: QueryRequest
): Promise<QueryResponse> {
  return config.transport.requestJson(
    {
      method: 'POST',
      expectedStatus: 200,
      baseUrl: config.indexUrl,
      path: '/query',
      body: request,
    },
    QueryResponseSchema
  );
}
