/**
 * Stats Operation Module
 *
 * Retrieves index statistics: per-namespace vector counts, dimension and fullness.
 *
 * @module operations/stats
 */

import type { IndexOperationConfig } from './types.js';
import { IndexStatsSchema, type IndexStats } from '../types/stats.js';

/**
 * Describes index statistics with `GET /describe_index_stats`
 *
 * @example
 * ```typescript
 * const stats = await describeIndexStats({ transport, indexUrl });
 * console.log(`Total vectors: ${stats.totalVectorCount}`);
 * ```
 */
export async function describeIndexStats(config: IndexOperationConfig): Promise<IndexStats> {
  return config.transport.requestJson(
    {
      method: 'GET',
      expectedStatus: 200,
      baseUrl: config.indexUrl,
      path: '/describe_index_stats',
    },
    IndexStatsSchema
  );
}
