import { z } from 'zod';

/**
 * Statistics about a single namespace
 */
export interface NamespaceStats {
  /**
   * Number of vectors in this namespace
   */
  vectorCount: number;
}

/**
 * Overall statistics for a Pinecone index, as returned by `GET /describe_index_stats`
 */
export interface IndexStats {
  /**
   * Map of namespace names to their statistics; the default namespace is `""`
   */
  namespaces: Record<string, NamespaceStats>;

  /**
   * Dimension of vectors in the index
   */
  dimension: number;

  /**
   * Fullness of the index (0-1)
   */
  indexFullness: number;

  /**
   * Total number of vectors across all namespaces
   */
  totalVectorCount: number;
}

export const NamespaceStatsSchema: z.ZodType<NamespaceStats, z.ZodTypeDef, unknown> = z.object({
  vectorCount: z.number().int().nonnegative().default(0),
});

export const IndexStatsSchema: z.ZodType<IndexStats, z.ZodTypeDef, unknown> = z.object({
  namespaces: z.record(z.string(), NamespaceStatsSchema).default({}),
  dimension: z.number().int().nonnegative().default(0),
  indexFullness: z.number().default(0),
  totalVectorCount: z.number().int().nonnegative().default(0),
});
