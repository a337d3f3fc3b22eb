import { z } from 'zod';
import { ScoredVectorSchema, type ScoredVector, type SparseValues } from './vector.js';
import type { MetadataFilter } from './filter.js';

/**
 * Body of `POST /query`. The service expects either `vector` or `id`; which
 * one is not checked client-side.
 */
export interface QueryRequest {
  namespace?: string;
  topK: number;
  filter?: MetadataFilter;
  includeValues?: boolean;
  includeMetadata?: boolean;
  /** Dense query embedding */
  vector?: number[];
  sparseVector?: SparseValues;
  /** Query by the stored values of this vector instead of `vector` */
  id?: string;
}

export interface Usage {
  readUnits?: number;
}

/**
 * Result of a query. `matches` is ordered best first as returned by the
 * service and is empty when nothing matched.
 */
export interface QueryResponse {
  matches: ScoredVector[];
  namespace: string;
  usage?: Usage;
}

export const QueryResponseSchema: z.ZodType<QueryResponse, z.ZodTypeDef, unknown> = z.object({
  matches: z.array(ScoredVectorSchema).default([]),
  namespace: z.string().default(''),
  usage: z.object({ readUnits: z.number().optional() }).optional(),
});
