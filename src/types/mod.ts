/**
 * Type definitions for the Pinecone REST API
 *
 * Request and response shapes for the index and controller endpoints,
 * together with the zod schemas the transport decodes responses with.
 */

// Metadata types
export type { Metadata, MetadataValue } from './metadata.js';
export { MetadataSchema, MetadataValueSchema } from './metadata.js';

// Filter types
export type { MetadataFilter, FieldCondition } from './filter.js';

// Vector types
export type { Vector, ScoredVector, SparseValues } from './vector.js';
export { VectorSchema, ScoredVectorSchema, SparseValuesSchema } from './vector.js';

// Query types
export type { QueryRequest, QueryResponse, Usage } from './query.js';
export { QueryResponseSchema } from './query.js';

// Upsert types
export type { UpsertRequest, UpsertResponse } from './upsert.js';
export { UpsertResponseSchema } from './upsert.js';

// Fetch types
export type { FetchRequest, FetchResponse } from './fetch.js';
export { FetchResponseSchema, fetchRequestUrl } from './fetch.js';

// Update types
export type { UpdateRequest } from './update.js';

// Index stats types
export type { IndexStats, NamespaceStats } from './stats.js';
export { IndexStatsSchema, NamespaceStatsSchema } from './stats.js';

// Controller types
export type {
  Metric,
  MetadataConfig,
  IndexDatabase,
  IndexStatus,
  IndexDescription,
} from './index-description.js';
export { MetricSchema, IndexDescriptionSchema } from './index-description.js';
export type { ConfigureIndexRequest, CreateIndexRequest } from './configure.js';
export { toCreateIndexBody } from './configure.js';
export type { ClientInfo } from './whoami.js';
export { ClientInfoSchema, IndexListSchema } from './whoami.js';
