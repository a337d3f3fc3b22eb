import type { MetadataConfig, Metric } from './index-description.js';

/**
 * Body of `PATCH /databases/{name}`
 */
export interface ConfigureIndexRequest {
  replicas: number;
  pod_type: string;
}

/**
 * Options for creating an index with `POST /databases`
 */
export interface CreateIndexRequest {
  name: string;
  dimension: number;
  /** Defaults to `cosine` on the service side */
  metric?: Metric;
  pods?: number;
  replicas?: number;
  /** e.g. `p1.x1`, `s1.x2` */
  podType?: string;
  metadataConfig?: MetadataConfig;
  /** Collection to create the index from */
  sourceCollection?: string;
}

/**
 * Converts create options to the controller's snake_case body
 */
export function toCreateIndexBody(request: CreateIndexRequest): Record<string, unknown> {
  return {
    name: request.name,
    dimension: request.dimension,
    metric: request.metric,
    pods: request.pods,
    replicas: request.replicas,
    pod_type: request.podType,
    metadata_config: request.metadataConfig,
    source_collection: request.sourceCollection,
  };
}
