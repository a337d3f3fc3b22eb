import { z } from 'zod';

/**
 * Distance metric of an index
 */
export type Metric = 'cosine' | 'euclidean' | 'dotproduct';

export const MetricSchema = z.enum(['cosine', 'euclidean', 'dotproduct']);

/**
 * Which metadata fields the index keeps searchable
 */
export interface MetadataConfig {
  indexed: string[];
}

/**
 * Static configuration of an index
 */
export interface IndexDatabase {
  name: string;
  metric: Metric;
  dimension: number;
  replicas: number;
  shards: number;
  pods: number;
  podType: string;
  metadataConfig?: MetadataConfig;
}

/**
 * Runtime status of an index
 */
export interface IndexStatus {
  ready: boolean;
  /** e.g. `Initializing`, `Ready`, `ScalingUp`, `Terminating` */
  state: string;
  host?: string;
  port?: number;
  waiting: string[];
  crashed: string[];
}

/**
 * Result of `GET /databases/{name}` on the controller
 */
export interface IndexDescription {
  database: IndexDatabase;
  status: IndexStatus;
}

// Controller bodies are snake_case; decoded into camelCase.
export const IndexDescriptionSchema: z.ZodType<IndexDescription, z.ZodTypeDef, unknown> = z
  .object({
    database: z.object({
      name: z.string(),
      metric: MetricSchema,
      dimension: z.number().int().positive(),
      replicas: z.number().int().default(1),
      shards: z.number().int().default(1),
      pods: z.number().int().default(1),
      pod_type: z.string(),
      metadata_config: z.object({ indexed: z.array(z.string()) }).nullish(),
    }),
    status: z.object({
      ready: z.boolean(),
      state: z.string(),
      host: z.string().optional(),
      port: z.number().int().optional(),
      waiting: z.array(z.string()).default([]),
      crashed: z.array(z.string()).default([]),
    }),
  })
  .transform(({ database, status }) => ({
    database: {
      name: database.name,
      metric: database.metric,
      dimension: database.dimension,
      replicas: database.replicas,
      shards: database.shards,
      pods: database.pods,
      podType: database.pod_type,
      metadataConfig: database.metadata_config ?? undefined,
    },
    status,
  }));
