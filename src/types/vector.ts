import { z } from 'zod';
import { MetadataSchema, type Metadata } from './metadata.js';

/** Non-zero entries of a sparse vector, as parallel arrays. */
export interface SparseValues {
  indices: number[];
  values: number[];
}

/**
 * A stored record: ID, dense values and optional sparse values and metadata.
 * `values` is an empty array when the service returned none.
 */
export interface Vector {
  id: string;
  values: number[];
  sparseValues?: SparseValues;
  metadata?: Metadata;
}

/** A query match. The meaning of `score` depends on the index metric. */
export interface ScoredVector extends Vector {
  score: number;
}

export const SparseValuesSchema: z.ZodType<SparseValues> = z.object({
  indices: z.array(z.number().int().nonnegative()),
  values: z.array(z.number()),
});

const vectorShape = {
  id: z.string(),
  values: z.array(z.number()).default([]),
  sparseValues: SparseValuesSchema.optional(),
  metadata: MetadataSchema.optional(),
};

// The service omits empty and zero-valued fields, hence the defaults.
export const VectorSchema: z.ZodType<Vector, z.ZodTypeDef, unknown> = z.object(vectorShape);

export const ScoredVectorSchema: z.ZodType<ScoredVector, z.ZodTypeDef, unknown> = z.object({
  ...vectorShape,
  score: z.number().default(0),
});
