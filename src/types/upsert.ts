import { z } from 'zod';
import type { Vector } from './vector.js';

/** Body of `POST /vectors/upsert`. `""` is the default namespace. */
export interface UpsertRequest {
  namespace: string;
  vectors: Vector[];
}

export interface UpsertResponse {
  upsertedCount: number;
}

// A zero count is omitted from the response body.
export const UpsertResponseSchema: z.ZodType<UpsertResponse, z.ZodTypeDef, unknown> = z.object({
  upsertedCount: z.number().int().nonnegative().default(0),
});
