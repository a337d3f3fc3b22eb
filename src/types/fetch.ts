import { z } from 'zod';
import { VectorSchema, type Vector } from './vector.js';

/** IDs to look up in one namespace; duplicates are sent as given. */
export interface FetchRequest {
  ids: string[];
  namespace?: string;
}

/** Found vectors keyed by ID. IDs that do not exist are absent. */
export interface FetchResponse {
  vectors: Record<string, Vector>;
  namespace: string;
}

export const FetchResponseSchema: z.ZodType<FetchResponse, z.ZodTypeDef, unknown> = z.object({
  vectors: z.record(z.string(), VectorSchema).default({}),
  namespace: z.string().default(''),
});

/**
 * Builds the fetch URL for a request against an index base URL.
 * Format: `{baseUrl}/vectors/fetch?ids=id1&ids=id2&namespace=ns`
 */
export function fetchRequestUrl(request: FetchRequest, baseUrl: string): string {
  const params = new URLSearchParams();

  for (const id of request.ids) {
    params.append('ids', id);
  }

  if (request.namespace !== undefined) {
    params.append('namespace', request.namespace);
  }

  return `${baseUrl}/vectors/fetch?${params.toString()}`;
}
