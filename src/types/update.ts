import type { Metadata } from './metadata.js';
import type { SparseValues } from './vector.js';

/**
 * Body of `POST /vectors/update`. Only the fields present are changed;
 * `setMetadata` merges into the stored metadata.
 */
export interface UpdateRequest {
  id: string;
  namespace?: string;
  values?: number[];
  sparseValues?: SparseValues;
  setMetadata?: Metadata;
}
