import type { MetadataValue } from './metadata.js';

/**
 * Operators applicable to a single metadata field
 */
export interface FieldCondition {
  $eq?: MetadataValue;
  $ne?: MetadataValue;
  $gt?: number;
  $gte?: number;
  $lt?: number;
  $lte?: number;
  $in?: MetadataValue[];
  $nin?: MetadataValue[];
}

/**
 * Metadata filter in Pinecone's query language, e.g.
 * `{ $and: [{ genre: { $eq: 'drama' } }, { year: { $gte: 2020 } }] }`
 */
export type MetadataFilter =
  | { $and: MetadataFilter[] }
  | { $or: MetadataFilter[] }
  | { [field: string]: FieldCondition | MetadataValue };
