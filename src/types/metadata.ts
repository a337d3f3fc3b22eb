import { z } from 'zod';

/** Values Pinecone accepts in vector metadata. */
export type MetadataValue = string | number | boolean | string[];

export type Metadata = Record<string, MetadataValue>;

export const MetadataValueSchema: z.ZodType<MetadataValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
]);

export const MetadataSchema: z.ZodType<Metadata> = z.record(z.string(), MetadataValueSchema);
