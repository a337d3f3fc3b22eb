/**
 * pinecone-rest-client
 *
 * Typed TypeScript client for the Pinecone vector database REST API.
 *
 * @example
 * ```typescript
 * import { Client, ApiError } from 'pinecone-rest-client';
 *
 * const client = await Client.connect({
 *   apiKey: 'your-api-key',
 *   environment: 'us-east1-gcp',
 * });
 *
 * const index = client.index('my-index');
 * const { database } = await index.describe();
 *
 * await index.upsert('docs', [
 *   { id: 'vec1', values: new Array(database.dimension).fill(0.5), metadata: { category: 'docs' } },
 * ]);
 *
 * const results = await index.query({
 *   vector: new Array(database.dimension).fill(0.5),
 *   topK: 10,
 *   filter: { category: { $eq: 'docs' } },
 *   includeMetadata: true,
 * });
 *
 * try {
 *   await index.configure(2, 'p1.x1');
 * } catch (error) {
 *   if (error instanceof ApiError && error.status === 400) {
 *     // configuration rejected by the service
 *   }
 * }
 * ```
 */

// Client exports
export { Client, IndexClient, type Connection } from './client/index.js';

// Configuration exports
export {
  validateConfig,
  configFromEnv,
  controllerUrl,
  indexUrl,
  PineconeConfigBuilder,
  PineconeConfig,
  DEFAULT_USER_AGENT,
  type Credentials,
  type ValidatedPineconeConfig,
} from './config.js';

// Error exports
export {
  PineconeError,
  ConfigurationError,
  TransportError,
  ApiError,
  DecodeError,
  UseAfterDeleteError,
} from './errors/index.js';

// Logging exports
export {
  LogLevel,
  NoopLogger,
  ConsoleLogger,
  createLogger,
  type Logger,
  type LogEntry,
  type ConsoleLoggerOptions,
} from './observability/index.js';

// Transport exports
export {
  HttpTransport,
  createHttpTransport,
  type HttpMethod,
  type HttpTransportConfig,
  type RequestOptions,
} from './transport/index.js';

// Type exports
export type {
  Metadata,
  MetadataValue,
  MetadataFilter,
  FieldCondition,
  Vector,
  ScoredVector,
  SparseValues,
  QueryRequest,
  QueryResponse,
  Usage,
  UpsertRequest,
  UpsertResponse,
  FetchRequest,
  FetchResponse,
  UpdateRequest,
  IndexStats,
  NamespaceStats,
  Metric,
  MetadataConfig,
  IndexDatabase,
  IndexStatus,
  IndexDescription,
  ConfigureIndexRequest,
  CreateIndexRequest,
  ClientInfo,
} from './types/mod.js';
export { fetchRequestUrl } from './types/mod.js';
