/**
 * Handle to one named Pinecone index.
 *
 * @module client/index-client
 */

import type { Credentials } from '../config.js';
import { indexUrl } from '../config.js';
import { UseAfterDeleteError } from '../errors/index.js';
import type { Logger } from '../observability/types.js';
import {
  configureIndex,
  deleteIndex,
  describeIndex,
  describeIndexStats,
  fetch,
  query,
  update,
  upsert,
  type IndexOperationConfig,
} from '../operations/index.js';
import type { HttpTransport } from '../transport/http.js';
import type { FetchRequest, FetchResponse } from '../types/fetch.js';
import type { IndexDescription } from '../types/index-description.js';
import type { QueryRequest, QueryResponse } from '../types/query.js';
import type { IndexStats } from '../types/stats.js';
import type { UpdateRequest } from '../types/update.js';
import type { UpsertResponse } from '../types/upsert.js';
import type { Vector } from '../types/vector.js';
import type { ClientInfo } from '../types/whoami.js';
import type { Connection } from './connection.js';

/**
 * All index-specific operations. Each method performs exactly one HTTP
 * request and never retries.
 *
 * Name, credentials and client info are copied at construction and never
 * change, so a handle can be shared between concurrent callers. After
 * `delete()` every method throws {@link UseAfterDeleteError}.
 */
export class IndexClient {
  readonly name: string;
  private readonly creds: Credentials;
  private readonly clientInfo: ClientInfo;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private deleted = false;

  constructor(connection: Connection, name: string) {
    this.name = name;
    this.creds = Object.freeze({ ...connection.credentials() });
    this.clientInfo = Object.freeze({ ...connection.info() });
    this.transport = connection.transport();
    this.logger = connection.logger();
  }

  /**
   * True once `delete()` has been called on this handle
   */
  get isDeleted(): boolean {
    return this.deleted;
  }

  /**
   * Data-plane base URL: `https://{name}-{project}.svc.{environment}.pinecone.io`.
   * Computed from the current fields on every call.
   */
  url(): string {
    this.assertUsable();
    return indexUrl(this.name, this.clientInfo.projectName, this.creds.environment);
  }

  /**
   * Fetches the index description from the controller.
   *
   * Doubles as a check of the credentials and of the index's existence: a
   * missing index fails with an ApiError.
   */
  async describe(): Promise<IndexDescription> {
    this.assertUsable();
    return describeIndex({ transport: this.transport }, this.name);
  }

  /**
   * Grabs the latest statistics of the index.
   */
  async describeStats(): Promise<IndexStats> {
    return describeIndexStats(this.operationConfig());
  }

  /**
   * Upserts vectors into `namespace` (`""` is the default namespace).
   * See https://docs.pinecone.io/reference/upsert
   */
  async upsert(namespace: string, vectors: Vector[]): Promise<UpsertResponse> {
    return upsert(this.operationConfig(), { namespace, vectors });
  }

  /**
   * Deletes the index and resolves to the message the service returns.
   *
   * The handle is unusable afterwards, whether or not the call succeeds.
   */
  async delete(): Promise<string> {
    this.assertUsable();
    this.deleted = true;
    const message = await deleteIndex({ transport: this.transport }, this.name);
    this.logger.info('Index deleted', { index: this.name });
    return message;
  }

  /**
   * Sets the replica count and pod type of the index.
   * See https://docs.pinecone.io/reference/configure_index
   */
  async configure(replicas: number, podType: string): Promise<string> {
    this.assertUsable();
    const message = await configureIndex({ transport: this.transport }, this.name, {
      replicas,
      pod_type: podType,
    });
    this.logger.info('Index configured', { index: this.name, replicas, podType });
    return message;
  }

  /**
   * Updates one vector. The resolved value is the service's (empty) body and
   * should be ignored.
   */
  async update(request: UpdateRequest): Promise<unknown> {
    return update(this.operationConfig(), request);
  }

  /**
   * Looks up vectors by ID in a single namespace, including their values and metadata.
   */
  async fetch(request: FetchRequest): Promise<FetchResponse> {
    return fetch(this.operationConfig(), request);
  }

  /**
   * Searches a namespace for the vectors most similar to a query vector or
   * to a stored vector, with their scores.
   */
  async query(request: QueryRequest): Promise<QueryResponse> {
    return query(this.operationConfig(), request);
  }

  private operationConfig(): IndexOperationConfig {
    return { transport: this.transport, indexUrl: this.url() };
  }

  private assertUsable(): void {
    if (this.deleted) {
      throw new UseAfterDeleteError(this.name);
    }
  }
}
