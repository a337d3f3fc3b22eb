/**
 * Pinecone Client Module
 *
 * The session object: holds credentials, project metadata and the shared
 * transport, and hands out {@link IndexClient} handles.
 *
 * @module client
 */

import type { Credentials, PineconeConfig, ValidatedPineconeConfig } from '../config.js';
import { configFromEnv, validateConfig } from '../config.js';
import type { Logger } from '../observability/types.js';
import { createIndex, listIndexes, whoami } from '../operations/index.js';
import { HttpTransport, createHttpTransport } from '../transport/http.js';
import type { CreateIndexRequest } from '../types/configure.js';
import type { ClientInfo } from '../types/whoami.js';
import type { Connection } from './connection.js';
import { IndexClient } from './index-client.js';

/**
 * Connection to a Pinecone environment
 */
export class Client implements Connection {
  private readonly config: ValidatedPineconeConfig;
  private readonly clientInfo: ClientInfo;
  private readonly http: HttpTransport;

  private constructor(config: ValidatedPineconeConfig, clientInfo: ClientInfo, http: HttpTransport) {
    this.config = config;
    this.clientInfo = Object.freeze({ ...clientInfo });
    this.http = http;
  }

  /**
   * Validates the configuration and connects. Without a configured
   * `projectName`, asks the controller who the API key belongs to.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   * @throws {ApiError} If the controller rejects the key
   *
   * @example
   * ```typescript
   * const client = await Client.connect({
   *   apiKey: 'your-api-key',
   *   environment: 'us-east1-gcp',
   * });
   * const index = client.index('my-index');
   * const stats = await index.describeStats();
   * ```
   */
  static async connect(config: PineconeConfig): Promise<Client> {
    const validated = validateConfig(config);
    const http = createHttpTransport({
      baseUrl: validated.controllerUrl,
      apiKey: validated.apiKey,
      userAgent: validated.userAgent,
      timeout: validated.timeout,
      fetch: validated.fetch,
      logger: validated.logger,
    });

    const clientInfo: ClientInfo = validated.projectName
      ? { projectName: validated.projectName }
      : await whoami({ transport: http });

    validated.logger.debug('Connected to Pinecone', {
      environment: validated.environment,
      projectName: clientInfo.projectName,
    });

    return new Client(validated, clientInfo, http);
  }

  /**
   * Connects using PINECONE_API_KEY, PINECONE_ENVIRONMENT and the optional
   * PINECONE_PROJECT_NAME / PINECONE_CONTROLLER_URL variables.
   *
   * @throws {ConfigurationError} If required environment variables are not set
   */
  static async fromEnv(overrides?: Partial<PineconeConfig>): Promise<Client> {
    return Client.connect(configFromEnv(overrides));
  }

  credentials(): Credentials {
    return Object.freeze({ apiKey: this.config.apiKey, environment: this.config.environment });
  }

  info(): ClientInfo {
    return this.clientInfo;
  }

  transport(): HttpTransport {
    return this.http;
  }

  logger(): Logger {
    return this.config.logger;
  }

  /**
   * Returns the validated configuration
   */
  getConfig(): Readonly<ValidatedPineconeConfig> {
    return Object.freeze({ ...this.config });
  }

  /**
   * Creates a handle to the index called `name`. No request is made; use
   * `describe()` to check that the index exists.
   */
  index(name: string): IndexClient {
    return new IndexClient(this, name);
  }

  /**
   * Lists the names of the project's indexes.
   */
  async listIndexes(): Promise<string[]> {
    return listIndexes({ transport: this.http });
  }

  /**
   * Creates an index and returns the handle for it along with the
   * controller's message. The index is usable once `describe()` reports it ready.
   */
  async createIndex(request: CreateIndexRequest): Promise<{ index: IndexClient; message: string }> {
    const message = await createIndex({ transport: this.http }, request);
    this.config.logger.info('Index created', { index: request.name, dimension: request.dimension });
    return { index: this.index(request.name), message };
  }
}
