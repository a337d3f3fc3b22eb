/**
 * Configuration types for the Pinecone client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors/index.js';
import { NoopLogger } from './observability/logger.js';
import type { Logger } from './observability/types.js';

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'pinecone-rest-client/0.1.0';

/**
 * API key and environment. The key authenticates every request; the
 * environment only selects the regional endpoint.
 */
export interface Credentials {
  readonly apiKey: string;
  readonly environment: string;
}

/**
 * Pinecone client configuration.
 */
export interface PineconeConfig {
  /** Pinecone API key (required). */
  apiKey: string;
  /** Pinecone environment (required), e.g., "us-east1-gcp". */
  environment: string;
  /** Project name; looked up with `whoami` when omitted. */
  projectName?: string;
  /** Controller base URL override; defaults to the environment's controller. */
  controllerUrl?: string;
  /** Request timeout in milliseconds. No timeout when omitted. */
  timeout?: number;
  /** User-Agent header value. */
  userAgent?: string;
  /** Custom fetch implementation. */
  fetch?: typeof fetch;
  /** Logger for request tracing; silent by default. */
  logger?: Logger;
}

/**
 * Validated Pinecone configuration with defaults applied.
 */
export interface ValidatedPineconeConfig {
  apiKey: string;
  environment: string;
  projectName?: string;
  controllerUrl: string;
  timeout?: number;
  userAgent: string;
  fetch?: typeof fetch;
  logger: Logger;
}

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required` }).refine((v) => v.trim() !== '', {
    message: `${field} cannot be empty`,
  });

const configSchema = z.object({
  apiKey: nonBlank('API key'),
  environment: nonBlank('Environment').refine((v) => !/[\s/]/.test(v), {
    message: 'Environment cannot contain whitespace or slashes',
  }),
  projectName: nonBlank('Project name').optional(),
  controllerUrl: z.string().url().optional(),
  timeout: z.number().int().positive().optional(),
  userAgent: nonBlank('User agent').optional(),
});

/**
 * Returns the controller (control-plane) base URL for an environment.
 */
export function controllerUrl(environment: string): string {
  return `https://controller.${environment}.pinecone.io`;
}

/**
 * Returns the data-plane base URL of an index. No trailing slash.
 */
export function indexUrl(indexName: string, projectName: string, environment: string): string {
  return `https://${indexName}-${projectName}.svc.${environment}.pinecone.io`;
}

/**
 * Validates and returns a complete Pinecone configuration with defaults applied.
 * @throws {ConfigurationError} If required fields are missing or invalid.
 */
export function validateConfig(config: PineconeConfig): ValidatedPineconeConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }

  const parsed = result.data;
  return {
    apiKey: parsed.apiKey,
    environment: parsed.environment,
    projectName: parsed.projectName,
    controllerUrl: stripTrailingSlash(parsed.controllerUrl ?? controllerUrl(parsed.environment)),
    timeout: parsed.timeout,
    userAgent: parsed.userAgent ?? DEFAULT_USER_AGENT,
    fetch: config.fetch,
    logger: config.logger ?? new NoopLogger(),
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Reads configuration from environment variables.
 *
 * - PINECONE_API_KEY (required)
 * - PINECONE_ENVIRONMENT (required)
 * - PINECONE_PROJECT_NAME (optional)
 * - PINECONE_CONTROLLER_URL (optional)
 *
 * @throws {ConfigurationError} If a required variable is not set
 */
export function configFromEnv(
  overrides?: Partial<PineconeConfig>,
  env: NodeJS.ProcessEnv = process.env
): PineconeConfig {
  const apiKey = overrides?.apiKey ?? env.PINECONE_API_KEY;
  const environment = overrides?.environment ?? env.PINECONE_ENVIRONMENT;

  if (!apiKey) {
    throw new ConfigurationError(
      'PINECONE_API_KEY environment variable is not set. ' +
        'Please set it or provide an apiKey in the config.'
    );
  }

  if (!environment) {
    throw new ConfigurationError(
      'PINECONE_ENVIRONMENT environment variable is not set. ' +
        'Please set it or provide an environment in the config.'
    );
  }

  return {
    projectName: env.PINECONE_PROJECT_NAME || undefined,
    controllerUrl: env.PINECONE_CONTROLLER_URL || undefined,
    ...overrides,
    apiKey,
    environment,
  };
}

/**
 * Fluent builder for PineconeConfig.
 */
export class PineconeConfigBuilder {
  private config: Partial<PineconeConfig> = {};

  apiKey(apiKey: string): this {
    this.config.apiKey = apiKey;
    return this;
  }

  environment(environment: string): this {
    this.config.environment = environment;
    return this;
  }

  projectName(projectName: string): this {
    this.config.projectName = projectName;
    return this;
  }

  controllerUrl(url: string): this {
    this.config.controllerUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  fetch(fetchImpl: typeof fetch): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): ValidatedPineconeConfig {
    const { apiKey, environment } = this.config;
    if (apiKey === undefined || environment === undefined) {
      throw new ConfigurationError('apiKey and environment are required');
    }

    return validateConfig({ ...this.config, apiKey, environment });
  }
}

/**
 * Namespace for PineconeConfig-related utilities.
 */
export namespace PineconeConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): PineconeConfigBuilder {
    return new PineconeConfigBuilder();
  }

  /**
   * Validates a configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  export function validate(config: PineconeConfig): ValidatedPineconeConfig {
    return validateConfig(config);
  }
}
