import type { z } from 'zod';
import {
  ApiError,
  DecodeError,
  PineconeError,
  TransportError,
} from '../errors/index.js';
import type { Logger } from '../observability/types.js';

/**
 * HTTP methods used by the Pinecone REST API
 */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Configuration for HTTP transport
 */
export interface HttpTransportConfig {
  /** Base URL used when a request gives none (the controller) */
  baseUrl: string;
  /** API key sent as the `Api-Key` header */
  apiKey: string;
  /** User-Agent header value */
  userAgent: string;
  /** Request timeout in milliseconds; no timeout when omitted */
  timeout?: number;
  /** Optional custom fetch implementation */
  fetch?: typeof fetch;
  /** Logger for request tracing */
  logger: Logger;
}

/**
 * Options for a single request
 */
export interface RequestOptions {
  /** HTTP method */
  method: HttpMethod;
  /** The only status treated as success */
  expectedStatus: number;
  /** Base URL for this request, e.g. an index's data-plane URL */
  baseUrl?: string;
  /** Path appended verbatim to the base URL (may carry a query string) */
  path: string;
  /** Request body (will be JSON stringified) */
  body?: unknown;
}

interface RawResponse {
  status: number;
  text: string;
}

/**
 * HTTP transport over the Fetch API. Performs exactly one call per request:
 * no retries, no caching.
 */
export class HttpTransport {
  private readonly config: HttpTransportConfig;

  constructor(config: HttpTransportConfig) {
    this.config = config;
  }

  /**
   * Performs a request and decodes the JSON body with `schema`.
   * @throws {TransportError} If the call could not complete
   * @throws {ApiError} If the status differs from `expectedStatus`
   * @throws {DecodeError} If the body is not JSON or does not match `schema`
   */
  async requestJson<T>(
    options: RequestOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const response = await this.send(options);

    let body: unknown;
    try {
      body = JSON.parse(response.text);
    } catch (error) {
      throw new DecodeError(
        `Response body of ${options.method} ${options.path || '/'} is not valid JSON`,
        response.status,
        { body: truncate(response.text) },
        error
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new DecodeError(
        `Unexpected response shape for ${options.method} ${options.path || '/'}: ${issues.join(', ')}`,
        response.status,
        { issues }
      );
    }

    return result.data;
  }

  /**
   * Performs a request and returns the raw body text.
   * @throws {TransportError} If the call could not complete
   * @throws {ApiError} If the status differs from `expectedStatus`
   */
  async requestText(options: RequestOptions): Promise<string> {
    const response = await this.send(options);
    return response.text;
  }

  private async send(options: RequestOptions): Promise<RawResponse> {
    const url = `${options.baseUrl ?? this.config.baseUrl}${options.path}`;
    const logger = this.config.logger;
    const controller = new AbortController();
    const timeoutId =
      this.config.timeout !== undefined
        ? setTimeout(() => controller.abort(), this.config.timeout)
        : undefined;
    const startedAt = Date.now();

    logger.debug('Sending request', { method: options.method, url });

    try {
      // Looked up per call so that interceptors installed after construction apply.
      const fetchImpl = this.config.fetch ?? globalThis.fetch;
      const response = await fetchImpl(url, {
        method: options.method,
        headers: this.buildHeaders(options.body !== undefined),
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      const text = await response.text();
      const durationMs = Date.now() - startedAt;

      if (response.status !== options.expectedStatus) {
        const error = parseErrorResponse(
          response.status,
          response.statusText,
          response.headers.get('content-type'),
          text
        );
        logger.warn('Unexpected response status', {
          method: options.method,
          url,
          status: response.status,
          expectedStatus: options.expectedStatus,
          type: error.type,
          durationMs,
        });
        throw error;
      }

      logger.debug('Received response', {
        method: options.method,
        url,
        status: response.status,
        durationMs,
      });

      return { status: response.status, text };
    } catch (error) {
      if (error instanceof PineconeError) {
        throw error;
      }

      const message =
        controller.signal.aborted && this.config.timeout !== undefined
          ? `Request timeout after ${this.config.timeout}ms`
          : `${options.method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn('Request failed', { method: options.method, url, error: message });
      throw new TransportError(message, error, { method: options.method, url });
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
    }
  }

  /**
   * Builds request headers with authentication
   */
  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json, text/plain',
      'Api-Key': this.config.apiKey,
      'User-Agent': this.config.userAgent,
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }
}

/**
 * Maps an unexpected response to an ApiError.
 *
 * The type is the service's error code when the body is JSON and carries one
 * (`{ "error": { "code", "message" } }` or `{ "code", "message" }`), otherwise
 * the response media type. The message comes from the body, falling back to
 * the status line.
 */
export function parseErrorResponse(
  status: number,
  statusText: string,
  contentType: string | null,
  text: string
): ApiError {
  let type = contentType?.split(';')[0]?.trim() || 'unknown';
  let message = text.trim() || `${status} ${statusText}`.trim();
  let details: Record<string, unknown> | undefined;

  const body = tryParseJson(text);
  if (isRecord(body)) {
    details = body;
    const payload = isRecord(body.error) ? body.error : body;
    if (typeof payload.code === 'string' || typeof payload.code === 'number') {
      type = String(payload.code);
    }
    if (typeof payload.message === 'string' && payload.message !== '') {
      message = payload.message;
    }
  }

  return new ApiError(status, type, message, details);
}

function tryParseJson(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

/**
 * Creates an HTTP transport instance
 */
export function createHttpTransport(config: HttpTransportConfig): HttpTransport {
  return new HttpTransport(config);
}
