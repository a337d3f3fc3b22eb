import type { HttpTransport } from '../transport/http.js';

/**
 * Configuration shared by the data-plane operations
 */
export interface IndexOperationConfig {
  /** HTTP transport instance */
  transport: HttpTransport;
  /** Data-plane base URL of the index, computed by the caller for this call */
  indexUrl: string;
}

/**
 * Configuration shared by the controller operations
 */
export interface ControllerOperationConfig {
  /** HTTP transport instance, whose base URL is the controller */
  transport: HttpTransport;
}
