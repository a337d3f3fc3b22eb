import type { Credentials } from '../config.js';
import type { Logger } from '../observability/types.js';
import type { HttpTransport } from '../transport/http.js';
import type { ClientInfo } from '../types/whoami.js';

/**
 * What an index handle needs from the session that creates it
 */
export interface Connection {
  /** API key and environment */
  credentials(): Credentials;
  /** Project metadata used to build index URLs */
  info(): ClientInfo;
  /** Transport whose base URL is the controller */
  transport(): HttpTransport;
  /** Logger shared with the transport */
  logger(): Logger;
}
