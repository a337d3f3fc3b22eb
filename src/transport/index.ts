export type {
  HttpMethod,
  HttpTransportConfig,
  RequestOptions,
} from './http.js';

export {
  HttpTransport,
  createHttpTransport,
  parseErrorResponse,
} from './http.js';
