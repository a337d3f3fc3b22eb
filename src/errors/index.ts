export { PineconeError, type PineconeErrorOptions } from './error.js';
export {
  ConfigurationError,
  TransportError,
  ApiError,
  DecodeError,
  UseAfterDeleteError,
} from './categories.js';
