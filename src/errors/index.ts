export { BaseError } from './BaseError';
export { ConfigError } from './ConfigError';
export { TransportError } from './TransportError';
export type { TransportErrorDetails } from './TransportError';
export { HttpStatusError, HTTP_STATUS_ERROR_LABEL } from './HttpStatusError';
export { DecodeError, DECODE_ERROR_LABEL } from './DecodeError';
