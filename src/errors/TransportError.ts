import { BaseError } from './BaseError';

export interface TransportErrorDetails {
  code?: string;
  isTimeout?: boolean;
  isNetworkError?: boolean;
  url?: string;
  method?: string;
}

/**
 * Error returned when no HTTP response could be obtained at all
 * (connection refused, DNS failure, TLS failure, timeout, malformed URL).
 * The message is never empty: a cause without one falls back to the
 * request line and error code.
 */
export class TransportError extends BaseError {
  readonly errorCode?: string;
  readonly isTimeout: boolean;
  readonly isNetworkError: boolean;
  /** Diagnostic bytes, read the same way as on the other request errors. */
  readonly payload: Buffer;

  constructor(message: string, details: TransportErrorDetails = {}) {
    super(message || fallbackMessage(details), 'TRANSPORT_ERROR', { ...details });
    this.errorCode = details.code;
    this.isTimeout = details.isTimeout ?? false;
    this.isNetworkError = details.isNetworkError ?? false;
    this.payload = Buffer.from(this.message);
  }
}

function fallbackMessage({ method, url, code }: TransportErrorDetails): string {
  const target = [method, url].filter((part) => part !== undefined && part !== '').join(' ');
  let message = target ? `Transport failure: ${target}` : 'Transport failure';
  if (code) {
    message += ` (${code})`;
  }
  return message;
}
