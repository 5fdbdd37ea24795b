import { HttpMethod } from '../oauth/types';

/**
 * A fully built request, ready for the transport.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Buffer | string;
  /** Request deadline in milliseconds. Enforced by the transport. */
  timeout?: number;
}

/**
 * Raw response as received, whatever its status code.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Platform-agnostic HTTP transport.
 * Allows swapping between different HTTP implementations (axios, fetch, etc.)
 * for better testing and platform compatibility.
 *
 * Implementations resolve for every HTTP response, including non-2xx ones,
 * and reject with a `TransportError` only when no response was obtained.
 * They do not retry.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}
