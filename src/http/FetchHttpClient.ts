import { HttpClient, HttpRequest, HttpResponse } from './HttpClient';
import { TransportError } from '../errors/TransportError';

/**
 * Fetch-based HTTP transport.
 * Uses the global fetch API (Node.js 18+ and browsers). Redirects follow
 * fetch's defaults.
 */
export class FetchHttpClient implements HttpClient {
  constructor(private fetchImpl: typeof fetch = fetch) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();

    // Set up timeout if specified
    let timeoutId: NodeJS.Timeout | undefined;
    if (request.timeout) {
      timeoutId = setTimeout(() => controller.abort(), request.timeout);
    }

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      return await this.convertResponse(response);
    } catch (error) {
      throw this.convertError(error, request);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private async convertResponse(response: Response): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body: Buffer.from(await response.arrayBuffer()),
    };
  }

  private convertError(error: unknown, { method, url }: HttpRequest): TransportError {
    if (error instanceof Error && error.name === 'AbortError') {
      return new TransportError('Request timeout', { url, method, code: 'ECONNABORTED', isTimeout: true });
    }

    // fetch reports connection, DNS and URL failures as TypeError
    if (error instanceof TypeError) {
      return new TransportError(`Network error: ${error.message}`, { url, method, isNetworkError: true });
    }

    return new TransportError(error instanceof Error ? error.message : 'Unknown error', { url, method });
  }
}
