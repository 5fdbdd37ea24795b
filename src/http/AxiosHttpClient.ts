import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { HttpClient, HttpRequest, HttpResponse } from './HttpClient';
import { TransportError } from '../errors/TransportError';

/**
 * Axios-based HTTP transport.
 * Every status code resolves; only failures without a response reject.
 */
export class AxiosHttpClient implements HttpClient {
  constructor(private axiosInstance: AxiosInstance = axios.create()) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.axiosInstance.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        timeout: request.timeout,
        responseType: 'arraybuffer',
        // bodies are already encoded; send and return bytes untouched
        transformRequest: [(data: unknown) => data],
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      return this.convertResponse(response);
    } catch (error) {
      throw this.convertError(error, request);
    }
  }

  /**
   * Get the underlying axios instance for advanced use cases.
   * Use sparingly - prefer using the HttpClient interface.
   */
  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }

  private convertResponse(response: AxiosResponse<unknown>): HttpResponse {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(response.headers)) {
      if (value !== undefined && value !== null) {
        headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
      }
    }

    return {
      status: response.status,
      statusText: response.statusText ?? '',
      headers,
      body: toBuffer(response.data),
    };
  }

  private convertError(error: unknown, { method, url }: HttpRequest): TransportError {
    if (axios.isAxiosError(error)) {
      return new TransportError(error.message, {
        url,
        method,
        code: error.code,
        isTimeout: error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT',
        isNetworkError: !error.response && !!error.request,
      });
    }

    return new TransportError(error instanceof Error ? error.message : 'Unknown error', { url, method });
  }
}

function toBuffer(data: unknown): Buffer {
  if (data === undefined || data === null) {
    return Buffer.alloc(0);
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  return Buffer.from(JSON.stringify(data), 'utf8');
}
