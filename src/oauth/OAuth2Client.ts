import { AccessToken, AccessTokenSchema } from './AccessToken';
import { OAuth2Result, err } from './Result';
import { classify, decodeJson } from './ResponseInterpreter';
import {
  authorizationUrl,
  buildAuthenticatedGet,
  buildAuthenticatedPost,
  buildPostRequest,
  buildRefreshRequest,
  buildTokenExchangeRequest,
  toHttpRequest,
} from './RequestBuilder';
import { Decoder, FormParam, OAuth2Config, RequestSpec } from './types';
import { HttpClient } from '../http/HttpClient';
import { AxiosHttpClient } from '../http/AxiosHttpClient';
import { TransportError } from '../errors/TransportError';
import { ILogger } from '../utils/ILogger';
import { Logger } from '../utils/Logger';

export interface OAuth2ClientOptions {
  httpClient?: HttpClient;
  userAgent?: string;
  /** Per-request deadline in milliseconds, passed to the transport. */
  timeout?: number;
  logger?: ILogger;
}

/**
 * OAuth2 client: exchanges authorization codes and refresh tokens for access
 * tokens, then issues bearer-authenticated requests.
 *
 * Every call resolves to a `Result`; it never rejects. A failure without an
 * HTTP response is a `TransportError`, a non-200 status an `HttpStatusError`,
 * and a 200 body of the wrong shape a `DecodeError`. The client keeps no
 * state between calls, so calls may run concurrently.
 *
 * @example
 * ```typescript
 * const client = new OAuth2Client({
 *   clientId: 'my-client-id',
 *   clientSecret: 'my-secret',
 *   authorizeEndpoint: 'https://provider.example.com/oauth/authorize',
 *   tokenEndpoint: 'https://provider.example.com/oauth/token',
 *   redirectUri: 'https://app.example.com/callback',
 * });
 *
 * const result = await client.fetchAccessToken(code);
 * if (result.ok) {
 *   const me = await client.authGetJson(result.value, 'https://provider.example.com/me', UserSchema);
 * }
 * ```
 */
export class OAuth2Client {
  private readonly httpClient: HttpClient;
  private readonly logger: ILogger;

  constructor(
    private readonly config: OAuth2Config,
    private readonly options: OAuth2ClientOptions = {}
  ) {
    this.httpClient = options.httpClient ?? new AxiosHttpClient();
    this.logger = options.logger ?? new Logger({ level: 'info' });
  }

  authorizationUrl(extraParams: ReadonlyArray<FormParam> = []): string {
    return authorizationUrl(this.config, extraParams);
  }

  async fetchAccessToken(code: string): Promise<OAuth2Result<AccessToken>> {
    return decodeJson(await this.send(buildTokenExchangeRequest(this.config, code)), AccessTokenSchema);
  }

  async fetchRefreshToken(refreshToken: string): Promise<OAuth2Result<AccessToken>> {
    return decodeJson(await this.send(buildRefreshRequest(this.config, refreshToken)), AccessTokenSchema);
  }

  async doJsonPostRequest<T>(url: string, params: ReadonlyArray<FormParam>, decoder: Decoder<T>): Promise<OAuth2Result<T>> {
    return decodeJson(await this.doSimplePostRequest(url, params), decoder);
  }

  /**
   * Unauthenticated form POST, returning the raw body.
   */
  async doSimplePostRequest(url: string, params: ReadonlyArray<FormParam>): Promise<OAuth2Result<Buffer>> {
    return this.send(buildPostRequest(url, params));
  }

  async authGetJson<T>(token: AccessToken, url: string, decoder: Decoder<T>): Promise<OAuth2Result<T>> {
    return decodeJson(await this.authGetBytes(token, url), decoder);
  }

  async authGetBytes(token: AccessToken, url: string): Promise<OAuth2Result<Buffer>> {
    return this.send(buildAuthenticatedGet(token, url), token);
  }

  async authPostJson<T>(
    token: AccessToken,
    url: string,
    params: ReadonlyArray<FormParam>,
    decoder: Decoder<T>
  ): Promise<OAuth2Result<T>> {
    return decodeJson(await this.authPostBytes(token, url, params), decoder);
  }

  /**
   * Form POST with `access_token` appended to the caller's parameters.
   * Sent with `Content-Type: application/x-www-form-urlencoded`, not the
   * policy's `application/json`.
   */
  async authPostBytes(token: AccessToken, url: string, params: ReadonlyArray<FormParam>): Promise<OAuth2Result<Buffer>> {
    return this.send(buildAuthenticatedPost(token, url, params, { kind: 'form' }), token);
  }

  async authPostJsonWithBody<T>(
    token: AccessToken,
    url: string,
    params: ReadonlyArray<FormParam>,
    body: Buffer | string,
    decoder: Decoder<T>
  ): Promise<OAuth2Result<T>> {
    return decodeJson(await this.authPostBytesWithBody(token, url, params, body), decoder);
  }

  /**
   * POST of a caller-supplied body. `params` and `access_token` go in the
   * query string.
   */
  async authPostBytesWithBody(
    token: AccessToken,
    url: string,
    params: ReadonlyArray<FormParam>,
    body: Buffer | string
  ): Promise<OAuth2Result<Buffer>> {
    return this.send(buildAuthenticatedPost(token, url, params, { kind: 'raw', data: body }), token);
  }

  private async send(spec: RequestSpec, token?: AccessToken): Promise<OAuth2Result<Buffer>> {
    const request = toHttpRequest(spec, token, {
      userAgent: this.options.userAgent,
      timeout: this.options.timeout,
    });
    const url = redactUrl(request.url);

    this.logger.debug('Sending OAuth2 request', { method: request.method, url });

    try {
      const response = await this.httpClient.request(request);
      this.logger.debug('Received OAuth2 response', { method: request.method, url, status: response.status });
      return classify(response);
    } catch (error) {
      const transportError =
        error instanceof TransportError
          ? error
          : new TransportError(error instanceof Error ? error.message : String(error), { url, method: request.method });
      this.logger.debug('OAuth2 request failed before a response', {
        method: request.method,
        url,
        error: transportError.message,
      });
      return err(transportError);
    }
  }
}

function redactUrl(url: string): string {
  return url.replace(/([?&]access_token=)[^&#]*/g, '$1[REDACTED]');
}
