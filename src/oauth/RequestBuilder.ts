import { AccessToken } from './AccessToken';
import { applyHeaders } from './HeaderPolicy';
import { AuthenticatedPostBody, FormParam, OAuth2Config, RequestSpec } from './types';
import { HttpRequest } from '../http/HttpClient';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export interface BuildOptions {
  userAgent?: string;
  timeout?: number;
}

/**
 * Serialize parameters as `key=value` pairs joined with `&`, keeping their order.
 */
export function encodeForm(params: ReadonlyArray<FormParam>): string {
  return new URLSearchParams(params.map(([key, value]): [string, string] => [key, value])).toString();
}

/**
 * Append query parameters to a URL. The URL is not parsed or validated;
 * a malformed one fails later, in the transport.
 */
export function appendQueryParams(url: string, params: ReadonlyArray<FormParam>): string {
  if (params.length === 0) {
    return url;
  }
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${encodeForm(params)}`;
}

export function accessTokenToParam(token: AccessToken): FormParam[] {
  return [['access_token', token.accessToken]];
}

export function appendAccessToken(url: string, token: AccessToken): string {
  return appendQueryParams(url, accessTokenToParam(token));
}

/**
 * URL the resource owner visits to grant consent. `extraParams` typically
 * carries `scope` and `state`.
 */
export function authorizationUrl(config: OAuth2Config, extraParams: ReadonlyArray<FormParam> = []): string {
  return appendQueryParams(config.authorizeEndpoint, [
    ['client_id', config.clientId],
    ['response_type', 'code'],
    ...redirectParam(config),
    ...extraParams,
  ]);
}

export function buildTokenExchangeRequest(config: OAuth2Config, code: string): RequestSpec {
  return {
    method: 'POST',
    url: config.tokenEndpoint,
    body: {
      kind: 'form',
      params: [
        ['client_id', config.clientId],
        ['client_secret', config.clientSecret],
        ['code', code],
        ...redirectParam(config),
        ['grant_type', 'authorization_code'],
      ],
    },
  };
}

export function buildRefreshRequest(config: OAuth2Config, refreshToken: string): RequestSpec {
  return {
    method: 'POST',
    url: config.tokenEndpoint,
    body: {
      kind: 'form',
      params: [
        ['client_id', config.clientId],
        ['client_secret', config.clientSecret],
        ['grant_type', 'refresh_token'],
        ['refresh_token', refreshToken],
      ],
    },
  };
}

export function buildPostRequest(url: string, params: ReadonlyArray<FormParam>): RequestSpec {
  return { method: 'POST', url, body: { kind: 'form', params } };
}

export function buildAuthenticatedGet(token: AccessToken, url: string): RequestSpec {
  return { method: 'GET', url: appendAccessToken(url, token), body: { kind: 'empty' } };
}

/**
 * Authenticated POST. A form body carries the caller's parameters followed by
 * `access_token`; a raw body is sent as-is and those parameters move to the
 * query string.
 */
export function buildAuthenticatedPost(
  token: AccessToken,
  url: string,
  params: ReadonlyArray<FormParam>,
  body: AuthenticatedPostBody
): RequestSpec {
  const withToken = [...params, ...accessTokenToParam(token)];

  if (body.kind === 'raw') {
    return {
      method: 'POST',
      url: appendQueryParams(url, withToken),
      body: { kind: 'raw', data: body.data },
    };
  }

  return { method: 'POST', url, body: { kind: 'form', params: withToken } };
}

/**
 * Finalize a spec for the transport: policy headers first, then the body.
 *
 * A form body overrides the policy `Content-Type: application/json` with
 * `application/x-www-form-urlencoded`, so the header names the encoding
 * actually sent. This is the one exception to the policy headers replacing
 * same-named headers; raw and empty bodies keep the policy value.
 */
export function toHttpRequest(
  spec: RequestSpec,
  token: AccessToken | undefined,
  options: BuildOptions = {}
): HttpRequest {
  const base: HttpRequest = { method: spec.method, url: spec.url, headers: {} };
  if (options.timeout !== undefined) {
    base.timeout = options.timeout;
  }
  const request = applyHeaders(token, base, options.userAgent);

  switch (spec.body.kind) {
    case 'form':
      return {
        ...request,
        headers: { ...request.headers, 'Content-Type': FORM_CONTENT_TYPE },
        body: encodeForm(spec.body.params),
      };
    case 'raw':
      return { ...request, body: spec.body.data };
    case 'empty':
      return request;
  }
}

function redirectParam(config: OAuth2Config): FormParam[] {
  return config.redirectUri ? [['redirect_uri', config.redirectUri]] : [];
}
