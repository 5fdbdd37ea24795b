export { OAuth2Client } from './oauth/OAuth2Client';
export type { OAuth2ClientOptions } from './oauth/OAuth2Client';
export { createOAuth2Client } from './oauth/createOAuth2Client';
export { AccessTokenSchema, encodeAccessToken } from './oauth/AccessToken';
export type { AccessToken } from './oauth/AccessToken';
export { ok, err, map, andThen } from './oauth/Result';
export type { Ok, Err, Result, OAuth2Error, OAuth2Result } from './oauth/Result';
export { classify, decodeJson } from './oauth/ResponseInterpreter';
export { DEFAULT_USER_AGENT, policyHeaders, applyHeaders } from './oauth/HeaderPolicy';
export {
  FORM_CONTENT_TYPE,
  accessTokenToParam,
  appendAccessToken,
  appendQueryParams,
  authorizationUrl,
  buildAuthenticatedGet,
  buildAuthenticatedPost,
  buildPostRequest,
  buildRefreshRequest,
  buildTokenExchangeRequest,
  encodeForm,
  toHttpRequest,
} from './oauth/RequestBuilder';
export type { BuildOptions } from './oauth/RequestBuilder';
export { OAuth2ConfigSchema } from './oauth/types';
export type {
  AuthenticatedPostBody,
  Decoder,
  FormParam,
  HttpMethod,
  OAuth2Config,
  RequestBody,
  RequestSpec,
} from './oauth/types';
export type { HttpClient, HttpRequest, HttpResponse } from './http/HttpClient';
export { AxiosHttpClient } from './http/AxiosHttpClient';
export { FetchHttpClient } from './http/FetchHttpClient';
export * from './errors';
export { Config } from './config/Config';
export { ConfigLoader } from './config/ConfigLoader';
export { ConfigSchema } from './config/types';
export type { ConfigData } from './config/types';
export type { ILogger } from './utils/ILogger';
export { Logger } from './utils/Logger';
export type { LoggerOptions, LogLevel } from './utils/Logger';
