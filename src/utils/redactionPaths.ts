export const DEFAULT_REDACTION_PATHS = [
  'accessToken',
  'refreshToken',
  'idToken',
  'access_token',
  'refresh_token',
  'token.accessToken',
  'token.refreshToken',
  '*.accessToken',
  '*.refreshToken',
  'headers.authorization',
  'headers.Authorization',
  'clientSecret',
  'client_secret',
  'oauth.clientSecret',
  'code',
];
