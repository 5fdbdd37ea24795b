type ConfigRecord = Record<string, unknown>;

const OAUTH_OVERRIDES: ReadonlyArray<readonly [env: string, key: string]> = [
  ['OAUTH2_CLIENT_ID', 'clientId'],
  ['OAUTH2_CLIENT_SECRET', 'clientSecret'],
  ['OAUTH2_AUTHORIZE_ENDPOINT', 'authorizeEndpoint'],
  ['OAUTH2_TOKEN_ENDPOINT', 'tokenEndpoint'],
  ['OAUTH2_REDIRECT_URI', 'redirectUri'],
];

function section(config: ConfigRecord, key: string): ConfigRecord {
  const value = config[key];
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

/**
 * Overlay `OAUTH2_*` environment variables onto a parsed config document.
 * The result is validated afterwards, so values are passed through as found.
 */
export function applyEnvOverrides(config: unknown): ConfigRecord {
  const overrides: ConfigRecord =
    typeof config === 'object' && config !== null && !Array.isArray(config) ? { ...config } : {};

  for (const [env, key] of OAUTH_OVERRIDES) {
    const value = process.env[env];
    if (value) {
      overrides.oauth = { ...section(overrides, 'oauth'), [key]: value };
    }
  }

  if (process.env.OAUTH2_HTTP_TIMEOUT) {
    overrides.http = {
      ...section(overrides, 'http'),
      timeout: parseInt(process.env.OAUTH2_HTTP_TIMEOUT, 10),
    };
  }

  if (process.env.OAUTH2_USER_AGENT) {
    overrides.http = {
      ...section(overrides, 'http'),
      userAgent: process.env.OAUTH2_USER_AGENT,
    };
  }

  if (process.env.OAUTH2_LOG_LEVEL) {
    overrides.logging = {
      ...section(overrides, 'logging'),
      level: process.env.OAUTH2_LOG_LEVEL,
    };
  }

  return overrides;
}
