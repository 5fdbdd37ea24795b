import { AccessToken } from './AccessToken';

export const DEFAULT_USER_AGENT = 'oauth2-http-client';

const POLICY_HEADER_NAMES = ['authorization', 'user-agent', 'accept', 'content-type'];

/**
 * The fixed header set sent with every request. `Authorization` is present
 * only when a token is given.
 */
export function policyHeaders(
  token: AccessToken | undefined,
  userAgent: string = DEFAULT_USER_AGENT
): Record<string, string> {
  const headers: Record<string, string> = {};
  if (token) {
    headers.Authorization = `Bearer ${token.accessToken}`;
  }
  headers['User-Agent'] = userAgent;
  headers.Accept = 'application/json';
  headers['Content-Type'] = 'application/json';
  return headers;
}

/**
 * Return a copy of `request` with the policy headers first. Existing headers
 * sharing a policy header name (compared case-insensitively) are replaced, so
 * without a token no `Authorization` header survives.
 */
export function applyHeaders<R extends { headers: Record<string, string> }>(
  token: AccessToken | undefined,
  request: R,
  userAgent?: string
): R {
  const headers = policyHeaders(token, userAgent);

  for (const [name, value] of Object.entries(request.headers)) {
    if (!POLICY_HEADER_NAMES.includes(name.toLowerCase())) {
      headers[name] = value;
    }
  }

  return { ...request, headers };
}
