import { z } from 'zod';

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const expiresIn = z
  .union([
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/).transform(Number).refine(Number.isSafeInteger),
  ])
  .nullish()
  .transform((value) => value ?? undefined);

export interface AccessToken {
  readonly accessToken: string;
  readonly refreshToken?: string;
  /** Lifetime in seconds as reported by the provider. Not enforced. */
  readonly expiresIn?: number;
  readonly tokenType?: string;
  readonly scope?: string;
  readonly idToken?: string;
}

/**
 * Token endpoint response as sent by the provider. Only `access_token` is
 * required; other fields may be missing or null.
 */
export const AccessTokenSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: optionalString,
    expires_in: expiresIn,
    token_type: optionalString,
    scope: optionalString,
    id_token: optionalString,
  })
  .transform((wire): AccessToken => {
    const token: {
      accessToken: string;
      refreshToken?: string;
      expiresIn?: number;
      tokenType?: string;
      scope?: string;
      idToken?: string;
    } = { accessToken: wire.access_token };

    if (wire.refresh_token !== undefined) token.refreshToken = wire.refresh_token;
    if (wire.expires_in !== undefined) token.expiresIn = wire.expires_in;
    if (wire.token_type !== undefined) token.tokenType = wire.token_type;
    if (wire.scope !== undefined) token.scope = wire.scope;
    if (wire.id_token !== undefined) token.idToken = wire.id_token;

    return token;
  });

/**
 * Serialize a token back into the provider's wire form, omitting absent fields.
 */
export function encodeAccessToken(token: AccessToken): string {
  return JSON.stringify({
    access_token: token.accessToken,
    refresh_token: token.refreshToken,
    expires_in: token.expiresIn,
    token_type: token.tokenType,
    scope: token.scope,
    id_token: token.idToken,
  });
}
