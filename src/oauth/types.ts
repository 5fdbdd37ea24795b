import { z } from 'zod';

export const OAuth2ConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  authorizeEndpoint: z.string().url(),
  tokenEndpoint: z.string().url(),
  redirectUri: z.string().url().optional(),
});

/**
 * Client registration and provider endpoints. Supplied by the caller and
 * never mutated.
 */
export type OAuth2Config = Readonly<z.infer<typeof OAuth2ConfigSchema>>;

export type FormParam = readonly [key: string, value: string];

export type HttpMethod = 'GET' | 'POST';

export type RequestBody =
  | { readonly kind: 'empty' }
  | { readonly kind: 'form'; readonly params: ReadonlyArray<FormParam> }
  | { readonly kind: 'raw'; readonly data: Buffer | string };

/**
 * A request before headers are applied and the body is encoded.
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  readonly url: string;
  readonly body: RequestBody;
}

/**
 * Body kind for an authenticated POST: form-encode the parameters, or send
 * caller-supplied bytes and move the parameters into the query string.
 */
export type AuthenticatedPostBody =
  | { readonly kind: 'form' }
  | { readonly kind: 'raw'; readonly data: Buffer | string };

/**
 * Validates and converts a decoded JSON value into `T`.
 */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;
