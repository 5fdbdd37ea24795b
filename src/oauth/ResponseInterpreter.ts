import { Decoder } from './types';
import { Result, err, ok } from './Result';
import { HttpResponse } from '../http/HttpClient';
import { HttpStatusError } from '../errors/HttpStatusError';
import { DecodeError } from '../errors/DecodeError';

/**
 * Status 200 yields the body bytes verbatim; anything else is an
 * `HttpStatusError` carrying the body.
 */
export function classify(response: HttpResponse): Result<Buffer, HttpStatusError> {
  if (response.status === 200) {
    return ok(response.body);
  }
  return err(new HttpStatusError(response.status, response.body));
}

/**
 * Decode a successful body as JSON of the decoder's shape. An error input is
 * returned as the same object, never wrapped again.
 */
export function decodeJson<T, E>(result: Result<Buffer, E>, decoder: Decoder<T>): Result<T, E | DecodeError> {
  if (!result.ok) {
    return result;
  }

  const body = result.value;
  let json: unknown;
  try {
    json = JSON.parse(body.toString('utf8'));
  } catch (error) {
    return err(new DecodeError(body, error instanceof Error ? error.message : String(error)));
  }

  const parsed = decoder.safeParse(json);
  if (!parsed.success) {
    return err(new DecodeError(body, parsed.error.message));
  }
  return ok(parsed.data);
}
