import { TransportError } from '../errors/TransportError';
import { HttpStatusError } from '../errors/HttpStatusError';
import { DecodeError } from '../errors/DecodeError';

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };

/**
 * Tagged success/error value returned by every stage of a request.
 */
export type Result<T, E> = Ok<T> | Err<E>;

export type OAuth2Error = TransportError | HttpStatusError | DecodeError;

export type OAuth2Result<T> = Result<T, OAuth2Error>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Apply the next stage to a success; an error passes through untouched.
 */
export function andThen<T, U, E, F>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return result.ok ? fn(result.value) : result;
}
