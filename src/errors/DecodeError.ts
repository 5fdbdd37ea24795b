import { BaseError } from './BaseError';

export const DECODE_ERROR_LABEL = 'Could not decode JSON: ';

/**
 * Error returned when a 200 response body is not JSON of the expected shape.
 */
export class DecodeError extends BaseError {
  readonly payload: Buffer;

  constructor(
    public readonly body: Buffer,
    reason?: string
  ) {
    const payload = Buffer.concat([Buffer.from(DECODE_ERROR_LABEL, 'utf8'), body]);
    super(payload.toString('utf8'), 'DECODE_ERROR', reason ? { reason } : undefined);
    this.payload = payload;
  }
}
