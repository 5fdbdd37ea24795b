import { BaseError } from './BaseError';

export const HTTP_STATUS_ERROR_LABEL = 'Gaining token failed: ';

/**
 * Error returned when a response arrived with any status other than 200.
 * `payload` is the diagnostic label followed by the raw response body.
 */
export class HttpStatusError extends BaseError {
  readonly payload: Buffer;

  constructor(
    public readonly status: number,
    public readonly body: Buffer
  ) {
    const payload = Buffer.concat([Buffer.from(HTTP_STATUS_ERROR_LABEL, 'utf8'), body]);
    super(payload.toString('utf8'), 'HTTP_STATUS_ERROR', { status });
    this.payload = payload;
  }
}
