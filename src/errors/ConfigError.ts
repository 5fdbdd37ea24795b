import { BaseError } from './BaseError';

/**
 * Error thrown when the client configuration file is missing, unparsable
 * or fails schema validation.
 */
export class ConfigError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
  }
}
