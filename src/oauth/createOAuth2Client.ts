import { OAuth2Client } from './OAuth2Client';
import { Config } from '../config/Config';
import { HttpClient } from '../http/HttpClient';
import { AxiosHttpClient } from '../http/AxiosHttpClient';
import { ILogger } from '../utils/ILogger';
import { Logger } from '../utils/Logger';

/**
 * Build a client from loaded configuration. The transport and logger can be
 * replaced, e.g. in tests.
 */
export function createOAuth2Client(
  config: Config,
  overrides: { httpClient?: HttpClient; logger?: ILogger } = {}
): OAuth2Client {
  return new OAuth2Client(config.oauth, {
    httpClient: overrides.httpClient ?? new AxiosHttpClient(),
    userAgent: config.http.userAgent,
    timeout: config.http.timeout,
    logger: overrides.logger ?? new Logger({ level: config.logging.level }).child({ component: 'oauth2-client' }),
  });
}
