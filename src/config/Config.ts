import { ConfigSchema, ConfigData } from './types';
import { OAuth2Config } from '../oauth/types';

export class Config {
  static validate(input: unknown): ConfigData {
    return ConfigSchema.parse(input);
  }

  constructor(private data: ConfigData) {}

  get oauth(): OAuth2Config {
    return this.data.oauth;
  }

  get http(): ConfigData['http'] {
    return this.data.http;
  }

  get logging(): ConfigData['logging'] {
    return this.data.logging;
  }
}
