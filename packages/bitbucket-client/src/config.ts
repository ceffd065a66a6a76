/**
 * Configuration management for the Bitbucket client
 */

import { loadEnv, type AppEnv } from '@pipewatch/shared/env';
import { ConfigSchema, type Config, type ConfigInput } from './types.js';

export function configFromEnv(env: AppEnv = loadEnv()): Config {
  return ConfigSchema.parse({
    baseUrl: env.BITBUCKET_API_URL,
    timeout: env.PIPEWATCH_REQUEST_TIMEOUT_MS,
    credentials: env.credentials
  });
}

/**
 * Validate configuration, filling in defaults
 */
export function createConfig(input: ConfigInput): Config {
  return ConfigSchema.parse(input);
}
