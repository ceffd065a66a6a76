import { config } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { Credentials } from './types.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  BITBUCKET_USERNAME: optionalString,
  BITBUCKET_APP_PASSWORD: optionalString,
  BITBUCKET_ACCESS_TOKEN: optionalString,
  BITBUCKET_API_URL: z.string().url('BITBUCKET_API_URL must be a valid URL').default('https://api.bitbucket.org/2.0'),
  PIPEWATCH_REFRESH_SECONDS: z.coerce.number().int().positive().default(10),
  PIPEWATCH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PIPEWATCH_MAX_RETRIES: z.coerce.number().int().nonnegative().default(5),
  PIPEWATCH_RETRY_BASE_MS: z.coerce.number().int().positive().default(1_000),
  PIPEWATCH_RETRY_MAX_MS: z.coerce.number().int().positive().default(30_000)
});

export type AppEnv = z.infer<typeof envSchema> & { credentials: Credentials };

let cachedEnv: AppEnv | null = null;

const resolveCredentials = (value: z.infer<typeof envSchema>): Credentials => {
  if (value.BITBUCKET_USERNAME && value.BITBUCKET_APP_PASSWORD) {
    return {
      kind: 'basic',
      username: value.BITBUCKET_USERNAME,
      appPassword: value.BITBUCKET_APP_PASSWORD
    };
  }
  if (value.BITBUCKET_ACCESS_TOKEN) {
    return { kind: 'bearer', token: value.BITBUCKET_ACCESS_TOKEN };
  }
  throw new ValidationError(
    'Missing Bitbucket credentials: set BITBUCKET_USERNAME and BITBUCKET_APP_PASSWORD, or BITBUCKET_ACCESS_TOKEN'
  );
};

export const loadEnv = (options?: { path?: string }): AppEnv => {
  if (!cachedEnv) {
    config({ path: options?.path });
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const formatted = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new ValidationError(`Invalid environment configuration: ${formatted}`);
    }
    cachedEnv = { ...parsed.data, credentials: resolveCredentials(parsed.data) };
  }
  return cachedEnv;
};

export const resetEnvCacheForTesting = () => {
  cachedEnv = null;
};
