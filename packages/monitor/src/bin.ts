#!/usr/bin/env node

import { createClientFromEnv } from '@pipewatch/bitbucket-client';
import { loadEnv } from '@pipewatch/shared/env';
import { logger } from '@pipewatch/shared/logger';

import { main } from './cli.js';

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info({ signal }, 'Interrupted, stopping');
    controller.abort();
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  process.exitCode = 2;
});

try {
  await main(process.argv.slice(2), {
    loadEnv: () => loadEnv(),
    createApi: (env) => createClientFromEnv(env),
    stdout: process.stdout,
    stderr: process.stderr,
    signal: controller.signal,
    setExitCode: (code) => {
      process.exitCode = code;
    }
  });
} catch (error) {
  logger.error({ err: error }, 'pipewatch crashed');
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 2;
}
