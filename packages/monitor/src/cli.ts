import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { AppEnv } from '@pipewatch/shared/env';
import { PipewatchError, toPipewatchError } from '@pipewatch/shared/errors';
import { createScopedLogger } from '@pipewatch/shared/logger';
import type { PipelineApi, PipelineIdentifier } from '@pipewatch/shared/types';
import type { Sleep } from '@pipewatch/shared/utils';

import { PollingEngine } from './engine.js';
import { EXIT_CANCELLED, EXIT_MONITOR_ERROR, EXIT_SUCCESS, exitCodeFor } from './outcome.js';
import { supportsColor } from './render/colors.js';
import { PlainRenderer } from './render/plain.js';
import type { PipelineRenderer } from './render/renderer.js';
import { TerminalRenderer, type OutputStream } from './render/terminal.js';
import { PipelineResolver } from './resolver.js';

const logger = createScopedLogger('cli');

export interface MonitorCommandOptions {
  repo?: string;
  pipelineUuid?: string;
  branch?: string;
  refresh?: number;
  color: boolean;
}

export interface CliDependencies {
  loadEnv: () => AppEnv;
  createApi: (env: AppEnv) => PipelineApi;
  stdout: OutputStream;
  stderr: OutputStream;
  /** Aborted on SIGINT/SIGTERM. */
  signal?: AbortSignal;
  sleep?: Sleep;
  clock?: () => Date;
  random?: () => number;
  setExitCode: (code: number) => void;
}

interface MonitorTarget {
  env: AppEnv;
  api: PipelineApi;
  identifier: PipelineIdentifier;
}

/** Whole seconds; 0 means fetch once and exit. */
export const parseRefreshSeconds = (value: string): number => {
  const seconds = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(seconds)) {
    throw new InvalidArgumentError('Refresh interval must be a whole number of seconds (0 to show once).');
  }
  return seconds;
};

async function prepare(options: MonitorCommandOptions, deps: CliDependencies): Promise<MonitorTarget> {
  const env = deps.loadEnv();
  const api = deps.createApi(env);
  const identifier = await new PipelineResolver(api).resolve(
    { repository: options.repo, uuid: options.pipelineUuid, branch: options.branch },
    { signal: deps.signal }
  );
  return { env, api, identifier };
}

/**
 * Resolve the pipeline, then watch it until it ends. Returns the exit
 * code. Resolution problems are reported before anything is rendered.
 */
export async function runMonitor(options: MonitorCommandOptions, deps: CliDependencies): Promise<number> {
  const target = await prepare(options, deps).catch((error: unknown) => toPipewatchError(error));

  if (target instanceof PipewatchError) {
    if (deps.signal?.aborted) {
      return EXIT_CANCELLED;
    }
    logger.error({ code: target.code, err: target }, 'Could not resolve the pipeline to monitor');
    deps.stderr.write(`Error: ${target.message}\n`);
    return EXIT_MONITOR_ERROR;
  }

  const { env, api, identifier } = target;
  const renderer: PipelineRenderer = deps.stdout.isTTY
    ? new TerminalRenderer(deps.stdout, { color: options.color && supportsColor(deps.stdout) })
    : new PlainRenderer(deps.stdout);

  const engine = new PollingEngine({
    api,
    sleep: deps.sleep,
    clock: deps.clock,
    random: deps.random,
    requestTimeoutMs: env.PIPEWATCH_REQUEST_TIMEOUT_MS,
    backoff: {
      maxRetries: env.PIPEWATCH_MAX_RETRIES,
      baseDelayMs: env.PIPEWATCH_RETRY_BASE_MS,
      maxDelayMs: env.PIPEWATCH_RETRY_MAX_MS,
      jitter: true
    }
  });

  const outcome = await engine.run(identifier, options.refresh ?? env.PIPEWATCH_REFRESH_SECONDS, renderer, deps.signal);
  return exitCodeFor(outcome);
}

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('pipewatch')
    .description('Watch a Bitbucket Pipelines run from the terminal')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text)
    });

  program
    .command('monitor')
    .description('Poll one pipeline and show its progress until it finishes')
    .requiredOption('-r, --repo <workspace/slug>', 'Repository that owns the pipeline')
    .option('-p, --pipeline-uuid <uuid>', 'Pipeline to watch (takes precedence over --branch)')
    .option('-b, --branch <name>', 'Watch the most recent pipeline of this branch')
    .option(
      '-f, --refresh <seconds>',
      'Seconds between polls, 0 to show the pipeline once (default: PIPEWATCH_REFRESH_SECONDS)',
      parseRefreshSeconds
    )
    .option('--no-color', 'Disable ANSI colours')
    .action(async (options: MonitorCommandOptions) => {
      deps.setExitCode(await runMonitor(options, deps));
    });

  return program;
}

/** Parse `argv` (without the node and script entries) and run it. */
export async function main(argv: readonly string[], deps: CliDependencies): Promise<void> {
  try {
    await createProgram(deps).parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and --version exit with 0, usage errors with 1
      deps.setExitCode(error.exitCode === 0 ? EXIT_SUCCESS : EXIT_MONITOR_ERROR);
      return;
    }
    throw error;
  }
}
