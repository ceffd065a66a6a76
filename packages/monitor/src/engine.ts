import { isRetryable, toPipewatchError, TransientError } from '@pipewatch/shared/errors';
import { createScopedLogger } from '@pipewatch/shared/logger';
import type { PipelineApi, PipelineIdentifier, PipelineSnapshot } from '@pipewatch/shared/types';
import { sleep as defaultSleep, type Sleep } from '@pipewatch/shared/utils';

import { computeDelay, DEFAULT_BACKOFF, type BackoffPolicy } from './backoff.js';
import { PipelineEventEmitter } from './events.js';
import type { ExitOutcome } from './outcome.js';
import type { PipelineRenderer } from './render/renderer.js';
import {
  createState,
  isTerminalStatus,
  recordFailure,
  recordPoll,
  transitionOf,
  type PipelineState,
  type PollFailure
} from './state.js';

const logger = createScopedLogger('engine');

/** Share of the poll interval a single fetch may take. */
const FETCH_DEADLINE_RATIO = 0.9;

export interface PollingEngineOptions {
  api: PipelineApi;
  sleep?: Sleep;
  clock?: () => Date;
  backoff?: BackoffPolicy;
  /** Upper bound for one snapshot fetch; clamped below a non-zero interval. */
  requestTimeoutMs?: number;
  events?: PipelineEventEmitter;
  random?: () => number;
}

type FetchAttempt = { ok: true; snapshot: PipelineSnapshot } | { ok: false; error: unknown };

export class PollingEngine {
  readonly events: PipelineEventEmitter;

  private readonly api: PipelineApi;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;
  private readonly backoff: BackoffPolicy;
  private readonly requestTimeoutMs: number;
  private readonly random: () => number;

  constructor(options: PollingEngineOptions) {
    this.api = options.api;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.events = options.events ?? new PipelineEventEmitter();
    this.random = options.random ?? Math.random;
  }

  /**
   * Poll `identifier` every `intervalSeconds` until it reaches a terminal
   * status, a fatal error occurs, or `signal` aborts. An interval of 0
   * fetches once and reports the status it saw.
   *
   * Fetch and sleep failures become outcomes; the promise rejects only
   * when the renderer itself throws.
   */
  async run(
    identifier: PipelineIdentifier,
    intervalSeconds: number,
    renderer: PipelineRenderer,
    signal?: AbortSignal
  ): Promise<ExitOutcome> {
    const intervalMs = intervalSeconds * 1000;
    const oneShot = intervalMs === 0;
    let state: PipelineState | null = null;
    let consecutiveFailures = 0;

    const finish = (outcome: ExitOutcome): ExitOutcome => {
      renderer.finish(state, outcome);
      this.events.emit('stopped', { identifier, outcome, pollCount: state?.pollCount ?? 0 });
      return outcome;
    };

    for (;;) {
      if (signal?.aborted) {
        return finish({ kind: 'cancelled' });
      }

      let delayMs = intervalMs;
      const attempt = await this.attempt(identifier, intervalMs, signal);

      if (attempt.ok) {
        const now = this.clock();
        const previous: PipelineState | null = state;
        const next: PipelineState = previous ? recordPoll(previous, attempt.snapshot, now) : createState(attempt.snapshot, now);
        state = next;
        consecutiveFailures = 0;

        const transition = previous ? transitionOf(previous, next) : null;
        if (transition) {
          logger.info({ uuid: identifier.uuid, ...transition }, 'Pipeline status changed');
          this.events.emit('transition', { identifier, transition, at: now });
        }

        const status = next.snapshot.status;
        if (isTerminalStatus(status)) {
          return finish({ kind: 'completed', status });
        }
        if (oneShot) {
          return finish({ kind: 'observed', status });
        }
        renderer.render(next);
      } else {
        if (signal?.aborted) {
          return finish({ kind: 'cancelled' });
        }

        const error = toPipewatchError(attempt.error);
        if (!isRetryable(error)) {
          logger.error({ uuid: identifier.uuid, code: error.code, err: error }, 'Monitoring stopped by a fatal error');
          return finish({ kind: 'failed', error });
        }

        consecutiveFailures += 1;
        if (oneShot || consecutiveFailures > this.backoff.maxRetries) {
          logger.error(
            { uuid: identifier.uuid, attempts: consecutiveFailures, err: error },
            oneShot ? 'Fetch failed' : 'Giving up after repeated failures'
          );
          return finish({ kind: 'failed', error });
        }

        delayMs = computeDelay(consecutiveFailures - 1, error, this.backoff, this.random);
        const failure: PollFailure = {
          code: error.code,
          message: error.message,
          attempt: consecutiveFailures,
          retryInMs: delayMs,
          at: this.clock()
        };
        logger.warn({ uuid: identifier.uuid, ...failure }, 'Poll failed, retrying');
        this.events.emit('pollFailed', { identifier, failure });
        if (state) {
          state = recordFailure(state, failure);
          renderer.render(state);
        }
      }

      try {
        await this.sleep(delayMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          return finish({ kind: 'cancelled' });
        }
        return finish({ kind: 'failed', error: toPipewatchError(error) });
      }
    }
  }

  /** Runs one fetch and keeps its failure as a value, apart from renderer errors. */
  private async attempt(
    identifier: PipelineIdentifier,
    intervalMs: number,
    signal?: AbortSignal
  ): Promise<FetchAttempt> {
    try {
      return { ok: true, snapshot: await this.fetch(identifier, intervalMs, signal) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  /**
   * One snapshot fetch under a deadline. Aborting `signal` cancels the
   * request; the deadline expiring turns into a transient error.
   */
  private async fetch(
    identifier: PipelineIdentifier,
    intervalMs: number,
    signal?: AbortSignal
  ): Promise<PipelineSnapshot> {
    const deadlineMs =
      intervalMs > 0
        ? Math.max(1, Math.min(this.requestTimeoutMs, Math.floor(intervalMs * FETCH_DEADLINE_RATIO)))
        : this.requestTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deadlineMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await this.api.getPipeline(identifier, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new TransientError(`Fetch did not complete within ${deadlineMs}ms`, undefined, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
