/**
 * Pipeline state model.
 *
 * Everything here is pure: the engine owns the only reference to the
 * current state and replaces it with the value these functions return.
 * States are frozen so renderers cannot mutate them.
 */

import type { ErrorCode } from '@pipewatch/shared/errors';
import type { PipelineSnapshot, PipelineStatus, TerminalStatus } from '@pipewatch/shared/types';

export interface StatusTransition {
  readonly from: PipelineStatus;
  readonly to: PipelineStatus;
}

export interface PollFailure {
  readonly code: ErrorCode;
  readonly message: string;
  /** Consecutive failed fetches, including this one. */
  readonly attempt: number;
  readonly retryInMs: number;
  readonly at: Date;
}

export interface PipelineState {
  readonly snapshot: PipelineSnapshot;
  /** Status held before the most recent transition. */
  readonly previousStatus: PipelineStatus | null;
  readonly lastTransition: StatusTransition | null;
  readonly transitionCount: number;
  readonly firstSeenAt: Date;
  readonly pollCount: number;
  readonly lastPolledAt: Date;
  readonly elapsedSeconds: number;
  readonly lastError: PollFailure | null;
  readonly terminal: boolean;
}

const TERMINAL: ReadonlySet<PipelineStatus> = new Set<PipelineStatus>(['SUCCESSFUL', 'FAILED', 'STOPPED', 'ERROR']);

export const isTerminalStatus = (status: PipelineStatus): status is TerminalStatus => TERMINAL.has(status);

/**
 * Seconds between the start of the run and its end (or `now`).
 * Falls back to the client-side first sighting when the service has
 * not reported a start yet.
 */
export const elapsedSecondsAt = (snapshot: PipelineSnapshot, firstSeenAt: Date, now: Date): number => {
  const start = snapshot.startedAt ?? firstSeenAt;
  const end = snapshot.completedAt ?? now;
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 1000));
};

export const createState = (snapshot: PipelineSnapshot, now: Date): PipelineState =>
  Object.freeze({
    snapshot,
    previousStatus: null,
    lastTransition: null,
    transitionCount: 0,
    firstSeenAt: now,
    pollCount: 1,
    lastPolledAt: now,
    elapsedSeconds: elapsedSecondsAt(snapshot, now, now),
    lastError: null,
    terminal: isTerminalStatus(snapshot.status)
  });

/**
 * Fold a new snapshot into the state. Step summaries and variables are
 * replaced wholesale. A terminal state is returned unchanged.
 */
export const merge = (previous: PipelineState, snapshot: PipelineSnapshot): PipelineState => {
  if (previous.terminal) {
    return previous;
  }

  const from = previous.snapshot.status;
  const changed = snapshot.status !== from;
  if (!changed && snapshot === previous.snapshot) {
    return previous;
  }

  return Object.freeze({
    ...previous,
    snapshot,
    ...(changed && {
      previousStatus: from,
      lastTransition: { from, to: snapshot.status },
      transitionCount: previous.transitionCount + 1
    }),
    terminal: isTerminalStatus(snapshot.status)
  });
};

/** The transition `next` introduced over `previous`, if any. */
export const transitionOf = (previous: PipelineState, next: PipelineState): StatusTransition | null =>
  next.transitionCount > previous.transitionCount ? next.lastTransition : null;

/**
 * A successful poll: merge, count it, clear any recorded error and
 * advance the duration. The duration never moves backwards.
 */
export const recordPoll = (previous: PipelineState, snapshot: PipelineSnapshot, now: Date): PipelineState => {
  if (previous.terminal) {
    return previous;
  }
  const merged = merge(previous, snapshot);
  return Object.freeze({
    ...merged,
    pollCount: previous.pollCount + 1,
    lastPolledAt: now,
    elapsedSeconds: Math.max(previous.elapsedSeconds, elapsedSecondsAt(snapshot, previous.firstSeenAt, now)),
    lastError: null
  });
};

/** A failed poll: keep the last known status, remember the error. */
export const recordFailure = (previous: PipelineState, failure: PollFailure): PipelineState => {
  if (previous.terminal) {
    return previous;
  }
  return Object.freeze({ ...previous, lastError: failure });
};
