import { describe, expect, it } from 'vitest';

import {
  createState,
  merge,
  recordFailure,
  recordPoll,
  transitionOf,
  type PollFailure
} from '../src/state.js';
import { at, makeSnapshot } from './helpers.js';

const failure: PollFailure = {
  code: 'TRANSIENT',
  message: 'Network error: ECONNRESET',
  attempt: 1,
  retryInMs: 1_000,
  at: at('10:01:00')
};

describe('createState', () => {
  it('starts from the first snapshot', () => {
    const state = createState(makeSnapshot(), at('10:01:05'));

    expect(state.pollCount).toBe(1);
    expect(state.elapsedSeconds).toBe(60);
    expect(state.previousStatus).toBeNull();
    expect(state.lastTransition).toBeNull();
    expect(state.terminal).toBe(false);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it('measures from the first sighting until the run has started', () => {
    const state = createState(makeSnapshot({ status: 'PENDING', startedAt: undefined }), at('10:00:30'));

    expect(state.elapsedSeconds).toBe(0);
    expect(state.firstSeenAt).toEqual(at('10:00:30'));
  });
});

describe('merge', () => {
  it('is idempotent on an unchanged snapshot', () => {
    const state = createState(makeSnapshot(), at('10:01:00'));

    expect(merge(state, state.snapshot)).toBe(state);
    expect(merge(state, { ...state.snapshot })).toEqual(state);
  });

  it('detects a status transition', () => {
    const pending = createState(makeSnapshot({ status: 'PENDING' }), at('10:00:00'));
    const running = merge(pending, makeSnapshot({ status: 'IN_PROGRESS' }));

    expect(running.previousStatus).toBe('PENDING');
    expect(running.lastTransition).toEqual({ from: 'PENDING', to: 'IN_PROGRESS' });
    expect(running.transitionCount).toBe(1);
    expect(transitionOf(pending, running)).toEqual({ from: 'PENDING', to: 'IN_PROGRESS' });

    const stillRunning = merge(running, makeSnapshot({ status: 'IN_PROGRESS', steps: [{ name: 'Build', status: 'IN_PROGRESS' }] }));
    expect(transitionOf(running, stillRunning)).toBeNull();
    expect(stillRunning.previousStatus).toBe('PENDING');
    expect(stillRunning.snapshot.steps).toEqual([{ name: 'Build', status: 'IN_PROGRESS' }]);
  });

  it('locks a terminal state', () => {
    const done = createState(makeSnapshot({ status: 'SUCCESSFUL', completedAt: at('10:02:00') }), at('10:02:01'));

    expect(done.terminal).toBe(true);
    expect(merge(done, makeSnapshot({ status: 'FAILED' }))).toBe(done);
    expect(recordPoll(done, makeSnapshot({ status: 'IN_PROGRESS' }), at('10:03:00'))).toBe(done);
    expect(recordFailure(done, failure)).toBe(done);
  });
});

describe('recordPoll', () => {
  it('counts the poll and clears the recorded error', () => {
    const failed = recordFailure(createState(makeSnapshot(), at('10:00:30')), failure);
    const next = recordPoll(failed, makeSnapshot(), at('10:01:05'));

    expect(failed.lastError).toEqual(failure);
    expect(failed.snapshot.status).toBe('IN_PROGRESS');
    expect(next.lastError).toBeNull();
    expect(next.pollCount).toBe(2);
    expect(next.lastPolledAt).toEqual(at('10:01:05'));
    expect(next.elapsedSeconds).toBe(60);
  });

  it('never lets the duration go backwards', () => {
    const first = createState(makeSnapshot(), at('10:02:05'));
    const revised = recordPoll(first, makeSnapshot({ startedAt: at('10:01:05') }), at('10:02:10'));

    expect(first.elapsedSeconds).toBe(120);
    expect(revised.elapsedSeconds).toBe(120);
  });

  it('stops the clock at completion', () => {
    const first = createState(makeSnapshot(), at('10:01:00'));
    const done = recordPoll(first, makeSnapshot({ status: 'FAILED', completedAt: at('10:01:35') }), at('10:02:00'));

    expect(done.elapsedSeconds).toBe(90);
    expect(done.terminal).toBe(true);
  });
});
