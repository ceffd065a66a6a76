import { describe, expect, it } from 'vitest';

import { mapPipeline, mapStep, normalizeStatus, normalizeStepStatus } from '../mapper.js';
import { parseRetryAfter } from '../http.js';
import type { RawPipeline } from '../types.js';

const pending: RawPipeline = {
  uuid: '{9d1f7c4a-1111-4222-8333-444455556666}',
  build_number: 7,
  state: { name: 'PENDING' },
  target: { ref_name: 'feature/login' },
  created_on: '2024-05-01T09:00:00Z'
};

describe('normalizeStatus', () => {
  it.each([
    [{ name: 'PENDING' }, 'PENDING'],
    [{ name: 'PARSING' }, 'PENDING'],
    [{ name: 'READY' }, 'PENDING'],
    [{ name: 'IN_PROGRESS', stage: { name: 'PAUSED' } }, 'IN_PROGRESS'],
    [{ name: 'RUNNING' }, 'IN_PROGRESS'],
    [{ name: 'PAUSED' }, 'IN_PROGRESS'],
    [{ name: 'HALTED' }, 'IN_PROGRESS'],
    [{ name: 'COMPLETED', result: { name: 'SUCCESSFUL' } }, 'SUCCESSFUL'],
    [{ name: 'COMPLETED', result: { name: 'FAILED' } }, 'FAILED'],
    [{ name: 'COMPLETED', result: { name: 'STOPPED' } }, 'STOPPED'],
    [{ name: 'COMPLETED', result: { name: 'EXPIRED' } }, 'ERROR'],
    [{ name: 'COMPLETED' }, 'ERROR'],
    [{ name: 'SUCCESSFUL' }, 'SUCCESSFUL'],
    [{ name: 'EXPIRED' }, 'ERROR'],
    [{ name: 'SOMETHING_NEW' }, 'IN_PROGRESS']
  ])('maps %j to %s', (state, expected) => {
    expect(normalizeStatus(state)).toBe(expected);
  });
});

describe('normalizeStepStatus', () => {
  it.each([
    [{ name: 'COMPLETED', result: { name: 'NOT_RUN' } }, 'SKIPPED'],
    [{ name: 'NOT_RUN' }, 'SKIPPED'],
    [{ name: 'COMPLETED', result: { name: 'FAILED' } }, 'FAILED'],
    [{ name: 'READY' }, 'PENDING'],
    [{ name: 'HALTED' }, 'IN_PROGRESS']
  ])('maps %j to %s', (state, expected) => {
    expect(normalizeStepStatus(state)).toBe(expected);
  });
});

describe('mapPipeline', () => {
  it('leaves startedAt empty while the pipeline is pending', () => {
    const snapshot = mapPipeline(pending);

    expect(snapshot.startedAt).toBeUndefined();
    expect(snapshot.completedAt).toBeUndefined();
    expect(snapshot.trigger).toEqual({ type: 'default', name: 'default' });
    expect(snapshot.commit).toBe('');
    expect(snapshot.commitMessage).toBe('');
    expect(snapshot.commitAuthor).toBe('');
    expect(snapshot.commitDate).toBeUndefined();
    expect(snapshot.repository).toBe('');
  });

  it('falls back to the raw author when the commit has no linked user', () => {
    const snapshot = mapPipeline({
      ...pending,
      target: {
        ref_name: 'main',
        commit: { hash: '0123456789abcdef', author: { raw: 'CI Bot <ci@example.com>' } }
      }
    });

    expect(snapshot.commit).toBe('01234567');
    expect(snapshot.commitAuthor).toBe('CI Bot <ci@example.com>');
    expect(snapshot.commitMessage).toBe('');
  });

  it('keeps watching a pipeline paused for a manual step', () => {
    const snapshot = mapPipeline(
      { ...pending, state: { name: 'IN_PROGRESS', stage: { name: 'PAUSED' } } },
      [{ name: 'Deploy', state: { name: 'READY' } }]
    );

    expect(snapshot.status).toBe('IN_PROGRESS');
    expect(snapshot.steps).toEqual([{ name: 'Deploy', status: 'PENDING' }]);
  });

  it('uses created_on as start once the pipeline has left pending without steps', () => {
    const snapshot = mapPipeline({
      ...pending,
      state: { name: 'COMPLETED', result: { name: 'ERROR' } },
      completed_on: '2024-05-01T09:00:30Z'
    });

    expect(snapshot.status).toBe('ERROR');
    expect(snapshot.startedAt).toEqual(new Date('2024-05-01T09:00:00Z'));
    expect(snapshot.completedAt).toEqual(new Date('2024-05-01T09:00:30Z'));
  });
});

describe('mapStep', () => {
  it('derives the duration from timestamps when Bitbucket omits it', () => {
    expect(
      mapStep({
        name: 'Test',
        state: { name: 'COMPLETED', result: { name: 'FAILED' } },
        started_on: '2024-05-01T09:01:00Z',
        completed_on: '2024-05-01T09:03:05Z'
      })
    ).toEqual({ name: 'Test', status: 'FAILED', durationSeconds: 125 });
  });

  it('shows a step that never ran as skipped', () => {
    expect(mapStep({ name: 'Deploy', state: { name: 'COMPLETED', result: { name: 'NOT_RUN' } } })).toEqual({
      name: 'Deploy',
      status: 'SKIPPED'
    });
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('30')).toBe(30_000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('2024-05-01T09:00:00Z');

    expect(parseRetryAfter('Wed, 01 May 2024 09:00:12 GMT', now)).toBe(12_000);
  });

  it('falls back to a minute', () => {
    expect(parseRetryAfter(undefined)).toBe(60_000);
    expect(parseRetryAfter('soon')).toBe(60_000);
  });
});
