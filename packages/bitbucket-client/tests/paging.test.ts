/**
 * Tests for the page limit on paged collections
 */

import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import nock from 'nock';

const fakeLogger = vi.hoisted(() => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
  return logger;
});

vi.mock('@pipewatch/shared/logger', () => ({
  logger: fakeLogger,
  createScopedLogger: () => fakeLogger
}));

import { createClient } from '../src/index.js';

const baseUrl = 'https://bitbucket.test';
const repository = { workspace: 'acme', slug: 'web-app' };
const uuid = '{3f0c6a4e-8b1d-4c2a-9e7f-1a2b3c4d5e6f}';
const pipelinePath = `/repositories/acme/web-app/pipelines/${encodeURIComponent(uuid)}`;

const rawPipeline = {
  uuid,
  build_number: 42,
  state: { name: 'IN_PROGRESS' },
  target: { ref_name: 'main' },
  created_on: '2024-05-01T10:00:00Z'
};

const step = (name: string) => ({ name, state: { name: 'PENDING' } });

const stepsPage = (page: number) => `${baseUrl}${pipelinePath}/steps/?pagelen=100&page=${page}`;

describe('paged collections', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  beforeEach(() => {
    fakeLogger.warn.mockClear();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('stops at the page limit and warns that entries were dropped', async () => {
    const client = createClient({
      baseUrl,
      credentials: { kind: 'bearer', token: 'test-secret' },
      maxPages: 2
    });
    nock(baseUrl)
      .get(pipelinePath)
      .reply(200, rawPipeline)
      .get(`${pipelinePath}/steps/`)
      .query({ pagelen: '100' })
      .reply(200, { values: [step('Build')], next: stepsPage(2) })
      .get(`${pipelinePath}/steps/`)
      .query({ pagelen: '100', page: '2' })
      .reply(200, { values: [step('Test')], next: stepsPage(3) })
      .get(`${pipelinePath}/variables/`)
      .query(true)
      .reply(200, { values: [] });

    const snapshot = await client.getPipeline({ repository, uuid });

    expect(snapshot.steps.map((entry) => entry.name)).toEqual(['Build', 'Test']);
    expect(fakeLogger.warn).toHaveBeenCalledTimes(1);
    expect(fakeLogger.warn).toHaveBeenCalledWith(
      { resource: `Steps of pipeline ${uuid}`, pages: 2, kept: 2 },
      'Page limit reached, remaining entries dropped'
    );
    expect(nock.isDone()).toBe(true);
  });

  it('does not warn when the last page has no next link', async () => {
    const client = createClient({
      baseUrl,
      credentials: { kind: 'bearer', token: 'test-secret' },
      maxPages: 2
    });
    nock(baseUrl)
      .get(pipelinePath)
      .reply(200, rawPipeline)
      .get(`${pipelinePath}/steps/`)
      .query({ pagelen: '100' })
      .reply(200, { values: [step('Build')], next: stepsPage(2) })
      .get(`${pipelinePath}/steps/`)
      .query({ pagelen: '100', page: '2' })
      .reply(200, { values: [step('Test')] })
      .get(`${pipelinePath}/variables/`)
      .query(true)
      .reply(200, { values: [] });

    const snapshot = await client.getPipeline({ repository, uuid });

    expect(snapshot.steps).toHaveLength(2);
    expect(fakeLogger.warn).not.toHaveBeenCalled();
  });
});
