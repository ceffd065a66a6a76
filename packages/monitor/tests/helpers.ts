import type {
  PipelineApi,
  PipelineIdentifier,
  PipelineSnapshot,
  RepositoryRef,
  RequestOptions
} from '@pipewatch/shared/types';
import type { Sleep } from '@pipewatch/shared/utils';

import type { ExitOutcome } from '../src/outcome.js';
import type { PipelineRenderer } from '../src/render/renderer.js';
import type { OutputStream } from '../src/render/terminal.js';
import type { PipelineState } from '../src/state.js';

export const PIPELINE_UUID = '{3f0c6a4e-8b1d-4c2a-9e7f-1a2b3c4d5e6f}';

export const identifier: PipelineIdentifier = {
  repository: { workspace: 'acme', slug: 'web-app' },
  uuid: PIPELINE_UUID
};

export const at = (time: string): Date => new Date(`2024-05-01T${time}Z`);

export function makeSnapshot(overrides: Partial<PipelineSnapshot> = {}): PipelineSnapshot {
  return {
    uuid: PIPELINE_UUID,
    buildNumber: 42,
    repository: 'acme/web-app',
    status: 'IN_PROGRESS',
    branch: 'main',
    commit: 'a1b2c3d4',
    commitMessage: '',
    commitAuthor: '',
    trigger: { type: 'default', name: 'default' },
    variables: [],
    createdAt: at('10:00:00'),
    startedAt: at('10:00:05'),
    steps: [],
    ...overrides
  };
}

/**
 * Answers `getPipeline` from a script: snapshots are returned, errors
 * are thrown, in order.
 */
export class ScriptedApi implements PipelineApi {
  readonly requests: RequestOptions[] = [];
  readonly branchQueries: Array<{ repository: RepositoryRef; branch: string }> = [];

  constructor(
    private readonly script: Array<PipelineSnapshot | Error>,
    private readonly branchPipelines: PipelineSnapshot[] = []
  ) {}

  async getPipeline(_identifier: PipelineIdentifier, options: RequestOptions = {}): Promise<PipelineSnapshot> {
    this.requests.push(options);
    const next = this.script.shift();
    if (!next) {
      throw new Error('script exhausted');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async listPipelinesForBranch(repository: RepositoryRef, branch: string): Promise<PipelineSnapshot[]> {
    this.branchQueries.push({ repository, branch });
    return this.branchPipelines;
  }
}

/** A clock that only moves when the engine sleeps. */
export class FakeTime {
  readonly delays: number[] = [];
  private current: Date;

  constructor(
    start: Date,
    private readonly onSleep?: (count: number) => void
  ) {
    this.current = start;
  }

  readonly clock = (): Date => new Date(this.current.getTime());

  readonly sleep: Sleep = async (ms, signal) => {
    this.delays.push(ms);
    this.current = new Date(this.current.getTime() + ms);
    this.onSleep?.(this.delays.length);
    if (signal?.aborted) {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      throw error;
    }
  };
}

export class RecordingRenderer implements PipelineRenderer {
  readonly rendered: PipelineState[] = [];
  readonly finished: Array<{ state: PipelineState | null; outcome: ExitOutcome }> = [];

  render(state: PipelineState): void {
    this.rendered.push(state);
  }

  finish(state: PipelineState | null, outcome: ExitOutcome): void {
    this.finished.push({ state, outcome });
  }
}

export class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];

  constructor(readonly isTTY = false) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}
