/**
 * Bitbucket Pipelines client main module
 */

import type { AppEnv } from '@pipewatch/shared/env';
import { createScopedLogger } from '@pipewatch/shared/logger';
import {
  formatRepository,
  type PipelineApi,
  type PipelineIdentifier,
  type PipelineSnapshot,
  type RepositoryRef,
  type RequestOptions
} from '@pipewatch/shared/types';
import { configFromEnv, createConfig } from './config.js';
import { HttpClient } from './http.js';
import { mapPipeline } from './mapper.js';
import {
  RawPipelineSchema,
  RawStepSchema,
  RawVariableSchema,
  type Config,
  type ConfigInput,
  pageOf,
  type RawStep,
  type RawVariable
} from './types.js';

const logger = createScopedLogger('bitbucket-client');

const pipelinesPath = (repository: RepositoryRef): string =>
  `/repositories/${encodeURIComponent(repository.workspace)}/${encodeURIComponent(repository.slug)}/pipelines`;

/**
 * Read-only client for Bitbucket Pipelines.
 */
export class BitbucketClient implements PipelineApi {
  private readonly http: HttpClient;

  constructor(config: Config) {
    this.http = new HttpClient(config);
    logger.debug({ baseUrl: config.baseUrl, auth: config.credentials.kind }, 'Bitbucket client initialized');
  }

  /**
   * Fetch a pipeline together with its steps and variables.
   * The three requests are issued one after another.
   */
  async getPipeline(identifier: PipelineIdentifier, options: RequestOptions = {}): Promise<PipelineSnapshot> {
    const repo = formatRepository(identifier.repository);
    const base = `${pipelinesPath(identifier.repository)}/${encodeURIComponent(identifier.uuid)}`;

    const pipeline = await this.http.get(base, RawPipelineSchema, {
      signal: options.signal,
      resource: `Pipeline ${identifier.uuid} in ${repo}`
    });
    const steps = await this.http.getAllPages<RawStep>(`${base}/steps/`, pageOf(RawStepSchema), {
      signal: options.signal,
      resource: `Steps of pipeline ${identifier.uuid}`
    });
    const variables = await this.http.getAllPages<RawVariable>(`${base}/variables/`, pageOf(RawVariableSchema), {
      signal: options.signal,
      resource: `Variables of pipeline ${identifier.uuid}`
    });

    return mapPipeline(pipeline, steps, variables);
  }

  /**
   * Most recent executions on `branch`, newest first. Steps and
   * variables are not fetched.
   */
  async listPipelinesForBranch(
    repository: RepositoryRef,
    branch: string,
    options: RequestOptions = {}
  ): Promise<PipelineSnapshot[]> {
    const body = await this.http.get(`${pipelinesPath(repository)}/`, pageOf(RawPipelineSchema), {
      params: { sort: '-created_on', 'target.ref_name': branch, pagelen: 10 },
      signal: options.signal,
      resource: `Repository ${formatRepository(repository)}`
    });
    return body.values.map((pipeline) => mapPipeline(pipeline));
  }
}

export function createClient(config: ConfigInput): BitbucketClient {
  return new BitbucketClient(createConfig(config));
}

export function createClientFromEnv(env?: AppEnv): BitbucketClient {
  return new BitbucketClient(configFromEnv(env));
}

export { HttpClient, parseRetryAfter, toApiError } from './http.js';
export { mapPipeline, normalizeStatus, normalizeStepStatus, SECURED_MASK } from './mapper.js';
export * from './config.js';
export * from './types.js';
