/**
 * HTTP transport for the Bitbucket REST API
 */

import axios, { type AxiosInstance } from 'axios';
import type { z } from 'zod';
import {
  ApiError,
  NotFoundError,
  RateLimitedError,
  TransientError,
  UnauthorizedError,
  toPipewatchError,
  type PipewatchError
} from '@pipewatch/shared/errors';
import { createScopedLogger } from '@pipewatch/shared/logger';
import type { Credentials } from '@pipewatch/shared/types';
import { BitbucketErrorSchema, type Config } from './types.js';

const logger = createScopedLogger('bitbucket-client');

const DEFAULT_RETRY_AFTER_MS = 60_000;

const authorizationHeader = (credentials: Credentials): string => {
  if (credentials.kind === 'basic') {
    const encoded = Buffer.from(`${credentials.username}:${credentials.appPassword}`).toString('base64');
    return `Basic ${encoded}`;
  }
  return `Bearer ${credentials.token}`;
};

/** Retry-After is either delta-seconds or an HTTP date. */
export const parseRetryAfter = (header: unknown, now: number = Date.now()): number => {
  if (typeof header !== 'string' || header.trim() === '') {
    return DEFAULT_RETRY_AFTER_MS;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }
  return DEFAULT_RETRY_AFTER_MS;
};

const describeBody = (data: unknown): string | undefined => {
  const parsed = BitbucketErrorSchema.safeParse(data);
  if (parsed.success && parsed.data.error) {
    return parsed.data.error.detail ?? parsed.data.error.message;
  }
  return undefined;
};

/**
 * Translate any failure from axios into the shared error taxonomy.
 * `resource` names what was requested, for NotFound messages.
 */
export const toApiError = (error: unknown, resource: string): PipewatchError => {
  // Anything that did not come out of axios is a bug, not a network problem.
  if (!axios.isAxiosError(error)) {
    return toPipewatchError(error);
  }

  if (error.code === 'ERR_CANCELED') {
    return new TransientError('Request aborted', undefined, { cause: error });
  }
  if (!error.response) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    const reason = timedOut ? 'Request timed out' : `Network error: ${error.message}`;
    return new TransientError(reason, undefined, { cause: error });
  }

  const { status, headers, data } = error.response;
  const detail = describeBody(data);

  if (status === 401 || status === 403) {
    return new UnauthorizedError(
      `Authentication failed (HTTP ${status})${detail ? `: ${detail}` : ''}`,
      status
    );
  }
  if (status === 404) {
    return new NotFoundError(`${resource} not found`, { cause: error });
  }
  if (status === 429) {
    return new RateLimitedError(parseRetryAfter(headers['retry-after']));
  }
  if (status >= 500) {
    return new TransientError(`Bitbucket returned HTTP ${status}${detail ? `: ${detail}` : ''}`, status, {
      cause: error
    });
  }
  return new ApiError(`Bitbucket returned HTTP ${status}${detail ? `: ${detail}` : ''}`, status, { cause: error });
};

export interface GetOptions {
  params?: Record<string, string | number>;
  signal?: AbortSignal;
  /** Used in NotFound messages. */
  resource: string;
}

export class HttpClient {
  private readonly client: AxiosInstance;

  constructor(private readonly config: Config) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: {
        Authorization: authorizationHeader(config.credentials),
        Accept: 'application/json',
        'User-Agent': 'pipewatch/0.1'
      }
    });

    this.client.interceptors.request.use((request) => {
      logger.debug({ method: request.method?.toUpperCase(), url: request.url, params: request.params }, 'Bitbucket API request');
      return request;
    });

    this.client.interceptors.response.use(
      (response) => {
        logger.debug({ status: response.status, url: response.config.url }, 'Bitbucket API response');
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          logger.warn(
            {
              status: error.response?.status,
              code: error.code,
              url: error.config?.url,
              message: error.message
            },
            'Bitbucket API error'
          );
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * GET a path and validate the JSON body against `schema`.
   */
  async get<S extends z.ZodTypeAny>(path: string, schema: S, options: GetOptions): Promise<z.output<S>> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(path, {
        params: options.params,
        signal: options.signal
      });
      data = response.data;
    } catch (error) {
      throw toApiError(error, options.resource);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new ApiError(`Unexpected response for ${options.resource}: ${issues}`);
    }
    return parsed.data;
  }

  /**
   * Follow `next` links of a paged collection, one request at a time.
   */
  async getAllPages<T>(
    path: string,
    schema: z.ZodType<{ values: T[]; next?: string }, z.ZodTypeDef, unknown>,
    options: GetOptions
  ): Promise<T[]> {
    const values: T[] = [];
    let url: string | undefined = path;
    let params: Record<string, string | number> | undefined = {
      pagelen: this.config.pageLength,
      ...options.params
    };

    for (let page = 0; url && page < this.config.maxPages; page++) {
      const body: { values: T[]; next?: string } = await this.get(url, schema, { ...options, params });
      values.push(...body.values);
      url = body.next;
      // `next` already carries the query string.
      params = undefined;
    }

    if (url) {
      logger.warn(
        { resource: options.resource, pages: this.config.maxPages, kept: values.length },
        'Page limit reached, remaining entries dropped'
      );
    }
    return values;
  }
}
