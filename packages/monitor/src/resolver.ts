import { z } from 'zod';
import { NotFoundError, ValidationError } from '@pipewatch/shared/errors';
import { createScopedLogger } from '@pipewatch/shared/logger';
import {
  formatRepository,
  type PipelineApi,
  type PipelineIdentifier,
  type RepositoryRef,
  type RequestOptions
} from '@pipewatch/shared/types';

const logger = createScopedLogger('resolver');

export interface ResolveCriteria {
  /** `workspace/slug` */
  repository?: string;
  uuid?: string;
  branch?: string;
}

const REPOSITORY_PATTERN = /^([\w.-]+)\/([\w.-]+)$/;
const uuidSchema = z.string().uuid();

export function parseRepository(value: string | undefined): RepositoryRef {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ValidationError('A repository is required, in the form workspace/slug');
  }
  const match = REPOSITORY_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`Malformed repository "${trimmed}": expected workspace/slug`);
  }
  return { workspace: match[1], slug: match[2] };
}

/** Accepts `{uuid}` or a bare uuid; returns Bitbucket's braced lower-case form. */
export function canonicalUuid(value: string): string {
  const bare = value.trim().replace(/^\{(.*)\}$/, '$1');
  if (!uuidSchema.safeParse(bare).success) {
    throw new ValidationError(`Malformed pipeline UUID "${value}"`);
  }
  return `{${bare.toLowerCase()}}`;
}

/**
 * Turns what the user asked for into a concrete pipeline identifier.
 */
export class PipelineResolver {
  constructor(private readonly api: PipelineApi) {}

  async resolve(criteria: ResolveCriteria, options: RequestOptions = {}): Promise<PipelineIdentifier> {
    const repository = parseRepository(criteria.repository);

    if (criteria.uuid !== undefined) {
      return { repository, uuid: canonicalUuid(criteria.uuid) };
    }

    const branch = criteria.branch?.trim();
    if (!branch) {
      throw new ValidationError('Either a pipeline UUID or a branch must be given');
    }

    const executions = await this.api.listPipelinesForBranch(repository, branch, options);
    const latest = executions.reduce<(typeof executions)[number] | undefined>(
      (newest, candidate) => (!newest || candidate.createdAt > newest.createdAt ? candidate : newest),
      undefined
    );

    if (!latest) {
      throw new NotFoundError(`No pipelines found for branch "${branch}" in ${formatRepository(repository)}`);
    }

    logger.info({ repository: formatRepository(repository), branch, uuid: latest.uuid, build: latest.buildNumber }, 'Resolved latest pipeline');
    return { repository, uuid: latest.uuid };
  }
}
