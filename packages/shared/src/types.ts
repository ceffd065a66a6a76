export const PIPELINE_STATUSES = [
  'PENDING',
  'IN_PROGRESS',
  'SUCCESSFUL',
  'FAILED',
  'STOPPED',
  'ERROR'
] as const;

export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

/** Steps can also be skipped when an earlier step fails or a condition excludes them. */
export type StepStatus = PipelineStatus | 'SKIPPED';

export type TerminalStatus = Extract<PipelineStatus, 'SUCCESSFUL' | 'FAILED' | 'STOPPED' | 'ERROR'>;

export interface RepositoryRef {
  readonly workspace: string;
  readonly slug: string;
}

export interface PipelineIdentifier {
  readonly repository: RepositoryRef;
  /** Braced, lower-case UUID as Bitbucket prints it. */
  readonly uuid: string;
}

export interface PipelineVariable {
  readonly key: string;
  readonly value: string;
  readonly secured: boolean;
}

export interface StepSummary {
  readonly name: string;
  readonly status: StepStatus;
  readonly durationSeconds?: number;
}

export interface PipelineTrigger {
  /** Selector type: default, custom, branches, tags, pull-requests... */
  readonly type: string;
  readonly name: string;
}

export interface PipelineSnapshot {
  readonly uuid: string;
  readonly buildNumber: number;
  readonly repository: string;
  readonly status: PipelineStatus;
  readonly branch: string;
  /** Abbreviated to eight characters. */
  readonly commit: string;
  /** Empty when Bitbucket did not expand the commit. */
  readonly commitMessage: string;
  readonly commitAuthor: string;
  readonly commitDate?: Date;
  readonly trigger: PipelineTrigger;
  readonly variables: ReadonlyArray<PipelineVariable>;
  readonly createdAt: Date;
  readonly startedAt?: Date;
  readonly completedAt?: Date;
  readonly steps: ReadonlyArray<StepSummary>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Read contract of the CI service. The polling core depends on this
 * interface only, never on the transport behind it.
 */
export interface PipelineApi {
  getPipeline(identifier: PipelineIdentifier, options?: RequestOptions): Promise<PipelineSnapshot>;
  /** Executions on a branch, most recent first. */
  listPipelinesForBranch(
    repository: RepositoryRef,
    branch: string,
    options?: RequestOptions
  ): Promise<PipelineSnapshot[]>;
}

export type Credentials =
  | { kind: 'basic'; username: string; appPassword: string }
  | { kind: 'bearer'; token: string };

export const formatRepository = (repository: RepositoryRef): string =>
  `${repository.workspace}/${repository.slug}`;
