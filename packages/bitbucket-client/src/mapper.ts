import type {
  PipelineSnapshot,
  PipelineStatus,
  PipelineVariable,
  StepStatus,
  StepSummary
} from '@pipewatch/shared/types';
import type { RawPipeline, RawState, RawStep, RawVariable } from './types.js';

export const SECURED_MASK = '********';

const COMPLETED_RESULTS: Record<string, PipelineStatus> = {
  SUCCESSFUL: 'SUCCESSFUL',
  FAILED: 'FAILED',
  STOPPED: 'STOPPED',
  ERROR: 'ERROR'
};

/**
 * Collapse Bitbucket's state/result pair into a single lifecycle status.
 *
 * Only a COMPLETED state (or a bare result name) is terminal; an expired
 * or unrecognised result then counts as ERROR. Any other state name,
 * including ones Bitbucket adds later, keeps the pipeline in progress so
 * the watcher does not stop early.
 */
export const normalizeStatus = (state: RawState): PipelineStatus => {
  switch (state.name) {
    case 'PENDING':
    case 'PARSING':
    case 'READY':
      return 'PENDING';
    case 'IN_PROGRESS':
    case 'RUNNING':
    case 'PAUSED':
    case 'HALTED':
      return 'IN_PROGRESS';
    case 'COMPLETED':
      return COMPLETED_RESULTS[state.result?.name ?? ''] ?? 'ERROR';
    case 'EXPIRED':
      return 'ERROR';
    default:
      return COMPLETED_RESULTS[state.name] ?? 'IN_PROGRESS';
  }
};

const SKIPPED_RESULTS = new Set(['NOT_RUN', 'SKIPPED']);

/** Steps that never ran complete with NOT_RUN; those are shown as skipped. */
export const normalizeStepStatus = (state: RawState): StepStatus => {
  const result = state.result?.name ?? (state.name === 'NOT_RUN' ? state.name : undefined);
  if (result && SKIPPED_RESULTS.has(result)) {
    return 'SKIPPED';
  }
  return normalizeStatus(state);
};

const toDate = (value: string | null | undefined): Date | undefined =>
  value ? new Date(value) : undefined;

const stepDuration = (step: RawStep): number | undefined => {
  if (step.duration_in_seconds !== null && step.duration_in_seconds !== undefined) {
    return Math.round(step.duration_in_seconds);
  }
  const started = toDate(step.started_on);
  const completed = toDate(step.completed_on);
  if (started && completed) {
    return Math.max(0, Math.round((completed.getTime() - started.getTime()) / 1000));
  }
  return undefined;
};

export const mapStep = (step: RawStep): StepSummary => {
  const durationSeconds = stepDuration(step);
  return {
    name: step.name,
    status: normalizeStepStatus(step.state),
    ...(durationSeconds !== undefined && { durationSeconds })
  };
};

export const mapVariable = (variable: RawVariable): PipelineVariable => ({
  key: variable.key,
  value: variable.secured ? SECURED_MASK : variable.value ?? '',
  secured: variable.secured
});

const earliestStepStart = (steps: RawStep[]): Date | undefined =>
  steps
    .map((step) => toDate(step.started_on))
    .filter((date): date is Date => date !== undefined)
    .reduce<Date | undefined>((earliest, date) => (!earliest || date < earliest ? date : earliest), undefined);

export const mapPipeline = (
  pipeline: RawPipeline,
  steps: RawStep[] = [],
  variables: RawVariable[] = []
): PipelineSnapshot => {
  const status = normalizeStatus(pipeline.state);
  const createdAt = new Date(pipeline.created_on);
  const startedAt = earliestStepStart(steps) ?? (status === 'PENDING' ? undefined : createdAt);
  const completedAt = toDate(pipeline.completed_on);
  const selector = pipeline.target.selector;
  const commit = pipeline.target.commit;
  const author = commit?.author;
  const commitDate = toDate(commit?.date);

  return {
    uuid: pipeline.uuid,
    buildNumber: pipeline.build_number,
    repository: pipeline.repository?.full_name ?? '',
    status,
    branch: pipeline.target.ref_name ?? '',
    commit: (commit?.hash ?? '').slice(0, 8),
    commitMessage: commit?.message?.trim() ?? '',
    commitAuthor: author?.user?.display_name ?? author?.display_name ?? author?.raw ?? '',
    ...(commitDate && { commitDate }),
    trigger: {
      type: selector?.type ?? 'default',
      name: selector?.pattern ?? 'default'
    },
    variables: variables.map(mapVariable),
    createdAt,
    ...(startedAt && { startedAt }),
    ...(completedAt && { completedAt }),
    steps: steps.map(mapStep)
  };
};
