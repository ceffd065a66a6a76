import type { PipelineSnapshot, PipelineTrigger, StepStatus } from '@pipewatch/shared/types';

import { describeOutcome, type ExitOutcome } from '../outcome.js';
import type { PipelineState } from '../state.js';
import { BOLD, createPaint, DIM, RED, statusColor, YELLOW } from './colors.js';
import { formatClock, formatDuration, formatRetryDelay, formatTimestamp } from './format.js';

export interface FrameOptions {
  color: boolean;
}

const LABEL_WIDTH = 12;

const GLYPHS: Record<StepStatus, string> = {
  PENDING: '○',
  IN_PROGRESS: '●',
  SUCCESSFUL: '✔',
  FAILED: '✖',
  ERROR: '✖',
  STOPPED: '■',
  SKIPPED: '–'
};

/** Author, message and date lines, each only when Bitbucket sent it. */
const commitDetails = (snapshot: PipelineSnapshot): Array<[string, string]> => {
  const details: Array<[string, string]> = [];
  if (snapshot.commitAuthor) details.push(['Author', snapshot.commitAuthor]);
  const subject = snapshot.commitMessage.split('\n')[0].trim();
  if (subject) details.push(['Message', subject]);
  if (snapshot.commitDate) details.push(['Committed', formatTimestamp(snapshot.commitDate)]);
  return details;
};

export const describeTrigger = (trigger: PipelineTrigger): string =>
  trigger.type === 'default' ? 'default' : `${trigger.type}: ${trigger.name}`;

/**
 * The full-screen view of a state, one string per line, without
 * terminal control sequences.
 */
export function composeFrame(state: PipelineState, options: FrameOptions): string[] {
  const paint = createPaint(options.color);
  const { snapshot } = state;
  const field = (label: string, value: string) => `${label.padEnd(LABEL_WIDTH)}${value}`;

  const header = snapshot.repository
    ? `Pipeline #${snapshot.buildNumber} · ${snapshot.repository}`
    : `Pipeline #${snapshot.buildNumber}`;
  const previous = state.previousStatus ? paint(DIM, ` (was ${state.previousStatus})`) : '';

  const lines = [
    paint(BOLD, header),
    '',
    field('Status', `${paint(statusColor(snapshot.status), snapshot.status)}${previous}`),
    field('Branch', snapshot.branch || '-'),
    field('Commit', snapshot.commit || '-'),
    ...commitDetails(snapshot).map(([label, value]) => field(label, value)),
    field('Definition', describeTrigger(snapshot.trigger)),
    field('Created', formatTimestamp(snapshot.createdAt)),
    field('Duration', formatDuration(state.elapsedSeconds)),
    field('Polls', `${state.pollCount} · last update ${formatClock(state.lastPolledAt)} UTC`)
  ];

  if (snapshot.variables.length > 0) {
    const width = Math.max(...snapshot.variables.map((variable) => variable.key.length)) + 2;
    lines.push('', paint(BOLD, 'Variables'));
    for (const variable of snapshot.variables) {
      const value = variable.secured ? paint(DIM, variable.value) : variable.value;
      lines.push(`  ${variable.key.padEnd(width)}${value}`);
    }
  }

  lines.push('', paint(BOLD, 'Steps'));
  if (snapshot.steps.length === 0) {
    lines.push(paint(DIM, '  (no steps yet)'));
  } else {
    const width = Math.max(...snapshot.steps.map((step) => step.name.length)) + 2;
    for (const step of snapshot.steps) {
      const glyph = paint(statusColor(step.status), GLYPHS[step.status]);
      const name =
        step.durationSeconds === undefined ? step.name : `${step.name.padEnd(width)}${formatDuration(step.durationSeconds)}`;
      lines.push(`  ${glyph} ${name}`);
    }
  }

  if (state.lastError) {
    const { message, attempt, retryInMs } = state.lastError;
    lines.push(
      '',
      paint(YELLOW, `! ${message} (attempt ${attempt}, retrying in ${formatRetryDelay(retryInMs)})`)
    );
  }

  return lines;
}

export function composeOutcomeLine(state: PipelineState | null, outcome: ExitOutcome, options: FrameOptions): string {
  const paint = createPaint(options.color);
  const text =
    outcome.kind === 'completed' && state
      ? `${describeOutcome(outcome)} after ${formatDuration(state.elapsedSeconds)}`
      : describeOutcome(outcome);

  switch (outcome.kind) {
    case 'completed':
    case 'observed':
      return paint(statusColor(outcome.status), text);
    case 'cancelled':
      return paint(YELLOW, text);
    case 'failed':
      return paint(RED, text);
  }
}
