import type { ExitOutcome } from '../outcome.js';
import type { PipelineState, PollFailure } from '../state.js';
import { composeOutcomeLine, describeTrigger } from './frame.js';
import { formatClock, formatDuration, formatRetryDelay } from './format.js';
import type { PipelineRenderer } from './renderer.js';
import type { OutputStream } from './terminal.js';

/**
 * Line-oriented renderer for logs and pipes: one line when the pipeline
 * is first seen, then only on transitions and failures.
 */
export class PlainRenderer implements PipelineRenderer {
  private seen = false;
  private reportedTransitions = 0;
  private reportedFailure: PollFailure | null = null;

  constructor(private readonly out: OutputStream) {}

  render(state: PipelineState): void {
    this.report(state);
  }

  finish(state: PipelineState | null, outcome: ExitOutcome): void {
    if (state) {
      this.report(state);
    }
    this.out.write(`${composeOutcomeLine(state, outcome, { color: false })}\n`);
  }

  private report(state: PipelineState): void {
    const { snapshot } = state;
    const at = `[${formatClock(state.lastPolledAt)}]`;

    if (!this.seen) {
      this.seen = true;
      this.reportedTransitions = state.transitionCount;
      const commit = snapshot.commit || 'unknown commit';
      this.line(
        `${at} Pipeline #${snapshot.buildNumber} on ${snapshot.branch || 'unknown branch'} (${commit}, ${describeTrigger(snapshot.trigger)}): ${snapshot.status}`
      );
    } else if (state.transitionCount > this.reportedTransitions && state.lastTransition) {
      this.reportedTransitions = state.transitionCount;
      const { from, to } = state.lastTransition;
      this.line(`${at} ${from} -> ${to} after ${formatDuration(state.elapsedSeconds)}`);
    }

    const failure = state.lastError;
    if (failure && failure !== this.reportedFailure) {
      this.reportedFailure = failure;
      this.line(
        `[${formatClock(failure.at)}] Poll failed (attempt ${failure.attempt}): ${failure.message}; retrying in ${formatRetryDelay(failure.retryInMs)}`
      );
    }
  }

  private line(text: string): void {
    this.out.write(`${text}\n`);
  }
}
