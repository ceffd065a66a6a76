import type { ExitOutcome } from '../outcome.js';
import type { PipelineState } from '../state.js';

/**
 * Receives every state the engine produces.
 *
 * `render` is called after each non-terminal poll, successful or not.
 * `finish` is called exactly once when monitoring ends, with the last
 * merged state, or `null` when no fetch ever succeeded.
 */
export interface PipelineRenderer {
  render(state: PipelineState): void;
  finish(state: PipelineState | null, outcome: ExitOutcome): void;
}
