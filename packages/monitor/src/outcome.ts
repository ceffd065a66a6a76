import type { PipewatchError } from '@pipewatch/shared/errors';
import type { PipelineStatus, TerminalStatus } from '@pipewatch/shared/types';

export type ExitOutcome =
  | { kind: 'completed'; status: TerminalStatus }
  /** One-shot run: the status seen by a single fetch. */
  | { kind: 'observed'; status: PipelineStatus }
  | { kind: 'cancelled' }
  | { kind: 'failed'; error: PipewatchError };

export const EXIT_SUCCESS = 0;
export const EXIT_PIPELINE_UNSUCCESSFUL = 1;
export const EXIT_MONITOR_ERROR = 2;
export const EXIT_CANCELLED = 130;

export const exitCodeFor = (outcome: ExitOutcome): number => {
  switch (outcome.kind) {
    case 'completed':
      return outcome.status === 'SUCCESSFUL' ? EXIT_SUCCESS : EXIT_PIPELINE_UNSUCCESSFUL;
    case 'observed':
      return EXIT_SUCCESS;
    case 'cancelled':
      return EXIT_CANCELLED;
    case 'failed':
      return EXIT_MONITOR_ERROR;
  }
};

export const describeOutcome = (outcome: ExitOutcome): string => {
  switch (outcome.kind) {
    case 'completed':
      return `Pipeline finished: ${outcome.status}`;
    case 'observed':
      return `Pipeline status: ${outcome.status}`;
    case 'cancelled':
      return 'Monitoring cancelled';
    case 'failed':
      return `Monitoring failed: ${outcome.error.message}`;
  }
};
