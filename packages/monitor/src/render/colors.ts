import type { StepStatus } from '@pipewatch/shared/types';

export interface ColorStream {
  isTTY?: boolean;
}

/** Colour only on a TTY, and never when NO_COLOR is set. */
export function supportsColor(stream: ColorStream, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR || !stream.isTTY) return false;
  return env.TERM !== 'dumb';
}

const STATUS_CODES: Record<StepStatus, number> = {
  PENDING: 36,
  IN_PROGRESS: 34,
  SUCCESSFUL: 32,
  FAILED: 31,
  ERROR: 31,
  STOPPED: 33,
  SKIPPED: 2
};

export type Paint = (code: number, text: string) => string;

export const createPaint =
  (enabled: boolean): Paint =>
  (code, text) =>
    enabled ? `\x1b[${code}m${text}\x1b[0m` : text;

export const BOLD = 1;
export const DIM = 2;
export const RED = 31;
export const YELLOW = 33;

export const statusColor = (status: StepStatus): number => STATUS_CODES[status];
