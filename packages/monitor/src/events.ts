import { EventEmitter } from 'events';
import type { PipelineIdentifier } from '@pipewatch/shared/types';
import type { ExitOutcome } from './outcome.js';
import type { PollFailure, StatusTransition } from './state.js';

export interface PipelineTransitionEvent {
  identifier: PipelineIdentifier;
  transition: StatusTransition;
  at: Date;
}

export interface PollFailedEvent {
  identifier: PipelineIdentifier;
  failure: PollFailure;
}

export interface MonitorStoppedEvent {
  identifier: PipelineIdentifier;
  outcome: ExitOutcome;
  pollCount: number;
}

export declare interface PipelineEventEmitter {
  on(event: 'transition', listener: (event: PipelineTransitionEvent) => void): this;
  on(event: 'pollFailed', listener: (event: PollFailedEvent) => void): this;
  on(event: 'stopped', listener: (event: MonitorStoppedEvent) => void): this;

  emit(event: 'transition', data: PipelineTransitionEvent): boolean;
  emit(event: 'pollFailed', data: PollFailedEvent): boolean;
  emit(event: 'stopped', data: MonitorStoppedEvent): boolean;
}

export class PipelineEventEmitter extends EventEmitter {}
