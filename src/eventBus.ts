import { EventEmitter } from 'node:events';
import type { ErrorKind } from './errors.js';

// Event types
export interface StageStartedEvent {
  type: 'stage_started';
  projectId: string;
  stage: string;
  timestamp: string;
}

export interface RetryScheduledEvent {
  type: 'retry_scheduled';
  projectId: string;
  stage: string;
  /** Attempt that just failed */
  attempt: number;
  delayMs: number;
  errorKind: ErrorKind;
  timestamp: string;
}

export interface StageCommittedEvent {
  type: 'stage_committed';
  projectId: string;
  stage: string;
  stageResultId: string;
  attempts: number;
  contradictions: number;
  timestamp: string;
}

export interface StageFailedEvent {
  type: 'stage_failed';
  projectId: string;
  stage: string;
  errorKind: ErrorKind;
  message: string;
  attempts: number;
  timestamp: string;
}

export type PipelineEvent = StageStartedEvent | RetryScheduledEvent | StageCommittedEvent | StageFailedEvent;

type WithoutTimestamp<T> = T extends PipelineEvent ? Omit<T, 'timestamp'> : never;

export class PipelineEventBus extends EventEmitter {
  publish(event: WithoutTimestamp<PipelineEvent>): void {
    this.emit('event', { ...event, timestamp: new Date().toISOString() });
  }

  subscribe(listener: (event: PipelineEvent) => void): () => void {
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }
}

// Global event bus
export const eventBus = new PipelineEventBus();
