import type { RunStatus, StepOutcome } from '../model/PipelineStep.js';
import type { TableCleaningSummary } from '../model/CleaningSummary.js';

/** Emitted when `PipelineSequencer.run()` begins executing its first step. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly stepIds: readonly string[];
  readonly timestamp: number;
}

/** Emitted when a run ends, whatever its final status. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly status: RunStatus;
  readonly outcomes: readonly StepOutcome[];
  readonly timestamp: number;
}

export interface StepStartedEvent {
  readonly type: 'step:started';
  readonly runId: string;
  readonly stepId: string;
  readonly timestamp: number;
}

export interface StepCompletedEvent {
  readonly type: 'step:completed';
  readonly runId: string;
  readonly stepId: string;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted for required and optional steps alike. Only required failures end the run. */
export interface StepFailedEvent {
  readonly type: 'step:failed';
  readonly runId: string;
  readonly stepId: string;
  readonly required: boolean;
  readonly error: string;
  readonly timestamp: number;
}

export interface FileStartedEvent {
  readonly type: 'file:started';
  readonly input: string;
  readonly output: string;
  readonly timestamp: number;
}

export interface FileCompletedEvent {
  readonly type: 'file:completed';
  readonly input: string;
  readonly output: string;
  readonly summary: TableCleaningSummary;
  readonly timestamp: number;
}

/** Emitted when a file could not be read, cleaned or written. The batch goes on. */
export interface FileFailedEvent {
  readonly type: 'file:failed';
  readonly input: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when no column of a table matches a field or any of its aliases. */
export interface FieldUnresolvedEvent {
  readonly type: 'field:unresolved';
  readonly field: string;
  /** File the table came from, when known. */
  readonly source?: string;
  readonly timestamp: number;
}

export interface TableCleanedEvent {
  readonly type: 'table:cleaned';
  readonly source?: string;
  readonly summary: TableCleaningSummary;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | StepStartedEvent
  | StepCompletedEvent
  | StepFailedEvent
  | FileStartedEvent
  | FileCompletedEvent
  | FileFailedEvent
  | FieldUnresolvedEvent
  | TableCleanedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
