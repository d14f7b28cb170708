import type { Logger } from 'pino';

export const RunStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  STOPPED: 'STOPPED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.RUNNING],
  [RunStatus.RUNNING]: [RunStatus.COMPLETED, RunStatus.FAILED, RunStatus.STOPPED],
  [RunStatus.COMPLETED]: [],
  [RunStatus.FAILED]: [],
  [RunStatus.STOPPED]: [],
};

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Handed to every step when it runs. */
export interface StepContext {
  readonly runId: string;
  readonly stepId: string;
  readonly logger: Logger;
  /** Aborted when the caller cancels the run. Long steps should check it. */
  readonly signal: AbortSignal;
  /** Ask the sequencer not to start any further step. The current step still finishes. */
  requestStop(reason: string): void;
}

/** One stage of a multi-step pipeline. */
export interface PipelineStepSpec {
  readonly id: string;
  /** Human-readable name used in logs. Defaults to `id`. */
  readonly label?: string;
  /** A failing required step aborts the run; a failing optional one is recorded and skipped over. */
  readonly required: boolean;
  run(context: StepContext): Promise<void> | void;
}

export type StepOutcome =
  | { readonly stepId: string; readonly status: 'completed'; readonly elapsedMs: number }
  | { readonly stepId: string; readonly status: 'failed'; readonly elapsedMs: number; readonly error: unknown }
  | { readonly stepId: string; readonly status: 'skipped'; readonly reason: string };

export interface RunResult {
  readonly runId: string;
  readonly status: RunStatus;
  readonly outcomes: readonly StepOutcome[];
  /** Reason given to `requestStop`, when the run ended `STOPPED`. */
  readonly stopReason?: string;
}
