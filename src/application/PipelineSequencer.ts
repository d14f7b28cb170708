import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { PipelineStepSpec, RunResult, StepContext, StepOutcome } from '../domain/model/PipelineStep.js';
import { RunStatus, canTransition } from '../domain/model/PipelineStep.js';
import { errorMessage } from '../domain/errors/CleaningErrors.js';
import { createLogger } from '../infrastructure/logging/logger.js';
import { EventBus } from './EventBus.js';

export interface PipelineSequencerOptions {
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
}

export interface PipelineRunOptions {
  /** First step to run, by index or id. Default: the first step. */
  readonly fromStep?: number | string;
  /** Step to stop before (exclusive), by index or id. Default: run to the end. */
  readonly toStep?: number | string;
  readonly signal?: AbortSignal;
}

/**
 * Runs pipeline steps strictly in order.
 *
 * A required step that throws ends the run as `FAILED` and its error is
 * rethrown unchanged. An optional step that throws is recorded as `failed`
 * and the next step runs. A step may call `context.requestStop()` to end the
 * run as `STOPPED` once it returns.
 */
export class PipelineSequencer {
  readonly eventBus: EventBus;
  private readonly steps: readonly PipelineStepSpec[];
  private readonly logger: Logger;

  constructor(steps: readonly PipelineStepSpec[], options?: PipelineSequencerOptions) {
    const ids = new Set<string>();
    for (const step of steps) {
      if (ids.has(step.id)) throw new Error(`Duplicate pipeline step id '${step.id}'`);
      ids.add(step.id);
    }

    this.steps = Object.freeze([...steps]);
    this.logger = options?.logger ?? createLogger('pipeline');
    this.eventBus = options?.eventBus ?? new EventBus(this.logger);
  }

  get stepIds(): string[] {
    return this.steps.map((step) => step.id);
  }

  async run(options?: PipelineRunOptions): Promise<RunResult> {
    const from = this.indexOf(options?.fromStep, 0);
    const to = this.indexOf(options?.toStep, this.steps.length);
    if (from > to) {
      throw new Error(`fromStep (${String(from)}) must not come after toStep (${String(to)})`);
    }

    const window = this.steps.slice(from, to);
    const runId = randomUUID();
    const logger = this.logger.child({ runId });
    const signal = options?.signal ?? new AbortController().signal;
    const outcomes: StepOutcome[] = [];
    let status: RunStatus = RunStatus.CREATED;
    let stopReason: string | undefined;

    const transitionTo = (next: RunStatus): void => {
      if (!canTransition(status, next)) {
        throw new Error(`Invalid state transition: ${status} → ${next}`);
      }
      status = next;
    };

    const finish = (next: RunStatus): RunResult => {
      transitionTo(next);
      logger.info({ status, steps: outcomes.length }, 'Pipeline run finished');
      this.eventBus.emit({ type: 'run:completed', runId, status, outcomes, timestamp: Date.now() });
      return stopReason === undefined ? { runId, status, outcomes } : { runId, status, outcomes, stopReason };
    };

    transitionTo(RunStatus.RUNNING);
    logger.info({ steps: window.map((step) => step.id) }, 'Pipeline run started');
    this.eventBus.emit({ type: 'run:started', runId, stepIds: window.map((step) => step.id), timestamp: Date.now() });

    for (const [position, step] of window.entries()) {
      if (signal.aborted) {
        stopReason = 'aborted';
      }
      if (stopReason !== undefined) {
        for (const remaining of window.slice(position)) {
          outcomes.push({ stepId: remaining.id, status: 'skipped', reason: stopReason });
        }
        return finish(RunStatus.STOPPED);
      }

      const stepLogger = logger.child({ step: step.id });
      const context: StepContext = {
        runId,
        stepId: step.id,
        logger: stepLogger,
        signal,
        requestStop: (reason: string) => {
          stepLogger.info({ reason }, 'Step requested the pipeline to stop');
          stopReason = reason;
        },
      };

      stepLogger.info({ label: step.label ?? step.id, required: step.required }, 'Step started');
      this.eventBus.emit({ type: 'step:started', runId, stepId: step.id, timestamp: Date.now() });
      const startedAt = Date.now();

      try {
        await step.run(context);
      } catch (error) {
        const elapsedMs = Date.now() - startedAt;
        outcomes.push({ stepId: step.id, status: 'failed', elapsedMs, error });
        stepLogger.error({ err: error, required: step.required }, 'Step failed');
        this.eventBus.emit({
          type: 'step:failed',
          runId,
          stepId: step.id,
          required: step.required,
          error: errorMessage(error),
          timestamp: Date.now(),
        });

        if (step.required) {
          finish(RunStatus.FAILED);
          throw error;
        }
        continue;
      }

      const elapsedMs = Date.now() - startedAt;
      outcomes.push({ stepId: step.id, status: 'completed', elapsedMs });
      stepLogger.info({ elapsedMs }, 'Step completed');
      this.eventBus.emit({ type: 'step:completed', runId, stepId: step.id, elapsedMs, timestamp: Date.now() });
    }

    return finish(stopReason === undefined ? RunStatus.COMPLETED : RunStatus.STOPPED);
  }

  private indexOf(step: number | string | undefined, fallback: number): number {
    if (step === undefined) return fallback;
    if (typeof step === 'number') {
      if (!Number.isInteger(step) || step < 0 || step > this.steps.length) {
        throw new Error(`Step index ${String(step)} is out of range (0..${String(this.steps.length)})`);
      }
      return step;
    }
    const index = this.steps.findIndex((candidate) => candidate.id === step);
    if (index < 0) throw new Error(`Unknown pipeline step '${step}'`);
    return index;
  }
}
