/**
 * Session Tracker - the single place a run's state is mutated
 *
 * Stages only move forward; `Failed` can be entered from any stage and ends
 * the run. Every change is published to the listener in order.
 */

import type {
  PipelineStage,
  ReencodeOutcome,
  SessionCounters,
  SessionState,
  StateListener,
  TruncationInfo,
} from '../types/pipeline.js';
import { PIPELINE_STAGES } from '../types/pipeline.js';
import { errorKind, errorMessage } from '../errors.js';

export function createCounters(): SessionCounters {
  return {
    chunksCreated: 0,
    promptsBuilt: 0,
    translationsCompleted: 0,
    validationsCompleted: 0,
    validationsFailed: 0,
  };
}

export class SessionTracker {
  private state: SessionState;
  private listener?: StateListener;
  private publishing: Promise<void> = Promise.resolve();

  constructor(sessionId: string, listener?: StateListener) {
    const now = new Date().toISOString();
    this.listener = listener;
    this.state = {
      sessionId,
      stage: 'Initializing',
      lastStage: 'Initializing',
      counters: createCounters(),
      warnings: [],
      fallbackChunks: [],
      startedAt: now,
      updatedAt: now,
    };
    this.publish();
  }

  get stage(): SessionState['stage'] {
    return this.state.stage;
  }

  get lastStage(): PipelineStage {
    return this.state.lastStage;
  }

  get counters(): Readonly<SessionCounters> {
    return this.state.counters;
  }

  /**
   * Move to a later stage
   */
  enter(stage: PipelineStage): void {
    if (this.isFinished()) {
      throw new Error(`Session ${this.state.sessionId} is finished (${this.state.stage})`);
    }

    const from = PIPELINE_STAGES.indexOf(this.state.lastStage);
    const to = PIPELINE_STAGES.indexOf(stage);
    if (to <= from) {
      throw new Error(`Illegal stage transition ${this.state.lastStage} -> ${stage}`);
    }

    this.state.stage = stage;
    this.state.lastStage = stage;
    if (stage === 'Done') {
      this.state.finishedAt = new Date().toISOString();
    }
    this.touch();
  }

  /**
   * Counter and warning updates after Done or Failed are ignored
   */
  increment(counter: keyof SessionCounters, by: number = 1): void {
    if (this.isFinished()) return;
    this.state.counters[counter] += by;
    this.touch();
  }

  warn(message: string): void {
    if (this.isFinished()) return;
    this.state.warnings.push(message);
    this.touch();
  }

  recordFallback(index: number): void {
    if (this.isFinished()) return;
    if (!this.state.fallbackChunks.includes(index)) {
      this.state.fallbackChunks.push(index);
      this.state.fallbackChunks.sort((a, b) => a - b);
    }
    this.touch();
  }

  setTruncation(truncation: TruncationInfo): void {
    this.state.truncation = truncation;
    this.touch();
  }

  setReencode(outcome: ReencodeOutcome): void {
    this.state.reencode = outcome;
    this.touch();
  }

  /**
   * End the run in `Failed`, keeping the stage it reached
   */
  fail(error: unknown): void {
    if (this.isFinished()) return;

    this.state.stage = 'Failed';
    this.state.lastError = {
      kind: errorKind(error),
      message: errorMessage(error),
      stage: this.state.lastStage,
    };
    this.state.finishedAt = new Date().toISOString();
    this.touch();
  }

  isFinished(): boolean {
    return this.state.stage === 'Done' || this.state.stage === 'Failed';
  }

  snapshot(): SessionState {
    return structuredClone(this.state);
  }

  /**
   * Resolves once every published state has reached the listener
   */
  async flush(): Promise<void> {
    await this.publishing;
  }

  private touch(): void {
    this.state.updatedAt = new Date().toISOString();
    this.publish();
  }

  private publish(): void {
    const listener = this.listener;
    if (!listener) return;

    const snapshot = this.snapshot();
    this.publishing = this.publishing
      .then(() => listener(snapshot))
      .catch((error: unknown) => {
        console.warn(`[SessionTracker] State listener failed for ${snapshot.sessionId}: ${errorMessage(error)}`);
      });
  }
}
