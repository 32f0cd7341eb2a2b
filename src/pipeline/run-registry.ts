// src/pipeline/run-registry.ts
import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  RUN_TRANSITIONS,
  TERMINAL_STAGES,
  type PipelineStage,
  type RunKind,
  type RunState,
  type RunStateSnapshot,
} from './pipeline.types';

/** One build or query in flight: its state record plus the signal that cancels it. */
export class PipelineRun {
  readonly state: RunState;
  private readonly controller = new AbortController();
  private readonly unlink: () => void;

  constructor(kind: RunKind, documentId: string, parent?: AbortSignal) {
    this.state = {
      runId: randomUUID(),
      kind,
      documentId,
      stage: 'Idle',
      attemptCount: 0,
      transientRetries: 0,
      history: ['Idle'],
      startedAt: new Date().toISOString(),
    };

    const onParentAbort = () => this.controller.abort();
    if (parent?.aborted) this.controller.abort();
    parent?.addEventListener('abort', onParentAbort, { once: true });
    this.unlink = () => parent?.removeEventListener('abort', onParentAbort);
  }

  get runId(): string {
    return this.state.runId;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get finished(): boolean {
    return TERMINAL_STAGES.includes(this.state.stage);
  }

  transition(to: PipelineStage): void {
    const allowed = RUN_TRANSITIONS[this.state.kind][this.state.stage] ?? [];
    if (!allowed.includes(to)) {
      throw new Error(
        `Illegal ${this.state.kind} transition ${this.state.stage} -> ${to} (run ${this.runId})`,
      );
    }
    this.state.stage = to;
    this.state.history.push(to);
  }

  cancel(): void {
    this.controller.abort();
  }

  snapshot(): RunStateSnapshot {
    return Object.freeze({ ...this.state, history: Object.freeze([...this.state.history]) });
  }

  dispose(): void {
    this.unlink();
  }
}

const MAX_FINISHED_RUNS = 500;

/**
 * Live runs plus a bounded history of finished ones. Closing a run releases
 * its abort controller and parent-signal listener; only its frozen snapshot
 * is kept.
 */
@Injectable()
export class RunRegistry {
  private readonly runs = new Map<string, PipelineRun | RunStateSnapshot>();
  private finishedCount = 0;

  open(kind: RunKind, documentId: string, signal?: AbortSignal): PipelineRun {
    const run = new PipelineRun(kind, documentId, signal);
    this.runs.set(run.runId, run);
    return run;
  }

  get(runId: string): RunStateSnapshot | undefined {
    const entry = this.runs.get(runId);
    return entry instanceof PipelineRun ? entry.snapshot() : entry;
  }

  /** Oldest first. */
  list(): RunStateSnapshot[] {
    return Array.from(this.runs.values(), (entry) =>
      entry instanceof PipelineRun ? entry.snapshot() : entry,
    );
  }

  /** False when the run is unknown or already finished. */
  cancel(runId: string): boolean {
    const entry = this.runs.get(runId);
    if (!(entry instanceof PipelineRun) || entry.finished) return false;
    entry.cancel();
    return true;
  }

  close(run: PipelineRun): void {
    run.dispose();
    // Map.set on an existing key keeps its position
    this.runs.set(run.runId, run.snapshot());
    this.finishedCount += 1;

    for (const [runId, entry] of this.runs) {
      if (this.finishedCount <= MAX_FINISHED_RUNS) break;
      if (!(entry instanceof PipelineRun)) {
        this.runs.delete(runId);
        this.finishedCount -= 1;
      }
    }
  }
}
