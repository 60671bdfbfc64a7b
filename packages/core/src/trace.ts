// packages/core/src/trace.ts
// Evidence helpers: what gets logged and returned alongside a verdict.
import type { RunSummary, ShadowRunResult, StateTransition, OrchestratorState } from './types';

export function summarizeRun(run: ShadowRunResult): RunSummary {
  return {
    variant: run.variant,
    sql: run.sql,
    resultHash: run.resultHash,
    rowCount: run.rowCount,
    elapsedMs: run.elapsedMs,
    relativeSpread: run.relativeSpread
  };
}

/** Append-only state log; the orchestrator owns one per request. */
export class TransitionLog {
  private readonly entries: StateTransition[] = [];
  private state: OrchestratorState | null = null;

  constructor(private readonly onTransition?: (t: StateTransition) => void) {}

  get current(): OrchestratorState | null {
    return this.state;
  }

  move(to: OrchestratorState, attempt: number, note?: string): void {
    const t: StateTransition = { from: this.state, to, attempt, at: new Date().toISOString(), ...(note ? { note } : {}) };
    this.entries.push(t);
    this.state = to;
    this.onTransition?.(t);
  }

  list(): StateTransition[] {
    return [...this.entries];
  }
}
