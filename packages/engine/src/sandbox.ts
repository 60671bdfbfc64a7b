// packages/engine/src/sandbox.ts
import {
  ErrorCode,
  ExecutionError,
  ProposalInvalidError,
  ShadowError,
  errorMessage,
  median,
  relativeSpread,
  withTimeout,
  type ExecutionResult,
  type ExplainPlan,
  type IndexHandle,
  type IsolationScope,
  type Logger,
  type Proposal,
  type ShadowDatabase,
  type ShadowRunResult,
  type Variant
} from '@shadowsql/core';
import { canonicalizeResult, retainedRows } from './canonical';

export interface SandboxSettings {
  timingRepeatCount: number;
  executionTimeoutMs: number;
  floatEpsilon: number;
  retainRowsLimit: number;
  maxResultRows: number;
}

/**
 * Runs one variant inside an isolation scope: explain, one warm-up, then
 * `timingRepeatCount` timed executions. Never retries; every failure goes
 * back to the orchestrator.
 */
export class ShadowSandbox {
  constructor(
    private readonly db: ShadowDatabase,
    private readonly settings: SandboxSettings,
    private readonly log: Logger
  ) {}

  async run(scope: IsolationScope, variant: Variant, sql: string, ordered: boolean, signal?: AbortSignal): Promise<ShadowRunResult> {
    const plan = await this.capturePlan(scope, variant, sql);
    const operation = variant === 'original' ? 'baseline execution' : 'candidate execution';

    const warm = await this.execOnce(scope, operation, sql, signal);
    this.checkSize(warm);

    const timings: number[] = [];
    let last: ExecutionResult = warm;
    for (let i = 0; i < Math.max(1, this.settings.timingRepeatCount); i++) {
      last = await this.execOnce(scope, operation, sql, signal);
      timings.push(last.elapsedMs);
    }
    this.checkSize(last);

    const canon = canonicalizeResult(last.columns, last.rows, ordered, this.settings.floatEpsilon);
    const rows = retainedRows(canon, this.settings.retainRowsLimit);
    const result: ShadowRunResult = {
      variant,
      sql,
      resultHash: canon.hash,
      rowCount: last.rows.length,
      columns: canon.columns,
      ordered,
      elapsedMs: median(timings),
      timingsMs: timings,
      relativeSpread: relativeSpread(timings),
      plan,
      ...(rows ? { rows } : {})
    };
    this.log.debug(
      { variant, rowCount: result.rowCount, elapsedMs: result.elapsedMs, spread: result.relativeSpread, hash: result.resultHash.slice(0, 12) },
      'shadow run finished'
    );
    return result;
  }

  /** Index proposals run the original statement with the index in place; the index is dropped on every path. */
  async executeProposal(scope: IsolationScope, proposal: Proposal, ordered: boolean, signal?: AbortSignal): Promise<ShadowRunResult> {
    if (proposal.kind === 'rewrite') return this.run(scope, 'candidate', proposal.sql, ordered, signal);
    if (!proposal.indexDdl) throw new ProposalInvalidError('index proposal carries no DDL');

    const handle = await this.buildIndex(scope, proposal.indexDdl, signal);
    this.log.debug({ index: handle.name, table: handle.table }, 'candidate index applied');
    try {
      return await this.run(scope, 'candidate', proposal.sql, ordered, signal);
    } finally {
      await this.removeIndex(scope, handle);
    }
  }

  /**
   * Applies the DDL under the execution timeout. When the caller stops waiting
   * (timeout or cancellation) the build may still be running on the scope, so
   * it is given one more timeout window to settle and, if it created the index,
   * the index is dropped before the error propagates. A build that never
   * settles leaves the scope in an unknown state and is fatal.
   */
  private async buildIndex(scope: IsolationScope, ddl: string, signal?: AbortSignal): Promise<IndexHandle> {
    const timeoutMs = this.settings.executionTimeoutMs;
    const build: { pending?: Promise<IndexHandle> } = {};
    try {
      return await withTimeout('index build', timeoutMs, (buildSignal) => {
        const pending = this.db.applyIndex(scope, ddl, { signal: buildSignal });
        build.pending = pending;
        return pending;
      }, signal);
    } catch (e) {
      if (build.pending) await this.settleAbandonedBuild(scope, build.pending, e);
      throw e;
    }
  }

  private async settleAbandonedBuild(scope: IsolationScope, pending: Promise<IndexHandle>, cause: unknown): Promise<void> {
    let handle: IndexHandle | null;
    try {
      handle = await withTimeout('abandoned index build', this.settings.executionTimeoutMs, () =>
        pending.then((h) => h, () => null)
      );
    } catch (e) {
      this.log.error({ err: errorMessage(e), cause: errorMessage(cause) }, 'abandoned index build did not settle');
      throw new ShadowError(
        ErrorCode.INTERNAL,
        `index build did not settle after being abandoned (${errorMessage(cause)}); the isolation scope may still change`,
        false
      );
    }
    if (handle) {
      this.log.warn({ index: handle.name, cause: errorMessage(cause) }, 'dropping index from an abandoned build');
      await this.removeIndex(scope, handle);
    }
  }

  private async removeIndex(scope: IsolationScope, handle: IndexHandle): Promise<void> {
    try {
      await this.db.dropIndex(scope, handle);
    } catch (e) {
      this.log.error({ index: handle.name, err: errorMessage(e) }, 'candidate index could not be dropped');
      // later attempts would be measured against a modified schema
      throw new ShadowError(ErrorCode.INTERNAL, `could not drop candidate index ${handle.name}: ${errorMessage(e)}`, false);
    }
  }

  private async capturePlan(scope: IsolationScope, variant: Variant, sql: string): Promise<ExplainPlan | null> {
    try {
      return await this.db.explain(scope, sql);
    } catch (e) {
      if (e instanceof ShadowError && !e.recoverable) throw e;
      this.log.warn({ variant, err: errorMessage(e) }, 'explain failed; run continues without a plan');
      return null;
    }
  }

  private execOnce(scope: IsolationScope, operation: string, sql: string, signal?: AbortSignal): Promise<ExecutionResult> {
    const timeoutMs = this.settings.executionTimeoutMs;
    return withTimeout(operation, timeoutMs, () => this.db.execute(scope, sql, { timeoutMs }), signal);
  }

  private checkSize(res: ExecutionResult): void {
    if (res.rows.length > this.settings.maxResultRows) {
      throw new ExecutionError(`result has ${res.rows.length} rows, above the ${this.settings.maxResultRows} row limit`);
    }
  }
}
