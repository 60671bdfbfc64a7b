// packages/engine/src/orchestrator.ts
// Decision loop: diagnose once, baseline once, then propose/validate until
// a candidate is accepted or the attempt budget runs out.
import {
  CancelledError,
  ConfigError,
  ExecutionError,
  ProposalInvalidError,
  ShadowError,
  SqlGuard,
  TimeoutError,
  TransitionLog,
  UnsupportedDialectError,
  errorMessage,
  hasTopLevelOrderBy,
  silentLogger,
  summarizeRun,
  toOutcomeError,
  type AttemptFeedback,
  type Diagnosis,
  type IsolationScope,
  type Logger,
  type OptimizationRequest,
  type OutcomeError,
  type OutcomeStatus,
  type Proposal,
  type ProposalSource,
  type RejectionKind,
  type RequestOutcome,
  type RunSummary,
  type ShadowDatabase,
  type ShadowRunResult,
  type VerificationConfig,
  type VerificationVerdict
} from '@shadowsql/core';
import { DiagnosisCollector } from './diagnosis';
import { compareResults } from './equivalence';
import { comparePerformance } from './performance';
import { ProposalGenerator } from './proposal';
import { ShadowSandbox } from './sandbox';

export interface OrchestratorDeps {
  db: ShadowDatabase;
  source: ProposalSource;
  config: VerificationConfig;
  forbiddenOperations?: readonly string[];
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  maxAttempts?: number;
  minSpeedup?: number;
}

// ---------- scope lifecycle ----------

/** Acquires an isolation scope, runs `fn`, and releases the scope exactly once whatever happens. */
export async function withScope<T>(db: ShadowDatabase, requestId: string, log: Logger, fn: (scope: IsolationScope) => Promise<T>): Promise<T> {
  const scope = await db.createIsolationScope(requestId);
  try {
    return await fn(scope);
  } finally {
    try {
      await db.release(scope);
    } catch (e) {
      log.error({ scope: scope.id, err: errorMessage(e) }, 'isolation scope release failed');
    }
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}

function rejectionKindOf(e: ShadowError): RejectionKind | null {
  if (e instanceof TimeoutError) return 'timeout';
  if (e instanceof ProposalInvalidError) return 'proposal_invalid';
  if (e instanceof ExecutionError) return 'execution_error';
  return null;
}

// ---------- verdict builders ----------

function rejected(attempt: number, kind: RejectionKind, reason: string, baseline: RunSummary, candidate: RunSummary | null, extra: Partial<VerificationVerdict> = {}): VerificationVerdict {
  return {
    attempt,
    semanticMatch: false,
    speedupRatio: null,
    accepted: false,
    rejectionKind: kind,
    rejectionReason: reason,
    evidence: { baseline, candidate },
    ...extra
  };
}

class RequestRun {
  readonly transitions: TransitionLog;
  readonly verdicts: VerificationVerdict[] = [];
  readonly feedback: AttemptFeedback[] = [];
  diagnosis: Diagnosis | null = null;
  baseline: ShadowRunResult | null = null;
  accepted: { proposal: Proposal; verdict: VerificationVerdict } | null = null;

  constructor(log: Logger) {
    this.transitions = new TransitionLog((t) => log.info({ from: t.from, to: t.to, attempt: t.attempt, note: t.note }, 'state transition'));
  }
}

/**
 * Holds only configuration and collaborators; every call to `optimize` gets
 * its own scope, sandbox and state.
 */
export class DecisionOrchestrator {
  private readonly guard: SqlGuard;
  private readonly log: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.guard = new SqlGuard(deps.forbiddenOperations);
    this.log = deps.logger ?? silentLogger();
  }

  async optimize(request: OptimizationRequest, opts: RunOptions = {}): Promise<RequestOutcome> {
    const cfg = this.deps.config;
    const maxAttempts = opts.maxAttempts ?? cfg.max_attempts;
    const minSpeedup = opts.minSpeedup ?? cfg.min_speedup;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) throw new ConfigError(`max_attempts must be a positive integer (got ${maxAttempts})`);
    if (!(minSpeedup > 1)) throw new ConfigError(`min_speedup must be greater than 1.0 (got ${minSpeedup})`);
    if (request.dialect !== this.deps.db.dialect) throw new UnsupportedDialectError(request.dialect);
    this.guard.checkQuery(request.sql);

    const log = this.log.child({ requestId: request.id });
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const run = new RequestRun(log);

    let status: OutcomeStatus;
    let error: OutcomeError | null = null;
    try {
      status = await withScope(this.deps.db, request.id, log, (scope) =>
        this.loop(scope, request, run, { maxAttempts, minSpeedup, signal: opts.signal }, log)
      );
    } catch (e) {
      error = toOutcomeError(e);
      if (e instanceof CancelledError) {
        status = 'cancelled';
        run.transitions.move('cancelled', run.verdicts.length, e.message);
        log.warn({ attempts: run.verdicts.length }, 'request cancelled');
      } else {
        status = 'fatal_error';
        run.transitions.move('fatal_error', run.verdicts.length, error.message);
        log.error({ code: error.code, err: error.message }, 'request failed');
      }
    }

    const finished = Date.now();
    const last = run.verdicts[run.verdicts.length - 1];
    const outcome: RequestOutcome = {
      requestId: request.id,
      status,
      originalSql: request.sql,
      finalSql: run.accepted ? run.accepted.proposal.sql : request.sql,
      recommendation: run.accepted?.proposal ?? null,
      acceptedVerdict: run.accepted?.verdict ?? null,
      verdicts: run.verdicts,
      diagnosis: run.diagnosis,
      baseline: run.baseline ? summarizeRun(run.baseline) : null,
      error,
      exhaustionReason: status === 'exhausted' && last ? last.rejectionReason : null,
      transitions: run.transitions.list(),
      startedAt,
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started
    };
    log.info({ status, attempts: run.verdicts.length, speedup: outcome.acceptedVerdict?.speedupRatio ?? null, durationMs: outcome.durationMs }, 'request finished');
    return outcome;
  }

  // ---------- attempt loop ----------

  private async loop(
    scope: IsolationScope,
    request: OptimizationRequest,
    run: RequestRun,
    limits: { maxAttempts: number; minSpeedup: number; signal?: AbortSignal },
    log: Logger
  ): Promise<OutcomeStatus> {
    const cfg = this.deps.config;
    const { signal } = limits;
    const sandbox = new ShadowSandbox(this.deps.db, {
      timingRepeatCount: cfg.timing_repeat_count,
      executionTimeoutMs: cfg.execution_timeout_ms,
      floatEpsilon: cfg.float_epsilon,
      retainRowsLimit: cfg.retain_rows_limit,
      maxResultRows: cfg.max_result_rows
    }, log.child({ component: 'sandbox' }));
    const collector = new DiagnosisCollector(this.deps.db, { fullScanRowThreshold: cfg.full_scan_row_threshold }, log.child({ component: 'diagnosis' }));
    const generator = new ProposalGenerator(this.deps.source, this.guard, { proposalTimeoutMs: cfg.proposal_timeout_ms }, log.child({ component: 'proposal' }));

    throwIfCancelled(signal);
    run.transitions.move('diagnosing', 0);
    const diagnosis = await collector.diagnose(request.sql, scope, request.schemaContext);
    run.diagnosis = diagnosis;

    throwIfCancelled(signal);
    const ordered = hasTopLevelOrderBy(request.sql);
    // a failed baseline leaves nothing to compare against: not caught here
    const baseline = await sandbox.run(scope, 'original', request.sql, ordered, signal);
    run.baseline = baseline;
    const baseSummary = summarizeRun(baseline);

    for (let attempt = 1; attempt <= limits.maxAttempts; attempt++) {
      throwIfCancelled(signal);
      run.transitions.move('proposing', attempt);

      let candidateSql: string | null = null;
      let verdict: VerificationVerdict;
      try {
        const proposal = await generator.generate(
          { originalSql: request.sql, dialect: request.dialect, diagnosis, priorFeedback: [...run.feedback], attempt },
          signal
        );
        candidateSql = proposal.indexDdl ?? proposal.sql;
        run.transitions.move('validating', attempt, proposal.kind);
        verdict = await this.validate(scope, sandbox, proposal, baseline, baseSummary, limits.minSpeedup, signal, log);
        if (verdict.accepted) {
          run.verdicts.push(verdict);
          run.accepted = { proposal, verdict };
          run.transitions.move('accepted', attempt);
          log.info({ attempt, speedup: verdict.speedupRatio, kind: proposal.kind }, 'candidate accepted');
          return 'accepted';
        }
      } catch (e) {
        const kind = e instanceof ShadowError && e.recoverable ? rejectionKindOf(e) : null;
        if (!kind) throw e;
        verdict = rejected(attempt, kind, errorMessage(e), baseSummary, null);
      }

      run.verdicts.push(verdict);
      const kind = verdict.rejectionKind ?? 'execution_error';
      const message = verdict.rejectionReason ?? 'rejected';
      run.feedback.push({ attempt, kind, message, candidateSql });
      log.warn({ attempt, kind, reason: message, evidence: verdict.evidence }, 'candidate rejected');

      run.transitions.move(attempt < limits.maxAttempts ? 'retry_with_feedback' : 'exhausted', attempt, kind);
    }
    return 'exhausted';
  }

  private async validate(
    scope: IsolationScope,
    sandbox: ShadowSandbox,
    proposal: Proposal,
    baseline: ShadowRunResult,
    baseSummary: RunSummary,
    minSpeedup: number,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<VerificationVerdict> {
    const attempt = proposal.attempt;
    let candidate: ShadowRunResult;
    try {
      candidate = await sandbox.executeProposal(scope, proposal, baseline.ordered, signal);
    } catch (e) {
      if (e instanceof ExecutionError) return rejected(attempt, 'execution_error', `candidate failed to execute: ${e.message}`, baseSummary, null);
      throw e;
    }
    const candSummary = summarizeRun(candidate);

    const eq = compareResults(baseline, candidate, this.deps.config.float_epsilon, log);
    if (!eq.match) {
      return rejected(attempt, 'semantic_mismatch', eq.reason ?? 'results differ', baseSummary, candSummary);
    }

    const perf = comparePerformance(baseline, candidate, { minSpeedup, varianceTolerance: this.deps.config.variance_tolerance });
    if (perf.outcome === 'inconclusive') {
      return rejected(attempt, 'inconclusive_measurement', perf.reason ?? 'inconclusive', baseSummary, candSummary, { semanticMatch: true, speedupRatio: perf.speedupRatio });
    }
    if (!perf.pass) {
      return rejected(attempt, 'performance_regression', perf.reason ?? 'not faster', baseSummary, candSummary, { semanticMatch: true, speedupRatio: perf.speedupRatio });
    }
    return {
      attempt,
      semanticMatch: true,
      speedupRatio: perf.speedupRatio,
      accepted: true,
      rejectionKind: null,
      rejectionReason: null,
      evidence: { baseline: baseSummary, candidate: candSummary }
    };
  }
}
