/* tests/helpers.ts */
// In-process stand-ins for the two collaborators, shared by engine, http and cli specs.
import {
  ExecutionError,
  type ApplyIndexOptions,
  normalizeSql,
  parseConfig,
  parseCreateIndex,
  type ExecuteOptions,
  type ExecutionResult,
  type ExplainPlan,
  type HealthStatus,
  type IndexHandle,
  type IsolationScope,
  type PlanStep,
  type ProposalInput,
  type ProposalSource,
  type ProposeOptions,
  type Row,
  type ShadowConfig,
  type ShadowDatabase,
  type ShadowRunResult,
  type TableSchema,
  type Variant,
  type VerificationConfig
} from '@shadowsql/core';
import { canonicalizeResult, retainedRows } from '@shadowsql/engine';

// ---------- rows & plans ----------

export function orderRows(n: number, from = 1): Row[] {
  const rows: Row[] = [];
  for (let i = from; i < from + n; i++) {
    rows.push({ id: i, customer_id: (i % 17) + 1, total: i * 1.25, created_at: '2023-01-01 10:00:00' });
  }
  return rows;
}

export function planStep(over: Partial<PlanStep> = {}): PlanStep {
  return {
    id: 1, selectType: 'SIMPLE', table: 'orders', accessType: 'ALL', possibleKeys: [],
    key: null, rows: 50000, filtered: 10, extra: ['Using where'], ...over
  };
}

export const ORDERS_SCHEMA: TableSchema[] = [{
  name: 'orders',
  columns: [
    { name: 'id', type: 'bigint', nullable: false },
    { name: 'customer_id', type: 'bigint', nullable: false },
    { name: 'total', type: 'double', nullable: false },
    { name: 'created_at', type: 'datetime', nullable: false }
  ],
  indexes: [
    { name: 'PRIMARY', columns: ['id'], unique: true },
    { name: 'idx_created_at', columns: ['created_at'], unique: false }
  ],
  rowCount: 50000
}];

export interface ShadowRunOptions {
  ordered?: boolean;
  spread?: number;
  epsilon?: number;
  /** false behaves like a result above the retention limit */
  retain?: boolean;
}

/** A finished shadow run built the same way the sandbox builds one. */
export function shadowRun(variant: Variant, rows: Row[], elapsedMs: number, opts: ShadowRunOptions = {}): ShadowRunResult {
  const ordered = opts.ordered ?? false;
  const columns = rows[0] ? Object.keys(rows[0]) : [];
  const canon = canonicalizeResult(columns, rows, ordered, opts.epsilon ?? 1e-9);
  const retained = retainedRows(canon, opts.retain === false ? 0 : rows.length);
  return {
    variant,
    sql: variant === 'original' ? 'SELECT 1' : 'SELECT 2',
    resultHash: canon.hash,
    rowCount: rows.length,
    columns: canon.columns,
    ordered,
    elapsedMs,
    timingsMs: [elapsedMs],
    relativeSpread: opts.spread ?? 0,
    plan: null,
    ...(retained ? { rows: retained } : {})
  };
}

// ---------- config ----------

export function testConfig(verification: Partial<VerificationConfig> = {}): ShadowConfig {
  return parseConfig({
    logging: { level: 'silent' },
    llm: { api_key: 'test-secret' },
    verification: { execution_timeout_ms: 1000, proposal_timeout_ms: 1000, ...verification }
  });
}

// ---------- database ----------

export interface ScriptedResult {
  rows?: Row[];
  columns?: string[];
  /** one value, or a sequence consumed call by call (last value repeats) */
  elapsedMs?: number | number[];
  error?: Error;
  hang?: boolean;
}

export class FakeShadowDatabase implements ShadowDatabase {
  readonly dialect = 'mysql' as const;
  readonly created: IsolationScope[] = [];
  readonly released: IsolationScope[] = [];
  readonly executed: string[] = [];
  readonly applied: IndexHandle[] = [];
  readonly dropped: IndexHandle[] = [];
  schema: TableSchema[] = ORDERS_SCHEMA;
  plan: ExplainPlan = { steps: [planStep()] };
  createError?: Error;
  applyError?: Error;
  /** index builds finish this long after they start, whatever the caller does */
  applyDelayMs = 0;
  /** index builds never finish */
  applyHang = false;
  readonly applySignals: Array<AbortSignal | undefined> = [];
  healthStatus: HealthStatus = { ok: true, version: '8.0.36-fake' };
  closed = false;

  private readonly results = new Map<string, ScriptedResult>();
  private readonly indexedResults = new Map<string, ScriptedResult>();
  private readonly calls = new Map<string, number>();
  private readonly open = new Set<string>();
  private activeIndex: string | null = null;
  private seq = 0;

  on(sql: string, result: ScriptedResult): this {
    this.results.set(normalizeSql(sql), result);
    return this;
  }

  /** Result for `sql` while the named index exists. */
  onWithIndex(indexName: string, sql: string, result: ScriptedResult): this {
    this.indexedResults.set(`${indexName}|${normalizeSql(sql)}`, result);
    return this;
  }

  async createIsolationScope(requestId: string): Promise<IsolationScope> {
    if (this.createError) throw this.createError;
    this.seq += 1;
    const scope: IsolationScope = { id: `scope-${this.seq}`, requestId, kind: 'clone' };
    this.created.push(scope);
    this.open.add(scope.id);
    return scope;
  }

  async release(scope: IsolationScope): Promise<void> {
    this.released.push(scope);
    this.open.delete(scope.id);
  }

  private assertOpen(scope: IsolationScope): void {
    if (!this.open.has(scope.id)) throw new Error(`scope ${scope.id} used after release`);
  }

  async execute(scope: IsolationScope, sql: string, opts: ExecuteOptions): Promise<ExecutionResult> {
    this.assertOpen(scope);
    this.executed.push(sql);
    const key = normalizeSql(sql);
    const script = (this.activeIndex ? this.indexedResults.get(`${this.activeIndex}|${key}`) : undefined) ?? this.results.get(key);
    if (!script) throw new ExecutionError(`no scripted result for: ${key}`);
    if (script.error) throw script.error;
    if (script.hang) return new Promise<ExecutionResult>(() => undefined);

    const n = this.calls.get(key) ?? 0;
    this.calls.set(key, n + 1);
    const e = script.elapsedMs ?? 1;
    const elapsedMs = Array.isArray(e) ? e[Math.min(n, e.length - 1)] : e;
    const rows = script.rows ?? [];
    const columns = script.columns ?? (rows[0] ? Object.keys(rows[0]) : []);
    return { rows: rows.map((r) => ({ ...r })), columns, elapsedMs };
  }

  async explain(scope: IsolationScope): Promise<ExplainPlan> {
    this.assertOpen(scope);
    return this.plan;
  }

  async describeTables(scope: IsolationScope, tables: string[]): Promise<TableSchema[]> {
    this.assertOpen(scope);
    return this.schema.filter((t) => tables.includes(t.name));
  }

  async applyIndex(scope: IsolationScope, ddl: string, opts: ApplyIndexOptions = {}): Promise<IndexHandle> {
    this.assertOpen(scope);
    this.applySignals.push(opts.signal);
    if (this.applyError) throw this.applyError;
    if (this.applyHang) return new Promise<IndexHandle>(() => undefined);
    if (this.applyDelayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.applyDelayMs));
    const parsed = parseCreateIndex(ddl);
    if (!parsed) throw new ExecutionError('not a CREATE INDEX statement');
    const handle = { name: parsed.name, table: parsed.table };
    this.applied.push(handle);
    this.activeIndex = parsed.name;
    return handle;
  }

  async dropIndex(scope: IsolationScope, handle: IndexHandle): Promise<void> {
    this.assertOpen(scope);
    this.dropped.push(handle);
    if (this.activeIndex === handle.name) this.activeIndex = null;
  }

  async health(): Promise<HealthStatus> {
    return this.healthStatus;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ---------- proposal source ----------

export type Reply =
  | { kind: 'value'; value: unknown }
  | { kind: 'error'; error: Error }
  | { kind: 'hang' };

export const rewrite = (sql: string, rationale = 'rewrite'): Reply => ({ kind: 'value', value: { candidate_sql: sql, rationale } });
export const index = (ddl: string, rationale = 'index'): Reply => ({ kind: 'value', value: { candidate_index_ddl: ddl, rationale } });
export const raw = (value: unknown): Reply => ({ kind: 'value', value });
export const fail = (error: Error): Reply => ({ kind: 'error', error });
export const HANG: Reply = { kind: 'hang' };

export class ScriptedProposalSource implements ProposalSource {
  readonly name = 'scripted';
  readonly inputs: ProposalInput[] = [];
  healthStatus: HealthStatus = { ok: true, version: 'scripted' };
  private readonly replies: Reply[];

  constructor(replies: Reply[]) {
    this.replies = [...replies];
  }

  async propose(input: ProposalInput, opts: ProposeOptions): Promise<unknown> {
    this.inputs.push(input);
    const next = this.replies.shift();
    if (!next) throw new Error('no scripted proposal left');
    if (next.kind === 'error') throw next.error;
    if (next.kind === 'hang') {
      return new Promise((_, reject) => {
        opts.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    return next.value;
  }

  async health(): Promise<HealthStatus> {
    return this.healthStatus;
  }
}
