// --------------------
// Dialects & rows
// --------------------
export type Dialect = 'mysql';

export const SUPPORTED_DIALECTS: readonly Dialect[] = ['mysql'];

export type CellValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | Date
  | Uint8Array
  | { [key: string]: unknown }
  | unknown[];

export type Row = Record<string, CellValue>;

// --------------------
// Schema context
// --------------------
export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
}

export interface IndexInfo {
  name: string;
  columns: string[]; // in index order
  unique: boolean;
}

export interface TableSchema {
  name: string;
  columns: ColumnInfo[];
  indexes: IndexInfo[];
  rowCount?: number;      // estimate from catalog statistics
  dataBytes?: number;
  indexBytes?: number;
}

// --------------------
// Explain plans
// --------------------
// access type as reported by the engine: ALL, index, range, ref, eq_ref, const, ...
export interface PlanStep {
  id: number | null;
  selectType: string;
  table: string | null;
  accessType: string | null;
  possibleKeys: string[];
  key: string | null;
  rows: number | null;
  filtered: number | null;
  extra: string[];
}

export interface ExplainPlan {
  steps: PlanStep[];
  raw?: unknown; // engine-native document (e.g. EXPLAIN FORMAT=JSON)
}

// --------------------
// Request
// --------------------
export interface OptimizationRequest {
  readonly id: string;
  readonly sql: string;
  readonly dialect: Dialect;
  readonly schemaContext?: readonly TableSchema[];
  readonly createdAt: string;
}

// --------------------
// Diagnosis
// --------------------
export type IssueTag =
  | 'full-scan'
  | 'missing-index'
  | 'function-on-indexed-column'
  | 'non-sargable-predicate'
  | 'filesort'
  | 'temporary-table'
  | 'dependent-subquery';

export interface DiagnosisIssue {
  tag: IssueTag;
  table?: string;
  column?: string;
  detail: string;
}

export interface Diagnosis {
  plan: ExplainPlan;
  issues: DiagnosisIssue[];
  summary: string;
  schema: TableSchema[];
}

// --------------------
// Proposals & feedback
// --------------------
export type RejectionKind =
  | 'proposal_invalid'
  | 'execution_error'
  | 'timeout'
  | 'semantic_mismatch'
  | 'performance_regression'
  | 'inconclusive_measurement';

export interface AttemptFeedback {
  attempt: number;
  kind: RejectionKind;
  message: string;
  candidateSql: string | null;
}

export type ProposalKind = 'rewrite' | 'index';

export interface Proposal {
  attempt: number;
  kind: ProposalKind;
  sql: string;           // statement executed as the candidate variant
  indexDdl?: string;     // set when kind === 'index'
  rationale: string;
  priorFeedback: AttemptFeedback[];
}

// --------------------
// Shadow runs
// --------------------
export type Variant = 'original' | 'candidate';

export interface ShadowRunResult {
  readonly variant: Variant;
  readonly sql: string;
  readonly resultHash: string;
  readonly rowCount: number;
  readonly columns: readonly string[];
  readonly ordered: boolean;
  readonly elapsedMs: number;            // median of timed runs
  readonly timingsMs: readonly number[]; // timed runs, warm-up excluded
  readonly relativeSpread: number;       // (max - min) / median
  readonly plan: ExplainPlan | null;
  readonly rows?: readonly Row[];        // canonical rows, kept for small sets only
}

export interface RunSummary {
  variant: Variant;
  sql: string;
  resultHash: string;
  rowCount: number;
  elapsedMs: number;
  relativeSpread: number;
}

// --------------------
// Verdicts & outcome
// --------------------
export interface VerificationVerdict {
  attempt: number;
  semanticMatch: boolean;
  speedupRatio: number | null;
  accepted: boolean;
  rejectionKind: RejectionKind | null;
  rejectionReason: string | null;
  evidence: { baseline: RunSummary; candidate: RunSummary | null };
}

export type OutcomeStatus = 'accepted' | 'exhausted' | 'fatal_error' | 'cancelled';

export interface OutcomeError {
  code: string;
  message: string;
}

export type OrchestratorState =
  | 'diagnosing'
  | 'proposing'
  | 'validating'
  | 'retry_with_feedback'
  | 'accepted'
  | 'exhausted'
  | 'fatal_error'
  | 'cancelled';

export interface StateTransition {
  from: OrchestratorState | null;
  to: OrchestratorState;
  attempt: number;
  at: string;
  note?: string;
}

export interface RequestOutcome {
  requestId: string;
  status: OutcomeStatus;
  originalSql: string;
  finalSql: string;
  recommendation: Proposal | null;
  acceptedVerdict: VerificationVerdict | null;
  verdicts: VerificationVerdict[];
  diagnosis: Diagnosis | null;
  baseline: RunSummary | null;
  error: OutcomeError | null;
  exhaustionReason: string | null;
  transitions: StateTransition[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

// --------------------
// Collaborators
// --------------------
export interface IsolationScope {
  readonly id: string;
  readonly requestId: string;
  readonly kind: 'transaction' | 'clone';
}

export interface ExecuteOptions {
  timeoutMs: number;
}

export interface ExecutionResult {
  rows: Row[];
  columns: string[];
  elapsedMs: number;
}

export interface ApplyIndexOptions {
  /** aborted when the caller stops waiting for the build */
  signal?: AbortSignal;
}

export interface IndexHandle {
  name: string;
  table: string;
}

export interface HealthStatus {
  ok: boolean;
  version?: string;
  error?: string;
}

export interface ShadowDatabase {
  readonly dialect: Dialect;
  createIsolationScope(requestId: string): Promise<IsolationScope>;
  release(scope: IsolationScope): Promise<void>;
  execute(scope: IsolationScope, sql: string, opts: ExecuteOptions): Promise<ExecutionResult>;
  explain(scope: IsolationScope, sql: string): Promise<ExplainPlan>;
  describeTables(scope: IsolationScope, tables: string[]): Promise<TableSchema[]>;
  applyIndex(scope: IsolationScope, ddl: string, opts?: ApplyIndexOptions): Promise<IndexHandle>;
  dropIndex(scope: IsolationScope, handle: IndexHandle): Promise<void>;
  health(): Promise<HealthStatus>;
  close(): Promise<void>;
}

export interface ProposalInput {
  originalSql: string;
  dialect: Dialect;
  diagnosis: Diagnosis;
  priorFeedback: AttemptFeedback[];
  attempt: number;
}

export interface ProposeOptions {
  signal?: AbortSignal;
  timeoutMs: number;
}

// Response shape is validated by the proposal generator; sources return parsed JSON.
export interface ProposalSource {
  readonly name: string;
  propose(input: ProposalInput, opts: ProposeOptions): Promise<unknown>;
  health(): Promise<HealthStatus>;
}
