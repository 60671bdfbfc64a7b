// packages/engine/src/proposal.ts
import {
  CollaboratorUnavailableError,
  ProposalInvalidError,
  ProposalResponseSchema,
  ShadowError,
  UnsafeSqlError,
  errorMessage,
  normalizeSql,
  withTimeout,
  type Logger,
  type Proposal,
  type ProposalInput,
  type ProposalSource,
  type SqlGuard
} from '@shadowsql/core';

export interface ProposalSettings {
  proposalTimeoutMs: number;
}

function unsafe<T>(check: () => T): T {
  try {
    return check();
  } catch (e) {
    if (e instanceof UnsafeSqlError) throw new ProposalInvalidError(`unsafe candidate: ${e.message}`);
    throw e;
  }
}

/** Wraps the proposal source: one call per attempt, every response validated before it reaches the sandbox. */
export class ProposalGenerator {
  private invocations = 0;

  constructor(
    private readonly source: ProposalSource,
    private readonly guard: SqlGuard,
    private readonly settings: ProposalSettings,
    private readonly log: Logger
  ) {}

  get calls(): number {
    return this.invocations;
  }

  async generate(input: ProposalInput, signal?: AbortSignal): Promise<Proposal> {
    this.invocations += 1;
    const timeoutMs = this.settings.proposalTimeoutMs;

    let raw: unknown;
    try {
      raw = await withTimeout('proposal', timeoutMs, (s) => this.source.propose(input, { signal: s, timeoutMs }), signal);
    } catch (e) {
      if (e instanceof ShadowError) throw e;
      throw new CollaboratorUnavailableError('llm', `${this.source.name} failed: ${errorMessage(e)}`);
    }

    const parsed = ProposalResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
      throw new ProposalInvalidError(`malformed proposal: ${issues.join('; ')}`);
    }
    const body = parsed.data;
    const base = { attempt: input.attempt, rationale: body.rationale, priorFeedback: [...input.priorFeedback] };

    if (body.candidate_index_ddl) {
      const ddl = body.candidate_index_ddl;
      const stmt = unsafe(() => this.guard.checkIndexDdl(ddl));
      this.log.debug({ attempt: input.attempt, index: stmt.name, table: stmt.table }, 'index proposal received');
      return { ...base, kind: 'index', sql: input.originalSql, indexDdl: ddl };
    }

    const sql = body.candidate_sql ?? '';
    unsafe(() => this.guard.checkQuery(sql));
    if (normalizeSql(sql) === normalizeSql(input.originalSql)) {
      throw new ProposalInvalidError('candidate is identical to the original query');
    }
    this.log.debug({ attempt: input.attempt }, 'rewrite proposal received');
    return { ...base, kind: 'rewrite', sql };
  }
}
