// packages/engine/src/diagnosis.ts
import {
  maskLiterals,
  planTables,
  stripComments,
  type Diagnosis,
  type DiagnosisIssue,
  type ExplainPlan,
  type IsolationScope,
  type Logger,
  type ShadowDatabase,
  type TableSchema
} from '@shadowsql/core';

export interface DiagnosisSettings {
  fullScanRowThreshold: number;
}

// words that may precede "(" inside a WHERE clause without being a function call
const NOT_FUNCTIONS = new Set([
  'in', 'exists', 'and', 'or', 'not', 'select', 'values', 'any', 'all', 'some', 'where', 'on', 'using', 'as', 'is', 'between'
]);

const CLAUSE_END = /\b(group\s+by|order\s+by|having|limit|window|union|for\s+update)\b/i;

/** Text of every WHERE clause in the statement, subqueries included. */
export function whereClauses(sql: string): string[] {
  const parts = sql.split(/\bwhere\b/i).slice(1);
  return parts.map((p) => {
    const end = p.search(CLAUSE_END);
    return end === -1 ? p : p.slice(0, end);
  });
}

function indexedColumns(schema: readonly TableSchema[]): Map<string, string> {
  const out = new Map<string, string>(); // column (lowercase) -> owning table
  for (const t of schema) {
    for (const idx of t.indexes) {
      for (const c of idx.columns) out.set(c.toLowerCase(), t.name);
    }
  }
  return out;
}

const FUNCTION_ON_COLUMN = /\b([a-z_][a-z0-9_]*)\s*\(\s*(?:`?[a-z_][a-z0-9_$]*`?\s*\.\s*)?`?([a-z_][a-z0-9_$]*)`?\s*[,)]/gi;
const LEADING_WILDCARD = /(?:`?[a-z_][a-z0-9_$]*`?\s*\.\s*)?`?([a-z_][a-z0-9_$]*)`?\s+(?:not\s+)?like\s+(['"])%/gi;

export function predicateIssues(sql: string, schema: readonly TableSchema[]): DiagnosisIssue[] {
  const issues: DiagnosisIssue[] = [];
  const indexed = indexedColumns(schema);
  const seen = new Set<string>();
  const push = (issue: DiagnosisIssue) => {
    const key = `${issue.tag}:${issue.column ?? ''}`;
    if (seen.has(key)) return;
    seen.add(key);
    issues.push(issue);
  };

  for (const clause of whereClauses(maskLiterals(sql))) {
    for (const m of clause.matchAll(FUNCTION_ON_COLUMN)) {
      const fn = m[1];
      const column = m[2];
      if (NOT_FUNCTIONS.has(fn.toLowerCase())) continue;
      const table = indexed.get(column.toLowerCase());
      if (!table) continue;
      push({
        tag: 'function-on-indexed-column',
        table,
        column,
        detail: `${fn.toUpperCase()}() wraps indexed column ${table}.${column}, so its index cannot be used for this predicate`
      });
    }
  }

  for (const clause of whereClauses(stripComments(sql))) {
    for (const m of clause.matchAll(LEADING_WILDCARD)) {
      const column = m[1];
      push({
        tag: 'non-sargable-predicate',
        column,
        ...(indexed.has(column.toLowerCase()) ? { table: indexed.get(column.toLowerCase()) } : {}),
        detail: `LIKE pattern on ${column} starts with a wildcard, which forces a scan`
      });
    }
  }
  return issues;
}

export function planIssues(plan: ExplainPlan, threshold: number): DiagnosisIssue[] {
  const issues: DiagnosisIssue[] = [];
  for (const s of plan.steps) {
    const table = s.table ?? undefined;
    const name = s.table ?? 'a derived table';
    const extra = s.extra.map((e) => e.toLowerCase());

    if (s.accessType === 'ALL' && (s.rows ?? 0) >= threshold) {
      issues.push({ tag: 'full-scan', table, detail: `${name} is read with a full table scan (~${s.rows ?? 0} rows)` });
    }
    if (s.accessType === 'ALL' && s.possibleKeys.length === 0 && extra.some((e) => e.startsWith('using where'))) {
      issues.push({ tag: 'missing-index', table, detail: `${name} is filtered without any usable index` });
    }
    if (extra.some((e) => e.includes('using filesort'))) {
      issues.push({ tag: 'filesort', table, detail: `sorting rows from ${name} needs a filesort` });
    }
    if (extra.some((e) => e.includes('using temporary'))) {
      issues.push({ tag: 'temporary-table', table, detail: `reading ${name} builds a temporary table` });
    }
    if (s.selectType.toUpperCase() === 'DEPENDENT SUBQUERY') {
      issues.push({ tag: 'dependent-subquery', table, detail: `subquery on ${name} is re-evaluated for every outer row` });
    }
  }
  return issues;
}

export function summarize(issues: readonly DiagnosisIssue[]): string {
  if (issues.length === 0) return 'no obvious bottleneck in the plan';
  const tags = [...new Set(issues.map((i) => i.tag))];
  return `${issues.length} issue${issues.length === 1 ? '' : 's'} found: ${tags.join(', ')}`;
}

/** Gathers context for the proposal source; nothing here feeds the accept/reject decision. */
export class DiagnosisCollector {
  constructor(
    private readonly db: ShadowDatabase,
    private readonly settings: DiagnosisSettings,
    private readonly log: Logger
  ) {}

  async diagnose(sql: string, scope: IsolationScope, schemaContext?: readonly TableSchema[]): Promise<Diagnosis> {
    const plan = await this.db.explain(scope, sql);
    const tables = planTables(plan.steps);
    const schema = schemaContext
      ? [...schemaContext]
      : tables.length > 0 ? await this.db.describeTables(scope, tables) : [];

    const issues = [...planIssues(plan, this.settings.fullScanRowThreshold), ...predicateIssues(sql, schema)];
    const summary = summarize(issues);
    this.log.info({ tables, issues: issues.map((i) => i.tag) }, summary);
    return { plan, issues, summary, schema };
  }
}
