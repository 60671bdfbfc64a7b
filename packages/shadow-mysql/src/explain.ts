// packages/shadow-mysql/src/explain.ts
// Tabular EXPLAIN rows -> engine-neutral PlanStep[]
import type { PlanStep } from '@shadowsql/core';

export type RawRecord = Record<string, unknown>;

function toNumber(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'bigint') return Number(v);
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toText(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return s === '' ? null : s;
}

function splitList(v: unknown, sep: RegExp): string[] {
  const s = toText(v);
  return s ? s.split(sep).map((x) => x.trim()).filter(Boolean) : [];
}

// MySQL 5.7 and 8 both use these column names; `Extra` keeps its capital.
export function normalizeExplainRow(r: RawRecord): PlanStep {
  return {
    id: toNumber(r.id),
    selectType: toText(r.select_type) ?? 'SIMPLE',
    table: toText(r.table),
    accessType: toText(r.type),
    possibleKeys: splitList(r.possible_keys, /,/),
    key: toText(r.key),
    rows: toNumber(r.rows),
    filtered: toNumber(r.filtered),
    extra: splitList(r.Extra ?? r.extra, /;/)
  };
}

export function normalizeExplainRows(rows: RawRecord[]): PlanStep[] {
  return rows.map(normalizeExplainRow);
}
