// packages/engine/src/canonical.ts
// Canonical form of result rows: what gets hashed and what the equivalence fallback compares.
import { createHash } from 'node:crypto';
import type { CellValue, Row } from '@shadowsql/core';

export type Canonical = string | number | boolean | null | Canonical[] | { [key: string]: Canonical };

/** Snaps a number onto the epsilon grid; integers pass through untouched. */
export function quantize(v: number, epsilon: number): number {
  if (!Number.isFinite(v) || Number.isInteger(v) || epsilon <= 0) return v;
  // toPrecision trims the noise the multiplication adds back (0.30000000000000004)
  const snapped = Number((Math.round(v / epsilon) * epsilon).toPrecision(15));
  return Object.is(snapped, -0) ? 0 : snapped;
}

export function canonicalValue(v: CellValue | unknown, epsilon: number): Canonical {
  if (v === null || v === undefined) return null;
  if (typeof v === 'number') return Number.isFinite(v) ? quantize(v, epsilon) : String(v);
  if (typeof v === 'string' || typeof v === 'boolean') return v;
  if (typeof v === 'bigint') return v.toString();
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? 'Invalid Date' : v.toISOString();
  if (v instanceof Uint8Array) return `hex:${Buffer.from(v).toString('hex')}`;
  if (Array.isArray(v)) return v.map((x) => canonicalValue(x, epsilon));
  if (typeof v === 'object') {
    const out: { [key: string]: Canonical } = {};
    for (const k of Object.keys(v).sort()) out[k] = canonicalValue(Reflect.get(v, k), epsilon);
    return out;
  }
  return String(v);
}

/** Stable text for one row: [column, value] pairs in column-name order. */
export function canonicalRow(row: Row, epsilon: number): string {
  const keys = Object.keys(row).sort();
  return JSON.stringify(keys.map((k) => [k, canonicalValue(row[k], epsilon)]));
}

/**
 * Float tolerance: relative above 1, absolute below. Two integers are only
 * close when equal, so large ids never blur into each other.
 */
export function numbersClose(a: number, b: number, epsilon: number): boolean {
  if (a === b) return true;
  if (Number.isInteger(a) && Number.isInteger(b)) return false;
  return Math.abs(a - b) <= epsilon * Math.max(1, Math.abs(a), Math.abs(b));
}

export interface CanonicalResult {
  columns: string[];       // sorted
  rows: Row[];             // in comparison order
  keys: string[];          // canonicalRow() of each row, same order
  hash: string;
  /** some top-level value is a non-integer number, so equal hashes are not the only way to match */
  inexact: boolean;
}

interface SortEntry {
  row: Row;
  key: string;
  exact: string;           // the row with every number blanked out
  numbers: number[];       // the blanked numbers, in column-name order
}

function sortEntry(row: Row, epsilon: number): SortEntry {
  const numbers: number[] = [];
  const exact = JSON.stringify(Object.keys(row).sort().map((k) => {
    const v = row[k];
    if (typeof v === 'number' && Number.isFinite(v)) {
      numbers.push(v);
      return [k, 0];
    }
    return [k, canonicalValue(v, 0)];
  }));
  return { row, key: canonicalRow(row, epsilon), exact, numbers };
}

// Numbers within tolerance compare equal here, so rows whose floats straddle a
// grid line still line up with their counterparts in the other result.
function compareEntries(a: SortEntry, b: SortEntry, epsilon: number): number {
  if (a.exact !== b.exact) return a.exact < b.exact ? -1 : 1;
  for (let i = 0; i < a.numbers.length && i < b.numbers.length; i++) {
    if (!numbersClose(a.numbers[i], b.numbers[i], epsilon)) return a.numbers[i] - b.numbers[i];
  }
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

/**
 * Canonicalizes a result set. Unordered results are sorted on their
 * non-numeric values first and their numbers second, so row order returned
 * by the server does not matter.
 */
export function canonicalizeResult(columns: readonly string[], rows: readonly Row[], ordered: boolean, epsilon: number): CanonicalResult {
  const entries = rows.map((row) => sortEntry(row, epsilon));
  if (!ordered) entries.sort((a, b) => compareEntries(a, b, epsilon));

  const sortedColumns = [...columns].sort();
  const h = createHash('sha256');
  h.update(`${ordered ? 'ordered' : 'unordered'}\n${JSON.stringify(sortedColumns)}\n`);
  for (const { key } of entries) h.update(`${key}\n`);

  return {
    columns: sortedColumns,
    rows: entries.map((e) => e.row),
    keys: entries.map((e) => e.key),
    hash: h.digest('hex'),
    inexact: entries.some((e) => e.numbers.some((n) => !Number.isInteger(n)))
  };
}

/**
 * Rows kept for the value-by-value fallback. Inexact results keep theirs at
 * any size: their hash can differ from an equivalent result's.
 */
export function retainedRows(canon: CanonicalResult, limit: number): Row[] | undefined {
  return canon.inexact || canon.rows.length <= limit ? canon.rows : undefined;
}
