// packages/engine/src/equivalence.ts
import type { CellValue, Logger, Row, ShadowRunResult } from '@shadowsql/core';
import { canonicalValue, numbersClose, type Canonical } from './canonical';

export type MismatchKind = 'columns' | 'row_count' | 'content';

export interface EquivalenceResult {
  match: boolean;
  reason: string | null;
  kind: MismatchKind | null;
}

const MATCH: EquivalenceResult = { match: true, reason: null, kind: null };

function mismatch(kind: MismatchKind, reason: string): EquivalenceResult {
  return { match: false, reason, kind };
}

function sameCanonical(a: Canonical, b: Canonical, epsilon: number): boolean {
  if (typeof a === 'number' && typeof b === 'number') return numbersClose(a, b, epsilon);
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return a === b;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((x, i) => sameCanonical(x, b[i], epsilon));
  }
  const ka = Object.keys(a);
  const kb = Object.keys(b);
  if (ka.length !== kb.length) return false;
  return ka.every((k) => k in b && sameCanonical(a[k], b[k], epsilon));
}

function sameValue(a: CellValue | undefined, b: CellValue | undefined, epsilon: number): boolean {
  // exact canonical form; tolerance is applied here, not through the hash grid
  return sameCanonical(canonicalValue(a, 0), canonicalValue(b, 0), epsilon);
}

function firstDifference(columns: readonly string[], base: readonly Row[], cand: readonly Row[], epsilon: number): string | null {
  for (let i = 0; i < base.length; i++) {
    for (const c of columns) {
      if (!sameValue(base[i][c], cand[i][c], epsilon)) {
        return `row ${i + 1} differs in column ${c}: ${JSON.stringify(canonicalValue(cand[i][c], 0))} vs ${JSON.stringify(canonicalValue(base[i][c], 0))}`;
      }
    }
  }
  return null;
}

/**
 * Decides whether a candidate returned the same result as the baseline.
 * Equal hashes settle it; different hashes fall back to a value-by-value
 * comparison with float tolerance when both sides kept their rows.
 */
export function compareResults(baseline: ShadowRunResult, candidate: ShadowRunResult, epsilon: number, log?: Logger): EquivalenceResult {
  const countReason = `row count mismatch: ${candidate.rowCount} vs ${baseline.rowCount}`;

  if (baseline.resultHash === candidate.resultHash) {
    if (baseline.rowCount === candidate.rowCount) return MATCH;
    log?.error({ hash: baseline.resultHash, baselineRows: baseline.rowCount, candidateRows: candidate.rowCount }, 'equal result hashes with different row counts; treating as mismatch');
    return mismatch('row_count', countReason);
  }

  const baseCols = [...baseline.columns].sort();
  const candCols = [...candidate.columns].sort();
  if (baseCols.join('\u0000') !== candCols.join('\u0000')) {
    return mismatch('columns', `column mismatch: [${candCols.join(', ')}] vs [${baseCols.join(', ')}]`);
  }

  if (baseline.rowCount !== candidate.rowCount) return mismatch('row_count', countReason);

  if (!baseline.rows || !candidate.rows) {
    return mismatch('content', 'result content differs (hash mismatch on a result too large to compare row by row)');
  }

  const diff = firstDifference(baseCols, baseline.rows, candidate.rows, epsilon);
  return diff === null ? MATCH : mismatch('content', `result content differs: ${diff}`);
}
