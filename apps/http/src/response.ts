// apps/http/src/response.ts
// RequestOutcome -> snake_case wire shape of POST /optimize
import type { RequestOutcome } from '@shadowsql/core';

export interface OptimizeResponse {
  request_id: string;
  status: RequestOutcome['status'];
  optimized_sql: string;
  original_sql: string;
  verified: boolean;
  speedup_ratio: number | null;
  recommendation: { kind: 'rewrite' | 'index'; sql: string; index_ddl: string | null; rationale: string } | null;
  diagnosis: { summary: string; issues: Array<{ tag: string; table: string | null; column: string | null; detail: string }> } | null;
  attempts: Array<{
    attempt: number;
    accepted: boolean;
    semantic_match: boolean;
    speedup_ratio: number | null;
    rejection_kind: string | null;
    rejection_reason: string | null;
    baseline_ms: number;
    candidate_ms: number | null;
  }>;
  exhaustion_reason: string | null;
  duration_ms: number;
}

export function toOptimizeResponse(outcome: RequestOutcome): OptimizeResponse {
  const rec = outcome.recommendation;
  return {
    request_id: outcome.requestId,
    status: outcome.status,
    optimized_sql: outcome.finalSql,
    original_sql: outcome.originalSql,
    verified: outcome.status === 'accepted',
    speedup_ratio: outcome.acceptedVerdict?.speedupRatio ?? null,
    recommendation: rec ? { kind: rec.kind, sql: rec.sql, index_ddl: rec.indexDdl ?? null, rationale: rec.rationale } : null,
    diagnosis: outcome.diagnosis
      ? {
          summary: outcome.diagnosis.summary,
          issues: outcome.diagnosis.issues.map((i) => ({ tag: i.tag, table: i.table ?? null, column: i.column ?? null, detail: i.detail }))
        }
      : null,
    attempts: outcome.verdicts.map((v) => ({
      attempt: v.attempt,
      accepted: v.accepted,
      semantic_match: v.semanticMatch,
      speedup_ratio: v.speedupRatio,
      rejection_kind: v.rejectionKind,
      rejection_reason: v.rejectionReason,
      baseline_ms: v.evidence.baseline.elapsedMs,
      candidate_ms: v.evidence.candidate?.elapsedMs ?? null
    })),
    exhaustion_reason: outcome.exhaustionReason,
    duration_ms: outcome.durationMs
  };
}
