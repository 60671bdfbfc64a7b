// apps/cli/src/format.ts
import type { OutcomeStatus, RequestOutcome, VerificationVerdict } from '@shadowsql/core';

export function exitCodeFor(status: OutcomeStatus): number {
  switch (status) {
    case 'accepted':
    case 'exhausted':
      return 0;
    case 'cancelled':
      return 130;
    default:
      return 1;
  }
}

const ms = (x: number) => `${x.toFixed(2)} ms`;

function describeVerdict(v: VerificationVerdict): string {
  if (v.accepted) return `accepted, speedup ${(v.speedupRatio ?? 0).toFixed(2)}x`;
  return `rejected (${v.rejectionKind ?? 'unknown'}): ${v.rejectionReason ?? ''}`;
}

function indent(text: string): string {
  return text.split('\n').map((l) => `  ${l}`).join('\n');
}

/** Plain-text report of one run, for terminals. */
export function formatOutcome(o: RequestOutcome): string {
  const lines: string[] = [
    `request:   ${o.requestId}`,
    `status:    ${o.status}`
  ];
  if (o.diagnosis) lines.push(`diagnosis: ${o.diagnosis.summary}`);
  if (o.baseline) lines.push(`baseline:  ${ms(o.baseline.elapsedMs)} (${o.baseline.rowCount} rows)`);
  for (const v of o.verdicts) lines.push(`attempt ${v.attempt}: ${describeVerdict(v)}`);

  const rec = o.recommendation;
  if (o.status === 'accepted' && rec) {
    const ratio = (o.acceptedVerdict?.speedupRatio ?? 0).toFixed(2);
    lines.push(`result:    ${rec.kind} verified, ${ratio}x faster`);
    if (rec.indexDdl) lines.push(`index:     ${rec.indexDdl}`);
    lines.push('optimized sql:', indent(o.finalSql));
    lines.push(`rationale: ${rec.rationale}`);
  } else if (o.status === 'exhausted') {
    lines.push('result:    original query kept (no candidate verified)');
    if (o.exhaustionReason) lines.push(`last reason: ${o.exhaustionReason}`);
  }
  if (o.error) lines.push(`error:     ${o.error.code}: ${o.error.message}`);
  lines.push(`duration:  ${o.durationMs} ms`);
  return lines.join('\n');
}
