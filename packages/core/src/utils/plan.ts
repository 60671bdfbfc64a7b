import type { PlanStep } from '../types';

/** Base tables named in a plan; derived (<derived2>) and union (<union1,2>) pseudo tables are skipped. */
export function planTables(steps: readonly PlanStep[]): string[] {
  const out = new Set<string>();
  for (const s of steps) {
    if (s.table && !s.table.startsWith('<')) out.add(s.table);
  }
  return [...out];
}
