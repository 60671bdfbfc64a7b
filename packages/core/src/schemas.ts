// packages/core/src/schemas.ts
import { z } from 'zod';

export const DialectEnum = z.enum(['mysql']);

// Body of POST /optimize (and the CLI's --json input)
export const OptimizeBodySchema = z.object({
  sql: z.string().trim().min(1, 'sql is required').max(100_000),
  database: z.string().trim().toLowerCase().default('mysql'),
  options: z.object({
    max_attempts: z.number().int().positive().max(10).optional(),
    min_speedup: z.number().gt(1).optional()
  }).strict().optional()
}).strict();
export type OptimizeBody = z.infer<typeof OptimizeBodySchema>;

// What a proposal source must hand back: exactly one candidate plus its rationale.
export const ProposalResponseSchema = z.object({
  candidate_sql: z.string().trim().min(1).optional(),
  candidate_index_ddl: z.string().trim().min(1).optional(),
  rationale: z.string().trim().min(1, 'rationale is required')
}).passthrough().superRefine((v, ctx) => {
  const n = Number(Boolean(v.candidate_sql)) + Number(Boolean(v.candidate_index_ddl));
  if (n !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'exactly one of candidate_sql or candidate_index_ddl must be provided'
    });
  }
});
export type ProposalResponse = z.infer<typeof ProposalResponseSchema>;

export function formatZodIssues(e: z.ZodError): Array<{ path: string; msg: string; code: string }> {
  return e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
}
