// packages/llm/src/prompts.ts
import type { AttemptFeedback, Dialect, Diagnosis, ProposalInput, TableSchema } from '@shadowsql/core';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export function systemPrompt(dialect: Dialect): string {
  return [
    `You are a senior DBA optimizing slow ${dialect.toUpperCase()} queries.`,
    'Every candidate you return is executed against a shadow copy of the data and compared with the original:',
    'it is rejected unless it returns exactly the same rows (same columns, same row count, same values, same order when the original orders its result)',
    'and runs measurably faster.',
    '',
    'Propose ONE candidate per reply, either a rewritten SELECT or a single CREATE INDEX statement that speeds up the original query unchanged.',
    'Prefer rewrites; propose an index only when the plan shows the query cannot be fixed by rewriting it.',
    'Never change what the query means: keep NULL handling, duplicates, LIMIT and ORDER BY semantics intact.',
    '',
    'Reply with a JSON object and nothing else:',
    '{"candidate_sql": "<rewritten SELECT>", "rationale": "<why it is faster>"}',
    'or',
    '{"candidate_index_ddl": "CREATE INDEX <name> ON <table> (<columns>)", "rationale": "<why it helps>"}'
  ].join('\n');
}

function describeSchema(schema: TableSchema[]): string {
  if (schema.length === 0) return '(no schema information)';
  return schema.map((t) => {
    const cols = t.columns.map((c) => `${c.name} ${c.type}${c.nullable ? '' : ' NOT NULL'}`).join(', ');
    const idx = t.indexes.length
      ? t.indexes.map((i) => `${i.unique ? 'UNIQUE ' : ''}${i.name}(${i.columns.join(', ')})`).join('; ')
      : 'none';
    const rows = t.rowCount !== undefined ? ` ~${t.rowCount} rows` : '';
    return `- ${t.name}${rows}\n  columns: ${cols || '(unknown)'}\n  indexes: ${idx}`;
  }).join('\n');
}

function describePlan(diagnosis: Diagnosis): string {
  if (diagnosis.plan.steps.length === 0) return '(no plan)';
  return diagnosis.plan.steps.map((s) =>
    `id=${s.id ?? '-'} ${s.selectType} table=${s.table ?? '-'} type=${s.accessType ?? '-'} key=${s.key ?? '-'} rows=${s.rows ?? '-'}` +
    (s.extra.length ? ` extra=${s.extra.join('; ')}` : '')
  ).join('\n');
}

function describeFeedback(feedback: AttemptFeedback[]): string {
  return feedback.map((f) =>
    `Attempt ${f.attempt} was rejected (${f.kind}): ${f.message}` +
    (f.candidateSql ? `\n  candidate was: ${f.candidateSql}` : '')
  ).join('\n');
}

export function userPrompt(input: ProposalInput): string {
  const { diagnosis } = input;
  const parts = [
    'Original query:',
    input.originalSql,
    '',
    `Diagnosis: ${diagnosis.summary}`,
    ...diagnosis.issues.map((i) => `- [${i.tag}] ${i.detail}`),
    '',
    'Execution plan:',
    describePlan(diagnosis),
    '',
    'Schema:',
    describeSchema(diagnosis.schema)
  ];
  if (input.priorFeedback.length > 0) {
    parts.push(
      '',
      'Earlier candidates were rejected. Do not repeat them; address the reasons below.',
      describeFeedback(input.priorFeedback)
    );
  }
  parts.push('', `This is attempt ${input.attempt}.`);
  return parts.join('\n');
}

export function buildMessages(input: ProposalInput): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt(input.dialect) },
    { role: 'user', content: userPrompt(input) }
  ];
}
