// packages/core/src/utils/sql-guard.ts
// Lexical helpers only: no AST, just enough scanning to respect quotes and comments.
import { UnsafeSqlError } from '../errors';

type Mode = 'keep' | 'mask';

// Walk the text once; comments are dropped, string literals kept or emptied.
function scan(sql: string, literals: Mode): string {
  let out = '';
  let i = 0;
  const n = sql.length;
  while (i < n) {
    const c = sql[i];
    const next = sql[i + 1];

    if (c === '-' && next === '-' && (i + 2 >= n || /\s/.test(sql[i + 2]))) {
      while (i < n && sql[i] !== '\n') i++;
      out += ' ';
      continue;
    }
    if (c === '#') {
      while (i < n && sql[i] !== '\n') i++;
      out += ' ';
      continue;
    }
    if (c === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? n : end + 2;
      out += ' ';
      continue;
    }
    if (c === "'" || c === '"') {
      let j = i + 1;
      while (j < n) {
        if (sql[j] === '\\') { j += 2; continue; }
        if (sql[j] === c) {
          if (sql[j + 1] === c) { j += 2; continue; } // doubled quote
          break;
        }
        j++;
      }
      out += literals === 'keep' ? sql.slice(i, j + 1) : c + c;
      i = j + 1;
      continue;
    }
    if (c === '`') {
      const end = sql.indexOf('`', i + 1);
      const stop = end === -1 ? n : end + 1;
      out += sql.slice(i, stop);
      i = stop;
      continue;
    }
    out += c;
    i++;
  }
  return out;
}

export function stripComments(sql: string): string {
  return scan(sql, 'keep');
}

/** Comments removed and string literal contents emptied (`'abc'` → `''`). */
export function maskLiterals(sql: string): string {
  return scan(sql, 'mask');
}

/** Collapsed whitespace, no trailing semicolon. Used to spot candidates identical to the original. */
export function normalizeSql(sql: string): string {
  return stripComments(sql).replace(/\s+/g, ' ').trim().replace(/;\s*$/, '').trim();
}

function dropParenthesized(text: string): string {
  let prev = '';
  let cur = text;
  while (prev !== cur) {
    prev = cur;
    cur = cur.replace(/\([^()]*\)/g, ' ');
  }
  return cur;
}

/**
 * True when the statement orders its final result: an ORDER BY outside any
 * parentheses, so window specs and subquery orderings do not count.
 */
export function hasTopLevelOrderBy(sql: string): boolean {
  return /\border\s+by\b/i.test(dropParenthesized(maskLiterals(sql)));
}

export function leadingKeyword(sql: string): string {
  const m = maskLiterals(sql).trim().match(/^\(*\s*([a-zA-Z]+)/);
  return m ? m[1].toLowerCase() : '';
}

export function isMultiStatement(sql: string): boolean {
  const body = maskLiterals(sql).trim().replace(/;\s*$/, '');
  return body.includes(';');
}

export interface CreateIndexStatement {
  name: string;
  table: string;
  unique: boolean;
  columns: string[];
}

const CREATE_INDEX_RE =
  /^\s*create\s+(unique\s+)?index\s+`?([A-Za-z0-9_$]+)`?\s+on\s+`?([A-Za-z0-9_$]+)`?\s*\(([^;]*)\)\s*;?\s*$/i;

/** Recognizes `CREATE [UNIQUE] INDEX name ON table (cols)`; null for anything else. */
export function parseCreateIndex(ddl: string): CreateIndexStatement | null {
  const m = stripComments(ddl).replace(/\s+/g, ' ').match(CREATE_INDEX_RE);
  if (!m) return null;
  const columns = m[4]
    .split(',')
    .map((c) => c.trim().replace(/`/g, '').replace(/\s+(asc|desc)$/i, '').replace(/\(\d+\)$/, ''))
    .filter(Boolean);
  if (columns.length === 0) return null;
  return { name: m[2], table: m[3], unique: Boolean(m[1]), columns };
}

export const DEFAULT_FORBIDDEN_OPERATIONS = [
  'DROP', 'TRUNCATE', 'DELETE', 'UPDATE', 'INSERT', 'ALTER', 'GRANT', 'REVOKE',
  'CREATE', 'RENAME', 'LOCK', 'CALL', 'LOAD', 'HANDLER'
] as const;

const QUERY_KEYWORDS = new Set(['select', 'with']);

/**
 * Read-only gate for everything sent to the shadow database. Queries must be a
 * single SELECT/WITH statement; index proposals must be a plain CREATE INDEX.
 */
export class SqlGuard {
  private readonly forbidden: Array<{ op: string; re: RegExp }>;

  constructor(forbiddenOperations: readonly string[] = DEFAULT_FORBIDDEN_OPERATIONS) {
    this.forbidden = forbiddenOperations.map((op) => ({
      op: op.toUpperCase(),
      re: new RegExp(`\\b${op.trim().replace(/\s+/g, '\\s+')}\\b`, 'i')
    }));
  }

  checkQuery(sql: string): void {
    if (!sql || !sql.trim()) throw new UnsafeSqlError('SQL is empty');
    if (isMultiStatement(sql)) throw new UnsafeSqlError('multiple statements are not allowed');

    const kw = leadingKeyword(sql);
    if (!QUERY_KEYWORDS.has(kw)) {
      throw new UnsafeSqlError(`only SELECT statements can be verified (got ${kw ? kw.toUpperCase() : 'nothing'})`);
    }

    const masked = maskLiterals(sql);
    for (const { op, re } of this.forbidden) {
      if (re.test(masked)) throw new UnsafeSqlError(`forbidden operation detected: ${op}`);
    }
    if (/\binto\s+(outfile|dumpfile)\b/i.test(masked)) throw new UnsafeSqlError('SELECT ... INTO OUTFILE is not allowed');
  }

  checkIndexDdl(ddl: string): CreateIndexStatement {
    if (isMultiStatement(ddl)) throw new UnsafeSqlError('multiple statements are not allowed');
    const parsed = parseCreateIndex(ddl);
    if (!parsed) throw new UnsafeSqlError('index proposals must be a single CREATE [UNIQUE] INDEX <name> ON <table> (<columns>) statement');
    return parsed;
  }
}
