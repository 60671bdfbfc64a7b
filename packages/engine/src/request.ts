// packages/engine/src/request.ts
import { v4 as uuidv4 } from 'uuid';
import {
  SUPPORTED_DIALECTS,
  UnsupportedDialectError,
  type Dialect,
  type OptimizationRequest,
  type TableSchema
} from '@shadowsql/core';

export interface NewRequest {
  sql: string;
  database?: string;
  schemaContext?: TableSchema[];
  id?: string;
}

export function toDialect(name: string): Dialect {
  const d = SUPPORTED_DIALECTS.find((x) => x === name.trim().toLowerCase());
  if (!d) throw new UnsupportedDialectError(name);
  return d;
}

export function createRequest(input: NewRequest): OptimizationRequest {
  return Object.freeze({
    id: input.id ?? uuidv4(),
    sql: input.sql.trim(),
    dialect: toDialect(input.database ?? 'mysql'),
    ...(input.schemaContext ? { schemaContext: Object.freeze([...input.schemaContext]) } : {}),
    createdAt: new Date().toISOString()
  });
}
