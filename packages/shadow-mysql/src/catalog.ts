// packages/shadow-mysql/src/catalog.ts
// information_schema lookups through Kysely (typed query builder over the same pool)
import { Kysely, sql } from 'kysely';
import type { TableSchema } from '@shadowsql/core';

interface ColumnsTable {
  TABLE_SCHEMA: string;
  TABLE_NAME: string;
  COLUMN_NAME: string;
  COLUMN_TYPE: string;
  IS_NULLABLE: string;
  ORDINAL_POSITION: number;
}

interface StatisticsTable {
  TABLE_SCHEMA: string;
  TABLE_NAME: string;
  INDEX_NAME: string;
  COLUMN_NAME: string | null;
  SEQ_IN_INDEX: number;
  NON_UNIQUE: number;
}

interface TablesTable {
  TABLE_SCHEMA: string;
  TABLE_NAME: string;
  TABLE_TYPE: string;
  TABLE_ROWS: number | null;
  DATA_LENGTH: number | null;
  INDEX_LENGTH: number | null;
}

export interface CatalogDB {
  'information_schema.columns': ColumnsTable;
  'information_schema.statistics': StatisticsTable;
  'information_schema.tables': TablesTable;
}

export type ColumnRow = Pick<ColumnsTable, 'TABLE_NAME' | 'COLUMN_NAME' | 'COLUMN_TYPE' | 'IS_NULLABLE'>;
export type StatisticRow = Pick<StatisticsTable, 'TABLE_NAME' | 'INDEX_NAME' | 'COLUMN_NAME' | 'SEQ_IN_INDEX' | 'NON_UNIQUE'>;
export type TableRow = Pick<TablesTable, 'TABLE_NAME' | 'TABLE_ROWS' | 'DATA_LENGTH' | 'INDEX_LENGTH'>;

function optNumber(v: number | string | null | undefined): number | undefined {
  if (v === null || v === undefined) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

/** Folds the three catalog result sets into one TableSchema per requested table. */
export function assembleTableSchemas(
  tables: string[],
  columns: ColumnRow[],
  stats: StatisticRow[],
  sizes: TableRow[]
): TableSchema[] {
  const byName = new Map<string, TableSchema>();
  for (const t of tables) byName.set(t.toLowerCase(), { name: t, columns: [], indexes: [] });

  for (const c of columns) {
    const t = byName.get(c.TABLE_NAME.toLowerCase());
    if (t) t.columns.push({ name: c.COLUMN_NAME, type: c.COLUMN_TYPE, nullable: c.IS_NULLABLE === 'YES' });
  }

  const ordered = [...stats].sort((a, b) => Number(a.SEQ_IN_INDEX) - Number(b.SEQ_IN_INDEX));
  for (const s of ordered) {
    const t = byName.get(s.TABLE_NAME.toLowerCase());
    if (!t || !s.COLUMN_NAME) continue; // functional key parts have no column
    let idx = t.indexes.find((i) => i.name === s.INDEX_NAME);
    if (!idx) {
      idx = { name: s.INDEX_NAME, columns: [], unique: Number(s.NON_UNIQUE) === 0 };
      t.indexes.push(idx);
    }
    idx.columns.push(s.COLUMN_NAME);
  }

  for (const r of sizes) {
    const t = byName.get(r.TABLE_NAME.toLowerCase());
    if (!t) continue;
    t.rowCount = optNumber(r.TABLE_ROWS);
    t.dataBytes = optNumber(r.DATA_LENGTH);
    t.indexBytes = optNumber(r.INDEX_LENGTH);
  }

  // tables the catalog does not know (views, typos) come back empty rather than missing
  return tables.map((t) => byName.get(t.toLowerCase()) ?? { name: t, columns: [], indexes: [] });
}

export async function describeTables(db: Kysely<CatalogDB>, tables: string[]): Promise<TableSchema[]> {
  if (tables.length === 0) return [];
  const currentSchema = sql<string>`database()`;

  const [columns, stats, sizes] = await Promise.all([
    db.selectFrom('information_schema.columns')
      .select(['TABLE_NAME', 'COLUMN_NAME', 'COLUMN_TYPE', 'IS_NULLABLE'])
      .where('TABLE_SCHEMA', '=', currentSchema)
      .where('TABLE_NAME', 'in', tables)
      .orderBy('TABLE_NAME')
      .orderBy('ORDINAL_POSITION')
      .execute(),
    db.selectFrom('information_schema.statistics')
      .select(['TABLE_NAME', 'INDEX_NAME', 'COLUMN_NAME', 'SEQ_IN_INDEX', 'NON_UNIQUE'])
      .where('TABLE_SCHEMA', '=', currentSchema)
      .where('TABLE_NAME', 'in', tables)
      .execute(),
    db.selectFrom('information_schema.tables')
      .select(['TABLE_NAME', 'TABLE_ROWS', 'DATA_LENGTH', 'INDEX_LENGTH'])
      .where('TABLE_SCHEMA', '=', currentSchema)
      .where('TABLE_NAME', 'in', tables)
      .execute()
  ]);

  return assembleTableSchemas(tables, columns, stats, sizes);
}

export async function listBaseTables(db: Kysely<CatalogDB>): Promise<string[]> {
  const rows = await db.selectFrom('information_schema.tables')
    .select('TABLE_NAME')
    .where('TABLE_SCHEMA', '=', sql<string>`database()`)
    .where('TABLE_TYPE', '=', 'BASE TABLE')
    .orderBy('TABLE_NAME')
    .execute();
  return rows.map((r) => r.TABLE_NAME);
}
