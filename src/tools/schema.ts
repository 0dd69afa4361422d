import type { ClientBase } from 'pg';
import type { TableSchema, ColumnSchema, Row } from '../types.js';

export type InformationSchemaRow = {
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
};

const SCHEMA_QUERY = `
  SELECT
    t.table_name,
    c.column_name,
    c.data_type,
    c.is_nullable,
    c.column_default
  FROM information_schema.tables t
  JOIN information_schema.columns c ON t.table_name = c.table_name
    AND t.table_schema = c.table_schema
  WHERE t.table_schema = 'public'
    AND t.table_type = 'BASE TABLE'
  ORDER BY t.table_name, c.ordinal_position;
`;

/**
 * Groups information_schema rows into one TableSchema per table, keeping column order.
 */
export function buildTableSchemas(rows: readonly InformationSchemaRow[]): TableSchema[] {
  const schemaMap = new Map<string, TableSchema>();

  for (const row of rows) {
    let table = schemaMap.get(row.table_name);
    if (!table) {
      table = { tableName: row.table_name, columns: [] };
      schemaMap.set(row.table_name, table);
    }

    const column: ColumnSchema = {
      columnName: row.column_name,
      dataType: row.data_type,
      isNullable: row.is_nullable === 'YES',
      columnDefault: row.column_default || undefined,
    };

    table.columns.push(column);
  }

  return Array.from(schemaMap.values());
}

export async function loadSchemaFromDB(client: ClientBase): Promise<TableSchema[]> {
  const result = await client.query<InformationSchemaRow>(SCHEMA_QUERY);
  return buildTableSchemas(result.rows);
}

/**
 * Formats database schema into a compact text description for prompting.
 *
 * @example
 * ```typescript
 * formatSchemaForLLM(schema);
 * // Database Schema:
 * //
 * // Table: signups
 * // Columns:
 * //   - id: integer NOT NULL DEFAULT nextval('signups_id_seq'::regclass)
 * //   - username: text NOT NULL
 * ```
 */
export function formatSchemaForLLM(schema: readonly TableSchema[]): string {
  if (schema.length === 0) {
    return 'Database Schema:\n\nNo tables found.';
  }

  const parts: string[] = ['Database Schema:', ''];

  for (const table of schema) {
    parts.push(`Table: ${table.tableName}`);
    parts.push('Columns:');
    for (const col of table.columns) {
      const nullable = col.isNullable ? 'NULL' : 'NOT NULL';
      const defaultVal = col.columnDefault ? ` DEFAULT ${col.columnDefault}` : '';
      parts.push(`  - ${col.columnName}: ${col.dataType} ${nullable}${defaultVal}`);
    }
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}

export function formatSampleRows(rows: readonly Row[], limit: number): string {
  return `Sample data (first ${limit} rows):\n${JSON.stringify(rows, null, 2)}`;
}
