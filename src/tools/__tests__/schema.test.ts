import { describe, it, expect } from 'vitest';
import { buildTableSchemas, formatSchemaForLLM, formatSampleRows } from '../schema.js';
import type { InformationSchemaRow } from '../schema.js';

const rows: InformationSchemaRow[] = [
  { table_name: 'signups', column_name: 'id', data_type: 'integer', is_nullable: 'NO', column_default: "nextval('signups_id_seq'::regclass)" },
  { table_name: 'signups', column_name: 'username', data_type: 'text', is_nullable: 'NO', column_default: null },
  { table_name: 'signups', column_name: 'email', data_type: 'text', is_nullable: 'YES', column_default: null },
  { table_name: 'signups', column_name: 'status', data_type: 'text', is_nullable: 'YES', column_default: "'active'::text" },
];

describe('schema introspection', () => {
  it('groups columns by table in order', () => {
    const schema = buildTableSchemas(rows);
    expect(schema).toHaveLength(1);
    expect(schema[0].tableName).toBe('signups');
    expect(schema[0].columns.map(c => c.columnName)).toEqual(['id', 'username', 'email', 'status']);
    expect(schema[0].columns[2]).toEqual({ columnName: 'email', dataType: 'text', isNullable: true, columnDefault: undefined });
  });

  it('formats the schema for prompting', () => {
    expect(formatSchemaForLLM(buildTableSchemas(rows))).toBe(
      [
        'Database Schema:',
        '',
        'Table: signups',
        'Columns:',
        "  - id: integer NOT NULL DEFAULT nextval('signups_id_seq'::regclass)",
        '  - username: text NOT NULL',
        '  - email: text NULL',
        "  - status: text NULL DEFAULT 'active'::text",
      ].join('\n')
    );
  });

  it('reports an empty schema', () => {
    expect(formatSchemaForLLM([])).toBe('Database Schema:\n\nNo tables found.');
  });

  it('formats sample rows as indented JSON', () => {
    expect(formatSampleRows([{ id: 1, username: 'Alice' }], 1)).toBe(
      'Sample data (first 1 rows):\n[\n  {\n    "id": 1,\n    "username": "Alice"\n  }\n]'
    );
  });
});
