import pg from 'pg';
import type { Row } from '../types.js';
import { DEFAULT_TABLE } from '../config.js';
import { DatabaseError, errorMessage } from '../errors.js';
import { loadSchemaFromDB, formatSchemaForLLM, formatSampleRows } from './schema.js';

const { Client, types } = pg;

/**
 * BIGINT values such as COUNT(*) become numbers; values beyond the safe
 * integer range stay strings.
 */
export function parseBigInt(value: string): number | string {
  const parsed = parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : value;
}

// DATE (1082) stays a 'YYYY-MM-DD' string
types.setTypeParser(1082, (value: string) => value);
types.setTypeParser(20, parseBigInt);

/**
 * The signup store as seen by the agent.
 */
export interface SignupDatabase {
  setup(): Promise<void>;
  getSchema(): Promise<string>;
  execute(sql: string, params?: unknown[]): Promise<Row[]>;
  getSampleRows(limit: number): Promise<string>;
  close(): Promise<void>;
}

const SEED_ROWS: Array<[string, string, string, number, string]> = [
  ['Alice', 'alice@example.com', '2024-01-02', 1, 'active'],
  ['Bob', 'bob@example.com', '2024-01-05', 1, 'active'],
  ['Charlie', 'charlie@example.com', '2024-01-10', 2, 'active'],
  ['Diana', 'diana@example.com', '2024-01-15', 3, 'active'],
  ['Eve', 'eve@example.com', '2024-01-18', 3, 'active'],
  ['Frank', 'frank@example.com', '2024-01-20', 3, 'inactive'],
];

export interface PgSignupDatabaseOptions {
  connectionString: string;
  statementTimeoutMs?: number;
}

/**
 * PostgreSQL-backed signup store.
 *
 * Every operation opens its own connection and ends it before returning, so no
 * connection is shared between calls. `close()` only marks the handle closed.
 */
export class PgSignupDatabase implements SignupDatabase {
  private closed = false;

  constructor(private readonly options: PgSignupDatabaseOptions) {}

  private async withClient<T>(fn: (client: pg.Client) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new DatabaseError('Database is closed');
    }

    const client = new Client({
      connectionString: this.options.connectionString,
      statement_timeout: this.options.statementTimeoutMs,
    });

    try {
      await client.connect();
      return await fn(client);
    } catch (error) {
      throw new DatabaseError(`Database error: ${errorMessage(error)}`, { cause: error });
    } finally {
      await client.end().catch((error: unknown) => {
        console.warn('⚠️  Failed to close database connection:', errorMessage(error));
      });
    }
  }

  /**
   * Creates the signups table if needed and seeds it when empty.
   */
  async setup(): Promise<void> {
    await this.withClient(async (client) => {
      await client.query(`
        CREATE TABLE IF NOT EXISTS ${DEFAULT_TABLE} (
          id SERIAL PRIMARY KEY,
          username TEXT NOT NULL,
          email TEXT,
          signup_date DATE NOT NULL,
          week_number INTEGER,
          status TEXT DEFAULT 'active'
        )
      `);

      const countResult = await client.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${DEFAULT_TABLE}`);
      if (countResult.rows[0]?.count !== 0) {
        return;
      }

      console.log('📊 Initializing database with sample data...');
      const placeholders = SEED_ROWS.map((_, i) => {
        const base = i * 5;
        return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`;
      }).join(', ');
      await client.query(
        `INSERT INTO ${DEFAULT_TABLE} (username, email, signup_date, week_number, status) VALUES ${placeholders}`,
        SEED_ROWS.flat()
      );
      console.log('✅ Sample data added!');
    });
  }

  async getSchema(): Promise<string> {
    const schema = await this.withClient(loadSchemaFromDB);
    return formatSchemaForLLM(schema);
  }

  async execute(sql: string, params: unknown[] = []): Promise<Row[]> {
    return this.withClient(async (client) => {
      const result = await client.query<Row>(sql, params);
      return result.rows;
    });
  }

  async getSampleRows(limit: number): Promise<string> {
    const rows = await this.execute(`SELECT * FROM ${DEFAULT_TABLE} LIMIT $1`, [limit]);
    return formatSampleRows(rows, limit);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
