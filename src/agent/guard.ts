import { DEFAULT_TABLE } from '../config.js';

/**
 * Result of SQL validation.
 */
export interface ValidationResult {
  /** Whether the SQL passed all safety checks */
  valid: boolean;
  /** Reason for validation failure (only present if valid is false) */
  reason?: string;
}

const FORBIDDEN_KEYWORDS = ['DROP', 'DELETE', 'UPDATE', 'INSERT', 'ALTER'];

const TABLE_INTRODUCERS = new Set(['FROM', 'JOIN']);

/**
 * Validates a synthesized SQL query before it is allowed to reach the database.
 *
 * Checks, in order:
 * - The query starts with SELECT (case-insensitive, no trimming)
 * - No mutating keyword appears anywhere, even inside identifiers (DROPOUT is rejected)
 * - Every token after FROM or JOIN names an allow-listed table
 *
 * Matching is lexical. A FROM followed by a subquery or a schema-qualified
 * name is rejected, as is a table token with trailing punctuation.
 *
 * @param sql - Candidate SQL text
 * @param allowedTables - Table names the query may read, compared case-insensitively
 *
 * @example
 * ```typescript
 * validateSQL('SELECT COUNT(*) FROM signups'); // { valid: true }
 * validateSQL('SELECT * FROM users');          // { valid: false, reason: 'Table not allowed: USERS' }
 * ```
 */
export function validateSQL(
  sql: string,
  allowedTables: readonly string[] = [DEFAULT_TABLE]
): ValidationResult {
  const upper = sql.toUpperCase();

  if (!upper.startsWith('SELECT')) {
    return { valid: false, reason: 'Only SELECT statements are allowed' };
  }

  for (const keyword of FORBIDDEN_KEYWORDS) {
    if (upper.includes(keyword)) {
      return { valid: false, reason: `Forbidden keyword detected: ${keyword}` };
    }
  }

  const allowed = new Set(allowedTables.map(table => table.toLowerCase()));
  const tokens = upper.split(/\s+/).filter(token => token.length > 0);

  for (let i = 0; i < tokens.length; i++) {
    if (!TABLE_INTRODUCERS.has(tokens[i])) continue;

    const table = tokens[i + 1];
    if (table === undefined) {
      return { valid: false, reason: `Missing table name after ${tokens[i]}` };
    }
    if (!allowed.has(table.toLowerCase())) {
      return { valid: false, reason: `Table not allowed: ${table}` };
    }
  }

  return { valid: true };
}

export function isSafeSQL(sql: string, allowedTables?: readonly string[]): boolean {
  return validateSQL(sql, allowedTables).valid;
}
