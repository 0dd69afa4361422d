import dotenv from 'dotenv';
import type { Config } from './types.js';

dotenv.config();

export const DEFAULT_TABLE = 'signups';

function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable: ${name}`);
  }
  return parsed;
}

function getEnvList(name: string, defaultValue: string[]): string[] {
  const value = process.env[name];
  if (!value) return defaultValue;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : defaultValue;
}

export function loadConfig(): Config {
  // The store only creates and samples the signups table
  const allowedTables = getEnvList('ALLOWED_TABLES', [DEFAULT_TABLE]);
  if (!allowedTables.some(table => table.toLowerCase() === DEFAULT_TABLE)) {
    throw new Error(`ALLOWED_TABLES must include ${DEFAULT_TABLE}`);
  }

  return {
    geminiApiKey: getEnvVar('GEMINI_API_KEY'),
    geminiModel: process.env.GEMINI_MODEL || 'gemini-2.5-flash',
    databaseUrl: getEnvVar('DATABASE_URL'),
    allowedTables,
    statementTimeoutMs: getEnvNumber('STATEMENT_TIMEOUT_MS', 10000),
    sampleRowsForPrompt: getEnvNumber('SAMPLE_ROWS_FOR_PROMPT', 3),
    maxResultRowsForLLM: getEnvNumber('MAX_RESULT_ROWS_FOR_LLM', 10),
    memoryWindow: getEnvNumber('MEMORY_WINDOW', 3),
  };
}
