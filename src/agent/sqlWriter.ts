import { z } from 'zod';
import type { Memory, QueryProposal } from '../types.js';
import type { CompletionService } from '../tools/completion.js';
import type { SignupDatabase } from '../tools/db.js';
import { DEFAULT_TABLE } from '../config.js';
import { recentTurns, formatConversationContext } from './memory.js';

export const DEFAULT_PROPOSAL: QueryProposal = {
  sqlQuery: `SELECT * FROM ${DEFAULT_TABLE} LIMIT 10`,
  intent: 'general_query',
  description: 'Default query',
};

const proposalSchema = z.object({
  sql_query: z.string().trim().min(1),
  intent: z.string().default('unknown'),
  description: z.string().default(''),
});

/**
 * Pulls a query proposal out of free-form model output.
 *
 * Takes the span from the first `{` to the last `}`; anything that does not
 * decode into an object with a non-empty `sql_query` yields DEFAULT_PROPOSAL.
 */
export function parseProposal(text: string): QueryProposal {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    return DEFAULT_PROPOSAL;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(match[0]);
  } catch {
    return DEFAULT_PROPOSAL;
  }

  const parsed = proposalSchema.safeParse(decoded);
  if (!parsed.success) {
    return DEFAULT_PROPOSAL;
  }

  // Trailing semicolons would otherwise stick to the table token in the guard
  const sqlQuery = parsed.data.sql_query.replace(/;+\s*$/, '').trim();
  if (!sqlQuery) {
    return DEFAULT_PROPOSAL;
  }

  return {
    sqlQuery,
    intent: parsed.data.intent,
    description: parsed.data.description,
  };
}

export interface SQLWriterOptions {
  memoryWindow: number;
  sampleRows: number;
}

export class SQLWriter {
  constructor(
    private readonly completion: CompletionService,
    private readonly database: SignupDatabase,
    private readonly options: SQLWriterOptions
  ) {}

  async generateProposal(question: string, memory: Memory, schemaText: string): Promise<QueryProposal> {
    const sampleData = await this.database.getSampleRows(this.options.sampleRows);
    const conversationContext = formatConversationContext(
      recentTurns(memory, this.options.memoryWindow),
      'Previous conversation:'
    );

    const prompt = `You are a SQL query generator. Convert natural language questions to SQL queries.

${schemaText}

${sampleData}

${conversationContext}

Current question: "${question}"

Generate a SQL query to answer this question. Consider:
- Use SELECT to retrieve data
- Use COUNT() for counting
- Use WHERE to filter (e.g., week_number, status, date ranges)
- Use GROUP BY for aggregations
- Only query the ${DEFAULT_TABLE} table

Respond with ONLY a valid JSON object:
{
    "sql_query": "SELECT username, email FROM ${DEFAULT_TABLE} WHERE week_number = 1",
    "intent": "list_users_by_week",
    "description": "Get users who signed up in week 1"
}

Do not include any text before or after the JSON.

JSON Response:`;

    const response = await this.completion.complete(prompt);
    return parseProposal(response.trim());
  }
}
