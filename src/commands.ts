import type { Orchestrator } from './agent/orchestrator.js';
import type { SignupDatabase } from './tools/db.js';

/** Sample rows shown by the `schema` command. */
export const SCHEMA_SAMPLE_ROWS = 5;

export interface CommandContext {
  orchestrator: Pick<Orchestrator, 'resetMemory'>;
  database: Pick<SignupDatabase, 'getSchema' | 'getSampleRows'>;
}

export type CommandResult =
  | { handled: false }
  | { handled: true; exit: boolean; output: string };

/**
 * Handles the shell's built-in commands (`exit`, `reset`, `schema`).
 * Anything else is left for the orchestrator as a question.
 */
export async function handleCommand(input: string, ctx: CommandContext): Promise<CommandResult> {
  switch (input.trim().toLowerCase()) {
    case 'exit':
      return { handled: true, exit: true, output: '\n👋 Goodbye!' };

    case 'reset':
      ctx.orchestrator.resetMemory();
      return { handled: true, exit: false, output: '\n🔄 Conversation memory cleared!' };

    case 'schema': {
      const schema = await ctx.database.getSchema();
      const sample = await ctx.database.getSampleRows(SCHEMA_SAMPLE_ROWS);
      return { handled: true, exit: false, output: `\n${schema}\n\n${sample}` };
    }

    default:
      return { handled: false };
  }
}

export const BANNER = `${'='.repeat(60)}
🤖 Natural Language Signup Agent
${'='.repeat(60)}

Ask questions about user signups!

Example questions:
  - How many users signed up?
  - Show me users from week 1
  - Who signed up in January?
  - List all active users
  - What's the email of Alice?

Commands:
  - Type 'exit' to quit
  - Type 'reset' to clear conversation memory
  - Type 'schema' to see database structure
`;
