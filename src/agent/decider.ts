import type { Memory } from '../types.js';
import type { CompletionService } from '../tools/completion.js';
import { recentTurns, formatConversationContext } from './memory.js';

/**
 * Decides whether a question has to be answered from the signup database.
 */
export class Decider {
  constructor(
    private readonly completion: CompletionService,
    private readonly memoryWindow: number
  ) {}

  async needsDatabase(question: string, memory: Memory): Promise<boolean> {
    const conversationContext = formatConversationContext(
      recentTurns(memory, this.memoryWindow),
      'Recent conversation:'
    );

    const prompt = `You are analyzing if a question needs database access.

${conversationContext}

Current question: "${question}"

The database contains user signup information with:
- username, email, signup_date, week_number, status

Does this question require querying the database? Consider:
- Questions about users, signups, counts, dates, weeks need DB
- General questions, greetings, clarifications may not need DB
- Follow-up questions may reference previous answers

Answer ONLY with: YES or NO

Answer:`;

    const response = await this.completion.complete(prompt);
    // Any YES counts, even inside a longer or contradictory reply
    return response.trim().toUpperCase().includes('YES');
  }
}
