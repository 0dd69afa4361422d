import type { QueryProposal, Row } from '../types.js';
import type { CompletionService } from '../tools/completion.js';

export const NO_DATA_ANSWER = "I couldn't find any data matching your question.";

/**
 * Turns query results into a conversational answer.
 */
export class Interpreter {
  constructor(
    private readonly completion: CompletionService,
    private readonly maxResultRows: number
  ) {}

  async formatAnswer(question: string, proposal: QueryProposal, rows: readonly Row[]): Promise<string> {
    // Nothing to describe; the model would only invent content
    if (rows.length === 0) {
      return NO_DATA_ANSWER;
    }

    const limitedRows = rows.slice(0, this.maxResultRows);

    const prompt = `Convert database query results into a natural, conversational answer.

Question: "${question}"
Query intent: ${proposal.intent}

Data retrieved:
${JSON.stringify(limitedRows, null, 2)}

Generate a natural language answer that:
- Directly answers the question
- Is conversational and friendly
- Includes relevant details from the data
- Uses appropriate formatting (lists for multiple items)

Answer:`;

    const response = await this.completion.complete(prompt);
    return response.trim();
  }
}
