import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { ServiceError, errorMessage } from '../errors.js';

/**
 * Turns a prompt into text. The only operation the agents need from a model.
 */
export interface CompletionService {
  complete(prompt: string): Promise<string>;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Builds the user-facing description of a failed completion call.
 */
export function describeServiceFailure(error: unknown): string {
  const status = statusOf(error);
  if (status === 503 || status === 429) {
    return (
      `Google Gemini API is currently overloaded. Please try again in a few minutes.\n\n` +
      `Suggestions:\n` +
      `  1. Wait 2-3 minutes and retry your question\n` +
      `  2. Switch to a less busy model with GEMINI_MODEL in .env`
    );
  }
  return `Completion request failed: ${errorMessage(error)}`;
}

export class GeminiCompletionService implements CompletionService {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName });
  }

  async complete(prompt: string): Promise<string> {
    try {
      const result = await this.model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      throw new ServiceError(describeServiceFailure(error), { cause: error });
    }
  }
}
