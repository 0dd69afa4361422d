import { Decider } from './decider.js';
import { SQLWriter } from './sqlWriter.js';
import { Interpreter } from './interpreter.js';
import { validateSQL } from './guard.js';
import { recentTurns, formatConversationContext, appendTurn } from './memory.js';
import type {
  Memory,
  QueryOutcome,
  QueryFailure,
  QueryErrorKind,
  TurnState,
  DecideState,
  QueryDbState,
  AnswerState,
  DoneState,
} from '../types.js';
import type { CompletionService } from '../tools/completion.js';
import type { SignupDatabase } from '../tools/db.js';
import { DatabaseError, errorMessage } from '../errors.js';

/** Turns of memory the direct answer sees. */
export const ANSWER_MEMORY_WINDOW = 2;

export const SERVICE_FAILURE_ANSWER =
  "I'm sorry, I couldn't reach the language model to answer that. Please try again in a moment.";

export function unsafeQueryAnswer(allowedTables: readonly string[]): string {
  return (
    `I can only run read-only queries against the ${allowedTables.join(', ')} table. ` +
    'Could you rephrase your question?'
  );
}

export interface OrchestratorOptions {
  completion: CompletionService;
  database: SignupDatabase;
  allowedTables: string[];
  memoryWindow: number;
  sampleRowsForPrompt: number;
  maxResultRowsForLLM: number;
}

export interface TurnResult {
  answer: string;
  state: DoneState;
}

/**
 * Picks the node that follows DECIDE.
 */
export function routeAfterDecide(needsDb: boolean): 'QUERY_DB' | 'ANSWER' {
  return needsDb ? 'QUERY_DB' : 'ANSWER';
}

function failure(errorKind: QueryErrorKind, sqlQuery: string | null, answer: string): QueryFailure {
  return { status: 'error', errorKind, intent: 'error', sqlQuery, data: [], answer };
}

/**
 * Runs one question at a time through DECIDE → (QUERY_DB →) ANSWER → DONE and
 * owns the conversation memory shared between turns.
 */
export class Orchestrator {
  private decider: Decider;
  private sqlWriter: SQLWriter;
  private interpreter: Interpreter;
  private memory: Memory = [];

  constructor(private readonly options: OrchestratorOptions) {
    this.decider = new Decider(options.completion, options.memoryWindow);
    this.sqlWriter = new SQLWriter(options.completion, options.database, {
      memoryWindow: options.memoryWindow,
      sampleRows: options.sampleRowsForPrompt,
    });
    this.interpreter = new Interpreter(options.completion, options.maxResultRowsForLLM);
  }

  getMemory(): Memory {
    return this.memory;
  }

  resetMemory(): void {
    this.memory = [];
  }

  initializeState(question: string): DecideState {
    return { node: 'DECIDE', question, memory: this.memory };
  }

  /**
   * Advances a turn by exactly one node. DONE is terminal and returned as is.
   */
  async step(state: TurnState): Promise<TurnState> {
    switch (state.node) {
      case 'DECIDE':
        return this.decide(state);
      case 'QUERY_DB':
        return this.queryDatabase(state);
      case 'ANSWER':
        return this.answer(state);
      default:
        return state;
    }
  }

  /**
   * Answers one question and records it in memory. Never throws: every failure
   * ends up as the turn's answer.
   */
  async execute(question: string): Promise<TurnResult> {
    let state: TurnState = this.initializeState(question);

    for (;;) {
      if (state.node === 'DONE') {
        this.memory = state.memory;
        return { answer: state.answer, state };
      }
      state = await this.step(state);
    }
  }

  private async decide(state: DecideState): Promise<QueryDbState | AnswerState> {
    const { question, memory } = state;

    let needsDb: boolean;
    try {
      needsDb = await this.decider.needsDatabase(question, memory);
    } catch (error) {
      console.error(`❌ Decision failed: ${errorMessage(error)}`);
      return {
        node: 'ANSWER',
        question,
        memory,
        needsDb: false,
        result: failure('service_failure', null, SERVICE_FAILURE_ANSWER),
      };
    }

    if (routeAfterDecide(needsDb) === 'QUERY_DB') {
      return { node: 'QUERY_DB', question, memory, needsDb: true };
    }
    return { node: 'ANSWER', question, memory, needsDb: false };
  }

  private async queryDatabase(state: QueryDbState): Promise<AnswerState> {
    const result = await this.runQuery(state.question, state.memory);
    return { node: 'ANSWER', question: state.question, memory: state.memory, needsDb: true, result };
  }

  private async runQuery(question: string, memory: Memory): Promise<QueryOutcome> {
    let sqlQuery: string | null = null;

    try {
      const schemaText = await this.options.database.getSchema();
      const proposal = await this.sqlWriter.generateProposal(question, memory, schemaText);
      sqlQuery = proposal.sqlQuery;
      console.log(`🔍 Generated SQL: ${sqlQuery}`);

      const validation = validateSQL(sqlQuery, this.options.allowedTables);
      if (!validation.valid) {
        console.warn(`⚠️  Rejected unsafe SQL: ${validation.reason}`);
        return failure('unsafe_query', sqlQuery, unsafeQueryAnswer(this.options.allowedTables));
      }

      const data = await this.options.database.execute(sqlQuery);
      const answer = await this.interpreter.formatAnswer(question, proposal, data);

      return { status: 'success', intent: proposal.intent, sqlQuery, data, answer };
    } catch (error) {
      if (error instanceof DatabaseError) {
        console.error(`❌ ${error.message}`);
        return failure(
          'execution_failure',
          sqlQuery,
          `I encountered an error while querying the database: ${error.message}`
        );
      }
      console.error(`❌ Query failed: ${errorMessage(error)}`);
      return failure('service_failure', sqlQuery, SERVICE_FAILURE_ANSWER);
    }
  }

  private async answer(state: AnswerState): Promise<DoneState> {
    const { question, memory, needsDb, result } = state;

    const answer = result && result.answer
      ? result.answer
      : await this.answerDirectly(question, memory);

    return {
      node: 'DONE',
      question,
      memory: appendTurn(memory, { question, answer }),
      needsDb,
      result,
      answer,
    };
  }

  private async answerDirectly(question: string, memory: Memory): Promise<string> {
    const conversationContext = formatConversationContext(
      recentTurns(memory, ANSWER_MEMORY_WINDOW),
      'Previous context:'
    );

    const prompt = `${conversationContext}

Current question: "${question}"

Provide a helpful, natural, and conversational response.

Response:`;

    try {
      const response = await this.options.completion.complete(prompt);
      return response.trim();
    } catch (error) {
      console.error(`❌ Answer failed: ${errorMessage(error)}`);
      return SERVICE_FAILURE_ANSWER;
    }
  }
}
