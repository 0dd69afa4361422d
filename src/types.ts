/**
 * One result row, keyed by column name in the order the database returned them.
 */
export type Row = Record<string, unknown>;

export interface ConversationTurn {
  question: string;
  answer: string;
}

/**
 * Conversation memory, oldest turn first.
 */
export type Memory = readonly ConversationTurn[];

/**
 * A synthesized, not yet validated, SQL query plus its declared intent.
 */
export interface QueryProposal {
  sqlQuery: string;
  intent: string;
  description: string;
}

export type QueryErrorKind = 'unsafe_query' | 'execution_failure' | 'service_failure';

export interface QuerySuccess {
  status: 'success';
  intent: string;
  sqlQuery: string;
  data: Row[];
  answer: string;
}

export interface QueryFailure {
  status: 'error';
  errorKind: QueryErrorKind;
  intent: 'error';
  sqlQuery: string | null;
  data: Row[];
  answer: string;
}

export type QueryOutcome = QuerySuccess | QueryFailure;

export interface TableSchema {
  tableName: string;
  columns: ColumnSchema[];
}

export interface ColumnSchema {
  columnName: string;
  dataType: string;
  isNullable: boolean;
  columnDefault?: string;
}

// ============================================================================
// Turn state machine
// ============================================================================

export type TurnNode = 'DECIDE' | 'QUERY_DB' | 'ANSWER' | 'DONE';

export interface DecideState {
  node: 'DECIDE';
  question: string;
  memory: Memory;
}

export interface QueryDbState {
  node: 'QUERY_DB';
  question: string;
  memory: Memory;
  needsDb: true;
}

export interface AnswerState {
  node: 'ANSWER';
  question: string;
  memory: Memory;
  needsDb: boolean;
  result?: QueryOutcome;
}

/**
 * Terminal state. `memory` already holds the turn that was just answered.
 */
export interface DoneState {
  node: 'DONE';
  question: string;
  memory: Memory;
  needsDb: boolean;
  result?: QueryOutcome;
  answer: string;
}

export type TurnState = DecideState | QueryDbState | AnswerState | DoneState;

export interface Config {
  geminiApiKey: string;
  geminiModel: string;
  databaseUrl: string;
  allowedTables: string[];
  statementTimeoutMs: number;
  sampleRowsForPrompt: number;
  maxResultRowsForLLM: number;
  memoryWindow: number;
}
