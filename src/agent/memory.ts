import type { ConversationTurn, Memory } from '../types.js';

/**
 * Returns the last `count` turns, oldest first. Older turns are never read.
 */
export function recentTurns(memory: Memory, count: number): ConversationTurn[] {
  if (count <= 0) return [];
  return memory.slice(-count);
}

/**
 * Renders turns as `Q:`/`A:` pairs under a header, or an empty string when
 * there is nothing to render.
 */
export function formatConversationContext(turns: readonly ConversationTurn[], header: string): string {
  if (turns.length === 0) {
    return '';
  }
  return `${header}\n` + turns.map(turn => `Q: ${turn.question}\nA: ${turn.answer}`).join('\n');
}

export function appendTurn(memory: Memory, turn: ConversationTurn): Memory {
  return [...memory, turn];
}
