import type { ContentBlock, Message } from '../providers/types.js';
import type { StoredMessage } from '../store/types.js';

function toBlocks(content: string | ContentBlock[]): ContentBlock[] {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

/**
 * Append a turn, merging it into the previous one when the roles match.
 * The provider requires strictly alternating roles.
 */
export function appendTurn(messages: Message[], turn: Message): Message[] {
  const last = messages[messages.length - 1];
  if (last && last.role === turn.role) {
    const merged: Message = { role: last.role, content: [...toBlocks(last.content), ...toBlocks(turn.content)] };
    return [...messages.slice(0, -1), merged];
  }
  return [...messages, turn];
}

/**
 * Provider turns for stored messages. Tool results travel as user turns.
 */
export function buildModelMessages(messages: StoredMessage[]): Message[] {
  let turns: Message[] = [];
  for (const message of messages) {
    const role = message.role === 'assistant' ? 'assistant' : 'user';
    turns = appendTurn(turns, { role, content: message.content });
  }
  return turns;
}
