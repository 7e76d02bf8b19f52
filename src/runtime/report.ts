import type { AgentState, MessageContent, StoredMessage, TaskNode } from '../store/types.js';

function contentText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((block) => {
      switch (block.type) {
        case 'text':
          return block.text;
        case 'tool_use':
          return `[tool_use ${block.name} ${JSON.stringify(block.input)}]`;
        case 'tool_result':
          return `[tool_result${block.is_error ? ' error' : ''}] ${block.content}`;
      }
    })
    .join('\n');
}

/**
 * Indented one-line-per-task rendering of a task tree.
 */
export function formatTaskTree(node: TaskNode, depth = 0): string {
  const indent = '  '.repeat(depth);
  const agent = node.agentId ? ` @${node.agentId}` : '';
  const lines = [`${indent}[${node.status}] ${node.id} ${node.objective}${agent}`];
  if (node.error) {
    lines.push(`${indent}  error (${node.error.kind}): ${node.error.message}`);
  }
  for (const caveat of node.caveats) {
    lines.push(`${indent}  caveat: ${caveat}`);
  }
  for (const child of node.children) {
    lines.push(formatTaskTree(child, depth + 1));
  }
  return lines.join('\n');
}

/**
 * Conversation log with the committed cursor; inbound messages past the
 * cursor are marked pending.
 */
export function formatHistory(messages: StoredMessage[], state: AgentState): string {
  const lines = messages.map((message) => {
    const pending = message.role === 'user' && message.seq > state.cursor ? ' (pending)' : '';
    return `#${message.seq} ${message.role}${pending}: ${contentText(message.content)}`;
  });
  lines.push(`cursor: ${state.cursor}${state.sessionId ? `, session: ${state.sessionId}` : ''}`);
  return lines.join('\n');
}
