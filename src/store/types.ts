import type { ContentBlock } from '../providers/types.js';

/**
 * `user` messages are inbound and consumed by the cursor. `assistant` and
 * `tool_result` messages are replies written by a committed run.
 */
export type MessageRole = 'user' | 'assistant' | 'tool_result';

export type MessageContent = string | ContentBlock[];

export interface StoredMessage {
  agentId: string;
  seq: number;
  role: MessageRole;
  content: MessageContent;
  /** Cursor of the commit that produced this reply; null for inbound messages */
  replyTo: number | null;
  createdAt: number;
}

export interface ReplyMessage {
  role: 'assistant' | 'tool_result';
  content: ContentBlock[];
}

export interface AgentState {
  agentId: string;
  /** Highest inbound seq incorporated into a committed exchange */
  cursor: number;
  sessionId: string | null;
  updatedAt: number | null;
}

export interface CursorCommit {
  agentId: string;
  /** Cursor the run started from; the commit fails if it moved */
  expectedCursor: number;
  cursor: number;
  sessionId: string | null;
  replies: ReplyMessage[];
}

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface TaskError {
  kind: string;
  message: string;
}

export interface TaskRecord {
  id: string;
  parentId: string | null;
  rootId: string;
  agentId: string | null;
  objective: string;
  status: TaskStatus;
  result: string | null;
  caveats: string[];
  error: TaskError | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
}

export interface NewTask {
  objective: string;
  parentId?: string | null;
  agentId?: string | null;
  status?: 'pending' | 'running';
}

export interface TaskUpdate {
  agentId?: string;
  result?: string;
  caveats?: string[];
  error?: TaskError;
}

export interface TaskNode extends TaskRecord {
  children: TaskNode[];
}

/**
 * Durable storage for agent conversations, cursors and the task tree.
 * `commitCursor` is the only operation that advances an agent.
 */
export interface AgentStore {
  /** Append an inbound message and return it with its allocated seq */
  appendMessage(agentId: string, content: string): Promise<StoredMessage>;
  /** Inbound messages with seq > cursor, in seq order */
  readMessagesSince(agentId: string, cursor: number): Promise<StoredMessage[]>;
  /** Committed conversation up to `cursor`, in conversation order */
  readHistory(agentId: string, cursor: number): Promise<StoredMessage[]>;
  /** Every stored message for an agent, in conversation order */
  listMessages(agentId: string): Promise<StoredMessage[]>;
  getAgentState(agentId: string): Promise<AgentState>;
  /** Atomically advance the cursor and write the run's replies */
  commitCursor(commit: CursorCommit): Promise<AgentState>;

  createTask(task: NewTask): Promise<TaskRecord>;
  getTask(taskId: string): Promise<TaskRecord | undefined>;
  updateTaskStatus(taskId: string, status: TaskStatus, update?: TaskUpdate): Promise<TaskRecord>;
  /** The task and all of its descendants */
  getTaskTree(taskId: string): Promise<TaskNode | undefined>;
  listRootTasks(limit?: number): Promise<TaskRecord[]>;

  close(): void;
}
