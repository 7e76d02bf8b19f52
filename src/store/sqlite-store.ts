/**
 * SQLite-backed AgentStore
 *
 * - Per-agent append-only message log with gap-free sequence numbers
 * - One cursor row per agent, advanced only inside commitCursor's transaction
 * - Task tree with guarded status transitions
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type {
  AgentState,
  AgentStore,
  CursorCommit,
  MessageContent,
  NewTask,
  StoredMessage,
  TaskNode,
  TaskRecord,
  TaskStatus,
  TaskUpdate,
} from './types.js';
import { CursorConflictError, InvalidTransitionError, TaskNotFoundError } from './errors.js';
import { canTransition, isTerminal } from './task-transitions.js';

const contentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('tool_use'), id: z.string(), name: z.string(), input: z.record(z.unknown()) }),
  z.object({
    type: z.literal('tool_result'),
    tool_use_id: z.string(),
    content: z.string(),
    is_error: z.boolean().optional(),
  }),
]);

const messageContentSchema = z.union([z.string(), z.array(contentBlockSchema)]);
const messageRoleSchema = z.enum(['user', 'assistant', 'tool_result']);
const taskStatusSchema = z.enum(['pending', 'running', 'succeeded', 'failed', 'cancelled']);
const caveatsSchema = z.array(z.string());

interface MessageRow {
  agent_id: string;
  seq: number;
  role: string;
  content: string;
  reply_to: number | null;
  created_at: number;
}

interface AgentStateRow {
  agent_id: string;
  cursor: number;
  session_id: string | null;
  updated_at: number;
}

interface TaskRow {
  id: string;
  parent_id: string | null;
  root_id: string;
  agent_id: string | null;
  objective: string;
  status: string;
  result: string | null;
  caveats: string;
  error_kind: string | null;
  error_message: string | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
}

// Replies sort right after the inbound message they answer
const CONVERSATION_ORDER = 'ORDER BY COALESCE(reply_to, seq), seq';

export class SqliteAgentStore implements AgentStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS agent_state (
        agent_id TEXT PRIMARY KEY,
        cursor INTEGER NOT NULL DEFAULT 0,
        session_id TEXT,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        agent_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        reply_to INTEGER,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (agent_id, seq)
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        parent_id TEXT REFERENCES tasks(id),
        root_id TEXT NOT NULL,
        agent_id TEXT,
        objective TEXT NOT NULL,
        status TEXT NOT NULL,
        result TEXT,
        caveats TEXT NOT NULL DEFAULT '[]',
        error_kind TEXT,
        error_message TEXT,
        created_at INTEGER NOT NULL,
        started_at INTEGER,
        completed_at INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_parent ON tasks(parent_id);
      CREATE INDEX IF NOT EXISTS idx_tasks_root ON tasks(root_id);
    `);
  }

  // ============ Messages ============

  async appendMessage(agentId: string, content: string): Promise<StoredMessage> {
    const append = this.db.transaction((): StoredMessage => {
      const seq = this.nextSeq(agentId);
      const createdAt = Date.now();
      this.db
        .prepare<[string, number, string, string, number]>(
          'INSERT INTO messages (agent_id, seq, role, content, reply_to, created_at) VALUES (?, ?, ?, ?, NULL, ?)'
        )
        .run(agentId, seq, 'user', JSON.stringify(content), createdAt);
      return { agentId, seq, role: 'user', content, replyTo: null, createdAt };
    });
    return append();
  }

  async readMessagesSince(agentId: string, cursor: number): Promise<StoredMessage[]> {
    const rows = this.db
      .prepare<[string, number], MessageRow>(
        "SELECT * FROM messages WHERE agent_id = ? AND role = 'user' AND seq > ? ORDER BY seq"
      )
      .all(agentId, cursor);
    return rows.map((row) => this.rowToMessage(row));
  }

  async readHistory(agentId: string, cursor: number): Promise<StoredMessage[]> {
    const rows = this.db
      .prepare<[string, number], MessageRow>(
        `SELECT * FROM messages WHERE agent_id = ? AND (role != 'user' OR seq <= ?) ${CONVERSATION_ORDER}`
      )
      .all(agentId, cursor);
    return rows.map((row) => this.rowToMessage(row));
  }

  async listMessages(agentId: string): Promise<StoredMessage[]> {
    const rows = this.db
      .prepare<[string], MessageRow>(`SELECT * FROM messages WHERE agent_id = ? ${CONVERSATION_ORDER}`)
      .all(agentId);
    return rows.map((row) => this.rowToMessage(row));
  }

  private nextSeq(agentId: string): number {
    const row = this.db
      .prepare<[string], { next: number }>('SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM messages WHERE agent_id = ?')
      .get(agentId);
    return row ? row.next : 1;
  }

  private rowToMessage(row: MessageRow): StoredMessage {
    const content: MessageContent = messageContentSchema.parse(JSON.parse(row.content));
    return {
      agentId: row.agent_id,
      seq: row.seq,
      role: messageRoleSchema.parse(row.role),
      content,
      replyTo: row.reply_to,
      createdAt: row.created_at,
    };
  }

  // ============ Cursor ============

  async getAgentState(agentId: string): Promise<AgentState> {
    return this.readState(agentId);
  }

  async commitCursor(commit: CursorCommit): Promise<AgentState> {
    const apply = this.db.transaction((c: CursorCommit): AgentState => {
      const current = this.readState(c.agentId);
      if (current.cursor !== c.expectedCursor) {
        throw new CursorConflictError(c.agentId, c.expectedCursor, current.cursor);
      }
      if (c.cursor < c.expectedCursor) {
        throw new RangeError(`Cursor for agent "${c.agentId}" cannot move backwards (${c.expectedCursor} -> ${c.cursor})`);
      }

      const now = Date.now();
      const insert = this.db.prepare<[string, number, string, string, number, number]>(
        'INSERT INTO messages (agent_id, seq, role, content, reply_to, created_at) VALUES (?, ?, ?, ?, ?, ?)'
      );
      let seq = this.nextSeq(c.agentId);
      for (const reply of c.replies) {
        insert.run(c.agentId, seq, reply.role, JSON.stringify(reply.content), c.cursor, now);
        seq++;
      }

      this.db
        .prepare<[string, number, string | null, number]>(
          `INSERT INTO agent_state (agent_id, cursor, session_id, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(agent_id) DO UPDATE SET
             cursor = excluded.cursor,
             session_id = excluded.session_id,
             updated_at = excluded.updated_at`
        )
        .run(c.agentId, c.cursor, c.sessionId, now);

      return { agentId: c.agentId, cursor: c.cursor, sessionId: c.sessionId, updatedAt: now };
    });

    return apply(commit);
  }

  private readState(agentId: string): AgentState {
    const row = this.db
      .prepare<[string], AgentStateRow>('SELECT * FROM agent_state WHERE agent_id = ?')
      .get(agentId);
    if (!row) {
      return { agentId, cursor: 0, sessionId: null, updatedAt: null };
    }
    return { agentId, cursor: row.cursor, sessionId: row.session_id, updatedAt: row.updated_at };
  }

  // ============ Tasks ============

  async createTask(task: NewTask): Promise<TaskRecord> {
    const id = nanoid();
    const now = Date.now();
    const status = task.status ?? 'pending';
    const parentId = task.parentId ?? null;

    let rootId = id;
    if (parentId) {
      const parent = this.readTask(parentId);
      if (!parent) {
        throw new TaskNotFoundError(parentId);
      }
      rootId = parent.root_id;
    }

    this.db
      .prepare<[string, string | null, string, string | null, string, string, number, number | null]>(
        `INSERT INTO tasks (id, parent_id, root_id, agent_id, objective, status, created_at, started_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(id, parentId, rootId, task.agentId ?? null, task.objective, status, now, status === 'running' ? now : null);

    const created = this.readTask(id);
    if (!created) {
      throw new TaskNotFoundError(id);
    }
    return this.rowToTask(created);
  }

  async getTask(taskId: string): Promise<TaskRecord | undefined> {
    const row = this.readTask(taskId);
    return row ? this.rowToTask(row) : undefined;
  }

  async updateTaskStatus(taskId: string, status: TaskStatus, update: TaskUpdate = {}): Promise<TaskRecord> {
    const apply = this.db.transaction((): TaskRecord => {
      const row = this.readTask(taskId);
      if (!row) {
        throw new TaskNotFoundError(taskId);
      }
      const current = this.rowToTask(row);

      if (!canTransition(current.status, status)) {
        throw new InvalidTransitionError(taskId, current.status, status);
      }

      if (status === 'succeeded') {
        const active = this.db
          .prepare<[string], { count: number }>(
            "SELECT COUNT(*) AS count FROM tasks WHERE parent_id = ? AND status IN ('pending', 'running')"
          )
          .get(taskId);
        if (active && active.count > 0) {
          throw new InvalidTransitionError(taskId, current.status, status, `${active.count} subtask(s) still active`);
        }
      }

      const now = Date.now();
      this.db
        .prepare<{
          id: string;
          status: string;
          agentId: string | null;
          result: string | null;
          caveats: string | null;
          errorKind: string | null;
          errorMessage: string | null;
          startedAt: number | null;
          completedAt: number | null;
        }>(
          `UPDATE tasks SET
             status = @status,
             agent_id = COALESCE(@agentId, agent_id),
             result = COALESCE(@result, result),
             caveats = COALESCE(@caveats, caveats),
             error_kind = COALESCE(@errorKind, error_kind),
             error_message = COALESCE(@errorMessage, error_message),
             started_at = COALESCE(started_at, @startedAt),
             completed_at = COALESCE(@completedAt, completed_at)
           WHERE id = @id`
        )
        .run({
          id: taskId,
          status,
          agentId: update.agentId ?? null,
          result: update.result ?? null,
          caveats: update.caveats ? JSON.stringify(update.caveats) : null,
          errorKind: update.error?.kind ?? null,
          errorMessage: update.error?.message ?? null,
          startedAt: status === 'running' ? now : null,
          completedAt: isTerminal(status) ? now : null,
        });

      const updated = this.readTask(taskId);
      if (!updated) {
        throw new TaskNotFoundError(taskId);
      }
      return this.rowToTask(updated);
    });

    return apply();
  }

  async getTaskTree(taskId: string): Promise<TaskNode | undefined> {
    const row = this.readTask(taskId);
    if (!row) return undefined;

    const rows = this.db
      .prepare<[string], TaskRow>('SELECT * FROM tasks WHERE root_id = ? ORDER BY created_at, rowid')
      .all(row.root_id);

    const nodes = new Map<string, TaskNode>();
    for (const r of rows) {
      nodes.set(r.id, { ...this.rowToTask(r), children: [] });
    }
    for (const node of nodes.values()) {
      if (node.parentId) {
        nodes.get(node.parentId)?.children.push(node);
      }
    }
    return nodes.get(taskId);
  }

  async listRootTasks(limit = 20): Promise<TaskRecord[]> {
    const rows = this.db
      .prepare<[number], TaskRow>('SELECT * FROM tasks WHERE parent_id IS NULL ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit);
    return rows.map((r) => this.rowToTask(r));
  }

  private readTask(taskId: string): TaskRow | undefined {
    return this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId);
  }

  private rowToTask(row: TaskRow): TaskRecord {
    return {
      id: row.id,
      parentId: row.parent_id,
      rootId: row.root_id,
      agentId: row.agent_id,
      objective: row.objective,
      status: taskStatusSchema.parse(row.status),
      result: row.result,
      caveats: caveatsSchema.parse(JSON.parse(row.caveats)),
      error: row.error_kind ? { kind: row.error_kind, message: row.error_message ?? '' } : null,
      createdAt: row.created_at,
      startedAt: row.started_at,
      completedAt: row.completed_at,
    };
  }

  close(): void {
    this.db.close();
  }
}
