import BetterSqlite3 from "better-sqlite3";
import { z } from "zod";
import type { ToolCallRecord } from "../protocol/types.js";
import type {
  Database,
  ConversationMessage,
  ConversationRepository,
  NewConversationMessage,
} from "./types.js";

export class SqliteDatabase implements Database {
  readonly db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma("journal_mode = WAL");
  }

  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        tool_calls TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_conversation_messages_conversation
        ON conversation_messages (conversation_id, id);
    `);
  }

  close(): void {
    this.db.close();
  }
}

const messageRowSchema = z.object({
  id: z.number().int(),
  conversation_id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  tool_calls: z.string(),
  created_at: z.string(),
});

const toolCallsSchema = z.array(
  z.object({
    name: z.string(),
    id: z.string().nullable(),
    input: z.record(z.unknown()),
  }),
);

const countRowSchema = z.object({ count: z.number().int() });

export class SqliteConversationRepository implements ConversationRepository {
  constructor(private readonly db: BetterSqlite3.Database) {}

  append(conversationId: string, message: NewConversationMessage): ConversationMessage {
    const stmt = this.db.prepare(
      "INSERT INTO conversation_messages (conversation_id, role, content, tool_calls) VALUES (?, ?, ?, ?) RETURNING *"
    );
    return this.mapMessage(stmt.get(conversationId, message.role, message.content, JSON.stringify(message.toolCalls)));
  }

  findByConversation(conversationId: string, limit?: number): ConversationMessage[] {
    const rows = limit === undefined
      ? this.db.prepare("SELECT * FROM conversation_messages WHERE conversation_id = ? ORDER BY id").all(conversationId)
      : this.db.prepare(`
          SELECT * FROM (
            SELECT * FROM conversation_messages WHERE conversation_id = ? ORDER BY id DESC LIMIT ?
          ) ORDER BY id
        `).all(conversationId, limit);
    return rows.map((r) => this.mapMessage(r));
  }

  countByConversation(conversationId: string): number {
    const row = this.db.prepare("SELECT COUNT(*) AS count FROM conversation_messages WHERE conversation_id = ?").get(conversationId);
    return countRowSchema.parse(row).count;
  }

  removeConversation(conversationId: string): number {
    const result = this.db.prepare("DELETE FROM conversation_messages WHERE conversation_id = ?").run(conversationId);
    return result.changes;
  }

  private mapMessage(raw: unknown): ConversationMessage {
    const row = messageRowSchema.parse(raw);
    return {
      id: row.id,
      conversationId: row.conversation_id,
      role: row.role,
      content: row.content,
      toolCalls: this.parseToolCalls(row.tool_calls),
      createdAt: row.created_at,
    };
  }

  private parseToolCalls(json: string): ToolCallRecord[] {
    try {
      const parsed = toolCallsSchema.safeParse(JSON.parse(json));
      return parsed.success ? parsed.data : [];
    } catch {
      return [];
    }
  }
}
