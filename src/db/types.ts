import type { ConversationRole, ToolCallRecord } from "../protocol/types.js";

export interface Database {
  initialize(): void;
  close(): void;
  readonly db: unknown;
}

export interface ConversationMessage {
  readonly id: number;
  readonly conversationId: string;
  readonly role: ConversationRole;
  readonly content: string;
  readonly toolCalls: readonly ToolCallRecord[];
  readonly createdAt: string;
}

export type NewConversationMessage = Pick<ConversationMessage, "role" | "content" | "toolCalls">;

export interface ConversationRepository {
  append(conversationId: string, message: NewConversationMessage): ConversationMessage;
  /** Oldest first; with a limit, only the most recent messages. */
  findByConversation(conversationId: string, limit?: number): ConversationMessage[];
  countByConversation(conversationId: string): number;
  /** Returns the number of messages deleted. */
  removeConversation(conversationId: string): number;
}
