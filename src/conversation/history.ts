import type { Logger } from "../logger.js";
import type { ConversationMessage, ConversationRepository } from "../db/types.js";
import type { HistoryEntry } from "../agents/types.js";
import type { ToolCallRecord } from "../protocol/types.js";

/** What the coordinator needs from a conversation's history. */
export interface ConversationLog {
  readonly conversationId: string;
  snapshot(): HistoryEntry[];
  addUserMessage(content: string): void;
  addAssistantMessage(content: string, toolCalls?: readonly ToolCallRecord[]): void;
}

export interface ConversationSummary {
  readonly conversationId: string;
  readonly messageCount: number;
  readonly userMessages: number;
  readonly assistantMessages: number;
  readonly lastActivity: string | null;
}

/**
 * In-memory copy of one conversation, written through to the repository on
 * every append.
 */
export class StoredConversation implements ConversationLog {
  private messages: ConversationMessage[];
  private readonly logger: Logger;

  constructor(
    readonly conversationId: string,
    private readonly repository: ConversationRepository,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "conversation", conversationId });
    this.messages = repository.findByConversation(conversationId);
    this.logger.info({ messages: this.messages.length }, "Conversation loaded");
  }

  snapshot(): HistoryEntry[] {
    return this.messages.map(({ role, content }) => ({ role, content }));
  }

  addUserMessage(content: string): void {
    this.messages.push(this.repository.append(this.conversationId, { role: "user", content, toolCalls: [] }));
  }

  addAssistantMessage(content: string, toolCalls: readonly ToolCallRecord[] = []): void {
    this.messages.push(this.repository.append(this.conversationId, { role: "assistant", content, toolCalls }));
  }

  clear(): void {
    const removed = this.repository.removeConversation(this.conversationId);
    this.messages = [];
    this.logger.info({ removed }, "Conversation history cleared");
  }

  summary(): ConversationSummary {
    return {
      conversationId: this.conversationId,
      messageCount: this.messages.length,
      userMessages: this.messages.filter((m) => m.role === "user").length,
      assistantMessages: this.messages.filter((m) => m.role === "assistant").length,
      lastActivity: this.messages.at(-1)?.createdAt ?? null,
    };
  }
}
