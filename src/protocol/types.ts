export type ConversationRole = "user" | "assistant";

export interface TextBlock {
  readonly type: "text";
  readonly text: string;
}

export interface ToolUseBlock {
  readonly type: "tool_use";
  readonly id: string | null;
  readonly name: string;
  readonly input: Record<string, unknown>;
}

export type AssistantBlock = TextBlock | ToolUseBlock;

export type ContentDelta =
  | { readonly type: "input_json_delta"; readonly partialJson: string }
  | { readonly type: "thinking_delta"; readonly thinking: string };

/** One decoded line of agent stdout. */
export type StreamEvent =
  | { readonly kind: "system"; readonly subtype: string | null }
  | { readonly kind: "assistant"; readonly blocks: readonly AssistantBlock[] }
  | { readonly kind: "delta"; readonly index: string; readonly delta: ContentDelta }
  | { readonly kind: "result"; readonly text: string; readonly isError: boolean };

export interface ToolCallRecord {
  readonly name: string;
  readonly id: string | null;
  readonly input: Record<string, unknown>;
}
