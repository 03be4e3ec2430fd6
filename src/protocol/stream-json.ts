/**
 * Codec for the Claude CLI stream-json protocol: one JSON object per line in
 * both directions.
 */

import { z } from "zod";
import type { AssistantBlock, ContentDelta, ConversationRole, StreamEvent } from "./types.js";

const envelopeSchema = z.object({ type: z.string() }).passthrough();

const systemSchema = z.object({ subtype: z.string().optional() });

const assistantSchema = z.object({
  message: z.object({ content: z.array(z.unknown()) }),
});

const textBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

const toolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string().optional(),
  name: z.string().optional(),
  input: z.record(z.unknown()).optional(),
});

const contentBlockDeltaSchema = z.object({
  type: z.literal("content_block_delta"),
  index: z.union([z.number(), z.string()]).optional(),
  delta: z.object({
    type: z.string(),
    partial_json: z.string().optional(),
    thinking: z.string().optional(),
    text: z.string().optional(),
  }),
});

const streamEventSchema = z.object({ event: z.unknown() });

const resultSchema = z.object({
  result: z.string().optional(),
  is_error: z.boolean().optional(),
});

const inputObjectSchema = z.record(z.unknown());

/** Serialize one conversation turn as a newline-terminated stdin line. */
export function encodeMessage(role: ConversationRole, text: string): string {
  const envelope = {
    type: role,
    message: {
      role,
      content: [{ type: "text", text }],
    },
  };
  return `${JSON.stringify(envelope)}\n`;
}

/**
 * Decode one stdout line. Returns null for blank lines, malformed JSON and
 * event types the client does not act on.
 */
export function decodeLine(line: string): StreamEvent | null {
  const trimmed = line.trim();
  if (trimmed === "") return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) return null;

  switch (envelope.data.type) {
    case "system": {
      const system = systemSchema.safeParse(raw);
      return { kind: "system", subtype: system.success ? system.data.subtype ?? null : null };
    }
    case "assistant": {
      const assistant = assistantSchema.safeParse(raw);
      const items = assistant.success ? assistant.data.message.content : [];
      return { kind: "assistant", blocks: items.flatMap(decodeAssistantBlock) };
    }
    case "content_block_delta":
      return decodeDelta(raw);
    case "stream_event": {
      const wrapper = streamEventSchema.safeParse(raw);
      return wrapper.success ? decodeDelta(wrapper.data.event) : null;
    }
    case "result": {
      const result = resultSchema.safeParse(raw);
      if (!result.success) return null;
      return { kind: "result", text: result.data.result ?? "", isError: result.data.is_error ?? false };
    }
    default:
      return null;
  }
}

function decodeAssistantBlock(item: unknown): AssistantBlock[] {
  const text = textBlockSchema.safeParse(item);
  if (text.success) {
    return [{ type: "text", text: text.data.text }];
  }

  const toolUse = toolUseBlockSchema.safeParse(item);
  if (toolUse.success) {
    return [{
      type: "tool_use",
      id: toolUse.data.id ?? null,
      name: toolUse.data.name ?? "unknown",
      input: toolUse.data.input ?? {},
    }];
  }

  return [];
}

function decodeDelta(raw: unknown): StreamEvent | null {
  const parsed = contentBlockDeltaSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { delta } = parsed.data;
  const index = parsed.data.index === undefined ? "unknown" : String(parsed.data.index);
  let decoded: ContentDelta;

  if (delta.type === "input_json_delta") {
    decoded = { type: "input_json_delta", partialJson: delta.partial_json ?? "" };
  } else if (delta.type === "thinking_delta") {
    decoded = { type: "thinking_delta", thinking: delta.thinking ?? delta.text ?? "" };
  } else {
    return null;
  }

  return { kind: "delta", index, delta: decoded };
}

/**
 * Best-effort view of a tool input that is still streaming in. Closes the
 * fragment with a brace and falls back to an empty object; never authoritative.
 */
export function parsePartialToolInput(partialJson: string): Record<string, unknown> {
  try {
    const parsed = inputObjectSchema.safeParse(JSON.parse(`${partialJson}}`));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}
