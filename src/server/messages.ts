import { z } from "zod";
import type { ToolCallRecord } from "../protocol/types.js";
import type { SpeechFormat } from "../speech/synthesizer.js";

const userMessageSchema = z.object({
  type: z.literal("user_message"),
  content: z.string().default(""),
});

const interruptSchema = z.object({
  type: z.literal("interrupt"),
  reason: z.string().default("user_stopped"),
});

const configUpdateSchema = z.object({
  type: z.literal("config_update"),
  config: z.record(z.unknown()).default({}),
});

const clientMessageSchema = z.discriminatedUnion("type", [userMessageSchema, interruptSchema, configUpdateSchema]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

const envelopeSchema = z.object({ type: z.unknown() }).passthrough();

export type ParsedClientMessage =
  | { readonly ok: true; readonly message: ClientMessage }
  | { readonly ok: false; readonly error: string };

/** Parses one text frame from the browser. */
export function parseClientMessage(data: string): ParsedClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return { ok: false, error: "Invalid JSON format" };
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, error: "Invalid JSON format" };
  }

  const parsed = clientMessageSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, message: parsed.data };
  }

  const { type } = envelope.data;
  if (type === "user_message" || type === "interrupt" || type === "config_update") {
    return { ok: false, error: `Invalid ${type} message` };
  }
  return { ok: false, error: `Unknown message type: ${String(type)}` };
}

export type ProcessingStatus = "thinking" | "complete" | "interrupted";

/** Messages tied to one request; the coordinator stamps them with its id. */
export type RequestMessage =
  | { readonly type: "processing"; readonly status: ProcessingStatus }
  | { readonly type: "error"; readonly message: string }
  | { readonly type: "text_block"; readonly content: string; readonly is_final: boolean }
  | { readonly type: "tool_use"; readonly tool: string; readonly input: Record<string, unknown>; readonly summary: string }
  | { readonly type: "tool_summary_update"; readonly tool: string; readonly input: Record<string, unknown>; readonly summary: string }
  | {
      readonly type: "tool_input_progress";
      readonly block_index: string;
      readonly partial_json: string;
      readonly current_input: Record<string, unknown>;
    }
  | { readonly type: "thinking"; readonly content: string }
  | { readonly type: "assistant_message"; readonly content: string; readonly tool_calls: readonly ToolCallRecord[] }
  | { readonly type: "audio_chunk"; readonly data: string; readonly format: SpeechFormat; readonly sequence: number }
  | { readonly type: "audio_end"; readonly chunks: number };

export interface SessionInfoMessage {
  readonly type: "session_info";
  readonly conversation_id: string;
  readonly working_dir: string;
  readonly permission_mode: string;
  readonly speech_enabled: boolean;
}

export type ServerMessage =
  | SessionInfoMessage
  | { readonly type: "config_updated"; readonly success: boolean }
  | { readonly type: "error"; readonly message: string }
  | (RequestMessage & { readonly request_id: string });

/** Where a connection's outbound messages go. */
export interface OutboundChannel {
  send(message: ServerMessage): void;
}
