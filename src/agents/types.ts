import type { Readable, Writable } from "node:stream";
import type { ConversationRole, ToolCallRecord } from "../protocol/types.js";

export interface AgentLaunchOptions {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env?: Record<string, string>;
}

/** The slice of a spawned child process the supervisor relies on. */
export interface AgentChild {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface AgentLauncher {
  launch(options: AgentLaunchOptions): AgentChild;
}

export interface HistoryEntry {
  readonly role: ConversationRole;
  readonly content: string;
}

type MaybePromise<T> = T | Promise<T>;

/** All optional; each fires in stream order except onToolSummaryUpdate. */
export interface AgentCallbacks {
  readonly onToolUse?: (name: string, input: Record<string, unknown>, summary: string) => MaybePromise<void>;
  /** Fires later than onToolUse, from a background task, and may race the main stream. */
  readonly onToolSummaryUpdate?: (name: string, input: Record<string, unknown>, summary: string) => MaybePromise<void>;
  readonly onTextBlock?: (text: string, isFinal: boolean) => MaybePromise<void>;
  /** currentInput is a best-effort parse of partialJson and may be empty. */
  readonly onToolInputProgress?: (blockIndex: string, partialJson: string, currentInput: Record<string, unknown>) => MaybePromise<void>;
  readonly onThinkingBlock?: (text: string) => MaybePromise<void>;
}

export interface ExecutionControl {
  readonly isInterrupted?: () => boolean;
  readonly signal?: AbortSignal;
}

export type AgentFailureReason = "interrupted" | "cancelled" | "no_response" | "transport";

export type AgentOutcome =
  | {
      readonly success: true;
      readonly response: string;
      readonly toolCalls: readonly ToolCallRecord[];
      readonly alreadySentAsTextBlock: boolean;
    }
  | {
      readonly success: false;
      readonly reason: AgentFailureReason;
      readonly response: string;
      readonly toolCalls: readonly ToolCallRecord[];
    };

export interface AgentRunner {
  executeStreaming(
    prompt: string,
    callbacks: AgentCallbacks,
    history: readonly HistoryEntry[],
    control?: ExecutionControl,
  ): Promise<AgentOutcome>;
  interruptAndRestart(): Promise<void>;
  cleanup(): Promise<void>;
}

export interface ToolSummarizer {
  summarize(name: string, input: Record<string, unknown>): Promise<string>;
}
