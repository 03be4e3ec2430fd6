import { describe, it, expect, vi, beforeEach } from "vitest";
import { AUDIO_CHUNK_CHARS, RequestCoordinator } from "./coordinator.js";
import type { ConversationLog } from "./history.js";
import type { AgentCallbacks, AgentOutcome, AgentRunner, ExecutionControl, HistoryEntry } from "../agents/types.js";
import type { ToolCallRecord } from "../protocol/types.js";
import type { OutboundChannel, ServerMessage } from "../server/messages.js";
import type { SpeechSynthesizer } from "../speech/synthesizer.js";
import { createSilentLogger } from "../logger.js";

type Behaviour = (
  prompt: string,
  callbacks: AgentCallbacks,
  history: readonly HistoryEntry[],
  control: ExecutionControl,
) => Promise<AgentOutcome>;

class FakeRunner implements AgentRunner {
  readonly calls: Array<{ prompt: string; history: readonly HistoryEntry[] }> = [];
  readonly interruptAndRestart = vi.fn(async () => undefined);
  readonly cleanup = vi.fn(async () => undefined);

  constructor(private readonly behaviours: Behaviour[]) {}

  executeStreaming(
    prompt: string,
    callbacks: AgentCallbacks,
    history: readonly HistoryEntry[],
    control: ExecutionControl = {},
  ): Promise<AgentOutcome> {
    this.calls.push({ prompt, history });
    const behaviour = this.behaviours.shift();
    if (!behaviour) return Promise.reject(new Error(`Unexpected prompt: ${prompt}`));
    return behaviour(prompt, callbacks, history, control);
  }
}

class MemoryConversation implements ConversationLog {
  readonly conversationId = "c0ffe";
  readonly entries: Array<HistoryEntry & { toolCalls?: readonly ToolCallRecord[] }> = [];

  snapshot(): HistoryEntry[] {
    return this.entries.map(({ role, content }) => ({ role, content }));
  }

  addUserMessage(content: string): void {
    this.entries.push({ role: "user", content });
  }

  addAssistantMessage(content: string, toolCalls: readonly ToolCallRecord[] = []): void {
    this.entries.push({ role: "assistant", content, toolCalls });
  }
}

class RecordingChannel implements OutboundChannel {
  readonly sent: ServerMessage[] = [];

  send(message: ServerMessage): void {
    this.sent.push(message);
  }

  types(): string[] {
    return this.sent.map((m) => m.type);
  }

  forRequest(requestId: string): ServerMessage[] {
    return this.sent.filter((m) => "request_id" in m && m.request_id === requestId);
  }
}

const BASH_LS: ToolCallRecord = { name: "Bash", id: "toolu_1", input: { command: "ls" } };

function success(response: string, toolCalls: ToolCallRecord[] = [], alreadySentAsTextBlock = false): AgentOutcome {
  return { success: true, response, toolCalls, alreadySentAsTextBlock };
}

function interrupted(toolCalls: ToolCallRecord[] = []): AgentOutcome {
  return { success: false, reason: "interrupted", response: "Request interrupted by user", toolCalls };
}

function whenAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

describe("RequestCoordinator", () => {
  let conversation: MemoryConversation;
  let channel: RecordingChannel;
  let nextId: number;

  function createCoordinator(runner: AgentRunner, speech: SpeechSynthesizer | null = null): RequestCoordinator {
    return new RequestCoordinator({
      client: runner,
      conversation,
      channel,
      speech,
      logger: createSilentLogger(),
      createRequestId: () => `req-${++nextId}`,
    });
  }

  beforeEach(() => {
    conversation = new MemoryConversation();
    channel = new RecordingChannel();
    nextId = 0;
  });

  it("streams a request and records the exchange", async () => {
    const runner = new FakeRunner([
      async (_prompt, callbacks) => {
        await callbacks.onToolUse?.("Bash", { command: "ls" }, "Using Bash");
        await callbacks.onTextBlock?.("Looking now.", false);
        return success("Here are the files", [BASH_LS]);
      },
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("list files");
    await coordinator.idle();

    expect(channel.sent).toEqual([
      { type: "processing", status: "thinking", request_id: "req-1" },
      { type: "tool_use", tool: "Bash", input: { command: "ls" }, summary: "Using Bash", request_id: "req-1" },
      { type: "text_block", content: "Looking now.", is_final: false, request_id: "req-1" },
      { type: "assistant_message", content: "Here are the files", tool_calls: [BASH_LS], request_id: "req-1" },
      { type: "processing", status: "complete", request_id: "req-1" },
    ]);
    expect(conversation.entries).toEqual([
      { role: "user", content: "list files" },
      { role: "assistant", content: "Here are the files", toolCalls: [BASH_LS] },
    ]);
    expect(coordinator.isProcessing).toBe(false);
  });

  it("passes history without the message being sent", async () => {
    const runner = new FakeRunner([async () => success("one"), async () => success("two")]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("first");
    await coordinator.idle();
    await coordinator.handleUserMessage("second");
    await coordinator.idle();

    expect(runner.calls).toEqual([
      { prompt: "first", history: [] },
      {
        prompt: "second",
        history: [
          { role: "user", content: "first" },
          { role: "assistant", content: "one" },
        ],
      },
    ]);
  });

  it("forwards progress, thinking and summary updates", async () => {
    const runner = new FakeRunner([
      async (_prompt, callbacks) => {
        await callbacks.onThinkingBlock?.("Considering");
        await callbacks.onToolInputProgress?.("1", '{"command": "ls"', { command: "ls" });
        await callbacks.onToolSummaryUpdate?.("Bash", { command: "ls" }, "Listing files");
        await callbacks.onTextBlock?.("Done", false);
        await callbacks.onTextBlock?.("Done", true);
        return success("Done", [], true);
      },
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("go");
    await coordinator.idle();

    expect(channel.sent.slice(1, 6)).toEqual([
      { type: "thinking", content: "Considering", request_id: "req-1" },
      {
        type: "tool_input_progress",
        block_index: "1",
        partial_json: '{"command": "ls"',
        current_input: { command: "ls" },
        request_id: "req-1",
      },
      { type: "tool_summary_update", tool: "Bash", input: { command: "ls" }, summary: "Listing files", request_id: "req-1" },
      { type: "text_block", content: "Done", is_final: false, request_id: "req-1" },
      { type: "text_block", content: "Done", is_final: true, request_id: "req-1" },
    ]);
  });

  it("rejects an empty message", async () => {
    const runner = new FakeRunner([]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("   ");

    expect(channel.sent).toEqual([{ type: "error", message: "Empty message received" }]);
    expect(runner.calls).toHaveLength(0);
    expect(conversation.entries).toHaveLength(0);
  });

  it("reports a failed outcome as an error", async () => {
    const runner = new FakeRunner([
      async () => ({ success: false, reason: "no_response", response: "No response received from Claude process", toolCalls: [] }),
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("hello");
    await coordinator.idle();

    expect(channel.types()).toEqual(["processing", "error"]);
    expect(channel.sent[1]).toEqual({ type: "error", message: "No response received from Claude process", request_id: "req-1" });
    expect(conversation.entries).toEqual([{ role: "user", content: "hello" }]);
  });

  it("turns an exception into an error and returns to idle", async () => {
    const runner = new FakeRunner([async () => { throw new Error("boom"); }]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("hello");
    await coordinator.idle();

    expect(channel.sent[1]).toEqual({ type: "error", message: "Error processing message: boom", request_id: "req-1" });
    expect(coordinator.isProcessing).toBe(false);
  });

  it("interrupts the active request", async () => {
    let observed: (() => boolean) | undefined;
    const runner = new FakeRunner([
      async (_prompt, callbacks, _history, control) => {
        observed = control.isInterrupted;
        await whenAborted(control.signal);
        await callbacks.onTextBlock?.("too late", false);
        return interrupted();
      },
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("long task");
    expect(coordinator.currentRequestId).toBe("req-1");
    expect(observed?.()).toBe(false);

    await coordinator.handleInterrupt("user_stopped");
    await coordinator.idle();

    expect(observed?.()).toBe(true);
    expect(runner.interruptAndRestart).toHaveBeenCalledTimes(1);
    expect(channel.sent).toEqual([
      { type: "processing", status: "thinking", request_id: "req-1" },
      { type: "processing", status: "interrupted", request_id: "req-1" },
    ]);
    expect(coordinator.currentRequestId).toBeNull();
  });

  it("ignores an interrupt with no active request", async () => {
    const runner = new FakeRunner([]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleInterrupt("user_stopped");

    expect(runner.interruptAndRestart).not.toHaveBeenCalled();
    expect(channel.sent).toEqual([]);
  });

  it("treats a repeated interrupt as a no-op", async () => {
    const runner = new FakeRunner([
      async (_prompt, _callbacks, _history, control) => {
        await whenAborted(control.signal);
        return interrupted();
      },
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("long task");
    await coordinator.handleInterrupt("user_stopped");
    await coordinator.handleInterrupt("user_stopped");
    await coordinator.handleInterrupt("user_stopped");
    await coordinator.idle();

    expect(runner.interruptAndRestart).toHaveBeenCalledTimes(1);
    expect(channel.types()).toEqual(["processing", "processing"]);
  });

  it("never delivers output of a superseded request after the new one starts", async () => {
    let lateEmit: (() => Promise<void>) | undefined;
    const runner = new FakeRunner([
      async (_prompt, callbacks, _history, control) => {
        await callbacks.onTextBlock?.("first partial", false);
        lateEmit = async () => {
          await callbacks.onToolUse?.("Bash", { command: "ls" }, "Using Bash");
          await callbacks.onToolSummaryUpdate?.("Bash", { command: "ls" }, "Listing files");
          await callbacks.onTextBlock?.("first late", false);
        };
        await whenAborted(control.signal);
        return success("first answer");
      },
      async (_prompt, callbacks) => {
        await lateEmit?.();
        await callbacks.onTextBlock?.("second partial", false);
        return success("second answer");
      },
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("first");
    await coordinator.handleUserMessage("second");
    await coordinator.idle();
    await lateEmit?.();

    const firstReq2 = channel.sent.findIndex((m) => "request_id" in m && m.request_id === "req-2");
    const lastReq1 = channel.sent.map((m) => "request_id" in m && m.request_id === "req-1").lastIndexOf(true);
    expect(firstReq2).toBeGreaterThan(-1);
    expect(lastReq1).toBeLessThan(firstReq2);
    expect(channel.forRequest("req-1")).toEqual([
      { type: "processing", status: "thinking", request_id: "req-1" },
      { type: "text_block", content: "first partial", is_final: false, request_id: "req-1" },
    ]);
    expect(runner.interruptAndRestart).toHaveBeenCalledTimes(1);
    expect(conversation.entries).toEqual([
      { role: "user", content: "first" },
      { role: "user", content: "second" },
      { role: "assistant", content: "second answer", toolCalls: [] },
    ]);
  });

  it("keeps working after the channel throws", async () => {
    const runner = new FakeRunner([async () => success("ok")]);
    const failing: OutboundChannel = {
      send: () => {
        throw new Error("socket closed");
      },
    };
    const coordinator = new RequestCoordinator({
      client: runner,
      conversation,
      channel: failing,
      speech: null,
      logger: createSilentLogger(),
    });

    await coordinator.handleUserMessage("hello");
    await expect(coordinator.idle()).resolves.toBeUndefined();
    expect(conversation.entries.map((e) => e.content)).toEqual(["hello", "ok"]);
  });

  it("dispose interrupts the active request and cleans up the client", async () => {
    const runner = new FakeRunner([
      async (_prompt, _callbacks, _history, control) => {
        await whenAborted(control.signal);
        return interrupted();
      },
    ]);
    const coordinator = createCoordinator(runner);

    await coordinator.handleUserMessage("long task");
    await coordinator.dispose();

    expect(runner.interruptAndRestart).toHaveBeenCalledTimes(1);
    expect(runner.cleanup).toHaveBeenCalledTimes(1);
    expect(coordinator.isProcessing).toBe(false);
  });
});

describe("RequestCoordinator speech", () => {
  let channel: RecordingChannel;

  function createCoordinator(runner: AgentRunner, speech: SpeechSynthesizer): RequestCoordinator {
    return new RequestCoordinator({
      client: runner,
      conversation: new MemoryConversation(),
      channel,
      speech,
      logger: createSilentLogger(),
      createRequestId: () => "req-1",
    });
  }

  beforeEach(() => {
    channel = new RecordingChannel();
  });

  it("speaks text blocks in base64 chunks and ends the stream", async () => {
    const audio = Buffer.alloc(30000, 7);
    const synthesize = vi.fn(async () => ({ audio, format: "mp3" as const }));
    const runner = new FakeRunner([
      async (_prompt, callbacks) => {
        await callbacks.onTextBlock?.("Hello there", false);
        await callbacks.onTextBlock?.("Hello there", true);
        return success("Hello there", [], true);
      },
    ]);
    const coordinator = createCoordinator(runner, { synthesize });

    await coordinator.handleUserMessage("hi");
    await coordinator.idle();

    expect(synthesize).toHaveBeenCalledTimes(1);
    expect(synthesize).toHaveBeenCalledWith("Hello there");

    const chunks = channel.sent.flatMap((m) => (m.type === "audio_chunk" ? [m] : []));
    expect(chunks.map((c) => c.sequence)).toEqual([0, 1]);
    expect(chunks[0]?.data).toHaveLength(AUDIO_CHUNK_CHARS);
    expect(chunks.map((c) => c.data).join("")).toBe(audio.toString("base64"));
    expect(chunks.every((c) => c.format === "mp3")).toBe(true);

    expect(channel.types().slice(-2)).toEqual(["audio_end", "processing"]);
    expect(channel.sent.at(-2)).toEqual({ type: "audio_end", chunks: 2, request_id: "req-1" });
  });

  it("speaks the final response when no text block carried it", async () => {
    const synthesize = vi.fn(async () => ({ audio: Buffer.from("abc"), format: "mp3" as const }));
    const runner = new FakeRunner([async () => success("It is sunny.")]);
    const coordinator = createCoordinator(runner, { synthesize });

    await coordinator.handleUserMessage("weather?");
    await coordinator.idle();

    expect(synthesize).toHaveBeenCalledWith("It is sunny.");
    expect(channel.sent.find((m) => m.type === "audio_chunk")).toEqual({
      type: "audio_chunk",
      data: "YWJj",
      format: "mp3",
      sequence: 0,
      request_id: "req-1",
    });
  });

  it("completes without audio when synthesis fails", async () => {
    const synthesize = vi.fn(async () => {
      throw new Error("TTS synthesis failed: quota exceeded");
    });
    const runner = new FakeRunner([async () => success("It is sunny.")]);
    const coordinator = createCoordinator(runner, { synthesize });

    await coordinator.handleUserMessage("weather?");
    await coordinator.idle();

    expect(channel.types()).toEqual(["processing", "assistant_message", "processing"]);
  });
});
