import { randomUUID } from "node:crypto";
import type { Logger } from "../logger.js";
import type { AgentCallbacks, AgentOutcome, AgentRunner, HistoryEntry } from "../agents/types.js";
import type { ToolCallRecord } from "../protocol/types.js";
import type { OutboundChannel, ProcessingStatus, RequestMessage, ServerMessage } from "../server/messages.js";
import type { SpeechResult, SpeechSynthesizer } from "../speech/synthesizer.js";
import type { ConversationLog } from "./history.js";

/** Base64 characters per audio_chunk frame; a multiple of 4 so each frame decodes alone. */
export const AUDIO_CHUNK_CHARS = 32 * 1024;

interface RequestContext {
  readonly requestId: string;
  readonly controller: AbortController;
  interrupted: boolean;
  /** Tail of the request's speech queue. */
  audio: Promise<void>;
  audioChunks: number;
}

export interface RequestCoordinatorDeps {
  readonly client: AgentRunner;
  readonly conversation: ConversationLog;
  readonly channel: OutboundChannel;
  readonly speech: SpeechSynthesizer | null;
  readonly logger: Logger;
  readonly createRequestId?: () => string;
}

/**
 * Runs at most one agent request per connection. Every message derived from a
 * request is delivered only while that request is still the current one.
 */
export class RequestCoordinator {
  private current: RequestContext | null = null;
  private readonly tasks = new Set<Promise<void>>();
  private readonly client: AgentRunner;
  private readonly conversation: ConversationLog;
  private readonly channel: OutboundChannel;
  private readonly speech: SpeechSynthesizer | null;
  private readonly createRequestId: () => string;
  private readonly logger: Logger;

  constructor(deps: RequestCoordinatorDeps) {
    this.client = deps.client;
    this.conversation = deps.conversation;
    this.channel = deps.channel;
    this.speech = deps.speech;
    this.createRequestId = deps.createRequestId ?? randomUUID;
    this.logger = deps.logger.child({ component: "coordinator", conversationId: deps.conversation.conversationId });
  }

  get currentRequestId(): string | null {
    return this.current?.requestId ?? null;
  }

  get isProcessing(): boolean {
    return this.current !== null;
  }

  /** Starts a request for the message; returns once it is running, not when it finishes. */
  async handleUserMessage(content: string): Promise<void> {
    if (!content.trim()) {
      this.deliver({ type: "error", message: "Empty message received" });
      return;
    }

    const previous = this.current;
    if (previous) {
      this.logger.info({ requestId: previous.requestId }, "New message supersedes active request");
      await this.interrupt(previous);
    }

    const history = this.conversation.snapshot();
    this.conversation.addUserMessage(content);

    const context: RequestContext = {
      requestId: this.createRequestId(),
      controller: new AbortController(),
      interrupted: false,
      audio: Promise.resolve(),
      audioChunks: 0,
    };
    this.current = context;
    this.logger.info({ requestId: context.requestId, historyLength: history.length }, "Request started");

    this.sendProcessing(context.requestId, "thinking");

    const task = this.run(context, content, history).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  async handleInterrupt(reason: string): Promise<void> {
    const context = this.current;
    if (!context) {
      this.logger.debug({ reason }, "Interrupt with no active request ignored");
      return;
    }

    this.logger.info({ requestId: context.requestId, reason }, "Interrupting request");
    await this.interrupt(context);
    this.deliver({ type: "processing", status: "interrupted", request_id: context.requestId });
  }

  /** Resolves once every request task has finished. */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  async dispose(): Promise<void> {
    if (this.current) {
      await this.interrupt(this.current);
    }
    await this.idle();
    await this.client.cleanup();
  }

  sendProcessing(requestId: string, status: ProcessingStatus): void {
    this.emit(requestId, { type: "processing", status });
  }

  sendError(requestId: string, message: string): void {
    this.emit(requestId, { type: "error", message });
  }

  sendTextBlock(requestId: string, content: string, isFinal: boolean): void {
    this.emit(requestId, { type: "text_block", content, is_final: isFinal });
  }

  sendToolUse(requestId: string, tool: string, input: Record<string, unknown>, summary: string): void {
    this.emit(requestId, { type: "tool_use", tool, input, summary });
  }

  sendToolSummaryUpdate(requestId: string, tool: string, input: Record<string, unknown>, summary: string): void {
    this.emit(requestId, { type: "tool_summary_update", tool, input, summary });
  }

  sendToolInputProgress(requestId: string, blockIndex: string, partialJson: string, currentInput: Record<string, unknown>): void {
    this.emit(requestId, {
      type: "tool_input_progress",
      block_index: blockIndex,
      partial_json: partialJson,
      current_input: currentInput,
    });
  }

  sendThinking(requestId: string, content: string): void {
    this.emit(requestId, { type: "thinking", content });
  }

  sendAssistantMessage(requestId: string, content: string, toolCalls: readonly ToolCallRecord[]): void {
    this.emit(requestId, { type: "assistant_message", content, tool_calls: toolCalls });
  }

  /** Synthesizes the text and sends it as base64 audio_chunk frames. Never rejects. */
  async streamSynthesizedAudio(requestId: string, text: string): Promise<void> {
    const context = this.current;
    if (!this.speech || !context || context.requestId !== requestId) return;

    let result: SpeechResult;
    try {
      result = await this.speech.synthesize(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ requestId, error: message }, "Speech synthesis failed");
      return;
    }

    const { audio, format } = result;
    const encoded = audio.toString("base64");
    for (let offset = 0; offset < encoded.length; offset += AUDIO_CHUNK_CHARS) {
      const sent = this.emit(requestId, {
        type: "audio_chunk",
        data: encoded.slice(offset, offset + AUDIO_CHUNK_CHARS),
        format,
        sequence: context.audioChunks,
      });
      if (!sent) return;
      context.audioChunks += 1;
    }
  }

  private async run(context: RequestContext, prompt: string, history: readonly HistoryEntry[]): Promise<void> {
    try {
      const outcome = await this.client.executeStreaming(prompt, this.callbacksFor(context), history, {
        isInterrupted: () => context.interrupted || this.current !== context,
        signal: context.controller.signal,
      });
      await this.finish(context, outcome);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ requestId: context.requestId, error: message }, "Request failed");
      this.sendError(context.requestId, `Error processing message: ${message}`);
    } finally {
      if (this.current === context) {
        this.current = null;
      }
    }
  }

  private callbacksFor(context: RequestContext): AgentCallbacks {
    const { requestId } = context;
    return {
      onToolUse: (tool, input, summary) => this.sendToolUse(requestId, tool, input, summary),
      onToolSummaryUpdate: (tool, input, summary) => this.sendToolSummaryUpdate(requestId, tool, input, summary),
      onTextBlock: (text, isFinal) => {
        this.sendTextBlock(requestId, text, isFinal);
        if (!isFinal) this.queueSpeech(context, text);
      },
      onToolInputProgress: (blockIndex, partialJson, currentInput) =>
        this.sendToolInputProgress(requestId, blockIndex, partialJson, currentInput),
      onThinkingBlock: (text) => this.sendThinking(requestId, text),
    };
  }

  private async finish(context: RequestContext, outcome: AgentOutcome): Promise<void> {
    const { requestId } = context;

    if (!outcome.success) {
      this.logger.info({ requestId, reason: outcome.reason, toolCalls: outcome.toolCalls.length }, "Request ended without a response");
      this.sendError(requestId, outcome.response);
      return;
    }

    if (this.current !== context) {
      this.logger.debug({ requestId }, "Dropping response of a superseded request");
      return;
    }

    this.conversation.addAssistantMessage(outcome.response, outcome.toolCalls);
    this.sendAssistantMessage(requestId, outcome.response, outcome.toolCalls);

    if (!outcome.alreadySentAsTextBlock) {
      this.queueSpeech(context, outcome.response);
    }
    await context.audio;
    if (context.audioChunks > 0) {
      this.emit(requestId, { type: "audio_end", chunks: context.audioChunks });
    }

    this.sendProcessing(requestId, "complete");
  }

  private queueSpeech(context: RequestContext, text: string): void {
    if (!this.speech) return;
    context.audio = context.audio.then(() => this.streamSynthesizedAudio(context.requestId, text));
  }

  private async interrupt(context: RequestContext): Promise<void> {
    context.interrupted = true;
    if (this.current === context) {
      this.current = null;
    }

    try {
      await this.client.interruptAndRestart();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ requestId: context.requestId, error: message }, "Failed to restart agent process");
    }

    context.controller.abort();
  }

  /** Delivers the message if the request is still current; returns whether it was sent. */
  private emit(requestId: string, message: RequestMessage): boolean {
    if (this.current?.requestId !== requestId) {
      this.logger.debug({ requestId, type: message.type, current: this.currentRequestId }, "Dropping stale message");
      return false;
    }
    return this.deliver({ ...message, request_id: requestId });
  }

  private deliver(message: ServerMessage): boolean {
    try {
      this.channel.send(message);
      return true;
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      this.logger.error({ type: message.type, error: errorMessage }, "Error sending message");
      return false;
    }
  }
}
