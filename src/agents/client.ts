import type { Logger } from "../logger.js";
import { decodeLine, encodeMessage, parsePartialToolInput } from "../protocol/stream-json.js";
import type { StreamEvent, ToolCallRecord } from "../protocol/types.js";
import { RequestCancelledError, TransportError } from "./errors.js";
import { Mutex } from "./mutex.js";
import type { AgentProcessHandle } from "./process-handle.js";
import { placeholderSummary } from "./prompts.js";
import type { AgentProcessSupervisor } from "./supervisor.js";
import type {
  AgentCallbacks,
  AgentFailureReason,
  AgentOutcome,
  AgentRunner,
  ExecutionControl,
  HistoryEntry,
  ToolSummarizer,
} from "./types.js";

export const FAILURE_MESSAGES = {
  interrupted: "Request interrupted by user",
  cancelled: "Request cancelled by user",
  no_response: "No response received from Claude process",
  transport: "Failed to communicate with Claude process",
} as const satisfies Record<AgentFailureReason, string>;

export interface AgentProtocolClientDeps {
  readonly supervisor: AgentProcessSupervisor;
  readonly summarizer: ToolSummarizer;
  readonly logger: Logger;
}

type StopReason = "interrupted" | "cancelled";

/** How writing a turn ended: the prompt went out, or the request stopped first. */
type Delivery =
  | { readonly kind: "sent"; readonly handle: AgentProcessHandle }
  | { readonly kind: "stopped"; readonly handle: AgentProcessHandle; readonly reason: StopReason };

/** Mutable state of one executeStreaming call. */
class Turn {
  readonly toolCalls: ToolCallRecord[] = [];
  readonly sentTextBlocks = new Set<string>();
  result: string | null = null;

  constructor(
    readonly callbacks: AgentCallbacks,
    private readonly control: ExecutionControl,
  ) {}

  get signal(): AbortSignal | undefined {
    return this.control.signal;
  }

  stopReason(): StopReason | null {
    if (this.control.isInterrupted?.()) return "interrupted";
    if (this.control.signal?.aborted) return "cancelled";
    return null;
  }

  fail(reason: AgentFailureReason, detail?: string): AgentOutcome {
    return {
      success: false,
      reason,
      response: detail ? `${FAILURE_MESSAGES[reason]}: ${detail}` : FAILURE_MESSAGES[reason],
      toolCalls: [...this.toolCalls],
    };
  }
}

/**
 * Drives one long-lived agent process over stream-json. Calls are serialized;
 * each writes one prompt (after a history replay when the process is new) and
 * reads events until the turn's result line.
 */
export class AgentProtocolClient implements AgentRunner {
  private readonly sendLock = new Mutex();
  private readonly backgroundTasks = new Set<Promise<void>>();
  private readonly supervisor: AgentProcessSupervisor;
  private readonly summarizer: ToolSummarizer;
  private readonly logger: Logger;

  constructor(deps: AgentProtocolClientDeps) {
    this.supervisor = deps.supervisor;
    this.summarizer = deps.summarizer;
    this.logger = deps.logger.child({ component: "agent-client" });
  }

  executeStreaming(
    prompt: string,
    callbacks: AgentCallbacks,
    history: readonly HistoryEntry[],
    control: ExecutionControl = {},
  ): Promise<AgentOutcome> {
    return this.sendLock.runExclusive(() => this.run(prompt, new Turn(callbacks, control), history));
  }

  interruptAndRestart(): Promise<void> {
    return this.supervisor.killAndInvalidate();
  }

  /** Resolves once every in-flight tool summary has finished. */
  async settleBackgroundTasks(): Promise<void> {
    while (this.backgroundTasks.size > 0) {
      await Promise.allSettled([...this.backgroundTasks]);
    }
  }

  async cleanup(): Promise<void> {
    await this.settleBackgroundTasks();
    await this.supervisor.shutdown();
  }

  private async run(prompt: string, turn: Turn, history: readonly HistoryEntry[]): Promise<AgentOutcome> {
    const early = turn.stopReason();
    if (early) return turn.fail(early);

    let delivery: Delivery;
    try {
      delivery = await this.deliver(prompt, history, turn);
    } catch (err) {
      if (err instanceof TransportError) {
        this.logger.error({ error: err.message }, "Agent process unreachable after restart");
        return turn.fail("transport", err.message);
      }
      throw err;
    }

    const { handle } = delivery;
    if (delivery.kind === "stopped") {
      await this.abandon(handle, delivery.reason);
      return turn.fail(delivery.reason);
    }

    try {
      const stopped = await this.readUntilResult(handle, turn);
      if (stopped) {
        await this.abandon(handle, stopped);
        return turn.fail(stopped);
      }
    } catch (err) {
      if (err instanceof RequestCancelledError) {
        await this.abandon(handle, "cancelled");
        return turn.fail("cancelled");
      }
      throw err;
    }

    if (!turn.result) {
      this.logger.warn({ pid: handle.pid, toolCalls: turn.toolCalls.length }, "Agent produced no result");
      return turn.fail("no_response");
    }

    const response = turn.result;
    const alreadySentAsTextBlock = turn.sentTextBlocks.has(response.trim());
    if (alreadySentAsTextBlock) {
      const stopped = turn.stopReason();
      if (stopped) return turn.fail(stopped);
      await turn.callbacks.onTextBlock?.(response, true);
    }

    this.logger.info(
      { pid: handle.pid, responseLength: response.length, toolCalls: turn.toolCalls.length },
      "Agent turn complete",
    );
    return { success: true, response, toolCalls: [...turn.toolCalls], alreadySentAsTextBlock };
  }

  /**
   * Writes the turn, restarting and retrying once if the process input is
   * broken. A stop raised before the prompt is written ends delivery, and a
   * write that failed because the process was killed on purpose is not retried.
   */
  private async deliver(prompt: string, history: readonly HistoryEntry[], turn: Turn): Promise<Delivery> {
    const handle = await this.supervisor.ensureStarted();
    try {
      return await this.writeTurn(handle, prompt, history, turn);
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      const stopped = this.deliberateStop(handle, turn);
      if (stopped) return { kind: "stopped", handle, reason: stopped };
      this.logger.warn({ pid: handle.pid, error: err.message }, "Agent process input broken, restarting");
    }

    await this.supervisor.discard(handle);
    const stopped = turn.stopReason();
    if (stopped) return { kind: "stopped", handle, reason: stopped };

    const retry = await this.supervisor.ensureStarted();
    try {
      return await this.writeTurn(retry, prompt, history, turn);
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      const retryStopped = this.deliberateStop(retry, turn);
      if (retryStopped) return { kind: "stopped", handle: retry, reason: retryStopped };
      throw err;
    }
  }

  private async writeTurn(
    handle: AgentProcessHandle,
    prompt: string,
    history: readonly HistoryEntry[],
    turn: Turn,
  ): Promise<Delivery> {
    if (this.supervisor.needsHistoryReplay) {
      if (history.length > 0) {
        this.logger.info({ pid: handle.pid, entries: history.length }, "Replaying conversation history");
      }
      for (const entry of history) {
        const stopped = turn.stopReason();
        if (stopped) return { kind: "stopped", handle, reason: stopped };
        await handle.write(encodeMessage(entry.role, entry.content));
      }
      this.supervisor.markHistoryReplayed(handle);
    }

    const stopped = turn.stopReason();
    if (stopped) return { kind: "stopped", handle, reason: stopped };

    this.logger.debug({ pid: handle.pid, promptLength: prompt.length }, "Sending prompt");
    await handle.write(encodeMessage("user", prompt));
    return { kind: "sent", handle };
  }

  /** A handle the supervisor no longer holds was killed on purpose, not crashed. */
  private deliberateStop(handle: AgentProcessHandle, turn: Turn): StopReason | null {
    const stopped = turn.stopReason();
    if (stopped) return stopped;
    return this.supervisor.current === handle ? null : "interrupted";
  }

  /** Returns why reading stopped early, or null once a result arrived or output ended. */
  private async readUntilResult(handle: AgentProcessHandle, turn: Turn): Promise<StopReason | null> {
    while (turn.result === null) {
      let stopped = turn.stopReason();
      if (stopped) return stopped;

      const line = await handle.lines.next(turn.signal);
      stopped = turn.stopReason();
      if (stopped) return stopped;
      if (line === null) return null;

      const event = decodeLine(line);
      if (!event) continue;

      stopped = turn.stopReason();
      if (stopped) return stopped;

      await this.dispatch(event, turn);
    }
    return null;
  }

  private async dispatch(event: StreamEvent, turn: Turn): Promise<void> {
    const { callbacks } = turn;

    switch (event.kind) {
      case "system":
        return;

      case "assistant":
        for (const block of event.blocks) {
          if (turn.stopReason()) return;

          if (block.type === "text") {
            const text = block.text.trim();
            if (!text) continue;
            turn.sentTextBlocks.add(text);
            await callbacks.onTextBlock?.(text, false);
          } else {
            turn.toolCalls.push({ name: block.name, id: block.id, input: block.input });
            this.logger.info({ tool: block.name }, "Agent tool use");
            await callbacks.onToolUse?.(block.name, block.input, placeholderSummary(block.name));
            this.summarizeInBackground(block.name, block.input, turn);
          }
        }
        return;

      case "delta":
        if (event.delta.type === "input_json_delta") {
          const { partialJson } = event.delta;
          await callbacks.onToolInputProgress?.(event.index, partialJson, parsePartialToolInput(partialJson));
        } else if (event.delta.thinking) {
          await callbacks.onThinkingBlock?.(event.delta.thinking);
        }
        return;

      case "result":
        if (event.isError) {
          this.logger.warn({ result: event.text }, "Agent reported an error result");
        }
        turn.result = event.text;
        return;
    }
  }

  private summarizeInBackground(name: string, input: Record<string, unknown>, turn: Turn): void {
    const onUpdate = turn.callbacks.onToolSummaryUpdate;
    if (!onUpdate) return;

    const task: Promise<void> = this.summarizer
      .summarize(name, input)
      .then(async (summary) => {
        if (turn.stopReason()) {
          this.logger.debug({ tool: name }, "Dropping summary for a finished request");
          return;
        }
        await onUpdate(name, input, summary);
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn({ tool: name, error: message }, "Tool summary failed");
      })
      .finally(() => {
        this.backgroundTasks.delete(task);
      });

    this.backgroundTasks.add(task);
  }

  /** Unread output would bleed into the next turn, so a live process is dropped. */
  private async abandon(handle: AgentProcessHandle, reason: StopReason): Promise<void> {
    this.logger.info({ pid: handle.pid, reason }, "Agent turn stopped early");
    if (handle.alive) {
      await this.supervisor.discard(handle);
    }
  }
}
