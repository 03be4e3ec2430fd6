import { EventEmitter } from "node:events";
import { PassThrough, Writable } from "node:stream";
import { encodeMessage } from "../protocol/stream-json.js";
import type { AgentChild, AgentLauncher, AgentLaunchOptions } from "../agents/types.js";

export interface FakeChildOptions {
  /** Every stdin write fails with EPIPE. */
  readonly brokenPipe?: boolean;
  readonly ignoreSigterm?: boolean;
  /** Each stdin write completes after this many milliseconds. */
  readonly writeDelayMs?: number;
  /** Called for each complete line written to stdin. */
  readonly onLine?: (line: string, child: FakeAgentChild) => void;
}

/** In-process stand-in for a `claude -p --input-format stream-json` child. */
export class FakeAgentChild extends EventEmitter implements AgentChild {
  readonly stdin: Writable;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  private exited = false;
  private partial = "";

  constructor(
    readonly pid: number,
    private readonly options: FakeChildOptions = {},
  ) {
    super();
    this.stdin = new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        if (this.options.brokenPipe) {
          callback(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));
          return;
        }
        this.partial += chunk.toString("utf8");
        const lines = this.partial.split("\n");
        this.partial = lines.pop() ?? "";
        for (const line of lines) {
          this.received.push(line);
          this.options.onLine?.(line, this);
        }
        if (this.options.writeDelayMs) {
          setTimeout(() => callback(), this.options.writeDelayMs);
        } else {
          callback();
        }
      },
    });
  }

  get hasExited(): boolean {
    return this.exited;
  }

  emitEvent(event: Record<string, unknown>): void {
    this.stdout.write(`${JSON.stringify(event)}\n`);
  }

  emitRaw(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  endOutput(): void {
    this.stdout.end();
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (this.exited) return false;
    if (signal === "SIGTERM" && this.options.ignoreSigterm) return true;
    setImmediate(() => this.exitWith(null, signal));
    return true;
  }

  exitWith(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    this.stdout.end();
    this.stderr.end();
    this.emit("exit", code, signal);
  }
}

export class FakeAgentLauncher implements AgentLauncher {
  readonly children: FakeAgentChild[] = [];
  readonly launches: AgentLaunchOptions[] = [];

  constructor(private readonly configure: (index: number) => FakeChildOptions = () => ({})) {}

  launch(options: AgentLaunchOptions): FakeAgentChild {
    const child = new FakeAgentChild(4000 + this.children.length, this.configure(this.children.length));
    this.children.push(child);
    this.launches.push(options);
    return child;
  }

  child(index: number): FakeAgentChild {
    const child = this.children[index];
    if (!child) throw new Error(`No fake agent child at index ${index}`);
    return child;
  }
}

/** Replies with the given events once the prompt arrives on stdin. */
export function replyTo(prompt: string, events: readonly Record<string, unknown>[]): (line: string, child: FakeAgentChild) => void {
  const expected = encodeMessage("user", prompt).trimEnd();
  return (line, child) => {
    if (line !== expected) return;
    for (const event of events) child.emitEvent(event);
  };
}

export function assistantEvent(...content: Record<string, unknown>[]): Record<string, unknown> {
  return { type: "assistant", message: { role: "assistant", content } };
}

export function resultEvent(result: string): Record<string, unknown> {
  return { type: "result", subtype: "success", result, is_error: false };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
