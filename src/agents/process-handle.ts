import { setTimeout as sleep } from "node:timers/promises";
import { createInterface } from "node:readline";
import type { Logger } from "../logger.js";
import { TransportError } from "./errors.js";
import { LineChannel } from "./line-channel.js";
import type { AgentChild } from "./types.js";

/**
 * Exclusive wrapper around one running agent process. Writes go to stdin as
 * whole lines; stdout is exposed as a {@link LineChannel}.
 */
export class AgentProcessHandle {
  readonly lines: LineChannel;
  private readonly exit: Promise<void>;
  private exited = false;
  private killed = false;

  constructor(
    private readonly child: AgentChild,
    private readonly logger: Logger,
  ) {
    this.lines = new LineChannel(child.stdout);

    this.exit = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        this.exited = true;
        this.logger.info({ pid: this.pid, exitCode: code, signal }, "Agent process exited");
        resolve();
      });
    });

    child.on("error", (err) => {
      this.logger.error({ pid: this.pid, error: err.message }, "Agent process error");
    });

    child.stdin.on("error", (err) => {
      this.logger.warn({ pid: this.pid, error: err.message }, "Agent stdin error");
    });

    createInterface({ input: child.stderr, crlfDelay: Infinity }).on("line", (line) => {
      if (line.trim()) {
        this.logger.debug({ pid: this.pid, stderr: line }, "Agent stderr");
      }
    });
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  get alive(): boolean {
    return !this.exited && !this.killed;
  }

  write(line: string): Promise<void> {
    const { stdin } = this.child;
    if (!this.alive || stdin.destroyed || !stdin.writable) {
      return Promise.reject(new TransportError("Agent process input is closed"));
    }

    return new Promise((resolve, reject) => {
      stdin.write(line, "utf8", (err) => {
        if (err) {
          reject(new TransportError(err.message, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /** Sends the signal; a process that has already exited is left alone. */
  kill(signal: NodeJS.Signals): void {
    if (this.exited) return;
    if (signal === "SIGKILL") this.killed = true;
    try {
      this.child.kill(signal);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ pid: this.pid, signal, error: message }, "Failed to signal agent process");
    }
  }

  /** Resolves true if the process exited within the timeout. */
  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) return true;

    const timer = new AbortController();
    try {
      return await Promise.race([
        this.exit.then(() => true),
        sleep(timeoutMs, false, { signal: timer.signal }),
      ]);
    } finally {
      timer.abort();
    }
  }
}
