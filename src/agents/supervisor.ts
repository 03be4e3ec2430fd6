import { spawn } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger.js";
import type { ParleyConfig } from "../config.js";
import { Mutex } from "./mutex.js";
import { AgentProcessHandle } from "./process-handle.js";
import { VOICE_SYSTEM_PROMPT } from "./prompts.js";
import type { AgentChild, AgentLauncher, AgentLaunchOptions } from "./types.js";

export const spawnAgentProcess: AgentLauncher = {
  launch(options: AgentLaunchOptions): AgentChild {
    return spawn(options.command, [...options.args], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ["pipe", "pipe", "pipe"],
    });
  },
};

export interface SupervisorTimings {
  /** Pause after spawning before the first write. */
  readonly startupDelayMs: number;
  /** SIGTERM-to-SIGKILL grace when replacing a stale process. */
  readonly terminateGraceMs: number;
  /** How long to wait for a SIGKILLed process to report its exit. */
  readonly killWaitMs: number;
  readonly shutdownTimeoutMs: number;
}

export interface SupervisorDeps {
  readonly launcher: AgentLauncher;
  readonly launch: AgentLaunchOptions;
  readonly timings: SupervisorTimings;
  readonly logger: Logger;
}

export function buildLaunchOptions(
  config: Pick<ParleyConfig, "agentCommand" | "workingDirectory" | "allowedTools" | "permissionMode" | "includePartialMessages">,
  systemPrompt: string = VOICE_SYSTEM_PROMPT,
): AgentLaunchOptions {
  const args = [
    "-p",
    "--input-format", "stream-json",
    "--output-format", "stream-json",
    "--verbose",
  ];
  if (config.includePartialMessages) {
    args.push("--include-partial-messages");
  }
  args.push(
    "--allowedTools", config.allowedTools.join(" "),
    "--permission-mode", config.permissionMode,
    "--system-prompt", systemPrompt,
  );

  return { command: config.agentCommand, args, cwd: config.workingDirectory };
}

/**
 * Owns the single agent process of one conversation. Every replacement of the
 * process marks the conversation history as needing a replay.
 */
export class AgentProcessSupervisor {
  private handle: AgentProcessHandle | null = null;
  private replayPending = false;
  private readonly startLock = new Mutex();
  private readonly logger: Logger;

  constructor(private readonly deps: SupervisorDeps) {
    this.logger = deps.logger.child({ component: "agent-supervisor" });
  }

  get needsHistoryReplay(): boolean {
    return this.replayPending;
  }

  get current(): AgentProcessHandle | null {
    return this.handle;
  }

  /** Clears the replay flag, unless the handle was replaced or killed meanwhile. */
  markHistoryReplayed(handle: AgentProcessHandle): void {
    if (this.handle === handle) {
      this.replayPending = false;
    }
  }

  ensureStarted(): Promise<AgentProcessHandle> {
    return this.startLock.runExclusive(async () => {
      if (this.handle?.alive) {
        return this.handle;
      }

      if (this.handle) {
        this.logger.info({ pid: this.handle.pid }, "Replacing stale agent process");
        await this.terminate(this.handle, this.deps.timings.terminateGraceMs);
      }

      const { command, args, cwd } = this.deps.launch;
      this.logger.info({ command, cwd, argCount: args.length }, "Starting agent process");

      const handle = new AgentProcessHandle(this.deps.launcher.launch(this.deps.launch), this.logger);
      this.handle = handle;
      this.replayPending = true;

      if (this.deps.timings.startupDelayMs > 0) {
        await sleep(this.deps.timings.startupDelayMs);
      }

      this.logger.info({ pid: handle.pid }, "Agent process started");
      return handle;
    });
  }

  /** Crash path: drop a handle whose stdin failed so the next start replaces it. */
  discard(handle: AgentProcessHandle): Promise<void> {
    return this.startLock.runExclusive(async () => {
      handle.kill("SIGKILL");
      if (this.handle === handle) {
        this.handle = null;
        this.replayPending = true;
      }
      await handle.waitForExit(this.deps.timings.killWaitMs);
    });
  }

  killAndInvalidate(): Promise<void> {
    return this.startLock.runExclusive(async () => {
      const handle = this.handle;
      if (!handle) return;

      this.logger.info({ pid: handle.pid }, "Killing agent process");
      handle.kill("SIGKILL");
      this.handle = null;
      this.replayPending = true;

      const exited = await handle.waitForExit(this.deps.timings.killWaitMs);
      if (!exited) {
        this.logger.warn({ pid: handle.pid }, "Agent process did not report exit after SIGKILL");
      }
    });
  }

  shutdown(): Promise<void> {
    return this.startLock.runExclusive(async () => {
      const handle = this.handle;
      if (!handle) return;

      this.handle = null;
      await this.terminate(handle, this.deps.timings.shutdownTimeoutMs);
      this.logger.info({ pid: handle.pid }, "Agent process shut down");
    });
  }

  private async terminate(handle: AgentProcessHandle, graceMs: number): Promise<void> {
    handle.kill("SIGTERM");
    if (await handle.waitForExit(graceMs)) return;

    this.logger.warn({ pid: handle.pid, graceMs }, "Agent process ignored SIGTERM, sending SIGKILL");
    handle.kill("SIGKILL");
    await handle.waitForExit(this.deps.timings.killWaitMs);
  }
}
