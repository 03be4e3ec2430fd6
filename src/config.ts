import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

export const SPEECH_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;
export type SpeechVoice = (typeof SPEECH_VOICES)[number];

export interface ParleyConfig {
  readonly port: number;
  readonly host: string;
  readonly dataDir: string;
  readonly logLevel: "debug" | "info" | "warn" | "error";
  readonly agentCommand: string;
  readonly workingDirectory: string;
  readonly allowedTools: readonly string[];
  readonly permissionMode: string;
  readonly includePartialMessages: boolean;
  readonly startupDelayMs: number;
  readonly terminateGraceMs: number;
  readonly killWaitMs: number;
  readonly shutdownTimeoutMs: number;
  readonly summaryModel: string;
  readonly speechModel: string;
  readonly speechVoice: SpeechVoice;
  readonly speechFormat: "mp3" | "opus" | "aac" | "flac" | "wav" | "pcm";
  readonly anthropicApiKey: string | null;
  readonly openaiApiKey: string | null;
}

const DEFAULTS: ParleyConfig = {
  port: 8000,
  host: "127.0.0.1",
  dataDir: "./data",
  logLevel: "info",
  agentCommand: "claude",
  workingDirectory: "./workspace",
  allowedTools: ["Bash", "Read", "Write", "Edit", "Glob", "Grep", "WebSearch", "WebFetch"],
  permissionMode: "bypassPermissions",
  includePartialMessages: true,
  startupDelayMs: 200,
  terminateGraceMs: 2000,
  killWaitMs: 1000,
  shutdownTimeoutMs: 2000,
  summaryModel: "claude-3-haiku-20240307",
  speechModel: "tts-1",
  speechVoice: "alloy",
  speechFormat: "mp3",
  anthropicApiKey: null,
  openaiApiKey: null,
};

const fileConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65535),
    host: z.string().min(1),
    dataDir: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    agentCommand: z.string().min(1),
    workingDirectory: z.string().min(1),
    allowedTools: z.array(z.string()),
    permissionMode: z.string().min(1),
    includePartialMessages: z.boolean(),
    startupDelayMs: z.number().int().nonnegative(),
    terminateGraceMs: z.number().int().nonnegative(),
    killWaitMs: z.number().int().nonnegative(),
    shutdownTimeoutMs: z.number().int().nonnegative(),
    summaryModel: z.string().min(1),
    speechModel: z.string().min(1),
    speechVoice: z.enum(SPEECH_VOICES),
    speechFormat: z.enum(["mp3", "opus", "aac", "flac", "wav", "pcm"]),
  })
  .partial()
  .strict();

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ParleyConfig {
  const filePath = configPath ?? env.PARLEY_CONFIG ?? resolve(process.cwd(), "parley.config.json");
  const secrets = {
    anthropicApiKey: env.ANTHROPIC_API_KEY || null,
    openaiApiKey: env.OPENAI_API_KEY || null,
  };

  if (!existsSync(filePath)) {
    return { ...DEFAULTS, ...secrets };
  }

  try {
    const raw = readFileSync(filePath, "utf-8");
    const userConfig = fileConfigSchema.parse(JSON.parse(raw));
    return { ...DEFAULTS, ...userConfig, ...secrets };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to load config from ${filePath}: ${message}`);
  }
}
