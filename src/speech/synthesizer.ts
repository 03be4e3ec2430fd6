import OpenAI from "openai";
import type { Logger } from "../logger.js";
import type { ParleyConfig } from "../config.js";

export type SpeechFormat = ParleyConfig["speechFormat"];

export interface SpeechResult {
  readonly audio: Buffer;
  readonly format: SpeechFormat;
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<SpeechResult>;
}

/** Sends text to a speech endpoint and returns the encoded audio. */
export type SpeechRequestFn = (text: string) => Promise<ArrayBuffer>;

export class OpenAiSpeechSynthesizer implements SpeechSynthesizer {
  private readonly logger: Logger;

  constructor(
    private readonly request: SpeechRequestFn,
    private readonly format: SpeechFormat,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "speech" });
  }

  async synthesize(text: string): Promise<SpeechResult> {
    if (!text.trim()) {
      throw new Error("Cannot synthesize empty text");
    }

    const startedAt = Date.now();
    try {
      const audio = Buffer.from(await this.request(text));
      this.logger.debug(
        { chars: text.length, bytes: audio.length, durationMs: Date.now() - startedAt },
        "Speech synthesized",
      );
      return { audio, format: this.format };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`TTS synthesis failed: ${message}`, { cause: err });
    }
  }
}

export function openAiSpeechRequest(
  apiKey: string,
  options: Pick<ParleyConfig, "speechModel" | "speechVoice" | "speechFormat">,
): SpeechRequestFn {
  const client = new OpenAI({ apiKey });

  return async (text) => {
    const response = await client.audio.speech.create({
      model: options.speechModel,
      voice: options.speechVoice,
      input: text,
      response_format: options.speechFormat,
    });
    return response.arrayBuffer();
  };
}

/** Speech is optional; without an OpenAI key responses are text only. */
export function createSpeechSynthesizer(
  config: Pick<ParleyConfig, "openaiApiKey" | "speechModel" | "speechVoice" | "speechFormat">,
  logger: Logger,
): SpeechSynthesizer | null {
  if (!config.openaiApiKey) {
    logger.info("No OpenAI API key configured, speech disabled");
    return null;
  }
  logger.info({ voice: config.speechVoice, model: config.speechModel, format: config.speechFormat }, "Speech enabled");
  return new OpenAiSpeechSynthesizer(openAiSpeechRequest(config.openaiApiKey, config), config.speechFormat, logger);
}
