/**
 * Speech-to-text collaborators.
 *
 * The pipeline only needs `transcribe(audioPath, modelSize) -> text`.
 * Two adapters are provided:
 *   - openai:      OpenAI's hosted Whisper API (model fixed by config, modelSize ignored)
 *   - whisper-cpp: a locally compiled whisper.cpp CLI, modelSize picks ggml-<size>.bin
 */

import { spawn } from "node:child_process";
import { createReadStream, existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import OpenAI from "openai";
import { TranscriptionFailureError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../utils/log.js";

export interface SpeechToText {
  name: string;
  transcribe(audioPath: string, modelSize: string): Promise<string>;
}

export type SpeechToTextProvider = "openai" | "whisper-cpp";

export interface SpeechToTextConfig {
  provider: SpeechToTextProvider;
  /** Per-file timeout in ms (default: 30 min) */
  timeoutMs?: number;
  /** OpenAI API key (falls back to OPENAI_API_KEY) */
  apiKey?: string;
  /** OpenAI transcription model (default: whisper-1) */
  openaiModel?: string;
  /** whisper.cpp checkout containing build/bin/whisper-cli and models/ */
  whisperCppPath?: string;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

function requireText(text: string, audioPath: string): string {
  const trimmed = text.replace(/\s+/g, " ").trim();
  if (!trimmed) {
    throw new TranscriptionFailureError(`Transcription of ${basename(audioPath)} returned no text`);
  }
  return trimmed;
}

export class OpenAIWhisperTranscriber implements SpeechToText {
  name = "openai";
  private client: OpenAI | null = null;
  private config: Omit<SpeechToTextConfig, "provider">;
  private model: string;
  private log: Logger;

  constructor(config: Omit<SpeechToTextConfig, "provider"> = {}) {
    this.config = config;
    this.model = config.openaiModel ?? "whisper-1";
    this.log = config.logger ?? silentLogger;
  }

  /** Created on first use so runs that never reach audio need no API key */
  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey ?? process.env.OPENAI_API_KEY,
        timeout: this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async transcribe(audioPath: string): Promise<string> {
    this.log(`  [transcribing] model=${this.model}, file=${basename(audioPath)}`);
    try {
      const result = await this.getClient().audio.transcriptions.create({
        file: createReadStream(audioPath),
        model: this.model,
        response_format: "json",
      });
      return requireText(result.text, audioPath);
    } catch (err) {
      if (err instanceof TranscriptionFailureError) throw err;
      throw new TranscriptionFailureError(
        `OpenAI transcription failed for ${basename(audioPath)}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }
}

export class WhisperCppTranscriber implements SpeechToText {
  name = "whisper-cpp";
  private whisperDir: string | undefined;
  private timeoutMs: number;
  private log: Logger;

  constructor(config: Omit<SpeechToTextConfig, "provider"> = {}) {
    this.whisperDir = config.whisperCppPath ?? process.env.WHISPER_CPP_PATH;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = config.logger ?? silentLogger;
  }

  async transcribe(audioPath: string, modelSize: string): Promise<string> {
    if (!this.whisperDir) {
      throw new TranscriptionFailureError(
        "WHISPER_CPP_PATH or whisperCppPath is required for the whisper-cpp provider"
      );
    }
    const bin = join(this.whisperDir, "build/bin/whisper-cli");
    const model = join(this.whisperDir, "models", `ggml-${modelSize}.bin`);
    if (!existsSync(bin)) {
      throw new TranscriptionFailureError(`whisper-cli not found at ${bin}`);
    }
    if (!existsSync(model)) {
      throw new TranscriptionFailureError(`Whisper model not found at ${model}`);
    }

    const outDir = await mkdtemp(join(tmpdir(), "whisper-"));
    const outBase = join(outDir, "transcript");
    this.log(`  [transcribing] model=${modelSize}, file=${basename(audioPath)}`);

    try {
      await this.run(bin, ["-m", model, "-f", audioPath, "-otxt", "-of", outBase, "-np"]);
      const text = await readFile(`${outBase}.txt`, "utf-8");
      return requireText(text, audioPath);
    } catch (err) {
      if (err instanceof TranscriptionFailureError) throw err;
      throw new TranscriptionFailureError(
        `whisper.cpp transcription failed for ${basename(audioPath)}: ${errorMessage(err)}`,
        { cause: err }
      );
    } finally {
      await rm(outDir, { recursive: true, force: true });
    }
  }

  private run(bin: string, args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(bin, args, { stdio: ["ignore", "ignore", "pipe"] });
      let stderr = "";
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill("SIGKILL");
        reject(new Error(`timed out after ${Math.round(this.timeoutMs / 1000)}s`));
      }, this.timeoutMs);

      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(err);
      });
      child.on("close", (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (code === 0) resolve();
        else reject(new Error(`whisper-cli exited with code ${code}: ${stderr.trim().slice(-500)}`));
      });
    });
  }
}

export function createSpeechToText(config: SpeechToTextConfig): SpeechToText {
  switch (config.provider) {
    case "openai":
      return new OpenAIWhisperTranscriber(config);
    case "whisper-cpp":
      return new WhisperCppTranscriber(config);
  }
}
