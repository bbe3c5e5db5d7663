/**
 * Whisper Transcription Client
 *
 * Speech-to-text over a Whisper-compatible HTTP endpoint
 * (OpenAI /v1/audio/transcriptions or a self-hosted server exposing the
 * same multipart API). The audio clip is sent as-is; the portal serves
 * mp3, which the endpoint accepts without conversion.
 */
import axios from "axios";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { TranscriptionError } from "../../shared/errors/captcha.errors";

/** Raw speech engine output */
export interface SpeechOutput {
  text: string;
  confidence?: number;
}

/**
 * The external speech-to-text capability: audio bytes in, text out.
 */
export interface SpeechEngine {
  readonly name: string;
  transcribe(audio: Buffer, signal?: AbortSignal): Promise<SpeechOutput>;
}

interface WhisperResponse {
  text?: string;
}

export interface WhisperClientOptions {
  url: string;
  apiKey: string;
  model: string;
  /** ISO-639-1 hint; the portal reads digits in Mandarin */
  language: string;
  /** Hard cap on the HTTP request, independent of the caller's signal */
  requestTimeoutMs: number;
}

export class WhisperClient implements SpeechEngine {
  readonly name = "whisper";
  private options: WhisperClientOptions;

  constructor(options: Partial<WhisperClientOptions> = {}) {
    this.options = {
      url: options.url ?? config.transcriptionUrl,
      apiKey: options.apiKey ?? config.transcriptionApiKey,
      model: options.model ?? config.transcriptionModel,
      language: options.language ?? config.transcriptionLanguage,
      requestTimeoutMs: options.requestTimeoutMs ?? config.transcriptionTimeoutMs,
    };
  }

  async transcribe(audio: Buffer, signal?: AbortSignal): Promise<SpeechOutput> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(audio)], { type: "audio/mpeg" }), "captcha.mp3");
    form.append("model", this.options.model);
    form.append("language", this.options.language);
    form.append("response_format", "json");

    const headers: Record<string, string> = {};
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    try {
      const response = await axios.post<WhisperResponse>(this.options.url, form, {
        headers,
        signal,
        timeout: this.options.requestTimeoutMs,
      });

      const text = response.data.text;
      if (typeof text !== "string") {
        throw new TranscriptionError("Transcription response has no text field");
      }

      logger.debug({ bytes: audio.length, text }, "Whisper transcription received");
      return { text };
    } catch (error) {
      if (error instanceof TranscriptionError) throw error;
      if (axios.isAxiosError(error)) {
        throw new TranscriptionError(
          `Whisper request failed${error.response ? ` (HTTP ${error.response.status})` : ""}: ${error.message}`
        );
      }
      throw new TranscriptionError(error instanceof Error ? error.message : String(error));
    }
  }
}
