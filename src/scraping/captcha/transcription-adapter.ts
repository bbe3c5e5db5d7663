/**
 * Transcription Adapter
 *
 * Turns an audio challenge into the digit string to type. The speech
 * engine is a black box; everything it says is reduced to ASCII digits:
 * English number words, Chinese numerals (including the financial forms
 * and 兩/幺), full-width digits. Anything else is dropped.
 *
 * No retries here: a failed transcription costs one CAPTCHA attempt and
 * the retry controller fetches a new clip.
 */
import { NUMERAL_CHARS, NUMERAL_WORDS } from "../../config/constants";
import { TranscriptionError } from "../../shared/errors/captcha.errors";
import { TranscriptionResult } from "../../shared/types/portal.types";
import { logger } from "../../monitoring/logger";
import { SpeechEngine, SpeechOutput } from "./whisper.client";

/**
 * Reduce a transcription to digits.
 * e.g. "1 2 3 4" → "1234", "一二三四五" → "12345", "one two" → "12"
 */
export function normalizeDigits(text: string): string {
  // NFKC folds full-width digits and letters to ASCII
  const folded = text.normalize("NFKC");

  const withWords = folded.replace(/[A-Za-z]+/g, (word) => {
    const digit = NUMERAL_WORDS[word.toLowerCase()];
    if (digit !== undefined) return digit;
    // Keep runs of "E" for the per-character pass
    return /^E+$/.test(word) ? word : "";
  });

  let digits = "";
  for (const char of withWords) {
    if (char >= "0" && char <= "9") {
      digits += char;
      continue;
    }
    const mapped = NUMERAL_CHARS[char];
    if (mapped !== undefined) digits += mapped;
  }
  return digits;
}

export class TranscriptionAdapter {
  private engine: SpeechEngine;

  constructor(engine: SpeechEngine) {
    this.engine = engine;
  }

  /**
   * @throws TranscriptionError if the engine fails or says nothing
   */
  async transcribe(audio: Buffer, signal?: AbortSignal): Promise<TranscriptionResult> {
    if (audio.length === 0) {
      throw new TranscriptionError("Audio clip is empty");
    }

    let output: SpeechOutput;
    try {
      output = await this.engine.transcribe(audio, signal);
    } catch (error) {
      if (error instanceof TranscriptionError) throw error;
      throw new TranscriptionError(
        `${this.engine.name} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const rawText = output.text.trim();
    if (!rawText) {
      throw new TranscriptionError(`${this.engine.name} returned no text`);
    }

    const digits = normalizeDigits(rawText);
    logger.info(
      { engine: this.engine.name, rawText, digits },
      "Audio challenge transcribed"
    );

    return { rawText, digits, confidence: output.confidence };
  }
}
