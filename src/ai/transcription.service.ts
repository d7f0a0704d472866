import { Logger } from "../config/logger";
import { describeError } from "../shared/errors";
import { AudioInput, AudioTranscriber } from "./transcription.client";

/**
 * Speech to text for voice answers. Never throws: a failed or unavailable
 * transcription becomes an empty answer, which the evaluator scores as no response.
 */
export class TranscriptionService {
  constructor(
    private readonly transcriber: AudioTranscriber | null,
    private readonly logger: Logger,
  ) {}

  isAvailable(): boolean {
    return this.transcriber !== null;
  }

  async transcribe(audio: Buffer, input?: AudioInput): Promise<string> {
    if (!this.transcriber) {
      this.logger.warn("transcription.unavailable", { bytes: audio.length });
      return "";
    }
    if (audio.length === 0) {
      this.logger.warn("transcription.empty_audio");
      return "";
    }
    try {
      const text = await this.transcriber.transcribe(audio, input);
      return text.replace(/\s+/g, " ").trim();
    } catch (error) {
      this.logger.error("transcription.failed", { bytes: audio.length, error: describeError(error) });
      return "";
    }
  }
}
