import fetch from "node-fetch";
import FormData from "form-data";
import { Logger } from "../config/logger";

export const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";

interface TranscriptionResponse {
  text?: string;
}

export interface AudioInput {
  fileName?: string;
  contentType?: string;
}

export interface AudioTranscriber {
  transcribe(audio: Buffer, input?: AudioInput): Promise<string>;
}

export class TranscriptionClient implements AudioTranscriber {
  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    private readonly model: string = DEFAULT_TRANSCRIPTION_MODEL,
  ) {}

  async transcribe(audio: Buffer, input?: AudioInput): Promise<string> {
    const startedAt = Date.now();
    const form = new FormData();
    form.append("model", this.model);
    form.append("file", audio, {
      filename: input?.fileName ?? "answer.webm",
      contentType: input?.contentType ?? "audio/webm",
    });

    const response = await fetch("https://api.openai.com/v1/audio/transcriptions", {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        ...form.getHeaders(),
      },
      body: form,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Transcription API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as TranscriptionResponse;
    const text = typeof body.text === "string" ? body.text.trim() : "";
    this.logger.info("transcription.call.completed", {
      modelName: this.model,
      bytes: audio.length,
      chars: text.length,
      latencyMs: Date.now() - startedAt,
    });
    return text;
  }
}
