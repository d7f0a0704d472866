import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { AudioInput, AudioTranscriber } from "../../ai/transcription.client";
import { TranscriptionService } from "../../ai/transcription.service";
import { createRecordingLogger, noopLogger } from "../helpers/fixtures";

class FakeTranscriber implements AudioTranscriber {
  readonly inputs: Array<AudioInput | undefined> = [];

  constructor(private readonly reply: string | Error) {}

  async transcribe(_audio: Buffer, input?: AudioInput): Promise<string> {
    this.inputs.push(input);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

const audio = Buffer.from("fake-audio-bytes");

describe("TranscriptionService", () => {
  test("collapses whitespace in the transcript", async () => {
    const transcriber = new FakeTranscriber("  I led the\n migration   project. ");
    const service = new TranscriptionService(transcriber, noopLogger);
    const text = await service.transcribe(audio, { fileName: "a.ogg", contentType: "audio/ogg" });
    assert.equal(text, "I led the migration project.");
    assert.deepEqual(transcriber.inputs, [{ fileName: "a.ogg", contentType: "audio/ogg" }]);
  });

  test("returns an empty answer when no transcriber is configured", async () => {
    const service = new TranscriptionService(null, noopLogger);
    assert.equal(service.isAvailable(), false);
    assert.equal(await service.transcribe(audio), "");
  });

  test("skips empty audio", async () => {
    const transcriber = new FakeTranscriber("unused");
    const service = new TranscriptionService(transcriber, noopLogger);
    assert.equal(await service.transcribe(Buffer.alloc(0)), "");
    assert.equal(transcriber.inputs.length, 0);
  });

  test("turns a failed transcription into an empty answer and logs it", async () => {
    const { logger, logs } = createRecordingLogger();
    const service = new TranscriptionService(new FakeTranscriber(new Error("HTTP 500")), logger);
    assert.equal(await service.transcribe(audio), "");
    assert.deepEqual(
      logs.map((entry) => [entry.level, entry.message]),
      [["error", "transcription.failed"]],
    );
  });
});
