import express, { Express, NextFunction, Request, Response } from "express";
import { Logger } from "./config/logger";
import { DocumentInput, InterviewCoachService } from "./coach/interview-coach.service";
import { detectDocumentFormat } from "./documents/document.service";
import { CoachError, CoachErrorCode, describeError, isCoachError } from "./shared/errors";

const STATUS_BY_CODE: Record<CoachErrorCode, number> = {
  InvalidConfiguration: 400,
  SessionNotFound: 404,
  InvalidState: 409,
  OutOfOrderSubmission: 409,
  NotCompleted: 409,
  UnsupportedFormat: 415,
  InsufficientContext: 422,
  ExtractionFailure: 422,
};

type AsyncHandler = (request: Request, response: Response) => Promise<void>;

export function statusForError(error: unknown): number {
  return isCoachError(error) ? STATUS_BY_CODE[error.code] : 500;
}

export function createApp(coach: InterviewCoachService, logger: Logger): Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  const handle =
    (route: string, handler: AsyncHandler) =>
    (request: Request, response: Response, next: NextFunction): void => {
      void handler(request, response).catch((error: unknown) => {
        const status = statusForError(error);
        const meta = {
          route,
          status,
          errorCode: isCoachError(error) ? error.code : "internal",
          error: describeError(error),
        };
        if (status >= 500) {
          logger.error("http.request.failed", meta);
        } else {
          logger.warn("http.request.rejected", meta);
        }
        if (response.headersSent) {
          next(error);
          return;
        }
        response.status(status).json({
          ok: false,
          error_code: isCoachError(error) ? error.code : "Internal",
          error: status >= 500 ? "Internal server error" : describeError(error),
        });
      });
    };

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, ...coach.capabilities() });
  });

  app.post(
    "/api/documents/analyze",
    handle("documents.analyze", async (request, response) => {
      const resume = parseDocumentInput(readBodyField(request, "resume"), "resume");
      const jobDescription = parseDocumentInput(readBodyField(request, "jobDescription"), "jobDescription");
      const analysis = await coach.analyzeDocuments(resume, jobDescription);
      response.status(200).json({ ok: true, ...analysis });
    }),
  );

  app.post(
    "/api/sessions",
    handle("sessions.start", async (request, response) => {
      const type = readBodyField(request, "type");
      const timeoutMs = readBodyField(request, "timeoutMs");
      if (timeoutMs !== undefined && typeof timeoutMs !== "number") {
        throw new CoachError("InvalidConfiguration", "timeoutMs must be a number.");
      }
      const technicalStack = parseTechnicalStack(readBodyField(request, "technicalStack"));
      const result = await coach.startSession({
        type: typeof type === "string" ? type : "",
        resume: parseDocumentInput(readBodyField(request, "resume"), "resume"),
        jobDescription: parseDocumentInput(readBodyField(request, "jobDescription"), "jobDescription"),
        ...(timeoutMs !== undefined ? { timeoutMs } : {}),
        ...(technicalStack.length ? { technicalStack } : {}),
      });
      response.status(201).json({ ok: true, ...result });
    }),
  );

  app.get(
    "/api/sessions/:id",
    handle("sessions.get", async (request, response) => {
      response.status(200).json({ ok: true, session: coach.getSession(request.params.id) });
    }),
  );

  app.delete(
    "/api/sessions/:id",
    handle("sessions.release", async (request, response) => {
      coach.releaseSession(request.params.id);
      response.status(204).end();
    }),
  );

  app.post(
    "/api/sessions/:id/answers",
    handle("sessions.answer", async (request, response) => {
      const questionId = requireString(readBodyField(request, "questionId"), "questionId");
      const text = readBodyField(request, "text");
      const result = await coach.submitAnswer(request.params.id, questionId, typeof text === "string" ? text : "");
      response.status(200).json({ ok: true, ...result });
    }),
  );

  app.post(
    "/api/sessions/:id/voice-answers",
    express.raw({ type: ["audio/*", "application/octet-stream"], limit: "25mb" }),
    handle("sessions.voice_answer", async (request, response) => {
      const questionId = requireString(request.header("x-question-id"), "x-question-id");
      const audio = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
      const contentType = request.header("content-type");
      const voice = await coach.submitVoiceAnswer(request.params.id, questionId, audio, {
        ...(contentType ? { contentType } : {}),
      });
      response.status(200).json({ ok: true, transcript: voice.transcript, ...voice.result });
    }),
  );

  app.post(
    "/api/sessions/:id/abort",
    handle("sessions.abort", async (request, response) => {
      const reason = readBodyField(request, "reason");
      const session = await coach.abort(request.params.id, typeof reason === "string" ? reason : "user_request");
      response.status(200).json({ ok: true, session });
    }),
  );

  app.post(
    "/api/sessions/:id/report",
    handle("sessions.report", async (request, response) => {
      const report = await coach.buildReport(request.params.id);
      response.status(200).json({ ok: true, ...report });
    }),
  );

  return app;
}

function readBodyField(request: Request, field: string): unknown {
  const body: unknown = request.body;
  if (!isRecord(body) || Buffer.isBuffer(body)) {
    return undefined;
  }
  return body[field];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Text documents come as { format: "text", text }, binary ones as { format, base64 }. Without a
// format, it is detected from fileName or mimeType, and plain text is assumed when neither is given.
export function parseDocumentInput(value: unknown, field: string): DocumentInput {
  if (typeof value !== "object" || value === null) {
    throw new CoachError("InvalidConfiguration", `${field} must be an object with format and text or base64.`);
  }
  const fileName = "fileName" in value && typeof value.fileName === "string" ? value.fileName : undefined;
  const mimeType = "mimeType" in value && typeof value.mimeType === "string" ? value.mimeType : undefined;
  const declared = "format" in value && typeof value.format === "string" ? value.format : undefined;
  const detected = declared ?? detectDocumentFormat(fileName, mimeType);
  if (!detected && (fileName || mimeType)) {
    throw new CoachError("UnsupportedFormat", `Cannot tell the format of ${field} (${fileName ?? mimeType}). Use pdf, docx or text.`, {
      field,
      ...(fileName ? { fileName } : {}),
      ...(mimeType ? { mimeType } : {}),
    });
  }
  const format = detected ?? "text";
  if ("text" in value && typeof value.text === "string") {
    return { format, content: Buffer.from(value.text, "utf-8") };
  }
  if ("base64" in value && typeof value.base64 === "string") {
    return { format, content: Buffer.from(value.base64, "base64") };
  }
  throw new CoachError("InvalidConfiguration", `${field} needs a text or base64 field.`);
}

export function parseTechnicalStack(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new CoachError("InvalidConfiguration", "technicalStack must be an array of skill names.");
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new CoachError("InvalidConfiguration", `${field} is required.`);
  }
  return value.trim();
}
