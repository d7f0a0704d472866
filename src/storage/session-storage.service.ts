import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../config/logger";
import { InterviewSession } from "../shared/types/session.types";
import { deserializeSession, serializeSession } from "./session-serialization";

export interface SessionArchive {
  save(session: InterviewSession): Promise<string>;
}

export class SessionStorageService implements SessionArchive {
  private readonly storageDir: string;

  constructor(
    storageDir: string,
    private readonly logger: Logger,
  ) {
    this.storageDir = path.resolve(process.cwd(), storageDir);
  }

  async save(session: InterviewSession): Promise<string> {
    await mkdir(this.storageDir, { recursive: true });
    const filePath = this.filePathFor(session.id);
    await writeFile(filePath, serializeSession(session), "utf-8");
    this.logger.debug("session.snapshot.saved", { sessionId: session.id, state: session.state });
    return filePath;
  }

  async load(sessionId: string): Promise<InterviewSession | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePathFor(sessionId), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return deserializeSession(JSON.parse(raw));
  }

  async list(): Promise<InterviewSession[]> {
    await mkdir(this.storageDir, { recursive: true });
    const entries = await readdir(this.storageDir, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && entry.name.startsWith("session_") && entry.name.endsWith(".json"))
      .map((entry) => entry.name);

    const sessions: InterviewSession[] = [];
    for (const fileName of files) {
      try {
        const raw = await readFile(path.join(this.storageDir, fileName), "utf-8");
        sessions.push(deserializeSession(JSON.parse(raw)));
      } catch (error) {
        this.logger.warn("session.snapshot.unreadable", {
          fileName,
          error: error instanceof Error ? error.message : "Unknown error",
        });
      }
    }

    sessions.sort((a, b) => (a.updatedAt < b.updatedAt ? 1 : -1));
    return sessions;
  }

  private filePathFor(sessionId: string): string {
    // Percent-encoding keeps distinct ids in distinct files.
    return path.join(this.storageDir, `session_${encodeURIComponent(sessionId)}.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
