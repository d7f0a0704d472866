import { Logger } from "../config/logger";
import { CoachError, describeError } from "../shared/errors";
import { DOCUMENT_FORMATS, DocumentFormat } from "../shared/types/extraction.types";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";
import { extractPlainText } from "./extractors/text.extractor";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export function detectDocumentFormat(fileName?: string, mimeType?: string): DocumentFormat | null {
  const normalizedFileName = (fileName ?? "").toLowerCase();
  const normalizedMime = (mimeType ?? "").toLowerCase();

  if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
    return "pdf";
  }
  if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
    return "docx";
  }
  if (
    normalizedMime.startsWith("text/") ||
    normalizedFileName.endsWith(".txt") ||
    normalizedFileName.endsWith(".md")
  ) {
    return "text";
  }
  return null;
}

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  parseFormat(format: string): DocumentFormat {
    const supported = DOCUMENT_FORMATS.find((item) => item === format.trim().toLowerCase());
    if (!supported) {
      throw new CoachError("UnsupportedFormat", `Unsupported document format: ${format}. Use pdf, docx or text.`, {
        format,
      });
    }
    return supported;
  }

  /**
   * Returns the document text with line structure kept, since section detection
   * works line by line.
   */
  async extractText(buffer: Buffer, format: string): Promise<string> {
    const documentFormat = this.parseFormat(format);

    let text: string;
    try {
      text = await this.readRawText(buffer, documentFormat);
    } catch (error) {
      this.logger.warn("document.extraction.failed", { format: documentFormat, error: describeError(error) });
      throw new CoachError("ExtractionFailure", `Could not read ${documentFormat} document.`, {
        format: documentFormat,
        cause: describeError(error),
      });
    }

    const cleanText = normalizeDocumentText(text);
    this.logger.info("document.text.extracted", {
      format: documentFormat,
      bytes: buffer.length,
      chars: cleanText.length,
    });

    if (!cleanText) {
      throw new CoachError("ExtractionFailure", "Could not extract text from document.", { format: documentFormat });
    }
    return cleanText;
  }

  private readRawText(buffer: Buffer, format: DocumentFormat): Promise<string> {
    if (format === "pdf") {
      return extractPdfText(buffer);
    }
    if (format === "docx") {
      return extractDocxText(buffer);
    }
    return extractPlainText(buffer);
  }
}

export function normalizeDocumentText(text: string): string {
  return text
    .replace(/\u0000/g, "")
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v ]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
