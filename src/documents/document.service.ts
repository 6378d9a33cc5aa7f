import { readFile } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../config/logger";
import { ExtractionError } from "../shared/errors";
import { DocumentInput, DocumentKind, SourceDocument } from "../shared/types/document.types";
import { err, ok, Result } from "../shared/utils/result";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  detectDocumentType(fileName?: string, mimeType?: string, buffer?: Buffer): DocumentKind {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }

    if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }

    if (
      normalizedMime.startsWith("text/plain") ||
      normalizedFileName.endsWith(".txt") ||
      normalizedFileName.endsWith(".md")
    ) {
      return "text";
    }

    return buffer ? sniffDocumentType(buffer) : "unknown";
  }

  async loadDocument(input: string | DocumentInput): Promise<Result<SourceDocument, ExtractionError>> {
    const resolved = typeof input === "string" ? await this.readFromPath(input) : ok(input);
    if (!resolved.ok) {
      return resolved;
    }

    const { buffer, fileName, mimeType } = resolved.data;
    const ref = resolved.data.ref ?? fileName ?? "buffer";

    if (buffer.length === 0) {
      return err(new ExtractionError("document_empty", `Document is empty: ${ref}`));
    }

    const kind = this.detectDocumentType(fileName, mimeType, buffer);
    if (kind === "unknown") {
      return err(
        new ExtractionError("unsupported_document", "Unsupported document type. Please upload PDF, DOCX or plain text."),
      );
    }

    this.logger.debug("Document loaded", { ref, kind, bytes: buffer.length });

    return ok({
      ref,
      fileName,
      mimeType,
      kind,
      buffer,
      byteSize: buffer.length,
    });
  }

  private async readFromPath(filePath: string): Promise<Result<DocumentInput, ExtractionError>> {
    const absolutePath = path.resolve(filePath);
    try {
      const buffer = await readFile(absolutePath);
      return ok({ buffer, fileName: path.basename(absolutePath), ref: filePath });
    } catch (error) {
      const code = isErrnoException(error) ? error.code : undefined;
      if (code === "ENOENT" || code === "EISDIR") {
        return err(new ExtractionError("document_not_found", `Resume file not found: ${absolutePath}`));
      }
      return err(
        new ExtractionError(
          "document_not_found",
          `Could not read resume file ${absolutePath}: ${error instanceof Error ? error.message : "Unknown error"}`,
        ),
      );
    }
  }
}

function sniffDocumentType(buffer: Buffer): DocumentKind {
  if (buffer.subarray(0, 5).toString("latin1") === "%PDF-") {
    return "pdf";
  }
  // DOCX is a zip container; anything else zipped is rejected later by mammoth.
  if (buffer[0] === 0x50 && buffer[1] === 0x4b) {
    return "docx";
  }
  return looksLikeText(buffer) ? "text" : "unknown";
}

function looksLikeText(buffer: Buffer): boolean {
  const sample = buffer.subarray(0, 1024);
  if (sample.includes(0)) {
    return false;
  }
  const decoded = sample.toString("utf8");
  const replacements = decoded.split("\uFFFD").length - 1;
  return replacements <= Math.max(1, decoded.length * 0.01);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
