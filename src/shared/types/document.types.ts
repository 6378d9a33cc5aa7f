export type DocumentKind = "pdf" | "docx" | "text" | "unknown";

export type EngineId = "pdf-parse" | "pdfjs-layout" | "pdfjs-stream" | "docx" | "plain-text" | "ocr";

export const ENGINE_IDS: readonly EngineId[] = [
  "pdf-parse",
  "pdfjs-layout",
  "pdfjs-stream",
  "docx",
  "plain-text",
  "ocr",
];

export interface SourceDocument {
  readonly ref: string;
  readonly fileName?: string;
  readonly mimeType?: string;
  readonly kind: DocumentKind;
  readonly buffer: Buffer;
  readonly byteSize: number;
}

export interface DocumentInput {
  buffer: Buffer;
  fileName?: string;
  mimeType?: string;
  ref?: string;
}

export type PreferredMethod = "auto" | EngineId;

export interface ExtractionConfig {
  preferredMethod: PreferredMethod;
  useFallback: boolean;
  maxPages: number | null;
  cleanText: boolean;
  ocrLanguages: string[];
}

/** What an engine hands back before scoring. */
export interface RawExtraction {
  text: string;
  pageCount: number;
  pagesProcessed: number;
  errors: string[];
  metadata: Record<string, unknown>;
}

export interface ExtractionAttempt {
  method: EngineId;
  ok: boolean;
  textLength: number;
  confidence: number;
  needsFallback: boolean;
  elapsedMs: number;
  error?: string;
}

export interface ExtractionResult {
  text: string;
  method: EngineId;
  confidence: number;
  pageCount: number;
  errors: string[];
  elapsedMs: number;
  metadata: Record<string, unknown>;
  attempts: ExtractionAttempt[];
}
