import { DocumentKind, EngineId, PreferredMethod, SourceDocument } from "../shared/types/document.types";

export interface SelectionPolicy {
  /** PDFs below this size go to pdf-parse. */
  smallPdfBytes: number;
  /** PDFs below this size go to the layout engine; larger ones are streamed. */
  mediumPdfBytes: number;
}

export const DEFAULT_SELECTION_POLICY: SelectionPolicy = {
  smallPdfBytes: 5 * 1024 * 1024,
  mediumPdfBytes: 20 * 1024 * 1024,
};

export const FALLBACK_ORDER: readonly EngineId[] = ["pdfjs-layout", "pdfjs-stream", "pdf-parse", "ocr"];

const ENGINE_KINDS: Record<EngineId, DocumentKind> = {
  "pdf-parse": "pdf",
  "pdfjs-layout": "pdf",
  "pdfjs-stream": "pdf",
  ocr: "pdf",
  docx: "docx",
  "plain-text": "text",
};

export function engineSupportsKind(engine: EngineId, kind: DocumentKind): boolean {
  return ENGINE_KINDS[engine] === kind;
}

function escalationOrder(kind: DocumentKind): readonly EngineId[] {
  if (kind === "docx") return ["docx"];
  if (kind === "text") return ["plain-text"];
  if (kind === "pdf") return FALLBACK_ORDER;
  return [];
}

export function selectPrimaryEngine(
  document: Pick<SourceDocument, "kind" | "byteSize">,
  preferred: PreferredMethod,
  available: ReadonlySet<EngineId>,
  policy: SelectionPolicy = DEFAULT_SELECTION_POLICY,
): EngineId | null {
  if (preferred !== "auto" && available.has(preferred) && engineSupportsKind(preferred, document.kind)) {
    return preferred;
  }

  if (document.kind !== "pdf") {
    return escalationOrder(document.kind).find((engine) => available.has(engine)) ?? null;
  }

  const bySize: EngineId =
    document.byteSize < policy.smallPdfBytes
      ? "pdf-parse"
      : document.byteSize < policy.mediumPdfBytes
        ? "pdfjs-layout"
        : "pdfjs-stream";
  if (available.has(bySize)) {
    return bySize;
  }

  const direct = FALLBACK_ORDER.find((engine) => engine !== "ocr" && available.has(engine));
  if (direct) {
    return direct;
  }
  return available.has("ocr") ? "ocr" : null;
}

export function fallbackCandidates(
  kind: DocumentKind,
  primary: EngineId | null,
  available: ReadonlySet<EngineId>,
): EngineId[] {
  return escalationOrder(kind).filter((engine) => engine !== primary && available.has(engine));
}

export interface ScoredText {
  text: string;
  confidence: number;
}

/** Longer trimmed text wins; equal lengths go to the higher confidence. */
export function isBetterExtraction(candidate: ScoredText, best: ScoredText | null): boolean {
  if (!best) {
    return true;
  }
  const candidateLength = candidate.text.trim().length;
  const bestLength = best.text.trim().length;
  if (candidateLength !== bestLength) {
    return candidateLength > bestLength;
  }
  return candidate.confidence > best.confidence;
}
