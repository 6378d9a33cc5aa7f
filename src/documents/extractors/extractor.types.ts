import { DocumentKind, EngineId, RawExtraction, SourceDocument } from "../../shared/types/document.types";

export interface ExtractOptions {
  maxPages: number | null;
  ocrLanguages: string[];
}

export interface TextExtractor {
  readonly id: EngineId;
  /** npm modules that must resolve for the engine to be usable. */
  readonly requiredModules: readonly string[];
  supports(kind: DocumentKind): boolean;
  extract(document: SourceDocument, options: ExtractOptions): Promise<RawExtraction>;
}

export function pageLimit(pageCount: number, maxPages: number | null): number {
  return maxPages && maxPages > 0 ? Math.min(maxPages, pageCount) : pageCount;
}
