import { DocumentKind, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { TextExtractor } from "./extractor.types";

export class PlainTextExtractor implements TextExtractor {
  readonly id = "plain-text" as const;
  readonly requiredModules = [] as const;

  supports(kind: DocumentKind): boolean {
    return kind === "text";
  }

  async extract(document: SourceDocument): Promise<RawExtraction> {
    const text = document.buffer.toString("utf8").replace(/^\uFEFF/, "");
    return {
      text,
      pageCount: 1,
      pagesProcessed: 1,
      errors: [],
      metadata: {},
    };
  }
}
