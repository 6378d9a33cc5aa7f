import mammoth from "mammoth";
import { DocumentKind, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { TextExtractor } from "./extractor.types";

export class DocxExtractor implements TextExtractor {
  readonly id = "docx" as const;
  readonly requiredModules = ["mammoth"] as const;

  supports(kind: DocumentKind): boolean {
    return kind === "docx";
  }

  async extract(document: SourceDocument): Promise<RawExtraction> {
    const result = await mammoth.extractRawText({ buffer: document.buffer });
    return {
      text: result.value.trim(),
      pageCount: 1,
      pagesProcessed: 1,
      errors: [],
      metadata: {
        messages: result.messages.map((message) => message.message),
      },
    };
  }
}
