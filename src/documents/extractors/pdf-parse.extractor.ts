import { DocumentKind, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { ExtractOptions, TextExtractor, pageLimit } from "./extractor.types";

export class PdfParseExtractor implements TextExtractor {
  readonly id = "pdf-parse" as const;
  readonly requiredModules = ["pdf-parse"] as const;

  supports(kind: DocumentKind): boolean {
    return kind === "pdf";
  }

  async extract(document: SourceDocument, options: ExtractOptions): Promise<RawExtraction> {
    const pdfParse = (await import("pdf-parse")).default;
    const result = await pdfParse(document.buffer, { max: options.maxPages ?? 0 });
    return {
      text: result.text.trim(),
      pageCount: result.numpages,
      pagesProcessed: pageLimit(result.numpages, options.maxPages),
      errors: [],
      metadata: {
        pdfVersion: result.version,
        title: typeof result.info?.Title === "string" ? result.info.Title : null,
      },
    };
  }
}
