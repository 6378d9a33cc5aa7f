import { errorMessage } from "../../shared/errors";
import { DocumentKind, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { ExtractOptions, TextExtractor, pageLimit } from "./extractor.types";
import { openPdf, readPageItems } from "./pdfjs.loader";

/** Content-stream order, tolerant of broken objects; survives PDFs the layout pass chokes on. */
export class PdfjsStreamExtractor implements TextExtractor {
  readonly id = "pdfjs-stream" as const;
  readonly requiredModules = ["pdfjs-dist/legacy/build/pdf"] as const;

  supports(kind: DocumentKind): boolean {
    return kind === "pdf";
  }

  async extract(document: SourceDocument, options: ExtractOptions): Promise<RawExtraction> {
    const pdf = await openPdf(document, { tolerant: true });
    const pages: string[] = [];
    const errors: string[] = [];
    const pageCount = pdf.numPages;
    const limit = pageLimit(pageCount, options.maxPages);

    try {
      for (let pageNumber = 1; pageNumber <= limit; pageNumber += 1) {
        try {
          const page = await pdf.getPage(pageNumber);
          const items = await readPageItems(page);
          page.cleanup();
          const text = items.map((item) => (item.hasEOL ? `${item.str}\n` : item.str)).join("");
          if (text.trim()) {
            pages.push(text.trim());
          }
        } catch (error) {
          errors.push(`Page ${pageNumber}: ${errorMessage(error)}`);
        }
      }
    } finally {
      await pdf.destroy();
    }

    return {
      text: pages.join("\n\n"),
      pageCount,
      pagesProcessed: limit,
      errors,
      metadata: { layout: "stream" },
    };
  }
}
