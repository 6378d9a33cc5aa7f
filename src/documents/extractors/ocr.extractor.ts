import { errorMessage } from "../../shared/errors";
import { DocumentKind, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { PageRasterizer } from "../ocr/page-rasterizer";
import { TextRecognizer } from "../ocr/ocr-worker-pool";
import { ExtractOptions, TextExtractor } from "./extractor.types";

export type RecognizerProvider = (languages: string[]) => TextRecognizer;

export class OcrExtractor implements TextExtractor {
  readonly id = "ocr" as const;
  readonly requiredModules = ["tesseract.js", "@napi-rs/canvas", "pdfjs-dist/legacy/build/pdf"] as const;

  constructor(
    private readonly rasterizer: PageRasterizer,
    private readonly recognizerFor: RecognizerProvider,
  ) {}

  supports(kind: DocumentKind): boolean {
    return kind === "pdf";
  }

  async extract(document: SourceDocument, options: ExtractOptions): Promise<RawExtraction> {
    const rasterized = await this.rasterizer.rasterize(document, options.maxPages);
    const recognizer = this.recognizerFor(options.ocrLanguages);
    const errors = [...rasterized.errors];
    const texts: string[] = [];
    const confidences: number[] = [];

    // Jobs are queued together; the pool decides how many run at once.
    const settled = await Promise.allSettled(rasterized.pages.map((page) => recognizer.recognize(page.image)));
    settled.forEach((outcome, index) => {
      const pageNumber = rasterized.pages[index]?.pageNumber ?? index + 1;
      if (outcome.status === "rejected") {
        errors.push(`Page ${pageNumber}: ${errorMessage(outcome.reason)}`);
        return;
      }
      const text = outcome.value.text.trim();
      if (text) {
        texts.push(text);
        confidences.push(outcome.value.confidence);
      }
    });

    return {
      text: texts.join("\n\n"),
      pageCount: rasterized.pageCount,
      pagesProcessed: rasterized.pages.length + rasterized.errors.length,
      errors,
      metadata: {
        languages: options.ocrLanguages.join("+"),
        recognitionConfidence: confidences.length
          ? confidences.reduce((sum, value) => sum + value, 0) / confidences.length
          : 0,
      },
    };
  }
}
