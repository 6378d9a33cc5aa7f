import { errorMessage } from "../../shared/errors";
import { DocumentKind, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { ExtractOptions, TextExtractor, pageLimit } from "./extractor.types";
import { openPdf, PositionedText, readPageItems } from "./pdfjs.loader";

const SAME_LINE_TOLERANCE = 2;
const PARAGRAPH_GAP_FACTOR = 1.6;

export class PdfjsLayoutExtractor implements TextExtractor {
  readonly id = "pdfjs-layout" as const;
  readonly requiredModules = ["pdfjs-dist/legacy/build/pdf"] as const;

  supports(kind: DocumentKind): boolean {
    return kind === "pdf";
  }

  async extract(document: SourceDocument, options: ExtractOptions): Promise<RawExtraction> {
    const pdf = await openPdf(document);
    const pages: string[] = [];
    const errors: string[] = [];
    const pageCount = pdf.numPages;
    const limit = pageLimit(pageCount, options.maxPages);

    try {
      for (let pageNumber = 1; pageNumber <= limit; pageNumber += 1) {
        try {
          const page = await pdf.getPage(pageNumber);
          const text = assembleLayoutText(await readPageItems(page));
          page.cleanup();
          if (text.trim()) {
            pages.push(text);
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
      metadata: { layout: "positional" },
    };
  }
}

/**
 * Rebuilds reading order from glyph positions: rows top to bottom, cells left
 * to right, with a blank line where the vertical gap is wider than a line.
 */
export function assembleLayoutText(items: PositionedText[]): string {
  const visible = items.filter((item) => item.str.length > 0);
  if (!visible.length) {
    return "";
  }

  const rows: PositionedText[][] = [];
  const sorted = [...visible].sort((a, b) => b.y - a.y || a.x - b.x);
  for (const item of sorted) {
    const row = rows[rows.length - 1];
    if (row && Math.abs(row[0].y - item.y) <= SAME_LINE_TOLERANCE) {
      row.push(item);
    } else {
      rows.push([item]);
    }
  }

  const lines: string[] = [];
  let previousY: number | null = null;
  let previousHeight = 0;
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);
    const y = row[0].y;
    const height = Math.max(...row.map((item) => item.height)) || previousHeight;
    if (
      previousY !== null &&
      lines.length > 0 &&
      height > 0 &&
      previousY - y > Math.max(height, previousHeight) * PARAGRAPH_GAP_FACTOR
    ) {
      lines.push("");
    }
    lines.push(joinRow(row));
    previousY = y;
    previousHeight = height;
  }

  return lines.join("\n").replace(/[ \t]+$/gm, "");
}

function joinRow(row: PositionedText[]): string {
  let output = "";
  let previousEnd: number | null = null;
  for (const item of row) {
    const needsSpace =
      previousEnd !== null &&
      item.x - previousEnd > 1 &&
      !output.endsWith(" ") &&
      !item.str.startsWith(" ");
    output += needsSpace ? ` ${item.str}` : item.str;
    previousEnd = item.x + item.width;
  }
  return output;
}
