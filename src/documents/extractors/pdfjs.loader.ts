import { SourceDocument } from "../../shared/types/document.types";

export type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf");
export type PdfDocument = Awaited<ReturnType<PdfjsModule["getDocument"]>["promise"]>;
export type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;

export interface OpenPdfOptions {
  tolerant?: boolean;
  canvasFactory?: object;
}

let pdfjsModule: PdfjsModule | null = null;

export async function loadPdfjs(): Promise<PdfjsModule> {
  if (!pdfjsModule) {
    pdfjsModule = await import("pdfjs-dist/legacy/build/pdf");
  }
  return pdfjsModule;
}

export async function openPdf(document: SourceDocument, options: OpenPdfOptions = {}): Promise<PdfDocument> {
  const pdfjs = await loadPdfjs();
  // pdf.js detaches the array it is given, so hand it a copy.
  const params = {
    data: new Uint8Array(document.buffer),
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    stopAtErrors: !options.tolerant,
    verbosity: 0,
    ...(options.canvasFactory ? { canvasFactory: options.canvasFactory } : {}),
  };
  return pdfjs.getDocument(params).promise;
}

export interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
  hasEOL: boolean;
}

export async function readPageItems(page: PdfPage): Promise<PositionedText[]> {
  const content = await page.getTextContent();
  const items: PositionedText[] = [];
  for (const item of content.items) {
    if (!("str" in item)) {
      continue;
    }
    const transform: unknown[] = Array.isArray(item.transform) ? item.transform : [];
    items.push({
      str: item.str,
      x: toNumber(transform[4]),
      y: toNumber(transform[5]),
      width: toNumber(item.width),
      height: toNumber(item.height),
      hasEOL: Boolean(item.hasEOL),
    });
  }
  return items;
}

function toNumber(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}
