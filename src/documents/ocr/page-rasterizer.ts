import { SourceDocument } from "../../shared/types/document.types";
import { openPdf, PdfPage } from "../extractors/pdfjs.loader";

type NapiCanvasModule = typeof import("@napi-rs/canvas");
type NapiCanvas = import("@napi-rs/canvas").Canvas;
type NapiContext = ReturnType<NapiCanvas["getContext"]>;

interface CanvasAndContext {
  canvas: NapiCanvas | null;
  context: NapiContext | null;
}

export interface RasterizedPage {
  pageNumber: number;
  image: Buffer;
}

export interface RasterizeResult {
  pageCount: number;
  pages: RasterizedPage[];
  errors: string[];
}

export interface PageRasterizer {
  rasterize(document: SourceDocument, maxPages: number | null): Promise<RasterizeResult>;
}

const DEFAULT_SCALE = 2;

/** pdf.js calls this to allocate scratch canvases while painting a page. */
class NapiCanvasFactory {
  constructor(private readonly canvasModule: NapiCanvasModule) {}

  create(width: number, height: number): CanvasAndContext {
    const canvas = this.canvasModule.createCanvas(Math.max(1, Math.ceil(width)), Math.max(1, Math.ceil(height)));
    return { canvas, context: canvas.getContext("2d") };
  }

  reset(target: CanvasAndContext, width: number, height: number): void {
    if (!target.canvas) {
      throw new Error("Canvas is not specified");
    }
    target.canvas.width = Math.max(1, Math.ceil(width));
    target.canvas.height = Math.max(1, Math.ceil(height));
  }

  destroy(target: CanvasAndContext): void {
    if (target.canvas) {
      target.canvas.width = 0;
      target.canvas.height = 0;
    }
    target.canvas = null;
    target.context = null;
  }
}

export class PdfjsPageRasterizer implements PageRasterizer {
  constructor(private readonly scale = DEFAULT_SCALE) {}

  async rasterize(document: SourceDocument, maxPages: number | null): Promise<RasterizeResult> {
    const canvasModule = await import("@napi-rs/canvas");
    const canvasFactory = new NapiCanvasFactory(canvasModule);
    const pdf = await openPdf(document, { tolerant: true, canvasFactory });
    const pageCount = pdf.numPages;
    const limit = maxPages && maxPages > 0 ? Math.min(maxPages, pageCount) : pageCount;
    const pages: RasterizedPage[] = [];
    const errors: string[] = [];

    try {
      for (let pageNumber = 1; pageNumber <= limit; pageNumber += 1) {
        try {
          const page = await pdf.getPage(pageNumber);
          pages.push({ pageNumber, image: await this.renderPage(page, canvasFactory) });
          page.cleanup();
        } catch (error) {
          errors.push(`Page ${pageNumber}: ${error instanceof Error ? error.message : "Unknown error"}`);
        }
      }
    } finally {
      await pdf.destroy();
    }

    return { pageCount, pages, errors };
  }

  private async renderPage(page: PdfPage, canvasFactory: NapiCanvasFactory): Promise<Buffer> {
    const viewport = page.getViewport({ scale: this.scale });
    const target = canvasFactory.create(viewport.width, viewport.height);
    try {
      const { canvas, context } = target;
      if (!canvas || !context) {
        throw new Error("Canvas allocation failed");
      }
      context.fillStyle = "#ffffff";
      context.fillRect(0, 0, canvas.width, canvas.height);
      const renderParams = { canvasContext: context, viewport };
      await page.render(renderParams).promise;
      return canvas.toBuffer("image/png");
    } finally {
      canvasFactory.destroy(target);
    }
  }
}
