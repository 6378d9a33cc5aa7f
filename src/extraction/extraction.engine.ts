import { Logger } from "../config/logger";
import { DocxExtractor } from "../documents/extractors/docx.extractor";
import { TextExtractor } from "../documents/extractors/extractor.types";
import { OcrExtractor } from "../documents/extractors/ocr.extractor";
import { PdfParseExtractor } from "../documents/extractors/pdf-parse.extractor";
import { PdfjsLayoutExtractor } from "../documents/extractors/pdfjs-layout.extractor";
import { PdfjsStreamExtractor } from "../documents/extractors/pdfjs-stream.extractor";
import { PlainTextExtractor } from "../documents/extractors/plain-text.extractor";
import { getSharedWorkerPool } from "../documents/ocr/ocr-worker-pool";
import { PdfjsPageRasterizer } from "../documents/ocr/page-rasterizer";
import { normalizeText } from "../parsing/text-normalizer";
import { errorMessage, ExtractionError } from "../shared/errors";
import {
  EngineId,
  ExtractionAttempt,
  ExtractionConfig,
  ExtractionResult,
  RawExtraction,
  SourceDocument,
} from "../shared/types/document.types";
import { err, ok, Result } from "../shared/utils/result";
import { throwIfCancelled } from "../shared/utils/timeout";
import { detectEngineCapabilities, ModuleResolver, resolveInstalledModule } from "./engine-capabilities";
import {
  DEFAULT_EXTRACTION_SCORING,
  DEFAULT_FALLBACK_POLICY,
  ExtractionScoringPolicy,
  FallbackPolicy,
  needsFallback,
  scoreExtraction,
} from "./extraction-confidence";
import {
  DEFAULT_SELECTION_POLICY,
  fallbackCandidates,
  isBetterExtraction,
  selectPrimaryEngine,
  SelectionPolicy,
} from "./method-selector";

export interface ExtractionEngineOptions {
  extractors?: TextExtractor[];
  resolveModule?: ModuleResolver;
  disabledEngines?: EngineId[];
  ocrMaxWorkers?: number;
  ocrLangPath?: string | null;
  scoring?: ExtractionScoringPolicy;
  selection?: SelectionPolicy;
  fallback?: FallbackPolicy;
  normalize?: (text: string) => string;
}

interface ScoredAttempt {
  raw: RawExtraction;
  confidence: number;
  needsFallback: boolean;
}

export function createDefaultExtractors(
  logger: Logger,
  ocrMaxWorkers: number,
  ocrLangPath: string | null = null,
): TextExtractor[] {
  return [
    new PdfParseExtractor(),
    new PdfjsLayoutExtractor(),
    new PdfjsStreamExtractor(),
    new DocxExtractor(),
    new PlainTextExtractor(),
    new OcrExtractor(new PdfjsPageRasterizer(), (languages) =>
      getSharedWorkerPool(languages, ocrMaxWorkers, logger, ocrLangPath),
    ),
  ];
}

export class ExtractionEngine {
  readonly capabilities: ReadonlySet<EngineId>;
  private readonly extractors: Map<EngineId, TextExtractor>;
  private readonly scoring: ExtractionScoringPolicy;
  private readonly selection: SelectionPolicy;
  private readonly fallback: FallbackPolicy;
  private readonly normalize: (text: string) => string;

  constructor(
    private readonly logger: Logger,
    options: ExtractionEngineOptions = {},
  ) {
    const extractors =
      options.extractors ?? createDefaultExtractors(logger, options.ocrMaxWorkers ?? 2, options.ocrLangPath ?? null);
    this.extractors = new Map(extractors.map((extractor) => [extractor.id, extractor]));
    this.capabilities = detectEngineCapabilities(
      extractors,
      options.resolveModule ?? resolveInstalledModule,
      options.disabledEngines ?? [],
    );
    this.scoring = options.scoring ?? DEFAULT_EXTRACTION_SCORING;
    this.selection = options.selection ?? DEFAULT_SELECTION_POLICY;
    this.fallback = options.fallback ?? DEFAULT_FALLBACK_POLICY;
    this.normalize = options.normalize ?? normalizeText;

    this.logger.debug("Extraction engines detected", { engines: Array.from(this.capabilities).join(",") });
  }

  /**
   * Runs the primary engine and, when its output looks unusable, escalates through
   * the fallback order. Engine failures become failed attempts; only cancellation
   * throws (PipelineCancelledError).
   */
  async extract(
    document: SourceDocument,
    config: ExtractionConfig,
    signal?: AbortSignal,
  ): Promise<Result<ExtractionResult, ExtractionError>> {
    const startedAt = Date.now();
    const available = this.availableFor(document);
    const primary = selectPrimaryEngine(document, config.preferredMethod, available, this.selection);
    if (!primary) {
      return err(
        new ExtractionError("engines_exhausted", `No extraction engine available for ${document.kind} documents`),
      );
    }

    const attempts: ExtractionAttempt[] = [];
    let best: (ScoredAttempt & { method: EngineId }) | null = null;
    const queue: EngineId[] = [primary];
    if (config.useFallback) {
      queue.push(...fallbackCandidates(document.kind, primary, available));
    }

    for (const method of queue) {
      throwIfCancelled(signal);
      const attempt = await this.runAttempt(method, document, config);
      attempts.push(attempt.summary);
      if (!attempt.scored || !attempt.scored.raw.text.trim()) {
        continue;
      }

      const candidate = { ...attempt.scored, method };
      const longer = !best || candidate.raw.text.trim().length > best.raw.text.trim().length;
      if (
        isBetterExtraction(
          { text: candidate.raw.text, confidence: candidate.confidence },
          best ? { text: best.raw.text, confidence: best.confidence } : null,
        )
      ) {
        best = candidate;
      }
      if (longer && !candidate.needsFallback) {
        break;
      }
    }

    if (!best) {
      const reasons = attempts.map((attempt) => `${attempt.method}: ${attempt.error ?? "no text extracted"}`);
      return err(
        new ExtractionError("engines_exhausted", `All extraction engines failed for ${document.ref}`, reasons),
      );
    }

    const text = config.cleanText ? this.normalize(best.raw.text) : best.raw.text;
    const elapsedMs = Date.now() - startedAt;
    this.logger.info("Document text extracted", {
      input_ref: document.ref,
      engine: best.method,
      confidence: best.confidence,
      text_length: text.length,
      attempts: attempts.length,
      latency_ms: elapsedMs,
    });

    return ok({
      text,
      method: best.method,
      confidence: best.confidence,
      pageCount: best.raw.pageCount,
      errors: best.raw.errors,
      elapsedMs,
      metadata: best.raw.metadata,
      attempts,
    });
  }

  private availableFor(document: SourceDocument): ReadonlySet<EngineId> {
    const supported = new Set<EngineId>();
    for (const id of this.capabilities) {
      if (this.extractors.get(id)?.supports(document.kind)) {
        supported.add(id);
      }
    }
    return supported;
  }

  private async runAttempt(
    method: EngineId,
    document: SourceDocument,
    config: ExtractionConfig,
  ): Promise<{ summary: ExtractionAttempt; scored: ScoredAttempt | null }> {
    const startedAt = Date.now();
    const extractor = this.extractors.get(method);
    if (!extractor) {
      return {
        summary: failedAttempt(method, startedAt, "Engine is not registered"),
        scored: null,
      };
    }

    try {
      const raw = await extractor.extract(document, {
        maxPages: config.maxPages,
        ocrLanguages: config.ocrLanguages,
      });
      const confidence = scoreExtraction(raw.text, method, this.scoring);
      const fallbackNeeded = needsFallback(raw, confidence, this.fallback);
      const summary: ExtractionAttempt = {
        method,
        ok: raw.text.trim().length > 0,
        textLength: raw.text.length,
        confidence,
        needsFallback: fallbackNeeded,
        elapsedMs: Date.now() - startedAt,
      };
      this.logger.debug("Extraction attempt finished", {
        input_ref: document.ref,
        engine: method,
        text_length: raw.text.length,
        confidence,
        needs_fallback: fallbackNeeded,
        page_errors: raw.errors.length,
      });
      return { summary, scored: { raw, confidence, needsFallback: fallbackNeeded } };
    } catch (error) {
      this.logger.warn("Extraction attempt failed", {
        input_ref: document.ref,
        engine: method,
        error: errorMessage(error),
      });
      return { summary: failedAttempt(method, startedAt, errorMessage(error)), scored: null };
    }
  }
}

function failedAttempt(method: EngineId, startedAt: number, error: string): ExtractionAttempt {
  return {
    method,
    ok: false,
    textLength: 0,
    confidence: 0,
    needsFallback: true,
    elapsedMs: Date.now() - startedAt,
    error,
  };
}
