import { randomUUID } from "node:crypto";
import { Logger, logContext, LoggerContext } from "../config/logger";
import { mergePipelineConfig } from "../config/pipeline.config";
import { DocumentService } from "../documents/document.service";
import { shutdownSharedWorkerPools } from "../documents/ocr/ocr-worker-pool";
import { HeuristicEnhancementService } from "../enhancement/heuristic-enhancement.service";
import { ExtractionEngine } from "../extraction/extraction.engine";
import { KeywordMatchingService } from "../matching/keyword-matching.service";
import { ResumeParserService } from "../parsing/resume-parser.service";
import { errorMessage, PipelineCancelledError } from "../shared/errors";
import {
  EnhancementResult,
  EnhancementService,
  MatchingService,
  MatchResult,
} from "../shared/types/collaborators.types";
import { DocumentInput, EngineId, ExtractionResult } from "../shared/types/document.types";
import {
  CRITICAL_STAGES,
  PipelineConfig,
  PipelineResult,
  ProcessOptions,
  STAGE_ORDER,
  StageId,
  StageResult,
} from "../shared/types/pipeline.types";
import { CandidateProfile } from "../shared/types/profile.types";
import { deepFreeze } from "../shared/utils/freeze";
import { DEFAULT_PIPELINE_SCORING, PipelineScoringPolicy, scorePipeline } from "./pipeline-scoring";
import { validatePipelineResult } from "./result-validator";
import { pendingStage, runStage, skippedStage, StageOutcome } from "./stage-runner";

export type PipelineInput = string | Buffer | DocumentInput;

export interface ResumePipelineDependencies {
  logger: Logger;
  config?: Partial<PipelineConfig>;
  documents?: DocumentService;
  extraction?: ExtractionEngine;
  parser?: ResumeParserService;
  /** null turns the stage off regardless of config. */
  enhancement?: EnhancementService | null;
  matching?: MatchingService | null;
  scoring?: PipelineScoringPolicy;
}

export interface ProcessManyOptions extends Omit<ProcessOptions, "processingId" | "onStageChange"> {
  concurrency?: number;
}

export interface PipelineMetrics {
  totalProcessed: number;
  successful: number;
  failed: number;
  cancelled: number;
  successRate: number;
  averageDurationMs: number;
  averageConfidence: number;
  averageQuality: number;
}

const DEFAULT_BATCH_CONCURRENCY = 2;

/** Mutable state of a single run; frozen into a PipelineResult at the end. */
class PipelineRun {
  readonly stageResults: Record<StageId, StageResult> = {
    extraction: pendingStage("extraction"),
    parsing: pendingStage("parsing"),
    enhancement: pendingStage("enhancement"),
    matching: pendingStage("matching"),
    validation: pendingStage("validation"),
  };
  extraction: ExtractionResult | null = null;
  profile: CandidateProfile | null = null;
  enhancement: EnhancementResult | null = null;
  match: MatchResult | null = null;
  cancelled = false;
  halted = false;
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly startedAt = Date.now();
  readonly processedAt = new Date(this.startedAt).toISOString();

  constructor(
    readonly inputRef: string,
    readonly processingId: string,
    private readonly onChange: (stage: StageResult) => void = () => undefined,
  ) {}

  record(result: StageResult): void {
    this.stageResults[result.stage] = result;
    this.onChange({ ...result, warnings: [...result.warnings] });
  }

  skip(stage: StageId, reason: string): void {
    if (this.stageResults[stage].status === "pending") {
      this.record(skippedStage(stage, reason));
    }
  }

  skipFrom(stage: StageId, reason: string): void {
    for (const id of STAGE_ORDER.slice(STAGE_ORDER.indexOf(stage))) {
      this.skip(id, reason);
    }
  }
}

export class ResumePipelineService {
  readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly documents: DocumentService;
  private readonly extraction: ExtractionEngine;
  private readonly parser: ResumeParserService;
  private readonly enhancement: EnhancementService | null;
  private readonly matching: MatchingService | null;
  private readonly scoring: PipelineScoringPolicy;

  constructor(dependencies: ResumePipelineDependencies) {
    this.logger = dependencies.logger;
    this.config = mergePipelineConfig(dependencies.config);
    this.documents = dependencies.documents ?? new DocumentService(this.logger);
    this.extraction =
      dependencies.extraction ??
      new ExtractionEngine(this.logger, {
        disabledEngines: this.config.disabledEngines,
        ocrMaxWorkers: this.config.ocrMaxWorkers,
        ocrLangPath: this.config.ocrLangPath,
      });
    this.parser = dependencies.parser ?? new ResumeParserService(this.logger);
    this.enhancement =
      dependencies.enhancement === undefined ? new HeuristicEnhancementService() : dependencies.enhancement;
    this.matching = dependencies.matching === undefined ? new KeywordMatchingService() : dependencies.matching;
    this.scoring = dependencies.scoring ?? DEFAULT_PIPELINE_SCORING;
  }

  availableEngines(): EngineId[] {
    return Array.from(this.extraction.capabilities);
  }

  /** Stops the process-wide OCR workers. Later runs start them again on demand. */
  async shutdown(): Promise<void> {
    await shutdownSharedWorkerPools();
  }

  /** Runs every stage for one document. Never rejects; failures are reported on the result. */
  async process(input: PipelineInput, options: ProcessOptions = {}): Promise<PipelineResult> {
    const document = toDocumentInput(input);
    const inputRef = describeInput(document);
    const processingId = options.processingId ?? randomUUID();
    const context: LoggerContext = { processing_id: processingId, input_ref: inputRef };
    const run = new PipelineRun(inputRef, processingId, this.stageListener(options, context));
    const { signal } = options;
    const jobDescription = (options.jobDescription ?? this.config.targetJobDescription)?.trim() || null;

    logContext(this.logger, "info", "Resume processing started", context);

    run.extraction = await this.stage(run, "extraction", context, signal, async () => {
      const loaded = await this.documents.loadDocument(document);
      if (!loaded.ok) {
        throw loaded.error;
      }
      const extracted = await this.extraction.extract(loaded.data, this.config.extraction, signal);
      if (!extracted.ok) {
        throw extracted.error;
      }
      return { payload: extracted.data };
    });

    const extraction = run.extraction;
    run.profile = extraction
      ? await this.stage(run, "parsing", context, signal, async () => ({
          payload: this.parser.parse(extraction.text),
        }))
      : null;

    const profile = run.profile;
    const enhancer = this.config.enableEnhancement ? this.enhancement : null;
    if (!enhancer) {
      run.skip("enhancement", "Enhancement disabled");
    }
    run.enhancement =
      profile && enhancer
        ? await this.stage(run, "enhancement", context, signal, async () => ({
            payload: await enhancer.enhance(profile, jobDescription),
          }))
        : null;

    const matcher = this.config.enableMatching ? this.matching : null;
    if (!matcher) {
      run.skip("matching", "Matching disabled");
    } else if (!jobDescription) {
      run.skip("matching", "No job description provided");
    }
    run.match =
      profile && matcher && jobDescription
        ? await this.stage(run, "matching", context, signal, async () => ({
            payload: await matcher.match(profile, jobDescription),
          }))
        : null;

    if (!this.config.enableValidation) {
      run.skip("validation", "Validation disabled");
    }
    const validationWarnings = await this.stage(run, "validation", context, signal, async () => {
      const warnings = validatePipelineResult(run, { minParsingConfidence: this.config.minParsingConfidence });
      return { payload: warnings, warnings, success: warnings.length === 0 };
    });
    if (validationWarnings) {
      run.warnings.push(...validationWarnings);
    }

    return this.finalize(run, context);
  }

  /** Processes documents independently with at most `concurrency` runs in flight; results keep input order. */
  async processMany(inputs: readonly PipelineInput[], options: ProcessManyOptions = {}): Promise<PipelineResult[]> {
    const { concurrency = DEFAULT_BATCH_CONCURRENCY, ...processOptions } = options;
    const results = new Array<PipelineResult>(inputs.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < inputs.length) {
        const index = next;
        next += 1;
        results[index] = await this.process(inputs[index], processOptions);
      }
    };

    const workerCount = Math.max(1, Math.min(concurrency, inputs.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }

  private async stage<T>(
    run: PipelineRun,
    stage: StageId,
    context: LoggerContext,
    signal: AbortSignal | undefined,
    work: () => Promise<StageOutcome<T>>,
  ): Promise<T | null> {
    if (run.halted || run.stageResults[stage].status !== "pending") {
      return null;
    }
    if (signal?.aborted) {
      this.cancel(run, stage, `Pipeline run was cancelled before ${stage}`);
      return null;
    }

    run.record({ ...run.stageResults[stage], status: "in_progress", startTime: new Date().toISOString() });
    const outcome = await runStage(stage, work, {
      timeoutMs: this.config.stageTimeoutMs,
      logger: this.logger,
      context,
      signal,
    });
    run.record(outcome.result);
    if (outcome.result.status === "completed") {
      return outcome.value;
    }

    const message = errorMessage(outcome.error);
    if (outcome.error instanceof PipelineCancelledError) {
      this.cancel(run, stage, `Pipeline run was cancelled during ${stage}`);
    } else if (CRITICAL_STAGES.has(stage)) {
      run.errors.push(`Stage ${stage} failed: ${message}`);
      run.halted = true;
      run.skipFrom(stage, `Skipped after ${stage} failure`);
    } else {
      run.warnings.push(`Stage ${stage} failed, continuing without it: ${message}`);
    }
    return null;
  }

  private stageListener(options: ProcessOptions, context: LoggerContext): (stage: StageResult) => void {
    const listener = options.onStageChange;
    if (!listener) {
      return () => undefined;
    }
    return (stage) => {
      try {
        listener(stage);
      } catch (error) {
        logContext(this.logger, "warn", "Stage listener failed", { ...context, stage: stage.stage }, {
          error: errorMessage(error),
        });
      }
    };
  }

  private cancel(run: PipelineRun, stage: StageId, message: string): void {
    run.cancelled = true;
    run.halted = true;
    run.errors.push(message);
    run.skipFrom(stage, "Pipeline cancelled");
  }

  private finalize(run: PipelineRun, context: LoggerContext): PipelineResult {
    const overallSuccess = Array.from(CRITICAL_STAGES).every((stage) => run.stageResults[stage].success);
    const scores = scorePipeline(run.extraction?.confidence ?? null, run.profile, run.enhancement, this.scoring);
    const totalDurationMs = Date.now() - run.startedAt;

    const result: PipelineResult = {
      inputRef: run.inputRef,
      processingId: run.processingId,
      processedAt: run.processedAt,
      stageResults: run.stageResults,
      extraction: run.extraction,
      profile: run.profile,
      enhancement: run.enhancement,
      match: run.match,
      overallSuccess,
      ...scores,
      totalDurationMs,
      cancelled: run.cancelled,
      errors: run.errors,
      warnings: run.warnings,
    };

    logContext(this.logger, overallSuccess ? "info" : "warn", "Resume processing finished", context, {
      ok: overallSuccess,
      latency_ms: totalDurationMs,
      confidence: scores.confidenceScore,
      cancelled: run.cancelled,
      errors: run.errors.length,
      warnings: run.warnings.length,
    });

    return deepFreeze(result);
  }
}

function toDocumentInput(input: PipelineInput): string | DocumentInput {
  return Buffer.isBuffer(input) ? { buffer: input } : input;
}

function describeInput(input: string | DocumentInput): string {
  return typeof input === "string" ? input : input.ref ?? input.fileName ?? "buffer";
}

export function summarizeResults(results: readonly PipelineResult[]): PipelineMetrics {
  const total = results.length;
  if (!total) {
    return {
      totalProcessed: 0,
      successful: 0,
      failed: 0,
      cancelled: 0,
      successRate: 0,
      averageDurationMs: 0,
      averageConfidence: 0,
      averageQuality: 0,
    };
  }
  const successful = results.filter((result) => result.overallSuccess).length;
  const average = (pick: (result: PipelineResult) => number): number =>
    results.reduce((sum, result) => sum + pick(result), 0) / total;
  return {
    totalProcessed: total,
    successful,
    failed: total - successful,
    cancelled: results.filter((result) => result.cancelled).length,
    successRate: successful / total,
    averageDurationMs: average((result) => result.totalDurationMs),
    averageConfidence: average((result) => result.confidenceScore),
    averageQuality: average((result) => result.qualityScore),
  };
}
