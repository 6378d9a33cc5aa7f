export { createApp } from "./app";
export type { AppContext, AppOverrides } from "./app";
export { loadEnv } from "./config/env";
export type { EnvConfig } from "./config/env";
export { createLogger, silentLogger } from "./config/logger";
export type { Logger, LogLevel } from "./config/logger";
export { buildPipelineConfig, DEFAULT_PIPELINE_CONFIG, mergePipelineConfig } from "./config/pipeline.config";
export { DocumentService } from "./documents/document.service";
export type { TextExtractor } from "./documents/extractors/extractor.types";
export { shutdownSharedWorkerPools } from "./documents/ocr/ocr-worker-pool";
export { createEnhancementService } from "./enhancement/enhancement.factory";
export { HeuristicEnhancementService } from "./enhancement/heuristic-enhancement.service";
export { LlmEnhancementService } from "./enhancement/llm-enhancement.service";
export { ExtractionEngine } from "./extraction/extraction.engine";
export { KeywordMatchingService } from "./matching/keyword-matching.service";
export { parseResume, ResumeParserService } from "./parsing/resume-parser.service";
export { segmentSections } from "./parsing/section-segmenter";
export { normalizeText } from "./parsing/text-normalizer";
export { exportPipelineResult, serializePipelineResult } from "./pipeline/pipeline-export";
export { ResumePipelineService, summarizeResults } from "./pipeline/resume-pipeline.service";
export type { PipelineInput, PipelineMetrics, ResumePipelineDependencies } from "./pipeline/resume-pipeline.service";
export { validatePipelineResult } from "./pipeline/result-validator";
export * from "./shared/errors";
export * from "./shared/types/collaborators.types";
export * from "./shared/types/document.types";
export * from "./shared/types/pipeline.types";
export * from "./shared/types/profile.types";
export type { Result } from "./shared/utils/result";
