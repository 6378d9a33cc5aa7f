import { ExtractionConfig } from "../shared/types/document.types";
import { PipelineConfig } from "../shared/types/pipeline.types";
import { EnvConfig } from "./env";

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  preferredMethod: "auto",
  useFallback: true,
  maxPages: null,
  cleanText: true,
  ocrLanguages: ["eng"],
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  extraction: DEFAULT_EXTRACTION_CONFIG,
  enableEnhancement: true,
  enableMatching: true,
  enableValidation: true,
  targetJobDescription: null,
  minParsingConfidence: 0.3,
  stageTimeoutMs: 60_000,
  includeRawText: false,
  ocrMaxWorkers: 2,
  ocrLangPath: null,
  disabledEngines: [],
};

export function buildPipelineConfig(env: EnvConfig): PipelineConfig {
  return {
    extraction: {
      preferredMethod: env.extractionMethod,
      useFallback: env.extractionUseFallback,
      maxPages: env.extractionMaxPages,
      cleanText: env.extractionCleanText,
      ocrLanguages: env.ocrLanguages.length ? env.ocrLanguages : DEFAULT_EXTRACTION_CONFIG.ocrLanguages,
    },
    enableEnhancement: env.enableEnhancement,
    enableMatching: env.enableMatching,
    enableValidation: env.enableValidation,
    targetJobDescription: null,
    minParsingConfidence: env.minParsingConfidence,
    stageTimeoutMs: env.stageTimeoutMs,
    includeRawText: env.includeRawText,
    ocrMaxWorkers: env.ocrMaxWorkers ?? DEFAULT_PIPELINE_CONFIG.ocrMaxWorkers,
    ocrLangPath: env.ocrLangPath,
    disabledEngines: env.disabledEngines,
  };
}

export function mergePipelineConfig(overrides?: Partial<PipelineConfig>): PipelineConfig {
  return {
    ...DEFAULT_PIPELINE_CONFIG,
    ...(overrides ?? {}),
    extraction: {
      ...DEFAULT_EXTRACTION_CONFIG,
      ...(overrides?.extraction ?? {}),
    },
  };
}
