import dotenv from "dotenv";
import { ENGINE_IDS, EngineId, PreferredMethod } from "../shared/types/document.types";
import { isLogLevel, LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  extractionMethod: PreferredMethod;
  extractionUseFallback: boolean;
  extractionMaxPages: number | null;
  extractionCleanText: boolean;
  ocrLanguages: string[];
  ocrMaxWorkers: number | null;
  ocrLangPath: string | null;
  disabledEngines: EngineId[];
  enableEnhancement: boolean;
  enableMatching: boolean;
  enableValidation: boolean;
  minParsingConfidence: number;
  stageTimeoutMs: number;
  includeRawText: boolean;
  maxUploadMb: number;
  openaiApiKey?: string;
  openaiChatModel: string;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = getOptionalTrimmed(source, "PORT") ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (getOptionalTrimmed(source, "LOG_LEVEL") ?? "info").toLowerCase();
  const methodRaw = (getOptionalTrimmed(source, "EXTRACTION_METHOD") ?? "auto").toLowerCase();
  const maxPagesRaw = getOptionalTrimmed(source, "EXTRACTION_MAX_PAGES");
  const ocrWorkersRaw = getOptionalTrimmed(source, "OCR_MAX_WORKERS");
  const minConfidenceRaw = getOptionalTrimmed(source, "MIN_PARSING_CONFIDENCE") ?? "0.3";
  const minParsingConfidence = Number(minConfidenceRaw);
  const stageTimeoutRaw = getOptionalTrimmed(source, "STAGE_TIMEOUT_MS") ?? "60000";
  const stageTimeoutMs = Number(stageTimeoutRaw);
  const maxUploadRaw = getOptionalTrimmed(source, "MAX_UPLOAD_MB") ?? "25";
  const maxUploadMb = Number(maxUploadRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Invalid LOG_LEVEL value: ${logLevelRaw}`);
  }
  if (!Number.isFinite(minParsingConfidence) || minParsingConfidence < 0 || minParsingConfidence > 1) {
    throw new Error(
      `Invalid MIN_PARSING_CONFIDENCE value: ${minConfidenceRaw}. Expected number between 0 and 1.`,
    );
  }
  if (!Number.isInteger(stageTimeoutMs) || stageTimeoutMs < 100) {
    throw new Error(`Invalid STAGE_TIMEOUT_MS value: ${stageTimeoutRaw}`);
  }
  if (!Number.isFinite(maxUploadMb) || maxUploadMb <= 0) {
    throw new Error(`Invalid MAX_UPLOAD_MB value: ${maxUploadRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: logLevelRaw,
    extractionMethod: parseMethod(methodRaw),
    extractionUseFallback: parseBoolean(source.EXTRACTION_USE_FALLBACK ?? "true"),
    extractionMaxPages: maxPagesRaw ? parsePositiveInteger("EXTRACTION_MAX_PAGES", maxPagesRaw) : null,
    extractionCleanText: parseBoolean(source.EXTRACTION_CLEAN_TEXT ?? "true"),
    ocrLanguages: parseList(source.OCR_LANGUAGES ?? "eng"),
    ocrMaxWorkers: ocrWorkersRaw ? parsePositiveInteger("OCR_MAX_WORKERS", ocrWorkersRaw) : null,
    ocrLangPath: getOptionalTrimmed(source, "OCR_LANG_PATH") ?? null,
    disabledEngines: parseList(source.DISABLED_ENGINES ?? "").map((item) => parseEngineId("DISABLED_ENGINES", item)),
    enableEnhancement: parseBoolean(source.ENABLE_ENHANCEMENT ?? "true"),
    enableMatching: parseBoolean(source.ENABLE_MATCHING ?? "true"),
    enableValidation: parseBoolean(source.ENABLE_VALIDATION ?? "true"),
    minParsingConfidence,
    stageTimeoutMs,
    includeRawText: parseBoolean(source.INCLUDE_RAW_TEXT ?? "false"),
    maxUploadMb,
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parsePositiveInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function parseList(rawValue: string): string[] {
  const values = rawValue
    .split(/[,+]/)
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return Array.from(new Set(values));
}

function parseEngineId(name: string, value: string): EngineId {
  const match = ENGINE_IDS.find((id) => id === value);
  if (!match) {
    throw new Error(`Invalid ${name} value: ${value}. Expected one of ${ENGINE_IDS.join(", ")}.`);
  }
  return match;
}

function parseMethod(value: string): PreferredMethod {
  if (value === "auto") {
    return value;
  }
  return parseEngineId("EXTRACTION_METHOD", value);
}
