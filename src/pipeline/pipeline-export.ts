import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { ExtractionResult } from "../shared/types/document.types";
import { PipelineResult, StageResult } from "../shared/types/pipeline.types";

export interface SerializeOptions {
  includeRawText: boolean;
}

export type SerializedExtraction = Omit<ExtractionResult, "text"> & { text?: string; textLength: number };

export type SerializedPipelineResult = Omit<PipelineResult, "extraction" | "stageResults"> & {
  extraction: SerializedExtraction | null;
  stageResults: Record<string, StageResult>;
};

function serializeExtraction(extraction: ExtractionResult, includeRawText: boolean): SerializedExtraction {
  const { text, ...rest } = extraction;
  return includeRawText ? { ...rest, text, textLength: text.length } : { ...rest, textLength: text.length };
}

function isExtractionResult(value: unknown): value is ExtractionResult {
  return typeof value === "object" && value !== null && "text" in value && "method" in value && "attempts" in value;
}

/** Plain JSON-ready copy of a result. Without raw text the extracted document body is left out everywhere. */
export function serializePipelineResult(
  result: PipelineResult,
  options: SerializeOptions = { includeRawText: false },
): SerializedPipelineResult {
  const stageResults: Record<string, StageResult> = {};
  for (const [stage, stageResult] of Object.entries(result.stageResults)) {
    const payload = stageResult.payload;
    stageResults[stage] = {
      ...stageResult,
      payload: isExtractionResult(payload) ? serializeExtraction(payload, options.includeRawText) : payload,
    };
  }

  return {
    ...result,
    stageResults,
    extraction: result.extraction ? serializeExtraction(result.extraction, options.includeRawText) : null,
  };
}

export async function exportPipelineResult(
  result: PipelineResult,
  outputPath: string,
  options: SerializeOptions = { includeRawText: false },
): Promise<string> {
  const absolutePath = path.resolve(outputPath);
  await mkdir(path.dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, `${JSON.stringify(serializePipelineResult(result, options), null, 2)}\n`, "utf8");
  return absolutePath;
}
