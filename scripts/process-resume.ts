import { parseArgs } from "node:util";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { buildPipelineConfig } from "../src/config/pipeline.config";
import { createEnhancementService } from "../src/enhancement/enhancement.factory";
import { exportPipelineResult, serializePipelineResult } from "../src/pipeline/pipeline-export";
import { ResumePipelineService } from "../src/pipeline/resume-pipeline.service";

const USAGE = "Usage: process-resume <file> [--job-description <text>] [--output <path>] [--include-raw-text]";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      "job-description": { type: "string" },
      output: { type: "string", short: "o" },
      "include-raw-text": { type: "boolean", default: false },
    },
  });
  const filePath = positionals[0];
  if (!filePath) {
    throw new Error(USAGE);
  }

  const env = loadEnv();
  // Logs go to stderr so stdout stays a clean JSON document.
  const logger = createLogger({ minLevel: env.logLevel, write: (line) => process.stderr.write(line) });
  const pipeline = new ResumePipelineService({
    logger,
    config: buildPipelineConfig(env),
    enhancement: createEnhancementService(env, logger),
  });
  const includeRawText = values["include-raw-text"] === true || env.includeRawText;

  try {
    const result = await pipeline.process(filePath, { jobDescription: values["job-description"] ?? null });
    if (values.output) {
      const written = await exportPipelineResult(result, values.output, { includeRawText });
      logger.info("Pipeline result written", { path: written });
    } else {
      process.stdout.write(`${JSON.stringify(serializePipelineResult(result, { includeRawText }), null, 2)}\n`);
    }
    if (!result.overallSuccess) {
      process.exitCode = 1;
    }
  } finally {
    await pipeline.shutdown();
  }
}

void main().catch((error) => {
  process.stderr.write(`[process-resume] ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
