import express, { Express, NextFunction, Request, Response } from "express";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { buildPipelineConfig } from "./config/pipeline.config";
import { createEnhancementService } from "./enhancement/enhancement.factory";
import { buildResumeController } from "./http/resume.controller";
import { ResumePipelineService } from "./pipeline/resume-pipeline.service";

export interface AppContext {
  app: Express;
  pipeline: ResumePipelineService;
  logger: Logger;
}

export interface AppOverrides {
  logger?: Logger;
  pipeline?: ResumePipelineService;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const pipeline =
    overrides.pipeline ??
    new ResumePipelineService({
      logger,
      config: buildPipelineConfig(env),
      enhancement: createEnhancementService(env, logger),
    });
  const app = express();

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/v1/resumes",
    buildResumeController({
      pipeline,
      logger,
      maxUploadMb: env.maxUploadMb,
      includeRawText: env.includeRawText,
    }),
  );

  // Body parser failures (oversized uploads) arrive here with a status attached.
  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    const status = readHttpStatus(error);
    logger.warn("Request rejected", {
      status,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(status).json({ ok: false, error: status === 413 ? "Upload too large" : "Bad request" });
  });

  return { app, pipeline, logger };
}

function readHttpStatus(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}
