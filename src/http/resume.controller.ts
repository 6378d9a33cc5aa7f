import express, { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { serializePipelineResult } from "../pipeline/pipeline-export";
import { ResumePipelineService } from "../pipeline/resume-pipeline.service";

interface ResumeControllerDeps {
  pipeline: ResumePipelineService;
  logger: Logger;
  maxUploadMb: number;
  includeRawText: boolean;
}

function readJobDescription(request: Request): string | null {
  const value = request.query.jobDescription;
  return typeof value === "string" && value.trim() ? value : null;
}

function readFileName(request: Request): string | undefined {
  const header = request.header("x-file-name");
  if (!header) {
    return undefined;
  }
  try {
    return decodeURIComponent(header);
  } catch {
    return header;
  }
}

export function buildResumeController(deps: ResumeControllerDeps): Router {
  const router = Router();

  router.post(
    "/parse",
    express.raw({ type: () => true, limit: `${deps.maxUploadMb}mb` }),
    async (request: Request, response: Response) => {
      const body: unknown = request.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        response.status(400).json({ ok: false, error: "Request body must contain the resume file" });
        return;
      }

      try {
        const result = await deps.pipeline.process(
          {
            buffer: body,
            fileName: readFileName(request),
            mimeType: request.header("content-type"),
          },
          { jobDescription: readJobDescription(request) },
        );
        response
          .status(result.overallSuccess ? 200 : 422)
          .json(serializePipelineResult(result, { includeRawText: deps.includeRawText }));
      } catch (error) {
        deps.logger.error("Failed to process uploaded resume", {
          error: error instanceof Error ? error.message : "Unknown error",
        });
        response.status(500).json({ ok: false, error: "Internal error" });
      }
    },
  );

  return router;
}
