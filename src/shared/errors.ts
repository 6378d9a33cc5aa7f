export type ExtractionErrorCode =
  | "document_not_found"
  | "document_empty"
  | "unsupported_document"
  | "engines_exhausted";

export type ParsingErrorCode = "empty_text" | "unusable_text";

export abstract class PipelineError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ExtractionError extends PipelineError {
  constructor(
    readonly code: ExtractionErrorCode,
    message: string,
    readonly attemptErrors: string[] = [],
  ) {
    super(message);
  }
}

export class ParsingError extends PipelineError {
  constructor(
    readonly code: ParsingErrorCode,
    message: string,
  ) {
    super(message);
  }
}

export class EnhancementError extends PipelineError {
  readonly code = "enhancement_failed";
}

export class MatchingError extends PipelineError {
  readonly code = "matching_failed";
}

export class StageTimeoutError extends PipelineError {
  readonly code = "stage_timeout";

  constructor(
    readonly stage: string,
    readonly timeoutMs: number,
  ) {
    super(`Stage ${stage} timed out after ${timeoutMs}ms`);
  }
}

export class PipelineCancelledError extends PipelineError {
  readonly code = "pipeline_cancelled";

  constructor(message = "Pipeline run was cancelled") {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
