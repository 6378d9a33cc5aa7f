import { Logger, logContext, LoggerContext } from "../config/logger";
import { errorMessage, StageTimeoutError } from "../shared/errors";
import { StageId, StageResult } from "../shared/types/pipeline.types";
import { withTimeout } from "../shared/utils/timeout";

export interface StageOutcome<T> {
  payload: T;
  warnings?: string[];
  /** Defaults to true; the validation stage reports false when it has warnings. */
  success?: boolean;
}

export interface StageRun<T> {
  result: StageResult<T>;
  value: T | null;
  error: unknown;
}

export function pendingStage(stage: StageId): StageResult {
  return {
    stage,
    status: "pending",
    startTime: null,
    endTime: null,
    durationMs: 0,
    success: false,
    error: null,
    warnings: [],
    payload: null,
  };
}

export function skippedStage(stage: StageId, reason: string | null = null): StageResult {
  return { ...pendingStage(stage), status: "skipped", error: reason };
}

/**
 * Runs one stage under a timeout. Errors, timeouts and cancellation are caught
 * and reported on the returned StageResult; this never rejects.
 */
export async function runStage<T>(
  stage: StageId,
  work: () => Promise<StageOutcome<T>>,
  options: { timeoutMs: number; logger: Logger; context: LoggerContext; signal?: AbortSignal },
): Promise<StageRun<T>> {
  const startedAt = Date.now();
  const startTime = new Date(startedAt).toISOString();
  const context: LoggerContext = { ...options.context, stage };
  logContext(options.logger, "debug", "Stage started", context);

  try {
    const outcome = await withTimeout(
      work(),
      options.timeoutMs,
      () => new StageTimeoutError(stage, options.timeoutMs),
      options.signal,
    );
    const durationMs = Date.now() - startedAt;
    const success = outcome.success ?? true;
    logContext(options.logger, "info", "Stage completed", { ...context, latency_ms: durationMs, ok: success });
    return {
      result: {
        stage,
        status: "completed",
        startTime,
        endTime: new Date().toISOString(),
        durationMs,
        success,
        error: null,
        warnings: outcome.warnings ?? [],
        payload: outcome.payload,
      },
      value: outcome.payload,
      error: null,
    };
  } catch (error) {
    const durationMs = Date.now() - startedAt;
    const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : "stage_failed";
    logContext(options.logger, "warn", "Stage failed", {
      ...context,
      latency_ms: durationMs,
      ok: false,
      error_code: code,
    }, { error: errorMessage(error) });
    return {
      result: {
        stage,
        status: "failed",
        startTime,
        endTime: new Date().toISOString(),
        durationMs,
        success: false,
        error: errorMessage(error),
        warnings: [],
        payload: null,
      },
      value: null,
      error,
    };
  }
}
