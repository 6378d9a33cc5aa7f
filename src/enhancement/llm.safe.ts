import { Logger } from "../config/logger";
import { withTimeout } from "../shared/utils/timeout";
import { StructuredJsonClient } from "./llm.client";
import { buildJsonRepairPrompt } from "./prompts/json-repair.prompt";

export interface JsonSafeCallArgs<T> {
  llmClient: StructuredJsonClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  validate: (value: unknown) => value is T;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeJsonErrorCode =
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "schema_invalid";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      raw?: string;
    };

type RawCallResult =
  | { ok: true; raw: string }
  | { ok: false; error_code: "timeout" | "transient_failure" | "llm_failure" };

const DEFAULT_TIMEOUT_MS = 25_000;

/**
 * Calls the model for a JSON object: one retry on transient failures, one repair
 * round when the output does not parse, and schema validation at the end.
 */
export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const initial = await attemptJsonCall(args, args.prompt, args.maxTokens, args.promptName, timeoutMs);
  if (!initial.ok) {
    return initial;
  }

  const parsed = tryParseJsonObject(initial.raw);
  if (parsed.ok) {
    return args.validate(parsed.data)
      ? { ok: true, data: parsed.data }
      : { ok: false, error_code: "schema_invalid", raw: initial.raw };
  }

  const repaired = await attemptJsonCall(
    args,
    buildJsonRepairPrompt({ schemaHint: args.schemaHint, raw: initial.raw }),
    Math.max(240, Math.min(2400, args.maxTokens)),
    `${args.promptName}_json_repair`,
    timeoutMs,
  );
  if (!repaired.ok) {
    return repaired;
  }
  const repairedParsed = tryParseJsonObject(repaired.raw);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.raw };
  }
  return args.validate(repairedParsed.data)
    ? { ok: true, data: repairedParsed.data }
    : { ok: false, error_code: "schema_invalid", raw: repaired.raw };
}

async function attemptJsonCall<T>(
  args: JsonSafeCallArgs<T>,
  prompt: string,
  maxTokens: number,
  promptName: string,
  timeoutMs: number,
): Promise<RawCallResult> {
  const attempt = async (): Promise<string> =>
    withTimeout(
      args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }),
      timeoutMs,
      () => new Error("timeout"),
    );

  try {
    return { ok: true, raw: await attempt() };
  } catch (error) {
    if (!isTransientError(error)) {
      return { ok: false, error_code: isTimeoutError(error) ? "timeout" : "llm_failure" };
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    prompt_name: promptName,
    model_name: args.llmClient.getModelName?.(),
  });
  try {
    return { ok: true, raw: await attempt() };
  } catch (error) {
    return {
      ok: false,
      error_code: isTimeoutError(error)
        ? "timeout"
        : isTransientError(error)
          ? "transient_failure"
          : "llm_failure",
    };
  }
}

export function tryParseJsonObject(raw: string): { ok: true; data: unknown } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
