import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { RESUME_REVIEWER_SYSTEM_PROMPT } from "./prompts/system.prompt";

const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
  response_format?: { type: "json_object" };
}

export interface LlmCallOptions {
  promptName?: string;
}

/** The part of the client the safe wrappers and services depend on. */
export interface StructuredJsonClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export class LlmClient implements StructuredJsonClient {
  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    private readonly chatModel: string,
  ) {}

  getModelName(): string {
    return this.chatModel;
  }

  async generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    const requestBody = this.buildJsonRequestBody(prompt, maxTokens);
    try {
      const response = await fetch(CHAT_COMPLETIONS_URL, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${body}`);
      }

      const content = readMessageContent(await response.json());
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        prompt_name: promptName,
        model_name: this.chatModel,
        latency_ms: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        prompt_name: promptName,
        model_name: this.chatModel,
        latency_ms: Date.now() - startedAt,
        maxTokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature: 0.2,
      messages: [
        {
          role: "system",
          content: RESUME_REVIEWER_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
      response_format: { type: "json_object" },
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function readMessageContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  const content = first.message.content;
  return typeof content === "string" && content.trim() ? content : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
