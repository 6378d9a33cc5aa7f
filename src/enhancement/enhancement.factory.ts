import { EnvConfig } from "../config/env";
import { Logger } from "../config/logger";
import { EnhancementService } from "../shared/types/collaborators.types";
import { HeuristicEnhancementService } from "./heuristic-enhancement.service";
import { LlmClient } from "./llm.client";
import { LlmEnhancementService } from "./llm-enhancement.service";

export function createEnhancementService(env: EnvConfig, logger: Logger): EnhancementService {
  if (!env.openaiApiKey) {
    return new HeuristicEnhancementService();
  }
  const client = new LlmClient(env.openaiApiKey, logger, env.openaiChatModel);
  return new LlmEnhancementService(client, logger, { timeoutMs: env.stageTimeoutMs });
}
