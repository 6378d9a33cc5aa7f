import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, pipeline, logger } = createApp(env);

  const server = app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("Extraction engines", { available: pipeline.availableEngines() });
    logger.info("Pipeline stages", {
      enhancement: env.enableEnhancement,
      enhancementSource: env.openaiApiKey ? "llm" : "heuristic",
      matching: env.enableMatching,
      validation: env.enableValidation,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    server.close();
    void pipeline
      .shutdown()
      .then(() => logger.info("OCR workers stopped"))
      .catch((error) => {
        logger.warn("Failed to stop OCR workers", {
          error: error instanceof Error ? error.message : "Unknown error",
        });
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

void bootstrap();
