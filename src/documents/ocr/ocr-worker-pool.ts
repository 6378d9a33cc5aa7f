import os from "node:os";
import { Logger } from "../../config/logger";
import { resolveLanguageData } from "./language-data";

export interface RecognizedPage {
  text: string;
  confidence: number;
}

export interface TextRecognizer {
  recognize(image: Buffer): Promise<RecognizedPage>;
  shutdown(): Promise<void>;
}

type TesseractModule = typeof import("tesseract.js");
type TesseractScheduler = ReturnType<TesseractModule["createScheduler"]>;

export function resolveWorkerCount(configured: number): number {
  return Math.max(1, Math.min(configured, os.availableParallelism()));
}

/**
 * A tesseract.js scheduler with a fixed set of workers. Workers are created on
 * the first job and reused until shutdown.
 */
export class TesseractWorkerPool implements TextRecognizer {
  private scheduler: Promise<TesseractScheduler> | null = null;
  readonly workerCount: number;

  constructor(
    private readonly languages: string[],
    maxWorkers: number,
    private readonly logger: Logger,
    private readonly langPath: string | null = null,
  ) {
    this.workerCount = resolveWorkerCount(maxWorkers);
  }

  async warmUp(): Promise<void> {
    await this.getScheduler();
  }

  async recognize(image: Buffer): Promise<RecognizedPage> {
    const scheduler = await this.getScheduler();
    const result = await scheduler.addJob("recognize", image);
    return {
      text: result.data.text,
      confidence: result.data.confidence / 100,
    };
  }

  async shutdown(): Promise<void> {
    const pending = this.scheduler;
    this.scheduler = null;
    if (!pending) {
      return;
    }
    const scheduler = await pending;
    await scheduler.terminate();
    this.logger.info("OCR worker pool terminated", { languages: this.languages.join("+") });
  }

  private getScheduler(): Promise<TesseractScheduler> {
    if (!this.scheduler) {
      this.scheduler = this.createScheduler().catch((error: unknown) => {
        this.scheduler = null;
        throw error;
      });
    }
    return this.scheduler;
  }

  private async createScheduler(): Promise<TesseractScheduler> {
    const data = resolveLanguageData(this.languages, this.langPath);
    const tesseract = await import("tesseract.js");
    const scheduler = tesseract.createScheduler();
    // Data comes from disk only; nothing is fetched or cached next to the process.
    const workers = await Promise.all(
      Array.from({ length: this.workerCount }, () =>
        tesseract.createWorker(this.languages, tesseract.OEM.LSTM_ONLY, {
          langPath: data.langPath,
          gzip: data.gzip,
          cacheMethod: "none",
        }),
      ),
    );
    for (const worker of workers) {
      scheduler.addWorker(worker);
    }
    this.logger.info("OCR worker pool started", {
      languages: this.languages.join("+"),
      workers: this.workerCount,
    });
    return scheduler;
  }
}

const sharedPools = new Map<string, TesseractWorkerPool>();

export function getSharedWorkerPool(
  languages: string[],
  maxWorkers: number,
  logger: Logger,
  langPath: string | null = null,
): TesseractWorkerPool {
  const key = `${languages.join("+")}@${langPath ?? "packaged"}`;
  const existing = sharedPools.get(key);
  if (existing) {
    return existing;
  }
  const pool = new TesseractWorkerPool(languages, maxWorkers, logger, langPath);
  sharedPools.set(key, pool);
  return pool;
}

export async function shutdownSharedWorkerPools(): Promise<void> {
  const pools = Array.from(sharedPools.values());
  sharedPools.clear();
  await Promise.all(pools.map((pool) => pool.shutdown()));
}
