import assert from "node:assert/strict";
import { Server } from "node:http";
import { after, before, describe, it } from "node:test";
import fetch from "node-fetch";
import { createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { silentLogger } from "../../config/logger";
import { PlainTextExtractor } from "../../documents/extractors/plain-text.extractor";
import { HeuristicEnhancementService } from "../../enhancement/heuristic-enhancement.service";
import { ExtractionEngine } from "../../extraction/extraction.engine";
import { ResumePipelineService } from "../../pipeline/resume-pipeline.service";
import { SAMPLE_RESUME } from "../helpers/fixtures";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

describe("HTTP API", () => {
  let server: Server;
  let baseUrl = "";

  before(async () => {
    const pipeline = new ResumePipelineService({
      logger: silentLogger,
      extraction: new ExtractionEngine(silentLogger, { extractors: [new PlainTextExtractor()] }),
      enhancement: new HeuristicEnhancementService(),
    });
    const { app } = createApp(loadEnv({}), { logger: silentLogger, pipeline });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    assert.ok(typeof address === "object" && address !== null);
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it("answers the health check", async () => {
    const response = await fetch(`${baseUrl}/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { ok: true });
  });

  it("parses an uploaded resume", async () => {
    const query = new URLSearchParams({ jobDescription: "TypeScript and Kubernetes engineer" });
    const response = await fetch(`${baseUrl}/v1/resumes/parse?${query.toString()}`, {
      method: "POST",
      headers: { "Content-Type": "text/plain", "X-File-Name": encodeURIComponent("john doe.txt") },
      body: SAMPLE_RESUME,
    });

    assert.equal(response.status, 200);
    const body: unknown = await response.json();
    assert.ok(isRecord(body));
    assert.equal(body.overallSuccess, true);
    assert.equal(body.inputRef, "john doe.txt");
    assert.ok(isRecord(body.extraction));
    assert.equal(body.extraction.text, undefined);
    assert.equal(body.extraction.method, "plain-text");
    assert.ok(isRecord(body.match));
    assert.deepEqual(body.match.matchedSkills, ["TypeScript"]);
  });

  it("rejects an empty upload", async () => {
    const response = await fetch(`${baseUrl}/v1/resumes/parse`, { method: "POST" });
    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { ok: false, error: "Request body must contain the resume file" });
  });

  it("reports an unreadable document as unprocessable", async () => {
    const response = await fetch(`${baseUrl}/v1/resumes/parse`, {
      method: "POST",
      headers: { "Content-Type": "text/plain", "X-File-Name": "note.txt" },
      body: "hello there",
    });
    assert.equal(response.status, 422);
    const body: unknown = await response.json();
    assert.ok(isRecord(body));
    assert.deepEqual(body.errors, ["Stage parsing failed: Extracted text is too short to parse (11 chars)"]);
  });
});
