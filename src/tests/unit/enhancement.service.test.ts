import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadEnv } from "../../config/env";
import { silentLogger } from "../../config/logger";
import { createEnhancementService } from "../../enhancement/enhancement.factory";
import { HeuristicEnhancementService } from "../../enhancement/heuristic-enhancement.service";
import { StructuredJsonClient } from "../../enhancement/llm.client";
import { LlmEnhancementService } from "../../enhancement/llm-enhancement.service";
import { parseResume } from "../../parsing/resume-parser.service";
import { EnhancementError } from "../../shared/errors";
import { assertClose, buildProfile, SAMPLE_RESUME } from "../helpers/fixtures";

const fixedNow = (): Date => new Date("2026-06-01T00:00:00Z");

describe("HeuristicEnhancementService", () => {
  const service = new HeuristicEnhancementService(fixedNow);
  const profile = parseResume(SAMPLE_RESUME);

  it("reviews a parsed resume", async () => {
    const review = await service.enhance(profile);

    assertClose(review.overallScore, 0.8 * 0.2 + 0.9 * 0.3 + 0.5 * 0.15 + 0.4 * 0.2 + 0.1);
    assertClose(review.atsCompatibility, 0.15 + 0.15 + (4 / 9) * 0.2 + 0.2 + 0.2 + 0.1);
    assert.equal(review.estimatedExperienceLevel, "senior");
    assert.equal(review.source, "heuristic");
    assert.deepEqual(review.strengths, [
      "Strong work experience with multiple roles",
      "Demonstrates leadership experience",
    ]);
    assert.deepEqual(review.weaknesses, ["Limited technical skills listed"]);
    assert.deepEqual(review.suggestions, [
      "Include your LinkedIn profile URL",
      "Add a more detailed description for the Software Engineer role",
      "Add a more detailed description for the Intern role",
      "Consider adding relevant projects",
      "Consider adding professional certifications relevant to your field",
    ]);
    assert.deepEqual(review.suitableRoles, [
      "Software Developer",
      "Backend Developer",
      "DevOps Engineer",
      "Technical Lead",
      "Engineering Manager",
    ]);
  });

  it("estimates experience from role count when dates are missing", () => {
    const undated = {
      company: "Acme",
      position: null,
      location: null,
      startDate: null,
      endDate: null,
      description: [],
      technologies: [],
    };
    assert.equal(service.experienceLevel(buildProfile()), "entry");
    assert.equal(service.experienceLevel(buildProfile({ workExperience: [undated, undated] })), "mid");
    assert.equal(service.experienceLevel(buildProfile({ workExperience: [undated, undated, undated, undated] })), "senior");
  });

  it("scores an empty profile at zero", () => {
    assert.equal(service.scoreProfile(buildProfile()), 0);
  });
});

describe("LlmEnhancementService", () => {
  function clientReplying(...replies: string[]): StructuredJsonClient {
    return {
      async generateStructuredJson(): Promise<string> {
        const reply = replies.shift();
        if (reply === undefined) {
          throw new Error("no scripted reply left");
        }
        return reply;
      },
    };
  }

  it("normalizes the model review", async () => {
    const client = clientReplying(
      JSON.stringify({
        overallScore: 1.4,
        strengths: ["  Clear impact  ", ""],
        weaknesses: [],
        suggestions: ["Quantify results"],
        atsCompatibility: 0.7,
        estimatedExperienceLevel: "Senior-level",
        suitableRoles: ["Backend Engineer"],
      }),
    );
    const review = await new LlmEnhancementService(client, silentLogger).enhance(buildProfile(), "Node.js role");
    assert.deepEqual(review, {
      overallScore: 1,
      strengths: ["Clear impact"],
      weaknesses: [],
      suggestions: ["Quantify results"],
      atsCompatibility: 0.7,
      estimatedExperienceLevel: "senior",
      suitableRoles: ["Backend Engineer"],
      source: "llm",
    });
  });

  it("throws an EnhancementError when the model output is unusable", async () => {
    const service = new LlmEnhancementService(clientReplying("not json", "still not json"), silentLogger);
    await assert.rejects(service.enhance(buildProfile()), (error: unknown) => {
      assert.ok(error instanceof EnhancementError);
      assert.equal(error.message, "Resume review failed: json_parse_failed");
      return true;
    });
  });
});

describe("createEnhancementService", () => {
  it("uses the heuristic reviewer without an API key", () => {
    assert.ok(createEnhancementService(loadEnv({}), silentLogger) instanceof HeuristicEnhancementService);
    assert.ok(
      createEnhancementService(loadEnv({ OPENAI_API_KEY: "test-secret" }), silentLogger) instanceof LlmEnhancementService,
    );
  });
});
