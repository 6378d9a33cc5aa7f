import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { emptyContactInfo } from "../../parsing/extractors/contact.extractor";
import {
  computeCompletenessScore,
  computeConfidenceScore,
  computeQualityScore,
  scorePipeline,
} from "../../pipeline/pipeline-scoring";
import { EnhancementResult } from "../../shared/types/collaborators.types";
import { assertClose, buildProfile } from "../helpers/fixtures";

const enhancement: EnhancementResult = {
  overallScore: 0.5,
  strengths: [],
  weaknesses: [],
  suggestions: [],
  atsCompatibility: 0.6,
  estimatedExperienceLevel: "mid",
  suitableRoles: [],
  source: "heuristic",
};

describe("pipeline scoring", () => {
  it("weights extraction, parsing and enhancement confidence", () => {
    assertClose(computeConfidenceScore(0.9, 0.6, enhancement), 0.9 * 0.3 + 0.6 * 0.4 + 0.5 * 0.3);
    assertClose(computeConfidenceScore(0.9, 0.6, null), 0.9 * 0.3 + 0.6 * 0.4 + 0.2);
  });

  it("credits contact completeness and present sections for quality", () => {
    const profile = buildProfile({
      contactInfo: { ...emptyContactInfo(), name: "Jane Roe", email: "jane@example.com" },
      skills: ["TypeScript"],
      summary: "Engineer",
    });
    assertClose(computeQualityScore(profile), (2 / 3) * 0.2 + 0.2 + 0.1);
  });

  it("measures completeness against the nine section kinds", () => {
    const profile = buildProfile({ sectionsFound: ["summary", "experience", "skills"] });
    assertClose(computeCompletenessScore(profile), 3 / 9);
  });

  it("keeps every score at zero until a profile exists", () => {
    assert.deepEqual(scorePipeline(0.9, null, enhancement), {
      confidenceScore: 0,
      qualityScore: 0,
      completenessScore: 0,
    });
  });

  it("clamps scores into [0, 1]", () => {
    const profile = buildProfile({ parsingConfidence: 5 });
    const scores = scorePipeline(3, profile, { ...enhancement, overallScore: 4 });
    assert.equal(scores.confidenceScore, 1);
    assert.equal(scores.qualityScore, 0);
  });
});
