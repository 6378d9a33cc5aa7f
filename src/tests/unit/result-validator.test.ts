import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { emptyContactInfo } from "../../parsing/extractors/contact.extractor";
import { validatePipelineResult } from "../../pipeline/result-validator";
import { ExtractionResult } from "../../shared/types/document.types";
import { buildProfile } from "../helpers/fixtures";

function extraction(text: string, confidence: number): ExtractionResult {
  return {
    text,
    method: "pdf-parse",
    confidence,
    pageCount: 1,
    errors: [],
    elapsedMs: 5,
    metadata: {},
    attempts: [],
  };
}

const experience = {
  company: "Acme Corp",
  position: "Engineer",
  location: null,
  startDate: "Jan 2020",
  endDate: "Present",
  description: [],
  technologies: [],
};

describe("validatePipelineResult", () => {
  it("returns no warnings for a sound result", () => {
    const profile = buildProfile({
      contactInfo: { ...emptyContactInfo(), email: "jane@example.com" },
      workExperience: [experience],
      parsingConfidence: 0.7,
    });
    assert.deepEqual(validatePipelineResult({ extraction: extraction("x".repeat(200), 0.9), profile }), []);
  });

  it("lists every problem in a fixed order", () => {
    const profile = buildProfile({ parsingConfidence: 0.125 });
    assert.deepEqual(validatePipelineResult({ extraction: extraction("short text", 0.42), profile }), [
      "Low extraction confidence: 0.42",
      "Very little text extracted (10 chars)",
      "Parsing confidence below threshold: 0.13",
      "No email found in resume",
      "No work experience found",
    ]);
  });

  it("uses the configured parsing threshold", () => {
    const profile = buildProfile({
      contactInfo: { ...emptyContactInfo(), email: "jane@example.com" },
      workExperience: [experience],
      parsingConfidence: 0.5,
    });
    assert.deepEqual(
      validatePipelineResult({ extraction: extraction("x".repeat(200), 0.9), profile }, { minParsingConfidence: 0.6 }),
      ["Parsing confidence below threshold: 0.50"],
    );
  });

  it("only checks what is present", () => {
    assert.deepEqual(validatePipelineResult({ extraction: null, profile: null }), []);
  });
});
