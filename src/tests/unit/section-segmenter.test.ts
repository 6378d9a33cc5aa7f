import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { matchSectionHeading, segmentSections } from "../../parsing/section-segmenter";
import { normalizeText } from "../../parsing/text-normalizer";
import { SAMPLE_RESUME } from "../helpers/fixtures";

describe("segmentSections", () => {
  it("finds sections in document order", () => {
    const sections = segmentSections(normalizeText(SAMPLE_RESUME));
    assert.deepEqual(Array.from(sections.keys()), ["summary", "experience", "education", "skills"]);
    assert.equal(sections.get("summary"), "Backend engineer with eight years of experience building APIs.");
    assert.equal(sections.get("skills"), "TypeScript, Node.js, PostgreSQL, Docker");
  });

  it("takes content after a colon on the heading line", () => {
    const sections = segmentSections("Jane Roe\n\nSkills: TypeScript, Rust\nLanguages: English, Polish");
    assert.equal(sections.get("skills"), "TypeScript, Rust");
    assert.equal(sections.get("languages"), "English, Polish");
  });

  it("keeps technology labels inside a projects block", () => {
    const projects = [
      "Ledger Service",
      "Double-entry ledger API for payments",
      "Technologies: TypeScript, PostgreSQL",
      "",
      "Route Planner",
      "Delivery route optimiser for couriers",
      "Technologies: Golang, Redis",
    ].join("\n");
    const sections = segmentSections(`Projects\n${projects}\n\nEducation\nMIT, 2015`);
    assert.deepEqual(Array.from(sections.keys()), ["projects", "education"]);
    assert.equal(sections.get("projects"), projects);
  });

  it("keeps category labels inside a skills block", () => {
    const sections = segmentSections("Technical Skills\nLanguages: TypeScript, Go\nFrameworks: React, Express");
    assert.deepEqual(Array.from(sections.keys()), ["skills"]);
    assert.equal(sections.get("skills"), "Languages: TypeScript, Go\nFrameworks: React, Express");
  });

  it("keeps the first occurrence of a repeated heading by default", () => {
    const text = "Skills\nGraphQL\n\nExperience\nAcme\n\nSkills\nRust";
    assert.equal(segmentSections(text).get("skills"), "GraphQL");
    assert.equal(segmentSections(text, "last").get("skills"), "Rust");
  });

  it("does not record a heading with nothing under it", () => {
    const sections = segmentSections("Summary\n\nSkills\nKotlin");
    assert.deepEqual(Array.from(sections.keys()), ["skills"]);
  });

  it("returns an empty map when there are no headings", () => {
    assert.equal(segmentSections("Just a paragraph of prose about nothing in particular.").size, 0);
  });
});

describe("matchSectionHeading", () => {
  it("prefers the longest heading variant", () => {
    assert.equal(matchSectionHeading("Professional Summary"), "summary");
    assert.equal(matchSectionHeading("Technical Skills"), "skills");
    assert.equal(matchSectionHeading("Language Skills"), "languages");
  });

  it("accepts numbered and bulleted headings with a trailing colon", () => {
    assert.equal(matchSectionHeading("  2. Work Experience:"), "experience");
    assert.equal(matchSectionHeading("• Education"), "education");
  });

  it("rejects prose that merely starts with a heading word", () => {
    assert.equal(matchSectionHeading("Experience at Acme Corp"), null);
    assert.equal(matchSectionHeading("Skillset overview"), null);
  });
});
