import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { silentLogger } from "../../config/logger";
import { parseResume, ResumeParserService } from "../../parsing/resume-parser.service";
import { ParsingError } from "../../shared/errors";
import { assertClose, SAMPLE_RESUME } from "../helpers/fixtures";

describe("parseResume", () => {
  it("builds a profile from a plain text resume", () => {
    const profile = parseResume(SAMPLE_RESUME);

    assert.deepEqual(profile.sectionsFound, ["summary", "experience", "education", "skills"]);
    assert.equal(profile.contactInfo.name, "John Doe");
    assert.equal(profile.contactInfo.email, "john@example.com");
    assert.equal(profile.contactInfo.phone, "+1-415-555-0100");
    assert.equal(profile.contactInfo.city, "San Francisco");
    assert.equal(profile.summary, "Backend engineer with eight years of experience building APIs.");
    assert.deepEqual(
      profile.workExperience.map((entry) => `${entry.position} @ ${entry.company}`),
      ["Senior Engineer @ Acme Corp", "Software Engineer @ Beta Labs", "Intern @ Gamma Inc"],
    );
    assert.deepEqual(profile.education, [
      {
        degree: "B.S.",
        fieldOfStudy: "Computer Science",
        institution: "Stanford University",
        graduationYear: "2016",
        gpa: null,
        description: [],
      },
    ]);
    assert.deepEqual(profile.skills, ["TypeScript", "Node.js", "PostgreSQL", "Docker"]);
    assert.deepEqual(profile.projects, []);
    assert.deepEqual(profile.languages, []);
  });

  it("scores parsing confidence from contact, sections and content", () => {
    const profile = parseResume(SAMPLE_RESUME);
    // contact 3/3, four of nine sections, experience + education + skills + summary
    assertClose(profile.parsingConfidence, 1 * 0.3 + (4 / 9) * 0.3 + 0.8 * 0.4);
  });

  it("returns an identical profile for identical input", () => {
    assert.deepEqual(parseResume(SAMPLE_RESUME), parseResume(SAMPLE_RESUME));
  });

  it("accepts short text when it contains a section", () => {
    const profile = parseResume("Skills: Go, Rust");
    assert.deepEqual(profile.sectionsFound, ["skills"]);
    assert.deepEqual(profile.skills, ["Go", "Rust"]);
  });

  it("keeps labelled lines inside project and skills blocks", () => {
    const text = [
      "Jane Roe",
      "jane@example.com",
      "",
      "Projects",
      "Ledger Service",
      "Double-entry ledger API for payments",
      "Technologies: TypeScript, PostgreSQL",
      "",
      "Route Planner",
      "Delivery route optimiser for couriers",
      "Technologies: Golang, Redis",
      "",
      "Technical Skills",
      "Languages: TypeScript, Go",
      "Frameworks: React, Express",
    ].join("\n");
    const profile = parseResume(text);

    assert.deepEqual(profile.sectionsFound, ["projects", "skills"]);
    assert.deepEqual(profile.projects, [
      {
        name: "Ledger Service",
        description: "Double-entry ledger API for payments",
        technologies: ["TypeScript", "PostgreSQL"],
        url: null,
      },
      {
        name: "Route Planner",
        description: "Delivery route optimiser for couriers",
        technologies: ["Golang", "Redis"],
        url: null,
      },
    ]);
    assert.deepEqual(profile.skills, ["TypeScript", "Go", "React", "Express"]);
    assert.deepEqual(profile.languages, []);
  });

  it("rejects blank text", () => {
    assert.throws(
      () => parseResume(" \n\t "),
      (error: unknown) => error instanceof ParsingError && error.code === "empty_text",
    );
  });

  it("rejects text too short to hold a resume", () => {
    assert.throws(
      () => parseResume("hello there"),
      (error: unknown) => error instanceof ParsingError && error.code === "unusable_text",
    );
  });
});

describe("ResumeParserService", () => {
  it("honours the repeated section policy", () => {
    const text = "Jane Roe\n\nSkills\nGraphQL\n\nExperience\nAcme\n\nSkills\nKotlin";
    assert.deepEqual(new ResumeParserService(silentLogger).parse(text).skills, ["GraphQL"]);
    assert.deepEqual(new ResumeParserService(silentLogger, { sectionPolicy: "last" }).parse(text).skills, ["Kotlin"]);
  });
});
