import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { extractWorkExperience, parseJobHeader } from "../../parsing/extractors/experience.extractor";

const EXPERIENCE_SECTION = [
  "Senior Engineer at Acme Corp",
  "Jan 2020 - Present | San Francisco, CA",
  "• Built TypeScript services on AWS",
  "• Led a team of five engineers",
  "",
  "Software Engineer at Beta Labs",
  "Mar 2017 - Dec 2019",
  "• Maintained Python data pipelines for reporting",
  "",
  "Intern at Gamma Inc",
  "Jun 2016 - Aug 2016",
  "• Wrote unit tests with Jest for the web app",
].join("\n");

describe("extractWorkExperience", () => {
  it("returns one entry per block in document order", () => {
    const entries = extractWorkExperience(EXPERIENCE_SECTION);
    assert.equal(entries.length, 3);
    assert.deepEqual(
      entries.map((entry) => entry.company),
      ["Acme Corp", "Beta Labs", "Gamma Inc"],
    );
  });

  it("reads position, dates, location, bullets and technologies", () => {
    const [first, second] = extractWorkExperience(EXPERIENCE_SECTION);
    assert.deepEqual(first, {
      company: "Acme Corp",
      position: "Senior Engineer",
      location: "San Francisco, CA",
      startDate: "Jan 2020",
      endDate: "Present",
      description: ["Built TypeScript services on AWS", "Led a team of five engineers"],
      technologies: ["TypeScript", "AWS"],
    });
    assert.equal(second.startDate, "Mar 2017");
    assert.equal(second.endDate, "Dec 2019");
    assert.equal(second.location, null);
    assert.deepEqual(second.technologies, ["Python"]);
  });

  it("drops blocks too short to be a job", () => {
    assert.deepEqual(extractWorkExperience("Acme\nJan 2020 - Present"), []);
  });
});

describe("parseJobHeader", () => {
  it("understands the common header shapes", () => {
    assert.deepEqual(parseJobHeader("Acme Corp - Backend Developer"), {
      company: "Acme Corp",
      position: "Backend Developer",
    });
    assert.deepEqual(parseJobHeader("Data Analyst | Initech"), { position: "Data Analyst", company: "Initech" });
    assert.deepEqual(parseJobHeader("Globex"), { company: "Globex", position: null });
  });

  it("ignores a leading bullet and a date range on the header line", () => {
    assert.deepEqual(parseJobHeader("• Staff Engineer at Hooli Jan 2019 - Present"), {
      position: "Staff Engineer",
      company: "Hooli",
    });
  });
});
