import { readFileSync } from "node:fs";
import path from "node:path";
import { TextExtractor } from "../../documents/extractors/extractor.types";
import { emptyContactInfo } from "../../parsing/extractors/contact.extractor";
import { DocumentKind, EngineId, RawExtraction, SourceDocument } from "../../shared/types/document.types";
import { CandidateProfile } from "../../shared/types/profile.types";

export function readFixture(name: string): string {
  return readFileSync(path.join(__dirname, "..", "fixtures", name), "utf8");
}

export function readFixtureBuffer(name: string): Buffer {
  return readFileSync(path.join(__dirname, "..", "fixtures", name));
}

export const SAMPLE_RESUME = readFixture("sample-resume.txt");

type FakeBehaviour = Partial<RawExtraction> | Error | (() => Promise<RawExtraction>);

/** Scripted engine: returns the given text, throws the given error, or defers to a function. */
export class FakeExtractor implements TextExtractor {
  calls = 0;

  constructor(
    readonly id: EngineId,
    private readonly behaviour: FakeBehaviour,
    private readonly kind: DocumentKind = "pdf",
    readonly requiredModules: readonly string[] = [],
  ) {}

  supports(kind: DocumentKind): boolean {
    return kind === this.kind;
  }

  async extract(): Promise<RawExtraction> {
    this.calls += 1;
    if (this.behaviour instanceof Error) {
      throw this.behaviour;
    }
    if (typeof this.behaviour === "function") {
      return this.behaviour();
    }
    return {
      text: "",
      pageCount: 1,
      pagesProcessed: 1,
      errors: [],
      metadata: {},
      ...this.behaviour,
    };
  }
}

export function pdfDocument(byteSize = 2048): SourceDocument {
  return { ref: "resume.pdf", fileName: "resume.pdf", kind: "pdf", buffer: Buffer.from("%PDF-1.7"), byteSize };
}

export function buildProfile(overrides: Partial<CandidateProfile> = {}): CandidateProfile {
  return {
    contactInfo: emptyContactInfo(),
    summary: "",
    workExperience: [],
    education: [],
    skills: [],
    projects: [],
    certifications: [],
    languages: [],
    achievements: [],
    sectionsFound: [],
    parsingConfidence: 0,
    ...overrides,
  };
}

export function assertClose(actual: number, expected: number, epsilon = 1e-9): void {
  if (Math.abs(actual - expected) > epsilon) {
    throw new Error(`Expected ${actual} to be within ${epsilon} of ${expected}`);
  }
}
