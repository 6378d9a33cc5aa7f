import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { fallbackCandidates, isBetterExtraction, selectPrimaryEngine } from "../../extraction/method-selector";
import { ENGINE_IDS, EngineId } from "../../shared/types/document.types";

const ALL: ReadonlySet<EngineId> = new Set(ENGINE_IDS);
const MB = 1024 * 1024;

describe("selectPrimaryEngine", () => {
  it("picks a PDF engine by file size", () => {
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 200 * 1024 }, "auto", ALL), "pdf-parse");
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 6 * MB }, "auto", ALL), "pdfjs-layout");
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 25 * MB }, "auto", ALL), "pdfjs-stream");
  });

  it("honours a preferred engine that fits the document", () => {
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 1024 }, "ocr", ALL), "ocr");
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 1024 }, "docx", ALL), "pdf-parse");
  });

  it("falls back to whichever direct engine is installed", () => {
    const available = new Set<EngineId>(["pdfjs-stream", "ocr"]);
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 1024 }, "auto", available), "pdfjs-stream");
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 1024 }, "auto", new Set<EngineId>(["ocr"])), "ocr");
    assert.equal(selectPrimaryEngine({ kind: "pdf", byteSize: 1024 }, "auto", new Set<EngineId>()), null);
  });

  it("routes other document kinds to their own engine", () => {
    assert.equal(selectPrimaryEngine({ kind: "docx", byteSize: 1024 }, "auto", ALL), "docx");
    assert.equal(selectPrimaryEngine({ kind: "text", byteSize: 10 }, "auto", ALL), "plain-text");
    assert.equal(selectPrimaryEngine({ kind: "text", byteSize: 10 }, "auto", new Set<EngineId>(["docx"])), null);
  });
});

describe("fallbackCandidates", () => {
  it("lists the remaining PDF engines in escalation order", () => {
    assert.deepEqual(fallbackCandidates("pdf", "pdf-parse", ALL), ["pdfjs-layout", "pdfjs-stream", "ocr"]);
    assert.deepEqual(fallbackCandidates("pdf", "pdfjs-layout", new Set<EngineId>(["pdfjs-layout", "ocr"])), ["ocr"]);
  });

  it("has nothing to add for single-engine kinds", () => {
    assert.deepEqual(fallbackCandidates("docx", "docx", ALL), []);
  });
});

describe("isBetterExtraction", () => {
  it("prefers longer text, then higher confidence", () => {
    assert.equal(isBetterExtraction({ text: "abc", confidence: 0.1 }, null), true);
    assert.equal(isBetterExtraction({ text: "abcd", confidence: 0.1 }, { text: "abc", confidence: 0.9 }), true);
    assert.equal(isBetterExtraction({ text: " ab ", confidence: 0.9 }, { text: "abc", confidence: 0.1 }), false);
    assert.equal(isBetterExtraction({ text: "abc", confidence: 0.9 }, { text: "xyz", confidence: 0.5 }), true);
    assert.equal(isBetterExtraction({ text: "abc", confidence: 0.5 }, { text: "xyz", confidence: 0.5 }), false);
  });
});
