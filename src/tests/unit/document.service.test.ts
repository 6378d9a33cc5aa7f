import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { silentLogger } from "../../config/logger";
import { DocumentService } from "../../documents/document.service";
import { buildPdf } from "../helpers/documents";
import { readFixtureBuffer } from "../helpers/fixtures";

const service = new DocumentService(silentLogger);

describe("DocumentService", () => {
  it("recognises a PDF from its header when no name or type is given", async () => {
    const buffer = buildPdf(["John Doe"]);
    const result = await service.loadDocument({ buffer });

    assert.ok(result.ok);
    assert.equal(result.data.kind, "pdf");
    assert.equal(result.data.ref, "buffer");
    assert.equal(result.data.byteSize, buffer.length);
  });

  it("recognises a word document from its zip signature", async () => {
    const result = await service.loadDocument({ buffer: readFixtureBuffer("short-resume.docx") });

    assert.ok(result.ok);
    assert.equal(result.data.kind, "docx");
  });

  it("treats unnamed readable bytes as plain text", async () => {
    const result = await service.loadDocument({ buffer: Buffer.from("Jane Roe\nEngineer", "utf8") });

    assert.ok(result.ok);
    assert.equal(result.data.kind, "text");
  });

  it("rejects unnamed binary content", async () => {
    const result = await service.loadDocument({ buffer: Buffer.from([0x00, 0x01, 0x02, 0x03]) });

    assert.ok(!result.ok);
    assert.equal(result.error.code, "unsupported_document");
  });

  it("prefers the declared type over the content", () => {
    assert.equal(service.detectDocumentType("resume.pdf", undefined, Buffer.from("plain")), "pdf");
    assert.equal(service.detectDocumentType(undefined, "text/plain", Buffer.from("%PDF-1.4")), "text");
  });
});
