import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { extractContactInfo } from "../../parsing/extractors/contact.extractor";
import { findPhone, normalizePhone } from "../../parsing/parsers/phone.parser";

describe("extractContactInfo", () => {
  it("reads the contact block at the top of a resume", () => {
    const text = [
      "Jane Smith",
      "john@example.com | +1-415-555-0100",
      "San Francisco, CA 94105",
      "linkedin.com/in/janesmith | github.com/janesmith | https://janesmith.dev",
    ].join("\n");

    assert.deepEqual(extractContactInfo(null, text), {
      name: "Jane Smith",
      email: "john@example.com",
      phone: "+1-415-555-0100",
      linkedin: "linkedin.com/in/janesmith",
      github: "github.com/janesmith",
      website: "https://janesmith.dev",
      address: "San Francisco, CA 94105",
      city: "San Francisco",
      state: "CA",
      country: null,
      postalCode: "94105",
    });
  });

  it("prefers the contact section and fills gaps from the whole document", () => {
    const fullText = "Ana Lopez\nhome@example.com\nContact\nEmail: work@example.com";
    const contact = extractContactInfo("Email: work@example.com", fullText);
    assert.equal(contact.email, "work@example.com");
    assert.equal(contact.name, "Ana Lopez");
    assert.equal(contact.phone, null);
  });

  it("skips headings and detail lines when looking for a name", () => {
    const contact = extractContactInfo(null, "Professional Summary\nhttps://example.dev\nMaria Garcia Lopez\nBerlin, Germany");
    assert.equal(contact.name, "Maria Garcia Lopez");
    assert.equal(contact.country, "Germany");
  });
});

describe("phone parsing", () => {
  it("adds a country code to bare ten digit numbers", () => {
    assert.equal(normalizePhone("4155550100"), "+14155550100");
    assert.equal(findPhone("Phone: 4155550100"), "+14155550100");
  });

  it("keeps formatted numbers as written", () => {
    assert.equal(findPhone("Call 415 555 0100 after six"), "415 555 0100");
    assert.equal(findPhone("Tel (415) 555-0100"), "(415) 555-0100");
  });

  it("returns null when no number is present", () => {
    assert.equal(findPhone("No digits here"), null);
  });
});
