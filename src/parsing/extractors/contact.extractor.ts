import { ContactInfo } from "../../shared/types/profile.types";
import { parseAddress } from "../parsers/address.parser";
import { findPhone } from "../parsers/phone.parser";
import { matchSectionHeading } from "../section-segmenter";
import { splitLines } from "./entries";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const LINKEDIN_PATTERN = /(?:https?:\/\/)?(?:www\.)?linkedin\.com\/in\/[A-Za-z0-9_-]+\/?/i;
const GITHUB_PATTERN = /(?:https?:\/\/)?(?:www\.)?github\.com\/[A-Za-z0-9-]+/i;
const URL_PATTERN = /\b(?:https?:\/\/|www\.)[^\s,;|()<>]+/gi;
const NAME_SCAN_LINES = 10;

const CONTACT_FIELDS: ReadonlyArray<keyof ContactInfo> = [
  "name",
  "email",
  "phone",
  "linkedin",
  "github",
  "website",
  "address",
  "city",
  "state",
  "country",
  "postalCode",
];

export function emptyContactInfo(): ContactInfo {
  return {
    name: null,
    email: null,
    phone: null,
    linkedin: null,
    github: null,
    website: null,
    address: null,
    city: null,
    state: null,
    country: null,
    postalCode: null,
  };
}

function firstMatch(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text);
  return match ? match[0] : null;
}

function findWebsite(text: string): string | null {
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(/[.]+$/, "");
    if (!/linkedin\.com|github\.com/i.test(url)) {
      return url;
    }
  }
  return null;
}

function findName(text: string): string | null {
  for (const line of splitLines(text).slice(0, NAME_SCAN_LINES)) {
    const words = line.split(/\s+/);
    if (words.length < 2 || words.length > 5) {
      continue;
    }
    if (/\d|@|:\/\/|www\.|[,|•:]/.test(line) || matchSectionHeading(line)) {
      continue;
    }
    return line;
  }
  return null;
}

function extractFrom(text: string): ContactInfo {
  const address = parseAddress(text);
  return {
    name: findName(text),
    email: firstMatch(EMAIL_PATTERN, text),
    phone: findPhone(text),
    linkedin: firstMatch(LINKEDIN_PATTERN, text),
    github: firstMatch(GITHUB_PATTERN, text),
    website: findWebsite(text),
    ...address,
  };
}

/** Reads the contact section first and fills what it lacks from the whole document. */
export function extractContactInfo(sectionText: string | null, fullText: string): ContactInfo {
  const contact = emptyContactInfo();
  const sources = sectionText ? [sectionText, fullText] : [fullText];
  for (const source of sources) {
    const found = extractFrom(source);
    for (const key of CONTACT_FIELDS) {
      contact[key] = contact[key] ?? found[key];
    }
  }
  return contact;
}
