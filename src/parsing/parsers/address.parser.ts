export interface ParsedAddress {
  address: string | null;
  city: string | null;
  state: string | null;
  postalCode: string | null;
  country: string | null;
}

const KNOWN_COUNTRIES: ReadonlyArray<[RegExp, string]> = [
  [/\bunited states\b/i, "United States"],
  [/\bUSA\b/, "USA"],
  [/\bunited kingdom\b/i, "United Kingdom"],
  [/\bUK\b/, "UK"],
  [/\bcanada\b/i, "Canada"],
  [/\bgermany\b/i, "Germany"],
  [/\bfrance\b/i, "France"],
  [/\bnetherlands\b/i, "Netherlands"],
  [/\bireland\b/i, "Ireland"],
  [/\bspain\b/i, "Spain"],
  [/\bpoland\b/i, "Poland"],
  [/\bindia\b/i, "India"],
  [/\baustralia\b/i, "Australia"],
];

// "San Francisco, CA 94105": up to four capitalised words, a two-letter state, optional ZIP.
const CITY_STATE = /\b([A-Z][A-Za-z.'-]*(?:[ \t]+[A-Z][A-Za-z.'-]*){0,3}),[ \t]*([A-Z]{2})\b(?:[ \t]+(\d{5}(?:-\d{4})?))?/;

export function parseAddress(text: string): ParsedAddress {
  const result: ParsedAddress = {
    address: null,
    city: null,
    state: null,
    postalCode: null,
    country: null,
  };

  for (const line of text.split("\n")) {
    if (!result.city) {
      const match = CITY_STATE.exec(line);
      if (match) {
        result.address = match[0].trim();
        result.city = match[1].trim();
        result.state = match[2];
        result.postalCode = match[3] ?? null;
      }
    }
    if (!result.country) {
      const country = KNOWN_COUNTRIES.find(([pattern]) => pattern.test(line));
      if (country) {
        result.country = country[1];
      }
    }
    if (result.city && result.country) {
      break;
    }
  }

  return result;
}
