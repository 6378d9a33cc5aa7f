import vocabulary from "../data/tech-vocabulary.json";

interface VocabularyTerm {
  term: string;
  pattern: RegExp;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Word-bounded on both sides, so "C++" and ".NET" match but "Java" does not match inside "JavaScript".
const TERMS: VocabularyTerm[] = vocabulary.map((term) => ({
  term,
  pattern: new RegExp(`(?<![\\w.+#])${escapeRegex(term).replace(/ /g, "\\s+")}(?![\\w+#]|\\.\\w)`, "i"),
}));

/** Vocabulary terms present in the text, in vocabulary order, canonical spelling. */
export function findTechnologies(text: string): string[] {
  if (!text.trim()) {
    return [];
  }
  return TERMS.filter(({ pattern }) => pattern.test(text)).map(({ term }) => term);
}

export function dedupeCaseInsensitive(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(value);
  }
  return output;
}
