import { LEXICON, Matcher, fragmentMatcher, wordMatcher } from "./lexicon";

export type BuildSignal =
  | "creator"
  | "syntax"
  | "keyword"
  | "concept"
  | "concept+strong"
  | "none";

export interface IntentAnalysis {
  buildRequest: boolean;
  signal: BuildSignal;
}

const matchesCreator: Matcher = wordMatcher(LEXICON.creatorPhrases);
const matchesSyntax: Matcher = fragmentMatcher(LEXICON.syntaxFragments);
const matchesKeyword: Matcher = wordMatcher([
  ...LEXICON.keywords.en,
  ...LEXICON.keywords.bn,
]);
const matchesConcept: Matcher = wordMatcher(LEXICON.conceptPhrases);
const matchesStrongKeyword: Matcher = wordMatcher(LEXICON.strongKeywords);

/**
 * One normalization for every table: trimmed, lower-cased and NFC. Lower-casing
 * is a no-op for Bengali, so both languages follow the same rule; NFC folds
 * the precomposed and nukta spellings of letters like য় together.
 */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase().normalize("NFC");
}

export function isCreatorQuestion(text: string): boolean {
  return matchesCreator(normalizeText(text));
}

/**
 * First match wins: creator question, syntax fragment, domain keyword,
 * concept question (unless it names a strong code noun), default.
 */
export function analyzeIntent(text: string): IntentAnalysis {
  const normalized = normalizeText(text);

  if (matchesCreator(normalized)) {
    return { buildRequest: false, signal: "creator" };
  }
  if (matchesSyntax(normalized)) {
    return { buildRequest: true, signal: "syntax" };
  }
  if (matchesKeyword(normalized)) {
    return { buildRequest: true, signal: "keyword" };
  }
  if (matchesConcept(normalized)) {
    return matchesStrongKeyword(normalized)
      ? { buildRequest: true, signal: "concept+strong" }
      : { buildRequest: false, signal: "concept" };
  }
  return { buildRequest: false, signal: "none" };
}

export function isBuildRequest(text: string): boolean {
  return analyzeIntent(text).buildRequest;
}
