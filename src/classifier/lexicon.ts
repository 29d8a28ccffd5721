import { z } from "zod";
import { loadDataFile } from "../utils/dataFile";

const phraseList = z.array(z.string().min(1)).nonempty();

const lexiconSchema = z.object({
  syntaxFragments: phraseList,
  keywords: z.object({ en: phraseList, bn: phraseList }),
  creatorPhrases: phraseList,
  conceptPhrases: phraseList,
  strongKeywords: phraseList,
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export type Matcher = (normalized: string) => boolean;

const ASCII_WORD = /^[a-z0-9 ]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Substring test against every fragment. */
export function fragmentMatcher(fragments: readonly string[]): Matcher {
  const needles = fragments.map((f) => f.toLowerCase().normalize("NFC"));
  return (normalized) => needles.some((needle) => normalized.includes(needle));
}

const DERIVED = "ing|ed|er|ers";

/**
 * Pattern for a Latin word and its common derived forms: plural, "-ing",
 * "-ed" and "-er(s)", with the silent "e" dropped ("code" -> "coding") or the
 * final consonant doubled ("program" -> "programming").
 */
export function inflections(word: string): string {
  if (word.length > 2 && word.endsWith("e")) {
    return `${escapeRegExp(word.slice(0, -1))}(?:e|es|${DERIVED})`;
  }
  const last = word.charAt(word.length - 1);
  const doubled = /[bcdfgklmnprtvz]/.test(last) ? `${last}?` : "";
  return `${escapeRegExp(word)}(?:s|es|${doubled}(?:${DERIVED}))?`;
}

/**
 * Latin words and phrases start on a word boundary and may end in a derived
 * form (see `inflections`); anything else, Bengali included, matches as a
 * substring.
 */
export function wordMatcher(words: readonly string[]): Matcher {
  const lowered = words.map((w) => w.toLowerCase());
  const latin = lowered.filter((w) => ASCII_WORD.test(w));
  const other = lowered.filter((w) => !ASCII_WORD.test(w));

  const pattern = latin.length
    ? new RegExp(`\\b(?:${latin.map(inflections).join("|")})\\b`)
    : null;
  const substring = fragmentMatcher(other);

  return (normalized) =>
    (pattern !== null && pattern.test(normalized)) || substring(normalized);
}

export const LEXICON: Readonly<Lexicon> = Object.freeze(
  loadDataFile("lexicon.json", lexiconSchema)
);
