import { Language } from "../types/message";

export const PRIMARY_LANGUAGE: Language = "en";
export const SECONDARY_LANGUAGE: Language = "bn";

// Bengali Unicode block
const BENGALI_SCRIPT = /[\u0980-\u09FF]/;

/**
 * Language for system messages sent before any user text exists, from the
 * locale tag the transport reports for the user (e.g. "bn", "bn-BD").
 */
export function detectFromLocale(locale?: string | null): Language {
  if (locale && locale.toLowerCase().startsWith(SECONDARY_LANGUAGE)) {
    return SECONDARY_LANGUAGE;
  }
  return PRIMARY_LANGUAGE;
}

/** A single Bengali code point anywhere in the text makes it Bengali. */
export function detectFromText(text: string): Language {
  return BENGALI_SCRIPT.test(text) ? SECONDARY_LANGUAGE : PRIMARY_LANGUAGE;
}
