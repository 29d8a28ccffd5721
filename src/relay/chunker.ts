import { ConfigurationError } from "../utils/errors";

export const DEFAULT_MAX_CHUNK_LENGTH = 4096;

/**
 * Hard-cuts `text` into consecutive slices of at most `maxLength` code
 * points, so a surrogate pair is never split across two chunks. Joining the
 * result gives back `text`; empty text yields `[""]`.
 */
export function splitMessage(
  text: string,
  maxLength: number = DEFAULT_MAX_CHUNK_LENGTH
): string[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new ConfigurationError(
      `maxLength must be a positive integer (got ${maxLength})`
    );
  }

  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  for (let start = 0; start < codePoints.length; start += maxLength) {
    chunks.push(codePoints.slice(start, start + maxLength).join(""));
  }
  return chunks;
}
