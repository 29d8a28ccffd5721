import { describe, expect, it } from "vitest";
import { DEFAULT_MAX_CHUNK_LENGTH, splitMessage } from "../relay/chunker";
import { ConfigurationError } from "../utils/errors";

describe("splitMessage", () => {
  it("hard-cuts at the length budget", () => {
    expect(splitMessage("abcdefgh", 3)).toEqual(["abc", "def", "gh"]);
  });

  it("returns a single chunk when the text fits", () => {
    expect(splitMessage("abc", 3)).toEqual(["abc"]);
    expect(splitMessage("", 3)).toEqual([""]);
  });

  it("defaults to the transport ceiling", () => {
    const text = "y".repeat(DEFAULT_MAX_CHUNK_LENGTH + 1);
    const chunks = splitMessage(text);

    expect(DEFAULT_MAX_CHUNK_LENGTH).toBe(4096);
    expect(chunks.map((c) => c.length)).toEqual([4096, 1]);
  });

  it("preserves content and order", () => {
    const text = "line one\nline two\n\tcode();\n".repeat(37);

    for (const size of [1, 7, 64, 1000]) {
      const chunks = splitMessage(text, size);
      expect(chunks.join("")).toBe(text);
      expect(chunks).toHaveLength(Math.ceil(text.length / size));
      expect(chunks.every((c) => c.length <= size)).toBe(true);
    }
  });

  it("never splits a surrogate pair", () => {
    expect(splitMessage("ab\u{1F600}cd", 3)).toEqual(["ab\u{1F600}", "cd"]);

    const text = "\u{1F680}".repeat(5);
    const chunks = splitMessage(text, 2);
    expect(chunks).toEqual([
      "\u{1F680}\u{1F680}",
      "\u{1F680}\u{1F680}",
      "\u{1F680}",
    ]);
    expect(chunks.join("")).toBe(text);
  });

  it("rejects a non-positive budget", () => {
    expect(() => splitMessage("abc", 0)).toThrow(ConfigurationError);
    expect(() => splitMessage("abc", 2.5)).toThrow(ConfigurationError);
  });
});
