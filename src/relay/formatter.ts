const FENCE = "```";

const CODE_LINE_PATTERNS: readonly RegExp[] = [
  /^(def|class|function|var|let|const|import|from|#include)\b/, // declarations
  /^[A-Za-z_]\w*\s*=[^=]/, // assignment
  /^(if|for|while|switch|catch)\s*\(/, // C-style control flow
  /^(if|elif|for|while|with)\b.*:$/, // Python control flow
  /^(try|else|finally)\s*[:{]/,
  /^[A-Za-z_][\w.]*\(.*\)\s*;?$/, // call statement
  /[{};]$/,
  /^<\/?[a-z][\w-]*/i, // markup tag
  /^(\/\/|\/\*|#!)/, // comments, shebang
  /console\.|print\(|echo\s/,
];

const LANGUAGE_HINTS: ReadonlyArray<[string, readonly string[]]> = [
  ["python", ["def ", "import ", "print("]],
  ["javascript", ["function", "const ", "let "]],
  ["cpp", ["#include", "cout <<"]],
  ["java", ["public class", "system.out"]],
  ["html", ["<html", "<!doctype"]],
  ["css", ["body {"]],
  ["sql", ["select ", "insert "]],
  ["bash", ["#!/bin/bash", "echo "]],
];

export function isCodeLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== "" && CODE_LINE_PATTERNS.some((p) => p.test(trimmed));
}

/** Fence language tag guessed from a single line, or "" when unsure. */
export function detectCodeLanguage(line: string): string {
  const lower = line.trim().toLowerCase();
  const hit = LANGUAGE_HINTS.find(([, needles]) =>
    needles.some((needle) => lower.includes(needle))
  );
  return hit ? hit[0] : "";
}

/**
 * Wraps runs of code-looking lines in fences. Replies that already contain a
 * fence are returned untouched.
 */
export function formatCodeResponse(response: string): string {
  if (response.includes(FENCE)) {
    return response;
  }

  const out: string[] = [];
  let inBlock = false;

  for (const line of response.split("\n")) {
    const code = isCodeLine(line);

    if (!inBlock && code) {
      out.push(FENCE + detectCodeLanguage(line), line);
      inBlock = true;
    } else if (inBlock && (code || line.trim() === "")) {
      out.push(line);
    } else if (inBlock) {
      out.push(FENCE, "", line);
      inBlock = false;
    } else {
      out.push(line);
    }
  }

  if (inBlock) {
    out.push(FENCE);
  }
  return out.join("\n");
}

/** Tidies blank lines around fences and puts opening fences on their own line. */
export function cleanCodeResponse(response: string): string {
  return response
    .trim()
    .replace(/```(\w*)\n\n+/g, "```$1\n")
    .replace(/\n\n+```/g, "\n```")
    .replace(/([^\n])```(\w+)/g, "$1\n```$2");
}
