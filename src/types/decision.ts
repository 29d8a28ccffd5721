import { Intent, Language, ParseMode } from "./message";

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: number; // unix timestamp (seconds)
}

export interface ClassificationResult {
  language: Language;
  intent: Intent;
}

export interface RouterDecision {
  allowed: true;
  classification: ClassificationResult;
  /** The user's literal request text, without any command prefix. */
  text: string;
  enhancedPrompt: string;
  systemInstruction?: string;
  /** Whether free-form text was classified rather than named by a command. */
  freeForm: boolean;
  rateLimit: RateLimitResult;
}

export interface Notice {
  language: Language;
  text: string;
  parseMode: ParseMode;
}

export type RouteOutcome =
  | { kind: "identity"; notice: Notice }
  | { kind: "info"; notice: Notice }
  | { kind: "usage"; notice: Notice }
  | {
      kind: "denied";
      notice: Notice;
      rateLimit: RateLimitResult;
      retryAfterSeconds: number;
    }
  | { kind: "allowed"; decision: RouterDecision };
