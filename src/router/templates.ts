import { z } from "zod";
import { loadDataFile } from "../utils/dataFile";
import { interpolate, MessageVars } from "../utils/messages";
import { BuildIntent, Intent, Language } from "../types/message";

const text = z.string().min(1);

const buildInstructions = z.object({
  code: text,
  app: text,
  web: text,
  ai: text,
  ml: text,
  mobile: text,
  database: text,
  api: text,
  general: text,
});

const promptSchema = z.object({
  build: z.object({ en: buildInstructions, bn: buildInstructions }),
  system: z.object({
    code: z.object({ en: text, bn: text }),
    question: z.object({ en: text, bn: text }),
  }),
});

const prompts = loadDataFile("prompts.json", promptSchema);

export interface PromptPlan {
  enhancedPrompt: string;
  /** Sent as the system message; questions carry their instruction inline. */
  systemInstruction?: string;
}

export function buildInstruction(intent: BuildIntent, language: Language): string {
  return prompts.build[language][intent];
}

/**
 * Pairs the intent's instruction with the user's literal text. Build intents
 * also get the code-assistant system instruction.
 */
export function planPrompt(
  intent: Intent,
  language: Language,
  userText: string,
  vars: MessageVars = {}
): PromptPlan {
  if (intent === "ask") {
    const instruction = interpolate(prompts.system.question[language], vars);
    return { enhancedPrompt: `${instruction}\n\nQuestion: ${userText}` };
  }

  return {
    enhancedPrompt: `${buildInstruction(intent, language)}\n\nUser Request: ${userText}`,
    systemInstruction: interpolate(prompts.system.code[language], vars),
  };
}
