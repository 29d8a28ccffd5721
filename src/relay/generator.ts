import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { GenerationError, describeError } from "../utils/errors";

export type GenerationMode = "build" | "question";

export interface GenerationRequest {
  prompt: string;
  systemInstruction?: string;
  mode: GenerationMode;
}

/** The external generation collaborator. */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export const GENERATION_SETTINGS: Record<
  GenerationMode,
  { temperature: number; maxTokens: number }
> = {
  build: { temperature: 0.3, maxTokens: 8192 },
  question: { temperature: 0.7, maxTokens: 4096 },
};

export interface ChatCompletionsOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutSeconds: number;
}

/**
 * Talks to any OpenAI-compatible chat completions endpoint; the default
 * configuration points it at Gemini's. Retries are left to the caller.
 */
export class ChatCompletionsGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(private readonly options: ChatCompletionsOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutSeconds * 1000,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const settings = GENERATION_SETTINGS[request.mode];

    const messages: ChatCompletionMessageParam[] = [];
    if (request.systemInstruction) {
      messages.push({ role: "system", content: request.systemInstruction });
    }
    messages.push({ role: "user", content: request.prompt });

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: settings.temperature,
        max_tokens: settings.maxTokens,
      });
    } catch (err) {
      throw new GenerationError(
        `Generation request failed: ${describeError(err)}`,
        err
      );
    }

    const text = completion.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new GenerationError("Generation provider returned an empty reply");
    }
    return text;
  }
}
