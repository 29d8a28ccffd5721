export type Language = "en" | "bn";

export const BUILD_INTENTS = [
  "code",
  "app",
  "web",
  "ai",
  "ml",
  "mobile",
  "database",
  "api",
  "general",
] as const;

export type BuildIntent = (typeof BUILD_INTENTS)[number];

export type Intent = BuildIntent | "ask";

export type ParseMode = "markdown" | "plain";

export interface CommandInvocation {
  name: string;
  args: string;
}

/** One inbound message as handed over by the chat transport. */
export interface InboundMessage {
  userKey: string;
  text: string;
  locale?: string;
  command?: CommandInvocation;
}

export interface Reply {
  text: string;
  parseMode: ParseMode;
}
