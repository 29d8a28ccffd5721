import { CommandInvocation, Intent, ParseMode } from "../types/message";
import { MessageKey } from "../utils/messages";

export type CommandSpec =
  | { kind: "info"; message: MessageKey; parseMode: ParseMode }
  | { kind: "request"; intent: Exclude<Intent, "general">; usage: MessageKey };

const COMMANDS = new Map<string, CommandSpec>([
  ["start", { kind: "info", message: "welcome", parseMode: "markdown" }],
  ["help", { kind: "info", message: "help", parseMode: "markdown" }],
  ["lang", { kind: "info", message: "language_info", parseMode: "plain" }],
  ["status", { kind: "info", message: "status", parseMode: "plain" }],
  ["code", { kind: "request", intent: "code", usage: "code_usage" }],
  ["app", { kind: "request", intent: "app", usage: "app_usage" }],
  ["web", { kind: "request", intent: "web", usage: "web_usage" }],
  ["ai", { kind: "request", intent: "ai", usage: "ai_usage" }],
  ["ml", { kind: "request", intent: "ml", usage: "ml_usage" }],
  ["mobile", { kind: "request", intent: "mobile", usage: "mobile_usage" }],
  ["db", { kind: "request", intent: "database", usage: "database_usage" }],
  ["api", { kind: "request", intent: "api", usage: "api_usage" }],
  ["ask", { kind: "request", intent: "ask", usage: "ask_usage" }],
]);

// "/code write a parser", "/code@relay_bot write a parser"
const COMMAND_PATTERN = /^\/([a-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i;

export function lookupCommand(name: string): CommandSpec | undefined {
  return COMMANDS.get(name.toLowerCase());
}

export function parseCommand(text: string): CommandInvocation | undefined {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }
  return { name: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}
