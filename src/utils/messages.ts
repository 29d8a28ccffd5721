import { z } from "zod";
import { loadDataFile } from "./dataFile";
import { Language } from "../types/message";

const localized = z.object({ en: z.string().min(1), bn: z.string().min(1) });

const catalogSchema = z.object({
  welcome: localized,
  help: localized,
  language_info: localized,
  status: localized,
  rate_limit: localized,
  error: localized,
  identity: localized,
  code_usage: localized,
  app_usage: localized,
  web_usage: localized,
  ai_usage: localized,
  ml_usage: localized,
  mobile_usage: localized,
  database_usage: localized,
  api_usage: localized,
  ask_usage: localized,
});

export type MessageKey = keyof z.infer<typeof catalogSchema>;

export type MessageVars = Record<string, string | number>;

const catalog = loadDataFile("messages.json", catalogSchema);

/** Replaces `{name}` placeholders; unknown names are left as written. */
export function interpolate(template: string, vars: MessageVars = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match
  );
}

export function getMessage(
  key: MessageKey,
  language: Language,
  vars?: MessageVars
): string {
  return interpolate(catalog[key][language], vars);
}
