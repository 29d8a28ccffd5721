import { z } from "zod";
import { ConfigurationError } from "../utils/errors";

type EnvSource = Record<string, string | undefined>;

export const GEMINI_OPENAI_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta/openai/";

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} cannot be empty`);

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  RELAY_API_TOKEN: required("RELAY_API_TOKEN"),
  GEMINI_API_KEY: required("GEMINI_API_KEY"),
  GEMINI_BASE_URL: z.string().url().default(GEMINI_OPENAI_BASE_URL),
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.5-flash"),
  RATE_LIMIT_PER_USER: positiveInt(10),
  RATE_LIMIT_WINDOW: positiveInt(60),
  RATE_LIMIT_SWEEP_INTERVAL: positiveInt(300),
  MAX_MESSAGE_LENGTH: positiveInt(4096),
  REQUEST_TIMEOUT: positiveInt(30),
  CREATOR_NAME: z.string().trim().min(1).default("Rafsan Maruf"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DEBUG_MODE: z
    .string()
    .default("false")
    .transform((value) => value.trim().toLowerCase() === "true"),
});

export interface AppConfig {
  relayApiToken: string;
  generation: {
    apiKey: string;
    baseURL: string;
    model: string;
    timeoutSeconds: number;
  };
  rateLimit: {
    limit: number;
    windowSeconds: number;
    sweepIntervalSeconds: number;
  };
  maxChunkLength: number;
  creatorName: string;
  port: number;
  debug: boolean;
}

/**
 * Empty strings count as unset so that `FOO=` in an env file falls back to
 * the default instead of failing number coercion.
 */
function withoutBlanks(source: EnvSource): EnvSource {
  return Object.fromEntries(
    Object.entries(source).filter(
      ([, value]) => value === undefined || value.trim() !== ""
    )
  );
}

export function loadConfig(source: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(source));

  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid environment",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const env = parsed.data;
  return {
    relayApiToken: env.RELAY_API_TOKEN,
    generation: {
      apiKey: env.GEMINI_API_KEY,
      baseURL: env.GEMINI_BASE_URL,
      model: env.GEMINI_MODEL,
      timeoutSeconds: env.REQUEST_TIMEOUT,
    },
    rateLimit: {
      limit: env.RATE_LIMIT_PER_USER,
      windowSeconds: env.RATE_LIMIT_WINDOW,
      sweepIntervalSeconds: env.RATE_LIMIT_SWEEP_INTERVAL,
    },
    maxChunkLength: env.MAX_MESSAGE_LENGTH,
    creatorName: env.CREATOR_NAME,
    port: env.PORT,
    debug: env.DEBUG_MODE,
  };
}
