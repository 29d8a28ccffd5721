/**
 * Raised while building a component from invalid settings. Never recovered:
 * the entry point logs it and exits.
 */
export class ConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

/** The generation provider failed, timed out or returned nothing usable. */
export class GenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GenerationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
