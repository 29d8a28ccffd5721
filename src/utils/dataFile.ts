import fs from "fs";
import path from "path";
import { z } from "zod";

const DATA_DIR = path.join(__dirname, "..", "..", "data");

/**
 * Reads and validates one of the JSON tables under data/. Resolves the same
 * way from src/ under the test runner and from dist/ after a build.
 */
export function loadDataFile<T>(
  fileName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const raw = fs.readFileSync(path.join(DATA_DIR, fileName), "utf8");
  const parsed = schema.safeParse(JSON.parse(raw));

  if (!parsed.success) {
    throw new Error(
      `Malformed data file ${fileName}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}
