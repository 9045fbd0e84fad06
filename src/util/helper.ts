// src/util/helper.ts
import { isAbsolute, join } from "path";

/**
 * Place a relative output path under `dir` ("seed.sql" -> "output/seed.sql").
 * Absolute paths and paths already under `dir` pass through; "-" means stdout.
 */
export function prefixPath(
  dir: string,
  rawOutput?: string
): string | undefined {
  if (!rawOutput || rawOutput === "-") return undefined;
  if (isAbsolute(rawOutput) || rawOutput.startsWith(`${dir}/`)) {
    return rawOutput;
  }
  return join(dir, rawOutput);
}
