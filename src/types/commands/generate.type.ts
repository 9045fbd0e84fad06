// src/types/commands/generate.type.ts
import type { z } from "zod";
import type { EnvSchema } from "../../models/options.js";

export type GenerateEnv = z.infer<typeof EnvSchema>;

export type GenerateOptions = {
  tables: string;
  count?: number;
  includeDeps: boolean;
  seed?: number;
  mode: "live" | "sql";
  output?: string;
  // Only resolved for live mode
  connectionString?: string;
  dryRun: boolean;
};
