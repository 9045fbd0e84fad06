// src/models/options.ts
import { z } from "zod";
import type {
  GenerateEnv,
  GenerateOptions,
} from "../types/commands/generate.type.js";
import { prefixPath } from "../util/helper.js";

const blankToUndefined = (v: unknown) =>
  v === undefined || v === null || (typeof v === "string" && v.trim() === "")
    ? undefined
    : v;

const OptionalInt = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().optional(),
);

const TRUTHY = ["true", "1", "yes"];

/**
 * Environment variables (after dotenv has loaded .env).
 */
export const EnvSchema = z.object({
  GENERATE_TABLES: z.preprocess(blankToUndefined, z.string().default("all")),
  GENERATE_COUNT: OptionalInt,
  GENERATE_NO_DEPS: z
    .string()
    .optional()
    .transform((v) => TRUTHY.includes((v ?? "").trim().toLowerCase())),
  GENERATE_SEED: OptionalInt,
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default("postgres"),
  DB_PASSWORD: z.string().default(""),
  DB_NAME: z.string().default("crm_db"),
});

/**
 * Raw `generate` flags as commander hands them over. `deps` is false only
 * when --no-deps was given.
 */
export const GenerateFlagsSchema = z.object({
  tables: z.string().optional(),
  count: OptionalInt,
  deps: z.boolean().default(true),
  seed: OptionalInt,
  sql: z.boolean().default(false),
  output: z.string().optional(),
  connection: z.string().optional(),
  dryRun: z.boolean().default(false),
});

/**
 * Merge `generate` flags with the environment. Flags win over environment
 * values; --no-deps and GENERATE_NO_DEPS each disable dependency inclusion.
 */
export function resolveGenerateOptions(
  rawFlags: unknown,
  rawEnv: Record<string, string | undefined>,
): GenerateOptions {
  const flagsResult = GenerateFlagsSchema.safeParse(rawFlags);
  if (!flagsResult.success) {
    throw new Error(`Invalid options: ${flagsResult.error.message}`);
  }
  const envResult = EnvSchema.safeParse(rawEnv);
  if (!envResult.success) {
    throw new Error(`Invalid environment: ${envResult.error.message}`);
  }

  const flags = flagsResult.data;
  const env = envResult.data;
  const mode = flags.sql ? "sql" : "live";

  return {
    tables: flags.tables ?? env.GENERATE_TABLES,
    count: flags.count ?? env.GENERATE_COUNT,
    includeDeps: flags.deps && !env.GENERATE_NO_DEPS,
    seed: flags.seed ?? env.GENERATE_SEED,
    mode,
    output: prefixPath("output", flags.output),
    connectionString:
      mode === "live"
        ? (flags.connection ?? env.DATABASE_URL ?? connectionFromParts(env))
        : undefined,
    dryRun: flags.dryRun,
  };
}

function connectionFromParts(env: GenerateEnv): string {
  const user = encodeURIComponent(env.DB_USER);
  const password = encodeURIComponent(env.DB_PASSWORD);
  const auth = password ? `${user}:${password}` : user;
  return `postgres://${auth}@${env.DB_HOST}:${env.DB_PORT}/${env.DB_NAME}`;
}
