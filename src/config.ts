import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  try {
    const thisFile = fileURLToPath(import.meta.url);
    const packageJsonPath = path.resolve(path.dirname(thisFile), "../package.json");
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  BASE_URL: z.string().url().default("http://localhost:8080"),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error", "none"]))
    .default("warn"),

  LOCAL_REPOSITORY: z.string().min(1).default(path.join(os.homedir(), ".m2", "repository")),
  COPYRIGHT_FILTERS_FILE: z.string().optional(),
  INTAKE_MAX_SINGLE_FILE_BYTES: z.coerce.number().int().positive().default(2 * 1024 * 1024),
  INTAKE_MAX_ARCHIVE_BYTES: z.coerce.number().int().positive().default(32 * 1024 * 1024),
  HTTP_JSON_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(48 * 1024 * 1024),

  TRUST_PROXY: BooleanFromEnv.default(false),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),

  VERSION: z.string().default(resolveDefaultVersion())
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type AppConfig = Omit<ParsedEnv, "COPYRIGHT_FILTERS_FILE"> & {
  COPYRIGHT_FILTERS_FILE: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  const filtersFile = parsed.data.COPYRIGHT_FILTERS_FILE?.trim();
  if (parsed.data.INTAKE_MAX_ARCHIVE_BYTES > parsed.data.HTTP_JSON_BODY_LIMIT_BYTES) {
    throw new Error("Invalid environment: INTAKE_MAX_ARCHIVE_BYTES must not exceed HTTP_JSON_BODY_LIMIT_BYTES");
  }

  return {
    ...parsed.data,
    COPYRIGHT_FILTERS_FILE: filtersFile ? filtersFile : null
  };
}
