import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? ((filePath: string, encoding: "utf8") => fs.readFileSync(filePath, encoding));
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
  return envFilePath;
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });
const tableListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((table) => table.trim().toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.string().regex(/^[a-z_][a-z0-9_]*$/, "table names must be plain identifiers")).min(1));

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_UNDERSTANDING_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_SQL_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-large"),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  POSTGRES_URL: z.string().min(1, "POSTGRES_URL is required"),
  QDRANT_URL: z.string().optional(),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1, "QDRANT_COLLECTION is required"),
  REDIS_URL: z.string().optional(),
  CACHE_ENABLED: booleanFlagSchema.default(true),
  CACHE_PREFIX: z.string().min(1).default("qa"),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  PIVOT_LANGUAGE: z.string().min(2).default("az"),
  DEFAULT_TOP_K: z.coerce.number().int().positive().default(5),
  MAX_TOP_K: z.coerce.number().int().positive().default(20),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  VECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  SQL_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CACHE_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  STATISTICS_TABLES: tableListSchema.default("news_articles"),
  STATISTICS_MAX_ROWS: z.coerce.number().int().positive().default(30)
}).superRefine((value, ctx) => {
  if (value.APP_MODE === "prod") {
    if (!value.QDRANT_URL || value.QDRANT_URL.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required in prod mode"
      });
    }
  }
  if (value.DEFAULT_TOP_K > value.MAX_TOP_K) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["DEFAULT_TOP_K"],
      message: "DEFAULT_TOP_K must not exceed MAX_TOP_K"
    });
  }
});

export type Env = z.infer<typeof envSchema>;

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return {
    ...parsed.data,
    QDRANT_URL: blankToUndefined(parsed.data.QDRANT_URL),
    QDRANT_API_KEY: blankToUndefined(parsed.data.QDRANT_API_KEY),
    REDIS_URL: blankToUndefined(parsed.data.REDIS_URL)
  };
}

export const env: Env = parseEnv(process.env);
