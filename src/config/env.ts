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

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const fieldListSchema = z
  .string()
  .default("table_name,project_name,employee_name,role,status,event_type,priority,event_date,updated_at")
  .transform((value) =>
    value
      .split(",")
      .map((field) => field.trim())
      .filter((field) => field.length > 0)
  );

export const envSchema = z
  .object({
    APP_MODE: runtimeModeSchema.default("prod"),
    PORT: z.coerce.number().int().positive().default(3000),
    FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    RUN_STARTUP_CHECKS: booleanFlagSchema.default(false),
    OPENAI_API_KEY: optionalTrimmedString,
    OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
    OPENAI_RERANK_MODEL: z.string().min(1).default("gpt-4.1-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    EMBEDDING_PROVIDER: z.enum(["openai", "text2vec"]).default("openai"),
    TEXT2VEC_INFERENCE_URL: z.string().min(1).default("http://localhost:9878"),
    GENERATION_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
    OLLAMA_BASE_URL: z.string().min(1).default("http://localhost:11434"),
    OLLAMA_MODEL: z.string().min(1).default("llama3.1"),
    RERANK_PROVIDER: z.enum(["lexical", "openai"]).default("lexical"),
    POSTGRES_URL: optionalTrimmedString,
    QDRANT_URL: optionalTrimmedString,
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1).default("search_documents"),
    QDRANT_DENSE_VECTOR: z.string().min(1).default("dense"),
    QDRANT_SPARSE_VECTOR: z.string().min(1).default("sparse"),
    LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
    SEARCH_RRF_K: z.coerce.number().positive().default(60),
    SEARCH_TEMPORAL_HALF_LIFE_DAYS: z.coerce.number().positive().default(30),
    SEARCH_MIN_SCORE_THRESHOLD: z.coerce.number().min(0).default(0.01),
    SEARCH_DEFAULT_TOP_K: z.coerce.number().int().positive().default(10),
    SEARCH_MAX_TOP_K: z.coerce.number().int().positive().default(100),
    SEARCH_CANDIDATE_TOP_K: z.coerce.number().int().positive().default(40),
    SEARCH_RERANK_TOP_N: z.coerce.number().int().positive().max(20).default(20),
    SEARCH_FILTER_FIELDS: fieldListSchema,
    SEARCH_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    SEARCH_GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000)
  })
  .superRefine((value, ctx) => {
    if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required in prod mode"
      });
    }
    if (value.SEARCH_DEFAULT_TOP_K > value.SEARCH_MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SEARCH_DEFAULT_TOP_K"],
        message: "SEARCH_DEFAULT_TOP_K must not exceed SEARCH_MAX_TOP_K"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}
