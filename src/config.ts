import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim().length === 0) return undefined;
  return value;
};

const schema = z.object({
  JSONAPI_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  JSONAPI_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
  JSONAPI_RETRY_MAX: z.coerce.number().int().min(0).max(8).default(2),
  JSONAPI_RETRY_BASE_MS: z.coerce.number().int().positive().default(250),
  JSONAPI_MAX_PAGES: z.coerce.number().int().positive().default(20),

  LOG_LEVEL: z.string().default("info"),
  LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional())
});

export type Config = ReturnType<typeof loadConfig>;

export const loadConfig = (source: Record<string, string | undefined>) => {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(", ")}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${fields}`);
  }

  const env = parsed.data;
  return {
    baseUrl: env.JSONAPI_BASE_URL?.replace(/\/$/, ""),
    requestTimeoutMs: env.JSONAPI_REQUEST_TIMEOUT_MS,
    retryMax: env.JSONAPI_RETRY_MAX,
    retryBaseMs: env.JSONAPI_RETRY_BASE_MS,
    maxPages: env.JSONAPI_MAX_PAGES,

    logLevel: env.LOG_LEVEL,
    logFile: env.LOG_FILE?.trim()
  };
};

export const config = loadConfig(process.env);
