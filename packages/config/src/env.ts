import { z } from "zod";
import type { AppConfig } from "@ragsync/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const serviceList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(",")
        .map((service) => service.trim())
        .filter((service) => service.length > 0),
    )
    .pipe(z.array(z.enum(["gmail", "drive", "file"])));

/**
 * Validates the worker environment and supplies defaults.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Database ----------
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL is required")
    .refine((url) => url.startsWith("postgresql://"), {
      message: "DATABASE_URL must start with postgresql://",
    }),
  DATABASE_POOL_MAX: positiveInt("10"),

  // ---------- Redis ----------
  REDIS_URL: z.string().min(1, "REDIS_URL is required"),

  // ---------- Vector store ----------
  VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
  QDRANT_URL: z.string().url().default("http://localhost:6333"),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1).default("documents"),

  // ---------- Embeddings ----------
  COHERE_API_KEY: z.string().optional(),
  COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
  EMBEDDING_DIMENSIONS: positiveInt("1024"),

  // ---------- OCR / classifier ----------
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OCR_MODEL: z.string().default("gpt-4.1-mini"),
  CLASSIFIER_MODEL: z.string().default("gpt-4.1-mini"),

  // ---------- Pipeline ----------
  CHUNK_SIZE_TOKENS: positiveInt("2000"),
  CHUNK_OVERLAP_TOKENS: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
  IMAGE_AREA_THRESHOLD: z.string().default("0.7").transform(Number).pipe(z.number().gt(0).lte(1)),
  STORE_MAX_ATTEMPTS: positiveInt("3"),
  STORE_RETRY_DELAY_MS: z.string().default("60000").transform(Number).pipe(z.number().int().nonnegative()),
  CLASSIFIER_MAX_ATTEMPTS: positiveInt("3"),
  CLASSIFIER_BACKOFF_MS: z.string().default("60000").transform(Number).pipe(z.number().int().nonnegative()),

  // ---------- Workers ----------
  MANUAL_CONCURRENCY: positiveInt("8"),
  SCHEDULED_CONCURRENCY: positiveInt("2"),
  SCHEDULE_CRON: z.string().min(1).default("0 3 * * *"),

  // ---------- Tasks ----------
  TASK_HISTORY_SIZE: positiveInt("10"),
  STALE_TASK_HOURS: positiveInt("6"),

  // ---------- Connector policy ----------
  DEDUP_DELETE_DISABLED: serviceList(""),
  RELEVANCE_FILTER_SERVICES: serviceList("gmail"),
  FILE_CONNECTOR_ROOT: z.string().min(1).default("./data"),
});

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.CHUNK_OVERLAP_TOKENS >= parsed.CHUNK_SIZE_TOKENS) {
    throw new z.ZodError([
      {
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP_TOKENS"],
        message: "CHUNK_OVERLAP_TOKENS must be smaller than CHUNK_SIZE_TOKENS",
      },
    ]);
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    vectorStore: {
      provider: parsed.VECTOR_STORE,
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
    },

    openai: {
      apiKey: parsed.OPENAI_API_KEY ?? "",
      baseUrl: parsed.OPENAI_BASE_URL,
      ocrModel: parsed.OCR_MODEL,
      classifierModel: parsed.CLASSIFIER_MODEL,
    },

    chunking: {
      maxTokens: parsed.CHUNK_SIZE_TOKENS,
      overlap: parsed.CHUNK_OVERLAP_TOKENS,
    },

    extraction: {
      imageAreaThreshold: parsed.IMAGE_AREA_THRESHOLD,
    },

    retry: {
      storeMaxAttempts: parsed.STORE_MAX_ATTEMPTS,
      storeDelayMs: parsed.STORE_RETRY_DELAY_MS,
      classifierMaxAttempts: parsed.CLASSIFIER_MAX_ATTEMPTS,
      classifierBackoffMs: parsed.CLASSIFIER_BACKOFF_MS,
    },

    workers: {
      manualConcurrency: parsed.MANUAL_CONCURRENCY,
      scheduledConcurrency: parsed.SCHEDULED_CONCURRENCY,
      scheduleCron: parsed.SCHEDULE_CRON,
    },

    tasks: {
      historySize: parsed.TASK_HISTORY_SIZE,
      staleAfterMs: parsed.STALE_TASK_HOURS * 60 * 60 * 1000,
    },

    connectors: {
      dedupDeleteDisabled: parsed.DEDUP_DELETE_DISABLED,
      relevanceFilterServices: parsed.RELEVANCE_FILTER_SERVICES,
    },

    files: {
      rootDir: parsed.FILE_CONNECTOR_ROOT,
    },
  };
}
