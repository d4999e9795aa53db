import { z } from "zod";
import type { AppConfig } from "@voicekb/types";

function intVar(fallback: string, schema: z.ZodNumber = z.number().int().positive()) {
  return z.string().default(fallback).transform(Number).pipe(schema);
}

const COHERE_DIMENSIONS = [256, 512, 1024, 1536] as const;

/** Native vector size per provider, used when EMBEDDING_DIMENSIONS is unset. */
const DEFAULT_DIMENSIONS = { openai: 3072, cohere: 1536 } as const;

/**
 * Zod schema for the worker's environment. Numeric values arrive as strings
 * and are coerced and range-checked here so the rest of the code only ever
 * sees a typed {@link AppConfig}.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql:// or postgres://",
      }),
    DATABASE_POOL_MAX: intVar("10"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().url("QDRANT_URL must be a URL"),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("knowledge-base"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBED_MODEL: z.string().default("text-embedding-3-large"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    EMBEDDING_DIMENSIONS: z.string().transform(Number).pipe(z.number().int().positive()).optional(),
    EMBED_BATCH_SIZE: intVar("10"),
    MAX_CHUNKS_PER_DOCUMENT: intVar("1000"),
    EMBED_BATCH_DELAY_MS: intVar("100", z.number().int().nonnegative()),
    EXTERNAL_REQUEST_TIMEOUT_MS: intVar("60000"),

    // ---------- Chunking ----------
    CHUNK_SIZE: intVar("400"),
    CHUNK_OVERLAP: intVar("50", z.number().int().nonnegative()),

    // ---------- Vector writes ----------
    VECTOR_UPSERT_BATCH_SIZE: intVar("100"),
    VECTOR_BATCH_DELAY_MS: intVar("100", z.number().int().nonnegative()),

    // ---------- Queue ----------
    QUEUE_POLL_INTERVAL_MS: intVar("2000"),
    QUEUE_MAX_RETRIES: intVar("3"),

    // ---------- Docling ----------
    DOCLING_PYTHON_PATH: z.string().default("python3"),
    DOCLING_SCRIPT_PATH: z.string().default("scripts/docling-parse.py"),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  })
  .refine(
    (env) =>
      env.EMBEDDING_PROVIDER !== "cohere" ||
      env.EMBEDDING_DIMENSIONS === undefined ||
      COHERE_DIMENSIONS.some((d) => d === env.EMBEDDING_DIMENSIONS),
    {
      message: `Cohere supports EMBEDDING_DIMENSIONS of ${COHERE_DIMENSIONS.join(", ")}`,
      path: ["EMBEDDING_DIMENSIONS"],
    },
  );

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails. Missing
 * embedding keys are allowed; they surface when a document is embedded.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS ?? DEFAULT_DIMENSIONS[parsed.EMBEDDING_PROVIDER],
      batchSize: parsed.EMBED_BATCH_SIZE,
      maxChunksPerDocument: parsed.MAX_CHUNKS_PER_DOCUMENT,
      batchDelayMs: parsed.EMBED_BATCH_DELAY_MS,
      requestTimeoutMs: parsed.EXTERNAL_REQUEST_TIMEOUT_MS,
      openai: {
        apiKey: parsed.OPENAI_API_KEY ?? "",
        model: parsed.OPENAI_EMBED_MODEL,
      },
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
        model: parsed.COHERE_EMBED_MODEL,
      },
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    indexing: {
      upsertBatchSize: parsed.VECTOR_UPSERT_BATCH_SIZE,
      batchDelayMs: parsed.VECTOR_BATCH_DELAY_MS,
    },

    queue: {
      pollIntervalMs: parsed.QUEUE_POLL_INTERVAL_MS,
      maxRetries: parsed.QUEUE_MAX_RETRIES,
    },

    docling: {
      pythonPath: parsed.DOCLING_PYTHON_PATH,
      scriptPath: parsed.DOCLING_SCRIPT_PATH,
    },
  };
}
