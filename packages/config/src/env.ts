import { z } from "zod";
import type { AppConfig } from "@hybridrag/types";

/**
 * Zod schema for every environment variable the service reads.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
const baseEnvSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Chunking ----------
  CHUNK_STRATEGY: z.enum(["recursive", "paragraph"]).default("recursive"),
  CHUNK_SIZE: z.string().default("300").transform(Number).pipe(z.number().int().positive()),
  CHUNK_OVERLAP: z.string().default("50").transform(Number).pipe(z.number().int().nonnegative()),
  CHUNK_MIN_LENGTH: z.string().default("50").transform(Number).pipe(z.number().int().nonnegative()),
  CHUNK_MAX_LENGTH: z.string().default("500").transform(Number).pipe(z.number().int().positive()),

  // ---------- Extraction / routing / answering ----------
  EXTRACTION_STRATEGY: z.enum(["pattern", "generative"]).default("pattern"),
  ROUTING_STRATEGY: z.enum(["keyword", "generative"]).default("keyword"),
  RETRIEVAL_TOP_K: z.string().default("3").transform(Number).pipe(z.number().int().positive()),
  RELATIONAL_FACT_LIMIT: z
    .string()
    .default("5")
    .transform(Number)
    .pipe(z.number().int().positive()),

  // ---------- Semantic index ----------
  SEMANTIC_INDEX_BACKEND: z.enum(["memory", "qdrant"]).default("memory"),
  QDRANT_URL: z.string().url().optional(),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1).default("hybrid_rag_collection"),

  // ---------- Relationship index ----------
  RELATIONSHIP_INDEX_BACKEND: z.enum(["memory", "neo4j"]).default("memory"),
  NEO4J_URI: z
    .string()
    .default("bolt://localhost:7687")
    .refine((uri) => /^(bolt|neo4j)(\+s|\+ssc)?:\/\//.test(uri), {
      message: "NEO4J_URI must use the bolt:// or neo4j:// scheme",
    }),
  NEO4J_USER: z.string().min(1).default("neo4j"),
  NEO4J_PASSWORD: z.string().optional(),

  // ---------- Cohere ----------
  COHERE_API_KEY: z.string().optional(),
  COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),
  COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
  GENERATOR_MAX_RETRIES: z
    .string()
    .default("2")
    .transform(Number)
    .pipe(z.number().int().nonnegative()),
});

export const envSchema = baseEnvSchema.superRefine((env, ctx) => {
  if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["CHUNK_OVERLAP"],
      message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    });
  }

  if (env.CHUNK_MIN_LENGTH > env.CHUNK_MAX_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["CHUNK_MIN_LENGTH"],
      message: "CHUNK_MIN_LENGTH must not exceed CHUNK_MAX_LENGTH",
    });
  }

  const hasCohereKey = (env.COHERE_API_KEY ?? "").length > 0;

  if (env.SEMANTIC_INDEX_BACKEND === "qdrant") {
    if (!env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when SEMANTIC_INDEX_BACKEND is qdrant",
      });
    }
    if (!hasCohereKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required to embed passages for Qdrant",
      });
    }
  }

  if (env.RELATIONSHIP_INDEX_BACKEND === "neo4j" && !env.NEO4J_PASSWORD) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["NEO4J_PASSWORD"],
      message: "NEO4J_PASSWORD is required when RELATIONSHIP_INDEX_BACKEND is neo4j",
    });
  }

  if (env.EXTRACTION_STRATEGY === "generative" && !hasCohereKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["COHERE_API_KEY"],
      message: "COHERE_API_KEY is required for generative extraction",
    });
  }

  if (env.ROUTING_STRATEGY === "generative" && !hasCohereKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["COHERE_API_KEY"],
      message: "COHERE_API_KEY is required for generative routing",
    });
  }
});

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    chunking:
      parsed.CHUNK_STRATEGY === "recursive"
        ? {
            strategy: "recursive",
            chunkSize: parsed.CHUNK_SIZE,
            chunkOverlap: parsed.CHUNK_OVERLAP,
          }
        : {
            strategy: "paragraph",
            minLength: parsed.CHUNK_MIN_LENGTH,
            maxLength: parsed.CHUNK_MAX_LENGTH,
          },

    extraction: {
      strategy: parsed.EXTRACTION_STRATEGY,
    },

    routing: {
      strategy: parsed.ROUTING_STRATEGY,
    },

    answering: {
      topK: parsed.RETRIEVAL_TOP_K,
      factLimit: parsed.RELATIONAL_FACT_LIMIT,
    },

    semanticIndex: {
      backend: parsed.SEMANTIC_INDEX_BACKEND,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      collectionName: parsed.QDRANT_COLLECTION,
    },

    relationshipIndex: {
      backend: parsed.RELATIONSHIP_INDEX_BACKEND,
      neo4jUri: parsed.NEO4J_URI,
      neo4jUser: parsed.NEO4J_USER,
      neo4jPassword: parsed.NEO4J_PASSWORD,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      chatModel: parsed.COHERE_CHAT_MODEL,
      embedModel: parsed.COHERE_EMBED_MODEL,
      maxRetries: parsed.GENERATOR_MAX_RETRIES,
    },
  };
}
