import { z } from "zod";
import type { AppConfig } from "@indexflow/types";
import { loadPipelineConfig } from "./pipeline-config.js";

const booleanFlag = (defaultValue: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(defaultValue)
    .transform((val) => val === "true");

/**
 * Zod schema for the environment. Validates, transforms, and provides
 * defaults so that the resulting object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    PORT: z.string().default("8000").transform(Number).pipe(z.number().int().positive()),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    ROOT_PATH: z
      .string()
      .default("/")
      .refine((val) => val.startsWith("/"), { message: "ROOT_PATH must start with /" }),
    CONCURRENT_REQUEST_PER_WORKER: z
      .string()
      .default("4")
      .transform(Number)
      .pipe(z.number().int().positive()),

    // ---------- Uploads & pipeline ----------
    FILE_UPLOAD_PATH: z.string().min(1).default("file-upload"),
    PIPELINE_CONFIG_PATH: z.string().optional(),

    // ---------- Document store ----------
    DOCUMENT_STORE: z.enum(["elasticsearch", "qdrant", "memory"]).default("elasticsearch"),
    DUPLICATE_DOCUMENTS: z.enum(["overwrite", "skip", "fail"]).default("overwrite"),
    ELASTIC_HOST: z.string().default("localhost"),
    ELASTIC_PORT: z.string().default("9243").transform(Number).pipe(z.number().int().positive()),
    ELASTIC_SCHEME: z.enum(["http", "https"]).default("https"),
    ELASTIC_USERNAME: z.string().default("elastic"),
    ELASTIC_PASSWORD: z.string().optional(),
    ELASTIC_CA_CERTS: z.string().default("/etc/ssl/certs/ca-certificates.crt"),
    ELASTIC_VERIFY_CERTS: booleanFlag("true"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),

    // ---------- Embeddings ----------
    EMBEDDING_MODEL: z.string().default("sentence-transformers/multi-qa-mpnet-base-dot-v1"),
    EMBEDDING_MODEL_FORMAT: z.enum(["sentence_transformers", "cohere"]).default("sentence_transformers"),
    EMBEDDING_SERVER_URL: z.string().url().optional(),
    EMBEDDING_DIM: z.string().default("768").transform(Number).pipe(z.number().int().positive()),
    COHERE_API_KEY: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.DOCUMENT_STORE === "elasticsearch" && !env.ELASTIC_PASSWORD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ELASTIC_PASSWORD"],
        message: "ELASTIC_PASSWORD is required when DOCUMENT_STORE is elasticsearch",
      });
    }
    if (env.DOCUMENT_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when DOCUMENT_STORE is qdrant",
      });
    }
    if (env.EMBEDDING_MODEL_FORMAT === "sentence_transformers" && !env.EMBEDDING_SERVER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EMBEDDING_SERVER_URL"],
        message: "EMBEDDING_SERVER_URL is required for sentence_transformers models",
      });
    }
    if (env.EMBEDDING_MODEL_FORMAT === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required for cohere models",
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
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    rootPath: parsed.ROOT_PATH,
    fileUploadPath: parsed.FILE_UPLOAD_PATH,
    concurrentRequestsPerWorker: parsed.CONCURRENT_REQUEST_PER_WORKER,

    documentStore: {
      type: parsed.DOCUMENT_STORE,
      similarity: "dot_product",
      embeddingDim: parsed.EMBEDDING_DIM,
      duplicateDocuments: parsed.DUPLICATE_DOCUMENTS,
      elasticsearch: {
        host: parsed.ELASTIC_HOST,
        port: parsed.ELASTIC_PORT,
        scheme: parsed.ELASTIC_SCHEME,
        username: parsed.ELASTIC_USERNAME,
        password: parsed.ELASTIC_PASSWORD,
        caCerts: parsed.ELASTIC_CA_CERTS,
        verifyCerts: parsed.ELASTIC_VERIFY_CERTS,
      },
      qdrant: {
        url: parsed.QDRANT_URL,
        apiKey: parsed.QDRANT_API_KEY,
      },
    },

    embedding: {
      model: parsed.EMBEDDING_MODEL,
      modelFormat: parsed.EMBEDDING_MODEL_FORMAT,
      serverUrl: parsed.EMBEDDING_SERVER_URL,
      cohereApiKey: parsed.COHERE_API_KEY,
      dimensions: parsed.EMBEDDING_DIM,
    },

    pipeline: loadPipelineConfig(parsed.PIPELINE_CONFIG_PATH),
  };
}
