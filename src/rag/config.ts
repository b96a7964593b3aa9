import { z } from "zod";
import { InvalidInputError } from "../errors.js";

export const RAG_CONFIG = {
  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingBaseUrl: "https://openrouter.ai/api/v1",
  embeddingBatchSize: 32,
  embeddingConcurrency: 4,
  embeddingTimeoutMs: 30_000,

  queryPrefix: "",

  llmTimeoutMs: 60_000,
  llmTemperature: 0.7,
  llmMaxTokens: 1024,

  chunkSize: 300,
  chunkOverlap: 50,
  minChunkSize: 50,
  maxChunkSize: 1000,
  maxChunkOverlap: 200,

  numQuestions: 5,
  maxQuestions: 20,
  questionTopK: 3,
  questionQuery: "What questions can be asked about this content?",

  topK: 3,
  maxTopK: 10,
  maxBatchQuestions: 10,

  minTextLength: 10,
  minQuestionLength: 10,
  sourcePreviewLength: 200,

  defaultChunkingStrategy: "word-window",

  extractionTimeoutMs: 20_000,
} as const;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  EMBEDDING_BASE_URL: z.string().url().default(RAG_CONFIG.embeddingBaseUrl),
  EMBEDDING_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default(RAG_CONFIG.embeddingModel),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).default(RAG_CONFIG.embeddingBatchSize),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().min(1).default(RAG_CONFIG.embeddingConcurrency),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().min(1).default(RAG_CONFIG.embeddingTimeoutMs),
  EMBEDDING_QUERY_PREFIX: z.string().default(RAG_CONFIG.queryPrefix),

  LLM_TIMEOUT_MS: z.coerce.number().int().min(1).default(RAG_CONFIG.llmTimeoutMs),

  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("llama3.2"),
  HUGGINGFACEHUB_API_TOKEN: optionalString,
  HUGGINGFACE_MODEL: z.string().default("meta-llama/Meta-Llama-3-8B-Instruct"),
  TOGETHER_API_KEY: optionalString,
  TOGETHER_MODEL: z.string().default("mistralai/Mixtral-8x7B-Instruct-v0.1"),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default("claude-3-5-sonnet-20240620"),
  SAMBANOVA_API_KEY: optionalString,
  SAMBANOVA_MODEL: z.string().default("Llama-4-Maverick-17B-128E-Instruct"),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: z.string().default("qwen/qwen3.5-27b"),
});

export interface EmbeddingConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  batchSize: number;
  concurrency: number;
  timeoutMs: number;
  queryPrefix: string;
}

export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

export interface LanguageModelConfig {
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  ollama: ProviderSettings;
  huggingface: ProviderSettings;
  together: ProviderSettings;
  anthropic: ProviderSettings;
  sambanova: ProviderSettings;
  openrouter: ProviderSettings;
}

export interface ServiceConfig {
  port: number;
  logLevel: string;
  embedding: EmbeddingConfig;
  llm: LanguageModelConfig;
}

/**
 * Reads service settings from the environment. Pipeline tuning lives in RAG_CONFIG;
 * only endpoints, credentials and limits are configurable per deployment.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidInputError("Invalid service configuration", {
      errors: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    embedding: {
      baseUrl: e.EMBEDDING_BASE_URL,
      apiKey: e.EMBEDDING_API_KEY ?? e.OPENROUTER_API_KEY,
      model: e.EMBEDDING_MODEL,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      concurrency: e.EMBEDDING_CONCURRENCY,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
      queryPrefix: e.EMBEDDING_QUERY_PREFIX,
    },
    llm: {
      timeoutMs: e.LLM_TIMEOUT_MS,
      temperature: RAG_CONFIG.llmTemperature,
      maxTokens: RAG_CONFIG.llmMaxTokens,
      ollama: { baseUrl: e.OLLAMA_BASE_URL, model: e.OLLAMA_MODEL },
      huggingface: {
        apiKey: e.HUGGINGFACEHUB_API_TOKEN,
        baseUrl: "https://router.huggingface.co/v1",
        model: e.HUGGINGFACE_MODEL,
      },
      together: {
        apiKey: e.TOGETHER_API_KEY,
        baseUrl: "https://api.together.xyz/v1",
        model: e.TOGETHER_MODEL,
      },
      anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.ANTHROPIC_MODEL },
      sambanova: {
        apiKey: e.SAMBANOVA_API_KEY,
        baseUrl: "https://api.sambanova.ai/v1",
        model: e.SAMBANOVA_MODEL,
      },
      openrouter: {
        apiKey: e.OPENROUTER_API_KEY,
        baseUrl: "https://openrouter.ai/api/v1",
        model: e.OPENROUTER_MODEL,
      },
    },
  };
}
