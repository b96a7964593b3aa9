import { describe, it, expect } from "vitest";
import { InvalidInputError } from "../../errors.js";
import { loadServiceConfig } from "../config.js";
import {
  answerMultipleSchema,
  answerQuestionSchema,
  generateQuestionsSchema,
  parseRequest,
} from "../schemas.js";

const text = "Some text that is comfortably longer than the minimum.";

function invalid(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err;
    throw err;
  }
  throw new Error("expected an InvalidInputError");
}

describe("request schemas", () => {
  it("should apply defaults", () => {
    expect(parseRequest(generateQuestionsSchema, { text })).toEqual({
      text,
      chunk_size: 300,
      chunk_overlap: 50,
      num_questions: 5,
    });
    expect(parseRequest(answerQuestionSchema, { text, question: "Why?" })).toEqual({
      text,
      question: "Why?",
      chunk_size: 300,
      chunk_overlap: 50,
      top_k: 3,
      include_sources: true,
    });
  });

  it("should reject overlap that is not below chunk size", () => {
    const err = invalid(() => parseRequest(generateQuestionsSchema, { text, chunk_size: 100, chunk_overlap: 100 }));

    expect(err.message).toBe("chunk_overlap (100) must be less than chunk_size (100) to avoid infinite loops");
    expect(err.details).toEqual({
      errors: [
        {
          path: "chunk_overlap",
          message: "chunk_overlap (100) must be less than chunk_size (100) to avoid infinite loops",
        },
      ],
    });
  });

  it("should enforce parameter bounds", () => {
    expect(() => parseRequest(generateQuestionsSchema, { text, chunk_size: 49 })).toThrow(InvalidInputError);
    expect(() => parseRequest(generateQuestionsSchema, { text, chunk_size: 1001 })).toThrow(InvalidInputError);
    expect(() => parseRequest(generateQuestionsSchema, { text, chunk_overlap: 201, chunk_size: 500 })).toThrow(
      InvalidInputError,
    );
    expect(() => parseRequest(generateQuestionsSchema, { text, num_questions: 0 })).toThrow(InvalidInputError);
    expect(() => parseRequest(generateQuestionsSchema, { text, num_questions: 21 })).toThrow(InvalidInputError);
    expect(() => parseRequest(answerQuestionSchema, { text, question: "Why?", top_k: 11 })).toThrow(
      InvalidInputError,
    );
    expect(() => parseRequest(generateQuestionsSchema, { text, chunk_size: 120.5 })).toThrow(InvalidInputError);
  });

  it("should reject text below the minimum length", () => {
    const err = invalid(() => parseRequest(generateQuestionsSchema, { text: "   too short  " }));
    expect(err.details).toEqual({
      errors: [{ path: "text", message: "text must contain at least 10 characters" }],
    });
  });

  it("should require between one and ten questions for batch answering", () => {
    expect(() => parseRequest(answerMultipleSchema, { text, questions: [] })).toThrow(InvalidInputError);
    expect(() =>
      parseRequest(answerMultipleSchema, { text, questions: Array.from({ length: 11 }, (_, i) => `Question ${i}?`) }),
    ).toThrow(InvalidInputError);
  });
});

describe("loadServiceConfig", () => {
  it("should fill in defaults", () => {
    const config = loadServiceConfig({});

    expect(config.port).toBe(8000);
    expect(config.embedding).toEqual({
      baseUrl: "https://openrouter.ai/api/v1",
      apiKey: undefined,
      model: "qwen/qwen3-embedding-8b",
      batchSize: 32,
      concurrency: 4,
      timeoutMs: 30000,
      queryPrefix: "",
    });
    expect(config.llm.ollama.baseUrl).toBe("http://localhost:11434");
    expect(config.llm.anthropic.apiKey).toBeUndefined();
  });

  it("should use the OpenRouter key for embeddings when no embedding key is set", () => {
    expect(loadServiceConfig({ OPENROUTER_API_KEY: "test-openrouter" }).embedding.apiKey).toBe("test-openrouter");
    expect(
      loadServiceConfig({ OPENROUTER_API_KEY: "test-openrouter", EMBEDDING_API_KEY: "test-embed" }).embedding.apiKey,
    ).toBe("test-embed");
  });

  it("should treat blank keys as unset", () => {
    expect(loadServiceConfig({ TOGETHER_API_KEY: "  " }).llm.together.apiKey).toBeUndefined();
  });

  it("should reject malformed values", () => {
    expect(() => loadServiceConfig({ PORT: "not-a-port" })).toThrow(InvalidInputError);
    expect(() => loadServiceConfig({ EMBEDDING_BASE_URL: "not a url" })).toThrow("Invalid service configuration");
  });
});
