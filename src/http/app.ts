import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import { z } from "zod";
import { ExtractionError, InvalidInputError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { RAG_CONFIG } from "../rag/config.js";
import type { ArticleStore, UrlExtractor } from "../rag/article-store.js";
import { importArticle } from "../rag/article-store.js";
import type { ModelResolver } from "../rag/model-selector.js";
import { extractPdf } from "../rag/pdf-extractor.js";
import type { RagPipeline } from "../rag/pipeline.js";
import {
  answerMultipleSchema,
  answerQuestionSchema,
  generateQuestionsSchema,
  parseRequest,
} from "../rag/schemas.js";
import { createErrorHandler } from "./error-handler.js";

export interface AppServices {
  pipeline: RagPipeline;
  resolveModel: ModelResolver;
  articleStore: ArticleStore;
  extractUrl: UrlExtractor;
  embeddingModel: string;
  log: Logger;
}

const sourceSchema = z
  .object({
    text: z.string().optional(),
    url: z.string().url().optional(),
  })
  .passthrough()
  .refine((body) => body.text !== undefined || body.url !== undefined, {
    message: "Either text or url is required",
  });

const importArticleSchema = z.object({ url: z.string().url() });

async function readJson(c: Context): Promise<unknown> {
  try {
    return (await c.req.json()) as unknown;
  } catch {
    throw new InvalidInputError("Invalid request body: expected JSON");
  }
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value !== "string" || value.trim() === "") return undefined;
  return Number(value);
}

export function createApp(services: AppServices): Hono {
  const { pipeline, resolveModel, articleStore, extractUrl, log } = services;
  const app = new Hono();

  /** Request bodies carry either `text` or a `url` whose extracted text stands in for it. */
  async function sourceBody(c: Context): Promise<Record<string, unknown>> {
    const body = parseRequest(sourceSchema, await readJson(c));
    if (body.text !== undefined || body.url === undefined) return body;

    const doc = await extractUrl(body.url);
    if (doc.text.trim().length < RAG_CONFIG.minTextLength) {
      throw new ExtractionError("The URL did not yield enough text to process", { url: body.url });
    }
    log.info({ url: body.url, title: doc.title, characters: doc.text.length }, "extracted text from URL");
    return { ...body, text: doc.text };
  }

  app.use("*", requestLogger((message) => log.info(message)));
  app.use("*", cors());
  app.onError(createErrorHandler(log));

  app.get("/", (c) =>
    c.json({
      message: "RAG Question Generator API is running",
      endpoints: {
        "/research/generate-questions": "POST - Generate questions from text or a URL",
        "/research/generate-questions/pdf": "POST - Generate questions from an uploaded PDF",
        "/research/answer": "POST - Answer a question from text or a URL",
        "/research/answer-multiple": "POST - Answer several questions in one model call",
        "/research/import-article": "POST - Extract an article from a URL and store it",
        "/health": "GET - Service health",
      },
    }),
  );

  app.get("/health", async (c) => {
    let llmAvailable = false;
    let llmType: string;
    try {
      llmType = (await resolveModel()).provider;
      llmAvailable = true;
    } catch (err) {
      llmType = `Error: ${errorMessage(err)}`;
    }
    return c.json({
      status: llmAvailable ? "healthy" : "degraded",
      llm_available: llmAvailable,
      llm_type: llmType,
      embedding_model: services.embeddingModel,
    });
  });

  app.post("/research/generate-questions", async (c) => {
    const req = parseRequest(generateQuestionsSchema, await sourceBody(c));
    return c.json(await pipeline.generateQuestions(req, { signal: c.req.raw.signal }));
  });

  app.post("/research/generate-questions/pdf", async (c) => {
    const form = await c.req.parseBody();
    const file = form["file"];
    if (!(file instanceof File)) {
      throw new InvalidInputError("A PDF file is required in the 'file' field");
    }

    const doc = await extractPdf(new Uint8Array(await file.arrayBuffer()), file.name);
    if (doc.text.trim().length < RAG_CONFIG.minTextLength) {
      throw new ExtractionError("The PDF did not yield enough text to process", { source: file.name });
    }

    const req = parseRequest(generateQuestionsSchema, {
      text: doc.text,
      chunk_size: optionalNumber(form["chunk_size"]),
      chunk_overlap: optionalNumber(form["chunk_overlap"]),
      num_questions: optionalNumber(form["num_questions"]),
    });
    return c.json(await pipeline.generateQuestions(req, { signal: c.req.raw.signal }));
  });

  app.post("/research/answer", async (c) => {
    const req = parseRequest(answerQuestionSchema, await sourceBody(c));
    return c.json(await pipeline.answerQuestion(req, { signal: c.req.raw.signal }));
  });

  app.post("/research/answer-multiple", async (c) => {
    const req = parseRequest(answerMultipleSchema, await sourceBody(c));
    return c.json(await pipeline.answerMultipleQuestions(req, { signal: c.req.raw.signal }));
  });

  app.post("/research/import-article", async (c) => {
    const { url } = parseRequest(importArticleSchema, await readJson(c));
    log.info({ url }, "Processing URL import request");

    const article = await importArticle(url, articleStore, extractUrl);
    log.info({ articleId: article.id }, "Successfully imported article");

    return c.json({
      success: true,
      article_id: article.id,
      title: article.title,
      message: "Article imported successfully",
    });
  });

  app.notFound((c) =>
    c.json({ success: false, error: { code: "NOT_FOUND", message: "Route not found" } }, 404),
  );

  return app;
}
