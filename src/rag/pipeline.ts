import type { Logger } from "../logger.js";
import { RAG_CONFIG } from "./config.js";
import { getChunkingStrategy } from "./chunking/index.js";
import type { Embedder } from "./embedding-service.js";
import { buildIndex } from "./vector-store.js";
import { retrieve } from "./retriever.js";
import { buildAnswerPrompt, buildMultiAnswerPrompt, buildQuestionPrompt } from "./context-builder.js";
import { extractCitations, parseAnswer, parseMultiAnswers, parseQuestions } from "./response-parser.js";
import type { ModelResolver } from "./model-selector.js";
import {
  answerMultipleSchema,
  answerQuestionSchema,
  generateQuestionsSchema,
  parseRequest,
  type AnswerMultipleInput,
  type AnswerQuestionInput,
  type GenerateQuestionsInput,
} from "./schemas.js";
import type {
  AnswerResult,
  MultiAnswerResult,
  PipelineMetadata,
  QuestionResult,
  TextChunk,
} from "./types.js";

export interface PipelineDeps {
  embedder: Embedder;
  resolveModel: ModelResolver;
  log: Logger;
  chunkingStrategy?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RagPipeline {
  generateQuestions(input: GenerateQuestionsInput, options?: RunOptions): Promise<QuestionResult>;
  answerQuestion(input: AnswerQuestionInput, options?: RunOptions): Promise<AnswerResult>;
  answerMultipleQuestions(input: AnswerMultipleInput, options?: RunOptions): Promise<MultiAnswerResult>;
}

interface Retrieval {
  chunks: TextChunk[];
  relevant: TextChunk[];
  metadata: PipelineMetadata;
}

export function createRagPipeline(deps: PipelineDeps): RagPipeline {
  const { embedder, resolveModel, log } = deps;
  const strategy = getChunkingStrategy(deps.chunkingStrategy ?? RAG_CONFIG.defaultChunkingStrategy);

  /** chunk → embed → index → retrieve; one fresh index per call. */
  async function chunkAndRetrieve(
    text: string,
    chunkSize: number,
    overlap: number,
    query: string,
    topK: number,
    signal?: AbortSignal,
  ): Promise<Retrieval> {
    const chunks = strategy.chunk(text, { chunkSize, overlap });
    log.debug({ chunks: chunks.length, chunkSize, overlap }, "chunked text");

    const vectors = await embedder.embed(
      chunks.map((c) => c.text),
      { signal },
    );
    const index = buildIndex(vectors);
    log.debug({ vectors: index.totalChunks, dimension: index.dimension }, "built vector index");

    const relevant = await retrieve(query, chunks, embedder, index, topK, signal);
    log.debug({ retrieved: relevant.length, topK }, "retrieved chunks");

    return {
      chunks,
      relevant,
      metadata: { total_chunks: chunks.length, embedding_dimension: index.dimension },
    };
  }

  return {
    async generateQuestions(input, options = {}) {
      const req = parseRequest(generateQuestionsSchema, input);
      const model = await resolveModel();

      const { relevant, metadata } = await chunkAndRetrieve(
        req.text,
        req.chunk_size,
        req.chunk_overlap,
        RAG_CONFIG.questionQuery,
        RAG_CONFIG.questionTopK,
        options.signal,
      );

      const prompt = buildQuestionPrompt(relevant, req.num_questions);
      const output = await model.invoke(prompt, { signal: options.signal });
      const questions = parseQuestions(output, req.num_questions);

      log.info(
        { provider: model.provider, questions: questions.length, totalChunks: metadata.total_chunks },
        "generated questions",
      );
      return {
        questions,
        chunks_used: relevant.length,
        model: model.provider,
        metadata,
      };
    },

    async answerQuestion(input, options = {}) {
      const req = parseRequest(answerQuestionSchema, input);
      const model = await resolveModel();

      const { relevant, metadata } = await chunkAndRetrieve(
        req.text,
        req.chunk_size,
        req.chunk_overlap,
        req.question,
        req.top_k,
        options.signal,
      );

      const prompt = buildAnswerPrompt(relevant, req.question, req.include_sources);
      const answer = parseAnswer(await model.invoke(prompt, { signal: options.signal }));

      const result: AnswerResult = {
        answer,
        chunks_used: relevant.length,
        model: model.provider,
        metadata,
      };
      if (req.include_sources) {
        result.sources = extractCitations(answer, relevant);
      }

      log.info(
        { provider: model.provider, chunksUsed: relevant.length, sources: result.sources?.length },
        "answered question",
      );
      return result;
    },

    async answerMultipleQuestions(input, options = {}) {
      const req = parseRequest(answerMultipleSchema, input);
      const model = await resolveModel();

      const { relevant, metadata } = await chunkAndRetrieve(
        req.text,
        req.chunk_size,
        req.chunk_overlap,
        req.questions.join(" "),
        req.top_k,
        options.signal,
      );

      const prompt = buildMultiAnswerPrompt(relevant, req.questions);
      const output = await model.invoke(prompt, { signal: options.signal });
      const answers = parseMultiAnswers(output, req.questions.length).map(({ index, answer }) => ({
        question: req.questions[index] ?? "",
        answer,
      }));

      if (answers.length < req.questions.length) {
        log.warn(
          { expected: req.questions.length, parsed: answers.length },
          "model answered fewer questions than asked",
        );
      }
      return {
        answers,
        chunks_used: relevant.length,
        model: model.provider,
        metadata,
      };
    },
  };
}
