import { z, type ZodIssue } from "zod";
import { InvalidInputError } from "../errors.js";
import { RAG_CONFIG } from "./config.js";

const chunkingFields = {
  text: z
    .string()
    .refine((t) => t.trim().length >= RAG_CONFIG.minTextLength, {
      message: `text must contain at least ${RAG_CONFIG.minTextLength} characters`,
    }),
  chunk_size: z
    .number()
    .int()
    .min(RAG_CONFIG.minChunkSize)
    .max(RAG_CONFIG.maxChunkSize)
    .default(RAG_CONFIG.chunkSize),
  chunk_overlap: z.number().int().min(0).max(RAG_CONFIG.maxChunkOverlap).default(RAG_CONFIG.chunkOverlap),
};

function overlapBelowChunkSize(
  value: { chunk_size: number; chunk_overlap: number },
  ctx: z.RefinementCtx,
): void {
  if (value.chunk_overlap >= value.chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["chunk_overlap"],
      message:
        `chunk_overlap (${value.chunk_overlap}) must be less than chunk_size (${value.chunk_size}) ` +
        "to avoid infinite loops",
    });
  }
}

const question = z
  .string()
  .trim()
  .min(3, "question must contain at least 3 characters");

export const generateQuestionsSchema = z
  .object({
    ...chunkingFields,
    num_questions: z.number().int().min(1).max(RAG_CONFIG.maxQuestions).default(RAG_CONFIG.numQuestions),
  })
  .superRefine(overlapBelowChunkSize);

export const answerQuestionSchema = z
  .object({
    ...chunkingFields,
    question,
    top_k: z.number().int().min(1).max(RAG_CONFIG.maxTopK).default(RAG_CONFIG.topK),
    include_sources: z.boolean().default(true),
  })
  .superRefine(overlapBelowChunkSize);

export const answerMultipleSchema = z
  .object({
    ...chunkingFields,
    questions: z.array(question).min(1).max(RAG_CONFIG.maxBatchQuestions),
    top_k: z.number().int().min(1).max(RAG_CONFIG.maxTopK).default(RAG_CONFIG.topK),
  })
  .superRefine(overlapBelowChunkSize);

export type GenerateQuestionsInput = z.input<typeof generateQuestionsSchema>;
export type GenerateQuestionsRequest = z.output<typeof generateQuestionsSchema>;
export type AnswerQuestionInput = z.input<typeof answerQuestionSchema>;
export type AnswerQuestionRequest = z.output<typeof answerQuestionSchema>;
export type AnswerMultipleInput = z.input<typeof answerMultipleSchema>;
export type AnswerMultipleRequest = z.output<typeof answerMultipleSchema>;

export function formatIssues(issues: readonly ZodIssue[]): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/** Parses `data` with `schema`, reporting every failure as one InvalidInputError. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = formatIssues(result.error.issues);
    throw new InvalidInputError(errors[0]?.message ?? "Request validation failed", { errors });
  }
  return result.data;
}
