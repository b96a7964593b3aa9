import { GenerationEmptyError } from "../errors.js";
import { RAG_CONFIG } from "./config.js";
import type { SourceCitation, TextChunk } from "./types.js";

const LEADING_NUMBERING = /^[0-9.\-) ]+/;
const ANSWER_LINE = /^\s*Q(\d+):\s*(.*)$/;
const SHORT_QUESTION = /\p{L}{2,}\?$/u;

/**
 * Pulls questions out of free-form model output: one per line, numbering and
 * bullets stripped, only lines with a "?", at most `numQuestions` of them.
 * Lines shorter than `minQuestionLength` are treated as fragments unless they
 * end in a word followed by "?" ("Why?" stays, "X?" and "? see 2" go).
 */
export function parseQuestions(output: string, numQuestions: number): string[] {
  const questions = output
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && line.includes("?"))
    .map((line) => line.replace(LEADING_NUMBERING, "").trim())
    .filter((q) => q.length >= RAG_CONFIG.minQuestionLength || SHORT_QUESTION.test(q))
    .slice(0, numQuestions);

  if (questions.length === 0) {
    throw new GenerationEmptyError(
      "No questions were generated. Please try again or provide different text.",
    );
  }
  return questions;
}

export function parseAnswer(output: string): string {
  const answer = output.trim();
  if (!answer) {
    throw new GenerationEmptyError("The model returned an empty answer.");
  }
  return answer;
}

export function previewText(text: string, maxLength: number = RAG_CONFIG.sourcePreviewLength): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Citations are only the `Source i` labels the answer literally mentions,
 * for labels that exist in the context. `Source 1` does not match inside `Source 12`.
 */
export function extractCitations(answer: string, chunks: readonly TextChunk[]): SourceCitation[] {
  const citations: SourceCitation[] = [];
  chunks.forEach((chunk, i) => {
    const sourceId = i + 1;
    if (new RegExp(`Source ${sourceId}(?!\\d)`).test(answer)) {
      citations.push({ source_id: sourceId, text: previewText(chunk.text) });
    }
  });
  return citations;
}

/**
 * Reads `Qn: answer` lines. Anything else is ignored, as are numbers outside
 * the question range and repeats of a number already seen. Returns answers in
 * question order; fewer answers than questions is not an error.
 */
export function parseMultiAnswers(output: string, questionCount: number): Array<{ index: number; answer: string }> {
  const byIndex = new Map<number, string>();

  for (const line of output.split(/\r?\n/)) {
    const match = ANSWER_LINE.exec(line);
    if (!match) continue;
    const n = Number(match[1]);
    const answer = (match[2] ?? "").trim();
    if (n < 1 || n > questionCount || byIndex.has(n) || !answer) continue;
    byIndex.set(n, answer);
  }

  const answers = [...byIndex.entries()]
    .sort(([a], [b]) => a - b)
    .map(([n, answer]) => ({ index: n - 1, answer }))
    .slice(0, questionCount);

  if (answers.length === 0) {
    throw new GenerationEmptyError("No answers in the expected \"Qn: answer\" format were returned.");
  }
  return answers;
}
