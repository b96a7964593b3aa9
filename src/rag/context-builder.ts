import type { TextChunk } from "./types.js";

export function buildQuestionPrompt(chunks: readonly TextChunk[], numQuestions: number): string {
  const context = chunks.map((chunk, i) => `Chunk ${i + 1}: ${chunk.text}`).join("\n\n");

  return (
    `Based on the following text content, generate ${numQuestions} diverse, specific, and insightful questions ` +
    "that someone might ask about this content.\n\n" +
    "The questions should:\n" +
    "- Be clear and directly answerable from the given context\n" +
    "- Cover different aspects or topics within the text\n" +
    "- Range from factual to analytical\n" +
    "- Be phrased naturally as if asked by a curious reader\n\n" +
    `Context:\n${context}\n\n` +
    `Generate exactly ${numQuestions} questions, one per line, without numbering or bullet points:`
  );
}

function formatSources(chunks: readonly TextChunk[]): string {
  return chunks.map((chunk, i) => `[Source ${i + 1}]\n${chunk.text}`).join("\n\n");
}

export function buildAnswerPrompt(
  chunks: readonly TextChunk[],
  question: string,
  includeSources: boolean,
): string {
  const citationRule = includeSources
    ? "- When you use information from a source, cite it by its label, e.g. (Source 1)\n"
    : "";

  return (
    "Answer the question using only the context below.\n\n" +
    "Rules:\n" +
    "- Use only information found in the context; do not rely on outside knowledge\n" +
    "- If the context does not contain enough information to answer, say that you cannot answer " +
    "the question from the provided text\n" +
    citationRule +
    "- Be concise and direct\n\n" +
    `Context:\n${formatSources(chunks)}\n\n` +
    `Question: ${question}\n\n` +
    "Answer:"
  );
}

export function buildMultiAnswerPrompt(chunks: readonly TextChunk[], questions: readonly string[]): string {
  const numbered = questions.map((q, i) => `Q${i + 1}: ${q}`).join("\n");

  return (
    "Answer each of the questions below using only the context provided. " +
    "If the context does not contain the answer to a question, say so for that question.\n\n" +
    `Context:\n${formatSources(chunks)}\n\n` +
    `Questions:\n${numbered}\n\n` +
    "Respond with exactly one line per question in the form \"Qn: answer\", " +
    "using the same number as the question, and nothing else:"
  );
}
