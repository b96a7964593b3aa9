import { pino } from "pino";
import { vi } from "vitest";
import type { Embedder, EmbedOptions } from "../rag/embedding-service.js";
import type { LanguageModel } from "../rag/language-model.js";

export const silentLogger = pino({ level: "silent" });

export const VOCABULARY = ["alpha", "beta", "gamma"] as const;

/** Bag-of-words over VOCABULARY plus a constant bias term, so no vector is zero. */
export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().split(/[^a-z0-9]+/);
  return [...VOCABULARY.map((term) => words.filter((w) => w === term).length), 1];
}

export class KeywordEmbedder implements Embedder {
  readonly model = "keyword-test";
  readonly embedCalls: string[][] = [];
  readonly queryCalls: string[] = [];

  async embed(texts: string[], _options?: EmbedOptions): Promise<number[][]> {
    this.embedCalls.push(texts);
    return texts.map(keywordVector);
  }

  async embedQuery(query: string, _options?: EmbedOptions): Promise<number[]> {
    this.queryCalls.push(query);
    return keywordVector(query);
  }
}

export function fakeModel(output: string | Error) {
  const invoke = vi.fn(async (_prompt: string): Promise<string> => {
    if (output instanceof Error) throw output;
    return output;
  });
  const model: LanguageModel = { provider: "fake", model: "fake-1", invoke };
  return { model, invoke };
}

/** "word0 word1 ... word{n-1}" */
export function numberedWords(n: number): string {
  return Array.from({ length: n }, (_, i) => `word${i}`).join(" ");
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
