import { IndexEmptyError } from "../errors.js";
import type { Embedder } from "./embedding-service.js";
import type { TextChunk } from "./types.js";
import type { VectorIndex } from "./vector-store.js";

export async function retrieve(
  query: string,
  chunks: readonly TextChunk[],
  embedder: Embedder,
  index: VectorIndex,
  topK: number,
  signal?: AbortSignal,
): Promise<TextChunk[]> {
  if (index.totalChunks === 0) throw new IndexEmptyError();

  const queryVector = await embedder.embedQuery(query, { signal });
  const results = index.search(queryVector, topK);

  const seen = new Set<number>();
  const retrieved: TextChunk[] = [];
  for (const r of results) {
    const chunk = chunks[r.id];
    if (!chunk || seen.has(r.id)) continue;
    seen.add(r.id);
    retrieved.push(chunk);
  }
  return retrieved;
}
