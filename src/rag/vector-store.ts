import { EmbeddingServiceError, IndexEmptyError } from "../errors.js";
import type { SearchHit } from "./types.js";

export interface VectorIndex {
  search(queryVector: number[], k: number): SearchHit[];
  totalChunks: number;
  dimension: number;
}

/** Returns a unit-length copy; the zero vector stays zero. */
export function normalize(vector: readonly number[]): number[] {
  let sum = 0;
  for (const v of vector) sum += v * v;
  const norm = Math.sqrt(sum);
  if (norm === 0) return [...vector];
  return vector.map((v) => v / norm);
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  return dotProduct(normalize(a), normalize(b));
}

/**
 * Builds an exact inner-product index over L2-normalised copies of `vectors`.
 * Position `i` in the input is id `i` in search results.
 */
export function buildIndex(vectors: readonly (readonly number[])[]): VectorIndex {
  const first = vectors[0];
  const dimension = first ? first.length : 0;

  const stored = vectors.map((vector, i) => {
    if (vector.length !== dimension) {
      throw new EmbeddingServiceError(
        `Embedding ${i} has dimension ${vector.length}, expected ${dimension}`,
      );
    }
    return normalize(vector);
  });

  return {
    totalChunks: stored.length,
    dimension,
    search(queryVector: number[], k: number) {
      if (stored.length === 0) throw new IndexEmptyError();
      if (queryVector.length !== dimension) {
        throw new EmbeddingServiceError(
          `Query embedding has dimension ${queryVector.length}, index has ${dimension}`,
        );
      }

      const count = Math.min(Math.floor(k), stored.length);
      if (count <= 0) return [];

      const query = normalize(queryVector);
      const scored = stored.map((vector, id) => ({ id, score: dotProduct(query, vector) }));
      // Array.prototype.sort is stable, so equal scores keep insertion order.
      scored.sort((a, b) => b.score - a.score);
      return scored.slice(0, count);
    },
  };
}
