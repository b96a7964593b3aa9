import { InvalidInputError } from "../../errors.js";
import type { TextChunk } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

/**
 * Splits text on whitespace into windows of `chunkSize` words, each starting
 * `chunkSize - overlap` words after the previous one. The window that reaches the
 * last word closes the sequence, so consecutive chunks share exactly `overlap`
 * words and every word is covered.
 *
 * Text with no words at all comes back as a single chunk holding the original text.
 */
export function chunkWords(text: string, chunkSize: number, overlap: number): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new InvalidInputError(`chunk_size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidInputError(`chunk_overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidInputError(
      `chunk_overlap (${overlap}) must be less than chunk_size (${chunkSize}) to avoid infinite loops`,
    );
  }

  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const step = chunkSize - overlap;
  const chunks: string[] = [];

  for (let start = 0; start < words.length; start += step) {
    chunks.push(words.slice(start, start + chunkSize).join(" "));
    if (start + chunkSize >= words.length) break;
  }

  return chunks.length > 0 ? chunks : [text];
}

export class WordWindowChunker implements ChunkingStrategy {
  readonly name = "word-window";

  chunk(text: string, options: ChunkingOptions): TextChunk[] {
    return chunkWords(text, options.chunkSize, options.overlap).map((chunk, index) => ({
      index,
      text: chunk,
    }));
  }
}
