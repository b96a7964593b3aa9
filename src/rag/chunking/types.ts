import type { TextChunk } from "../types.js";

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(text: string, options: ChunkingOptions): TextChunk[];
}
