import { InvalidInputError } from "../../errors.js";
import type { ChunkingStrategy } from "./types.js";
import { WordWindowChunker } from "./word-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new InvalidInputError(`Unknown chunking strategy: ${name}`, {
      available: [...registry.keys()],
    });
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new WordWindowChunker());

export { WordWindowChunker, chunkWords } from "./word-chunker.js";
export type { ChunkingStrategy, ChunkingOptions } from "./types.js";
