import { describe, it, expect } from "vitest";
import { InvalidInputError } from "../../errors.js";
import { chunkWords, getChunkingStrategy, WordWindowChunker } from "../chunking/index.js";
import { numberedWords } from "../../__tests__/helpers.js";

describe("chunkWords", () => {
  it("should split 620 words into three windows of 300 with 50 overlap", () => {
    const chunks = chunkWords(numberedWords(620), 300, 50);

    expect(chunks).toHaveLength(3);
    const words = chunks.map((c) => c.split(" "));
    expect(words[0]).toHaveLength(300);
    expect(words[0]?.[0]).toBe("word0");
    expect(words[0]?.[299]).toBe("word299");
    expect(words[1]?.[0]).toBe("word250");
    expect(words[1]?.[299]).toBe("word549");
    expect(words[2]).toHaveLength(120);
    expect(words[2]?.[0]).toBe("word500");
    expect(words[2]?.[119]).toBe("word619");
  });

  it("should produce ceil((w - c) / (c - o)) + 1 chunks when w > c", () => {
    const cases: Array<[number, number, number]> = [
      [301, 300, 50],
      [550, 300, 50],
      [551, 300, 50],
      [1000, 100, 0],
      [1001, 100, 0],
      [777, 50, 49],
      [120, 60, 20],
    ];

    for (const [w, c, o] of cases) {
      const expected = Math.ceil((w - c) / (c - o)) + 1;
      expect(chunkWords(numberedWords(w), c, o), `w=${w} c=${c} o=${o}`).toHaveLength(expected);
    }
  });

  it("should cover every word with exactly `overlap` words shared between neighbours", () => {
    const w = 433;
    const c = 80;
    const o = 15;
    const chunks = chunkWords(numberedWords(w), c, o).map((chunk) => chunk.split(" "));

    for (let i = 1; i < chunks.length; i++) {
      const prev = chunks[i - 1] ?? [];
      const next = chunks[i] ?? [];
      expect(next.slice(0, o)).toEqual(prev.slice(prev.length - o));
    }

    const covered = new Set(chunks.flat());
    expect(covered.size).toBe(w);
    expect(chunks.at(-1)?.at(-1)).toBe(`word${w - 1}`);
  });

  it("should return one chunk when the text is no longer than a chunk", () => {
    expect(chunkWords(numberedWords(300), 300, 50)).toEqual([numberedWords(300)]);
    expect(chunkWords("just  a\nfew\twords", 50, 10)).toEqual(["just a few words"]);
  });

  it("should return the original text when it has no words", () => {
    expect(chunkWords("", 50, 0)).toEqual([""]);
    expect(chunkWords("   \n ", 50, 0)).toEqual(["   \n "]);
  });

  it("should reject overlap >= chunk size before doing any work", () => {
    expect(() => chunkWords(numberedWords(10), 50, 50)).toThrow(InvalidInputError);
    expect(() => chunkWords(numberedWords(10), 50, 80)).toThrow(
      "chunk_overlap (80) must be less than chunk_size (50) to avoid infinite loops",
    );
  });

  it("should reject non-integer or negative sizes", () => {
    expect(() => chunkWords("a b c", 0, 0)).toThrow(InvalidInputError);
    expect(() => chunkWords("a b c", 10.5, 0)).toThrow(InvalidInputError);
    expect(() => chunkWords("a b c", 10, -1)).toThrow(InvalidInputError);
  });
});

describe("chunking strategy registry", () => {
  it("should resolve the word-window strategy and number its chunks", () => {
    const strategy = getChunkingStrategy("word-window");
    expect(strategy).toBeInstanceOf(WordWindowChunker);

    const chunks = strategy.chunk(numberedWords(150), { chunkSize: 100, overlap: 0 });
    expect(chunks.map((c) => c.index)).toEqual([0, 1]);
    expect(chunks[1]?.text.split(" ")[0]).toBe("word100");
  });

  it("should reject unknown strategies", () => {
    expect(() => getChunkingStrategy("sentence")).toThrow("Unknown chunking strategy: sentence");
  });
});
