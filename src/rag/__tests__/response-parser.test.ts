import { describe, it, expect } from "vitest";
import { GenerationEmptyError } from "../../errors.js";
import {
  extractCitations,
  parseAnswer,
  parseMultiAnswers,
  parseQuestions,
  previewText,
} from "../response-parser.js";
import type { TextChunk } from "../types.js";

function chunks(...texts: string[]): TextChunk[] {
  return texts.map((text, index) => ({ index, text }));
}

describe("parseQuestions", () => {
  it("should strip numbering and drop lines without a question mark", () => {
    expect(parseQuestions("1. What is X?\n2. Not a question.\nWhy?\n", 5)).toEqual(["What is X?", "Why?"]);
  });

  it("should strip bullets and parenthesised numbering", () => {
    const output = "- How does chunking work?\n3) Is it (really) deterministic?\n  10. Which index is used?";
    expect(parseQuestions(output, 5)).toEqual([
      "How does chunking work?",
      "Is it (really) deterministic?",
      "Which index is used?",
    ]);
  });

  it("should drop short fragments that are not whole questions", () => {
    const output = "? see 2\nWhat does the overlap control?";
    expect(parseQuestions(output, 5)).toEqual(["What does the overlap control?"]);
  });

  it("should keep a short question only when a word precedes the question mark", () => {
    expect(parseQuestions("X?\n- a?\nHow?\nWhy?", 5)).toEqual(["How?", "Why?"]);
  });

  it("should keep at most the requested number of questions", () => {
    const output = "What is one?\nWhat is two?\nWhat is three?\nWhat is four?";
    expect(parseQuestions(output, 2)).toEqual(["What is one?", "What is two?"]);
  });

  it("should handle CRLF output", () => {
    expect(parseQuestions("1. Where is it stored?\r\n2. Who reads it?\r\n", 5)).toEqual([
      "Where is it stored?",
      "Who reads it?",
    ]);
  });

  it("should fail when nothing survives filtering", () => {
    expect(() => parseQuestions("Here are some thoughts.\nNo questions at all.", 3)).toThrow(GenerationEmptyError);
    expect(() => parseQuestions("", 3)).toThrow(
      "No questions were generated. Please try again or provide different text.",
    );
  });
});

describe("parseAnswer", () => {
  it("should trim surrounding whitespace", () => {
    expect(parseAnswer("\n  The answer is 42.  \n")).toBe("The answer is 42.");
  });

  it("should fail on an empty answer", () => {
    expect(() => parseAnswer("   \n")).toThrow(GenerationEmptyError);
  });
});

describe("previewText", () => {
  it("should leave short text unchanged", () => {
    expect(previewText("short")).toBe("short");
    expect(previewText("x".repeat(200))).toBe("x".repeat(200));
  });

  it("should cut long text at 200 characters and mark the cut", () => {
    expect(previewText("y".repeat(201))).toBe(`${"y".repeat(200)}...`);
  });
});

describe("extractCitations", () => {
  it("should cite only the sources the answer names", () => {
    const citations = extractCitations(
      "According to Source 2, X happens.",
      chunks("first chunk", "second chunk"),
    );
    expect(citations).toEqual([{ source_id: 2, text: "second chunk" }]);
  });

  it("should list several citations in source order", () => {
    const citations = extractCitations(
      "Source 3 says so, and (Source 1) agrees.",
      chunks("one", "two", "three"),
    );
    expect(citations.map((c) => c.source_id)).toEqual([1, 3]);
  });

  it("should not read Source 12 as Source 1", () => {
    const context = chunks(...Array.from({ length: 12 }, (_, i) => `chunk ${i + 1}`));
    const citations = extractCitations("See Source 12.", context);
    expect(citations).toEqual([{ source_id: 12, text: "chunk 12" }]);
  });

  it("should ignore labels beyond the supplied context", () => {
    expect(extractCitations("Source 5 claims it.", chunks("a", "b"))).toEqual([]);
  });

  it("should truncate long chunk text in citations", () => {
    const long = "z".repeat(250);
    expect(extractCitations("Source 1", chunks(long))).toEqual([
      { source_id: 1, text: `${"z".repeat(200)}...` },
    ]);
  });
});

describe("parseMultiAnswers", () => {
  it("should read Qn lines in question order and skip everything else", () => {
    const output = [
      "Here are the answers:",
      "Q1: Alpha comes first.",
      "Q3: Gamma comes third.",
      "  Q2: Beta comes second.",
      "Q9: out of range",
      "Q1: a duplicate",
    ].join("\n");

    expect(parseMultiAnswers(output, 3)).toEqual([
      { index: 0, answer: "Alpha comes first." },
      { index: 1, answer: "Beta comes second." },
      { index: 2, answer: "Gamma comes third." },
    ]);
  });

  it("should return fewer answers than questions without failing", () => {
    expect(parseMultiAnswers("Q2: Only the second.", 3)).toEqual([{ index: 1, answer: "Only the second." }]);
  });

  it("should read CRLF-terminated lines", () => {
    expect(parseMultiAnswers("Q1: Alpha.\r\nQ2: Beta.\r\n", 2)).toEqual([
      { index: 0, answer: "Alpha." },
      { index: 1, answer: "Beta." },
    ]);
  });

  it("should fail when no line matches", () => {
    expect(() => parseMultiAnswers("1. Alpha\n2. Beta", 2)).toThrow(GenerationEmptyError);
  });
});
