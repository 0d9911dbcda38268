import { describe, it, expect } from "vitest";
import { chunkTokens, mergeChunks, validateChunkOptions } from "./chunker.js";
import { InvalidChunkConfigError } from "../../errors.js";
import { BpeTokenizer } from "../adapters/bpe_tokenizer.js";
import { WhitespaceTokenizer } from "../adapters/whitespace_tokenizer.js";

const wordTokenizer = new WhitespaceTokenizer();

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(" ");
}

describe("chunkTokens", () => {
  it("should split into overlapping windows", () => {
    const text = "word1 word2 word3 word4 word5 word6";
    const chunks = chunkTokens(text, 4, 2, wordTokenizer).toArray();

    expect(chunks).toEqual([
      {
        index: 0,
        text: "word1 word2 word3 word4",
        startToken: 0,
        endToken: 4,
        startOffset: 0,
        endOffset: 23,
      },
      {
        index: 1,
        text: " word3 word4 word5 word6",
        startToken: 2,
        endToken: 6,
        startOffset: 11,
        endOffset: 35,
      },
    ]);
  });

  it("should return the whole text when within the limit", () => {
    const chunks = chunkTokens("a b c", 3, 1, wordTokenizer).toArray();

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe("a b c");
  });

  it("should keep surrounding whitespace of a single chunk", () => {
    const [chunk] = chunkTokens("  a b ", 5, 0, wordTokenizer).toArray();

    expect(chunk.text).toBe("  a b ");
    expect(chunk.startOffset).toBe(0);
    expect(chunk.endOffset).toBe(6);
  });

  it("should yield nothing for empty text", () => {
    expect(chunkTokens("", 4, 1, wordTokenizer).toArray()).toEqual([]);
  });

  it("should return whitespace-only text as a single chunk", () => {
    const chunks = chunkTokens("   ", 4, 1, wordTokenizer).toArray();

    expect(chunks).toEqual([
      { index: 0, text: "   ", startToken: 0, endToken: 0, startOffset: 0, endOffset: 3 },
    ]);
    expect(mergeChunks(chunks)).toBe("   ");
  });

  it("should respect the limit and share exactly the overlap", () => {
    const chunks = chunkTokens(words(10), 4, 1, wordTokenizer).toArray();

    expect(chunks.map(c => [c.startToken, c.endToken])).toEqual([
      [0, 4],
      [3, 7],
      [6, 10],
    ]);
    for (const chunk of chunks) {
      expect(chunk.endToken - chunk.startToken).toBeLessThanOrEqual(4);
    }
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i - 1].endToken - chunks[i].startToken).toBe(1);
    }
  });

  it("should emit a short final window once", () => {
    const chunks = chunkTokens(words(9), 4, 1, wordTokenizer).toArray();

    expect(chunks.map(c => [c.startToken, c.endToken])).toEqual([
      [0, 4],
      [3, 7],
      [6, 9],
    ]);
    expect(chunks[2].text).toBe(" w6 w7 w8");
  });

  it("should not overlap when overlap is zero", () => {
    const chunks = chunkTokens(words(6), 3, 0, wordTokenizer).toArray();
    expect(chunks.map(c => c.text)).toEqual(["w0 w1 w2", " w3 w4 w5"]);
  });

  it("should restart on every iteration", () => {
    const sequence = chunkTokens(words(7), 3, 1, wordTokenizer);

    expect(sequence.tokenCount).toBe(7);
    expect([...sequence]).toEqual([...sequence]);
    expect(sequence.toArray()).toHaveLength(3);
  });

  it("should reject invalid options eagerly", () => {
    expect(() => chunkTokens("x", 0, 0, wordTokenizer)).toThrow(InvalidChunkConfigError);
    expect(() => chunkTokens("x", 4, 4, wordTokenizer)).toThrow(
      "overlap (4) must be an integer in [0, 4)"
    );
    expect(() => chunkTokens("x", 4, -1, wordTokenizer)).toThrow(InvalidChunkConfigError);
    expect(() => chunkTokens("x", 2.5, 0, wordTokenizer)).toThrow(
      "tokenLimit must be a positive integer (got 2.5)"
    );
  });
});

describe("chunkTokens with the default model tokenizer", () => {
  const bpe = new BpeTokenizer();
  const text = Array.from({ length: 10 }, () => "zxqvbnmlkj").join(" ");

  it("should measure the limit in model tokens", () => {
    const sequence = chunkTokens(text, 12, 2);
    const chunks = sequence.toArray();

    expect(sequence.tokenCount).toBe(bpe.count(text));
    expect(sequence.tokenCount).toBeGreaterThan(20);
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.endToken - chunk.startToken).toBeLessThanOrEqual(12);
      expect(text.slice(chunk.startOffset, chunk.endOffset)).toBe(chunk.text);
    }
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i - 1].endToken - chunks[i].startToken).toBe(2);
    }
  });

  it("should reconstruct the text from chunks", () => {
    expect(mergeChunks(chunkTokens(text, 12, 2))).toBe(text);
  });
});

describe("validateChunkOptions", () => {
  it("should accept overlap just below the limit", () => {
    expect(() => validateChunkOptions({ tokenLimit: 4, overlap: 3 })).not.toThrow();
  });
});

describe("mergeChunks", () => {
  it("should reconstruct the chunked text", () => {
    const text = "word1 word2 word3 word4 word5 word6";
    expect(mergeChunks(chunkTokens(text, 4, 2, wordTokenizer))).toBe(text);
  });

  it("should reconstruct irregular whitespace", () => {
    const text = " alpha  beta\tgamma\n\ndelta epsilon zeta eta ";
    expect(mergeChunks(chunkTokens(text, 3, 2, wordTokenizer))).toBe(text);
  });

  it("should return an empty string for no chunks", () => {
    expect(mergeChunks([])).toBe("");
  });
});
