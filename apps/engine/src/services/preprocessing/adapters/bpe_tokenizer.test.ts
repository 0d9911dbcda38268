import { describe, it, expect } from "vitest";
import { BpeTokenizer, DEFAULT_ENCODING } from "./bpe_tokenizer.js";
import { WhitespaceTokenizer } from "./whitespace_tokenizer.js";

const E_ACUTE = String.fromCharCode(0x00e9);
const NIHON = String.fromCharCode(0x65e5, 0x672c);
const GRINNING_FACE = String.fromCodePoint(0x1f600);

describe("BpeTokenizer", () => {
  const tokenizer = new BpeTokenizer();

  it("should use cl100k_base by default", () => {
    expect(tokenizer.encodingName).toBe(DEFAULT_ENCODING);
    expect(DEFAULT_ENCODING).toBe("cl100k_base");
  });

  it("should attach the leading space to each word token", () => {
    expect(tokenizer.tokenize("hello world")).toEqual([
      { token: "hello", start: 0, end: 5 },
      { token: " world", start: 5, end: 11 },
    ]);
    expect(tokenizer.count("hello world")).toBe(2);
  });

  it("should tile text with multi-byte characters", () => {
    const text = `caf${E_ACUTE} ${NIHON} ${GRINNING_FACE}${GRINNING_FACE} done  `;
    const spans = tokenizer.tokenize(text);

    expect(spans).toHaveLength(tokenizer.count(text));
    expect(spans.map(s => s.token).join("")).toBe(text);
    expect(spans[0].start).toBe(0);
    expect(spans[spans.length - 1].end).toBe(text.length);
    for (let i = 1; i < spans.length; i++) {
      expect(spans[i].start).toBe(spans[i - 1].end);
    }
  });

  it("should count more model tokens than words for long words", () => {
    const text = Array.from({ length: 10 }, () => "zxqvbnmlkj").join(" ");

    expect(new WhitespaceTokenizer().count(text)).toBe(10);
    expect(tokenizer.count(text)).toBeGreaterThan(20);
  });

  it("should treat special-token markers as text", () => {
    const text = "before <|endoftext|> after";
    expect(tokenizer.tokenize(text).map(s => s.token).join("")).toBe(text);
  });

  it("should return nothing for empty text", () => {
    expect(tokenizer.count("")).toBe(0);
    expect(tokenizer.tokenize("")).toEqual([]);
  });
});
