import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfig,
  parsePipelineConfig,
} from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("parsePipelineConfig", () => {
  it("should apply schema defaults", () => {
    const config = parsePipelineConfig({
      tokenLimit: 10,
      chunkOverlap: 2,
      domainKeywords: { billing: ["invoice"] },
    });

    expect(config.minWords).toBe(3);
    expect(config.questionWords).toEqual(["who", "what", "when", "where", "why", "how"]);
  });

  it("should list every issue", () => {
    try {
      parsePipelineConfig({ tokenLimit: -1, chunkOverlap: 1.5, domainKeywords: { a: [] } });
      expect.unreachable("config should be rejected");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map(issue => issue.split(":")[0])).toEqual([
          "tokenLimit",
          "chunkOverlap",
          "domainKeywords.a",
        ]);
      }
    }
  });
});

describe("loadPipelineConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "rulepipe-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should return the defaults for an empty environment", () => {
    expect(loadPipelineConfig({ env: {} })).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it("should read values from the environment", () => {
    const config = loadPipelineConfig({
      env: {
        RULEPIPE_TOKEN_LIMIT: "128",
        RULEPIPE_CHUNK_OVERLAP: " 16 ",
        RULEPIPE_QUESTION_WORDS: "who, can ,",
        RULEPIPE_DOMAIN_KEYWORDS: '{"billing":["invoice","charge"]}',
      },
    });

    expect(config.tokenLimit).toBe(128);
    expect(config.chunkOverlap).toBe(16);
    expect(config.questionWords).toEqual(["who", "can"]);
    expect(config.domainKeywords).toEqual({ billing: ["invoice", "charge"] });
    expect(config.minWords).toBe(3);
  });

  it("should prefer the environment over the env file", () => {
    const envFile = join(dir, ".env");
    writeFileSync(envFile, "RULEPIPE_MIN_WORDS=5\nRULEPIPE_CHUNK_OVERLAP=10\n");

    const config = loadPipelineConfig({ envFile, env: { RULEPIPE_MIN_WORDS: "7" } });

    expect(config.minWords).toBe(7);
    expect(config.chunkOverlap).toBe(10);
  });

  it("should warn about a missing env file", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const envFile = join(dir, "missing.env");

    expect(loadPipelineConfig({ envFile, env: {} })).toEqual(DEFAULT_PIPELINE_CONFIG);
    expect(warnSpy).toHaveBeenCalledWith(`[Config] Env file not found: ${envFile}`);
  });

  it("should reject non-integer numbers", () => {
    expect(() => loadPipelineConfig({ env: { RULEPIPE_TOKEN_LIMIT: "abc" } })).toThrow(
      'RULEPIPE_TOKEN_LIMIT must be an integer (got "abc")'
    );
  });

  it("should reject values the schema refuses", () => {
    expect(() => loadPipelineConfig({ env: { RULEPIPE_TOKEN_LIMIT: "0" } })).toThrow(
      ConfigurationError
    );
  });

  it("should reject malformed keyword JSON", () => {
    expect(() => loadPipelineConfig({ env: { RULEPIPE_DOMAIN_KEYWORDS: "{billing" } })).toThrow(
      ConfigurationError
    );
  });
});
