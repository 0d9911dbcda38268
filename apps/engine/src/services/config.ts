/**
 * Pipeline configuration
 *
 * Defaults, schema parsing, and loading from the environment. Values from
 * process env win over those read from a .env file; keys set in neither
 * keep their defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { parse } from "dotenv";
import {
  DEFAULT_QUESTION_WORDS,
  PipelineConfigSchema,
  type DomainKeywords,
  type PipelineConfig,
} from "../schemas/index.js";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_DOMAIN_KEYWORDS: DomainKeywords = {
  finance: ["refund", "payment", "pricing", "invoice"],
  account: ["login", "password", "account", "signup"],
  policy: ["policy", "terms", "conditions", "privacy"],
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  minWords: 3,
  tokenLimit: 512,
  chunkOverlap: 50,
  domainKeywords: DEFAULT_DOMAIN_KEYWORDS,
  questionWords: DEFAULT_QUESTION_WORDS,
};

export const CONFIG_ENV_KEYS = {
  minWords: "RULEPIPE_MIN_WORDS",
  tokenLimit: "RULEPIPE_TOKEN_LIMIT",
  chunkOverlap: "RULEPIPE_CHUNK_OVERLAP",
  domainKeywords: "RULEPIPE_DOMAIN_KEYWORDS",
  questionWords: "RULEPIPE_QUESTION_WORDS",
} as const;

/**
 * Validate a config object, applying schema defaults.
 * Throws ConfigurationError listing every issue.
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid pipeline config: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Path to a .env file */
  envFile?: string;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
}

function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    console.warn(`[Config] Env file not found: ${path}`);
    return {};
  }
  return parse(readFileSync(path, "utf-8"));
}

function parseInteger(key: string, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${key} must be an integer (got "${value}")`, [
      `${key}: expected integer`,
    ]);
  }
  return Number(trimmed);
}

function parseJson(key: string, value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${key} is not valid JSON: ${reason}`, [`${key}: invalid JSON`]);
  }
}

/**
 * Build a pipeline config from env variables over the defaults
 */
export function loadPipelineConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const fileValues: Record<string, string> = options.envFile ? readEnvFile(options.envFile) : {};
  const read = (key: string): string | undefined => env[key] ?? fileValues[key];

  const input: Record<string, unknown> = { ...DEFAULT_PIPELINE_CONFIG };

  const minWords = read(CONFIG_ENV_KEYS.minWords);
  if (minWords !== undefined) input.minWords = parseInteger(CONFIG_ENV_KEYS.minWords, minWords);

  const tokenLimit = read(CONFIG_ENV_KEYS.tokenLimit);
  if (tokenLimit !== undefined) {
    input.tokenLimit = parseInteger(CONFIG_ENV_KEYS.tokenLimit, tokenLimit);
  }

  const chunkOverlap = read(CONFIG_ENV_KEYS.chunkOverlap);
  if (chunkOverlap !== undefined) {
    input.chunkOverlap = parseInteger(CONFIG_ENV_KEYS.chunkOverlap, chunkOverlap);
  }

  const domainKeywords = read(CONFIG_ENV_KEYS.domainKeywords);
  if (domainKeywords !== undefined) {
    input.domainKeywords = parseJson(CONFIG_ENV_KEYS.domainKeywords, domainKeywords);
  }

  const questionWords = read(CONFIG_ENV_KEYS.questionWords);
  if (questionWords !== undefined) {
    input.questionWords = questionWords
      .split(",")
      .map(word => word.trim())
      .filter(word => word.length > 0);
  }

  return parsePipelineConfig(input);
}
