import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import type { BlogRagConfig } from "./types.js";

export const CONFIG_FILENAME = ".blograg.json";

export const DEFAULT_CONFIG: BlogRagConfig = {
  blogUrl: "https://blog.example.com/",
  author: "unknown",
  category: "general",
  chunkSize: 150,
  minChunkSize: 50,
  outputChunked: "rag_blog_chunked_index.json",
  outputSummary: "rag_blog_summary_index.json",
  indexNameChunked: "blog_chunked_index",
  indexNameSummary: "blog_summary_index",
  requestTimeoutMs: 10_000,
  delayMs: 1_000,
  engineUrl: "http://localhost:8000",
};

export interface ConfigResult {
  config: BlogRagConfig;
  configDir: string;
}

const STRING_KEYS = [
  "blogUrl",
  "author",
  "category",
  "outputChunked",
  "outputSummary",
  "indexNameChunked",
  "indexNameSummary",
  "engineUrl",
] as const;

const POSITIVE_KEYS = ["chunkSize", "minChunkSize", "requestTimeoutMs"] as const;

const URL_KEYS = ["blogUrl", "engineUrl"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(raw: Record<string, unknown>, key: (typeof STRING_KEYS)[number]): string {
  const value = raw[key];
  return typeof value === "string" ? value : DEFAULT_CONFIG[key];
}

function pickNumber(
  raw: Record<string, unknown>,
  key: (typeof POSITIVE_KEYS)[number] | "delayMs",
): number {
  const value = raw[key];
  return typeof value === "number" ? value : DEFAULT_CONFIG[key];
}

function mergeWithDefaults(raw: Record<string, unknown>): BlogRagConfig {
  return {
    blogUrl: pickString(raw, "blogUrl"),
    author: pickString(raw, "author"),
    category: pickString(raw, "category"),
    chunkSize: pickNumber(raw, "chunkSize"),
    minChunkSize: pickNumber(raw, "minChunkSize"),
    outputChunked: pickString(raw, "outputChunked"),
    outputSummary: pickString(raw, "outputSummary"),
    indexNameChunked: pickString(raw, "indexNameChunked"),
    indexNameSummary: pickString(raw, "indexNameSummary"),
    requestTimeoutMs: pickNumber(raw, "requestTimeoutMs"),
    delayMs: pickNumber(raw, "delayMs"),
    engineUrl: pickString(raw, "engineUrl"),
  };
}

export function loadConfig(cwd?: string): ConfigResult {
  const startDir = resolve(cwd ?? process.cwd());
  let dir = startDir;

  while (true) {
    const configPath = join(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
      const errors = validateConfig(raw);
      if (errors.length > 0 || !isRecord(raw)) {
        throw new Error(`Invalid ${CONFIG_FILENAME}: ${errors.join("; ")}`);
      }
      return {
        config: mergeWithDefaults(raw),
        configDir: dir,
      };
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { config: { ...DEFAULT_CONFIG }, configDir: startDir };
}

export function validateConfig(raw: unknown): string[] {
  if (!isRecord(raw)) {
    return ["Config must be a JSON object"];
  }

  const errors: string[] = [];

  for (const key of STRING_KEYS) {
    if (raw[key] !== undefined && typeof raw[key] !== "string") {
      errors.push(`"${key}" must be a string`);
    }
  }

  for (const key of URL_KEYS) {
    const value = raw[key];
    if (typeof value === "string" && !URL.canParse(value)) {
      errors.push(`"${key}" must be a valid URL`);
    }
  }

  for (const key of POSITIVE_KEYS) {
    const value = raw[key];
    if (value !== undefined && (typeof value !== "number" || value <= 0)) {
      errors.push(`"${key}" must be a positive number`);
    }
  }

  if (raw.delayMs !== undefined) {
    if (typeof raw.delayMs !== "number" || raw.delayMs < 0) {
      errors.push('"delayMs" must be a non-negative number');
    }
  }

  return errors;
}

export function initConfig(configDir: string): void {
  const configPath = join(configDir, CONFIG_FILENAME);
  if (existsSync(configPath)) {
    throw new Error(`${CONFIG_FILENAME} already exists in ${configDir}`);
  }
  writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");
}
