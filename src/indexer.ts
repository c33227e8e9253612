import { join } from "node:path";
import { buildIndexes, saveIndex, validateIndex } from "./assembler.js";
import type { BuildOptions, BuiltIndexes } from "./assembler.js";
import type { BlogRagConfig, BuildSummary, Page, ValidationResult } from "./types.js";

export interface BuildOverrides {
  chunkSize?: number;
  minChunkSize?: number;
}

export interface PersistResult {
  summary: BuildSummary;
  indexes: BuiltIndexes;
  validation: {
    chunked: ValidationResult;
    summary: ValidationResult;
  };
}

export function buildOptionsFromConfig(config: BlogRagConfig, overrides?: BuildOverrides): BuildOptions {
  return {
    author: config.author,
    category: config.category,
    chunkedIndexName: config.indexNameChunked,
    summaryIndexName: config.indexNameSummary,
    chunkSize: overrides?.chunkSize ?? config.chunkSize,
    minChunkSize: overrides?.minChunkSize ?? config.minChunkSize,
  };
}

/**
 * Builds, validates and writes both indexes. Invalid indexes are still
 * written; the caller decides what to do with the validation results.
 */
export function buildAndPersistIndexes(
  pages: Page[],
  config: BlogRagConfig,
  configDir: string,
  overrides?: BuildOverrides,
): PersistResult {
  const start = Date.now();

  const indexes = buildIndexes(pages, buildOptionsFromConfig(config, overrides));
  const validation = {
    chunked: validateIndex(indexes.chunked),
    summary: validateIndex(indexes.summary),
  };

  const chunkedBytes = saveIndex(indexes.chunked, join(configDir, config.outputChunked));
  const summaryBytes = saveIndex(indexes.summary, join(configDir, config.outputSummary));

  return {
    summary: {
      pages: pages.length,
      chunks: indexes.chunked.documents.length,
      summaries: indexes.summary.documents.length,
      chunkedBytes,
      summaryBytes,
      elapsedMs: Date.now() - start,
    },
    indexes,
    validation,
  };
}
