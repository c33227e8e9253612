#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { resolve } from "node:path";
import { createRequire } from "node:module";
import { loadConfig, initConfig, CONFIG_FILENAME } from "./config.js";
import { crawlBlog } from "./crawl.js";
import { loadPages, savePages } from "./pages.js";
import { buildAndPersistIndexes } from "./indexer.js";
import { loadIndexFile, validateIndex } from "./assembler.js";
import { pushIndex } from "./engine.js";
import type { BlogRagConfig, BuildSummary, CrawlResult, Page, ValidationResult } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json");

const MAX_LISTED_ISSUES = 10;

const program = new Command();

program
  .name("blograg")
  .description("Crawl a blog and build chunked and summary RAG indexes")
  .version(version);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (isNaN(n) || n < 1) {
    throw new InvalidArgumentError(`Invalid value "${value}". Must be a positive integer.`);
  }
  return n;
}

program
  .command("init")
  .description(`Create a ${CONFIG_FILENAME} config file with defaults`)
  .action(() => {
    try {
      initConfig(process.cwd());
      console.log(`Created ${CONFIG_FILENAME} with default configuration.`);
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }
  });

program
  .command("crawl")
  .description("Fetch every post listed on the blog and save the extracted pages")
  .option("-o, --out <file>", "pages output file", "pages.json")
  .action(async (opts: { out: string }) => {
    try {
      const { config } = loadConfig();
      const result = await crawl(config);
      const outPath = resolve(opts.out);
      savePages(result.pages, outPath);
      console.log(`Saved ${result.pages.length} pages → ${opts.out}`);
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }
  });

interface BuildOpts {
  pages?: string;
  chunkSize?: number;
  minChunkSize?: number;
}

program
  .command("build")
  .description("Build the chunked and summary indexes")
  .option("--pages <file>", "build from a saved pages file instead of crawling")
  .option("--chunk-size <words>", "target words per chunk", parsePositiveInt)
  .option("--min-chunk-size <words>", "minimum words for the trailing chunk", parsePositiveInt)
  .action(async (opts: BuildOpts) => {
    try {
      const { config, configDir } = loadConfig();

      let pages: Page[];
      if (opts.pages) {
        pages = loadPages(resolve(opts.pages));
        console.log(`Loaded ${pages.length} pages from ${opts.pages}`);
      } else {
        pages = (await crawl(config)).pages;
      }

      const { summary, validation } = buildAndPersistIndexes(pages, config, configDir, {
        chunkSize: opts.chunkSize,
        minChunkSize: opts.minChunkSize,
      });

      printValidation(config.indexNameChunked, validation.chunked);
      printValidation(config.indexNameSummary, validation.summary);
      if (!validation.chunked.valid || !validation.summary.valid) {
        console.log("One or more indexes have validation issues but were saved anyway.");
      }

      printBuildSummary(summary, config);
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }
  });

program
  .command("validate <file>")
  .description("Check a saved index file for missing fields and short documents")
  .action((file: string) => {
    try {
      const result = validateIndex(loadIndexFile(resolve(file)));
      printValidation(file, result);
      if (!result.valid) {
        process.exit(1);
      }
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }
  });

program
  .command("push <file>")
  .description("Send a saved index file to the indexing service")
  .option("--engine <url>", "indexing service base URL")
  .action(async (file: string, opts: { engine?: string }) => {
    try {
      const { config } = loadConfig();
      const engineUrl = opts.engine ?? config.engineUrl;
      const response = await pushIndex(resolve(file), engineUrl);
      console.log(`Pushed ${file} → ${engineUrl}`);
      console.log(JSON.stringify(response, null, 2));
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }
  });

async function crawl(config: BlogRagConfig): Promise<CrawlResult> {
  console.log(`Crawling ${config.blogUrl}`);
  const result = await crawlBlog(config.blogUrl, {
    timeoutMs: config.requestTimeoutMs,
    delayMs: config.delayMs,
  });
  const failed = result.failures.length;
  console.log(`Fetched ${result.pages.length} posts${failed > 0 ? ` (${failed} failed)` : ""}`);
  return result;
}

function printValidation(label: string, result: ValidationResult) {
  if (result.valid) {
    console.log(`${label}: Index validation passed!`);
    return;
  }
  console.log(`${label}: Found ${result.issues.length} issue${result.issues.length !== 1 ? "s" : ""}:`);
  for (const issue of result.issues.slice(0, MAX_LISTED_ISSUES)) {
    console.log(`  - ${issue}`);
  }
  if (result.issues.length > MAX_LISTED_ISSUES) {
    console.log(`  ... and ${result.issues.length - MAX_LISTED_ISSUES} more`);
  }
}

function printBuildSummary(summary: BuildSummary, config: BlogRagConfig) {
  console.log(`Built ${summary.chunks} chunks and ${summary.summaries} summaries from ${summary.pages} pages`);
  console.log(`${config.outputChunked} (${(summary.chunkedBytes / 1024).toFixed(1)} KB)`);
  console.log(`${config.outputSummary} (${(summary.summaryBytes / 1024).toFixed(1)} KB)`);
  console.log(`Done in ${summary.elapsedMs}ms`);
}

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
