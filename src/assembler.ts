import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { chunkContent, countWords } from "./chunker.js";
import { summarize } from "./summarizer.js";
import { assertPage } from "./pages.js";
import type {
  BaseMetadata,
  ChunkedIndex,
  Page,
  RagDocument,
  ChunkMetadata,
  SummaryIndex,
  SummaryMetadata,
  ValidationResult,
} from "./types.js";

export interface BuildOptions {
  author: string;
  category: string;
  chunkedIndexName: string;
  summaryIndexName: string;
  chunkSize: number;
  minChunkSize: number;
}

export interface BuiltIndexes {
  chunked: ChunkedIndex;
  summary: SummaryIndex;
}

const MIN_DOCUMENT_WORDS = 50;
const REQUIRED_METADATA = ["author", "category", "url", "title"] as const;

function baseMetadata(page: Page, options: BuildOptions): BaseMetadata {
  return {
    author: options.author,
    category: options.category,
    url: page.url,
    title: page.title,
  };
}

export function chunkPage(page: Page, options: BuildOptions): RagDocument<ChunkMetadata>[] {
  const chunks = chunkContent(page.content, {
    chunkSize: options.chunkSize,
    minChunkSize: options.minChunkSize,
  });
  return chunks.map((chunk) => ({
    text: chunk.text,
    metadata: {
      ...baseMetadata(page, options),
      section: `Part ${chunk.sectionNumber} of ${chunks.length}`,
      word_count: chunk.wordCount,
    },
  }));
}

export function summarizePage(page: Page, options: BuildOptions): RagDocument<SummaryMetadata> {
  return {
    text: summarize(page.title, page.content),
    metadata: {
      ...baseMetadata(page, options),
      type: "summary",
    },
  };
}

export function buildIndexes(pages: readonly unknown[], options: BuildOptions): BuiltIndexes {
  // Shape-check everything up front so a bad record never yields a partial index
  const checked = pages.map((page, i) => assertPage(page, i));

  return {
    chunked: {
      index_name: options.chunkedIndexName,
      documents: checked.flatMap((page) => chunkPage(page, options)),
    },
    summary: {
      index_name: options.summaryIndexName,
      documents: checked.map((page) => summarizePage(page, options)),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateIndex(index: unknown): ValidationResult {
  if (!isRecord(index)) {
    return { valid: false, issues: ["Index must be a JSON object"] };
  }

  const documents = index.documents;
  if (!Array.isArray(documents) || documents.length === 0) {
    return { valid: false, issues: ["No documents in index"] };
  }

  const issues: string[] = [];

  documents.forEach((doc: unknown, i) => {
    const record: Record<string, unknown> = isRecord(doc) ? doc : {};

    if (typeof record.text !== "string") {
      issues.push(`Document ${i}: Missing 'text' field`);
    } else {
      const words = countWords(record.text);
      if (words < MIN_DOCUMENT_WORDS) {
        issues.push(`Document ${i}: Text too short (${words} words)`);
      }
    }

    const metadata = record.metadata;
    if (!isRecord(metadata)) {
      issues.push(`Document ${i}: Missing 'metadata' field`);
      return;
    }
    for (const field of REQUIRED_METADATA) {
      if (!(field in metadata)) {
        issues.push(`Document ${i}: Missing metadata field '${field}'`);
      }
    }
  });

  return { valid: issues.length === 0, issues };
}

export function saveIndex(index: ChunkedIndex | SummaryIndex, indexPath: string): number {
  const serialized = JSON.stringify(index, null, 2) + "\n";
  writeFileSync(indexPath, serialized, "utf-8");
  return Buffer.byteLength(serialized, "utf-8");
}

export function loadIndexFile(indexPath: string): unknown {
  if (!existsSync(indexPath)) {
    throw new Error(`Index file not found: ${indexPath}`);
  }
  const parsed: unknown = JSON.parse(readFileSync(indexPath, "utf-8"));
  return parsed;
}
