import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { buildIndexes, validateIndex, saveIndex, loadIndexFile } from "../src/assembler.js";
import type { BuildOptions } from "../src/assembler.js";
import { PageShapeError } from "../src/pages.js";
import type { Page } from "../src/types.js";

function para(wordCount: number, prefix: string): string {
  return Array.from({ length: wordCount }, (_, i) => `${prefix}${i}`).join(" ");
}

const options: BuildOptions = {
  author: "Test Author",
  category: "container",
  chunkedIndexName: "test_chunked",
  summaryIndexName: "test_summary",
  chunkSize: 150,
  minChunkSize: 50,
};

const pageA: Page = {
  title: "Istio on AKS",
  url: "https://blog.example.com/istio-on-aks",
  content: [para(80, "a"), para(80, "b")].join("\n\n"),
};

const pageB: Page = {
  title: "Short Note",
  url: "https://blog.example.com/short-note",
  content: para(60, "c"),
};

describe("buildIndexes", () => {
  it("returns two empty indexes for no pages", () => {
    expect(buildIndexes([], options)).toEqual({
      chunked: { index_name: "test_chunked", documents: [] },
      summary: { index_name: "test_summary", documents: [] },
    });
  });

  it("wraps chunks with section labels and word counts", () => {
    const { chunked } = buildIndexes([pageA], options);
    expect(chunked.index_name).toBe("test_chunked");
    expect(chunked.documents.map((d) => d.metadata)).toEqual([
      {
        author: "Test Author",
        category: "container",
        url: pageA.url,
        title: pageA.title,
        section: "Part 1 of 2",
        word_count: 80,
      },
      {
        author: "Test Author",
        category: "container",
        url: pageA.url,
        title: pageA.title,
        section: "Part 2 of 2",
        word_count: 160,
      },
    ]);
    expect(chunked.documents[0].text).toBe(para(80, "a"));
  });

  it("preserves page order and chunk order", () => {
    const { chunked, summary } = buildIndexes([pageA, pageB], options);
    expect(chunked.documents.map((d) => [d.metadata.url, d.metadata.section])).toEqual([
      [pageA.url, "Part 1 of 2"],
      [pageA.url, "Part 2 of 2"],
      [pageB.url, "Part 1 of 1"],
    ]);
    expect(summary.documents.map((d) => d.metadata.url)).toEqual([pageA.url, pageB.url]);
  });

  it("creates one summary document per page", () => {
    const { summary } = buildIndexes([pageB], options);
    expect(summary).toEqual({
      index_name: "test_summary",
      documents: [
        {
          text: `Short Note ${para(60, "c")}`,
          metadata: {
            author: "Test Author",
            category: "container",
            url: pageB.url,
            title: pageB.title,
            type: "summary",
          },
        },
      ],
    });
  });

  it("still emits a summary for a page too short to chunk", () => {
    const tiny: Page = { title: "Tiny", url: "https://blog.example.com/tiny", content: "just a few words" };
    const { chunked, summary } = buildIndexes([tiny], options);
    expect(chunked.documents).toEqual([]);
    expect(summary.documents[0].text).toBe("Tiny");
  });

  it("applies chunk options", () => {
    const { chunked } = buildIndexes([pageA], { ...options, chunkSize: 200 });
    expect(chunked.documents).toHaveLength(1);
    expect(chunked.documents[0].metadata.word_count).toBe(160);
  });

  it("throws PageShapeError on malformed pages without building anything", () => {
    const bad = [pageA, { title: "No content", url: "https://blog.example.com/x" }];
    expect(() => buildIndexes(bad, options)).toThrow(PageShapeError);
    expect(() => buildIndexes(bad, options)).toThrow('Page 1: "content" must be a string');
  });
});

describe("validateIndex", () => {
  const goodMeta = { author: "a", category: "c", url: "https://blog.example.com/p", title: "t" };

  it("rejects an index with no documents", () => {
    expect(validateIndex({ index_name: "x", documents: [] })).toEqual({
      valid: false,
      issues: ["No documents in index"],
    });
  });

  it("rejects non-object input", () => {
    expect(validateIndex("nope")).toEqual({ valid: false, issues: ["Index must be a JSON object"] });
    expect(validateIndex({ index_name: "x" })).toEqual({
      valid: false,
      issues: ["No documents in index"],
    });
  });

  it("accepts documents with 50+ words and full metadata", () => {
    const index = {
      index_name: "x",
      documents: [
        { text: para(50, "w"), metadata: goodMeta },
        { text: para(120, "v"), metadata: { ...goodMeta, type: "summary" } },
      ],
    };
    expect(validateIndex(index)).toEqual({ valid: true, issues: [] });
  });

  it("reports short text", () => {
    const index = { index_name: "x", documents: [{ text: para(49, "w"), metadata: goodMeta }] };
    expect(validateIndex(index)).toEqual({
      valid: false,
      issues: ["Document 0: Text too short (49 words)"],
    });
  });

  it("reports missing text and metadata", () => {
    const index = {
      index_name: "x",
      documents: [{ metadata: goodMeta }, { text: para(60, "w") }],
    };
    expect(validateIndex(index).issues).toEqual([
      "Document 0: Missing 'text' field",
      "Document 1: Missing 'metadata' field",
    ]);
  });

  it("reports each missing metadata field", () => {
    const index = {
      index_name: "x",
      documents: [{ text: para(60, "w"), metadata: { author: "a", title: "t" } }],
    };
    expect(validateIndex(index).issues).toEqual([
      "Document 0: Missing metadata field 'category'",
      "Document 0: Missing metadata field 'url'",
    ]);
  });

  it("does not modify the index", () => {
    const index = { index_name: "x", documents: [{ text: "short", metadata: goodMeta }] };
    const before = JSON.stringify(index);
    validateIndex(index);
    expect(JSON.stringify(index)).toBe(before);
  });
});

describe("saveIndex / loadIndexFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "blograg-assembler-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes the wire shape as pretty JSON and returns the byte size", () => {
    const { summary } = buildIndexes([{ ...pageB, title: "Café notes" }], options);
    const path = join(tmpDir, "summary.json");
    const bytes = saveIndex(summary, path);

    const written = readFileSync(path, "utf-8");
    expect(written).toBe(JSON.stringify(summary, null, 2) + "\n");
    expect(written).toContain('"index_name": "test_summary"');
    expect(written).toContain("Café notes");
    expect(bytes).toBe(Buffer.byteLength(written, "utf-8"));
    expect(loadIndexFile(path)).toEqual(summary);
  });

  it("throws when the index file is missing", () => {
    const path = join(tmpDir, "missing.json");
    expect(() => loadIndexFile(path)).toThrow(`Index file not found: ${path}`);
  });
});
