import type { Chunk } from "./types.js";

export interface ChunkOptions {
  chunkSize: number;
  minChunkSize: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 150,
  minChunkSize: 50,
};

const PARAGRAPH_BREAK_RE = /\n\s*\n/;

export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BREAK_RE)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Greedily packs paragraphs into chunks of roughly `chunkSize` words.
 *
 * Paragraphs are never split, so a single oversized paragraph becomes its own
 * chunk. When a chunk is flushed, its last paragraph seeds the next one, so
 * neighbouring chunks always share exactly one paragraph. A trailing buffer
 * under `minChunkSize` words is dropped.
 */
export function chunkContent(text: string, options?: Partial<ChunkOptions>): Chunk[] {
  const chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_OPTIONS.chunkSize;
  const minChunkSize = options?.minChunkSize ?? DEFAULT_CHUNK_OPTIONS.minChunkSize;

  const chunks: Chunk[] = [];
  let buffer: string[] = [];
  let wordCount = 0;
  let sectionNumber = 1;

  for (const para of splitParagraphs(text)) {
    const paraWords = countWords(para);

    if (wordCount + paraWords > chunkSize && buffer.length > 0) {
      chunks.push(makeChunk(buffer, sectionNumber, wordCount));
      sectionNumber++;

      // Overlap: carry the last paragraph into the next chunk
      buffer = buffer.slice(-1);
      wordCount = countWords(buffer[0]);
    }

    buffer.push(para);
    wordCount += paraWords;
  }

  if (buffer.length > 0 && wordCount >= minChunkSize) {
    chunks.push(makeChunk(buffer, sectionNumber, wordCount));
  }

  return chunks;
}

function makeChunk(paragraphs: string[], sectionNumber: number, wordCount: number): Chunk {
  return {
    text: paragraphs.join(" "),
    sectionNumber,
    wordCount,
  };
}
