export interface Page {
  title: string;
  url: string;
  content: string;
}

export interface Chunk {
  text: string;
  sectionNumber: number;
  wordCount: number;
}

export interface BaseMetadata {
  author: string;
  category: string;
  url: string;
  title: string;
}

export interface ChunkMetadata extends BaseMetadata {
  section: string;
  word_count: number;
}

export interface SummaryMetadata extends BaseMetadata {
  type: "summary";
}

// Field names below are consumed as-is by the indexing service.
export interface RagDocument<M extends BaseMetadata = BaseMetadata> {
  text: string;
  metadata: M;
}

export interface RagIndex<M extends BaseMetadata = BaseMetadata> {
  index_name: string;
  documents: RagDocument<M>[];
}

export type ChunkedIndex = RagIndex<ChunkMetadata>;
export type SummaryIndex = RagIndex<SummaryMetadata>;

export interface ValidationResult {
  valid: boolean;
  issues: string[];
}

export interface BlogRagConfig {
  blogUrl: string;
  author: string;
  category: string;
  chunkSize: number;
  minChunkSize: number;
  outputChunked: string;
  outputSummary: string;
  indexNameChunked: string;
  indexNameSummary: string;
  requestTimeoutMs: number;
  delayMs: number;
  engineUrl: string;
}

export interface PostListing {
  title: string;
  url: string;
}

export interface CrawlFailure {
  title: string;
  url: string;
  error: string;
}

export interface CrawlResult {
  pages: Page[];
  failures: CrawlFailure[];
}

export interface BuildSummary {
  pages: number;
  chunks: number;
  summaries: number;
  chunkedBytes: number;
  summaryBytes: number;
  elapsedMs: number;
}
