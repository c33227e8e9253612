import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { cleanContent } from "./cleaner.js";
import type { CrawlFailure, CrawlResult, Page, PostListing } from "./types.js";

export interface CrawlOptions {
  timeoutMs: number;
  delayMs: number;
}

const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  timeoutMs: 10_000,
  delayMs: 1_000,
};

const USER_AGENT = "blograg/0.1.0";

const STRIP_SELECTOR = "script, style, nav, footer, header";
const CONTENT_SELECTORS = ["article", "main", ".post-content", ".entry-content", ".content"];
const BLOCK_SELECTOR = "p, h1, h2, h3, h4, h5, h6, li, pre, blockquote";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function resolveOptions(options?: Partial<CrawlOptions>): CrawlOptions {
  return {
    timeoutMs: options?.timeoutMs ?? DEFAULT_CRAWL_OPTIONS.timeoutMs,
    delayMs: options?.delayMs ?? DEFAULT_CRAWL_OPTIONS.delayMs,
  };
}

export function normalizeUrl(raw: string): string {
  try {
    const u = new URL(raw);
    u.hash = "";
    // Strip trailing slash unless it's the root
    if (u.pathname.length > 1 && u.pathname.endsWith("/")) {
      u.pathname = u.pathname.slice(0, -1);
    }
    return u.toString();
  } catch {
    return raw;
  }
}

export function discoverPosts(html: string, blogUrl: string): PostListing[] {
  const $ = cheerio.load(html);
  const home = normalizeUrl(blogUrl);
  const seen = new Set<string>();
  const posts: PostListing[] = [];

  $("article, h2, h3").each((_, el) => {
    const link = $(el).find("a[href]").first();
    const href = link.attr("href");
    if (!href) return;

    if (href.startsWith("#") || href.startsWith("javascript:") || href.startsWith("mailto:")) {
      return;
    }

    let url: string;
    try {
      url = normalizeUrl(new URL(href, blogUrl).toString());
    } catch {
      return;
    }

    const title = link.text().trim();
    if (!title || url === home || seen.has(url)) return;

    seen.add(url);
    posts.push({ title, url });
  });

  return posts;
}

function findContainer($: CheerioAPI) {
  for (const selector of CONTENT_SELECTORS) {
    const match = $(selector).first();
    if (match.length > 0) return match;
  }
  return $("body");
}

export function extractContent(html: string): string {
  const $ = cheerio.load(html);
  $(STRIP_SELECTOR).remove();

  const container = findContainer($);

  // Innermost blocks only, so a <li><p>..</p></li> is not counted twice
  const blocks = container
    .find(BLOCK_SELECTOR)
    .filter((_, el) => $(el).find(BLOCK_SELECTOR).length === 0)
    .toArray()
    .map((el) => $(el).text().replace(/\s+/g, " ").trim())
    .filter((text) => text.length > 0);

  if (blocks.length === 0) {
    return cleanContent(container.text());
  }

  return cleanContent(blocks.join("\n\n"));
}

export async function fetchHtml(url: string, options?: Partial<CrawlOptions>): Promise<string> {
  const opts = resolveOptions(options);
  const response = await fetch(url, {
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "text/html,*/*",
    },
    redirect: "follow",
    signal: AbortSignal.timeout(opts.timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} fetching ${url}`);
  }

  return response.text();
}

export async function fetchPost(listing: PostListing, options?: Partial<CrawlOptions>): Promise<Page> {
  const html = await fetchHtml(listing.url, options);
  return {
    title: listing.title,
    url: listing.url,
    content: extractContent(html),
  };
}

/**
 * Fetches each listed post in order. A post that fails to fetch is recorded
 * in `failures` and the batch carries on.
 */
export async function crawlPosts(
  listings: PostListing[],
  options?: Partial<CrawlOptions>,
): Promise<CrawlResult> {
  const opts = resolveOptions(options);
  const pages: Page[] = [];
  const failures: CrawlFailure[] = [];

  for (let i = 0; i < listings.length; i++) {
    const listing = listings[i];
    try {
      pages.push(await fetchPost(listing, opts));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Warning: skipping ${listing.url} (${msg})\n`);
      failures.push({ title: listing.title, url: listing.url, error: msg });
    }

    // Throttle between requests
    if (i < listings.length - 1) {
      await sleep(opts.delayMs);
    }
  }

  return { pages, failures };
}

export async function crawlBlog(blogUrl: string, options?: Partial<CrawlOptions>): Promise<CrawlResult> {
  const html = await fetchHtml(blogUrl, options);
  const listings = discoverPosts(html, blogUrl);
  return crawlPosts(listings, options);
}
