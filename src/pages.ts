import { readFileSync, writeFileSync, existsSync } from "node:fs";
import type { Page } from "./types.js";

export class PageShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PageShapeError";
  }
}

function requireString(record: Record<string, unknown>, field: keyof Page, position: number): string {
  const value = record[field];
  if (typeof value !== "string") {
    throw new PageShapeError(`Page ${position}: "${field}" must be a string`);
  }
  return value;
}

export function assertPage(value: unknown, position: number): Page {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new PageShapeError(`Page ${position}: must be an object`);
  }

  const record: Record<string, unknown> = { ...value };
  return {
    title: requireString(record, "title", position),
    url: requireString(record, "url", position),
    content: requireString(record, "content", position),
  };
}

export function loadPages(pagesPath: string): Page[] {
  if (!existsSync(pagesPath)) {
    throw new Error(`Pages file not found: ${pagesPath}`);
  }
  const raw: unknown = JSON.parse(readFileSync(pagesPath, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new Error("Pages file must contain a JSON array");
  }
  return raw.map((value: unknown, i) => assertPage(value, i));
}

export function savePages(pages: Page[], pagesPath: string): void {
  writeFileSync(pagesPath, JSON.stringify(pages, null, 2) + "\n", "utf-8");
}
