import { readFileSync, existsSync } from "node:fs";

export function indexEndpoint(engineUrl: string): string {
  return new URL("index", engineUrl.endsWith("/") ? engineUrl : engineUrl + "/").toString();
}

export async function pushIndex(indexPath: string, engineUrl: string): Promise<unknown> {
  if (!existsSync(indexPath)) {
    throw new Error(`Index file not found: ${indexPath}`);
  }
  const body = readFileSync(indexPath, "utf-8");
  const url = indexEndpoint(engineUrl);

  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });

  if (!response.ok) {
    const detail = await response.text();
    throw new Error(`HTTP ${response.status} from ${url}: ${detail}`);
  }

  const result: unknown = await response.json();
  return result;
}
