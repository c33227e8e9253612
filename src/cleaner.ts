// Non-blank lines at or under this length are dropped as nav or footer remnants.
const MIN_LINE_LENGTH = 20;

const BLANK_RUN_RE = /\n\s*\n/g;

export function cleanContent(raw: string): string {
  const collapsed = raw
    .replace(/\r\n?/g, "\n")
    .replace(BLANK_RUN_RE, "\n\n")
    .replace(/ +/g, " ");

  const kept = collapsed.split("\n").filter((line) => {
    const trimmed = line.trim();
    return trimmed.length === 0 || trimmed.length > MIN_LINE_LENGTH;
  });

  // Dropping lines can leave adjacent blank lines behind
  return kept.join("\n").replace(BLANK_RUN_RE, "\n\n").trim();
}
