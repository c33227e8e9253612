import { countWords, splitParagraphs } from "./chunker.js";

const MIN_PARAGRAPH_WORDS = 10;
const MAX_SUMMARY_WORDS = 100;
const MAX_KEY_TERMS = 5;

const KEY_TERM_PATTERNS: RegExp[] = [
  // platforms
  /\b(Kubernetes|K8s|AKS|Azure|Istio|Envoy)\b/gi,
  // infrastructure
  /\b(container|pod|service|deployment|ingress)\b/gi,
  // auth
  /\b(AuthorizationPolicy|JWT|OIDC|EntraID)\b/gi,
  // scaling
  /\b(scaling|autoscaling|HPA|KEDA)\b/gi,
  // observability
  /\b(monitoring|logging|observability)\b/gi,
];

export function extractKeyTerms(content: string): string[] {
  const found = new Set<string>();
  for (const pattern of KEY_TERM_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      found.add(match[1].toLowerCase());
    }
  }
  return [...found].sort();
}

/**
 * Extractive summary: the title, the opening of the first substantial
 * paragraph, and up to five detected key terms.
 */
export function summarize(title: string, content: string): string {
  const first = splitParagraphs(content).find((p) => countWords(p) > MIN_PARAGRAPH_WORDS);
  if (first === undefined) return title;

  const parts = [title, first.split(/\s+/).slice(0, MAX_SUMMARY_WORDS).join(" ")];

  const keyTerms = extractKeyTerms(content);
  if (keyTerms.length > 0) {
    parts.push(`Key topics: ${keyTerms.slice(0, MAX_KEY_TERMS).join(", ")}`);
  }

  return parts.join(" ");
}
