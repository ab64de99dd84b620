import { createHash } from "node:crypto";

const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function countWords(text: string): number {
  return text.match(WORD_REGEX)?.length ?? 0;
}

/**
 * Page identity: scheme, lower-cased host and path, with query string,
 * fragment and trailing slash removed. Returns null for non-http(s) input.
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  let parsed: URL;
  try {
    parsed = base ? new URL(raw, base) : new URL(raw);
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return null;
  }

  const pathname = parsed.pathname.length > 1 ? parsed.pathname.replace(/\/+$/, "") : "";
  return `${parsed.protocol}//${parsed.host.toLowerCase()}${pathname || "/"}`;
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return null;
  }
}

export function pathSegments(url: string): string[] {
  try {
    return new URL(url).pathname
      .toLowerCase()
      .split("/")
      .filter((segment) => segment.length > 0);
  } catch {
    return [];
  }
}

export function createPageId(normalizedUrl: string): string {
  return `pg_${createHash("sha1").update(normalizedUrl).digest("hex").slice(0, 16)}`;
}

/** Position-derived key: stable across re-scrapes of the same page. */
export function createChunkId(normalizedUrl: string, startOffset: number): string {
  return `${createPageId(normalizedUrl)}:${startOffset}`;
}

export function truncate(text: string, maxChars: number): string {
  const normalized = collapseWhitespace(text);
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, Math.max(0, maxChars - 3))}...`;
}
