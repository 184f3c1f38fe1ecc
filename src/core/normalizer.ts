import { NormalizeError } from "./errors.js";
import { Article, RawRecord, SourceId } from "./types.js";

const STOPWORDS = new Set([
  "about", "after", "again", "also", "amid", "been", "before", "being", "from",
  "have", "into", "more", "news", "only", "over", "said", "says", "some", "than",
  "that", "their", "them", "then", "there", "these", "they", "this", "were",
  "what", "when", "will", "with", "would", "your",
]);

const TRACKING_PARAMS = new Set([
  "utm_source", "utm_medium", "utm_campaign", "utm_term", "utm_content",
  "fbclid", "gclid", "mc_cid", "mc_eid",
]);

export const DEFAULT_KEYWORD_COUNT = 5;

/**
 * Canonical form of an article URL: lower-case host without `www.`, no
 * fragment, no tracking parameters, sorted query, no trailing slash on the path.
 * Strings that do not parse as URLs are returned trimmed.
 */
export function canonicalizeUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }

  url.hostname = url.hostname.toLowerCase().replace(/^www\./, "");
  url.hash = "";
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAMS.has(key)) url.searchParams.delete(key);
  }
  url.searchParams.sort();
  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "") || "/";
  }
  return url.toString();
}

export function stripHtml(html: string): string {
  return html.replace(/<[^>]*>/g, " ").replace(/&nbsp;/g, " ").replace(/\s+/g, " ").trim();
}

/** Most frequent alphabetic words of four letters or more, stopwords excluded. */
export function extractKeywords(text: string, topN = DEFAULT_KEYWORD_COUNT): string[] {
  const counts = new Map<string, number>();
  for (const token of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    if (token.length < 4 || STOPWORDS.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  // Map iteration keeps first-appearance order, and sort is stable
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([token]) => token);
}

function pickString(raw: RawRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return undefined;
}

function pickDate(raw: RawRecord, ...keys: string[]): Date | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (value instanceof Date && !isNaN(value.getTime())) return value;
    if (typeof value === "string" || typeof value === "number") {
      const parsed = new Date(value);
      if (!isNaN(parsed.getTime())) return parsed;
    }
  }
  return undefined;
}

export function normalize(
  raw: RawRecord,
  source: SourceId,
  options: { keywordCount?: number; now?: Date } = {},
): Article {
  const rawUrl = pickString(raw, "url", "link", "href");
  if (!rawUrl) throw new NormalizeError("url", source);
  const rawTitle = pickString(raw, "title");
  const title = rawTitle ? stripHtml(rawTitle) : "";
  if (!title) throw new NormalizeError("title", source);

  const body = stripHtml(
    pickString(raw, "body", "content") ??
      pickString(raw, "description", "summary", "contentSnippet") ??
      "",
  );

  const article: Article = {
    url: canonicalizeUrl(rawUrl),
    title,
    body,
    publishedAt:
      pickDate(raw, "publishedAt", "published_at", "isoDate", "pubDate", "date") ??
      options.now ??
      new Date(),
    source,
    tags: extractKeywords(`${title} ${body}`, options.keywordCount),
  };

  const searchKey = pickString(raw, "searchKey", "search_key");
  if (searchKey) article.searchKey = searchKey;
  const imageUrl = pickString(raw, "imageUrl", "image_url", "image");
  if (imageUrl) article.imageUrl = imageUrl;

  return article;
}

export interface NormalizedBatch {
  articles: Article[];
  invalid: number;
}

export function normalizeBatch(
  raws: RawRecord[],
  source: SourceId,
  options: { keywordCount?: number; now?: Date } = {},
): NormalizedBatch {
  const articles: Article[] = [];
  let invalid = 0;
  for (const raw of raws) {
    if (typeof raw !== "object" || raw === null) {
      invalid++;
      continue;
    }
    try {
      articles.push(normalize(raw, source, options));
    } catch (err) {
      if (!(err instanceof NormalizeError)) throw err;
      invalid++;
      console.warn(`[normalizer] dropped record: ${err.message}`);
    }
  }
  return { articles, invalid };
}
