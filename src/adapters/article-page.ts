import * as cheerio from "cheerio";
import { errorMessage } from "../core/errors.js";
import { FetchAdapter, FetchOptions, RawRecord } from "../core/types.js";
import { fetchText } from "./http.js";

export interface ExtractedArticle {
  url?: string;
  title?: string;
  body: string;
  publishedAt?: string;
  imageUrl?: string;
}

const BODY_SELECTORS = ["article", "[itemprop='articleBody']", "main", "body"];
const MIN_PARAGRAPH_LENGTH = 40;

/** Pull the readable parts out of an article page. */
export function extractArticle(html: string, pageUrl?: string): ExtractedArticle {
  const $ = cheerio.load(html);
  $("script, style, noscript, nav, header, footer, aside, form").remove();

  const meta = (selector: string): string | undefined =>
    $(selector).first().attr("content")?.trim() || undefined;

  const title =
    meta("meta[property='og:title']") ??
    ($("h1").first().text().trim() || undefined) ??
    ($("title").first().text().trim() || undefined);

  let body = "";
  for (const selector of BODY_SELECTORS) {
    const paragraphs = $(selector)
      .first()
      .find("p")
      .map((_, el) => $(el).text().replace(/\s+/g, " ").trim())
      .get()
      .filter((text) => text.length >= MIN_PARAGRAPH_LENGTH);
    if (paragraphs.length > 0) {
      body = paragraphs.join("\n\n");
      break;
    }
  }
  if (!body) body = meta("meta[name='description']") ?? meta("meta[property='og:description']") ?? "";

  const publishedAt =
    meta("meta[property='article:published_time']") ??
    meta("meta[name='pubdate']") ??
    ($("time[datetime]").first().attr("datetime") || undefined);

  const canonical = $("link[rel='canonical']").first().attr("href") || meta("meta[property='og:url']");
  const image = meta("meta[property='og:image']");

  return {
    url: resolveUrl(canonical, pageUrl) ?? pageUrl,
    title,
    body,
    publishedAt,
    imageUrl: resolveUrl(image, pageUrl),
  };
}

export function resolveUrl(href: string | undefined, base: string | undefined): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

/**
 * Full-page source: asks a discovery adapter for article links, then
 * downloads and extracts each page. Expensive, so only high-priority
 * topics are scheduled on it.
 */
export class ArticlePageAdapter implements FetchAdapter {
  readonly source = "article_page";
  readonly displayName = "Full article pages";
  readonly cost = "heavy";
  readonly maxConcurrency = 1;

  constructor(
    private discovery: FetchAdapter,
    private maxLinks: number,
  ) {}

  async fetch(query: string, options: FetchOptions): Promise<RawRecord[]> {
    const listing = await this.discovery.fetch(query, options);
    const links = listing
      .map((record) => ({ link: record.link ?? record.url, title: record.title, isoDate: record.isoDate }))
      .filter((entry): entry is { link: string; title: unknown; isoDate: unknown } => typeof entry.link === "string")
      .slice(0, this.maxLinks);

    const records: RawRecord[] = [];
    let failed = 0;
    for (const entry of links) {
      if (options.signal.aborted) break;
      try {
        const page = await fetchText(entry.link, options.signal);
        const article = extractArticle(page.text, page.url);
        records.push({
          url: article.url,
          title: article.title ?? entry.title,
          body: article.body,
          publishedAt: article.publishedAt ?? entry.isoDate,
          imageUrl: article.imageUrl,
        });
      } catch (err) {
        failed++;
        console.warn(`[article_page] ${entry.link}: ${errorMessage(err)}`);
      }
    }

    if (links.length > 0 && failed === links.length) {
      throw new Error(`All ${failed} article pages failed to load`);
    }
    return records;
  }
}
