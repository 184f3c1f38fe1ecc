import RssParser from "rss-parser";
import { FetchAdapter, FetchOptions, RawRecord } from "../core/types.js";
import { fetchText } from "./http.js";

export interface GoogleNewsOptions {
  language: string;
  country: string;
}

/** Builds the Google News RSS search URL for a query. */
export function googleNewsSearchUrl(query: string, { language, country }: GoogleNewsOptions): string {
  const params = new URLSearchParams({
    q: query,
    hl: language,
    gl: country,
    ceid: `${country}:${language}`,
  });
  return `https://news.google.com/rss/search?${params.toString()}`;
}

/**
 * Google News appends " - Publisher" to every headline; drop it so titles
 * compare cleanly against other sources.
 */
export function stripPublisherSuffix(title: string, publisher?: string): string {
  if (publisher && title.endsWith(` - ${publisher}`)) {
    return title.slice(0, -(publisher.length + 3)).trim();
  }
  return title;
}

export class GoogleNewsAdapter implements FetchAdapter {
  readonly source = "google_news";
  readonly displayName = "Google News search";
  readonly cost = "light";
  readonly maxConcurrency = 4;

  private parser = new RssParser<Record<string, unknown>, { source?: unknown }>({
    customFields: { item: ["source"] },
  });

  constructor(private options: GoogleNewsOptions) {}

  async fetch(query: string, { signal }: FetchOptions): Promise<RawRecord[]> {
    const { text } = await fetchText(googleNewsSearchUrl(query, this.options), signal);
    const feed = await this.parser.parseString(text);

    return feed.items.map((item) => {
      const publisher = publisherName(item.source);
      return {
        link: item.link,
        title: item.title ? stripPublisherSuffix(item.title, publisher) : undefined,
        contentSnippet: item.contentSnippet,
        isoDate: item.isoDate,
        pubDate: item.pubDate,
        publisher,
      };
    });
  }
}

function publisherName(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  // xml2js renders <source url="…">Name</source> as { _: "Name", $: { url } }
  if (typeof value === "object" && value !== null && "_" in value && typeof value._ === "string") {
    return value._.trim() || undefined;
  }
  return undefined;
}
