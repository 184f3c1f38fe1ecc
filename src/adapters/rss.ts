import RssParser from "rss-parser";
import { FeedSource } from "../config.js";
import { errorMessage } from "../core/errors.js";
import { FetchAdapter, FetchOptions, RawRecord } from "../core/types.js";
import { fetchText } from "./http.js";

const parser = new RssParser();

function matchesQuery(query: string, ...fields: (string | undefined)[]): boolean {
  const needle = query.trim().toLowerCase();
  if (!needle) return false;
  return fields.some((field) => field?.toLowerCase().includes(needle));
}

export interface FeedList {
  active(): FeedSource[];
}

/**
 * Polls the configured RSS feeds and keeps the items that mention the
 * topic query in their title or summary.
 */
export class RssFeedsAdapter implements FetchAdapter {
  readonly source = "rss";
  readonly displayName = "RSS feeds";
  readonly cost = "light";
  readonly maxConcurrency = 2;

  constructor(private feedList: FeedList) {}

  async fetch(query: string, { signal }: FetchOptions): Promise<RawRecord[]> {
    const feeds = this.feedList.active();
    const settled = await Promise.allSettled(feeds.map((feed) => this.fetchFeed(feed, signal)));

    const records: RawRecord[] = [];
    const failures: string[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        for (const record of outcome.value) {
          if (matchesQuery(query, record.title, record.contentSnippet)) records.push(record);
        }
      } else {
        failures.push(`${feeds[i]?.name ?? "feed"}: ${errorMessage(outcome.reason)}`);
      }
    });

    if (feeds.length > 0 && failures.length === feeds.length) {
      throw new Error(`All ${failures.length} feeds failed (${failures[0]})`);
    }
    if (failures.length > 0) {
      console.warn(`[rss] ${failures.length}/${feeds.length} feeds failed: ${failures.join("; ")}`);
    }
    return records;
  }

  private async fetchFeed(feed: FeedSource, signal: AbortSignal) {
    const { text } = await fetchText(feed.url, signal);
    const parsed = await parser.parseString(text);

    return parsed.items.map((item) => ({
      link: item.link,
      title: item.title,
      content: item.content,
      contentSnippet: item.contentSnippet ?? item.summary,
      isoDate: item.isoDate,
      pubDate: item.pubDate,
      image: item.enclosure?.type?.startsWith("image/") ? item.enclosure.url : undefined,
      feed: feed.name,
    }));
  }
}
