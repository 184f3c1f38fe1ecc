import * as cheerio from "cheerio";
import RssParser from "rss-parser";
import { DiscoveredFeed, FeedProber } from "../core/source-discovery.js";
import { resolveUrl } from "./article-page.js";
import { fetchText } from "./http.js";

const FEED_ACCEPT = "application/rss+xml,application/atom+xml,application/xml;q=0.9,*/*;q=0.8";

// tried in order when the homepage advertises no working feed
const COMMON_FEED_PATHS = ["/feed", "/rss", "/rss.xml", "/feed.xml", "/atom.xml", "/index.xml", "/news/rss"];

const parser = new RssParser();

/** Feeds a page announces through `<link rel="alternate">`, resolved against the page URL. */
export function advertisedFeeds(html: string, pageUrl: string): DiscoveredFeed[] {
  const $ = cheerio.load(html);
  const feeds: DiscoveredFeed[] = [];

  $('link[rel~="alternate"]').each((_, el) => {
    const type = ($(el).attr("type") ?? "").toLowerCase();
    if (!type.includes("rss") && !type.includes("atom")) return;
    const url = resolveUrl($(el).attr("href"), pageUrl);
    if (!url || feeds.some((f) => f.url === url)) return;
    feeds.push({ url, title: $(el).attr("title")?.trim() ?? "" });
  });

  return feeds;
}

/**
 * Looks for RSS feeds on a site: first the feeds its homepage links to,
 * then a handful of conventional paths. A candidate counts only if it
 * parses as a feed with at least one item.
 */
export class HttpFeedProber implements FeedProber {
  async probe(domain: string, signal: AbortSignal): Promise<DiscoveredFeed[]> {
    const home = `https://${domain}/`;
    let advertised: DiscoveredFeed[] = [];
    let homeError: unknown = null;
    try {
      const page = await fetchText(home, signal);
      advertised = advertisedFeeds(page.text, page.url);
    } catch (err) {
      homeError = err;
    }

    const found: DiscoveredFeed[] = [];
    for (const candidate of advertised) {
      const feed = await this.validate(candidate.url, candidate.title, signal);
      if (feed) found.push(feed);
    }
    if (found.length > 0) return found;

    for (const path of COMMON_FEED_PATHS) {
      const feed = await this.validate(new URL(path, home).toString(), "", signal);
      if (feed) return [feed];
    }

    if (homeError) throw homeError;
    return [];
  }

  private async validate(url: string, title: string, signal: AbortSignal): Promise<DiscoveredFeed | null> {
    try {
      const { text } = await fetchText(url, signal, FEED_ACCEPT);
      const parsed = await parser.parseString(text);
      if (parsed.items.length === 0) return null;
      return { url, title: title || parsed.title?.trim() || url };
    } catch (err) {
      if (signal.aborted) throw err;
      // a missing or malformed candidate is a miss, not a failure
      return null;
    }
  }
}
