import { FeedSource } from "../config.js";
import { ArticleStore } from "../stores/article-store.js";
import { FeedStore } from "../stores/feed-store.js";
import { errorMessage } from "./errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// aggregators: their links stand in for other publishers
const IGNORED_DOMAINS = ["news.google.com"];

export const DISCOVERED_CATEGORY = "discovered";

export interface DiscoveredFeed {
  url: string;
  title: string;
}

export interface FeedProber {
  probe(domain: string, signal: AbortSignal): Promise<DiscoveredFeed[]>;
}

export interface DomainCount {
  domain: string;
  references: number;
}

export interface SourceSuggestion extends DomainCount {
  feeds: DiscoveredFeed[];
}

export interface DiscoveryOptions {
  /** Articles ingested this many days back are counted. */
  lookbackDays: number;
  /** A domain needs at least this many articles to be probed. */
  minOccurrences: number;
  /** At most this many domains are probed per run, most referenced first. */
  maxDomains: number;
  probeTimeoutMs: number;
  now?: () => number;
}

export type DiscoveryParams = Partial<Pick<DiscoveryOptions, "lookbackDays" | "minOccurrences" | "maxDomains">>;

export interface FeedInput {
  url: string;
  name?: string;
  category?: string;
}

/** Host of `url` without a leading "www.", or null when it does not parse. */
export function domainOf(url: string): string | null {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
  return host.replace(/^www\./, "") || null;
}

/** True when one host is the other or a subdomain of it. */
export function sameSite(a: string, b: string): boolean {
  return a === b || a.endsWith(`.${b}`) || b.endsWith(`.${a}`);
}

/**
 * Article counts per domain, leaving out domains that belong to a known
 * site. Most referenced first, then alphabetical.
 */
export function countDomains(urls: string[], known: string[], minOccurrences: number): DomainCount[] {
  const counts = new Map<string, number>();
  for (const url of urls) {
    const domain = domainOf(url);
    if (!domain || known.some((k) => sameSite(domain, k))) continue;
    counts.set(domain, (counts.get(domain) ?? 0) + 1);
  }

  return [...counts]
    .filter(([, references]) => references >= minOccurrences)
    .map(([domain, references]) => ({ domain, references }))
    .sort((a, b) => b.references - a.references || a.domain.localeCompare(b.domain));
}

/**
 * Finds publishers that show up often in stored articles but have no feed
 * in the RSS list yet, and checks their sites for feeds worth adding.
 */
export class SourceDiscovery {
  private now: () => number;

  constructor(
    private articles: ArticleStore,
    private feeds: FeedStore,
    private prober: FeedProber,
    private options: DiscoveryOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async candidates(params: DiscoveryParams = {}): Promise<DomainCount[]> {
    const lookbackDays = params.lookbackDays ?? this.options.lookbackDays;
    const recent = await this.articles.recentTitles(new Date(this.now() - lookbackDays * DAY_MS));
    const known = [
      ...IGNORED_DOMAINS,
      ...this.feeds.all().flatMap((feed) => domainOf(feed.url) ?? []),
    ];
    return countDomains(
      recent.map((article) => article.url),
      known,
      params.minOccurrences ?? this.options.minOccurrences,
    ).slice(0, params.maxDomains ?? this.options.maxDomains);
  }

  /** Probe candidate domains one at a time; domains without a new feed are left out. */
  async suggest(params: DiscoveryParams = {}): Promise<SourceSuggestion[]> {
    const candidates = await this.candidates(params);
    const suggestions: SourceSuggestion[] = [];

    for (const candidate of candidates) {
      let found: DiscoveredFeed[];
      try {
        found = await this.prober.probe(candidate.domain, AbortSignal.timeout(this.options.probeTimeoutMs));
      } catch (err) {
        console.warn(`[discovery] ${candidate.domain}: ${errorMessage(err)}`);
        continue;
      }
      const fresh = found.filter((feed) => !this.feeds.has(feed.url));
      if (fresh.length > 0) suggestions.push({ ...candidate, feeds: fresh });
    }

    console.error(`[discovery] probed ${candidates.length} domains, ${suggestions.length} with new feeds`);
    return suggestions;
  }

  addFeed(input: FeedInput): { added: boolean; feed: FeedSource } {
    let url: URL;
    try {
      url = new URL(input.url.trim());
    } catch (err) {
      throw new Error(`Invalid feed URL: ${input.url}`, { cause: err });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new Error(`Feed URL must use http or https: ${input.url}`);
    }

    const feed: FeedSource = {
      name: input.name?.trim() || url.hostname.replace(/^www\./, ""),
      url: url.toString(),
      category: input.category?.trim() || DISCOVERED_CATEGORY,
      active: true,
    };
    const added = this.feeds.add(feed);
    if (added) console.error(`[discovery] added feed ${feed.name}: ${feed.url}`);
    return { added, feed };
  }
}
