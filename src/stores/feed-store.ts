import { writeFileSync, renameSync } from "node:fs";
import { FeedSource, readFeedFile } from "../config.js";
import { StoreError, errorMessage } from "../core/errors.js";

/**
 * The RSS feed list in feeds.json. The `rss` source reads `active()` on
 * every run, so feeds added here are polled from the next run on.
 */
export class FeedStore {
  private feeds: FeedSource[];

  constructor(private filePath: string) {
    try {
      this.feeds = readFeedFile(filePath);
    } catch (err) {
      throw new StoreError("unavailable", `Cannot read feeds from ${filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  all(): FeedSource[] {
    return [...this.feeds];
  }

  active(): FeedSource[] {
    return this.feeds.filter((feed) => feed.active);
  }

  has(url: string): boolean {
    return this.feeds.some((feed) => feed.url === url);
  }

  /** Append a feed. Returns false when its URL is already listed. */
  add(feed: FeedSource): boolean {
    if (this.has(feed.url)) return false;
    this.feeds.push(feed);
    this.persist();
    return true;
  }

  private persist(): void {
    const tmp = this.filePath + ".tmp";
    writeFileSync(tmp, JSON.stringify({ feeds: this.feeds }, null, 2) + "\n");
    renameSync(tmp, this.filePath);
  }
}
