import { ScoredArticle, SearchOptions, StoredArticle } from "./types.js";
import { ArticleStore } from "../stores/article-store.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const RECENCY_WEIGHT = 5;
export const TITLE_MATCH_WEIGHT = 3;
export const BODY_MATCH_WEIGHT = 0.2;

/** Non-overlapping, case-insensitive occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  const text = haystack.toLowerCase();
  const term = needle.toLowerCase();
  let count = 0;
  let from = 0;
  for (;;) {
    const at = text.indexOf(term, from);
    if (at === -1) return count;
    count++;
    from = at + term.length;
  }
}

/** 1 for an article published now, falling linearly to 0 at `maxAgeDays`. */
export function recency(publishedAt: Date, maxAgeDays: number, now: number): number {
  const ageDays = Math.max(0, now - publishedAt.getTime()) / DAY_MS;
  return 1 - Math.min(ageDays / maxAgeDays, 1);
}

export function scoreArticle(
  article: Pick<StoredArticle, "title" | "body" | "publishedAt">,
  query: string,
  maxAgeDays: number,
  now: number,
): number {
  return (
    RECENCY_WEIGHT * recency(article.publishedAt, maxAgeDays, now) +
    TITLE_MATCH_WEIGHT * countOccurrences(article.title, query) +
    BODY_MATCH_WEIGHT * countOccurrences(article.body, query)
  );
}

export class SearchEngine {
  constructor(
    private store: ArticleStore,
    private now: () => number = Date.now,
  ) {}

  /**
   * Ranked matches for `query` among articles no older than `maxAgeDays`.
   * Ordered by score, then newest first, then insertion order.
   */
  async search(query: string, options: SearchOptions): Promise<ScoredArticle[]> {
    const needle = query.trim();
    if (!needle) return [];
    if (!(options.maxAgeDays > 0)) {
      throw new RangeError(`maxAgeDays must be positive, got ${options.maxAgeDays}`);
    }

    const now = this.now();
    const candidates = await this.store.find({
      since: new Date(now - options.maxAgeDays * DAY_MS),
      query: needle,
      sources: options.sources,
    });

    const ranked = candidates
      .map((article) => ({ ...article, score: scoreArticle(article, needle, options.maxAgeDays, now) }))
      .sort(
        (a, b) =>
          b.score - a.score ||
          b.publishedAt.getTime() - a.publishedAt.getTime() ||
          a.id - b.id,
      );

    return options.limit ? ranked.slice(0, options.limit) : ranked;
  }
}
