import { Semaphore } from "./semaphore.js";
import { titleSimilarity } from "./similarity.js";
import { StoreError, errorMessage } from "./errors.js";
import { Article } from "./types.js";
import { ArticleStore, TitleRef } from "../stores/article-store.js";

export interface DedupOptions {
  /** How far back (by ingestion time) titles are compared. */
  windowMs: number;
  /** Similarity strictly above this suppresses the candidate. */
  threshold: number;
  now?: () => number;
}

export type DedupOutcome =
  | { status: "inserted" | "updated"; url: string }
  | { status: "suppressed"; url: string; duplicateOf: string; similarity: number };

export interface BatchOutcome {
  inserted: number;
  updated: number;
  suppressed: number;
  failed: number;
}

export class DedupGateway {
  // the near-duplicate check and the insert that follows it run one at a time
  private writeLock = new Semaphore(1);
  private now: () => number;

  constructor(
    private store: ArticleStore,
    private options: DedupOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async upsert(article: Article): Promise<DedupOutcome> {
    return this.writeLock.use(async () => {
      const existing = await this.store.getByUrl(article.url);

      if (!existing) {
        const duplicate = await this.findNearDuplicate(article);
        if (duplicate) {
          return {
            status: "suppressed",
            url: article.url,
            duplicateOf: duplicate.article.url,
            similarity: duplicate.similarity,
          };
        }
      }

      const status = await this.store.upsertByUrl(article);
      return { status, url: article.url };
    });
  }

  async ingestBatch(articles: Article[]): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { inserted: 0, updated: 0, suppressed: 0, failed: 0 };

    for (const article of articles) {
      try {
        const result = await this.upsert(article);
        outcome[result.status]++;
      } catch (err) {
        outcome.failed++;
        const kind = err instanceof StoreError ? err.kind : "unavailable";
        console.error(`[dedup] store ${kind} for ${article.url}: ${errorMessage(err)}`);
      }
    }

    return outcome;
  }

  async findNearDuplicate(article: Article): Promise<{ article: TitleRef; similarity: number } | null> {
    const recent = await this.store.recentTitles(new Date(this.now() - this.options.windowMs));

    let best: { article: TitleRef; similarity: number } | null = null;
    for (const candidate of recent) {
      if (candidate.url === article.url) continue;
      const similarity = titleSimilarity(article.title, candidate.title);
      if (similarity > this.options.threshold && (!best || similarity > best.similarity)) {
        best = { article: candidate, similarity };
      }
    }
    return best;
  }
}
