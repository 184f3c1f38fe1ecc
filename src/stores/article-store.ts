import { and, asc, desc, gte, ilike, inArray, eq, or, sql, SQL } from "drizzle-orm";
import { Article, SourceId, SourceStat, StoredArticle, UpsertResult } from "../core/types.js";
import { StoreError, errorMessage } from "../core/errors.js";
import { getDb, schema } from "../db/index.js";

export interface ArticleQueryFilters {
  /** Only articles published at or after this instant. */
  since?: Date;
  /** Only articles first ingested at or after this instant. */
  ingestedSince?: Date;
  /** Case-insensitive substring of title or body. */
  query?: string;
  sources?: SourceId[];
  limit?: number;
}

/** Just enough of an article to compare headlines. */
export interface TitleRef {
  url: string;
  title: string;
}

export interface ArticleStore {
  upsertByUrl(article: Article): Promise<UpsertResult>;
  getByUrl(url: string): Promise<StoredArticle | null>;
  find(filters: ArticleQueryFilters): Promise<StoredArticle[]>;
  /** URL and title of every article first ingested at or after `since`. */
  recentTitles(since: Date): Promise<TitleRef[]>;
  countRecent(windowMs: number): Promise<number>;
  count(): Promise<number>;
  countBySource(since?: Date): Promise<SourceStat[]>;
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StoreError) throw err;
    const kind = isUniqueViolation(err) ? "conflict" : "unavailable";
    throw new StoreError(kind, `${operation} failed: ${errorMessage(err)}`, { cause: err });
  }
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PgArticleStore implements ArticleStore {
  async upsertByUrl(article: Article): Promise<UpsertResult> {
    return guard("upsert", async () => {
      const db = getDb();
      const fields = {
        title: article.title,
        body: article.body,
        publishedAt: article.publishedAt,
        source: article.source,
        searchKey: article.searchKey ?? null,
        imageUrl: article.imageUrl ?? null,
        tags: article.tags,
      };

      // xmax is 0 only on a freshly inserted row version
      const [row] = await db
        .insert(schema.articles)
        .values({ url: article.url, ...fields })
        .onConflictDoUpdate({ target: schema.articles.url, set: fields })
        .returning({ inserted: sql<boolean>`(xmax = 0)` });

      return row?.inserted ? "inserted" : "updated";
    });
  }

  async getByUrl(url: string): Promise<StoredArticle | null> {
    return guard("lookup", async () => {
      const db = getDb();
      const [row] = await db
        .select()
        .from(schema.articles)
        .where(eq(schema.articles.url, url))
        .limit(1);
      return row ? rowToArticle(row) : null;
    });
  }

  async find(filters: ArticleQueryFilters): Promise<StoredArticle[]> {
    return guard("query", async () => {
      const db = getDb();
      const conditions: SQL[] = [];

      if (filters.since) {
        conditions.push(gte(schema.articles.publishedAt, filters.since));
      }
      if (filters.ingestedSince) {
        conditions.push(gte(schema.articles.ingestedAt, filters.ingestedSince));
      }
      if (filters.sources && filters.sources.length > 0) {
        conditions.push(inArray(schema.articles.source, filters.sources));
      }
      if (filters.query) {
        const needle = `%${escapeLike(filters.query)}%`;
        const match = or(ilike(schema.articles.title, needle), ilike(schema.articles.body, needle));
        if (match) conditions.push(match);
      }

      const where = conditions.length > 0 ? and(...conditions) : undefined;
      const query = db
        .select()
        .from(schema.articles)
        .where(where)
        .orderBy(desc(schema.articles.publishedAt), asc(schema.articles.id));

      const rows = filters.limit ? await query.limit(filters.limit) : await query;
      return rows.map(rowToArticle);
    });
  }

  async recentTitles(since: Date): Promise<TitleRef[]> {
    return guard("query", async () => {
      const db = getDb();
      return db
        .select({ url: schema.articles.url, title: schema.articles.title })
        .from(schema.articles)
        .where(gte(schema.articles.ingestedAt, since));
    });
  }

  async countRecent(windowMs: number): Promise<number> {
    return guard("count", async () => {
      const db = getDb();
      const [row] = await db
        .select({ count: sql<number>`count(*)::int` })
        .from(schema.articles)
        .where(gte(schema.articles.ingestedAt, new Date(Date.now() - windowMs)));
      return row?.count ?? 0;
    });
  }

  async count(): Promise<number> {
    return guard("count", async () => {
      const db = getDb();
      const [row] = await db
        .select({ count: sql<number>`count(*)::int` })
        .from(schema.articles);
      return row?.count ?? 0;
    });
  }

  async countBySource(since?: Date): Promise<SourceStat[]> {
    return guard("stats", async () => {
      const db = getDb();
      const rows = await db
        .select({
          source: schema.articles.source,
          count: sql<number>`count(*)::int`,
          firstPublishedAt: sql<Date | null>`min(${schema.articles.publishedAt})`.mapWith(toDateOrNull),
          lastPublishedAt: sql<Date | null>`max(${schema.articles.publishedAt})`.mapWith(toDateOrNull),
        })
        .from(schema.articles)
        .where(since ? gte(schema.articles.publishedAt, since) : undefined)
        .groupBy(schema.articles.source)
        .orderBy(desc(sql`count(*)`));
      return rows;
    });
  }
}

function toDateOrNull(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  return new Date(String(value));
}

function rowToArticle(row: typeof schema.articles.$inferSelect): StoredArticle {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    body: row.body,
    publishedAt: row.publishedAt,
    source: row.source,
    searchKey: row.searchKey ?? undefined,
    imageUrl: row.imageUrl ?? undefined,
    tags: row.tags,
    ingestedAt: row.ingestedAt,
  };
}

// ── In-memory store (local runs and tests) ───────────────────────

export class InMemoryArticleStore implements ArticleStore {
  private articles = new Map<string, StoredArticle>();
  private nextId = 1;

  constructor(private now: () => number = Date.now) {}

  async upsertByUrl(article: Article): Promise<UpsertResult> {
    const existing = this.articles.get(article.url);
    if (existing) {
      this.articles.set(article.url, { ...article, id: existing.id, ingestedAt: existing.ingestedAt });
      return "updated";
    }
    this.articles.set(article.url, {
      ...article,
      id: this.nextId++,
      ingestedAt: new Date(this.now()),
    });
    return "inserted";
  }

  async getByUrl(url: string): Promise<StoredArticle | null> {
    return this.articles.get(url) ?? null;
  }

  async find(filters: ArticleQueryFilters): Promise<StoredArticle[]> {
    let result = [...this.articles.values()];

    if (filters.since) {
      const sinceMs = filters.since.getTime();
      result = result.filter((a) => a.publishedAt.getTime() >= sinceMs);
    }
    if (filters.ingestedSince) {
      const sinceMs = filters.ingestedSince.getTime();
      result = result.filter((a) => a.ingestedAt.getTime() >= sinceMs);
    }
    if (filters.sources && filters.sources.length > 0) {
      const sourceSet = new Set(filters.sources);
      result = result.filter((a) => sourceSet.has(a.source));
    }
    if (filters.query) {
      const needle = filters.query.toLowerCase();
      result = result.filter(
        (a) => a.title.toLowerCase().includes(needle) || a.body.toLowerCase().includes(needle),
      );
    }

    result.sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime() || a.id - b.id);
    return filters.limit ? result.slice(0, filters.limit) : result;
  }

  async recentTitles(since: Date): Promise<TitleRef[]> {
    const sinceMs = since.getTime();
    return [...this.articles.values()]
      .filter((a) => a.ingestedAt.getTime() >= sinceMs)
      .map((a) => ({ url: a.url, title: a.title }));
  }

  async countRecent(windowMs: number): Promise<number> {
    const cutoff = this.now() - windowMs;
    let count = 0;
    for (const article of this.articles.values()) {
      if (article.ingestedAt.getTime() >= cutoff) count++;
    }
    return count;
  }

  async count(): Promise<number> {
    return this.articles.size;
  }

  async countBySource(since?: Date): Promise<SourceStat[]> {
    const stats = new Map<SourceId, SourceStat>();
    for (const article of this.articles.values()) {
      if (since && article.publishedAt.getTime() < since.getTime()) continue;
      const stat = stats.get(article.source) ?? {
        source: article.source,
        count: 0,
        firstPublishedAt: null,
        lastPublishedAt: null,
      };
      stat.count++;
      if (!stat.firstPublishedAt || article.publishedAt.getTime() < stat.firstPublishedAt.getTime()) {
        stat.firstPublishedAt = article.publishedAt;
      }
      if (!stat.lastPublishedAt || article.publishedAt.getTime() > stat.lastPublishedAt.getTime()) {
        stat.lastPublishedAt = article.publishedAt;
      }
      stats.set(article.source, stat);
    }
    return [...stats.values()].sort((a, b) => b.count - a.count || a.source.localeCompare(b.source));
  }
}
