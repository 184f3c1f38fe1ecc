import { readFileSync, writeFileSync, mkdirSync, existsSync, renameSync } from "node:fs";
import { dirname } from "node:path";
import { and, asc, eq, SQL } from "drizzle-orm";
import { Topic } from "../core/types.js";
import { StoreError, errorMessage } from "../core/errors.js";
import { getDb, schema } from "../db/index.js";

export interface TopicFilters {
  active?: boolean;
  category?: string;
}

export interface TopicStore {
  list(filters?: TopicFilters): Promise<Topic[]>;
  get(query: string): Promise<Topic | null>;
  save(topic: Topic): Promise<void>;
  delete(query: string): Promise<boolean>;
}

function byPriority(a: Topic, b: Topic): number {
  return a.priority - b.priority || a.query.localeCompare(b.query);
}

export class PgTopicStore implements TopicStore {
  async list(filters?: TopicFilters): Promise<Topic[]> {
    const db = getDb();
    const conditions: SQL[] = [];

    if (filters?.active !== undefined) {
      conditions.push(eq(schema.topics.active, filters.active));
    }
    if (filters?.category) {
      conditions.push(eq(schema.topics.category, filters.category));
    }

    const where = conditions.length > 0 ? and(...conditions) : undefined;
    const rows = await db
      .select()
      .from(schema.topics)
      .where(where)
      .orderBy(asc(schema.topics.priority), asc(schema.topics.query));
    return rows.map(rowToTopic);
  }

  async get(query: string): Promise<Topic | null> {
    const db = getDb();
    const [row] = await db
      .select()
      .from(schema.topics)
      .where(eq(schema.topics.query, query))
      .limit(1);
    return row ? rowToTopic(row) : null;
  }

  async save(topic: Topic): Promise<void> {
    const db = getDb();
    const fields = {
      priority: topic.priority,
      active: topic.active,
      sources: topic.sources,
      updateFrequencyMs: topic.updateFrequencyMs,
      category: topic.category,
      updatedAt: new Date(topic.updatedAt),
    };
    await db
      .insert(schema.topics)
      .values({ query: topic.query, createdAt: new Date(topic.createdAt), ...fields })
      .onConflictDoUpdate({ target: schema.topics.query, set: fields });
  }

  async delete(query: string): Promise<boolean> {
    const db = getDb();
    const removed = await db
      .delete(schema.topics)
      .where(eq(schema.topics.query, query))
      .returning({ query: schema.topics.query });
    return removed.length > 0;
  }
}

function rowToTopic(row: typeof schema.topics.$inferSelect): Topic {
  return {
    query: row.query,
    priority: row.priority,
    active: row.active,
    sources: row.sources,
    updateFrequencyMs: row.updateFrequencyMs,
    category: row.category,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

// ── JSON file store (local runs without PostgreSQL) ──────────────

export class JsonTopicStore implements TopicStore {
  private topics = new Map<string, Topic>();

  constructor(private filePath: string) {
    this.load();
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;
    try {
      const raw = readFileSync(this.filePath, "utf-8");
      const arr: Topic[] = JSON.parse(raw);
      for (const topic of arr) {
        this.topics.set(topic.query, topic);
      }
    } catch (err) {
      throw new StoreError("unavailable", `Cannot read topics from ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private persist(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const tmp = this.filePath + ".tmp";
    writeFileSync(tmp, JSON.stringify([...this.topics.values()], null, 2));
    renameSync(tmp, this.filePath);
  }

  async list(filters?: TopicFilters): Promise<Topic[]> {
    let result = [...this.topics.values()];
    if (filters?.active !== undefined) {
      result = result.filter((t) => t.active === filters.active);
    }
    if (filters?.category) {
      result = result.filter((t) => t.category === filters.category);
    }
    return result.sort(byPriority);
  }

  async get(query: string): Promise<Topic | null> {
    return this.topics.get(query) ?? null;
  }

  async save(topic: Topic): Promise<void> {
    this.topics.set(topic.query, topic);
    this.persist();
  }

  async delete(query: string): Promise<boolean> {
    const removed = this.topics.delete(query);
    if (removed) this.persist();
    return removed;
  }
}
