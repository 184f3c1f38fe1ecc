import {
  pgTable,
  serial,
  text,
  varchar,
  boolean,
  timestamp,
  integer,
  index,
} from "drizzle-orm/pg-core";

// ── Articles (one row per canonical URL) ─────────────────────────

export const articles = pgTable(
  "articles",
  {
    id: serial("id").primaryKey(),
    url: text("url").notNull().unique(),
    title: text("title").notNull(),
    body: text("body").notNull().default(""),
    publishedAt: timestamp("published_at", { withTimezone: true }).notNull(),
    source: varchar("source", { length: 100 }).notNull(),
    searchKey: text("search_key"),
    imageUrl: text("image_url"),
    tags: text("tags").array().notNull().default([]),
    ingestedAt: timestamp("ingested_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index("articles_published_at_idx").on(t.publishedAt),
    index("articles_ingested_at_idx").on(t.ingestedAt),
    index("articles_source_idx").on(t.source),
  ],
);

// ── Topics (tracked queries) ─────────────────────────────────────

export const topics = pgTable(
  "topics",
  {
    query: text("query").primaryKey(),
    priority: integer("priority").default(5).notNull(),
    active: boolean("active").default(true).notNull(),
    sources: text("sources").array().notNull().default([]),
    updateFrequencyMs: integer("update_frequency_ms").notNull(),
    category: varchar("category", { length: 50 }).default("general").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [index("topics_priority_idx").on(t.priority)],
);
