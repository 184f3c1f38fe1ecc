import { sql } from "drizzle-orm";
import { getDb } from "./index.js";

// Keep in step with ./schema.ts.
const STATEMENTS = [
  sql`CREATE TABLE IF NOT EXISTS articles (
    id serial PRIMARY KEY,
    url text NOT NULL UNIQUE,
    title text NOT NULL,
    body text NOT NULL DEFAULT '',
    published_at timestamptz NOT NULL,
    source varchar(100) NOT NULL,
    search_key text,
    image_url text,
    tags text[] NOT NULL DEFAULT '{}',
    ingested_at timestamptz NOT NULL DEFAULT now()
  )`,
  sql`CREATE INDEX IF NOT EXISTS articles_published_at_idx ON articles (published_at)`,
  sql`CREATE INDEX IF NOT EXISTS articles_ingested_at_idx ON articles (ingested_at)`,
  sql`CREATE INDEX IF NOT EXISTS articles_source_idx ON articles (source)`,
  sql`CREATE TABLE IF NOT EXISTS topics (
    query text PRIMARY KEY,
    priority integer NOT NULL DEFAULT 5,
    active boolean NOT NULL DEFAULT true,
    sources text[] NOT NULL DEFAULT '{}',
    update_frequency_ms integer NOT NULL,
    category varchar(50) NOT NULL DEFAULT 'general',
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  sql`CREATE INDEX IF NOT EXISTS topics_priority_idx ON topics (priority)`,
];

export async function ensureSchema(): Promise<void> {
  const db = getDb();
  for (const statement of STATEMENTS) {
    await db.execute(statement);
  }
}
