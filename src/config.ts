import { readFileSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { DefaultTopicGroup } from "./core/topic-service.js";
import { MAX_UPDATE_FREQUENCY_MS } from "./core/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const FEEDS_PATH = resolve(__dirname, "..", "feeds.json");
const TOPICS_PATH = resolve(__dirname, "..", "topics.json");

const MINUTE_MS = 60 * 1000;

const int = (fallback: number) => z.coerce.number().int().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  NEWSWIRE_DATA_DIR: z.string().min(1).default(join(homedir(), ".newswire")),
  FEEDS_FILE: z.string().min(1).default(FEEDS_PATH),

  WORKER_LIMIT: positiveInt(8),
  STAGGER_WINDOW_MS: int(5 * MINUTE_MS).pipe(z.number().nonnegative()),
  LOW_PRIORITY_THRESHOLD: positiveInt(5),
  DEFAULT_PRIORITY: positiveInt(5),
  DEFAULT_UPDATE_FREQUENCY_MS: positiveInt(15 * MINUTE_MS).pipe(z.number().max(MAX_UPDATE_FREQUENCY_MS)),
  DEFAULT_SOURCES: z
    .string()
    .default("google_news,rss,article_page")
    .transform((s) => s.split(",").map((part) => part.trim()).filter(Boolean))
    .pipe(z.array(z.string()).min(1)),

  FETCH_MAX_RETRIES: int(3).pipe(z.number().nonnegative()),
  FETCH_BASE_DELAY_MS: int(1000).pipe(z.number().nonnegative()),
  FETCH_JITTER_MS: int(1000).pipe(z.number().nonnegative()),
  FETCH_TIMEOUT_MS: positiveInt(15_000),
  CIRCUIT_FAILURE_THRESHOLD: positiveInt(5),
  CIRCUIT_COOLDOWN_MS: positiveInt(60_000),

  DEDUP_WINDOW_HOURS: z.coerce.number().positive().default(24),
  DEDUP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),

  SEARCH_DEFAULT_MAX_AGE_DAYS: z.coerce.number().positive().default(7),
  SEARCH_DEFAULT_LIMIT: positiveInt(20),
  KEYWORD_COUNT: positiveInt(5),

  REFRESH_CRON: z.string().min(1).default("*/10 * * * *"),
  NEWS_LANGUAGE: z.string().min(2).default("en"),
  NEWS_COUNTRY: z.string().min(2).default("US"),
  ARTICLE_PAGE_MAX_LINKS: positiveInt(5),

  DISCOVERY_LOOKBACK_DAYS: positiveInt(30),
  DISCOVERY_MIN_OCCURRENCES: positiveInt(3),
  DISCOVERY_MAX_DOMAINS: positiveInt(20),
});

export interface AppConfig {
  databaseUrl?: string;
  dataDir: string;
  feedsFile: string;
  scheduler: {
    workerLimit: number;
    staggerWindowMs: number;
    lowPriorityThreshold: number;
    refreshCron: string;
  };
  topicDefaults: {
    priority: number;
    updateFrequencyMs: number;
    sources: string[];
    category: string;
  };
  retry: { maxRetries: number; baseDelayMs: number; jitterMs: number; timeoutMs: number };
  breaker: { failureThreshold: number; coolDownMs: number };
  dedup: { windowMs: number; threshold: number };
  search: { defaultMaxAgeDays: number; defaultLimit: number };
  keywordCount: number;
  news: { language: string; country: string; articlePageMaxLinks: number };
  discovery: { lookbackDays: number; minOccurrences: number; maxDomains: number };
}

/** Parse the process environment. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    databaseUrl: e.DATABASE_URL,
    dataDir: resolve(e.NEWSWIRE_DATA_DIR),
    feedsFile: resolve(e.FEEDS_FILE),
    scheduler: {
      workerLimit: e.WORKER_LIMIT,
      staggerWindowMs: e.STAGGER_WINDOW_MS,
      lowPriorityThreshold: e.LOW_PRIORITY_THRESHOLD,
      refreshCron: e.REFRESH_CRON,
    },
    topicDefaults: {
      priority: e.DEFAULT_PRIORITY,
      updateFrequencyMs: e.DEFAULT_UPDATE_FREQUENCY_MS,
      sources: e.DEFAULT_SOURCES,
      category: "general",
    },
    retry: {
      maxRetries: e.FETCH_MAX_RETRIES,
      baseDelayMs: e.FETCH_BASE_DELAY_MS,
      jitterMs: e.FETCH_JITTER_MS,
      timeoutMs: e.FETCH_TIMEOUT_MS,
    },
    breaker: {
      failureThreshold: e.CIRCUIT_FAILURE_THRESHOLD,
      coolDownMs: e.CIRCUIT_COOLDOWN_MS,
    },
    dedup: {
      windowMs: e.DEDUP_WINDOW_HOURS * 60 * MINUTE_MS,
      threshold: e.DEDUP_THRESHOLD,
    },
    search: {
      defaultMaxAgeDays: e.SEARCH_DEFAULT_MAX_AGE_DAYS,
      defaultLimit: e.SEARCH_DEFAULT_LIMIT,
    },
    keywordCount: e.KEYWORD_COUNT,
    news: {
      language: e.NEWS_LANGUAGE,
      country: e.NEWS_COUNTRY,
      articlePageMaxLinks: e.ARTICLE_PAGE_MAX_LINKS,
    },
    discovery: {
      lookbackDays: e.DISCOVERY_LOOKBACK_DAYS,
      minOccurrences: e.DISCOVERY_MIN_OCCURRENCES,
      maxDomains: e.DISCOVERY_MAX_DOMAINS,
    },
  };
}

// ── Data files ───────────────────────────────────────────────

const FeedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  category: z.string().min(1).default("general"),
  active: z.boolean().default(true),
});

export type FeedSource = z.infer<typeof FeedSourceSchema>;

const FeedsFileSchema = z.object({ feeds: z.array(FeedSourceSchema) });

const TopicsFileSchema = z.object({
  groups: z.array(
    z.object({
      category: z.string().min(1),
      priority: z.number().int().positive(),
      queries: z.array(z.string().min(1)),
    }),
  ),
});

function readJson<S extends z.ZodTypeAny>(path: string, schema: S): z.infer<S> {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

/** Every feed listed in the file, inactive ones included. */
export function readFeedFile(path: string = FEEDS_PATH): FeedSource[] {
  return readJson(path, FeedsFileSchema).feeds;
}

export function loadDefaultTopics(path: string = TOPICS_PATH): DefaultTopicGroup[] {
  return readJson(path, TopicsFileSchema).groups;
}
