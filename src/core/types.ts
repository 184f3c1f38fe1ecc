// ── Sources ───────────────────────────────────────────────────────

export type SourceId = string;

export type SourceCost = "light" | "heavy";

export type RawRecord = Record<string, unknown>;

// ── Article: the atom of the corpus ───────────────────────────────

export interface Article {
  url: string;
  title: string;
  body: string;
  publishedAt: Date;
  source: SourceId;
  searchKey?: string;
  imageUrl?: string;
  tags: string[];
}

export interface StoredArticle extends Article {
  id: number;
  ingestedAt: Date;
}

// ── Topic: a tracked query with scheduling metadata ───────────────

/** Longest delay a Node timer accepts, and the largest value the topics table stores. */
export const MAX_UPDATE_FREQUENCY_MS = 2_147_483_647;

export interface Topic {
  query: string;
  priority: number;
  active: boolean;
  sources: SourceId[];
  updateFrequencyMs: number;
  category: string;
  createdAt: string;
  updatedAt: string;
}

// ── Adapter contract ──────────────────────────────────────────────

export interface FetchOptions {
  signal: AbortSignal;
  deadline: Date;
}

export interface FetchAdapter {
  readonly source: SourceId;
  readonly displayName: string;
  readonly cost: SourceCost;
  readonly maxConcurrency: number;

  fetch(query: string, options: FetchOptions): Promise<RawRecord[]>;
}

// ── Scheduling ────────────────────────────────────────────────────

export interface ScheduledJob {
  topicQuery: string;
  source: SourceId;
  offsetMs: number;
  intervalMs: number;
  nextRunAt: Date;
}

export type CircuitStatus = "closed" | "open" | "half_open";

export interface CircuitState {
  state: CircuitStatus;
  consecutiveFailures: number;
  openedAt: number | null;
}

// ── Results ───────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type UpsertResult = "inserted" | "updated";

export interface PipelineReport {
  topicQuery: string;
  source: SourceId;
  fetched: number;
  inserted: number;
  updated: number;
  suppressed: number;
  invalid: number;
  storeFailures: number;
  error?: string;
}

// ── Query types ───────────────────────────────────────────────────

export interface SearchOptions {
  maxAgeDays: number;
  sources?: SourceId[];
  limit?: number;
}

export interface ScoredArticle extends StoredArticle {
  score: number;
}

export interface SourceStat {
  source: SourceId;
  count: number;
  firstPublishedAt: Date | null;
  lastPublishedAt: Date | null;
}
