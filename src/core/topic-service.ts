import { AdapterRegistry } from "./adapter-registry.js";
import { TopicScheduler } from "./topic-scheduler.js";
import { MAX_UPDATE_FREQUENCY_MS, PipelineReport, SourceId, Topic } from "./types.js";
import { TopicFilters, TopicStore } from "../stores/topic-store.js";

export interface TopicDefaults {
  priority: number;
  updateFrequencyMs: number;
  sources: SourceId[];
  category: string;
}

export interface TopicInput {
  query: string;
  priority?: number;
  updateFrequencyMs?: number;
  sources?: SourceId[];
  category?: string;
  active?: boolean;
}

export type TopicPatch = Omit<TopicInput, "query">;

export interface DefaultTopicGroup {
  category: string;
  priority: number;
  queries: string[];
}

export const ON_DEMAND_CATEGORY = "ondemand";

export interface TopicChange {
  topic: Topic;
  created: boolean;
  /** Jobs in effect after the change, or the reason the schedule was kept. */
  schedule: { ok: true; jobs: number } | { ok: false; error: string };
}

export class TopicService {
  constructor(
    private topics: TopicStore,
    private scheduler: TopicScheduler,
    private adapters: AdapterRegistry,
    private defaults: TopicDefaults,
    private now: () => number = Date.now,
  ) {}

  async listTopics(filters?: TopicFilters): Promise<Topic[]> {
    return this.topics.list(filters);
  }

  async getTopic(query: string): Promise<Topic | null> {
    return this.topics.get(query.trim());
  }

  /** Create a topic, or update the given fields if it already exists. */
  async addTopic(input: TopicInput): Promise<TopicChange> {
    const query = normalizeQuery(input.query);
    const existing = await this.topics.get(query);
    const timestamp = new Date(this.now()).toISOString();

    const topic: Topic = existing
      ? this.applyPatch(existing, input, timestamp)
      : this.validated({
          query,
          priority: input.priority ?? this.defaults.priority,
          active: input.active ?? true,
          sources: dedupeSources(input.sources ?? this.defaults.sources),
          updateFrequencyMs: input.updateFrequencyMs ?? this.defaults.updateFrequencyMs,
          category: input.category?.trim() || this.defaults.category,
          createdAt: timestamp,
          updatedAt: timestamp,
        });

    await this.topics.save(topic);
    return { topic, created: !existing, schedule: await this.refresh() };
  }

  async updateTopic(query: string, patch: TopicPatch): Promise<TopicChange> {
    const existing = await this.require(query);
    const topic = this.applyPatch(existing, patch, new Date(this.now()).toISOString());
    await this.topics.save(topic);
    return { topic, created: false, schedule: await this.refresh() };
  }

  /** Flip a topic's active flag, or set it when `active` is given. */
  async toggleTopic(query: string, active?: boolean): Promise<TopicChange> {
    const existing = await this.require(query);
    return this.updateTopic(existing.query, { active: active ?? !existing.active });
  }

  /** Unschedule first so no new pipeline starts, then delete. */
  async removeTopic(query: string): Promise<boolean> {
    const key = query.trim();
    this.scheduler.unschedule(key);
    const removed = await this.topics.delete(key);
    await this.refresh();
    return removed;
  }

  /**
   * Fetch a topic from all of its sources now. An unknown query is first
   * tracked as an on-demand topic at top priority.
   */
  async runTopic(query: string): Promise<{ topic: Topic; created: boolean; reports: PipelineReport[] }> {
    let topic = await this.topics.get(normalizeQuery(query));
    let created = false;
    if (!topic) {
      const change = await this.addTopic({ query, priority: 1, category: ON_DEMAND_CATEGORY });
      topic = change.topic;
      created = true;
    }
    const reports = await this.scheduler.runTopicNow(topic);
    return { topic, created, reports };
  }

  /** Seed the default topic list into an empty store. Returns topics added. */
  async seedDefaults(groups: DefaultTopicGroup[]): Promise<number> {
    const current = await this.topics.list();
    if (current.length > 0) return 0;

    const timestamp = new Date(this.now()).toISOString();
    let added = 0;
    for (const group of groups) {
      for (const query of group.queries) {
        await this.topics.save(
          this.validated({
            query: normalizeQuery(query),
            priority: group.priority,
            active: true,
            sources: dedupeSources(this.defaults.sources),
            updateFrequencyMs: this.defaults.updateFrequencyMs,
            category: group.category,
            createdAt: timestamp,
            updatedAt: timestamp,
          }),
        );
        added++;
      }
    }
    console.error(`[topics] seeded ${added} default topics`);
    return added;
  }

  // ── Internals ───────────────────────────────────────────────

  private async require(query: string): Promise<Topic> {
    const topic = await this.topics.get(query.trim());
    if (!topic) throw new Error(`Topic not found: ${query}`);
    return topic;
  }

  private applyPatch(existing: Topic, patch: TopicPatch, timestamp: string): Topic {
    return this.validated({
      ...existing,
      priority: patch.priority ?? existing.priority,
      active: patch.active ?? existing.active,
      sources: patch.sources ? dedupeSources(patch.sources) : existing.sources,
      updateFrequencyMs: patch.updateFrequencyMs ?? existing.updateFrequencyMs,
      category: patch.category?.trim() || existing.category,
      updatedAt: timestamp,
    });
  }

  private validated(topic: Topic): Topic {
    if (!Number.isInteger(topic.priority) || topic.priority < 1) {
      throw new Error(`Priority must be a positive integer, got ${topic.priority}`);
    }
    if (!Number.isFinite(topic.updateFrequencyMs) || topic.updateFrequencyMs <= 0) {
      throw new Error(`Update frequency must be positive, got ${topic.updateFrequencyMs}`);
    }
    if (topic.updateFrequencyMs > MAX_UPDATE_FREQUENCY_MS) {
      throw new Error(
        `Update frequency must be at most ${MAX_UPDATE_FREQUENCY_MS} ms, got ${topic.updateFrequencyMs}`,
      );
    }
    if (topic.sources.length === 0) {
      throw new Error(`Topic "${topic.query}" needs at least one source`);
    }
    const unknown = topic.sources.filter((s) => !this.adapters.has(s));
    if (unknown.length > 0) {
      const known = this.adapters.all().map((a) => a.source).join(", ");
      throw new Error(`Unknown source(s): ${unknown.join(", ")}. Available: ${known}`);
    }
    return topic;
  }

  private async refresh(): Promise<TopicChange["schedule"]> {
    const result = await this.scheduler.refresh();
    return result.ok
      ? { ok: true, jobs: result.value.length }
      : { ok: false, error: result.error.message };
  }
}

function normalizeQuery(query: string): string {
  const trimmed = query.trim().replace(/\s+/g, " ");
  if (!trimmed) throw new Error("Topic query must not be empty");
  return trimmed;
}

function dedupeSources(sources: SourceId[]): SourceId[] {
  return [...new Set(sources.map((s) => s.trim()).filter(Boolean))];
}
