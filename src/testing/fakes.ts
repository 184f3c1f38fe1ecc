import { FetchAdapter, FetchOptions, RawRecord, SourceCost, SourceId, Topic } from "../core/types.js";
import { TopicFilters, TopicStore } from "../stores/topic-store.js";

type FetchImpl = (query: string, options: FetchOptions) => Promise<RawRecord[]>;

/** Scriptable adapter that records every query it was asked for. */
export class FakeAdapter implements FetchAdapter {
  readonly displayName: string;
  calls: string[] = [];

  constructor(
    readonly source: SourceId,
    private impl: FetchImpl = async () => [],
    readonly cost: SourceCost = "light",
    readonly maxConcurrency = 4,
  ) {
    this.displayName = `Fake ${source}`;
  }

  async fetch(query: string, options: FetchOptions): Promise<RawRecord[]> {
    this.calls.push(query);
    return this.impl(query, options);
  }
}

/** A promise whose settlement the test controls. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class MemoryTopicStore implements TopicStore {
  topics = new Map<string, Topic>();
  failNextList = false;

  async list(filters?: TopicFilters): Promise<Topic[]> {
    if (this.failNextList) {
      this.failNextList = false;
      throw new Error("topic store offline");
    }
    return [...this.topics.values()]
      .filter((t) => filters?.active === undefined || t.active === filters.active)
      .filter((t) => !filters?.category || t.category === filters.category)
      .sort((a, b) => a.priority - b.priority);
  }

  async get(query: string): Promise<Topic | null> {
    return this.topics.get(query) ?? null;
  }

  async save(topic: Topic): Promise<void> {
    this.topics.set(topic.query, topic);
  }

  async delete(query: string): Promise<boolean> {
    return this.topics.delete(query);
  }
}

export function makeTopic(query: string, overrides: Partial<Topic> = {}): Topic {
  return {
    query,
    priority: 5,
    active: true,
    sources: ["alpha"],
    updateFrequencyMs: 60_000,
    category: "general",
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/** Let every pending promise callback run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
