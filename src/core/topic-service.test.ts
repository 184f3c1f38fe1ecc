import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AdapterRegistry } from "./adapter-registry.js";
import { DedupGateway } from "./dedup-gateway.js";
import { ResilienceWrapper } from "./resilience.js";
import { TopicScheduler } from "./topic-scheduler.js";
import { ON_DEMAND_CATEGORY, TopicService } from "./topic-service.js";
import { InMemoryArticleStore } from "../stores/article-store.js";
import { FakeAdapter, MemoryTopicStore, makeTopic } from "../testing/fakes.js";

const NOW = Date.parse("2024-06-01T12:00:00Z");
const LATER = NOW + 60_000;

describe("TopicService", () => {
  let clock: number;
  let topics: MemoryTopicStore;
  let articles: InMemoryArticleStore;
  let alpha: FakeAdapter;
  let scheduler: TopicScheduler;
  let service: TopicService;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    clock = NOW;
    topics = new MemoryTopicStore();
    articles = new InMemoryArticleStore(() => clock);
    alpha = new FakeAdapter("alpha", async (query) => [
      { url: `https://example.com/${encodeURIComponent(query)}`, title: `Latest on ${query}` },
    ]);
    const adapters = new AdapterRegistry();
    adapters.register(alpha);
    adapters.register(new FakeAdapter("beta"));

    scheduler = new TopicScheduler(
      {
        adapters,
        resilience: new ResilienceWrapper({
          retry: { maxRetries: 0, baseDelayMs: 0, jitterMs: 0, timeoutMs: 1000 },
          breaker: { failureThreshold: 3, coolDownMs: 1000 },
        }),
        gateway: new DedupGateway(articles, { windowMs: 86_400_000, threshold: 0.85 }),
      },
      topics,
      { workerLimit: 2, staggerWindowMs: 0, lowPriorityThreshold: 5, now: () => clock },
    );
    service = new TopicService(
      topics,
      scheduler,
      adapters,
      { priority: 5, updateFrequencyMs: 900_000, sources: ["alpha", "beta"], category: "general" },
      () => clock,
    );
  });

  afterEach(() => {
    scheduler.stop();
    vi.restoreAllMocks();
  });

  it("adds a topic with defaults and schedules it", async () => {
    const change = await service.addTopic({ query: "  Monetary   Policy " });

    expect(change.created).toBe(true);
    expect(change.topic).toEqual({
      query: "Monetary Policy",
      priority: 5,
      active: true,
      sources: ["alpha", "beta"],
      updateFrequencyMs: 900_000,
      category: "general",
      createdAt: new Date(NOW).toISOString(),
      updatedAt: new Date(NOW).toISOString(),
    });
    expect(change.schedule).toEqual({ ok: true, jobs: 2 });
    expect(scheduler.isScheduled("Monetary Policy")).toBe(true);
  });

  it("updates an existing topic instead of duplicating it", async () => {
    await service.addTopic({ query: "Gold", priority: 4 });
    clock = LATER;
    const change = await service.addTopic({ query: "Gold", category: "commodities" });

    expect(change.created).toBe(false);
    expect(change.topic).toMatchObject({
      priority: 4,
      category: "commodities",
      createdAt: new Date(NOW).toISOString(),
      updatedAt: new Date(LATER).toISOString(),
    });
    expect(await service.listTopics()).toHaveLength(1);
  });

  it("validates priority, frequency, query and sources", async () => {
    await expect(service.addTopic({ query: "Oil", priority: 0 })).rejects.toThrow(
      "Priority must be a positive integer, got 0",
    );
    await expect(service.addTopic({ query: "Oil", updateFrequencyMs: -1 })).rejects.toThrow(
      "Update frequency must be positive, got -1",
    );
    await expect(service.addTopic({ query: "Oil", updateFrequencyMs: 30 * 24 * 60 * 60 * 1000 })).rejects.toThrow(
      "Update frequency must be at most 2147483647 ms, got 2592000000",
    );
    await expect(service.addTopic({ query: "   " })).rejects.toThrow("Topic query must not be empty");
    await expect(service.addTopic({ query: "Oil", sources: ["alpha", "gamma"] })).rejects.toThrow(
      "Unknown source(s): gamma. Available: alpha, beta",
    );
    expect(await service.listTopics()).toEqual([]);
  });

  it("toggles a topic and drops its jobs while inactive", async () => {
    await service.addTopic({ query: "Yen", sources: ["alpha"] });

    const off = await service.toggleTopic("Yen");
    expect(off.topic.active).toBe(false);
    expect(off.schedule).toEqual({ ok: true, jobs: 0 });

    const on = await service.toggleTopic("Yen", true);
    expect(on.topic.active).toBe(true);
    expect(scheduler.isScheduled("Yen")).toBe(true);
  });

  it("updates fields of an existing topic", async () => {
    await service.addTopic({ query: "Brent" });
    const change = await service.updateTopic("Brent", { priority: 2, sources: ["beta", "beta"], updateFrequencyMs: 60_000 });

    expect(change.topic).toMatchObject({ priority: 2, sources: ["beta"], updateFrequencyMs: 60_000 });
    await expect(service.updateTopic("Nope", { priority: 1 })).rejects.toThrow("Topic not found: Nope");
  });

  it("removes a topic and its jobs", async () => {
    await service.addTopic({ query: "Copper" });

    expect(await service.removeTopic("Copper")).toBe(true);
    expect(scheduler.isScheduled("Copper")).toBe(false);
    expect(await service.getTopic("Copper")).toBeNull();
    expect(await service.removeTopic("Copper")).toBe(false);
  });

  it("runs an unknown query as a new on-demand topic", async () => {
    const { topic, created, reports } = await service.runTopic("Silver");

    expect(created).toBe(true);
    expect(topic).toMatchObject({ query: "Silver", priority: 1, category: ON_DEMAND_CATEGORY });
    expect(alpha.calls).toEqual(["Silver"]);
    expect(reports.map((r) => [r.source, r.inserted])).toEqual([
      ["alpha", 1],
      ["beta", 0],
    ]);
    expect(await articles.count()).toBe(1);
  });

  it("runs an inactive topic on request", async () => {
    await service.addTopic({ query: "Wages", active: false, sources: ["alpha"] });
    const { created, reports } = await service.runTopic("Wages");

    expect(created).toBe(false);
    expect(reports).toHaveLength(1);
    expect(alpha.calls).toEqual(["Wages"]);
  });

  it("seeds default topics only into an empty store", async () => {
    const groups = [
      { category: "markets", priority: 3, queries: ["Bonds", "DAX"] },
      { category: "currencies", priority: 7, queries: ["USD"] },
    ];

    expect(await service.seedDefaults(groups)).toBe(3);
    const seeded = await service.listTopics();
    expect(seeded.map((t) => [t.query, t.category, t.priority])).toEqual([
      ["Bonds", "markets", 3],
      ["DAX", "markets", 3],
      ["USD", "currencies", 7],
    ]);

    expect(await service.seedDefaults(groups)).toBe(0);
    expect(await service.listTopics({ category: "markets" })).toHaveLength(2);
  });

  it("leaves existing topics alone when seeding", async () => {
    await topics.save(makeTopic("Custom"));
    expect(await service.seedDefaults([{ category: "markets", priority: 3, queries: ["Bonds"] }])).toBe(0);
  });
});
