import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AdapterRegistry } from "./adapter-registry.js";
import { DedupGateway } from "./dedup-gateway.js";
import { runPipeline, PipelineDeps } from "./ingest-pipeline.js";
import { ResilienceWrapper } from "./resilience.js";
import { InMemoryArticleStore } from "../stores/article-store.js";
import { FakeAdapter } from "../testing/fakes.js";

describe("runPipeline", () => {
  let store: InMemoryArticleStore;
  let adapters: AdapterRegistry;
  let deps: PipelineDeps;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new InMemoryArticleStore();
    adapters = new AdapterRegistry();
    deps = {
      adapters,
      resilience: new ResilienceWrapper({
        retry: { maxRetries: 1, baseDelayMs: 0, jitterMs: 0, timeoutMs: 1000 },
        breaker: { failureThreshold: 5, coolDownMs: 1000 },
        sleep: async () => {},
      }),
      gateway: new DedupGateway(store, { windowMs: 86_400_000, threshold: 0.85 }),
      keywordCount: 3,
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches, normalizes and stores records tagged with the topic", async () => {
    adapters.register(
      new FakeAdapter("alpha", async () => [
        { link: "https://example.com/oil", title: "Oil output cut extended", description: "Producers extend output cuts" },
        { title: "No link at all" },
        { link: "https://example.com/gold", title: "Gold steadies", search_key: "metals" },
      ]),
    );

    const report = await runPipeline(deps, "commodities", "alpha");

    expect(report).toEqual({
      topicQuery: "commodities",
      source: "alpha",
      fetched: 3,
      inserted: 2,
      updated: 0,
      suppressed: 0,
      invalid: 1,
      storeFailures: 0,
    });
    const oil = await store.getByUrl("https://example.com/oil");
    expect(oil?.searchKey).toBe("commodities");
    expect(oil?.tags).toEqual(["output", "extended", "producers"]);
    expect((await store.getByUrl("https://example.com/gold"))?.searchKey).toBe("metals");
  });

  it("reports a failed fetch without storing anything", async () => {
    adapters.register(
      new FakeAdapter("alpha", async () => {
        throw new Error("HTTP 502");
      }),
    );

    const report = await runPipeline(deps, "commodities", "alpha");

    expect(report.fetched).toBe(0);
    expect(report.error).toBe("exhausted: alpha failed after 2 attempts: HTTP 502");
    expect(await store.count()).toBe(0);
  });

  it("rejects a non-list payload without retrying", async () => {
    const adapter = new FakeAdapter("alpha", async () => JSON.parse('{"items": []}'));
    adapters.register(adapter);

    const report = await runPipeline(deps, "commodities", "alpha");

    expect(adapter.calls).toEqual(["commodities"]);
    expect(report.error).toBe("invalid_response: alpha returned object, expected a list");
  });
});
