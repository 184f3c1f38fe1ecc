import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DedupGateway } from "./dedup-gateway.js";
import { StoreError } from "./errors.js";
import { Article, UpsertResult } from "./types.js";
import { InMemoryArticleStore } from "../stores/article-store.js";

const HOUR_MS = 60 * 60 * 1000;

function article(url: string, title: string, body = ""): Article {
  return {
    url,
    title,
    body,
    publishedAt: new Date("2024-05-01T08:00:00Z"),
    source: "rss",
    tags: [],
  };
}

describe("DedupGateway", () => {
  let clock: number;
  let store: InMemoryArticleStore;
  let gateway: DedupGateway;

  beforeEach(() => {
    clock = Date.parse("2024-05-01T09:00:00Z");
    store = new InMemoryArticleStore(() => clock);
    gateway = new DedupGateway(store, { windowMs: 24 * HOUR_MS, threshold: 0.85, now: () => clock });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("upserts the same URL in place", async () => {
    expect(await gateway.upsert(article("https://example.com/a", "Oil climbs", "first"))).toEqual({
      status: "inserted",
      url: "https://example.com/a",
    });
    expect(await gateway.upsert(article("https://example.com/a", "Oil climbs further", "second"))).toEqual({
      status: "updated",
      url: "https://example.com/a",
    });

    expect(await store.count()).toBe(1);
    const stored = await store.getByUrl("https://example.com/a");
    expect(stored?.title).toBe("Oil climbs further");
    expect(stored?.body).toBe("second");
    expect(stored?.id).toBe(1);
  });

  it("suppresses a near-duplicate title from another URL", async () => {
    await gateway.upsert(article("https://a.example.com/fed", "Fed Raises Rates Again"));
    const outcome = await gateway.upsert(article("https://b.example.com/fed", "Fed Raises Interest Rates Again"));

    expect(outcome).toEqual({
      status: "suppressed",
      url: "https://b.example.com/fed",
      duplicateOf: "https://a.example.com/fed",
      similarity: 1,
    });
    expect(await store.count()).toBe(1);
  });

  it("inserts dissimilar titles", async () => {
    await gateway.upsert(article("https://example.com/1", "Oil prices slump"));
    const outcome = await gateway.upsert(article("https://example.com/2", "Gold hits record"));
    expect(outcome.status).toBe("inserted");
    expect(await store.count()).toBe(2);
  });

  it("keeps a longer headline that merely starts with a stored short title", async () => {
    await gateway.upsert(article("https://example.com/oil", "Oil prices"));
    const outcome = await gateway.upsert(
      article("https://example.com/opec", "Oil prices slump after OPEC agrees record output increase"),
    );
    expect(outcome.status).toBe("inserted");
    expect(await store.count()).toBe(2);
  });

  it("only compares against titles ingested within the window", async () => {
    await gateway.upsert(article("https://a.example.com/fed", "Fed Raises Rates Again"));
    clock += 25 * HOUR_MS;
    const outcome = await gateway.upsert(article("https://b.example.com/fed", "Fed Raises Rates Again"));
    expect(outcome.status).toBe("inserted");
  });

  it("lets only one of two concurrent near-duplicates through", async () => {
    const outcomes = await Promise.all([
      gateway.upsert(article("https://a.example.com/x", "ECB cuts rates by a quarter point")),
      gateway.upsert(article("https://b.example.com/x", "ECB cuts rates by a quarter point")),
    ]);

    expect(outcomes.map((o) => o.status).sort()).toEqual(["inserted", "suppressed"]);
    expect(await store.count()).toBe(1);
  });

  it("keeps going when a single upsert fails", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const original = store.upsertByUrl.bind(store);
    vi.spyOn(store, "upsertByUrl").mockImplementation(async (a: Article): Promise<UpsertResult> => {
      if (a.url.endsWith("/broken")) throw new StoreError("unavailable", "connection reset");
      return original(a);
    });

    const outcome = await gateway.ingestBatch([
      article("https://example.com/one", "Copper demand rises"),
      article("https://example.com/broken", "Wheat futures slide"),
      article("https://example.com/three", "Yen weakens past 150"),
      article("https://example.com/one", "Copper demand rises"),
    ]);

    expect(outcome).toEqual({ inserted: 2, updated: 1, suppressed: 0, failed: 1 });
    expect(error).toHaveBeenCalledWith(
      "[dedup] store unavailable for https://example.com/broken: connection reset",
    );
  });
});
