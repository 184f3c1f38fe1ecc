import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonTopicStore } from "./topic-store.js";
import { StoreError } from "../core/errors.js";
import { makeTopic } from "../testing/fakes.js";

describe("JsonTopicStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "newswire-topics-"));
    file = join(dir, "nested", "topics.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists topics across instances", async () => {
    const store = new JsonTopicStore(file);
    await store.save(makeTopic("Bonds", { priority: 3, category: "markets" }));
    await store.save(makeTopic("Gold", { priority: 1, category: "commodities" }));

    expect(existsSync(file)).toBe(true);
    const reopened = new JsonTopicStore(file);
    expect((await reopened.list()).map((t) => t.query)).toEqual(["Gold", "Bonds"]);
    expect(await reopened.get("Bonds")).toEqual(makeTopic("Bonds", { priority: 3, category: "markets" }));
  });

  it("filters by active flag and category", async () => {
    const store = new JsonTopicStore(file);
    await store.save(makeTopic("Bonds", { category: "markets" }));
    await store.save(makeTopic("DAX", { category: "markets", active: false }));
    await store.save(makeTopic("Yen", { category: "currencies" }));

    expect((await store.list({ active: true })).map((t) => t.query)).toEqual(["Bonds", "Yen"]);
    expect((await store.list({ category: "markets", active: false })).map((t) => t.query)).toEqual(["DAX"]);
  });

  it("deletes topics", async () => {
    const store = new JsonTopicStore(file);
    await store.save(makeTopic("Bonds"));

    expect(await store.delete("Bonds")).toBe(true);
    expect(await store.delete("Bonds")).toBe(false);
    expect(await new JsonTopicStore(file).list()).toEqual([]);
  });

  it("refuses to start from an unreadable file", () => {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{ not json");
    expect(() => new JsonTopicStore(broken)).toThrow(StoreError);
  });
});
