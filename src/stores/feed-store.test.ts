import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FeedStore } from "./feed-store.js";
import { StoreError } from "../core/errors.js";

describe("FeedStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "newswire-feeds-"));
    file = join(dir, "feeds.json");
    writeFileSync(
      file,
      JSON.stringify({
        feeds: [
          { name: "Markets", url: "https://markets.example.com/rss", category: "finance" },
          { name: "Archive", url: "https://archive.example.com/rss", active: false },
        ],
      }),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists active feeds separately from all feeds", () => {
    const store = new FeedStore(file);
    expect(store.all().map((f) => f.name)).toEqual(["Markets", "Archive"]);
    expect(store.active().map((f) => f.name)).toEqual(["Markets"]);
  });

  it("appends new feeds to the file and ignores known URLs", () => {
    const store = new FeedStore(file);
    const feed = { name: "Wire", url: "https://wire.example.com/rss", category: "discovered", active: true };

    expect(store.add(feed)).toBe(true);
    expect(store.add({ ...feed, name: "Wire again" })).toBe(false);

    expect(new FeedStore(file).active().map((f) => f.url)).toEqual([
      "https://markets.example.com/rss",
      "https://wire.example.com/rss",
    ]);
    const written: unknown = JSON.parse(readFileSync(file, "utf-8"));
    expect(written).toMatchObject({ feeds: [{ name: "Markets" }, { name: "Archive", active: false }, { name: "Wire" }] });
  });

  it("fails with a StoreError when the file cannot be read", () => {
    expect(() => new FeedStore(join(dir, "missing.json"))).toThrow(StoreError);
  });
});
