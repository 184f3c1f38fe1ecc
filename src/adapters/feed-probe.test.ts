import { describe, it, expect, vi, afterEach } from "vitest";
import { HttpFeedProber, advertisedFeeds } from "./feed-probe.js";

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Wire Headlines</title>
    <link>https://wire.example.com</link>
    <description>Top stories</description>
    <item>
      <title>Copper hits two-year high</title>
      <link>https://wire.example.com/copper</link>
    </item>
  </channel>
</rss>`;

const EMPTY_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Nothing yet</title>
    <link>https://wire.example.com</link>
    <description>Empty</description>
  </channel>
</rss>`;

const HOMEPAGE = `<html><head>
  <link rel="stylesheet" href="/style.css">
  <link rel="alternate" type="application/rss+xml" title="Wire Top Stories" href="/rss/top.xml">
  <link rel="alternate" type="application/atom+xml" href="https://wire.example.com/atom.xml">
  <link rel="alternate" hreflang="de" href="https://wire.example.com/de/">
</head><body></body></html>`;

function stubFetch(pages: Record<string, string>) {
  const fetchMock = vi.fn(async (url: string) =>
    url in pages ? new Response(pages[url]) : new Response("not found", { status: 404 }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const signal = () => new AbortController().signal;

describe("advertisedFeeds", () => {
  it("resolves RSS and Atom alternate links against the page URL", () => {
    expect(advertisedFeeds(HOMEPAGE, "https://wire.example.com/")).toEqual([
      { url: "https://wire.example.com/rss/top.xml", title: "Wire Top Stories" },
      { url: "https://wire.example.com/atom.xml", title: "" },
    ]);
  });
});

describe("HttpFeedProber", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("keeps advertised feeds that parse with items", async () => {
    stubFetch({ "https://wire.example.com/": HOMEPAGE, "https://wire.example.com/rss/top.xml": FEED });

    expect(await new HttpFeedProber().probe("wire.example.com", signal())).toEqual([
      { url: "https://wire.example.com/rss/top.xml", title: "Wire Top Stories" },
    ]);
  });

  it("falls back to common paths and stops at the first feed", async () => {
    const fetchMock = stubFetch({ "https://wire.example.com/": "<html></html>", "https://wire.example.com/rss": FEED });

    expect(await new HttpFeedProber().probe("wire.example.com", signal())).toEqual([
      { url: "https://wire.example.com/rss", title: "Wire Headlines" },
    ]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://wire.example.com/",
      "https://wire.example.com/feed",
      "https://wire.example.com/rss",
    ]);
  });

  it("ignores feeds without items", async () => {
    stubFetch({ "https://wire.example.com/": "<html></html>", "https://wire.example.com/feed": EMPTY_FEED });

    expect(await new HttpFeedProber().probe("wire.example.com", signal())).toEqual([]);
  });

  it("reports a site that cannot be reached", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(new HttpFeedProber().probe("down.example.com", signal())).rejects.toThrow("fetch failed");
  });
});
