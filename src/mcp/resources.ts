import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { AdapterRegistry } from "../core/adapter-registry.js";
import { FeedList } from "../adapters/rss.js";
import { renderSources } from "./render.js";

const SOURCES_URI = "newswire://sources";

export function registerResources(server: McpServer, adapters: AdapterRegistry, feeds: FeedList): void {
  server.resource(
    "sources",
    SOURCES_URI,
    {
      description:
        "Registered news sources with their cost class and concurrency cap, plus the RSS feeds " +
        "polled by the rss source. Use the source ids when adding or updating topics.",
      mimeType: "text/markdown",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: renderSources(adapters.describeAll(), feeds.active()),
          mimeType: "text/markdown",
        },
      ],
    }),
  );
}
