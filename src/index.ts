import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import cron from "node-cron";
import { resolve } from "node:path";

import { loadConfig, loadDefaultTopics } from "./config.js";
import { AdapterRegistry } from "./core/adapter-registry.js";
import { DedupGateway } from "./core/dedup-gateway.js";
import { ResilienceWrapper } from "./core/resilience.js";
import { SearchEngine } from "./core/search-engine.js";
import { SourceDiscovery } from "./core/source-discovery.js";
import { TopicScheduler } from "./core/topic-scheduler.js";
import { TopicService } from "./core/topic-service.js";
import { ArticleStore, InMemoryArticleStore, PgArticleStore } from "./stores/article-store.js";
import { JsonTopicStore, PgTopicStore, TopicStore } from "./stores/topic-store.js";
import { FeedStore } from "./stores/feed-store.js";
import { GoogleNewsAdapter } from "./adapters/google-news.js";
import { RssFeedsAdapter } from "./adapters/rss.js";
import { ArticlePageAdapter } from "./adapters/article-page.js";
import { HttpFeedProber } from "./adapters/feed-probe.js";
import { closeDb, getDb } from "./db/index.js";
import { ensureSchema } from "./db/migrate.js";
import { registerTools } from "./mcp/tools.js";
import { registerResources } from "./mcp/resources.js";

const config = loadConfig();
const feeds = new FeedStore(config.feedsFile);

// ── Adapter registry ────────────────────────────────────────────

const adapters = new AdapterRegistry();
const googleNews = new GoogleNewsAdapter(config.news);
adapters.register(googleNews);
adapters.register(new RssFeedsAdapter(feeds));
adapters.register(new ArticlePageAdapter(googleNews, config.news.articlePageMaxLinks));

// ── Stores (PostgreSQL when configured, local files otherwise) ──

let articleStore: ArticleStore;
let topicStore: TopicStore;
if (config.databaseUrl) {
  getDb(config.databaseUrl);
  articleStore = new PgArticleStore();
  topicStore = new PgTopicStore();
} else {
  articleStore = new InMemoryArticleStore();
  topicStore = new JsonTopicStore(resolve(config.dataDir, "topics.json"));
}

// ── Core services ───────────────────────────────────────────────

const resilience = new ResilienceWrapper({ retry: config.retry, breaker: config.breaker });
const gateway = new DedupGateway(articleStore, config.dedup);
const scheduler = new TopicScheduler(
  { adapters, resilience, gateway, keywordCount: config.keywordCount },
  topicStore,
  config.scheduler,
);
const topicService = new TopicService(topicStore, scheduler, adapters, config.topicDefaults);
const searchEngine = new SearchEngine(articleStore);
const discovery = new SourceDiscovery(articleStore, feeds, new HttpFeedProber(), {
  ...config.discovery,
  probeTimeoutMs: config.retry.timeoutMs,
});

// ── MCP server ──────────────────────────────────────────────────

const server = new McpServer({
  name: "newswire",
  version: "1.0.0",
});

registerTools(server, {
  topics: topicService,
  scheduler,
  search: searchEngine,
  articles: articleStore,
  discovery,
  searchDefaults: { maxAgeDays: config.search.defaultMaxAgeDays, limit: config.search.defaultLimit },
});
registerResources(server, adapters, feeds);

// ── Start ───────────────────────────────────────────────────────

async function main() {
  if (config.databaseUrl) {
    await ensureSchema();
  } else {
    console.error(`[newswire] DATABASE_URL not set; articles kept in memory, topics in ${config.dataDir}`);
  }

  await topicService.seedDefaults(loadDefaultTopics());

  const started = await scheduler.start();
  if (started.ok) {
    console.error(`[newswire] scheduler started with ${started.value.length} jobs`);
  }

  const refresh = cron.schedule(config.scheduler.refreshCron, async () => {
    try {
      await scheduler.refresh();
    } catch (err) {
      console.error("[newswire] topic refresh failed:", err);
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  async function shutdown() {
    console.error("[newswire] shutting down...");
    refresh.stop();
    scheduler.stop();
    await server.close();
    await closeDb();
    process.exit(0);
  }

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[newswire] shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
