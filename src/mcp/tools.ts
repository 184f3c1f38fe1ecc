import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "../core/errors.js";
import { SearchEngine } from "../core/search-engine.js";
import { SourceDiscovery } from "../core/source-discovery.js";
import { TopicScheduler } from "../core/topic-scheduler.js";
import { TopicService } from "../core/topic-service.js";
import { MAX_UPDATE_FREQUENCY_MS } from "../core/types.js";
import { ArticleStore } from "../stores/article-store.js";
import {
  renderArticles,
  renderReports,
  renderSourceStats,
  renderStatus,
  renderSuggestions,
  renderTopicChange,
  renderTopicList,
} from "./render.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_FREQUENCY_MINUTES = Math.floor(MAX_UPDATE_FREQUENCY_MS / 60_000);

export interface ToolDeps {
  topics: TopicService;
  scheduler: TopicScheduler;
  search: SearchEngine;
  articles: ArticleStore;
  discovery: SourceDiscovery;
  searchDefaults: { maxAgeDays: number; limit: number };
}

function text(body: string) {
  return { content: [{ type: "text" as const, text: body }] };
}

function failure(err: unknown) {
  return { content: [{ type: "text" as const, text: `Error: ${errorMessage(err)}` }], isError: true };
}

const topicFields = {
  priority: z.number().int().min(1).optional().describe("1 = highest priority"),
  update_frequency_minutes: z
    .number()
    .positive()
    .max(MAX_FREQUENCY_MINUTES)
    .optional()
    .describe(`How often each source is polled (at most ${MAX_FREQUENCY_MINUTES} minutes)`),
  sources: z.array(z.string()).optional().describe("Source ids (google_news, rss, article_page)"),
  category: z.string().optional().describe("Grouping label, e.g. markets or economy"),
};

function frequencyMs(minutes: number | undefined): number | undefined {
  return minutes === undefined ? undefined : Math.round(minutes * 60_000);
}

export function registerTools(server: McpServer, deps: ToolDeps): void {
  const { topics, scheduler, search, articles, discovery, searchDefaults } = deps;

  // ── list_topics ───────────────────────────────────────────────

  server.tool(
    "list_topics",
    "List tracked news topics with their priority, schedule and sources.",
    {
      active: z.boolean().optional().describe("Only active (true) or inactive (false) topics"),
      category: z.string().optional().describe("Filter by category"),
    },
    async (params) => {
      try {
        const list = await topics.listTopics({ active: params.active, category: params.category });
        return text(renderTopicList(list));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── add_topic ─────────────────────────────────────────────────

  server.tool(
    "add_topic",
    "Track a new news topic, or update an existing one with the given fields.",
    {
      query: z.string().min(1).describe("Search query that defines the topic"),
      ...topicFields,
    },
    async (params) => {
      try {
        const change = await topics.addTopic({
          query: params.query,
          priority: params.priority,
          updateFrequencyMs: frequencyMs(params.update_frequency_minutes),
          sources: params.sources,
          category: params.category,
        });
        return text(renderTopicChange(change, change.created ? "Added" : "Updated"));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── update_topic ──────────────────────────────────────────────

  server.tool(
    "update_topic",
    "Change priority, frequency, sources or category of a tracked topic.",
    {
      query: z.string().min(1).describe("Query of the topic to update"),
      ...topicFields,
    },
    async (params) => {
      try {
        const change = await topics.updateTopic(params.query, {
          priority: params.priority,
          updateFrequencyMs: frequencyMs(params.update_frequency_minutes),
          sources: params.sources,
          category: params.category,
        });
        return text(renderTopicChange(change, "Updated"));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── toggle_topic ──────────────────────────────────────────────

  server.tool(
    "toggle_topic",
    "Activate or deactivate a topic. Without `active`, flips the current state.",
    {
      query: z.string().min(1).describe("Query of the topic"),
      active: z.boolean().optional().describe("Desired state"),
    },
    async (params) => {
      try {
        const change = await topics.toggleTopic(params.query, params.active);
        return text(renderTopicChange(change, change.topic.active ? "Activated" : "Deactivated"));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── remove_topic ──────────────────────────────────────────────

  server.tool(
    "remove_topic",
    "Stop tracking a topic. Stored articles are kept.",
    {
      query: z.string().min(1).describe("Query of the topic to remove"),
    },
    async (params) => {
      try {
        const removed = await topics.removeTopic(params.query);
        return text(removed ? `Removed topic "${params.query}".` : `Topic not found: ${params.query}`);
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── run_topic ─────────────────────────────────────────────────

  server.tool(
    "run_topic",
    "Fetch a topic from all of its sources right now. Unknown queries are tracked as on-demand topics.",
    {
      query: z.string().min(1).describe("Topic query"),
    },
    async (params) => {
      try {
        const { topic, created, reports } = await topics.runTopic(params.query);
        const head = created ? `Tracking new on-demand topic "${topic.query}".\n` : "";
        return text(`${head}Ran "${topic.query}":\n${renderReports(reports)}`);
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── search_news ───────────────────────────────────────────────

  server.tool(
    "search_news",
    "Search stored articles, ranked by recency and keyword matches in title and body.",
    {
      query: z.string().describe("Text to look for in titles and bodies"),
      max_age_days: z.number().positive().optional().describe(`Only articles this recent (default ${searchDefaults.maxAgeDays})`),
      sources: z.array(z.string()).optional().describe("Only these sources"),
      limit: z.number().int().min(1).max(100).optional().describe(`Max results (default ${searchDefaults.limit})`),
      fetch_if_empty: z
        .boolean()
        .optional()
        .describe("When nothing matches, fetch the query from all sources once and search again"),
    },
    async (params) => {
      try {
        const options = {
          maxAgeDays: params.max_age_days ?? searchDefaults.maxAgeDays,
          sources: params.sources,
          limit: params.limit ?? searchDefaults.limit,
        };
        let results = await search.search(params.query, options);
        let note = "";
        if (results.length === 0 && params.fetch_if_empty && params.query.trim()) {
          const { reports } = await topics.runTopic(params.query);
          const inserted = reports.reduce((sum, r) => sum + r.inserted, 0);
          note = `Fetched on demand: ${inserted} new articles.\n\n`;
          results = await search.search(params.query, options);
        }
        return text(note + renderArticles(results));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── get_status ────────────────────────────────────────────────

  server.tool(
    "get_status",
    "Scheduler, worker pool and per-source health: circuit state, failures and ingestion counters.",
    {},
    async () => {
      try {
        const [total, recent] = await Promise.all([articles.count(), articles.countRecent(DAY_MS)]);
        return text(renderStatus(scheduler.status(), total, recent));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── source_stats ──────────────────────────────────────────────

  server.tool(
    "source_stats",
    "Article counts per source with the oldest and newest publication dates.",
    {
      days: z.number().positive().optional().describe("Only articles published in the last N days"),
    },
    async (params) => {
      try {
        const since = params.days ? new Date(Date.now() - params.days * DAY_MS) : undefined;
        return text(renderSourceStats(await articles.countBySource(since)));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── suggest_sources ───────────────────────────────────────────

  server.tool(
    "suggest_sources",
    "Find publishers that appear often in stored articles but have no RSS feed configured, and check their sites for feeds.",
    {
      days: z.number().int().positive().optional().describe("Count articles ingested in the last N days"),
      min_occurrences: z.number().int().positive().optional().describe("Articles a domain needs to be checked"),
      max_domains: z.number().int().min(1).max(50).optional().describe("Most domains to check"),
    },
    async (params) => {
      try {
        const suggestions = await discovery.suggest({
          lookbackDays: params.days,
          minOccurrences: params.min_occurrences,
          maxDomains: params.max_domains,
        });
        return text(renderSuggestions(suggestions));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── add_feed ──────────────────────────────────────────────────

  server.tool(
    "add_feed",
    "Add an RSS feed to the list polled by the rss source.",
    {
      url: z.string().min(1).describe("Feed URL"),
      name: z.string().optional().describe("Display name (defaults to the host)"),
      category: z.string().optional().describe("Grouping label (defaults to discovered)"),
    },
    async (params) => {
      try {
        const { added, feed } = discovery.addFeed(params);
        return text(
          added ? `Added feed ${feed.name} (${feed.category}): ${feed.url}` : `Feed already listed: ${feed.url}`,
        );
      } catch (err) {
        return failure(err);
      }
    },
  );
}
