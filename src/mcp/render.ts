import { FeedSource } from "../config.js";
import { SourceDescriptor } from "../core/adapter-registry.js";
import { SourceSuggestion } from "../core/source-discovery.js";
import { SchedulerStatus } from "../core/topic-scheduler.js";
import { TopicChange } from "../core/topic-service.js";
import { PipelineReport, ScoredArticle, SourceStat, Topic } from "../core/types.js";

const SNIPPET_LENGTH = 300;

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen).trimEnd() + "…";
}

function minutes(ms: number): string {
  return `${Math.round(ms / 60_000)} min`;
}

export function renderArticles(articles: ScoredArticle[]): string {
  if (articles.length === 0) return "No matching articles found.";

  return articles
    .map(
      (a, i) =>
        `[${i + 1}] ${a.title}\n` +
        `    Source: ${a.source} | Score: ${a.score.toFixed(2)}\n` +
        `    Link: ${a.url}\n` +
        `    Date: ${a.publishedAt.toISOString()}\n` +
        (a.tags.length > 0 ? `    Tags: ${a.tags.join(", ")}\n` : "") +
        `    ${truncate(a.body, SNIPPET_LENGTH)}`,
    )
    .join("\n\n");
}

export function renderTopicList(topics: Topic[]): string {
  if (topics.length === 0) return "No topics configured.";

  return topics
    .map(
      (t) =>
        `• ${t.query} [${t.category}]\n` +
        `  Priority: ${t.priority} | Active: ${t.active} | Every ${minutes(t.updateFrequencyMs)} | ` +
        `Sources: ${t.sources.join(", ")}`,
    )
    .join("\n");
}

export function renderTopicChange(change: TopicChange, verb: string): string {
  const { topic, schedule } = change;
  const head = `${verb} topic "${topic.query}" (priority ${topic.priority}, ${topic.active ? "active" : "inactive"}).`;
  return schedule.ok
    ? `${head}\nScheduler now runs ${schedule.jobs} jobs.`
    : `${head}\nWarning: schedule unchanged: ${schedule.error}`;
}

export function renderReports(reports: PipelineReport[]): string {
  if (reports.length === 0) return "No sources ran (all skipped or already in flight).";

  return reports
    .map((r) => {
      const line =
        `• ${r.source}: ${r.fetched} fetched, ${r.inserted} new, ${r.updated} updated, ` +
        `${r.suppressed} duplicates, ${r.invalid} invalid`;
      return r.error ? `${line}\n  Error: ${r.error}` : line;
    })
    .join("\n");
}

export function renderStatus(status: SchedulerStatus, articleCount: number, recentCount: number): string {
  const lines = [
    `Scheduler: ${status.running ? "running" : "stopped"} | Jobs: ${status.jobs.length} | ` +
      `Workers: ${status.workers.busy}/${status.workers.limit} busy, ${status.workers.waiting} waiting`,
    `Articles: ${articleCount} stored, ${recentCount} ingested in the last 24h`,
  ];
  if (status.lastScheduleError) {
    lines.push(`Last schedule error: ${status.lastScheduleError}`);
  }

  lines.push("", "Sources:");
  for (const s of status.sources) {
    const circuit = s.health?.circuit;
    const state = circuit ? `${circuit.state} (${circuit.consecutiveFailures} consecutive failures)` : "closed";
    lines.push(
      `• ${s.source}: circuit ${state}`,
      `  Runs: ${s.runs} (${s.failedRuns} failed) | Inserted: ${s.inserted} | Updated: ${s.updated} | ` +
        `Duplicates: ${s.suppressed} | Invalid: ${s.invalid} | Store failures: ${s.storeFailures}`,
    );
    if (s.health && (s.health.exhausted > 0 || s.health.circuitOpen > 0 || s.health.timeouts > 0)) {
      lines.push(
        `  Exhausted: ${s.health.exhausted} | Circuit refusals: ${s.health.circuitOpen} | Timeouts: ${s.health.timeouts}`,
      );
    }
    const lastError = s.lastError ?? s.health?.lastError;
    if (lastError) lines.push(`  Last error: ${lastError}`);
  }
  return lines.join("\n");
}

export function renderSourceStats(stats: SourceStat[]): string {
  if (stats.length === 0) return "No articles stored yet.";

  return stats
    .map(
      (s) =>
        `• ${s.source}: ${s.count} articles` +
        (s.firstPublishedAt && s.lastPublishedAt
          ? ` (${s.firstPublishedAt.toISOString()} → ${s.lastPublishedAt.toISOString()})`
          : ""),
    )
    .join("\n");
}

export function renderSources(sources: SourceDescriptor[], feeds: FeedSource[]): string {
  const adapters = sources
    .map((s) => `• ${s.displayName} [source: "${s.source}"] cost: ${s.cost}, max concurrency: ${s.maxConcurrency}`)
    .join("\n");
  const feedLines = feeds.map((f) => `  - ${f.name} (${f.category}): ${f.url}`).join("\n");
  return `# Sources\n${adapters}\n\n# RSS feeds polled by "rss"\n${feedLines || "  (none)"}`;
}

export function renderSuggestions(suggestions: SourceSuggestion[]): string {
  if (suggestions.length === 0) return "No new feeds found.";

  return suggestions
    .map(
      (s) =>
        `• ${s.domain} (${s.references} articles)\n` +
        s.feeds.map((f) => `  - ${f.title}: ${f.url}`).join("\n"),
    )
    .join("\n");
}
