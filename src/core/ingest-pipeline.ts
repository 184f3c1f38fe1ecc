import { AdapterRegistry } from "./adapter-registry.js";
import { DedupGateway } from "./dedup-gateway.js";
import { FetchError } from "./errors.js";
import { normalizeBatch } from "./normalizer.js";
import { ResilienceWrapper } from "./resilience.js";
import { PipelineReport, RawRecord, SourceId } from "./types.js";

export interface PipelineDeps {
  adapters: AdapterRegistry;
  resilience: ResilienceWrapper;
  gateway: DedupGateway;
  keywordCount?: number;
}

function emptyReport(topicQuery: string, source: SourceId): PipelineReport {
  return {
    topicQuery,
    source,
    fetched: 0,
    inserted: 0,
    updated: 0,
    suppressed: 0,
    invalid: 0,
    storeFailures: 0,
  };
}

/** fetch → normalize → upsert for one (topic, source) pair. */
export async function runPipeline(
  deps: PipelineDeps,
  topicQuery: string,
  source: SourceId,
): Promise<PipelineReport> {
  const report = emptyReport(topicQuery, source);
  const adapter = deps.adapters.get(source);

  const result = await deps.resilience.call(source, async (options): Promise<RawRecord[]> => {
    const records: unknown = await adapter.fetch(topicQuery, options);
    if (!Array.isArray(records)) {
      throw new FetchError("invalid_response", `${source} returned ${typeof records}, expected a list`, source);
    }
    return records;
  });

  if (!result.ok) {
    report.error = `${result.error.kind}: ${result.error.message}`;
    console.error(`[pipeline] "${topicQuery}" via ${source}: ${report.error}`);
    return report;
  }

  report.fetched = result.value.length;
  const { articles, invalid } = normalizeBatch(result.value, source, { keywordCount: deps.keywordCount });
  report.invalid = invalid;
  for (const article of articles) {
    article.searchKey ??= topicQuery;
  }

  const outcome = await deps.gateway.ingestBatch(articles);
  report.inserted = outcome.inserted;
  report.updated = outcome.updated;
  report.suppressed = outcome.suppressed;
  report.storeFailures = outcome.failed;

  console.error(
    `[pipeline] "${topicQuery}" via ${source}: ${report.fetched} fetched, ` +
      `${report.inserted} new, ${report.updated} updated, ${report.suppressed} duplicates, ` +
      `${report.invalid} invalid, ${report.storeFailures} store failures`,
  );
  return report;
}
