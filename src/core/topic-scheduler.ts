import { AdapterRegistry } from "./adapter-registry.js";
import { ScheduleError, errorMessage } from "./errors.js";
import { PipelineDeps, runPipeline } from "./ingest-pipeline.js";
import { SourceHealth } from "./resilience.js";
import { Semaphore } from "./semaphore.js";
import { MAX_UPDATE_FREQUENCY_MS, PipelineReport, Result, ScheduledJob, SourceId, Topic } from "./types.js";
import { TopicStore } from "../stores/topic-store.js";

export interface ScheduleOptions {
  /** Initial runs of all (topic, source) pairs are spread across this window. */
  staggerWindowMs: number;
  /** Topics with a priority number above this skip heavy sources. */
  lowPriorityThreshold: number;
}

export interface TopicSchedulerOptions extends ScheduleOptions {
  workerLimit: number;
  now?: () => number;
}

// ── Pure schedule computation ─────────────────────────────────

export function jobKey(topicQuery: string, source: SourceId): string {
  return `${topicQuery}\u0000${source}`;
}

/**
 * One job per (active topic, eligible source). Pairs are laid out in
 * priority order and given evenly spaced initial offsets, so the most
 * important topics run first and the rest follow across the window.
 */
export function computeSchedule(
  topics: Topic[],
  adapters: AdapterRegistry,
  options: ScheduleOptions,
  now: number = Date.now(),
): ScheduledJob[] {
  const ranked = topics.filter((t) => t.active).sort((a, b) => a.priority - b.priority);
  const pairs: { topic: Topic; source: SourceId }[] = [];

  for (const topic of ranked) {
    if (!Number.isFinite(topic.updateFrequencyMs) || topic.updateFrequencyMs <= 0) {
      throw new ScheduleError(
        `Topic "${topic.query}" has an invalid update frequency: ${topic.updateFrequencyMs}`,
      );
    }
    for (const source of new Set(topic.sources)) {
      if (!adapters.has(source)) {
        throw new ScheduleError(`Topic "${topic.query}" references unknown source "${source}"`);
      }
      if (adapters.get(source).cost === "heavy" && topic.priority > options.lowPriorityThreshold) {
        continue;
      }
      pairs.push({ topic, source });
    }
  }

  const slotMs = pairs.length > 0 ? options.staggerWindowMs / pairs.length : 0;
  return pairs.map(({ topic, source }, slot) => {
    const offsetMs = Math.floor(slot * slotMs);
    return {
      topicQuery: topic.query,
      source,
      offsetMs,
      // topics edited outside the service may exceed what a timer can wait
      intervalMs: Math.min(topic.updateFrequencyMs, MAX_UPDATE_FREQUENCY_MS),
      nextRunAt: new Date(now + offsetMs),
    };
  });
}

// ── Runtime scheduler ─────────────────────────────────────────

interface JobHandle {
  job: ScheduledJob;
  timer: ReturnType<typeof setTimeout> | null;
  interval: ReturnType<typeof setInterval> | null;
}

export interface SourceCounters {
  source: SourceId;
  runs: number;
  failedRuns: number;
  fetched: number;
  inserted: number;
  updated: number;
  suppressed: number;
  invalid: number;
  storeFailures: number;
  lastRunAt?: string;
  lastError?: string;
}

export interface SchedulerStatus {
  running: boolean;
  jobs: (ScheduledJob & { inFlight: boolean })[];
  sources: (SourceCounters & { health?: SourceHealth })[];
  workers: { limit: number; busy: number; waiting: number };
  lastScheduleError: string | null;
}

export class TopicScheduler {
  private handles = new Map<string, JobHandle>();
  private inFlight = new Set<string>();
  private pool: Semaphore;
  private sourceSemaphores = new Map<SourceId, Semaphore>();
  private counters = new Map<SourceId, SourceCounters>();
  private lastScheduleError: string | null = null;
  private running = false;
  private now: () => number;

  constructor(
    private deps: PipelineDeps,
    private topics: TopicStore,
    private options: TopicSchedulerOptions,
  ) {
    this.pool = new Semaphore(options.workerLimit);
    this.now = options.now ?? Date.now;

    for (const adapter of deps.adapters.all()) {
      this.sourceSemaphores.set(adapter.source, new Semaphore(adapter.maxConcurrency));
    }
  }

  // ── Lifecycle ───────────────────────────────────────────────

  async start(): Promise<Result<ScheduledJob[], ScheduleError>> {
    this.running = true;
    return this.refresh();
  }

  stop(): void {
    this.running = false;
    for (const handle of this.handles.values()) this.disarm(handle);
  }

  // ── Job set management ──────────────────────────────────────

  /** Reload topics from the store and recompute the job set. */
  async refresh(): Promise<Result<ScheduledJob[], ScheduleError>> {
    let topics: Topic[];
    try {
      topics = await this.topics.list();
    } catch (err) {
      return this.keepPrevious(new ScheduleError(`Could not load topics: ${errorMessage(err)}`, { cause: err }));
    }
    return this.reschedule(topics);
  }

  /**
   * Replace the job set with the one computed from `topics`. Jobs whose
   * topic, source and interval are unchanged keep their timers; pipelines
   * already running are never interrupted. On failure the previous job set
   * stays in effect.
   */
  reschedule(topics: Topic[]): Result<ScheduledJob[], ScheduleError> {
    let jobs: ScheduledJob[];
    try {
      jobs = computeSchedule(topics, this.deps.adapters, this.options, this.now());
    } catch (err) {
      const error = err instanceof ScheduleError ? err : new ScheduleError(errorMessage(err), { cause: err });
      return this.keepPrevious(error);
    }

    const next = new Map<string, JobHandle>();
    for (const job of jobs) {
      const key = jobKey(job.topicQuery, job.source);
      const existing = this.handles.get(key);
      if (existing && existing.job.intervalMs === job.intervalMs && this.isArmed(existing) === this.running) {
        next.set(key, existing);
        this.handles.delete(key);
        continue;
      }
      if (existing) {
        this.disarm(existing);
        this.handles.delete(key);
      }
      const handle: JobHandle = { job, timer: null, interval: null };
      if (this.running) this.arm(handle);
      next.set(key, handle);
    }

    for (const stale of this.handles.values()) this.disarm(stale);
    this.handles = next;
    this.lastScheduleError = null;
    return { ok: true, value: this.jobs() };
  }

  /** Drop every job of one topic. A pipeline already running finishes. */
  unschedule(topicQuery: string): number {
    let removed = 0;
    for (const [key, handle] of this.handles) {
      if (handle.job.topicQuery !== topicQuery) continue;
      this.disarm(handle);
      this.handles.delete(key);
      removed++;
    }
    return removed;
  }

  isScheduled(topicQuery: string): boolean {
    return this.jobs().some((job) => job.topicQuery === topicQuery);
  }

  jobs(): ScheduledJob[] {
    return [...this.handles.values()].map((h) => ({ ...h.job }));
  }

  // ── Dispatch ────────────────────────────────────────────────

  /**
   * Run every eligible (topic, source) pair of `topic` right away, outside
   * the timers. Works for inactive topics too.
   */
  async runTopicNow(topic: Topic): Promise<PipelineReport[]> {
    const jobs = computeSchedule([{ ...topic, active: true }], this.deps.adapters, {
      ...this.options,
      staggerWindowMs: 0,
    }, this.now());
    const reports = await Promise.all(jobs.map((job) => this.dispatch(job)));
    return reports.filter((r): r is PipelineReport => r !== null);
  }

  /**
   * Run one pipeline through the worker pool. Returns null when the same
   * (topic, source) pair is still running from a previous trigger. A job
   * waiting on its source's cap holds no worker.
   */
  async dispatch(job: ScheduledJob): Promise<PipelineReport | null> {
    const key = jobKey(job.topicQuery, job.source);
    if (this.inFlight.has(key)) {
      console.warn(`[scheduler] skipping "${job.topicQuery}" via ${job.source}: previous run still in flight`);
      return null;
    }

    this.inFlight.add(key);
    try {
      const report = await this.semaphoreFor(job.source).use(() =>
        this.pool.use(() => runPipeline(this.deps, job.topicQuery, job.source)),
      );
      this.record(report);
      return report;
    } catch (err) {
      const report: PipelineReport = {
        topicQuery: job.topicQuery,
        source: job.source,
        fetched: 0,
        inserted: 0,
        updated: 0,
        suppressed: 0,
        invalid: 0,
        storeFailures: 0,
        error: errorMessage(err),
      };
      console.error(`[scheduler] pipeline "${job.topicQuery}" via ${job.source} crashed:`, err);
      this.record(report);
      return report;
    } finally {
      this.inFlight.delete(key);
    }
  }

  // ── Status ──────────────────────────────────────────────────

  status(): SchedulerStatus {
    const health = new Map(this.deps.resilience.healthReport().map((h) => [h.source, h]));
    const sources = new Set<SourceId>([
      ...this.deps.adapters.all().map((a) => a.source),
      ...this.counters.keys(),
    ]);

    return {
      running: this.running,
      jobs: [...this.handles.entries()].map(([key, h]) => ({ ...h.job, inFlight: this.inFlight.has(key) })),
      sources: [...sources].sort().map((source) => ({
        ...this.countersFor(source),
        health: health.get(source),
      })),
      workers: { limit: this.options.workerLimit, busy: this.pool.inUse, waiting: this.pool.waiting },
      lastScheduleError: this.lastScheduleError,
    };
  }

  // ── Internals ───────────────────────────────────────────────

  private keepPrevious(error: ScheduleError): Result<ScheduledJob[], ScheduleError> {
    this.lastScheduleError = error.message;
    console.error(
      `[scheduler] recompute failed, keeping ${this.handles.size} existing jobs: ${error.message}`,
    );
    return { ok: false, error };
  }

  private isArmed(handle: JobHandle): boolean {
    return handle.timer !== null || handle.interval !== null;
  }

  private arm(handle: JobHandle): void {
    const delayMs = Math.max(0, handle.job.nextRunAt.getTime() - this.now());
    handle.timer = setTimeout(() => {
      handle.timer = null;
      this.fire(handle);
      handle.interval = setInterval(() => this.fire(handle), handle.job.intervalMs);
    }, delayMs);
  }

  private disarm(handle: JobHandle): void {
    if (handle.timer) clearTimeout(handle.timer);
    if (handle.interval) clearInterval(handle.interval);
    handle.timer = null;
    handle.interval = null;
  }

  private fire(handle: JobHandle): void {
    const job = handle.job;
    handle.job = { ...job, nextRunAt: new Date(this.now() + job.intervalMs) };
    this.dispatch(job).catch((err) => {
      console.error(`[scheduler] dispatch of "${job.topicQuery}" via ${job.source} failed:`, err);
    });
  }

  private semaphoreFor(source: SourceId): Semaphore {
    let semaphore = this.sourceSemaphores.get(source);
    if (!semaphore) {
      semaphore = new Semaphore(this.deps.adapters.get(source).maxConcurrency);
      this.sourceSemaphores.set(source, semaphore);
    }
    return semaphore;
  }

  private countersFor(source: SourceId): SourceCounters {
    let counters = this.counters.get(source);
    if (!counters) {
      counters = {
        source,
        runs: 0,
        failedRuns: 0,
        fetched: 0,
        inserted: 0,
        updated: 0,
        suppressed: 0,
        invalid: 0,
        storeFailures: 0,
      };
      this.counters.set(source, counters);
    }
    return counters;
  }

  private record(report: PipelineReport): void {
    const counters = this.countersFor(report.source);
    counters.runs++;
    counters.fetched += report.fetched;
    counters.inserted += report.inserted;
    counters.updated += report.updated;
    counters.suppressed += report.suppressed;
    counters.invalid += report.invalid;
    counters.storeFailures += report.storeFailures;
    counters.lastRunAt = new Date(this.now()).toISOString();
    if (report.error) {
      counters.failedRuns++;
      counters.lastError = report.error;
    }
  }
}
