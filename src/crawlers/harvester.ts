import { randomUUID } from "node:crypto";
import { HarvestSettings } from "../config";
import { harvestCategory, PacingPolicy, randomPacing } from "../lib/catalog";
import { CategorySource, toCategorySource } from "../lib/category";
import { CatalogStore, Database } from "../lib/db";
import { resolveCategoryIdentifier } from "../lib/discovery";
import { errorMessage } from "../lib/errors";
import { Logger } from "../lib/logger";
import { reconcileSnapshot, ReconcileOutcome } from "../lib/reconcile";
import { createSessionFactory, HttpSession, SessionFactory } from "../lib/session";
import { HarvestProgress, RunState, RunStatus } from "../lib/status";
import { CategoryResult, CategoryStage, Snapshot } from "../types";

export interface HarvestDeps {
  settings: HarvestSettings;
  store: CatalogStore;
  logger: Logger;
  sessionFactory?: SessionFactory;
  pacing?: PacingPolicy;
  progress?: HarvestProgress;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface HarvestRunSummary {
  run_id: string;
  state: RunState;
  started_at: string;
  finished_at: string;
  categories: {
    total: number;
    succeeded: number;
    skipped: number;
    failed: number;
  };
  snapshot_size: number;
  persistence: ReconcileOutcome;
}

export interface HarvestRunResult {
  summary: HarvestRunSummary;
  snapshot: Snapshot;
  results: CategoryResult[];
}

interface PipelineContext {
  settings: HarvestSettings;
  sessionFactory: SessionFactory;
  pacing: PacingPolicy;
  logger: Logger;
  signal: AbortSignal;
}

export class RunInProgressError extends Error {
  constructor(readonly runId: string) {
    super(`harvest run ${runId} is already in progress`);
    this.name = "RunInProgressError";
  }
}

async function mapLimit<T>(items: T[], limit: number, worker: (item: T) => Promise<void>): Promise<void> {
  if (items.length === 0) {
    return;
  }
  const concurrency = Math.max(1, Math.min(limit, items.length));
  let index = 0;
  const runners = Array.from({ length: concurrency }, async () => {
    while (index < items.length) {
      const item = items[index];
      index += 1;
      await worker(item);
    }
  });
  await Promise.all(runners);
}

export function resolveSources(categoryUrls: string[], logger: Logger): CategorySource[] {
  const seen = new Set<string>();
  const sources: CategorySource[] = [];
  for (const entryUrl of categoryUrls) {
    try {
      const source = toCategorySource(entryUrl);
      if (seen.has(source.url)) {
        continue;
      }
      seen.add(source.url);
      sources.push(source);
    } catch (error) {
      logger.error("category_source_invalid", { url: entryUrl, error: errorMessage(error) });
    }
  }
  return sources;
}

function defaultSessionFactory(settings: HarvestSettings, logger: Logger): SessionFactory {
  return createSessionFactory({
    timeoutMs: settings.timeoutMs,
    retries: settings.retries,
    retryBaseDelayMs: settings.retryBaseDelayMs,
    apiCallerId: settings.apiCallerId,
    storefrontOrigin: settings.storefrontOrigin,
    logger: logger.child("http")
  });
}

function failedResult(source: CategorySource, stage: CategoryStage, error: unknown, signal: AbortSignal): CategoryResult {
  return {
    status: "failed",
    source,
    stage,
    error: errorMessage(error),
    cancelled: signal.aborted
  };
}

/**
 * Discovery, then paginated fetch, for one category. Every outcome, including
 * cancellation, comes back as a CategoryResult.
 */
async function runCategoryPipeline(source: CategorySource, context: PipelineContext): Promise<CategoryResult> {
  const { logger, signal } = context;

  let session: HttpSession;
  let identifier: string;
  try {
    session = context.sessionFactory();
    const outcome = await resolveCategoryIdentifier(session, source, logger, signal);
    if (outcome.status === "missing") {
      return { status: "skipped", source, reason: outcome.reason };
    }
    identifier = outcome.identifier;
  } catch (error) {
    const metadata = { url: source.url, category: source.name, error: errorMessage(error) };
    if (signal.aborted) {
      logger.warn("category_discovery_cancelled", metadata);
    } else {
      logger.error("category_discovery_failed", metadata);
    }
    return failedResult(source, "discovery", error, signal);
  }

  try {
    const harvest = await harvestCategory(session, source, identifier, {
      api: context.settings.api,
      pacing: context.pacing,
      signal,
      logger
    });
    return {
      status: "ok",
      source,
      records: harvest.records,
      pages: harvest.pages,
      dropped: harvest.dropped
    };
  } catch (error) {
    logger.error("category_fetch_failed", {
      url: source.url,
      category: source.name,
      identifier,
      cancelled: signal.aborted,
      error
    });
    return failedResult(source, "fetch", error, signal);
  }
}

function linkAbort(target: AbortController, upstream: AbortSignal | undefined): () => void {
  if (!upstream) {
    return () => undefined;
  }
  const forward = (): void => target.abort();
  if (upstream.aborted) {
    target.abort();
    return () => undefined;
  }
  upstream.addEventListener("abort", forward, { once: true });
  return () => upstream.removeEventListener("abort", forward);
}

export async function runHarvest(deps: HarvestDeps): Promise<HarvestRunResult> {
  const { settings, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const sources = resolveSources(settings.categoryUrls, logger);
  const progress = deps.progress ?? new HarvestProgress(randomUUID(), sources, logger, now());
  const startedAt = progress.snapshot().started_at;

  const controller = new AbortController();
  const unlink = linkAbort(controller, deps.signal);
  const deadline = settings.runTimeoutMs
    ? setTimeout(() => {
        logger.warn("harvest_deadline_reached", { run_id: progress.runId, timeout_ms: settings.runTimeoutMs });
        controller.abort();
      }, settings.runTimeoutMs)
    : null;

  const context: PipelineContext = {
    settings,
    sessionFactory: deps.sessionFactory ?? defaultSessionFactory(settings, logger),
    pacing: deps.pacing ?? randomPacing(settings.delayMinMs, settings.delayMaxMs),
    logger,
    signal: controller.signal
  };

  logger.info("harvest_started", {
    run_id: progress.runId,
    categories: sources.length,
    workers: settings.workers,
    page_size: settings.api.pageSize
  });

  const results: CategoryResult[] = [];
  try {
    await mapLimit(sources, settings.workers, async (source) => {
      progress.markCategoryStarted(source);
      const result = await runCategoryPipeline(source, context);
      results.push(result);
      progress.markCategoryFinished(result);
    });
  } finally {
    if (deadline) {
      clearTimeout(deadline);
    }
    unlink();
  }

  const snapshot: Snapshot = [];
  for (const result of results) {
    if (result.status === "ok") {
      snapshot.push(...result.records);
    }
  }

  const persistence = await reconcileSnapshot(deps.store, snapshot, {
    observedAt: now(),
    logger
  });
  progress.markPersistence(persistence);

  const state: RunState = controller.signal.aborted ? "cancelled" : "completed";
  progress.markFinished(state, now());
  const status = progress.snapshot();

  const summary: HarvestRunSummary = {
    run_id: progress.runId,
    state,
    started_at: startedAt,
    finished_at: status.finished_at ?? now().toISOString(),
    categories: {
      total: status.metrics.categories_total,
      succeeded: status.metrics.categories_succeeded,
      skipped: status.metrics.categories_skipped,
      failed: status.metrics.categories_failed
    },
    snapshot_size: snapshot.length,
    persistence
  };

  const level = persistence.status === "failed" ? "error" : "info";
  logger[level]("harvest_finished", { ...summary });
  return { summary, snapshot, results };
}

export interface HarvesterServiceOptions {
  sessionFactory?: SessionFactory;
  pacing?: PacingPolicy;
}

interface ActiveRun {
  progress: HarvestProgress;
  controller: AbortController;
  done: Promise<HarvestRunResult | null>;
}

export class HarvesterService {
  private active: ActiveRun | null = null;
  private last: HarvestProgress | null = null;

  constructor(
    private readonly settings: HarvestSettings,
    private readonly db: Database,
    private readonly logger: Logger,
    private readonly options: HarvesterServiceOptions = {}
  ) {}

  isRunning(): boolean {
    return this.active !== null;
  }

  startRun(trigger: "manual" | "schedule"): RunStatus {
    if (this.active) {
      throw new RunInProgressError(this.active.progress.runId);
    }

    const sources = resolveSources(this.settings.categoryUrls, this.logger);
    const progress = new HarvestProgress(randomUUID(), sources, this.logger);
    const controller = new AbortController();
    this.logger.info("run_triggered", { run_id: progress.runId, trigger });

    const done = runHarvest({
      settings: this.settings,
      store: this.db,
      logger: this.logger,
      sessionFactory: this.options.sessionFactory,
      pacing: this.options.pacing,
      progress,
      signal: controller.signal
    })
      .catch((error: unknown) => {
        this.logger.error("run_crashed", { run_id: progress.runId, error });
        progress.markFinished("failed");
        return null;
      })
      .finally(() => {
        this.last = progress;
        this.active = null;
      });

    this.active = { progress, controller, done };
    return progress.snapshot();
  }

  getStatus(): RunStatus | null {
    return (this.active?.progress ?? this.last)?.snapshot() ?? null;
  }

  /** Resolves when the active run, if any, has finished. */
  async waitForIdle(): Promise<HarvestRunResult | null> {
    return this.active ? this.active.done : null;
  }

  async health(): Promise<{ ok: boolean; database: "disabled" | "ok" | "unreachable"; running: boolean }> {
    if (!this.db.isEnabled()) {
      return { ok: true, database: "disabled", running: this.isRunning() };
    }
    const reachable = await this.db.healthcheck();
    return { ok: reachable, database: reachable ? "ok" : "unreachable", running: this.isRunning() };
  }

  async stop(): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }
    this.logger.info("run_stop_requested", { run_id: active.progress.runId });
    active.controller.abort();
    await active.done;
  }
}
