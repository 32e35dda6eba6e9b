import { CategoryResult } from "../types";
import { CategorySource } from "./category";
import { Logger } from "./logger";
import { ReconcileOutcome } from "./reconcile";

export type RunState = "running" | "completed" | "cancelled" | "failed";
export type CategoryState = "pending" | "running" | "ok" | "skipped" | "failed";

export interface RunMetrics {
  categories_total: number;
  categories_completed: number;
  categories_succeeded: number;
  categories_skipped: number;
  categories_failed: number;
  pages_fetched: number;
  records_collected: number;
  records_dropped: number;
}

export interface CategoryProgress {
  category: string;
  url: string;
  state: CategoryState;
  pages: number;
  records: number;
  detail?: string;
}

export interface RunStatus {
  run_id: string;
  state: RunState;
  started_at: string;
  finished_at?: string;
  metrics: RunMetrics;
  categories: CategoryProgress[];
  persistence?: ReconcileOutcome;
}

const zeroMetrics = (total: number): RunMetrics => ({
  categories_total: total,
  categories_completed: 0,
  categories_succeeded: 0,
  categories_skipped: 0,
  categories_failed: 0,
  pages_fetched: 0,
  records_collected: 0,
  records_dropped: 0
});

/**
 * Progress of one harvest run. Workers report here instead of printing; all
 * updates happen on the event loop between awaits, so counters never tear.
 */
export class HarvestProgress {
  private state: RunState = "running";
  private readonly startedAt: Date;
  private finishedAt?: Date;
  private readonly metrics: RunMetrics;
  private readonly categories = new Map<string, CategoryProgress>();
  private persistence?: ReconcileOutcome;

  constructor(
    readonly runId: string,
    sources: CategorySource[],
    private readonly logger: Logger,
    now: Date = new Date()
  ) {
    this.startedAt = now;
    this.metrics = zeroMetrics(sources.length);
    for (const source of sources) {
      this.categories.set(source.url, {
        category: source.name,
        url: source.url,
        state: "pending",
        pages: 0,
        records: 0
      });
    }
  }

  markCategoryStarted(source: CategorySource): void {
    const current = this.categories.get(source.url);
    if (!current) {
      return;
    }
    this.categories.set(source.url, { ...current, state: "running" });
  }

  markCategoryFinished(result: CategoryResult): void {
    const current = this.categories.get(result.source.url);
    if (!current) {
      return;
    }

    this.metrics.categories_completed += 1;
    switch (result.status) {
      case "ok":
        this.metrics.categories_succeeded += 1;
        this.metrics.pages_fetched += result.pages;
        this.metrics.records_collected += result.records.length;
        this.metrics.records_dropped += result.dropped;
        this.categories.set(result.source.url, {
          ...current,
          state: "ok",
          pages: result.pages,
          records: result.records.length
        });
        break;
      case "skipped":
        this.metrics.categories_skipped += 1;
        this.categories.set(result.source.url, { ...current, state: "skipped", detail: result.reason });
        break;
      case "failed":
        this.metrics.categories_failed += 1;
        this.categories.set(result.source.url, {
          ...current,
          state: "failed",
          detail: `${result.stage}: ${result.error}`
        });
        break;
    }

    this.logger.info("category_finished", {
      run_id: this.runId,
      category: result.source.name,
      url: result.source.url,
      status: result.status,
      completed: this.metrics.categories_completed,
      total: this.metrics.categories_total
    });
  }

  markPersistence(outcome: ReconcileOutcome): void {
    this.persistence = outcome;
  }

  markFinished(state: Exclude<RunState, "running">, now: Date = new Date()): void {
    this.state = state;
    this.finishedAt = now;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  snapshot(): RunStatus {
    return {
      run_id: this.runId,
      state: this.state,
      started_at: this.startedAt.toISOString(),
      ...(this.finishedAt ? { finished_at: this.finishedAt.toISOString() } : {}),
      metrics: { ...this.metrics },
      categories: [...this.categories.values()].map((entry) => ({ ...entry })),
      ...(this.persistence ? { persistence: this.persistence } : {})
    };
  }
}
