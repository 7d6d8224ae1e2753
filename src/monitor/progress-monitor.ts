import { errorMessage } from "../errors.js";
import type { TaskGraph } from "../graph/types.js";
import type { ProgressUpdate } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { log as rootLog } from "../utils/logger.js";

const log = rootLog.child("monitor");

/** A task that ran much longer than its cost estimate suggested. Informational only. */
export type Anomaly = {
  taskId: string;
  estimatedMs: number;
  actualMs: number;
  /** actualMs / estimatedMs */
  ratio: number;
};

export type ProgressMonitorOptions = {
  clock?: Clock;
  anomalyFactor?: number;
  costUnitMs?: number;
};

type Outcome = "completed" | "failed" | "skipped";

type Timing = {
  startedAt?: number;
  finishedAt?: number;
  outcome?: Outcome;
};

export class ProgressMonitor {
  private graph: TaskGraph;
  private clock: Clock;
  private anomalyFactor: number;
  private costUnitMs: number;
  private timings = new Map<string, Timing>();
  private estimates = new Map<string, number>();
  private found: Anomaly[] = [];

  constructor(graph: TaskGraph, opts?: ProgressMonitorOptions) {
    this.graph = graph;
    this.clock = opts?.clock ?? systemClock;
    this.anomalyFactor = opts?.anomalyFactor ?? 2;
    this.costUnitMs = opts?.costUnitMs ?? 1_000;
    for (const task of graph.tasks) {
      this.timings.set(task.id, {});
      this.estimates.set(task.id, task.estimatedCost * this.costUnitMs);
    }
  }

  get anomalies(): readonly Anomaly[] {
    return this.found;
  }

  onStart(taskId: string): void {
    const timing = this.timing(taskId);
    timing.startedAt = this.clock.now();
    timing.finishedAt = undefined;
    timing.outcome = undefined;
  }

  onComplete(taskId: string): void {
    const timing = this.finish(taskId, "completed");
    if (timing.startedAt === undefined) return;

    const estimatedMs = this.estimatedMs(taskId);
    const actualMs = (timing.finishedAt ?? timing.startedAt) - timing.startedAt;
    if (estimatedMs > 0 && actualMs > this.anomalyFactor * estimatedMs) {
      const anomaly: Anomaly = { taskId, estimatedMs, actualMs, ratio: actualMs / estimatedMs };
      this.found.push(anomaly);
      log.info(`Task "${taskId}" ran ${anomaly.ratio.toFixed(1)}x over its estimate`, { estimatedMs, actualMs });
    }
  }

  onFail(taskId: string, error: unknown): void {
    this.finish(taskId, "failed");
    log.debug(`Task "${taskId}" failed`, { error: errorMessage(error) });
  }

  onSkip(taskId: string): void {
    this.finish(taskId, "skipped");
  }

  progressPercentage(): number {
    const total = this.timings.size;
    if (total === 0) return 100;
    let terminal = 0;
    for (const timing of this.timings.values()) {
      if (timing.outcome) terminal++;
    }
    return Math.floor((terminal / total) * 100);
  }

  /**
   * Remaining time in ms: the estimate of every unfinished task, scaled by
   * how far actual durations have drifted from estimates so far.
   */
  estimatedCompletion(): number {
    const ratios: number[] = [];
    let remainingMs = 0;

    for (const [taskId, timing] of this.timings) {
      const estimatedMs = this.estimatedMs(taskId);
      if (!timing.outcome) {
        remainingMs += estimatedMs;
        continue;
      }
      if (
        timing.outcome === "completed" &&
        estimatedMs > 0 &&
        timing.startedAt !== undefined &&
        timing.finishedAt !== undefined
      ) {
        ratios.push((timing.finishedAt - timing.startedAt) / estimatedMs);
      }
    }

    const drift = ratios.length > 0 ? ratios.reduce((a, b) => a + b, 0) / ratios.length : 1;
    return Math.round(remainingMs * drift);
  }

  snapshot(runId: string): ProgressUpdate {
    let inProgress = 0;
    let pending = 0;
    let blocked = 0;

    for (const task of this.graph.tasks) {
      const timing = this.timing(task.id);
      if (timing.outcome) continue;
      if (timing.startedAt !== undefined) {
        inProgress++;
        continue;
      }
      const ready = task.dependencies.every((dep) => this.timing(dep).outcome === "completed");
      if (ready) pending++;
      else blocked++;
    }

    return {
      runId,
      percentage: this.progressPercentage(),
      tasksInProgress: inProgress,
      tasksPending: pending,
      tasksBlocked: blocked,
      estimatedRemainingMs: this.estimatedCompletion(),
    };
  }

  /** Wall-clock duration of a finished task, if it ever started. */
  durationOf(taskId: string): number | undefined {
    const { startedAt, finishedAt } = this.timing(taskId);
    return startedAt !== undefined && finishedAt !== undefined ? finishedAt - startedAt : undefined;
  }

  private estimatedMs(taskId: string): number {
    return this.estimates.get(taskId) ?? 0;
  }

  private finish(taskId: string, outcome: Outcome): Timing {
    const timing = this.timing(taskId);
    timing.finishedAt = this.clock.now();
    timing.outcome = outcome;
    return timing;
  }

  private timing(taskId: string): Timing {
    const timing = this.timings.get(taskId);
    if (!timing) throw new Error(`Unknown task "${taskId}"`);
    return timing;
  }
}
