import { randomUUID } from "node:crypto";
import { aggregate } from "./aggregate/result-aggregator.js";
import type { AggregatedResult, TaskOutput } from "./aggregate/types.js";
import { resolveRunConfig } from "./config.js";
import {
  CycleError,
  errorMessage,
  MergeConflictError,
  ResourceExhaustedError,
  RunAbortedError,
  UnknownDependencyError,
} from "./errors.js";
import { EscalationPolicy, toIssue } from "./escalation/escalation-policy.js";
import { createTaskGraph } from "./graph/task-graph.js";
import type { TaskGraph, TaskStatus } from "./graph/types.js";
import { ProgressMonitor } from "./monitor/progress-monitor.js";
import type { RunStore } from "./persistence/store.js";
import { WorkerPool } from "./pool/worker-pool.js";
import { Scheduler } from "./scheduler/scheduler.js";
import type { SchedulerOutcome } from "./scheduler/types.js";
import { ExecuteRequestSchema, parseOrThrow, TaskGraphInputSchema } from "./schemas.js";
import type { ExecuteRequest, ExecuteResponse, Issue, ProgressUpdate, RunStatus } from "./types.js";
import { systemClock, type Clock } from "./utils/clock.js";
import { log } from "./utils/logger.js";
import type { GateOutcome, GatePredicate } from "./validation/types.js";
import { ValidationPipeline } from "./validation/validation-pipeline.js";
import { WorkerRegistry } from "./workers/registry.js";
import type { Worker } from "./workers/worker.js";

export type RunCallbacks = {
  onProgress?: (update: ProgressUpdate) => void;
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, status: TaskStatus) => void;
  onIssue?: (issue: Issue) => void;
};

export type ExecuteOptions = {
  /** Use a caller-chosen run id, e.g. one already handed out to an API client. */
  runId?: string;
  signal?: AbortSignal;
  callbacks?: RunCallbacks;
};

export type OrchestratorOptions = {
  registry?: WorkerRegistry;
  runStore?: RunStore;
  clock?: Clock;
  /** Predicates available to `custom-predicate` quality gates. */
  predicates?: Record<string, GatePredicate>;
};

type Validation = {
  outcomes: GateOutcome[];
  warnings: string[];
  passed: boolean;
};

export class Orchestrator {
  readonly workers: WorkerRegistry;
  private runStore?: RunStore;
  private clock: Clock;
  private pipeline: ValidationPipeline;
  private active = new Map<string, AbortController>();

  constructor(opts?: OrchestratorOptions) {
    this.workers = opts?.registry ?? new WorkerRegistry();
    this.runStore = opts?.runStore;
    this.clock = opts?.clock ?? systemClock;
    this.pipeline = new ValidationPipeline({ predicates: opts?.predicates });
  }

  addWorker(worker: Worker): void {
    this.workers.add(worker);
  }

  /** Validate and level a task graph without running anything. */
  levels(input: unknown): TaskGraph {
    const { id, tasks } = parseOrThrow(TaskGraphInputSchema, input);
    return createTaskGraph(tasks, id);
  }

  /** Ids of runs currently executing. */
  activeRuns(): string[] {
    return [...this.active.keys()];
  }

  async execute(input: unknown, opts?: ExecuteOptions): Promise<ExecuteResponse> {
    const request: ExecuteRequest = parseOrThrow(ExecuteRequestSchema, input);
    const config = resolveRunConfig(request.config);
    const runId = opts?.runId ?? randomUUID();
    const graphId = request.taskGraph.id ?? randomUUID();
    const startedAt = this.clock.now();
    const policy = new EscalationPolicy(config.escalation);

    let graph: TaskGraph;
    try {
      graph = createTaskGraph(request.taskGraph.tasks, graphId);
    } catch (err) {
      if (!(err instanceof CycleError || err instanceof UnknownDependencyError)) throw err;
      log.warn(`Run ${runId} rejected: ${err.message}`);
      const issue = toIssue(err, policy.classify(err));
      opts?.callbacks?.onIssue?.(issue);
      return this.finalize(this.rejected(runId, graphId, request, issue, startedAt));
    }

    log.info(`Run ${runId} started`, { graphId, tasks: graph.tasks.length, levels: graph.levels.length });

    const controller = new AbortController();
    this.active.set(runId, controller);
    const signal = opts?.signal ? AbortSignal.any([controller.signal, opts.signal]) : controller.signal;

    const monitor = new ProgressMonitor(graph, {
      clock: this.clock,
      anomalyFactor: config.monitor.anomalyFactor,
      costUnitMs: config.monitor.costUnitMs,
    });
    const pool = new WorkerPool({ registry: this.workers, config, clock: this.clock });
    const scheduler = new Scheduler({
      pool,
      monitor,
      policy,
      config,
      budget: request.resourceBudget,
      hooks: {
        onTaskStart: opts?.callbacks?.onTaskStart,
        onTaskEnd: opts?.callbacks?.onTaskEnd,
        onIssue: opts?.callbacks?.onIssue,
      },
    });

    const timeMs = request.resourceBudget?.timeMs;
    const deadline = timeMs !== undefined
      ? setTimeout(() => {
          controller.abort(new ResourceExhaustedError("time", `Run exceeded its time budget of ${timeMs}ms`));
        }, timeMs)
      : undefined;

    const onProgress = opts?.callbacks?.onProgress;
    const ticker = onProgress
      ? setInterval(() => onProgress(monitor.snapshot(runId)), config.monitor.progressIntervalMs)
      : undefined;

    let outcome: SchedulerOutcome;
    try {
      outcome = await scheduler.execute(graph, request.contextData, { signal });
    } finally {
      clearTimeout(deadline);
      clearInterval(ticker);
      pool.shutdown();
      this.active.delete(runId);
    }

    const issues = [...outcome.issues];
    const { aggregated, conflict } = this.aggregate(graph, outcome, policy, issues, opts?.callbacks);
    const validation: Validation = conflict
      ? { outcomes: [], warnings: ["Quality gates not evaluated: deliverables are in conflict"], passed: false }
      : this.validate(aggregated, request);

    const ids = (status: TaskStatus) => graph.tasks.filter((t) => outcome.states[t.id] === status).map((t) => t.id);
    const completedTaskIds = ids("completed");
    const status = runStatus({
      aborted: outcome.aborted,
      conflict,
      gatesPassed: validation.passed,
      completed: completedTaskIds.length,
      total: graph.tasks.length,
    });

    onProgress?.(monitor.snapshot(runId));

    const finishedAt = this.clock.now();
    return this.finalize({
      runId,
      graphId,
      status,
      levels: graph.levels.map((level) => [...level]),
      completedTaskIds,
      failedTaskIds: ids("failed"),
      skippedTaskIds: ids("skipped"),
      deliverables: aggregated.deliverables,
      validationResults: validation.outcomes,
      validationWarnings: validation.warnings,
      issues,
      anomalies: [...monitor.anomalies],
      resourceUsage: {
        elapsedMs: finishedAt - startedAt,
        costUsed: outcome.costUsed,
        workerCalls: outcome.workerCalls,
        budget: request.resourceBudget ?? {},
      },
      startedAt,
      finishedAt,
    });
  }

  /** Cancel every active run and close worker connections. */
  shutdown(): void {
    for (const controller of this.active.values()) {
      controller.abort(new RunAbortedError("Orchestrator shut down"));
    }
    this.active.clear();
    this.workers.closeAll();
  }

  private aggregate(
    graph: TaskGraph,
    outcome: SchedulerOutcome,
    policy: EscalationPolicy,
    issues: Issue[],
    callbacks: RunCallbacks | undefined,
  ): { aggregated: AggregatedResult; conflict: boolean } {
    const outputs: TaskOutput[] = [];
    for (const task of graph.tasks) {
      const result = outcome.results.get(task.id);
      if (result && outcome.states[task.id] === "completed") {
        outputs.push({ taskId: task.id, result, hasValidationCriteria: task.validationCriteria.length > 0 });
      }
    }

    try {
      return { aggregated: aggregate(outputs), conflict: false };
    } catch (err) {
      if (!(err instanceof MergeConflictError)) throw err;
      log.warn(err.message);
      const issue = toIssue(err, policy.classify(err));
      issues.push(issue);
      callbacks?.onIssue?.(issue);
      return { aggregated: err.partial, conflict: true };
    }
  }

  private validate(aggregated: AggregatedResult, request: ExecuteRequest): Validation {
    const outcomes = this.pipeline.evaluate(aggregated, request.qualityGates);
    const summary = this.pipeline.summarize(outcomes);
    for (const failure of summary.failures) {
      if (failure.blocking) log.warn(failure.message);
    }
    return { outcomes, warnings: summary.warnings, passed: summary.passed };
  }

  private rejected(
    runId: string,
    graphId: string,
    request: ExecuteRequest,
    issue: Issue,
    startedAt: number,
  ): ExecuteResponse {
    const finishedAt = this.clock.now();
    return {
      runId,
      graphId,
      status: "failed",
      levels: [],
      completedTaskIds: [],
      failedTaskIds: [],
      skippedTaskIds: [],
      deliverables: [],
      validationResults: [],
      validationWarnings: [],
      issues: [issue],
      anomalies: [],
      resourceUsage: {
        elapsedMs: finishedAt - startedAt,
        costUsed: 0,
        workerCalls: 0,
        budget: request.resourceBudget ?? {},
      },
      startedAt,
      finishedAt,
    };
  }

  private finalize(response: ExecuteResponse): ExecuteResponse {
    log.info(`Run ${response.runId} ${response.status}`, {
      completed: response.completedTaskIds.length,
      failed: response.failedTaskIds.length,
      skipped: response.skippedTaskIds.length,
      issues: response.issues.length,
    });
    if (this.runStore) {
      try {
        this.runStore.insert(response);
      } catch (err) {
        log.error("Failed to persist run", { runId: response.runId, error: errorMessage(err) });
      }
    }
    return response;
  }
}

export function runStatus(facts: {
  aborted: boolean;
  conflict: boolean;
  gatesPassed: boolean;
  completed: number;
  total: number;
}): RunStatus {
  if (facts.aborted || facts.conflict || !facts.gatesPassed) return "failed";
  if (facts.total > 0 && facts.completed === 0) return "failed";
  return facts.completed === facts.total ? "completed" : "partial";
}

