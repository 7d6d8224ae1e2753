import {
  CircuitOpenError,
  DependencyFailedError,
  errorMessage,
  ResourceExhaustedError,
  RunAbortedError,
} from "../errors.js";
import { toIssue, type EscalationPolicy } from "../escalation/escalation-policy.js";
import { compareIds } from "../graph/task-graph.js";
import { PRIORITY_RANK, type Priority, type Task, type TaskGraph, type TaskStatus } from "../graph/types.js";
import type { ProgressMonitor } from "../monitor/progress-monitor.js";
import type { WorkerLease, WorkerPool } from "../pool/worker-pool.js";
import type { Issue, ResourceBudget } from "../types.js";
import { log as rootLog } from "../utils/logger.js";
import type { TaskResult } from "../workers/types.js";
import { TaskStateTable } from "./task-state.js";
import type { SchedulerHooks, SchedulerOptions, SchedulerOutcome, SchedulerRunOptions } from "./types.js";

const log = rootLog.child("scheduler");

const ABORTED = "run aborted";
const DEPENDENCY_FAILED = "dependency failed";

type RunState = {
  graph: TaskGraph;
  tasks: Map<string, Task>;
  context: Record<string, unknown>;
  table: TaskStateTable;
  controller: AbortController;
  signal: AbortSignal;
};

/** Higher priority first, then id. */
function dispatchOrder(a: Task, b: Task): number {
  return PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] || compareIds(a.id, b.id);
}

/**
 * Runs a levelled graph one level at a time. Tasks inside a level run
 * concurrently, bounded by the pool; the next level starts only when every
 * task of the current one is terminal.
 */
export class Scheduler {
  private pool: WorkerPool;
  private monitor: ProgressMonitor;
  private policy: EscalationPolicy;
  private skipReportFloor: Priority;
  private budget: ResourceBudget;
  private hooks: SchedulerHooks;

  private run?: RunState;
  private results = new Map<string, TaskResult>();
  private issues: Issue[] = [];
  private costUsed = 0;

  constructor(opts: SchedulerOptions) {
    this.pool = opts.pool;
    this.monitor = opts.monitor;
    this.policy = opts.policy;
    this.skipReportFloor = opts.config.scheduler.skipReportFloor;
    this.budget = opts.budget ?? {};
    this.hooks = opts.hooks ?? {};
  }

  async execute(graph: TaskGraph, context: Record<string, unknown>, opts?: SchedulerRunOptions): Promise<SchedulerOutcome> {
    if (this.run) throw new Error("Scheduler has already executed a graph");

    const controller = new AbortController();
    const sources = [controller.signal, this.pool.signal];
    if (opts?.signal) sources.push(opts.signal);
    const signal = AbortSignal.any(sources);

    const run: RunState = {
      graph,
      tasks: new Map(graph.tasks.map((t) => [t.id, t])),
      context,
      table: new TaskStateTable(graph.tasks.map((t) => t.id)),
      controller,
      signal,
    };
    this.run = run;

    for (const [index, level] of graph.levels.entries()) {
      if (signal.aborted) break;
      const tasks = level.map((id) => this.task(id)).sort(dispatchOrder);
      log.debug(`Level ${index}: dispatching ${tasks.length} task(s)`, { tasks: tasks.map((t) => t.id) });
      await Promise.all(tasks.map((task) => this.dispatch(task, signal)));
    }

    for (const id of run.table.idsWith("pending")) {
      this.finish(id, "skipped", ABORTED);
    }

    // Cost and escalation aborts reported their issue when they fired.
    if (signal.aborted && !controller.signal.aborted) {
      const reason: unknown = signal.reason;
      const err = reason instanceof ResourceExhaustedError || reason instanceof RunAbortedError
        ? reason
        : new RunAbortedError(`Run cancelled: ${errorMessage(reason)}`, { cause: reason });
      this.report(toIssue(err, this.policy.classify(err)));
      log.warn("Run aborted", { reason: errorMessage(reason) });
    }

    return this.outcome();
  }

  /**
   * Run a failed task again as a whole. Dependents already skipped because
   * of the failure stay skipped.
   */
  async retryTask(taskId: string): Promise<TaskStatus> {
    const run = this.state();
    run.signal.throwIfAborted();

    const task = this.task(taskId);
    run.table.reopen(taskId);
    this.monitor.onStart(taskId);
    this.hooks.onTaskStart?.(taskId);
    log.info(`Retrying task "${taskId}"`);

    await this.perform(task, run.signal, true);
    return run.table.status(taskId);
  }

  outcome(): SchedulerOutcome {
    const run = this.state();
    const states: Record<string, TaskStatus> = {};
    for (const task of run.graph.tasks) states[task.id] = run.table.status(task.id);

    return {
      states,
      results: new Map(this.results),
      issues: [...this.issues],
      aborted: run.signal.aborted,
      ...(run.signal.aborted ? { abortReason: run.signal.reason } : {}),
      costUsed: this.costUsed,
      workerCalls: this.pool.totalCalls(),
    };
  }

  private async dispatch(task: Task, signal: AbortSignal): Promise<void> {
    const { table } = this.state();
    if (signal.aborted) {
      this.finish(task.id, "skipped", ABORTED);
      return;
    }

    const unmet = task.dependencies.filter((dep) => table.status(dep) !== "completed");
    if (unmet.length > 0) {
      this.skipForDependencies(task, unmet);
      return;
    }

    if (!this.reserveCost(task)) return;
    await this.perform(task, signal, false);
  }

  private async perform(task: Task, signal: AbortSignal, running: boolean): Promise<void> {
    const { context } = this.state();

    let lease: WorkerLease;
    try {
      lease = await this.pool.acquire(task.capability, signal);
    } catch (err) {
      if (signal.aborted) this.finish(task.id, "skipped", ABORTED);
      else this.fail(task, err);
      return;
    }

    try {
      if (!running) this.start(task);
      const result = await lease.proxy.execute(task, context, { signal });
      this.results.set(task.id, result);
      this.finish(task.id, "completed");
    } catch (err) {
      if (signal.aborted) this.finish(task.id, "skipped", ABORTED);
      else this.fail(task, err);
    } finally {
      lease.release();
    }
  }

  private skipForDependencies(task: Task, unmet: string[]): void {
    this.finish(task.id, "skipped", DEPENDENCY_FAILED);
    if (PRIORITY_RANK[task.priority] < PRIORITY_RANK[this.skipReportFloor]) {
      log.debug(`Task "${task.id}" skipped silently`, { unmet });
      return;
    }
    const err = new DependencyFailedError(task.id, unmet);
    const decision = this.policy.classify(err, task);
    this.report(toIssue(err, decision, task.id));
    if (decision.action === "escalate") {
      this.abort(new RunAbortedError(`Critical task "${task.id}" cannot run`, { cause: err }));
    }
  }

  /** Charge the task's cost against the budget; false (and abort) when it does not fit. */
  private reserveCost(task: Task): boolean {
    const max = this.budget.maxCost;
    const next = this.costUsed + task.estimatedCost;
    if (max !== undefined && next > max) {
      const err = new ResourceExhaustedError(
        "cost",
        `Dispatching task "${task.id}" would use ${next} cost units, over the budget of ${max}`,
      );
      this.finish(task.id, "skipped", ABORTED);
      this.report(toIssue(err, this.policy.classify(err, task), task.id));
      this.abort(err);
      return false;
    }
    this.costUsed = next;
    return true;
  }

  private fail(task: Task, err: unknown): void {
    const { table } = this.state();
    const decision = this.policy.classify(err, task);
    // A task no worker ever saw is skipped rather than failed.
    const refused = err instanceof CircuitOpenError && err.attempt === 1;
    const status: TaskStatus = table.status(task.id) === "running" && !refused ? "failed" : "skipped";

    log.warn(`Task "${task.id}" ${status}: ${errorMessage(err)}`, { action: decision.action });
    this.finish(task.id, status, errorMessage(err), err);
    this.report(toIssue(err, decision, task.id));

    if (decision.action === "escalate") {
      this.abort(new RunAbortedError(`Escalated failure of task "${task.id}"`, { cause: err }));
    }
  }

  private start(task: Task): void {
    this.state().table.transition(task.id, "running");
    this.monitor.onStart(task.id);
    this.hooks.onTaskStart?.(task.id);
  }

  private finish(taskId: string, status: TaskStatus, reason?: string, error?: unknown): void {
    this.state().table.transition(taskId, status, reason);
    if (status === "completed") this.monitor.onComplete(taskId);
    else if (status === "failed") this.monitor.onFail(taskId, error);
    else this.monitor.onSkip(taskId);
    this.hooks.onTaskEnd?.(taskId, status);
  }

  private report(issue: Issue): void {
    this.issues.push(issue);
    this.hooks.onIssue?.(issue);
  }

  private abort(reason: unknown): void {
    const { controller } = this.state();
    if (!controller.signal.aborted) controller.abort(reason);
  }

  private task(id: string): Task {
    const task = this.state().tasks.get(id);
    if (!task) throw new Error(`Unknown task "${id}"`);
    return task;
  }

  private state(): RunState {
    if (!this.run) throw new Error("Scheduler has not executed a graph");
    return this.run;
  }
}
