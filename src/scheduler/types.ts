import type { RunConfig } from "../config.js";
import type { EscalationPolicy } from "../escalation/escalation-policy.js";
import type { TaskStatus } from "../graph/types.js";
import type { ProgressMonitor } from "../monitor/progress-monitor.js";
import type { WorkerPool } from "../pool/worker-pool.js";
import type { Issue, ResourceBudget } from "../types.js";
import type { TaskResult } from "../workers/types.js";

export type SchedulerHooks = {
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, status: TaskStatus) => void;
  onIssue?: (issue: Issue) => void;
};

export type SchedulerOptions = {
  pool: WorkerPool;
  monitor: ProgressMonitor;
  policy: EscalationPolicy;
  config: Pick<RunConfig, "scheduler">;
  budget?: ResourceBudget;
  hooks?: SchedulerHooks;
};

export type SchedulerRunOptions = {
  /** Run cancellation; the deadline arrives here as a ResourceExhaustedError reason. */
  signal?: AbortSignal;
};

export type SchedulerOutcome = {
  states: Record<string, TaskStatus>;
  /** Results of completed tasks. */
  results: Map<string, TaskResult>;
  issues: Issue[];
  aborted: boolean;
  abortReason?: unknown;
  costUsed: number;
  workerCalls: number;
};
