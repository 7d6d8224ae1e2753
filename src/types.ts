import type { Deliverable } from "./aggregate/types.js";
import type { DeepPartial, RunConfig } from "./config.js";
import type { Priority, TaskInput } from "./graph/types.js";
import type { Anomaly } from "./monitor/progress-monitor.js";
import type { GateOutcome, QualityGate } from "./validation/types.js";

export type IssueCategory = "timeout" | "invalid-result" | "dependency" | "resource-exhausted" | "merge-conflict";

export type RecoveryAction = "retry" | "skip" | "escalate";

/** One itemised problem, with the recovery action the escalation policy chose. */
export type Issue = {
  taskId?: string;
  category: IssueCategory;
  severity: Priority;
  description: string;
  action: RecoveryAction;
  resolution: string;
  errorCode: string;
};

export type ResourceBudget = {
  /** Wall-clock budget for the whole run. */
  timeMs?: number;
  /** Ceiling on the summed estimatedCost of dispatched tasks. */
  maxCost?: number;
};

export type ExecuteRequest = {
  taskGraph: { id?: string; tasks: TaskInput[] };
  contextData: Record<string, unknown>;
  qualityGates: QualityGate[];
  resourceBudget?: ResourceBudget;
  config?: DeepPartial<RunConfig>;
};

export type RunStatus = "completed" | "partial" | "failed";

export type ResourceUsage = {
  elapsedMs: number;
  costUsed: number;
  /** Worker calls made, retries included. */
  workerCalls: number;
  budget: ResourceBudget;
};

export type ExecuteResponse = {
  runId: string;
  graphId: string;
  status: RunStatus;
  levels: string[][];
  completedTaskIds: string[];
  failedTaskIds: string[];
  skippedTaskIds: string[];
  deliverables: Deliverable[];
  validationResults: GateOutcome[];
  validationWarnings: string[];
  issues: Issue[];
  anomalies: Anomaly[];
  resourceUsage: ResourceUsage;
  startedAt: number;
  finishedAt: number;
};

export type ProgressUpdate = {
  runId: string;
  percentage: number;
  tasksInProgress: number;
  /** Ready to run, waiting for a worker slot. */
  tasksPending: number;
  /** Waiting on a dependency that has not completed. */
  tasksBlocked: number;
  estimatedRemainingMs: number;
};
