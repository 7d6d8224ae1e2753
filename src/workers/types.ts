import type { DeliverableSpec } from "../graph/types.js";

export type FindingSeverity = "low" | "medium" | "high" | "critical";

export type Finding = {
  severity: FindingSeverity;
  message: string;
};

/** Optional quality signals a worker may report alongside its deliverables. */
export type TaskMetrics = {
  errorCount?: number;
  /** Percent, 0 to 100. */
  coverage?: number;
  findings?: Finding[];
};

export type WorkerDeliverable = {
  path: string;
  content: string;
  type?: string;
};

/** Outbound request, one per attempt. */
export type TaskRequest = {
  taskId: string;
  description: string;
  capability: string;
  context: Record<string, unknown>;
  deliverableSpecs: DeliverableSpec[];
  validationCriteria: string[];
  attempt: number;
};

export type TaskResult = {
  status: "success" | "failure";
  deliverables: WorkerDeliverable[];
  validationPassed: boolean;
  errorDetail?: string;
  metrics?: TaskMetrics;
};

export type ExecuteOptions = {
  /** Aborted when the attempt times out or the run is cancelled. */
  signal: AbortSignal;
};
