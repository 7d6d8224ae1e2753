import type { Finding, TaskResult } from "../workers/types.js";

export type ValidationStatus = "passed" | "failed" | "skipped";

export type Deliverable = {
  taskId: string;
  path: string;
  content: string;
  /** sha256 of the content, hex. */
  contentHash: string;
  type?: string;
  validationStatus: ValidationStatus;
};

/** A completed task's result together with what the aggregator needs to know about the task. */
export type TaskOutput = {
  taskId: string;
  result: TaskResult;
  hasValidationCriteria: boolean;
};

export type AggregatedMetrics = {
  errorCount: number;
  /** Mean of the coverage values reported; undefined when none were. */
  coverage?: number;
  findings: Array<Finding & { taskId: string }>;
};

export type AggregatedResult = {
  /** Sorted by path; exactly one entry per path. */
  deliverables: Deliverable[];
  metrics: AggregatedMetrics;
  taskIds: string[];
};
