export type Priority = "critical" | "high" | "medium" | "low";

/** Higher rank = more important. */
export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  critical: 3,
  high: 2,
  medium: 1,
  low: 0,
};

export type DeliverableSpec = {
  path: string;
  type?: string;
  /** Defaults to true: a result without this path is invalid. */
  required?: boolean;
};

export type Task = {
  readonly id: string;
  readonly description: string;
  /** Worker type required to run the task, e.g. "code-generator". */
  readonly capability: string;
  readonly dependencies: readonly string[];
  readonly priority: Priority;
  /** Opaque budget units; see `monitor.costUnitMs`. */
  readonly estimatedCost: number;
  readonly deliverableSpecs: readonly DeliverableSpec[];
  readonly validationCriteria: readonly string[];
};

/** What a caller supplies; everything but id, description and capability has a default. */
export type TaskInput = {
  id: string;
  description: string;
  capability: string;
  dependencies?: string[];
  priority?: Priority;
  estimatedCost?: number;
  deliverableSpecs?: DeliverableSpec[];
  validationCriteria?: string[];
};

export type TaskStatus = "pending" | "running" | "completed" | "failed" | "skipped";

export type TaskGraph = {
  readonly id: string;
  readonly tasks: readonly Task[];
  /** Disjoint task-id sets; no task depends on another task in its own or a later level. */
  readonly levels: readonly (readonly string[])[];
  readonly totalEstimatedCost: number;
};
