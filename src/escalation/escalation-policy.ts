import type { RunConfig } from "../config.js";
import {
  CircuitOpenError,
  CycleError,
  DependencyFailedError,
  InvalidResultError,
  MergeConflictError,
  ResourceExhaustedError,
  RunAbortedError,
  errorMessage,
  StratumError,
  TaskTimeoutError,
  UnknownDependencyError,
  WorkerError,
  WorkerUnavailableError,
} from "../errors.js";
import type { Priority, Task } from "../graph/types.js";
import type { Issue, IssueCategory, RecoveryAction } from "../types.js";

export type Decision = {
  action: RecoveryAction;
  category: IssueCategory;
  severity: Priority;
  /** Why this action was chosen; becomes the Issue's resolution text. */
  reason: string;
};

type Rule = {
  category: IssueCategory;
  action: RecoveryAction;
  /** Structural errors are always critical regardless of the task. */
  structural: boolean;
};

function ruleFor(error: unknown): Rule {
  if (error instanceof CycleError || error instanceof UnknownDependencyError) {
    return { category: "dependency", action: "escalate", structural: true };
  }
  if (error instanceof MergeConflictError) {
    return { category: "merge-conflict", action: "escalate", structural: true };
  }
  if (error instanceof ResourceExhaustedError || error instanceof RunAbortedError) {
    return { category: "resource-exhausted", action: "escalate", structural: true };
  }
  if (error instanceof DependencyFailedError) {
    return { category: "dependency", action: "skip", structural: false };
  }
  if (error instanceof TaskTimeoutError) {
    return { category: "timeout", action: "retry", structural: false };
  }
  if (error instanceof CircuitOpenError || error instanceof WorkerUnavailableError) {
    return { category: "resource-exhausted", action: "skip", structural: false };
  }
  if (error instanceof InvalidResultError || error instanceof WorkerError) {
    return { category: "invalid-result", action: "retry", structural: false };
  }
  // Anything unrecognised is treated as a bad result from the worker.
  return { category: "invalid-result", action: "retry", structural: false };
}

const REASONS: Record<RecoveryAction, string> = {
  retry: "task may be retried as a whole by the caller",
  skip: "task abandoned; dependents will be skipped",
  escalate: "run stopped; replanning required",
};

/**
 * Maps failures to recovery actions. It decides; it never acts. The
 * Scheduler carries the decision out and the caller owns any replanning.
 */
export class EscalationPolicy {
  private escalateCritical: boolean;
  private overrides: RunConfig["escalation"]["overrides"];

  constructor(config: RunConfig["escalation"]) {
    this.escalateCritical = config.escalateCritical;
    this.overrides = config.overrides;
  }

  classify(error: unknown, task?: Pick<Task, "priority">): Decision {
    const rule = ruleFor(error);
    const severity: Priority = rule.structural ? "critical" : task?.priority ?? "medium";

    let action = rule.structural ? rule.action : this.overrides[rule.category] ?? rule.action;
    if (!rule.structural && this.escalateCritical && severity === "critical" && action !== "escalate") {
      action = "escalate";
      return { action, category: rule.category, severity, reason: `critical task failed; ${REASONS.escalate}` };
    }

    return { action, category: rule.category, severity, reason: REASONS[action] };
  }
}

export function errorCodeOf(error: unknown): string {
  return error instanceof StratumError ? error.code : "UNKNOWN";
}

export function toIssue(error: unknown, decision: Decision, taskId?: string): Issue {
  return {
    ...(taskId !== undefined ? { taskId } : {}),
    category: decision.category,
    severity: decision.severity,
    description: errorMessage(error),
    action: decision.action,
    resolution: decision.reason,
    errorCode: errorCodeOf(error),
  };
}
