import type { AggregatedResult } from "./aggregate/types.js";

export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "DUPLICATE_TASK"
  | "CONFIG_INVALID"
  | "CYCLE_DETECTED"
  | "UNKNOWN_DEPENDENCY"
  | "TASK_TIMEOUT"
  | "INVALID_RESULT"
  | "CIRCUIT_OPEN"
  | "DEPENDENCY_FAILED"
  | "MERGE_CONFLICT"
  | "RESOURCE_EXHAUSTED"
  | "GATE_FAILED"
  | "WORKER_FAILED"
  | "WORKER_UNAVAILABLE"
  | "ILLEGAL_TRANSITION"
  | "RUN_ABORTED";

export class StratumError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StratumError";
    this.code = code;
  }
}

export class ValidationError extends StratumError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION" | "DUPLICATE_TASK", message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends StratumError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

// ---------------------------------------------------------------------------
// Graph errors (fatal, never retried)
// ---------------------------------------------------------------------------

export class CycleError extends StratumError {
  /** Ids along the cycle; the first id is repeated at the end. */
  readonly path: string[];

  constructor(path: string[]) {
    super("CYCLE_DETECTED", `Task graph contains a cycle: ${path.join(" -> ")}`);
    this.name = "CycleError";
    this.path = path;
  }
}

export class UnknownDependencyError extends StratumError {
  readonly taskId: string;
  readonly dependencyId: string;

  constructor(taskId: string, dependencyId: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${dependencyId}"`);
    this.name = "UnknownDependencyError";
    this.taskId = taskId;
    this.dependencyId = dependencyId;
  }
}

// ---------------------------------------------------------------------------
// Worker call errors
// ---------------------------------------------------------------------------

export class TaskTimeoutError extends StratumError {
  readonly taskId: string;
  readonly timeoutMs: number;

  constructor(taskId: string, timeoutMs: number) {
    super("TASK_TIMEOUT", `Task "${taskId}" timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
    this.taskId = taskId;
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidResultError extends StratumError {
  readonly taskId: string;
  readonly problems: string[];

  constructor(taskId: string, problems: string[]) {
    super("INVALID_RESULT", `Task "${taskId}" returned an invalid result: ${problems.join("; ")}`);
    this.name = "InvalidResultError";
    this.taskId = taskId;
    this.problems = problems;
  }
}

export class WorkerError extends StratumError {
  readonly taskId: string;

  constructor(taskId: string, message: string, options?: { cause?: unknown }) {
    super("WORKER_FAILED", `Task "${taskId}" failed: ${message}`, options);
    this.name = "WorkerError";
    this.taskId = taskId;
  }
}

export class CircuitOpenError extends StratumError {
  readonly capability: string;
  readonly retryAt: number;
  /** Attempt the breaker refused; 1 means the worker never saw the task. */
  readonly attempt: number;

  constructor(capability: string, retryAt: number, options?: { cause?: unknown; attempt?: number }) {
    super("CIRCUIT_OPEN", `Circuit for capability "${capability}" is open`, options);
    this.name = "CircuitOpenError";
    this.capability = capability;
    this.retryAt = retryAt;
    this.attempt = options?.attempt ?? 1;
  }
}

export class WorkerUnavailableError extends StratumError {
  readonly capability: string;

  constructor(capability: string) {
    super("WORKER_UNAVAILABLE", `No worker registered for capability "${capability}"`);
    this.name = "WorkerUnavailableError";
    this.capability = capability;
  }
}

// ---------------------------------------------------------------------------
// Run-level errors
// ---------------------------------------------------------------------------

export class DependencyFailedError extends StratumError {
  readonly taskId: string;
  readonly failedDependencies: string[];

  constructor(taskId: string, failedDependencies: string[]) {
    super(
      "DEPENDENCY_FAILED",
      `Task "${taskId}" skipped: dependency failed (${failedDependencies.join(", ")})`,
    );
    this.name = "DependencyFailedError";
    this.taskId = taskId;
    this.failedDependencies = failedDependencies;
  }
}

export type MergeConflict = {
  path: string;
  taskIds: string[];
};

export class MergeConflictError extends StratumError {
  readonly conflicts: MergeConflict[];
  /** Aggregation of every path that was not in conflict. */
  readonly partial: AggregatedResult;

  constructor(conflicts: MergeConflict[], partial: AggregatedResult) {
    const detail = conflicts.map((c) => `${c.path} (${c.taskIds.join(", ")})`).join("; ");
    super("MERGE_CONFLICT", `Conflicting deliverables: ${detail}`);
    this.name = "MergeConflictError";
    this.conflicts = conflicts;
    this.partial = partial;
  }
}

export class ResourceExhaustedError extends StratumError {
  readonly resource: "time" | "cost";

  constructor(resource: "time" | "cost", message: string) {
    super("RESOURCE_EXHAUSTED", message);
    this.name = "ResourceExhaustedError";
    this.resource = resource;
  }
}

export class RunAbortedError extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RUN_ABORTED", message, options);
    this.name = "RunAbortedError";
  }
}

export class ValidationGateFailure extends StratumError {
  readonly gate: string;
  readonly blocking: boolean;

  constructor(gate: string, blocking: boolean, detail: string) {
    super("GATE_FAILED", `Quality gate "${gate}" failed: ${detail}`);
    this.name = "ValidationGateFailure";
    this.gate = gate;
    this.blocking = blocking;
  }
}

export class IllegalTransitionError extends StratumError {
  constructor(taskId: string, from: string, to: string) {
    super("ILLEGAL_TRANSITION", `Task "${taskId}" cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
