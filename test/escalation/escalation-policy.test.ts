import { describe, expect, it } from "vitest";
import { defaults } from "../../src/config.js";
import {
  CircuitOpenError,
  CycleError,
  DependencyFailedError,
  InvalidResultError,
  MergeConflictError,
  ResourceExhaustedError,
  RunAbortedError,
  TaskTimeoutError,
  WorkerError,
  WorkerUnavailableError,
} from "../../src/errors.js";
import { errorCodeOf, EscalationPolicy, toIssue } from "../../src/escalation/escalation-policy.js";

const policy = new EscalationPolicy(defaults.escalation);
const medium = { priority: "medium" as const };

describe("EscalationPolicy", () => {
  it.each([
    [new TaskTimeoutError("t", 100), "timeout", "retry"],
    [new InvalidResultError("t", ["x"]), "invalid-result", "retry"],
    [new WorkerError("t", "boom"), "invalid-result", "retry"],
    [new Error("surprise"), "invalid-result", "retry"],
    [new DependencyFailedError("t", ["d"]), "dependency", "skip"],
    [new CircuitOpenError("code", 0), "resource-exhausted", "skip"],
    [new WorkerUnavailableError("code"), "resource-exhausted", "skip"],
  ])("classifies %s", (error, category, action) => {
    expect(policy.classify(error, medium)).toMatchObject({ category, action, severity: "medium" });
  });

  it("always escalates structural failures as critical", () => {
    const empty = { deliverables: [], metrics: { errorCount: 0, findings: [] }, taskIds: [] };
    for (const error of [
      new CycleError(["a", "b", "a"]),
      new MergeConflictError([{ path: "x", taskIds: ["a", "b"] }], empty),
      new ResourceExhaustedError("cost", "over budget"),
      new RunAbortedError("Orchestrator shut down"),
    ]) {
      expect(policy.classify(error, { priority: "low" })).toMatchObject({ action: "escalate", severity: "critical" });
    }
  });

  it("escalates any failure of a critical task", () => {
    expect(policy.classify(new TaskTimeoutError("t", 100), { priority: "critical" })).toEqual({
      action: "escalate",
      category: "timeout",
      severity: "critical",
      reason: "critical task failed; run stopped; replanning required",
    });
  });

  it("leaves critical tasks alone when escalateCritical is off", () => {
    const lenient = new EscalationPolicy({ escalateCritical: false, overrides: {} });
    expect(lenient.classify(new TaskTimeoutError("t", 100), { priority: "critical" }).action).toBe("retry");
  });

  it("applies per-category overrides to non-structural failures only", () => {
    const custom = new EscalationPolicy({
      escalateCritical: false,
      overrides: { timeout: "skip", "resource-exhausted": "retry" },
    });
    expect(custom.classify(new TaskTimeoutError("t", 1), medium)).toMatchObject({
      action: "skip",
      reason: "task abandoned; dependents will be skipped",
    });
    expect(custom.classify(new ResourceExhaustedError("time", "late")).action).toBe("escalate");
  });

  it("defaults severity to medium without a task", () => {
    expect(policy.classify(new WorkerError("t", "x")).severity).toBe("medium");
  });
});

describe("toIssue", () => {
  it("builds an issue from the error and the decision", () => {
    const error = new TaskTimeoutError("t1", 500);
    expect(toIssue(error, policy.classify(error, medium), "t1")).toEqual({
      taskId: "t1",
      category: "timeout",
      severity: "medium",
      description: 'Task "t1" timed out after 500ms',
      action: "retry",
      resolution: "task may be retried as a whole by the caller",
      errorCode: "TASK_TIMEOUT",
    });
  });

  it("omits the task id for run-level issues", () => {
    const error = new ResourceExhaustedError("time", "late");
    expect(toIssue(error, policy.classify(error))).not.toHaveProperty("taskId");
  });

  it("uses UNKNOWN for foreign errors", () => {
    expect(errorCodeOf(new Error("x"))).toBe("UNKNOWN");
    expect(errorCodeOf(new WorkerError("t", "x"))).toBe("WORKER_FAILED");
  });
});
