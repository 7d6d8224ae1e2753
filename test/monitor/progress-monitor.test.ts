import { describe, expect, it } from "vitest";
import { createTaskGraph } from "../../src/graph/task-graph.js";
import { ProgressMonitor } from "../../src/monitor/progress-monitor.js";
import { ManualClock } from "../../src/utils/clock.js";

function setup() {
  const graph = createTaskGraph([
    { id: "A", description: "a", capability: "code", estimatedCost: 1 },
    { id: "B", description: "b", capability: "code", estimatedCost: 2 },
    { id: "C", description: "c", capability: "code", dependencies: ["A", "B"], estimatedCost: 1 },
  ]);
  const clock = new ManualClock();
  return { clock, monitor: new ProgressMonitor(graph, { clock }) };
}

describe("ProgressMonitor", () => {
  it("reports ready and blocked tasks before anything starts", () => {
    const { monitor } = setup();
    expect(monitor.snapshot("run-1")).toEqual({
      runId: "run-1",
      percentage: 0,
      tasksInProgress: 0,
      tasksPending: 2,
      tasksBlocked: 1,
      estimatedRemainingMs: 4_000,
    });
  });

  it("flags a task that ran over twice its estimate", () => {
    const { monitor, clock } = setup();
    monitor.onStart("A");
    clock.advance(3_000);
    monitor.onComplete("A");

    expect(monitor.anomalies).toEqual([{ taskId: "A", estimatedMs: 1_000, actualMs: 3_000, ratio: 3 }]);
    expect(monitor.durationOf("A")).toBe(3_000);
  });

  it("does not flag a task within the factor", () => {
    const { monitor, clock } = setup();
    monitor.onStart("B");
    clock.advance(4_000);
    monitor.onComplete("B");
    expect(monitor.anomalies).toEqual([]);
  });

  it("scales the remaining estimate by the observed drift", () => {
    const { monitor, clock } = setup();
    monitor.onStart("A");
    clock.advance(3_000);
    monitor.onComplete("A");

    expect(monitor.progressPercentage()).toBe(33);
    // B (2000) + C (1000), three times slower than estimated so far.
    expect(monitor.estimatedCompletion()).toBe(9_000);
  });

  it("counts failed and skipped tasks as terminal", () => {
    const { monitor } = setup();
    monitor.onStart("A");
    monitor.onComplete("A");
    monitor.onStart("B");

    expect(monitor.snapshot("r")).toMatchObject({ tasksInProgress: 1, tasksPending: 0, tasksBlocked: 1 });

    monitor.onFail("B", new Error("boom"));
    expect(monitor.progressPercentage()).toBe(66);
    expect(monitor.snapshot("r").tasksBlocked).toBe(1);

    monitor.onSkip("C");
    expect(monitor.progressPercentage()).toBe(100);
    expect(monitor.estimatedCompletion()).toBe(0);
    expect(monitor.durationOf("C")).toBeUndefined();
  });

  it("restarts timing when a task is retried", () => {
    const { monitor, clock } = setup();
    monitor.onStart("A");
    monitor.onFail("A", new Error("boom"));
    clock.advance(500);
    monitor.onStart("A");
    expect(monitor.snapshot("r").tasksInProgress).toBe(1);
    clock.advance(200);
    monitor.onComplete("A");
    expect(monitor.durationOf("A")).toBe(200);
  });

  it("is complete for an empty graph", () => {
    const monitor = new ProgressMonitor(createTaskGraph([]));
    expect(monitor.progressPercentage()).toBe(100);
    expect(monitor.estimatedCompletion()).toBe(0);
  });

  it("throws for an unknown task", () => {
    const { monitor } = setup();
    expect(() => monitor.onStart("Z")).toThrow('Unknown task "Z"');
  });
});
