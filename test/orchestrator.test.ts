import { afterEach, describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import type { TaskInput } from "../src/graph/types.js";
import { Orchestrator, runStatus } from "../src/orchestrator.js";
import { RunStore } from "../src/persistence/store.js";
import type { Issue, ProgressUpdate } from "../src/types.js";
import { FunctionWorker, type WorkerFunction } from "../src/workers/function-worker.js";
import type { TaskResult } from "../src/workers/types.js";

/** Writes every requested deliverable with content naming the task. */
const writer: WorkerFunction = async (request) => ({
  status: "success",
  deliverables: request.deliverableSpecs.map((spec) => ({ path: spec.path, content: `// ${request.taskId}` })),
  validationPassed: true,
});

function orchestrator(fn: WorkerFunction = writer, store?: RunStore): Orchestrator {
  const orch = new Orchestrator({ runStore: store });
  orch.addWorker(new FunctionWorker({ name: "coder", capability: "code", fn }));
  return orch;
}

function request(tasks: TaskInput[], extra?: Record<string, unknown>) {
  return { taskGraph: { id: "graph-1", tasks }, config: { retry: { maxRetries: 1 } }, ...extra };
}

function task(id: string, dependencies: string[] = [], extra?: Partial<TaskInput>): TaskInput {
  return { id, description: `build ${id}`, capability: "code", dependencies, ...extra };
}

/** Never settles until the attempt is cancelled. */
const hanging: WorkerFunction = (_request, signal) =>
  new Promise<TaskResult>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

describe("Orchestrator.execute", () => {
  it("runs a graph to completion and merges its deliverables", async () => {
    const events: string[] = [];
    const progress: ProgressUpdate[] = [];
    const orch = orchestrator();

    const response = await orch.execute(
      request(
        [
          task("design", [], { deliverableSpecs: [{ path: "docs/design.md" }] }),
          task("api", ["design"], { deliverableSpecs: [{ path: "src/api.ts" }], validationCriteria: ["compiles"] }),
        ],
        { qualityGates: [{ type: "zero-errors" }] },
      ),
      {
        runId: "run-1",
        callbacks: {
          onTaskStart: (id) => events.push(`start:${id}`),
          onTaskEnd: (id, status) => events.push(`end:${id}:${status}`),
          onProgress: (update) => progress.push(update),
        },
      },
    );

    expect(response.runId).toBe("run-1");
    expect(response.graphId).toBe("graph-1");
    expect(response.status).toBe("completed");
    expect(response.levels).toEqual([["design"], ["api"]]);
    expect(response.completedTaskIds).toEqual(["design", "api"]);
    expect(response.deliverables.map((d) => [d.path, d.taskId, d.content, d.validationStatus])).toEqual([
      ["docs/design.md", "design", "// design", "skipped"],
      ["src/api.ts", "api", "// api", "passed"],
    ]);
    expect(response.validationResults.map((v) => [v.name, v.passed])).toEqual([["zero-errors", true]]);
    expect(response.issues).toEqual([]);
    expect(response.resourceUsage.workerCalls).toBe(2);
    expect(events).toEqual(["start:design", "end:design:completed", "start:api", "end:api:completed"]);
    expect(progress.at(-1)).toMatchObject({ runId: "run-1", percentage: 100, tasksInProgress: 0 });
    expect(orch.activeRuns()).toEqual([]);
  });

  it("is partial when an independent task fails", async () => {
    const orch = orchestrator(async (request) =>
      request.taskId === "b"
        ? { status: "failure", deliverables: [], validationPassed: false, errorDetail: "tests red" }
        : writer(request, new AbortController().signal),
    );

    const response = await orch.execute(request([task("a"), task("b")]));

    expect(response.status).toBe("partial");
    expect(response.completedTaskIds).toEqual(["a"]);
    expect(response.failedTaskIds).toEqual(["b"]);
    expect(response.issues.map((i) => i.description)).toEqual(['Task "b" failed: tests red']);
  });

  it("fails when a blocking gate fails", async () => {
    const orch = orchestrator(async () => ({
      status: "success",
      deliverables: [],
      validationPassed: true,
      metrics: { coverage: 40 },
    }));

    const response = await orch.execute(
      request([task("a")], { qualityGates: [{ type: "coverage-threshold", threshold: 80 }] }),
    );

    expect(response.status).toBe("failed");
    expect(response.validationResults[0]).toMatchObject({ passed: false, detail: "coverage 40% is below 80%" });
  });

  it("completes with a warning when only an advisory gate fails", async () => {
    const response = await orchestrator().execute(
      request([task("a")], { qualityGates: [{ type: "coverage-threshold", threshold: 80, blocking: false }] }),
    );

    expect(response.status).toBe("completed");
    expect(response.validationWarnings).toEqual(['Advisory gate "coverage-threshold" failed: no coverage reported']);
  });

  it("fails on conflicting deliverables and skips the gates", async () => {
    const issues: Issue[] = [];
    const response = await orchestrator().execute(
      request(
        [
          task("a", [], { deliverableSpecs: [{ path: "shared.ts" }, { path: "a.ts" }] }),
          task("b", [], { deliverableSpecs: [{ path: "shared.ts" }] }),
        ],
        { qualityGates: [{ type: "zero-errors" }] },
      ),
      { callbacks: { onIssue: (issue) => issues.push(issue) } },
    );

    expect(response.status).toBe("failed");
    expect(response.deliverables.map((d) => d.path)).toEqual(["a.ts"]);
    expect(response.validationResults).toEqual([]);
    expect(response.validationWarnings).toEqual(["Quality gates not evaluated: deliverables are in conflict"]);
    expect(response.issues).toEqual([
      {
        category: "merge-conflict",
        severity: "critical",
        description: "Conflicting deliverables: shared.ts (a, b)",
        action: "escalate",
        resolution: "run stopped; replanning required",
        errorCode: "MERGE_CONFLICT",
      },
    ]);
    expect(issues).toEqual(response.issues);
  });

  it("rejects a cyclic graph with a single escalated issue", async () => {
    const issues: Issue[] = [];
    const orch = orchestrator();

    const response = await orch.execute(request([task("a", ["b"]), task("b", ["a"])]), {
      callbacks: { onIssue: (issue) => issues.push(issue) },
    });

    expect(response.status).toBe("failed");
    expect(response.levels).toEqual([]);
    expect(response.issues).toHaveLength(1);
    expect(response.issues[0]).toMatchObject({
      category: "dependency",
      action: "escalate",
      errorCode: "CYCLE_DETECTED",
      description: "Task graph contains a cycle: a -> b -> a",
    });
    expect(issues).toHaveLength(1);
    expect(response.resourceUsage.workerCalls).toBe(0);
  });

  it("rejects a dangling dependency the same way", async () => {
    const response = await orchestrator().execute(request([task("a", ["ghost"])]));
    expect(response.status).toBe("failed");
    expect(response.issues[0].errorCode).toBe("UNKNOWN_DEPENDENCY");
  });

  it("throws on a malformed request", async () => {
    await expect(orchestrator().execute({ taskGraph: { tasks: [{ id: "" }] } })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("stops at the time budget", async () => {
    const response = await orchestrator(hanging).execute(
      request([task("slow"), task("after", ["slow"])], { resourceBudget: { timeMs: 50 } }),
    );

    expect(response.status).toBe("failed");
    expect(response.skippedTaskIds).toEqual(["slow", "after"]);
    expect(response.issues).toEqual([
      {
        category: "resource-exhausted",
        severity: "critical",
        description: "Run exceeded its time budget of 50ms",
        action: "escalate",
        resolution: "run stopped; replanning required",
        errorCode: "RESOURCE_EXHAUSTED",
      },
    ]);
    expect(response.resourceUsage.budget).toEqual({ timeMs: 50 });
  });

  it("keeps a finished sibling's deliverables when the time budget runs out", async () => {
    const orch = orchestrator((request, signal) =>
      request.taskId === "fast" ? writer(request, signal) : hanging(request, signal),
    );

    const response = await orch.execute(
      request([task("fast", [], { deliverableSpecs: [{ path: "a.ts" }] }), task("slow")], {
        resourceBudget: { timeMs: 50 },
      }),
    );

    expect(response.status).toBe("failed");
    expect(response.completedTaskIds).toEqual(["fast"]);
    expect(response.skippedTaskIds).toEqual(["slow"]);
    expect(response.deliverables.map((d) => [d.path, d.taskId, d.content])).toEqual([["a.ts", "fast", "// fast"]]);
    expect(response.issues.map((i) => [i.errorCode, i.description])).toEqual([
      ["RESOURCE_EXHAUSTED", "Run exceeded its time budget of 50ms"],
    ]);
  });

  it("stops when the caller aborts", async () => {
    const controller = new AbortController();
    const run = orchestrator(hanging).execute(request([task("a")]), { signal: controller.signal });
    setTimeout(() => controller.abort(new Error("user cancelled")), 10);

    const response = await run;
    expect(response.status).toBe("failed");
    expect(response.skippedTaskIds).toEqual(["a"]);
    expect(response.issues).toEqual([
      {
        category: "resource-exhausted",
        severity: "critical",
        description: "Run cancelled: user cancelled",
        action: "escalate",
        resolution: "run stopped; replanning required",
        errorCode: "RUN_ABORTED",
      },
    ]);
  });

  it("shutdown cancels active runs", async () => {
    const orch = orchestrator(hanging);
    const run = orch.execute(request([task("a")]), { runId: "run-x" });
    expect(orch.activeRuns()).toEqual(["run-x"]);

    orch.shutdown();

    const response = await run;
    expect(response.status).toBe("failed");
    expect(response.issues).toEqual([
      {
        category: "resource-exhausted",
        severity: "critical",
        description: "Orchestrator shut down",
        action: "escalate",
        resolution: "run stopped; replanning required",
        errorCode: "RUN_ABORTED",
      },
    ]);
    expect(orch.activeRuns()).toEqual([]);
  });

  it("completes an empty graph", async () => {
    const response = await orchestrator().execute(request([]));
    expect(response.status).toBe("completed");
    expect(response.levels).toEqual([]);
  });

  describe("with a run store", () => {
    let store: RunStore;

    afterEach(() => store.close());

    it("persists every finished run, rejected ones included", async () => {
      store = new RunStore(":memory:");
      const orch = orchestrator(writer, store);

      const ok = await orch.execute(request([task("a")]), { runId: "r-ok" });
      await orch.execute(request([task("a", ["a"])]), { runId: "r-cycle" });

      expect(store.get("r-ok")).toEqual(ok);
      expect(store.get("r-cycle")?.status).toBe("failed");
      expect(store.list().map((s) => s.runId).sort()).toEqual(["r-cycle", "r-ok"]);
    });
  });
});

describe("Orchestrator.levels", () => {
  it("levels a graph without running it", () => {
    const graph = orchestrator().levels({ tasks: [task("b", ["a"]), task("a")] });
    expect(graph.levels).toEqual([["a"], ["b"]]);
  });

  it("validates the input", () => {
    expect(() => orchestrator().levels({ tasks: "nope" })).toThrow(ValidationError);
  });
});

describe("runStatus", () => {
  const base = { aborted: false, conflict: false, gatesPassed: true, completed: 2, total: 2 };

  it.each([
    [base, "completed"],
    [{ ...base, completed: 1 }, "partial"],
    [{ ...base, completed: 0 }, "failed"],
    [{ ...base, aborted: true }, "failed"],
    [{ ...base, conflict: true }, "failed"],
    [{ ...base, gatesPassed: false }, "failed"],
    [{ ...base, completed: 0, total: 0 }, "completed"],
  ] as const)("%o -> %s", (facts, expected) => {
    expect(runStatus(facts)).toBe(expected);
  });
});
