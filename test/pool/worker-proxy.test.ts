import { describe, expect, it } from "vitest";
import type { RunConfig } from "../../src/config.js";
import { CircuitOpenError, InvalidResultError, TaskTimeoutError, WorkerError } from "../../src/errors.js";
import type { Task } from "../../src/graph/types.js";
import { validateResult, WorkerProxy } from "../../src/pool/worker-proxy.js";
import { ManualClock } from "../../src/utils/clock.js";
import { FunctionWorker, type WorkerFunction } from "../../src/workers/function-worker.js";
import type { TaskRequest, TaskResult } from "../../src/workers/types.js";

type ProxyConfig = Pick<RunConfig, "retry" | "timeouts" | "circuitBreaker">;

function config(overrides?: { failureThreshold?: number; maxRetries?: number }): ProxyConfig {
  return {
    retry: { maxRetries: overrides?.maxRetries ?? 3, baseDelayMs: 1_000, maxDelayMs: 10_000 },
    timeouts: { taskDefault: 20, escalationMultiplier: 1.5, ceiling: 40, httpHealth: 1_000 },
    circuitBreaker: { failureThreshold: overrides?.failureThreshold ?? 5, resetTimeoutMs: 30_000 },
  };
}

const task: Task = {
  id: "t1",
  description: "lint the sources",
  capability: "lint",
  dependencies: [],
  priority: "medium",
  estimatedCost: 1,
  deliverableSpecs: [{ path: "report.txt" }, { path: "extra.txt", required: false }],
  validationCriteria: ["no errors"],
};

const ok: TaskResult = {
  status: "success",
  deliverables: [{ path: "report.txt", content: "clean" }],
  validationPassed: true,
};

function proxyFor(fn: WorkerFunction, cfg: ProxyConfig = config()) {
  const clock = new ManualClock();
  const worker = new FunctionWorker({ name: "linter", capability: "lint", fn });
  return { proxy: new WorkerProxy({ worker, config: cfg, clock }), clock };
}

/** Never settles on its own; rejects once the call is cancelled. */
function hang(signal: AbortSignal): Promise<TaskResult> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("WorkerProxy", () => {
  it("returns a valid result from the first attempt", async () => {
    const requests: TaskRequest[] = [];
    const { proxy, clock } = proxyFor(async (request) => {
      requests.push(request);
      return ok;
    });

    const result = await proxy.execute(task, { repo: "demo" });

    expect(result).toEqual(ok);
    expect(proxy.callCount).toBe(1);
    expect(clock.sleeps).toEqual([]);
    expect(requests[0]).toEqual({
      taskId: "t1",
      description: "lint the sources",
      capability: "lint",
      context: { repo: "demo" },
      deliverableSpecs: [{ path: "report.txt" }, { path: "extra.txt", required: false }],
      validationCriteria: ["no errors"],
      attempt: 1,
    });
  });

  it("retries an invalid result with backoff and then succeeds", async () => {
    let calls = 0;
    const { proxy, clock } = proxyFor(async () => {
      calls++;
      return calls === 1 ? { status: "success", deliverables: [], validationPassed: true } : ok;
    });

    await expect(proxy.execute(task, {})).resolves.toEqual(ok);
    expect(proxy.callCount).toBe(2);
    expect(clock.sleeps).toEqual([1_000]);
    expect(proxy.breaker.failureCount).toBe(0);
  });

  it("escalates the timeout on each timed-out attempt and counts every failure", async () => {
    const attempts: number[] = [];
    const { proxy, clock } = proxyFor(async (request, signal) => {
      attempts.push(request.attempt);
      return hang(signal);
    });

    const err = await proxy.execute(task, {}).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TaskTimeoutError);
    expect(err).toHaveProperty("timeoutMs", 40);
    expect(attempts).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
    expect(proxy.breaker.failureCount).toBe(3);
    expect(proxy.breaker.state).toBe("closed");
  });

  it("times out a worker that ignores its abort signal", async () => {
    const { proxy } = proxyFor(() => new Promise<TaskResult>(() => {}), config({ maxRetries: 1 }));
    await expect(proxy.execute(task, {})).rejects.toThrow('Task "t1" timed out after 20ms');
  });

  it("turns a reported failure into a WorkerError after all attempts", async () => {
    const { proxy } = proxyFor(async () => ({
      status: "failure",
      deliverables: [],
      validationPassed: false,
      errorDetail: "boom",
    }));

    const err = await proxy.execute(task, {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WorkerError);
    expect(err).toHaveProperty("message", 'Task "t1" failed: boom');
    expect(proxy.callCount).toBe(3);
  });

  it("wraps a thrown error as a WorkerError", async () => {
    const { proxy } = proxyFor(async () => {
      throw new Error("socket hang up");
    }, config({ maxRetries: 1 }));

    await expect(proxy.execute(task, {})).rejects.toThrow('Task "t1" failed: socket hang up');
  });

  it("fails fast once the circuit opens", async () => {
    const { proxy } = proxyFor(async () => {
      throw new Error("down");
    }, config({ failureThreshold: 2 }));

    await expect(proxy.execute(task, {})).rejects.toBeInstanceOf(CircuitOpenError);
    expect(proxy.callCount).toBe(2);
    expect(proxy.breaker.state).toBe("open");

    await expect(proxy.execute(task, {})).rejects.toThrow('Circuit for capability "lint" is open');
    expect(proxy.callCount).toBe(2);
  });

  it("stops on run cancellation without retrying or touching the breaker", async () => {
    const controller = new AbortController();
    const { proxy, clock } = proxyFor(async (_request, signal) => {
      setTimeout(() => controller.abort(new Error("run cancelled")), 5);
      return hang(signal);
    });

    await expect(proxy.execute(task, {}, { signal: controller.signal, timeoutMs: 1_000 })).rejects.toThrow(
      "run cancelled",
    );
    expect(proxy.callCount).toBe(1);
    expect(clock.sleeps).toEqual([]);
    expect(proxy.breaker.failureCount).toBe(0);
  });
});

describe("validateResult", () => {
  it("accepts a result with every required deliverable", () => {
    expect(validateResult(task, ok)).toEqual(ok);
  });

  it("lists each missing required deliverable", () => {
    try {
      validateResult({ ...task, deliverableSpecs: [{ path: "a.ts" }, { path: "b.ts" }] }, ok);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidResultError);
      if (err instanceof InvalidResultError) {
        expect(err.problems).toEqual(['missing required deliverable "a.ts"', 'missing required deliverable "b.ts"']);
      }
    }
  });

  it("describes schema problems by path", () => {
    try {
      validateResult(task, { status: "done", deliverables: [], validationPassed: true });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidResultError);
      if (err instanceof InvalidResultError) {
        expect(err.problems).toHaveLength(1);
        expect(err.problems[0]).toMatch(/^status: /);
      }
    }
  });
});
