import type { RunConfig } from "../config.js";
import {
  CircuitOpenError,
  InvalidResultError,
  StratumError,
  TaskTimeoutError,
  WorkerError,
} from "../errors.js";
import type { Task } from "../graph/types.js";
import { describeIssues, TaskResultSchema } from "../schemas.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { log } from "../utils/logger.js";
import { escalateTimeout, withRetry } from "../utils/retry.js";
import type { TaskRequest, TaskResult } from "../workers/types.js";
import type { Worker } from "../workers/worker.js";
import { CircuitBreaker } from "./circuit-breaker.js";

export type ProxyCallOptions = {
  /** Timeout for the first attempt; defaults to `timeouts.taskDefault`. */
  timeoutMs?: number;
  /** Run-level cancellation. */
  signal?: AbortSignal;
};

export type WorkerProxyOptions = {
  worker: Worker;
  config: Pick<RunConfig, "retry" | "timeouts" | "circuitBreaker">;
  clock?: Clock;
};

const TIMED_OUT = Symbol("timed-out");

/**
 * Per-capability handle that runs one task against a worker with timeout,
 * retry, timeout escalation, structural validation of the result and a
 * circuit breaker shared by every task of the capability.
 */
export class WorkerProxy {
  readonly capability: string;
  readonly breaker: CircuitBreaker;

  private worker: Worker;
  private config: WorkerProxyOptions["config"];
  private clock: Clock;
  private calls = 0;

  constructor(opts: WorkerProxyOptions) {
    this.worker = opts.worker;
    this.capability = opts.worker.capability;
    this.config = opts.config;
    this.clock = opts.clock ?? systemClock;
    this.breaker = new CircuitBreaker({
      name: this.capability,
      failureThreshold: opts.config.circuitBreaker.failureThreshold,
      resetTimeoutMs: opts.config.circuitBreaker.resetTimeoutMs,
      clock: this.clock,
    });
  }

  /** Worker calls made through this proxy, retries included. */
  get callCount(): number {
    return this.calls;
  }

  async execute(task: Task, context: Record<string, unknown>, opts?: ProxyCallOptions): Promise<TaskResult> {
    const { retry, timeouts } = this.config;
    const signal = opts?.signal;
    let timeoutMs = opts?.timeoutMs ?? timeouts.taskDefault;

    return withRetry(
      async (attempt) => {
        try {
          return await this.attempt(task, context, attempt, timeoutMs, signal);
        } catch (err) {
          if (err instanceof TaskTimeoutError) {
            timeoutMs = escalateTimeout(timeoutMs, timeouts.escalationMultiplier, timeouts.ceiling);
          }
          if (isRetryable(err, signal)) {
            log.debug(`Attempt ${attempt} of task "${task.id}" failed`, { error: String(err) });
          }
          throw err;
        }
      },
      {
        maxAttempts: retry.maxRetries,
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
        clock: this.clock,
        signal,
        shouldRetry: (err) => isRetryable(err, signal),
      },
    );
  }

  private async attempt(
    task: Task,
    context: Record<string, unknown>,
    attempt: number,
    timeoutMs: number,
    runSignal: AbortSignal | undefined,
  ): Promise<TaskResult> {
    runSignal?.throwIfAborted();

    if (!this.breaker.tryAcquire()) {
      throw new CircuitOpenError(this.capability, this.breaker.retryAt, { attempt });
    }

    const request: TaskRequest = {
      taskId: task.id,
      description: task.description,
      capability: task.capability,
      context,
      deliverableSpecs: task.deliverableSpecs.map((s) => ({ ...s })),
      validationCriteria: [...task.validationCriteria],
      attempt,
    };

    const controller = new AbortController();
    const onRunAbort = () => controller.abort(runSignal?.reason);
    runSignal?.addEventListener("abort", onRunAbort, { once: true });
    const timer = setTimeout(() => controller.abort(TIMED_OUT), timeoutMs);

    this.calls++;
    try {
      const raw = await untilAborted(this.worker.execute(request, { signal: controller.signal }), controller.signal);
      const result = validateResult(task, raw);
      this.breaker.recordSuccess();
      return result;
    } catch (err) {
      if (runSignal?.aborted) {
        // Cancelled, not a worker fault.
        this.breaker.releaseTrial();
        throw runSignal.reason;
      }
      const failure = controller.signal.reason === TIMED_OUT
        ? new TaskTimeoutError(task.id, timeoutMs)
        : toWorkerFailure(task.id, err);
      this.breaker.recordFailure();
      throw failure;
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener("abort", onRunAbort);
    }
  }
}

/** Settle with the signal's reason as soon as it aborts, even if `work` never does. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function isRetryable(err: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted) return false;
  return err instanceof TaskTimeoutError || err instanceof InvalidResultError || err instanceof WorkerError;
}

function toWorkerFailure(taskId: string, err: unknown): StratumError {
  if (err instanceof InvalidResultError || err instanceof WorkerError) return err;
  return new WorkerError(taskId, err instanceof Error ? err.message : String(err), { cause: err });
}

/**
 * Local structural validation: shape, reported failure, and every required
 * deliverable present.
 */
export function validateResult(task: Task, raw: unknown): TaskResult {
  const parsed = TaskResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidResultError(task.id, describeIssues(parsed.error));
  }
  const result = parsed.data;

  if (result.status === "failure") {
    throw new WorkerError(task.id, result.errorDetail ?? "worker reported failure");
  }

  const produced = new Set(result.deliverables.map((d) => d.path));
  const missing = task.deliverableSpecs
    .filter((spec) => spec.required !== false && !produced.has(spec.path))
    .map((spec) => `missing required deliverable "${spec.path}"`);
  if (missing.length > 0) {
    throw new InvalidResultError(task.id, missing);
  }

  return result;
}
