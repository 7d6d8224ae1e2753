import { log } from "../utils/logger.js";
import type { ExecuteOptions, TaskRequest, TaskResult } from "./types.js";
import type { Worker } from "./worker.js";

export type WorkerFunction = (request: TaskRequest, signal: AbortSignal) => Promise<TaskResult>;

export type FunctionWorkerOptions = {
  name: string;
  capability: string;
  fn: WorkerFunction;
  description?: string;
  healthCheck?: () => Promise<boolean>;
};

/** Runs a task through an in-process async function. */
export class FunctionWorker implements Worker {
  readonly name: string;
  readonly capability: string;
  readonly type = "function" as const;
  readonly description?: string;

  private fn: WorkerFunction;
  private health?: () => Promise<boolean>;

  constructor(opts: FunctionWorkerOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.fn = opts.fn;
    this.description = opts.description;
    this.health = opts.healthCheck;
  }

  async execute(request: TaskRequest, opts: ExecuteOptions): Promise<TaskResult> {
    opts.signal.throwIfAborted();
    log.debug(`[${this.name}] Running function for task "${request.taskId}"`, { attempt: request.attempt });
    return this.fn(request, opts.signal);
  }

  async healthCheck(): Promise<boolean> {
    return this.health ? this.health() : true;
  }
}
