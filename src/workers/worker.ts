import type { ExecuteOptions, TaskRequest, TaskResult } from "./types.js";

/**
 * A capability endpoint. The core never looks at how a worker produces its
 * deliverables, only at the shape of the result it returns.
 *
 * Implementations should stop work when `opts.signal` aborts. The proxy
 * stops waiting for the call either way.
 */
export interface Worker {
  /** Unique within a registry. */
  name: string;
  capability: string;
  type: "function" | "http" | "ws" | string;
  description?: string;

  execute(request: TaskRequest, opts: ExecuteOptions): Promise<TaskResult>;
  healthCheck?(): Promise<boolean>;
  /** Release connections held by the worker. */
  close?(): void;
}
