import { getConfig } from "../config.js";
import { InvalidResultError, WorkerError } from "../errors.js";
import { describeIssues, TaskResultSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { ExecuteOptions, TaskRequest, TaskResult } from "./types.js";
import type { Worker } from "./worker.js";

export type HttpWorkerOptions = {
  name: string;
  capability: string;
  url: string;
  headers?: Record<string, string>;
  description?: string;
};

/** POSTs each TaskRequest as JSON and reads a TaskResult back. */
export class HttpWorker implements Worker {
  readonly name: string;
  readonly capability: string;
  readonly type = "http" as const;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpWorkerOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
  }

  async execute(request: TaskRequest, opts: ExecuteOptions): Promise<TaskResult> {
    log.debug(`[${this.name}] Calling ${this.url} for task "${request.taskId}"`, { attempt: request.attempt });

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify(request),
      signal: opts.signal,
    });

    const body = await res.text();
    if (!res.ok) {
      throw new WorkerError(request.taskId, `HTTP ${res.status}: ${body.slice(0, 500)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      throw new InvalidResultError(request.taskId, ["response body is not JSON"]);
    }

    const parsed = TaskResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidResultError(request.taskId, describeIssues(parsed.error));
    }
    return parsed.data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(getConfig().timeouts.httpHealth),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }
}
