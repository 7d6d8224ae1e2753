import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { InvalidResultError, WorkerError } from "../errors.js";
import { describeIssues, TaskResultSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { ExecuteOptions, TaskRequest, TaskResult } from "./types.js";
import type { Worker } from "./worker.js";

export const EXECUTE_METHOD = "task.execute";
export const HEALTH_METHOD = "health";

export type RequestFrame = {
  type: "req";
  id: string;
  method: string;
  params?: unknown;
};

export type ResponseFrame = {
  type: "res";
  id: string;
  ok: boolean;
  payload?: unknown;
  error?: { code: string; message: string };
};

export type WsWorkerOptions = {
  name: string;
  capability: string;
  /** ws://host:port/path */
  url: string;
  headers?: Record<string, string>;
  description?: string;
  connectTimeoutMs?: number;
};

type Pending = {
  resolve: (payload: unknown) => void;
  reject: (err: Error) => void;
};

function isResponseFrame(value: unknown): value is ResponseFrame {
  if (typeof value !== "object" || value === null) return false;
  return "type" in value && value.type === "res" && "id" in value && typeof value.id === "string";
}

/**
 * Talks to a worker over a persistent WebSocket. Calls are multiplexed on one
 * connection and correlated by request id.
 */
export class WsWorker implements Worker {
  readonly name: string;
  readonly capability: string;
  readonly type = "ws" as const;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;
  private connectTimeoutMs: number;
  private ws: WebSocket | null = null;
  private connectPromise: Promise<WebSocket> | null = null;
  private pending = new Map<string, Pending>();

  constructor(opts: WsWorkerOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 10_000;
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  async execute(request: TaskRequest, opts: ExecuteOptions): Promise<TaskResult> {
    log.debug(`[${this.name}] Sending task "${request.taskId}"`, { attempt: request.attempt });

    let payload: unknown;
    try {
      payload = await this.call(EXECUTE_METHOD, request, opts.signal);
    } catch (err) {
      if (opts.signal.aborted) throw err;
      throw new WorkerError(request.taskId, err instanceof Error ? err.message : String(err), { cause: err });
    }

    const parsed = TaskResultSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidResultError(request.taskId, describeIssues(parsed.error));
    }
    return parsed.data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.call(HEALTH_METHOD, undefined, AbortSignal.timeout(this.connectTimeoutMs));
      return true;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }

  async call(method: string, params: unknown, signal: AbortSignal): Promise<unknown> {
    signal.throwIfAborted();
    const ws = await this.connect();
    const id = randomUUID();
    const frame: RequestFrame = { type: "req", id, method, params };

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = () => {
        this.pending.delete(id);
        reject(signal.reason);
      };
      signal.addEventListener("abort", onAbort, { once: true });

      this.pending.set(id, {
        resolve: (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        reject: (err) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      });

      ws.send(JSON.stringify(frame), (err) => {
        if (err) this.settle(id, (p) => p.reject(err));
      });
    });
  }

  private connect(): Promise<WebSocket> {
    if (this.ws && this.connected) return Promise.resolve(this.ws);
    if (this.connectPromise) return this.connectPromise;

    this.connectPromise = new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(this.url, { headers: this.headers });
      const timer = setTimeout(() => {
        ws.terminate();
        reject(new Error(`Connection to ${this.url} timed out`));
      }, this.connectTimeoutMs);

      ws.on("open", () => {
        clearTimeout(timer);
        this.ws = ws;
        log.debug(`[${this.name}] Connected to ${this.url}`);
        resolve(ws);
      });

      ws.on("message", (raw) => this.handleMessage(raw.toString()));

      ws.on("error", (err) => {
        clearTimeout(timer);
        log.warn(`[${this.name}] Connection error`, { error: String(err) });
        reject(err);
      });

      ws.on("close", (code) => {
        clearTimeout(timer);
        if (this.ws === ws) this.ws = null;
        reject(new Error(`Connection closed (code=${code})`));
        for (const id of [...this.pending.keys()]) {
          this.settle(id, (p) => p.reject(new Error(`Connection closed (code=${code})`)));
        }
      });
    });

    const attempt = this.connectPromise;
    const clear = () => {
      if (this.connectPromise === attempt) this.connectPromise = null;
    };
    attempt.then(clear, clear);
    return attempt;
  }

  private handleMessage(data: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      log.warn(`[${this.name}] Failed to parse frame`, { data: data.slice(0, 200) });
      return;
    }
    if (!isResponseFrame(parsed)) return;

    const frame = parsed;
    this.settle(frame.id, (p) => {
      if (frame.ok) {
        p.resolve(frame.payload);
      } else {
        const err = frame.error;
        p.reject(new Error(err ? `${err.code}: ${err.message}` : "Unknown worker error"));
      }
    });
  }

  private settle(id: string, fn: (p: Pending) => void): void {
    const p = this.pending.get(id);
    if (!p) return;
    this.pending.delete(id);
    fn(p);
  }

  close(): void {
    if (this.ws) {
      this.ws.close(1000, "worker closed");
      this.ws = null;
    }
  }
}
