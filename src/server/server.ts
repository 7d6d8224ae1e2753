import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { CycleError, errorMessage, UnknownDependencyError, ValidationError } from "../errors.js";
import type { Orchestrator } from "../orchestrator.js";
import type { RunStore } from "../persistence/store.js";
import { describeIssues, ExecuteRequestSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { RunRecord, SSEEvent } from "./types.js";

export type ApiServerOptions = {
  orchestrator: Orchestrator;
  port?: number;
  host?: string;
  runStore?: RunStore;
};

export class ApiServer {
  private orchestrator: Orchestrator;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private runs = new Map<string, RunRecord>();
  private runStore?: RunStore;
  private sseClients = new Set<ServerResponse>();
  private pending = new Set<Promise<void>>();

  constructor(opts: ApiServerOptions) {
    this.orchestrator = opts.orchestrator;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.runStore = opts.runStore;
  }

  start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`API server listening on http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  /** Resolves once every run submitted through the API has settled. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  stop(): Promise<void> {
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      return this.handleHealth(res);
    }

    if (method === "GET" && pathname === "/api/workers/health") {
      return this.handleWorkersHealth(res);
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "GET" && pathname === "/api/runs") {
      return this.handleListRuns(res);
    }

    if (method === "POST" && pathname === "/api/runs") {
      return this.handleSubmitRun(req, res);
    }

    if (method === "POST" && pathname === "/api/levels") {
      return this.handleLevels(req, res);
    }

    const runMatch = pathname.match(/^\/api\/runs\/([^/]+)$/);
    if (method === "GET" && runMatch) {
      return this.handleGetRun(res, decodeURIComponent(runMatch[1]));
    }

    if (method === "DELETE" && runMatch) {
      return this.handleDeleteRun(res, decodeURIComponent(runMatch[1]));
    }

    json(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    const workers = this.orchestrator.workers.list().map((w) => ({
      name: w.name,
      type: w.type,
      capability: w.capability,
      description: w.description,
      health: this.orchestrator.workers.getCachedHealth(w.name),
    }));
    json(res, 200, { ok: true, workers, activeRuns: this.orchestrator.activeRuns().length });
  }

  private async handleWorkersHealth(res: ServerResponse): Promise<void> {
    const health = await this.orchestrator.workers.checkAllHealth();
    json(res, 200, { workers: health });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private handleListRuns(res: ServerResponse): void {
    if (this.runStore) {
      json(res, 200, this.runStore.list());
      return;
    }
    const runs = [...this.runs.values()]
      .sort((a, b) => b.startedAt - a.startedAt)
      .map((r) => ({
        runId: r.runId,
        state: r.state,
        status: r.response?.status,
        startedAt: r.startedAt,
        finishedAt: r.response?.finishedAt,
      }));
    json(res, 200, runs);
  }

  private handleGetRun(res: ServerResponse, runId: string): void {
    const record = this.runs.get(runId);
    if (record) {
      json(res, 200, record.response ?? record);
      return;
    }
    const stored = this.runStore?.get(runId);
    if (!stored) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    json(res, 200, stored);
  }

  private handleDeleteRun(res: ServerResponse, runId: string): void {
    if (this.runs.get(runId)?.state === "running") {
      json(res, 409, { error: "Run is still executing" });
      return;
    }

    const inMemory = this.runs.delete(runId);
    const fromStore = this.runStore?.delete(runId) ?? false;

    if (!inMemory && !fromStore) {
      json(res, 404, { error: "Run not found" });
      return;
    }

    this.broadcastSSE({ type: "run:deleted", runId });
    json(res, 200, { deleted: true, runId });
  }

  private async handleLevels(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await readJson(req, res);
    if (raw === undefined) return;

    try {
      const graph = this.orchestrator.levels(raw);
      json(res, 200, { graphId: graph.id, levels: graph.levels, totalEstimatedCost: graph.totalEstimatedCost });
    } catch (err) {
      if (err instanceof ValidationError) {
        json(res, 400, { error: err.message, code: err.code });
        return;
      }
      if (err instanceof CycleError || err instanceof UnknownDependencyError) {
        json(res, 422, { error: err.message, code: err.code });
        return;
      }
      throw err;
    }
  }

  private async handleSubmitRun(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await readJson(req, res);
    if (raw === undefined) return;

    const result = ExecuteRequestSchema.safeParse(raw);
    if (!result.success) {
      json(res, 400, { error: describeIssues(result.error).join("; ") });
      return;
    }

    const runId = randomUUID();
    this.evictFinished();
    this.runs.set(runId, { runId, state: "running", startedAt: Date.now() });
    json(res, 202, { runId });

    const run = this.executeRun(runId, result.data).catch((err: unknown) => {
      log.error("Run execution error", { runId, error: errorMessage(err) });
    });
    this.pending.add(run);
    void run.finally(() => this.pending.delete(run));
  }

  private async executeRun(runId: string, request: unknown): Promise<void> {
    this.broadcastSSE({ type: "run:started", runId });
    const startedAt = Date.now();

    try {
      const response = await this.orchestrator.execute(request, {
        runId,
        callbacks: {
          onTaskStart: (taskId) => this.broadcastSSE({ type: "task:started", runId, taskId }),
          onTaskEnd: (taskId, status) => this.broadcastSSE({ type: "task:ended", runId, taskId, status }),
          onIssue: (issue) => this.broadcastSSE({ type: "run:issue", runId, issue }),
          onProgress: (progress) => {
            const record = this.runs.get(runId);
            if (record) record.progress = progress;
            this.broadcastSSE({ type: "run:progress", runId, progress });
          },
        },
      });
      this.runs.set(runId, { runId, state: "done", startedAt: response.startedAt, response });
      this.broadcastSSE({
        type: "run:complete",
        runId,
        status: response.status,
        durationMs: Date.now() - startedAt,
      });
    } catch (err) {
      const error = errorMessage(err);
      this.runs.set(runId, { runId, state: "error", startedAt, error });
      this.broadcastSSE({ type: "run:error", runId, error });
    }
  }

  /** Keep at most `server.maxRuns` records in memory, dropping the oldest finished ones. */
  private evictFinished(): void {
    const max = getConfig().server.maxRuns;
    for (const [id, record] of this.runs) {
      if (this.runs.size < max) break;
      if (record.state !== "running") this.runs.delete(id);
    }
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

/** Parsed JSON body, or undefined after answering 400. */
async function readJson(req: IncomingMessage, res: ServerResponse): Promise<unknown> {
  const body = await readBody(req);
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    json(res, 400, { error: "Invalid JSON body" });
    return undefined;
  }
}
