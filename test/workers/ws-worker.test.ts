import { afterEach, describe, expect, it } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import { InvalidResultError, WorkerError } from "../../src/errors.js";
import type { TaskRequest } from "../../src/workers/types.js";
import { EXECUTE_METHOD, HEALTH_METHOD, WsWorker, type RequestFrame, type ResponseFrame } from "../../src/workers/ws-worker.js";

const request: TaskRequest = {
  taskId: "t1",
  description: "review the diff",
  capability: "review",
  context: {},
  deliverableSpecs: [],
  validationCriteria: [],
  attempt: 1,
};

type Reply = (frame: RequestFrame, socket: WebSocket) => ResponseFrame | undefined;

let wss: WebSocketServer | undefined;
const workers: WsWorker[] = [];

function isRequestFrame(value: unknown): value is RequestFrame {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "req" &&
    "id" in value &&
    typeof value.id === "string" &&
    "method" in value &&
    typeof value.method === "string"
  );
}

async function serve(reply: Reply): Promise<{ url: string; connections: () => number; frames: RequestFrame[] }> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  wss = server;
  let connections = 0;
  const frames: RequestFrame[] = [];

  server.on("connection", (socket) => {
    connections++;
    socket.on("message", (raw) => {
      const frame: unknown = JSON.parse(raw.toString());
      if (!isRequestFrame(frame)) return;
      frames.push(frame);
      const response = reply(frame, socket);
      if (response) socket.send(JSON.stringify(response));
    });
  });

  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("server has no port");
  return { url: `ws://127.0.0.1:${addr.port}`, connections: () => connections, frames };
}

function worker(url: string, connectTimeoutMs?: number): WsWorker {
  const w = new WsWorker({ name: "reviewer", capability: "review", url, connectTimeoutMs });
  workers.push(w);
  return w;
}

afterEach(async () => {
  for (const w of workers.splice(0)) w.close();
  const server = wss;
  wss = undefined;
  if (server) {
    for (const client of server.clients) client.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

const ok = { status: "success", deliverables: [{ path: "review.md", content: "LGTM" }], validationPassed: true };
const signal = () => new AbortController().signal;

describe("WsWorker", () => {
  it("sends the request as a task.execute frame and returns the payload", async () => {
    const { url, frames } = await serve((frame) => ({ type: "res", id: frame.id, ok: true, payload: ok }));

    const result = await worker(url).execute(request, { signal: signal() });

    expect(result).toEqual(ok);
    expect(frames).toHaveLength(1);
    expect(frames[0].method).toBe(EXECUTE_METHOD);
    expect(frames[0].params).toEqual(request);
  });

  it("reuses one connection for many calls", async () => {
    const { url, connections } = await serve((frame) => ({ type: "res", id: frame.id, ok: true, payload: ok }));
    const w = worker(url);

    await Promise.all([w.execute(request, { signal: signal() }), w.execute(request, { signal: signal() })]);
    await w.execute(request, { signal: signal() });

    expect(connections()).toBe(1);
    expect(w.connected).toBe(true);
  });

  it("turns an error frame into a WorkerError", async () => {
    const { url } = await serve((frame) => ({
      type: "res",
      id: frame.id,
      ok: false,
      error: { code: "BUSY", message: "try later" },
    }));

    const err = await worker(url).execute(request, { signal: signal() }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WorkerError);
    expect(err).toHaveProperty("message", 'Task "t1" failed: BUSY: try later');
  });

  it("rejects a payload that is not a TaskResult", async () => {
    const { url } = await serve((frame) => ({ type: "res", id: frame.id, ok: true, payload: { status: "meh" } }));
    await expect(worker(url).execute(request, { signal: signal() })).rejects.toBeInstanceOf(InvalidResultError);
  });

  it("fails pending calls when the connection drops", async () => {
    const { url } = await serve((_frame, socket) => {
      socket.close(1011, "crash");
      return undefined;
    });

    await expect(worker(url).execute(request, { signal: signal() })).rejects.toThrow(
      'Task "t1" failed: Connection closed (code=1011)',
    );
  });

  it("rethrows the abort reason when the call is cancelled", async () => {
    const { url } = await serve(() => undefined);
    const controller = new AbortController();
    const call = worker(url).execute(request, { signal: controller.signal });
    setTimeout(() => controller.abort(new Error("timed out")), 20);

    const err = await call.catch((e: unknown) => e);
    expect(err).not.toBeInstanceOf(WorkerError);
    expect(err).toHaveProperty("message", "timed out");
  });

  it("answers a health probe", async () => {
    const { url, frames } = await serve((frame) => ({ type: "res", id: frame.id, ok: true }));
    expect(await worker(url).healthCheck()).toBe(true);
    expect(frames[0].method).toBe(HEALTH_METHOD);
  });

  it("is unhealthy when it cannot connect", async () => {
    const { url } = await serve(() => undefined);
    const server = wss;
    wss = undefined;
    await new Promise<void>((resolve) => server?.close(() => resolve()));

    expect(await worker(url, 500).healthCheck()).toBe(false);
  });
});
