#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { configure, getConfig, parseConfigOverrides } from "./config.js";
import { errorMessage } from "./errors.js";
import { Orchestrator } from "./orchestrator.js";
import { RunStore } from "./persistence/store.js";
import { ApiServer } from "./server/server.js";
import type { ExecuteResponse } from "./types.js";
import { setLogLevel } from "./utils/logger.js";
import { HttpWorker } from "./workers/http-worker.js";
import { WsWorker } from "./workers/ws-worker.js";

type WorkerOptions = {
  worker?: string[];
  wsWorker?: string[];
};

type StoreOptions = {
  db?: string;
};

const program = new Command();

program
  .name("stratum")
  .description("Level, schedule and validate task graphs across capability workers")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--config <file>", "JSON file with configuration overrides");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug === true) setLogLevel("debug");
  if (typeof opts.config === "string") {
    configure(parseConfigOverrides(readJsonFile(opts.config)));
  }
});

function readJsonFile(path: string): unknown {
  const text = readFileSync(path, "utf-8");
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${errorMessage(err)}`);
  }
}

/** Split "capability=url". */
function parseWorkerSpec(spec: string): { capability: string; url: string } {
  const eq = spec.indexOf("=");
  if (eq <= 0 || eq === spec.length - 1) {
    throw new Error(`Invalid worker "${spec}", expected capability=url`);
  }
  return { capability: spec.slice(0, eq), url: spec.slice(eq + 1) };
}

function buildOrchestrator(opts: WorkerOptions, runStore?: RunStore): Orchestrator {
  const orch = new Orchestrator({ runStore });
  for (const [i, spec] of (opts.worker ?? []).entries()) {
    const { capability, url } = parseWorkerSpec(spec);
    orch.addWorker(new HttpWorker({ name: `http-${capability}-${i}`, capability, url }));
  }
  for (const [i, spec] of (opts.wsWorker ?? []).entries()) {
    const { capability, url } = parseWorkerSpec(spec);
    orch.addWorker(new WsWorker({ name: `ws-${capability}-${i}`, capability, url }));
  }
  return orch;
}

function printSummary(response: ExecuteResponse): void {
  console.error(`Run ${response.runId}: ${response.status}`);
  console.error(
    `  completed ${response.completedTaskIds.length}, failed ${response.failedTaskIds.length}, skipped ${response.skippedTaskIds.length}`,
  );
  for (const issue of response.issues) {
    console.error(`  [${issue.severity}] ${issue.category} -> ${issue.action}: ${issue.description}`);
  }
  for (const warning of response.validationWarnings) {
    console.error(`  warning: ${warning}`);
  }
}

// --- levels ---
program
  .command("levels")
  .description("Validate a task graph and print its execution levels")
  .argument("<file>", "Task graph JSON ({ tasks }) or an execute request ({ taskGraph })")
  .action((file: string) => {
    const raw = readJsonFile(file);
    const input = typeof raw === "object" && raw !== null && "taskGraph" in raw ? raw.taskGraph : raw;
    const graph = new Orchestrator().levels(input);
    for (const [i, level] of graph.levels.entries()) {
      console.log(`Level ${i}: ${level.join(", ")}`);
    }
    console.log(`Total estimated cost: ${graph.totalEstimatedCost}`);
  });

// --- run ---
program
  .command("run")
  .description("Execute a request file against the given workers")
  .argument("<file>", "Execute request JSON")
  .option("-w, --worker <spec...>", "HTTP worker as capability=url")
  .option("--ws-worker <spec...>", "WebSocket worker as capability=url")
  .option("--db <path>", "Persist the response to this SQLite file")
  .action(async (file: string, opts: WorkerOptions & StoreOptions) => {
    const store = opts.db ? new RunStore(opts.db) : undefined;
    const orch = buildOrchestrator(opts, store);
    try {
      const response = await orch.execute(readJsonFile(file), {
        callbacks: {
          onProgress: (p) => console.error(`  ${p.percentage}% (${p.tasksInProgress} running, ~${p.estimatedRemainingMs}ms left)`),
        },
      });
      console.log(JSON.stringify(response, null, 2));
      printSummary(response);
      if (response.status === "failed") process.exitCode = 1;
    } finally {
      orch.shutdown();
      store?.close();
    }
  });

// --- serve ---
program
  .command("serve")
  .description("Start the HTTP API")
  .option("-w, --worker <spec...>", "HTTP worker as capability=url")
  .option("--ws-worker <spec...>", "WebSocket worker as capability=url")
  .option("--db <path>", "SQLite file for run history")
  .option("-p, --port <port>", "Port")
  .option("--host <host>", "Host")
  .action(async (opts: WorkerOptions & StoreOptions & { port?: string; host?: string }) => {
    const store = new RunStore(opts.db);
    const orch = buildOrchestrator(opts, store);
    const server = new ApiServer({
      orchestrator: orch,
      runStore: store,
      port: opts.port !== undefined ? Number(opts.port) : getConfig().server.port,
      host: opts.host,
    });

    const addr = await server.start();
    console.log(`API:     http://${addr.host}:${addr.port}`);
    console.log(`Workers: ${orch.workers.names().join(", ") || "(none)"}`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      orch.shutdown();
      server
        .stop()
        .then(() => {
          store.close();
          process.exit(0);
        })
        .catch((err: unknown) => {
          console.error("Shutdown failed:", errorMessage(err));
          process.exit(1);
        });
    });
  });

// --- runs ---
const runs = program.command("runs").description("Inspect stored runs");

runs
  .command("list")
  .description("List stored runs, newest first")
  .option("--db <path>", "SQLite file")
  .option("-l, --limit <n>", "Maximum runs to show", "20")
  .action((opts: StoreOptions & { limit: string }) => {
    const store = new RunStore(opts.db);
    try {
      for (const run of store.list(Number(opts.limit))) {
        console.log(`${run.runId}  ${run.status.padEnd(9)} ${new Date(run.startedAt).toISOString()}  ${run.graphId}`);
      }
    } finally {
      store.close();
    }
  });

runs
  .command("show")
  .description("Print a stored response")
  .argument("<runId>")
  .option("--db <path>", "SQLite file")
  .action((runId: string, opts: StoreOptions) => {
    const store = new RunStore(opts.db);
    try {
      const response = store.get(runId);
      if (!response) {
        console.error(`Run ${runId} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(response, null, 2));
    } finally {
      store.close();
    }
  });

runs
  .command("delete")
  .description("Delete a stored run")
  .argument("<runId>")
  .option("--db <path>", "SQLite file")
  .action((runId: string, opts: StoreOptions) => {
    const store = new RunStore(opts.db);
    try {
      if (store.delete(runId)) {
        console.log(`Deleted ${runId}`);
      } else {
        console.error(`Run ${runId} not found`);
        process.exitCode = 1;
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
