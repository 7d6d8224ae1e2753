import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import type { ExecuteResponse, RunStatus } from "../types.js";

const DEFAULT_DB_DIR = join(homedir(), ".stratum");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "runs.db");

/** One line per stored run, without the full response body. */
export type RunSummary = {
  runId: string;
  graphId: string;
  status: RunStatus;
  startedAt: number;
  finishedAt: number;
};

/** Finished run responses in SQLite. Pass ":memory:" for a throwaway store. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        graph_id    TEXT NOT NULL,
        status      TEXT NOT NULL,
        response    TEXT NOT NULL,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(response: ExecuteResponse): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, graph_id, status, response, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      response.runId,
      response.graphId,
      response.status,
      JSON.stringify(response),
      response.startedAt,
      response.finishedAt,
    );
  }

  get(runId: string): ExecuteResponse | undefined {
    const row = this.db.prepare("SELECT response FROM runs WHERE run_id = ?").get(runId) as
      | Pick<RunRow, "response">
      | undefined;
    return row ? parseResponse(row.response) : undefined;
  }

  list(limit = 50): RunSummary[] {
    const rows = this.db
      .prepare("SELECT run_id, graph_id, status, started_at, finished_at FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit) as Omit<RunRow, "response">[];
    return rows.map(rowToSummary);
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete runs started before a given timestamp. */
  deleteOlderThan(timestamp: number): number {
    const result = this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  graph_id: string;
  status: RunStatus;
  response: string;
  started_at: number;
  finished_at: number;
};

function parseResponse(text: string): ExecuteResponse {
  return JSON.parse(text);
}

function rowToSummary(row: Omit<RunRow, "response">): RunSummary {
  return {
    runId: row.run_id,
    graphId: row.graph_id,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}
