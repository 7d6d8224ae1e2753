import type { TaskStatus } from "../graph/types.js";
import type { ExecuteResponse, Issue, ProgressUpdate, RunStatus } from "../types.js";

export type RunRecord = {
  runId: string;
  state: "running" | "done" | "error";
  startedAt: number;
  progress?: ProgressUpdate;
  response?: ExecuteResponse;
  error?: string;
};

// --- SSE Event Types ---

export type SSEEvent =
  | { type: "run:started"; runId: string; graphId?: string }
  | { type: "task:started"; runId: string; taskId: string }
  | { type: "task:ended"; runId: string; taskId: string; status: TaskStatus }
  | { type: "run:issue"; runId: string; issue: Issue }
  | { type: "run:progress"; runId: string; progress: ProgressUpdate }
  | { type: "run:complete"; runId: string; status: RunStatus; durationMs: number }
  | { type: "run:error"; runId: string; error: string }
  | { type: "run:deleted"; runId: string };
