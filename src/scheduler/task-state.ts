import { IllegalTransitionError } from "../errors.js";
import type { TaskStatus } from "../graph/types.js";

export type TaskState = {
  status: TaskStatus;
  /** Times the task entered `running`. */
  runs: number;
  reason?: string;
};

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running", "skipped"],
  running: ["completed", "failed", "skipped"],
  completed: [],
  failed: [],
  skipped: [],
};

/**
 * Status table for one run. The only writer of task status; every change
 * goes through `transition`.
 */
export class TaskStateTable {
  private states = new Map<string, TaskState>();

  constructor(taskIds: Iterable<string>) {
    for (const id of taskIds) this.states.set(id, { status: "pending", runs: 0 });
  }

  status(id: string): TaskStatus {
    return this.get(id).status;
  }

  reason(id: string): string | undefined {
    return this.states.get(id)?.reason;
  }

  runs(id: string): number {
    return this.states.get(id)?.runs ?? 0;
  }

  transition(id: string, to: TaskStatus, reason?: string): void {
    const state = this.get(id);
    if (!ALLOWED[state.status].includes(to)) {
      throw new IllegalTransitionError(id, state.status, to);
    }
    this.apply(state, to, reason);
  }

  /** failed → running, reserved for an explicit whole-task retry. */
  reopen(id: string): void {
    const state = this.get(id);
    if (state.status !== "failed") {
      throw new IllegalTransitionError(id, state.status, "running");
    }
    this.apply(state, "running");
  }

  idsWith(status: TaskStatus): string[] {
    return [...this.states.entries()].filter(([, s]) => s.status === status).map(([id]) => id);
  }

  counts(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0, skipped: 0 };
    for (const state of this.states.values()) counts[state.status]++;
    return counts;
  }

  private apply(state: TaskState, to: TaskStatus, reason?: string): void {
    state.status = to;
    state.reason = reason;
    if (to === "running") state.runs++;
  }

  private get(id: string): TaskState {
    const state = this.states.get(id);
    if (!state) throw new IllegalTransitionError(id, "unknown", "any");
    return state;
  }
}
