import { randomUUID } from "node:crypto";
import { CycleError, UnknownDependencyError, ValidationError } from "../errors.js";
import type { Task, TaskGraph, TaskInput } from "./types.js";

/** Create a validated, leveled and frozen task graph. */
export function createTaskGraph(inputs: TaskInput[], id: string = randomUUID()): TaskGraph {
  const tasks = inputs.map(normalizeTask);

  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) {
      throw new ValidationError("DUPLICATE_TASK", `Duplicate task id "${task.id}"`);
    }
    seen.add(task.id);
  }

  const levels = buildLevels(tasks);
  const totalEstimatedCost = tasks.reduce((sum, t) => sum + t.estimatedCost, 0);

  return Object.freeze({
    id,
    tasks: Object.freeze(tasks),
    levels: Object.freeze(levels.map((level) => Object.freeze(level))),
    totalEstimatedCost,
  });
}

function normalizeTask(input: TaskInput): Task {
  return Object.freeze({
    id: input.id,
    description: input.description,
    capability: input.capability,
    dependencies: Object.freeze([...new Set(input.dependencies ?? [])]),
    priority: input.priority ?? "medium",
    estimatedCost: input.estimatedCost ?? 0,
    deliverableSpecs: Object.freeze((input.deliverableSpecs ?? []).map((s) => Object.freeze({ ...s }))),
    validationCriteria: Object.freeze([...(input.validationCriteria ?? [])]),
  });
}

/**
 * Group tasks into concurrency levels.
 *
 * A task with no dependencies lands in level 0; otherwise its level is one more
 * than the deepest of its dependencies. Ids within a level are sorted so the
 * result is deterministic.
 *
 * @throws UnknownDependencyError when a dependency id is not in `tasks`
 * @throws CycleError when the dependency relation is cyclic
 */
export function buildLevels(tasks: readonly Pick<Task, "id" | "dependencies">[]): string[][] {
  const byId = new Map(tasks.map((t) => [t.id, t]));

  for (const task of tasks) {
    for (const dep of task.dependencies) {
      if (!byId.has(dep)) throw new UnknownDependencyError(task.id, dep);
    }
  }

  // Kahn's algorithm: a task is leveled once every dependency has been.
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const task of tasks) {
    const deps = new Set(task.dependencies);
    remaining.set(task.id, deps.size);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(task.id);
      dependents.set(dep, list);
    }
  }

  const depth = new Map<string, number>();
  const ready = tasks.filter((t) => remaining.get(t.id) === 0).map((t) => t.id);
  for (const id of ready) depth.set(id, 0);

  for (let i = 0; i < ready.length; i++) {
    const id = ready[i];
    const level = depth.get(id) ?? 0;
    for (const next of dependents.get(id) ?? []) {
      depth.set(next, Math.max(depth.get(next) ?? 0, level + 1));
      const left = (remaining.get(next) ?? 0) - 1;
      remaining.set(next, left);
      if (left === 0) ready.push(next);
    }
  }

  if (ready.length < tasks.length) {
    throw new CycleError(findCycle(tasks.filter((t) => (remaining.get(t.id) ?? 0) > 0)));
  }

  const levels: string[][] = [];
  for (const task of tasks) {
    const level = depth.get(task.id) ?? 0;
    while (levels.length <= level) levels.push([]);
    levels[level].push(task.id);
  }
  for (const level of levels) level.sort(compareIds);
  return levels;
}

/**
 * Walk dependencies among tasks Kahn's pass could not level. Each of them
 * depends on another, so the walk from the smallest id must revisit a task;
 * the path from that task onward is the cycle.
 */
function findCycle(stuck: readonly Pick<Task, "id" | "dependencies">[]): string[] {
  const byId = new Map(stuck.map((t) => [t.id, t]));
  const [first] = [...byId.keys()].sort(compareIds);

  const path: string[] = [];
  const position = new Map<string, number>();
  let id: string | undefined = first;
  while (id !== undefined && !position.has(id)) {
    position.set(id, path.length);
    path.push(id);
    id = byId.get(id)?.dependencies.find((dep) => byId.has(dep));
  }
  if (id === undefined) return path;
  return [...path.slice(position.get(id)), id];
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function getTask(graph: TaskGraph, id: string): Task | undefined {
  return graph.tasks.find((t) => t.id === id);
}

/** Index of the level containing `id`, or -1. */
export function levelOf(graph: TaskGraph, id: string): number {
  return graph.levels.findIndex((level) => level.includes(id));
}

/** Tasks in level order (dependencies first). */
export function topologicalOrder(graph: TaskGraph): Task[] {
  const byId = new Map(graph.tasks.map((t) => [t.id, t]));
  return graph.levels.flatMap((level) => level.flatMap((id) => byId.get(id) ?? []));
}

/** Every task that transitively depends on `id`, breadth-first. */
export function dependentsOf(graph: TaskGraph, id: string): string[] {
  const dependents = new Map<string, string[]>();
  for (const task of graph.tasks) {
    for (const dep of task.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(task.id);
      dependents.set(dep, list);
    }
  }

  const queue = [...(dependents.get(id) ?? [])];
  const visited = new Set<string>();
  const order: string[] = [];

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || visited.has(next)) continue;
    visited.add(next);
    order.push(next);
    queue.push(...(dependents.get(next) ?? []));
  }
  return order;
}
