import { createHash } from "node:crypto";
import { MergeConflictError, type MergeConflict } from "../errors.js";
import { compareIds } from "../graph/task-graph.js";
import type { AggregatedMetrics, AggregatedResult, Deliverable, TaskOutput, ValidationStatus } from "./types.js";

export function contentHash(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

function validationStatusOf(output: TaskOutput): ValidationStatus {
  if (!output.hasValidationCriteria) return "skipped";
  return output.result.validationPassed ? "passed" : "failed";
}

function collectMetrics(outputs: readonly TaskOutput[]): AggregatedMetrics {
  let errorCount = 0;
  const coverage: number[] = [];
  const findings: AggregatedMetrics["findings"] = [];

  for (const { taskId, result } of outputs) {
    const metrics = result.metrics;
    if (!metrics) continue;
    errorCount += metrics.errorCount ?? 0;
    if (metrics.coverage !== undefined) coverage.push(metrics.coverage);
    for (const finding of metrics.findings ?? []) findings.push({ ...finding, taskId });
  }

  return {
    errorCount,
    ...(coverage.length > 0 ? { coverage: coverage.reduce((a, b) => a + b, 0) / coverage.length } : {}),
    findings,
  };
}

/**
 * Merge the deliverables of completed tasks into one artifact set, keyed by
 * path. Byte-identical copies of a path collapse into the first producer by
 * task id; differing content is a conflict. Every conflict is reported at
 * once, together with the aggregation of the remaining paths.
 */
export function aggregate(outputs: readonly TaskOutput[]): AggregatedResult {
  const ordered = [...outputs].sort((a, b) => compareIds(a.taskId, b.taskId));
  const byPath = new Map<string, Deliverable[]>();

  for (const output of ordered) {
    const status = validationStatusOf(output);
    for (const d of output.result.deliverables) {
      const deliverable: Deliverable = {
        taskId: output.taskId,
        path: d.path,
        content: d.content,
        contentHash: contentHash(d.content),
        ...(d.type !== undefined ? { type: d.type } : {}),
        validationStatus: status,
      };
      const group = byPath.get(d.path);
      if (group) group.push(deliverable);
      else byPath.set(d.path, [deliverable]);
    }
  }

  const accepted: Deliverable[] = [];
  const conflicts: MergeConflict[] = [];

  for (const [path, group] of byPath) {
    const hashes = new Set(group.map((d) => d.contentHash));
    if (hashes.size === 1) {
      accepted.push(group[0]);
    } else {
      conflicts.push({ path, taskIds: [...new Set(group.map((d) => d.taskId))] });
    }
  }

  accepted.sort((a, b) => compareIds(a.path, b.path));
  conflicts.sort((a, b) => compareIds(a.path, b.path));

  const result: AggregatedResult = {
    deliverables: accepted,
    metrics: collectMetrics(ordered),
    taskIds: ordered.map((o) => o.taskId),
  };

  if (conflicts.length > 0) throw new MergeConflictError(conflicts, result);
  return result;
}
