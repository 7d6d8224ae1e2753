import type { AggregatedResult } from "../aggregate/types.js";
import { errorMessage, ValidationGateFailure } from "../errors.js";
import { log as rootLog } from "../utils/logger.js";
import type { FindingSeverity } from "../workers/types.js";
import type {
  CoverageGate,
  CustomPredicateGate,
  GateOutcome,
  GatePredicate,
  QualityGate,
  SecurityGate,
  ValidationSummary,
  ZeroErrorsGate,
} from "./types.js";

const log = rootLog.child("validation");

const SEVERITY_RANK: Record<FindingSeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export type ValidationPipelineOptions = {
  /** Named predicates that `custom-predicate` gates refer to. */
  predicates?: Record<string, GatePredicate>;
};

function gateName(gate: QualityGate): string {
  if (gate.name) return gate.name;
  return gate.type === "custom-predicate" ? `custom:${gate.predicate}` : gate.type;
}

/** Gates that measure the same thing share a key. */
function metricKey(gate: QualityGate): string {
  return gate.type === "custom-predicate" ? `${gate.type}:${gate.predicate}` : gate.type;
}

function groupByMetric(gates: readonly QualityGate[]): QualityGate[][] {
  const groups = new Map<string, QualityGate[]>();
  for (const gate of gates) {
    const key = metricKey(gate);
    const group = groups.get(key);
    if (group) group.push(gate);
    else groups.set(key, [gate]);
  }
  return [...groups.values()];
}

function countErrors(result: AggregatedResult): number {
  return result.metrics.errorCount + result.deliverables.filter((d) => d.validationStatus === "failed").length;
}

export class ValidationPipeline {
  private predicates: Map<string, GatePredicate>;

  constructor(opts?: ValidationPipelineOptions) {
    this.predicates = new Map(Object.entries(opts?.predicates ?? {}));
  }

  registerPredicate(name: string, predicate: GatePredicate): void {
    this.predicates.set(name, predicate);
  }

  /**
   * Evaluate every gate against the aggregated result. Gates on the same
   * metric are folded into one outcome that uses the strictest threshold and
   * blocks if any member blocks.
   */
  evaluate(result: AggregatedResult, gates: readonly QualityGate[]): GateOutcome[] {
    const outcomes: GateOutcome[] = [];
    for (const group of groupByMetric(gates)) {
      const outcome = this.evaluateGroup(result, group);
      log.debug(`Gate "${outcome.name}" ${outcome.passed ? "passed" : "failed"}`, { detail: outcome.detail });
      outcomes.push(outcome);
    }
    return outcomes;
  }

  summarize(outcomes: readonly GateOutcome[]): ValidationSummary {
    const failures: ValidationGateFailure[] = [];
    const warnings: string[] = [];

    for (const outcome of outcomes) {
      if (outcome.mergedFrom) {
        warnings.push(
          `Duplicate ${outcome.type} gates merged (${outcome.mergedFrom.join(", ")}); the strictest threshold applies`,
        );
      }
      if (outcome.passed) continue;
      failures.push(new ValidationGateFailure(outcome.name, outcome.blocking, outcome.detail));
      if (!outcome.blocking) warnings.push(`Advisory gate "${outcome.name}" failed: ${outcome.detail}`);
    }

    return { passed: failures.every((f) => !f.blocking), failures, warnings };
  }

  private evaluateGroup(result: AggregatedResult, group: QualityGate[]): GateOutcome {
    const first = group[0];
    const blocking = group.some((g) => g.blocking !== false);
    const merged = group.length > 1 ? { mergedFrom: group.map(gateName) } : {};

    const outcome = this.measure(result, group);
    return { name: gateName(first), blocking, ...outcome, ...merged };
  }

  private measure(result: AggregatedResult, group: QualityGate[]): Omit<GateOutcome, "name" | "blocking"> {
    switch (group[0].type) {
      case "zero-errors":
        return this.zeroErrors(result, group.filter((g): g is ZeroErrorsGate => g.type === "zero-errors"));
      case "coverage-threshold":
        return this.coverage(result, group.filter((g): g is CoverageGate => g.type === "coverage-threshold"));
      case "security-severity":
        return this.security(result, group.filter((g): g is SecurityGate => g.type === "security-severity"));
      case "custom-predicate":
        return this.custom(result, group.filter((g): g is CustomPredicateGate => g.type === "custom-predicate"));
    }
  }

  private zeroErrors(result: AggregatedResult, gates: ZeroErrorsGate[]): Omit<GateOutcome, "name" | "blocking"> {
    const threshold = Math.min(...gates.map((g) => g.threshold ?? 0));
    const actual = countErrors(result);
    const passed = actual <= threshold;
    return {
      type: "zero-errors",
      passed,
      threshold,
      actual,
      detail: passed ? `${actual} error(s), at most ${threshold} allowed` : `${actual} error(s) exceed the limit of ${threshold}`,
    };
  }

  private coverage(result: AggregatedResult, gates: CoverageGate[]): Omit<GateOutcome, "name" | "blocking"> {
    const threshold = Math.max(...gates.map((g) => g.threshold));
    const actual = result.metrics.coverage;
    if (actual === undefined) {
      return { type: "coverage-threshold", passed: false, threshold, detail: "no coverage reported" };
    }
    const passed = actual >= threshold;
    return {
      type: "coverage-threshold",
      passed,
      threshold,
      actual,
      detail: `coverage ${actual}% ${passed ? "meets" : "is below"} ${threshold}%`,
    };
  }

  private security(result: AggregatedResult, gates: SecurityGate[]): Omit<GateOutcome, "name" | "blocking"> {
    const floor = Math.min(...gates.map((g) => SEVERITY_RANK[g.threshold]));
    const threshold = gates.map((g) => g.threshold).find((s) => SEVERITY_RANK[s] === floor) ?? "low";
    const offending = result.metrics.findings.filter((f) => SEVERITY_RANK[f.severity] >= floor);
    const passed = offending.length === 0;
    return {
      type: "security-severity",
      passed,
      threshold,
      actual: offending.length,
      detail: passed
        ? `no findings at or above ${threshold}`
        : `${offending.length} finding(s) at or above ${threshold}`,
    };
  }

  /** Duplicate custom gates pass only if every member passes. */
  private custom(result: AggregatedResult, gates: CustomPredicateGate[]): Omit<GateOutcome, "name" | "blocking"> {
    const name = gates[0].predicate;
    const predicate = this.predicates.get(name);
    if (!predicate) {
      return { type: "custom-predicate", passed: false, detail: `unknown predicate "${name}"` };
    }

    let last: Omit<GateOutcome, "name" | "blocking"> = { type: "custom-predicate", passed: true, detail: "" };
    for (const gate of gates) {
      last = runPredicate(predicate, result, gate.threshold);
      if (!last.passed) break;
    }
    return last;
  }
}

function runPredicate(
  predicate: GatePredicate,
  result: AggregatedResult,
  threshold: number | undefined,
): Omit<GateOutcome, "name" | "blocking"> {
  const base = { type: "custom-predicate" as const, ...(threshold !== undefined ? { threshold } : {}) };
  try {
    const verdict = predicate(result, threshold);
    if (typeof verdict === "boolean") {
      return { ...base, passed: verdict, detail: verdict ? "predicate passed" : "predicate failed" };
    }
    return {
      ...base,
      passed: verdict.passed,
      ...(verdict.actual !== undefined ? { actual: verdict.actual } : {}),
      detail: verdict.detail ?? (verdict.passed ? "predicate passed" : "predicate failed"),
    };
  } catch (err) {
    return { ...base, passed: false, detail: `predicate threw: ${errorMessage(err)}` };
  }
}
