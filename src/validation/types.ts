import type { AggregatedResult } from "../aggregate/types.js";
import type { ValidationGateFailure } from "../errors.js";
import type { FindingSeverity } from "../workers/types.js";

type GateBase = {
  name?: string;
  /** Defaults to true. A failing blocking gate fails the run. */
  blocking?: boolean;
};

export type ZeroErrorsGate = GateBase & {
  type: "zero-errors";
  /** Maximum errors tolerated; defaults to 0. */
  threshold?: number;
};

export type CoverageGate = GateBase & {
  type: "coverage-threshold";
  /** Minimum mean coverage, percent. */
  threshold: number;
};

export type SecurityGate = GateBase & {
  type: "security-severity";
  /** Lowest severity that fails the gate. */
  threshold: FindingSeverity;
};

export type CustomPredicateGate = GateBase & {
  type: "custom-predicate";
  /** Name of a predicate registered with the pipeline. */
  predicate: string;
  threshold?: number;
};

export type QualityGate = ZeroErrorsGate | CoverageGate | SecurityGate | CustomPredicateGate;

export type GateType = QualityGate["type"];

export type PredicateVerdict = boolean | { passed: boolean; actual?: number | string; detail?: string };

export type GatePredicate = (result: AggregatedResult, threshold: number | undefined) => PredicateVerdict;

export type GateOutcome = {
  name: string;
  type: GateType;
  blocking: boolean;
  passed: boolean;
  threshold?: number | string;
  actual?: number | string;
  detail: string;
  /** Names of duplicate gates folded into this outcome. */
  mergedFrom?: string[];
};

export type ValidationSummary = {
  /** True when every blocking gate passed. */
  passed: boolean;
  failures: ValidationGateFailure[];
  warnings: string[];
};
