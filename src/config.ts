import { ConfigError } from "./errors.js";
import type { Priority } from "./graph/types.js";
import { ConfigOverridesSchema, describeIssues } from "./schemas.js";
import type { IssueCategory, RecoveryAction } from "./types.js";

export type StratumConfig = {
  pool: {
    /** Concurrent worker slots per capability. */
    maxPerCapability: number;
  };
  retry: {
    /** Total attempts per task, including the first. */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  timeouts: {
    taskDefault: number;
    /** Applied to the next attempt's timeout after a timeout. */
    escalationMultiplier: number;
    ceiling: number;
    httpHealth: number;
  };
  circuitBreaker: {
    failureThreshold: number;
    resetTimeoutMs: number;
  };
  scheduler: {
    /** Tasks below this priority are skipped silently when a dependency fails. */
    skipReportFloor: Priority;
  };
  escalation: {
    escalateCritical: boolean;
    overrides: Partial<Record<IssueCategory, RecoveryAction>>;
  };
  monitor: {
    anomalyFactor: number;
    /** Milliseconds represented by one unit of a task's estimatedCost. */
    costUnitMs: number;
    progressIntervalMs: number;
  };
  server: {
    port: number;
    host: string;
    maxRuns: number;
  };
};

/** The parts a single execute request may override. */
export type RunConfig = Omit<StratumConfig, "server">;

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: StratumConfig = {
  pool: {
    maxPerCapability: 3,
  },
  retry: {
    maxRetries: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 10_000,
  },
  timeouts: {
    taskDefault: 60_000,
    escalationMultiplier: 1.5,
    ceiling: 300_000,
    httpHealth: 5_000,
  },
  circuitBreaker: {
    failureThreshold: 5,
    resetTimeoutMs: 30_000,
  },
  scheduler: {
    skipReportFloor: "low",
  },
  escalation: {
    escalateCritical: true,
    overrides: {},
  },
  monitor: {
    anomalyFactor: 2,
    costUnitMs: 1_000,
    progressIntervalMs: 10_000,
  },
  server: {
    port: 3000,
    host: "127.0.0.1",
    maxRuns: 50,
  },
};

let current: StratumConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T extends object>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(structuredClone(base)));
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val;
  }
  return result as T;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<StratumConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Validate raw overrides, e.g. the contents of a config file. */
export function parseConfigOverrides(raw: unknown): DeepPartial<StratumConfig> {
  const result = ConfigOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error).join("; ")}`);
  }
  return result.data;
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<StratumConfig> {
  return current;
}

/** Layer per-request overrides on top of the process-wide config. */
export function resolveRunConfig(overrides?: DeepPartial<RunConfig>): RunConfig {
  const { server: _server, ...base } = current;
  return overrides ? deepMerge<RunConfig>(base, overrides) : structuredClone(base);
}

/** The default config values (frozen). */
export const defaults: Readonly<StratumConfig> = Object.freeze(structuredClone(DEFAULTS));
