import { z } from "zod";
import { ValidationError } from "./errors.js";

const PrioritySchema = z.enum(["critical", "high", "medium", "low"]);
const SeveritySchema = z.enum(["low", "medium", "high", "critical"]);

export const DeliverableSpecSchema = z.object({
  path: z.string().min(1, "deliverable path must not be empty"),
  type: z.string().optional(),
  required: z.boolean().optional(),
});

export const TaskInputSchema = z.object({
  id: z.string().trim().min(1, "task id must not be empty"),
  description: z.string(),
  capability: z.string().trim().min(1, "task capability must not be empty"),
  dependencies: z.array(z.string()).optional(),
  priority: PrioritySchema.optional(),
  estimatedCost: z.number().nonnegative().optional(),
  deliverableSpecs: z.array(DeliverableSpecSchema).optional(),
  validationCriteria: z.array(z.string()).optional(),
});

const gateBase = {
  name: z.string().optional(),
  blocking: z.boolean().optional(),
};

export const QualityGateSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("zero-errors"), threshold: z.number().int().nonnegative().optional(), ...gateBase }),
  z.object({ type: z.literal("coverage-threshold"), threshold: z.number().min(0).max(100), ...gateBase }),
  z.object({ type: z.literal("security-severity"), threshold: SeveritySchema, ...gateBase }),
  z.object({
    type: z.literal("custom-predicate"),
    predicate: z.string().min(1),
    threshold: z.number().optional(),
    ...gateBase,
  }),
]);

const positive = z.number().positive();

/** Largest delay a Node timer honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;
const delayMs = z.number().positive().max(MAX_TIMER_MS);

export const RunConfigOverridesSchema = z
  .object({
    pool: z.object({ maxPerCapability: z.number().int().positive() }).partial(),
    retry: z
      .object({ maxRetries: z.number().int().positive(), baseDelayMs: z.number().nonnegative().max(MAX_TIMER_MS), maxDelayMs: delayMs })
      .partial(),
    timeouts: z
      .object({ taskDefault: delayMs, escalationMultiplier: z.number().min(1), ceiling: delayMs, httpHealth: delayMs })
      .partial(),
    circuitBreaker: z
      .object({ failureThreshold: z.number().int().positive(), resetTimeoutMs: z.number().nonnegative().max(MAX_TIMER_MS) })
      .partial(),
    scheduler: z.object({ skipReportFloor: PrioritySchema }).partial(),
    escalation: z
      .object({
        escalateCritical: z.boolean(),
        overrides: z
          .object({
            timeout: z.enum(["retry", "skip", "escalate"]),
            "invalid-result": z.enum(["retry", "skip", "escalate"]),
            dependency: z.enum(["retry", "skip", "escalate"]),
            "resource-exhausted": z.enum(["retry", "skip", "escalate"]),
            "merge-conflict": z.enum(["retry", "skip", "escalate"]),
          })
          .partial(),
      })
      .partial(),
    monitor: z
      .object({ anomalyFactor: positive, costUnitMs: positive, progressIntervalMs: delayMs })
      .partial(),
  })
  .partial();

/** Process-wide configuration overrides, as read from a config file. */
export const ConfigOverridesSchema = RunConfigOverridesSchema.extend({
  server: z
    .object({ port: z.number().int().min(0).max(65_535), host: z.string().min(1), maxRuns: z.number().int().positive() })
    .partial(),
}).partial();

export const TaskGraphInputSchema = z.object({
  id: z.string().trim().min(1).optional(),
  tasks: z.array(TaskInputSchema),
});

export const ExecuteRequestSchema = z.object({
  taskGraph: TaskGraphInputSchema,
  contextData: z.record(z.unknown()).default({}),
  qualityGates: z.array(QualityGateSchema).default([]),
  resourceBudget: z
    .object({
      timeMs: delayMs.optional(),
      maxCost: z.number().nonnegative().optional(),
    })
    .optional(),
  config: RunConfigOverridesSchema.optional(),
});

export const TaskResultSchema = z.object({
  status: z.enum(["success", "failure"]),
  deliverables: z.array(
    z.object({
      path: z.string().min(1),
      content: z.string(),
      type: z.string().optional(),
    }),
  ),
  validationPassed: z.boolean(),
  errorDetail: z.string().optional(),
  metrics: z
    .object({
      errorCount: z.number().int().nonnegative().optional(),
      coverage: z.number().min(0).max(100).optional(),
      findings: z.array(z.object({ severity: SeveritySchema, message: z.string() })).optional(),
    })
    .optional(),
});

/** Describe zod issues as "path: message" strings. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}

/** Parse with a schema, throwing a ValidationError listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError("VALIDATION_FAILED", describeIssues(result.error).join("; "));
  }
  return result.data;
}
