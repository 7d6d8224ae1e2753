// Config
export {
  getConfig,
  configure,
  resetConfig,
  resolveRunConfig,
  parseConfigOverrides,
  defaults,
} from "./config.js";
export type { StratumConfig, RunConfig, DeepPartial } from "./config.js";

// Errors
export {
  StratumError,
  ValidationError,
  ConfigError,
  CycleError,
  UnknownDependencyError,
  TaskTimeoutError,
  InvalidResultError,
  WorkerError,
  CircuitOpenError,
  WorkerUnavailableError,
  DependencyFailedError,
  MergeConflictError,
  ResourceExhaustedError,
  RunAbortedError,
  ValidationGateFailure,
  IllegalTransitionError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, MergeConflict } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  describeIssues,
  ExecuteRequestSchema,
  TaskGraphInputSchema,
  TaskInputSchema,
  QualityGateSchema,
  TaskResultSchema,
  ConfigOverridesSchema,
} from "./schemas.js";

// Types
export type {
  ExecuteRequest,
  ExecuteResponse,
  Issue,
  IssueCategory,
  ProgressUpdate,
  RecoveryAction,
  ResourceBudget,
  ResourceUsage,
  RunStatus,
} from "./types.js";

// Graph
export {
  createTaskGraph,
  buildLevels,
  getTask,
  levelOf,
  topologicalOrder,
  dependentsOf,
} from "./graph/task-graph.js";
export { PRIORITY_RANK } from "./graph/types.js";
export type { Priority, Task, TaskInput, TaskGraph, TaskStatus, DeliverableSpec } from "./graph/types.js";

// Workers
export type { Worker } from "./workers/worker.js";
export type {
  TaskRequest,
  TaskResult,
  TaskMetrics,
  Finding,
  FindingSeverity,
  WorkerDeliverable,
} from "./workers/types.js";
export { WorkerRegistry } from "./workers/registry.js";
export type { WorkerHealth } from "./workers/registry.js";
export { FunctionWorker } from "./workers/function-worker.js";
export type { WorkerFunction, FunctionWorkerOptions } from "./workers/function-worker.js";
export { HttpWorker } from "./workers/http-worker.js";
export type { HttpWorkerOptions } from "./workers/http-worker.js";
export { WsWorker, EXECUTE_METHOD, HEALTH_METHOD } from "./workers/ws-worker.js";
export type { WsWorkerOptions, RequestFrame, ResponseFrame } from "./workers/ws-worker.js";

// Pool
export { Semaphore } from "./pool/semaphore.js";
export { CircuitBreaker } from "./pool/circuit-breaker.js";
export type { CircuitState, CircuitBreakerOptions } from "./pool/circuit-breaker.js";
export { WorkerProxy, validateResult } from "./pool/worker-proxy.js";
export type { ProxyCallOptions } from "./pool/worker-proxy.js";
export { WorkerPool } from "./pool/worker-pool.js";
export type { WorkerLease, CapabilityStats } from "./pool/worker-pool.js";

// Scheduling, monitoring, aggregation, validation, escalation
export { Scheduler } from "./scheduler/scheduler.js";
export type { SchedulerHooks, SchedulerOptions, SchedulerOutcome } from "./scheduler/types.js";
export { TaskStateTable } from "./scheduler/task-state.js";
export { ProgressMonitor } from "./monitor/progress-monitor.js";
export type { Anomaly } from "./monitor/progress-monitor.js";
export { aggregate, contentHash } from "./aggregate/result-aggregator.js";
export type { AggregatedResult, Deliverable, TaskOutput } from "./aggregate/types.js";
export { ValidationPipeline } from "./validation/validation-pipeline.js";
export type { QualityGate, GateOutcome, GatePredicate, PredicateVerdict, ValidationSummary } from "./validation/types.js";
export { EscalationPolicy, toIssue } from "./escalation/escalation-policy.js";
export type { Decision } from "./escalation/escalation-policy.js";

// Core
export { Orchestrator, runStatus } from "./orchestrator.js";
export type { OrchestratorOptions, ExecuteOptions, RunCallbacks } from "./orchestrator.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunSummary } from "./persistence/store.js";

// Server
export { ApiServer } from "./server/server.js";
export type { ApiServerOptions } from "./server/server.js";
export type { SSEEvent } from "./server/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay } from "./utils/retry.js";
export { systemClock, ManualClock } from "./utils/clock.js";
export type { Clock } from "./utils/clock.js";
