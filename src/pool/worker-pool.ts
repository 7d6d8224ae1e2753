import type { RunConfig } from "../config.js";
import { RunAbortedError, WorkerUnavailableError } from "../errors.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { log } from "../utils/logger.js";
import type { WorkerRegistry } from "../workers/registry.js";
import type { CircuitState } from "./circuit-breaker.js";
import { Semaphore } from "./semaphore.js";
import { WorkerProxy } from "./worker-proxy.js";

export type WorkerPoolOptions = {
  registry: WorkerRegistry;
  config: Pick<RunConfig, "pool" | "retry" | "timeouts" | "circuitBreaker">;
  clock?: Clock;
};

/** A held slot. Call `release` exactly once when the task is done with the proxy. */
export type WorkerLease = {
  proxy: WorkerProxy;
  release: () => void;
};

export type CapabilityStats = {
  capability: string;
  inUse: number;
  waiting: number;
  capacity: number;
  circuit: CircuitState;
  failureCount: number;
  calls: number;
};

type Slot = {
  proxy: WorkerProxy;
  semaphore: Semaphore;
};

/**
 * Run-scoped pool: one proxy and one semaphore per capability, created on
 * first use. Shutting the pool down cancels in-flight calls and waiters.
 */
export class WorkerPool {
  private registry: WorkerRegistry;
  private config: WorkerPoolOptions["config"];
  private clock: Clock;
  private slots = new Map<string, Slot>();
  private lifetime = new AbortController();

  constructor(opts: WorkerPoolOptions) {
    this.registry = opts.registry;
    this.config = opts.config;
    this.clock = opts.clock ?? systemClock;
  }

  /** Aborted when the pool shuts down; proxies observe it alongside the run signal. */
  get signal(): AbortSignal {
    return this.lifetime.signal;
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  /** Wait for a free slot for `capability`. */
  async acquire(capability: string, signal?: AbortSignal): Promise<WorkerLease> {
    if (this.closed) throw this.lifetime.signal.reason;

    const slot = this.slotFor(capability);
    const waitSignal = signal ? AbortSignal.any([signal, this.lifetime.signal]) : this.lifetime.signal;
    const release = await slot.semaphore.acquire(waitSignal);
    return { proxy: slot.proxy, release };
  }

  /** Proxy for a capability, if one has been created this run. */
  proxy(capability: string): WorkerProxy | undefined {
    return this.slots.get(capability)?.proxy;
  }

  stats(): CapabilityStats[] {
    return [...this.slots.entries()]
      .map(([capability, { proxy, semaphore }]) => ({
        capability,
        inUse: semaphore.inUse,
        waiting: semaphore.waiting,
        capacity: semaphore.capacity,
        circuit: proxy.breaker.state,
        failureCount: proxy.breaker.failureCount,
        calls: proxy.callCount,
      }))
      .sort((a, b) => (a.capability < b.capability ? -1 : 1));
  }

  totalCalls(): number {
    let total = 0;
    for (const { proxy } of this.slots.values()) total += proxy.callCount;
    return total;
  }

  shutdown(reason: unknown = new RunAbortedError("Worker pool shut down")): void {
    if (this.closed) return;
    this.lifetime.abort(reason);
    for (const { semaphore } of this.slots.values()) {
      semaphore.rejectWaiters(reason);
    }
    log.debug("Worker pool shut down", { capabilities: this.slots.size });
  }

  private slotFor(capability: string): Slot {
    const existing = this.slots.get(capability);
    if (existing) return existing;

    const worker = this.registry.forCapability(capability);
    if (!worker) throw new WorkerUnavailableError(capability);

    const slot: Slot = {
      proxy: new WorkerProxy({ worker, config: this.config, clock: this.clock }),
      semaphore: new Semaphore(this.config.pool.maxPerCapability),
    };
    this.slots.set(capability, slot);
    return slot;
  }
}
