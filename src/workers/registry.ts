import { ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { Worker } from "./worker.js";

export type WorkerHealth = {
  name: string;
  capability: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

/** Maps capability names to worker implementations. */
export class WorkerRegistry {
  private workers = new Map<string, Worker>();
  private healthCache = new Map<string, WorkerHealth>();

  add(worker: Worker): void {
    if (this.workers.has(worker.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Worker "${worker.name}" already registered`);
    }
    this.workers.set(worker.name, worker);
  }

  remove(name: string): boolean {
    this.healthCache.delete(name);
    return this.workers.delete(name);
  }

  get(name: string): Worker | undefined {
    return this.workers.get(name);
  }

  list(): Worker[] {
    return [...this.workers.values()];
  }

  names(): string[] {
    return [...this.workers.keys()];
  }

  /** Distinct capabilities, sorted. */
  capabilities(): string[] {
    return [...new Set(this.list().map((w) => w.capability))].sort();
  }

  /** First registered worker for a capability. */
  forCapability(capability: string): Worker | undefined {
    return this.list().find((w) => w.capability === capability);
  }

  async checkHealth(name: string): Promise<WorkerHealth> {
    const worker = this.get(name);
    if (!worker) {
      return { name, capability: "unknown", healthy: false, lastCheck: Date.now(), error: "Worker not found" };
    }

    const start = Date.now();
    let result: WorkerHealth;
    try {
      // No health check method - assume healthy
      const healthy = worker.healthCheck ? await worker.healthCheck() : true;
      result = {
        name,
        capability: worker.capability,
        healthy,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
      };
    } catch (err) {
      result = {
        name,
        capability: worker.capability,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: String(err),
      };
      log.warn(`Health check failed for worker "${name}"`, { error: String(err) });
    }
    this.healthCache.set(name, result);
    return result;
  }

  async checkAllHealth(): Promise<WorkerHealth[]> {
    return Promise.all(this.names().map((name) => this.checkHealth(name)));
  }

  getCachedHealth(name: string): WorkerHealth | undefined {
    return this.healthCache.get(name);
  }

  closeAll(): void {
    for (const worker of this.workers.values()) {
      worker.close?.();
    }
  }
}
