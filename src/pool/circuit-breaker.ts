import { systemClock, type Clock } from "../utils/clock.js";
import { log } from "../utils/logger.js";

export type CircuitState = "closed" | "open" | "half-open";

export type CircuitBreakerOptions = {
  name: string;
  /** Failures that open the circuit. Default 5. */
  failureThreshold?: number;
  /** How long the circuit stays open before admitting a trial call. Default 30s. */
  resetTimeoutMs?: number;
  clock?: Clock;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
};

/**
 * closed ──(failures reach threshold)──▶ open ──(reset timeout elapsed)──▶ half-open
 *   ▲                                      ▲                                  │
 *   └──────────────(trial succeeds)────────┼──────────────────────────────────┤
 *                                          └─────────(trial fails)────────────┘
 *
 * Transitions are driven by the clock at the moment a caller asks for
 * admission, so no timers are involved.
 */
export class CircuitBreaker {
  readonly name: string;
  readonly failureThreshold: number;
  readonly resetTimeoutMs: number;

  private clock: Clock;
  private onStateChange?: (from: CircuitState, to: CircuitState) => void;
  private current: CircuitState = "closed";
  private failures = 0;
  private openedAt = 0;
  private lastFailure: number | undefined;
  private trialInFlight = false;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.clock = opts.clock ?? systemClock;
    this.onStateChange = opts.onStateChange;
  }

  get state(): CircuitState {
    return this.current;
  }

  get failureCount(): number {
    return this.failures;
  }

  get lastFailureAt(): number | undefined {
    return this.lastFailure;
  }

  /** When an open circuit will admit its trial call. */
  get retryAt(): number {
    return this.current === "open" ? this.openedAt + this.resetTimeoutMs : this.clock.now();
  }

  /**
   * Ask to make a call. False means fail fast without contacting the worker.
   * In half-open only the single trial call is admitted.
   */
  tryAcquire(): boolean {
    if (this.current === "closed") return true;

    if (this.current === "open") {
      if (this.clock.now() - this.openedAt < this.resetTimeoutMs) return false;
      this.transition("half-open");
    }

    if (this.trialInFlight) return false;
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.trialInFlight = false;
    this.failures = 0;
    if (this.current !== "closed") this.transition("closed");
  }

  recordFailure(): void {
    this.failures++;
    this.lastFailure = this.clock.now();

    if (this.current === "half-open") {
      this.trialInFlight = false;
      this.open();
      return;
    }
    if (this.current === "closed" && this.failures >= this.failureThreshold) {
      this.open();
    }
  }

  /** Give back an admission that ended without a verdict (e.g. the run was cancelled). */
  releaseTrial(): void {
    this.trialInFlight = false;
  }

  private open(): void {
    this.openedAt = this.clock.now();
    this.transition("open");
  }

  private transition(to: CircuitState): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    log.debug(`Circuit "${this.name}" ${from} -> ${to}`, { failures: this.failures });
    this.onStateChange?.(from, to);
  }
}
