/**
 * ## Circuit Breaker
 *
 * One instance per downstream target.
 *
 * ```
 * closed ──(threshold failures within window)──► open
 * open ──(cool-down elapsed, next caller)──► half-open (that caller is the trial)
 * half-open ──trial ok──► closed (counters and cool-down reset)
 * half-open ──trial failed──► open (cool-down * multiplier, capped)
 * ```
 *
 * Permit acquisition and outcome recording are synchronous, so concurrent
 * callers of one breaker never observe a partial update.
 */

import { CircuitOpenError, OperationCancelledError, isTransientError } from "../errors/index.js";
import { circuitFSM, type CircuitState } from "../fsm/index.js";
import { createNoOpLogger, type Logger } from "../logging/index.js";
import { systemClock, type Clock } from "../types.js";

export interface CircuitBreakerSettings {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Failures further apart than this restart the count */
  windowMs: number;
  /** First cool-down after opening */
  cooldownMs: number;
  /** Cap for the grown cool-down */
  maxCooldownMs: number;
  /** Cool-down growth after a failed trial */
  cooldownMultiplier: number;
}

export const CIRCUIT_DEFAULTS: CircuitBreakerSettings = {
  failureThreshold: 5,
  windowMs: 60_000,
  cooldownMs: 60_000,
  maxCooldownMs: 300_000,
  cooldownMultiplier: 2,
};

export interface CircuitBreakerOptions extends Partial<CircuitBreakerSettings> {
  now?: Clock | undefined;
  logger?: Logger | undefined;
}

export interface CircuitSnapshot {
  target: string;
  state: CircuitState;
  consecutiveFailures: number;
  lastFailureAt: number | null;
  openedAt: number | null;
  currentCooldownMs: number;
  /** False while open and cooling down, or while a half-open trial runs */
  acceptingCalls: boolean;
  totalSuccesses: number;
  totalFailures: number;
  totalRejections: number;
}

export interface CircuitStateChange {
  target: string;
  from: CircuitState;
  to: CircuitState;
  at: number;
}

export type CircuitStateListener = (change: CircuitStateChange) => void;

export type CircuitPermit =
  | { allowed: true; trial: boolean }
  | { allowed: false; retryAfterMs: number };

export class CircuitBreaker {
  readonly target: string;
  private readonly settings: CircuitBreakerSettings;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly listeners = new Set<CircuitStateListener>();

  private state: CircuitState = circuitFSM.initial;
  private consecutiveFailures = 0;
  private streakStartedAt: number | null = null;
  private lastFailureAt: number | null = null;
  private openedAt: number | null = null;
  private currentCooldownMs: number;
  private trialInFlight = false;
  private totalSuccesses = 0;
  private totalFailures = 0;
  private totalRejections = 0;

  constructor(target: string, options: CircuitBreakerOptions = {}) {
    const { now, logger, ...overrides } = options;
    this.target = target;
    this.settings = { ...CIRCUIT_DEFAULTS, ...overrides };
    this.now = now ?? systemClock;
    this.logger = logger ?? createNoOpLogger();
    this.currentCooldownMs = this.settings.cooldownMs;

    if (this.settings.failureThreshold < 1) {
      throw new RangeError(`Invalid failureThreshold: ${this.settings.failureThreshold}. Must be >= 1.`);
    }
    if (this.settings.cooldownMultiplier < 1) {
      throw new RangeError(
        `Invalid cooldownMultiplier: ${this.settings.cooldownMultiplier}. Must be >= 1.`
      );
    }
  }

  /**
   * Ask to place a call. A granted permit must be settled with exactly one of
   * `recordSuccess`, `recordFailure` or `releasePermit`.
   */
  tryAcquire(): CircuitPermit {
    switch (this.state) {
      case "closed":
        return { allowed: true, trial: false };

      case "open": {
        const remaining = this.remainingCooldownMs();
        if (remaining > 0) {
          this.totalRejections++;
          return { allowed: false, retryAfterMs: remaining };
        }
        this.transition("half-open");
        this.trialInFlight = true;
        return { allowed: true, trial: true };
      }

      case "half-open":
        if (this.trialInFlight) {
          this.totalRejections++;
          return { allowed: false, retryAfterMs: 0 };
        }
        this.trialInFlight = true;
        return { allowed: true, trial: true };
    }
  }

  recordSuccess(): void {
    this.totalSuccesses++;
    this.consecutiveFailures = 0;
    this.streakStartedAt = null;

    if (this.state === "half-open") {
      this.trialInFlight = false;
      this.currentCooldownMs = this.settings.cooldownMs;
      this.openedAt = null;
      this.transition("closed");
    }
  }

  recordFailure(): void {
    const now = this.now();
    this.totalFailures++;
    this.lastFailureAt = now;

    if (this.state === "half-open") {
      this.trialInFlight = false;
      this.currentCooldownMs = Math.min(
        this.settings.maxCooldownMs,
        Math.round(this.currentCooldownMs * this.settings.cooldownMultiplier)
      );
      this.openedAt = now;
      this.transition("open");
      return;
    }

    if (this.state === "open") {
      // A call admitted before the circuit opened finished late
      return;
    }

    if (this.streakStartedAt === null || now - this.streakStartedAt > this.settings.windowMs) {
      this.streakStartedAt = now;
      this.consecutiveFailures = 1;
    } else {
      this.consecutiveFailures++;
    }

    if (this.consecutiveFailures >= this.settings.failureThreshold) {
      this.openedAt = now;
      this.transition("open");
    }
  }

  /**
   * Give back a permit without an outcome (the caller cancelled).
   */
  releasePermit(): void {
    if (this.state === "half-open") {
      this.trialInFlight = false;
    }
  }

  /**
   * Run `operation` under this breaker.
   *
   * Only errors matching `isFailure` count against the circuit. Any other
   * error means the target answered, so it counts as a success.
   *
   * @throws CircuitOpenError without calling `operation` when no permit is granted
   */
  async execute<T>(
    operation: () => Promise<T>,
    isFailure: (error: unknown) => boolean = isTransientError
  ): Promise<T> {
    const permit = this.tryAcquire();
    if (!permit.allowed) {
      throw new CircuitOpenError(this.target, permit.retryAfterMs);
    }

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        this.releasePermit();
      } else if (isFailure(error)) {
        this.recordFailure();
      } else {
        this.recordSuccess();
      }
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  /**
   * Administrative override: force the circuit closed and clear counters.
   * Bypasses the state machine.
   */
  reset(): void {
    const from = this.state;
    this.state = "closed";
    this.consecutiveFailures = 0;
    this.streakStartedAt = null;
    this.lastFailureAt = null;
    this.openedAt = null;
    this.trialInFlight = false;
    this.currentCooldownMs = this.settings.cooldownMs;
    if (from !== "closed") {
      this.logger.info("Circuit reset", { target: this.target, from });
      this.emit({ target: this.target, from, to: "closed", at: this.now() });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    return {
      target: this.target,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
      openedAt: this.openedAt,
      currentCooldownMs: this.currentCooldownMs,
      acceptingCalls: this.isCallPermitted(),
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.totalFailures,
      totalRejections: this.totalRejections,
    };
  }

  /**
   * Whether `tryAcquire` would grant a permit right now. Does not change state.
   */
  isCallPermitted(): boolean {
    switch (this.state) {
      case "closed":
        return true;
      case "open":
        return this.remainingCooldownMs() === 0;
      case "half-open":
        return !this.trialInFlight;
    }
  }

  onStateChange(listener: CircuitStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private remainingCooldownMs(): number {
    if (this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.currentCooldownMs - this.now());
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    circuitFSM.assertTransition(from, to);
    this.state = to;

    const change: CircuitStateChange = { target: this.target, from, to, at: this.now() };
    if (to === "open") {
      this.logger.warn("Circuit opened", {
        target: this.target,
        from,
        consecutiveFailures: this.consecutiveFailures,
        cooldownMs: this.currentCooldownMs,
      });
    } else {
      this.logger.info(`Circuit ${to}`, { target: this.target, from });
    }
    this.emit(change);
  }

  private emit(change: CircuitStateChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error("Circuit state listener threw", {
          target: this.target,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
