// ---------------------------------------------------------------------------
// Per-dependency circuit breaker with three states: closed, open, half_open.
// ---------------------------------------------------------------------------

import pino from "pino";
import type {
  BreakerConfig,
  BreakerListener,
  BreakerSnapshot,
  DependencyName,
} from "../core/types.js";
import { BreakerState } from "../core/types.js";
import { CircuitOpenError } from "../core/errors.js";
import type { Clock } from "../core/clock.js";
import { systemClock } from "../core/clock.js";

export interface CircuitBreakerOptions extends BreakerConfig {
  clock?: Clock;
  /** Called synchronously on every state transition. */
  onStateChange?: BreakerListener;
  /** Receives errors thrown by `onStateChange`. */
  logger?: pino.Logger;
}

const defaultLogger = pino({ name: "circuit-breaker" });

/**
 * A circuit breaker scoped to a single downstream dependency.
 *
 * After `failureThreshold` executed failures the breaker **opens** and
 * rejects every call for `recoveryTimeoutMs`.  The first call after that
 * window moves it to `half_open` and becomes the single trial call:
 *
 * - A successful trial closes the breaker and resets the failure count.
 * - A failed trial re-opens it for another `recoveryTimeoutMs` window.
 * - Callers arriving while the trial is in flight are rejected.
 *
 * Rejected calls never touch breaker state.  Gate checks and post-call
 * updates are synchronous, so they cannot interleave across concurrent
 * callers; only the guarded operation itself is awaited.
 */
export class CircuitBreaker {
  private state: BreakerState = BreakerState.CLOSED;
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private trialInFlight = false;

  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly clock: Clock;
  private readonly onStateChange?: BreakerListener;
  private readonly logger: pino.Logger;

  constructor(
    public readonly name: DependencyName,
    options: CircuitBreakerOptions,
  ) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new RangeError("failureThreshold must be a positive integer");
    }
    if (!Number.isFinite(options.recoveryTimeoutMs) || options.recoveryTimeoutMs < 0) {
      throw new RangeError("recoveryTimeoutMs must be a non-negative number");
    }

    this.failureThreshold = options.failureThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs;
    this.clock = options.clock ?? systemClock;
    this.onStateChange = options.onStateChange;
    this.logger = options.logger ?? defaultLogger;
  }

  // ── Call gating ─────────────────────────────────────────────────────────

  /**
   * Run `operation` under the breaker.
   *
   * Rejects with {@link CircuitOpenError} without invoking `operation` while
   * the breaker is open or a trial is already in flight.  Otherwise the
   * operation's own result or error is passed through unchanged.
   */
  async attemptCall<T>(operation: () => Promise<T>): Promise<T> {
    const isTrial = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error: unknown) {
      this.recordFailure(isTrial);
      throw error;
    }

    this.recordSuccess(isTrial);
    return result;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  /** The stored state; reading it never triggers a transition. */
  getState(): BreakerState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  snapshot(): BreakerSnapshot {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      failureThreshold: this.failureThreshold,
      recoveryTimeoutMs: this.recoveryTimeoutMs,
      lastFailureTime: this.lastFailureTime,
    };
  }

  // ── State machine ───────────────────────────────────────────────────────

  /**
   * Decide whether a call may proceed.  Returns `true` when the caller takes
   * the half-open trial slot, `false` for a regular closed-state call.
   */
  private admit(): boolean {
    if (this.state === BreakerState.OPEN) {
      // lastFailureTime is always set while open.
      const elapsed = this.clock.now() - (this.lastFailureTime ?? 0);
      if (elapsed < this.recoveryTimeoutMs) {
        throw new CircuitOpenError(this.name, this.recoveryTimeoutMs - elapsed);
      }
      this.transition(BreakerState.HALF_OPEN);
    }

    if (this.state === BreakerState.HALF_OPEN) {
      if (this.trialInFlight) {
        throw new CircuitOpenError(this.name, 0);
      }
      this.trialInFlight = true;
      return true;
    }

    return false;
  }

  private recordSuccess(isTrial: boolean): void {
    if (!isTrial) return;

    this.trialInFlight = false;
    this.transition(BreakerState.CLOSED);
  }

  private recordFailure(isTrial: boolean): void {
    this.failureCount++;
    this.lastFailureTime = this.clock.now();

    if (isTrial) {
      // A failed trial re-opens regardless of the threshold.
      this.trialInFlight = false;
      this.transition(BreakerState.OPEN);
      return;
    }

    if (
      this.state === BreakerState.CLOSED &&
      this.failureCount >= this.failureThreshold
    ) {
      this.transition(BreakerState.OPEN);
    }
  }

  private transition(to: BreakerState): void {
    const from = this.state;
    if (from === to) return;

    this.state = to;
    if (to === BreakerState.CLOSED) {
      this.failureCount = 0;
      this.lastFailureTime = null;
    }

    if (!this.onStateChange) return;
    try {
      this.onStateChange({
        name: this.name,
        from,
        to,
        failureCount: this.failureCount,
      });
    } catch (err: unknown) {
      // A listener error never replaces the outcome of the guarded call.
      this.logger.error(
        { dependency: this.name, from, to, err },
        "breaker state listener failed",
      );
    }
  }
}
