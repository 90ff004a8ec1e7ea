// ---------------------------------------------------------------------------
// Breaker Registry – maps DependencyName -> CircuitBreaker.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  BreakerConfig,
  BreakerListener,
  BreakerSnapshot,
  DependencyName,
} from "../core/types.js";
import type { Clock } from "../core/clock.js";
import { systemClock } from "../core/clock.js";
import {
  ConfigurationError,
  DuplicateNameError,
  UnknownDependencyError,
} from "../core/errors.js";
import { CircuitBreaker } from "./circuit-breaker.js";

export interface BreakerRegistryOptions {
  /** Time source shared by every breaker in the registry. */
  clock?: Clock;
  /** Receives the transitions of every registered breaker. */
  onStateChange?: BreakerListener;
  /** Handed to every breaker for listener errors. */
  logger?: pino.Logger;
}

/**
 * Owns exactly one breaker per named dependency.
 *
 * Populated once at startup and then sealed; there is no removal and no
 * registration after {@link seal}.  Constructed explicitly and passed to the
 * components that need it.
 */
export class BreakerRegistry {
  private readonly breakers = new Map<DependencyName, CircuitBreaker>();
  /** Time source shared by the breakers and by callers timing guarded work. */
  readonly clock: Clock;
  private readonly onStateChange?: BreakerListener;
  private readonly logger?: pino.Logger;
  private sealed = false;

  constructor(options: BreakerRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.onStateChange = options.onStateChange;
    this.logger = options.logger;
  }

  // ── Mutation ────────────────────────────────────────────────────────────

  register(name: DependencyName, config: BreakerConfig): CircuitBreaker {
    if (this.sealed) {
      throw new ConfigurationError(
        `Cannot register "${name}": the breaker registry is sealed`,
      );
    }
    if (this.breakers.has(name)) {
      throw new DuplicateNameError(name);
    }

    const breaker = new CircuitBreaker(name, {
      ...config,
      clock: this.clock,
      onStateChange: this.onStateChange,
      logger: this.logger,
    });
    this.breakers.set(name, breaker);
    return breaker;
  }

  /** Forbid further registration. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  get(name: DependencyName): CircuitBreaker {
    const breaker = this.breakers.get(name);
    if (!breaker) {
      throw new UnknownDependencyError(name);
    }
    return breaker;
  }

  has(name: DependencyName): boolean {
    return this.breakers.has(name);
  }

  /** Registered dependency names, in registration order. */
  names(): DependencyName[] {
    return [...this.breakers.keys()];
  }

  snapshot(): BreakerSnapshot[] {
    return [...this.breakers.values()].map((b) => b.snapshot());
  }

  get size(): number {
    return this.breakers.size;
  }
}
