// ---------------------------------------------------------------------------
// Guarded call: run an operation under a named dependency's breaker.
// ---------------------------------------------------------------------------

import type { DependencyName } from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import type { BreakerRegistry } from "./breaker-registry.js";
import { CircuitOpenError, DependencyFailureError } from "../core/errors.js";

/**
 * Invoke `operation` through the breaker registered under `name`.
 *
 * Rejects with {@link CircuitOpenError} when the breaker refuses the call and
 * with {@link DependencyFailureError} (original error as `cause`) when the
 * operation ran and failed.
 */
export type Guarded = <T>(
  name: DependencyName,
  operation: () => Promise<T>,
) => Promise<T>;

export interface GuardOptions {
  /** Receives one outcome per call and the breaker state after it. */
  metrics?: MetricsCollector;
}

/**
 * Bind a registry into a single `guarded(name, operation)` function shared
 * by the health aggregator and the data accessor.  Durations are read from
 * the registry's clock.
 */
export function createGuard(
  registry: BreakerRegistry,
  options: GuardOptions = {},
): Guarded {
  const { metrics } = options;
  const { clock } = registry;

  return async <T>(name: DependencyName, operation: () => Promise<T>): Promise<T> => {
    const breaker = registry.get(name);
    const start = clock.now();

    try {
      const result = await breaker.attemptCall(operation);
      metrics?.recordGuardedCall(name, "success", clock.now() - start);
      return result;
    } catch (error: unknown) {
      if (error instanceof CircuitOpenError) {
        metrics?.recordGuardedCall(name, "rejected", clock.now() - start);
        throw error;
      }

      metrics?.recordGuardedCall(name, "failure", clock.now() - start);
      throw new DependencyFailureError(name, { cause: error });
    } finally {
      metrics?.recordBreakerState(name, breaker.getState());
    }
  };
}
