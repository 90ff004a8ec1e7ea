// ---------------------------------------------------------------------------
// Composite health check across every guarded dependency.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  DependencyHealth,
  DependencyName,
  HealthProbe,
  HealthVerdict,
} from "../core/types.js";
import type { BreakerRegistry } from "../resilience/breaker-registry.js";
import type { Guarded } from "../resilience/guarded.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import { CircuitOpenError, ConfigurationError } from "../core/errors.js";

export interface HealthAggregatorDeps {
  registry: BreakerRegistry;
  guarded: Guarded;
  /** One probe per registered dependency. */
  probes: Record<DependencyName, HealthProbe>;
  logger: pino.Logger;
  metrics?: MetricsCollector;
}

/**
 * Runs each dependency's probe through its breaker and folds the outcomes
 * into a single verdict.
 *
 * A dependency whose breaker is open is reported unhealthy without its probe
 * being invoked.  Probe errors are caught per dependency and never abort the
 * remaining checks.
 */
export class HealthAggregator {
  private readonly registry: BreakerRegistry;
  private readonly guarded: Guarded;
  private readonly probes: Map<DependencyName, HealthProbe>;
  private readonly logger: pino.Logger;
  private readonly metrics?: MetricsCollector;

  constructor(deps: HealthAggregatorDeps) {
    this.registry = deps.registry;
    this.guarded = deps.guarded;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.probes = new Map(Object.entries(deps.probes));

    for (const name of this.probes.keys()) {
      // Throws UnknownDependencyError for a probe without a breaker.
      this.registry.get(name);
    }
    for (const name of this.registry.names()) {
      if (!this.probes.has(name)) {
        throw new ConfigurationError(`No health probe for dependency "${name}"`);
      }
    }
  }

  async checkHealth(): Promise<HealthVerdict> {
    const entries = await Promise.all(
      this.registry.names().map((name) => this.checkDependency(name)),
    );

    const checks: Record<DependencyName, DependencyHealth> = Object.fromEntries(entries);
    const overall = entries.every(([, health]) => health.status === "healthy")
      ? "healthy"
      : "unhealthy";

    return { overall, checks };
  }

  private async checkDependency(
    name: DependencyName,
  ): Promise<[DependencyName, DependencyHealth]> {
    const probe = this.probes.get(name);
    if (!probe) {
      throw new ConfigurationError(`No health probe for dependency "${name}"`);
    }

    const start = this.registry.clock.now();
    let health: DependencyHealth;

    try {
      await this.guarded(name, probe);
      health = {
        status: "healthy",
        breaker: this.registry.get(name).getState(),
        latencyMs: this.registry.clock.now() - start,
      };
    } catch (error: unknown) {
      const reason = error instanceof CircuitOpenError ? "circuit_open" : "probe_failed";
      const message = error instanceof Error ? error.message : String(error);

      health = {
        status: "unhealthy",
        breaker: this.registry.get(name).getState(),
        reason,
        error: message,
        latencyMs: this.registry.clock.now() - start,
      };
      this.logger.error({ dependency: name, reason, error: message }, "health check failed");
    }

    this.metrics?.recordHealth(name, health.status === "healthy");
    return [name, health];
  }
}

/** HTTP status signalling the verdict to load balancers and orchestrators. */
export function toStatusCode(verdict: HealthVerdict): 200 | 503 {
  return verdict.overall === "healthy" ? 200 : 503;
}
