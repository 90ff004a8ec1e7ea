// ---------------------------------------------------------------------------
// In-memory metrics for breakers, guarded calls, requests and health.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  BreakerState,
  DependencyName,
  GuardedOutcome,
  MetricsConfig,
} from "../core/types.js";

/** Gauge value published for each breaker state. */
export const BREAKER_STATE_ORDINAL: Readonly<Record<BreakerState, number>> = {
  closed: 0,
  open: 1,
  half_open: 2,
};

// ── Per-dependency call metrics ─────────────────────────────────────────────

interface GuardedCallMetrics {
  dependency: string;
  totalCalls: number;
  successCount: number;
  failureCount: number;
  rejectedCount: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

// ── Per-endpoint request metrics ────────────────────────────────────────────

interface RequestMetrics {
  method: string;
  endpoint: string;
  totalRequests: number;
  byStatus: Record<string, number>;
  totalDurationMs: number;
  maxDurationMs: number;
}

/** Kind of dependency operation counted by {@link MetricsCollector.recordOperation}. */
export type OperationKind = "cache" | "store";

/** Immutable snapshot of all metrics at a point in time. */
export interface MetricsSnapshot {
  breakers: Record<string, { state: BreakerState; ordinal: number }>;
  calls: Record<string, Readonly<GuardedCallMetrics>>;
  requests: Record<string, Readonly<RequestMetrics>>;
  health: Record<string, number>;
  operations: Record<string, number>;
  connections: Record<string, number>;
  collectedAt: string;
}

/**
 * Collects in-memory metrics.
 *
 * Optionally logs a periodic report at a configurable interval.
 */
export class MetricsCollector {
  private readonly breakerStates = new Map<string, BreakerState>();
  private readonly callMetrics = new Map<string, GuardedCallMetrics>();
  private readonly requestMetrics = new Map<string, RequestMetrics>();
  private readonly healthGauges = new Map<string, number>();
  private readonly operationCounts = new Map<string, number>();
  private readonly activeConnections = new Map<string, number>();

  private reportTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly config: MetricsConfig,
    private readonly logger?: pino.Logger,
  ) {
    if (config.enabled && config.reportIntervalMs > 0 && logger) {
      this.reportTimer = setInterval(() => {
        this.logReport();
      }, config.reportIntervalMs);

      // Allow the process to exit even if the timer is still running.
      this.reportTimer.unref();
    }
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  // ── Breakers ────────────────────────────────────────────────────────────

  recordBreakerState(name: DependencyName, state: BreakerState): void {
    this.breakerStates.set(name, state);
  }

  // ── Guarded calls ───────────────────────────────────────────────────────

  recordGuardedCall(
    dependency: DependencyName,
    outcome: GuardedOutcome,
    durationMs: number,
  ): void {
    let m = this.callMetrics.get(dependency);

    if (!m) {
      m = {
        dependency,
        totalCalls: 0,
        successCount: 0,
        failureCount: 0,
        rejectedCount: 0,
        totalDurationMs: 0,
        minDurationMs: Infinity,
        maxDurationMs: 0,
      };
      this.callMetrics.set(dependency, m);
    }

    m.totalCalls++;
    m.totalDurationMs += durationMs;

    if (durationMs < m.minDurationMs) m.minDurationMs = durationMs;
    if (durationMs > m.maxDurationMs) m.maxDurationMs = durationMs;

    switch (outcome) {
      case "success":
        m.successCount++;
        break;
      case "failure":
        m.failureCount++;
        break;
      case "rejected":
        m.rejectedCount++;
        break;
    }
  }

  // ── HTTP requests ───────────────────────────────────────────────────────

  recordRequest(
    method: string,
    endpoint: string,
    status: number,
    durationMs: number,
  ): void {
    const key = `${method} ${endpoint}`;
    let m = this.requestMetrics.get(key);

    if (!m) {
      m = {
        method,
        endpoint,
        totalRequests: 0,
        byStatus: {},
        totalDurationMs: 0,
        maxDurationMs: 0,
      };
      this.requestMetrics.set(key, m);
    }

    m.totalRequests++;
    m.byStatus[status] = (m.byStatus[status] ?? 0) + 1;
    m.totalDurationMs += durationMs;
    if (durationMs > m.maxDurationMs) m.maxDurationMs = durationMs;
  }

  // ── Health and dependency operations ────────────────────────────────────

  /** 1 = healthy, 0 = unhealthy. */
  recordHealth(component: string, healthy: boolean): void {
    this.healthGauges.set(component, healthy ? 1 : 0);
  }

  recordOperation(kind: OperationKind, operation: string, status: string): void {
    const key = `${kind}:${operation}:${status}`;
    this.operationCounts.set(key, (this.operationCounts.get(key) ?? 0) + 1);
  }

  /** Connections currently checked out (store) or open (cache). */
  recordConnections(kind: OperationKind, active: number): void {
    this.activeConnections.set(kind, active);
  }

  // ── Snapshot ────────────────────────────────────────────────────────────

  snapshot(): MetricsSnapshot {
    const breakers: MetricsSnapshot["breakers"] = {};
    for (const [name, state] of this.breakerStates) {
      breakers[name] = { state, ordinal: BREAKER_STATE_ORDINAL[state] };
    }

    const calls: Record<string, GuardedCallMetrics> = {};
    for (const [key, value] of this.callMetrics) {
      calls[key] = { ...value };
    }

    const requests: Record<string, RequestMetrics> = {};
    for (const [key, value] of this.requestMetrics) {
      requests[key] = { ...value, byStatus: { ...value.byStatus } };
    }

    return {
      breakers,
      calls,
      requests,
      health: Object.fromEntries(this.healthGauges),
      operations: Object.fromEntries(this.operationCounts),
      connections: Object.fromEntries(this.activeConnections),
      collectedAt: new Date().toISOString(),
    };
  }

  // ── Periodic report ─────────────────────────────────────────────────────

  private logReport(): void {
    if (!this.logger) return;

    const { collectedAt: _collectedAt, ...metrics } = this.snapshot();
    this.logger.info({ metrics }, "periodic metrics report");
  }

  // ── Cleanup ─────────────────────────────────────────────────────────────

  dispose(): void {
    if (this.reportTimer !== null) {
      clearInterval(this.reportTimer);
      this.reportTimer = null;
    }
  }
}
