// ---------------------------------------------------------------------------
// Core types for the resilience layer.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Dependencies ────────────────────────────────────────────────────────────

/** Name under which a downstream dependency's breaker is registered. */
export type DependencyName = string;

export const Dependency = {
  STORE: "store",
  CACHE: "cache",
} as const;
export type Dependency = (typeof Dependency)[keyof typeof Dependency];

// ── Circuit breaker ─────────────────────────────────────────────────────────

/**
 * Possible states a circuit breaker can be in.
 *
 * - `closed`    -- normal operation; calls flow through.
 * - `open`      -- too many failures; calls are rejected immediately.
 * - `half_open` -- trial phase; exactly one call is let through to test recovery.
 */
export const BreakerState = {
  CLOSED: "closed",
  OPEN: "open",
  HALF_OPEN: "half_open",
} as const;
export type BreakerState = (typeof BreakerState)[keyof typeof BreakerState];

export interface BreakerConfig {
  /** Failures that trip a closed breaker. */
  failureThreshold: number;
  /** Minimum time the breaker stays open before a trial call is allowed. */
  recoveryTimeoutMs: number;
}

/** Emitted on every state transition of a breaker. */
export interface BreakerTransition {
  name: DependencyName;
  from: BreakerState;
  to: BreakerState;
  failureCount: number;
}

export type BreakerListener = (transition: BreakerTransition) => void;

export interface BreakerSnapshot {
  name: DependencyName;
  state: BreakerState;
  failureCount: number;
  failureThreshold: number;
  recoveryTimeoutMs: number;
  lastFailureTime: number | null;
}

/** Outcome tag of a single guarded call. */
export type GuardedOutcome = "success" | "failure" | "rejected";

// ── Health ──────────────────────────────────────────────────────────────────

export type HealthStatus = "healthy" | "unhealthy";

/** Why a dependency was reported unhealthy. */
export type UnhealthyReason = "circuit_open" | "probe_failed";

export interface DependencyHealth {
  status: HealthStatus;
  breaker: BreakerState;
  reason?: UnhealthyReason;
  error?: string;
  latencyMs: number;
}

export interface HealthVerdict {
  overall: HealthStatus;
  checks: Record<DependencyName, DependencyHealth>;
}

/** A lightweight, side-effect-free connectivity check. */
export type HealthProbe = () => Promise<void>;

// ── Data access ─────────────────────────────────────────────────────────────

export type DataSource = "cache" | "store";

export interface FetchResult {
  key: string;
  value: string;
  source: DataSource;
}

/** Narrow view of the relational data store used by the core. */
export interface DataStore {
  query<R extends Record<string, unknown>>(
    statement: string,
    params?: unknown[],
  ): Promise<R[]>;
  /** Minimal connectivity check. */
  ping(): Promise<void>;
  /** Keyed read; `null` when no row exists. */
  read(key: string): Promise<string | null>;
  close(): Promise<void>;
}

/** Narrow view of the cache store used by the core. */
export interface CacheStore {
  /** Establish the connection; resolves once commands can be served. */
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

// ── Config types ────────────────────────────────────────────────────────────

export type Environment = "development" | "staging" | "production";

export interface AppConfig {
  env: Environment;
  port: number;
  logLevel: string;
  version: string;
  store: StoreConfig;
  cache: CacheConfig;
  breakers: BreakersConfig;
  metrics: MetricsConfig;
}

export interface StoreConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  poolMin: number;
  poolMax: number;
  statementTimeoutMs: number;
}

export interface CacheConfig {
  host: string;
  port: number;
  timeoutMs: number;
  ttlSeconds: number;
}

export interface BreakersConfig {
  defaults: BreakerConfig;
  /** Per-dependency overrides, merged over `defaults`. */
  overrides: Partial<Record<DependencyName, Partial<BreakerConfig>>>;
}

export interface MetricsConfig {
  enabled: boolean;
  reportIntervalMs: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
  environment: Environment;
  version: string;
}
