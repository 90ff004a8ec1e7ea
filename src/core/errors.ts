// ---------------------------------------------------------------------------
// Error hierarchy for the resilience layer.
// ---------------------------------------------------------------------------

import type { DependencyName } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all resilience-layer errors.
 */
export class ResilienceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResilienceError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Breaker errors ──────────────────────────────────────────────────────────

/**
 * The breaker rejected the call without contacting the dependency.
 */
export class CircuitOpenError extends ResilienceError {
  public readonly dependency: DependencyName;
  /** Time left before a trial call is permitted; 0 while a trial is in flight. */
  public readonly retryAfterMs: number;

  constructor(dependency: DependencyName, retryAfterMs: number) {
    super(`Circuit for "${dependency}" is open`);
    this.name = "CircuitOpenError";
    this.dependency = dependency;
    this.retryAfterMs = retryAfterMs;
  }
}

/** The guarded operation ran and failed; the original error is the `cause`. */
export class DependencyFailureError extends ResilienceError {
  public readonly dependency: DependencyName;

  constructor(dependency: DependencyName, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Dependency "${dependency}" failed: ${reason}`, options);
    this.name = "DependencyFailureError";
    this.dependency = dependency;
  }
}

// ── Data access errors ──────────────────────────────────────────────────────

/** Every path that could serve the key is impaired. */
export class DependencyUnavailableError extends ResilienceError {
  public readonly key: string;

  constructor(key: string, options?: ErrorOptions) {
    super(`No dependency could serve key "${key}"`, options);
    this.name = "DependencyUnavailableError";
    this.key = key;
  }
}

export class RecordNotFoundError extends ResilienceError {
  public readonly key: string;

  constructor(key: string) {
    super(`No record for key "${key}"`);
    this.name = "RecordNotFoundError";
    this.key = key;
  }
}

// ── Registry errors ─────────────────────────────────────────────────────────

export class UnknownDependencyError extends ResilienceError {
  public readonly dependency: DependencyName;

  constructor(dependency: DependencyName) {
    super(`No breaker registered for dependency "${dependency}"`);
    this.name = "UnknownDependencyError";
    this.dependency = dependency;
  }
}

export class DuplicateNameError extends ResilienceError {
  public readonly dependency: DependencyName;

  constructor(dependency: DependencyName) {
    super(`A breaker is already registered for dependency "${dependency}"`);
    this.name = "DuplicateNameError";
    this.dependency = dependency;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends ResilienceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
