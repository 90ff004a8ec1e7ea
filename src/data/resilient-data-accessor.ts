// ---------------------------------------------------------------------------
// Cache-through-store reads routed through the dependency breakers.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { CacheStore, DataStore, FetchResult } from "../core/types.js";
import { Dependency } from "../core/types.js";
import type { Guarded } from "../resilience/guarded.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import {
  DependencyUnavailableError,
  RecordNotFoundError,
} from "../core/errors.js";

export interface ResilientDataAccessorDeps {
  guarded: Guarded;
  store: DataStore;
  cache: CacheStore;
  /** TTL applied when repopulating the cache from the store. */
  cacheTtlSeconds: number;
  logger: pino.Logger;
  metrics?: MetricsCollector;
}

/**
 * Reads a key from the cache, falling back to the data store.
 *
 * Cache problems are logged and absorbed; only an impaired store surfaces,
 * as {@link DependencyUnavailableError}.  Holds no state of its own, so
 * repeated fetches of the same key are safe.
 */
export class ResilientDataAccessor {
  constructor(private readonly deps: ResilientDataAccessorDeps) {}

  async fetch(key: string): Promise<FetchResult> {
    const cached = await this.readCache(key);
    if (cached !== null) {
      return { key, value: cached, source: "cache" };
    }

    let value: string | null;
    try {
      value = await this.deps.guarded(Dependency.STORE, () => this.deps.store.read(key));
    } catch (error: unknown) {
      this.deps.metrics?.recordOperation("store", "select", "error");
      this.deps.logger.error(
        { key, err: error instanceof Error ? error.message : String(error) },
        "store read failed",
      );
      throw new DependencyUnavailableError(key, { cause: error });
    }

    if (value === null) {
      this.deps.metrics?.recordOperation("store", "select", "not_found");
      throw new RecordNotFoundError(key);
    }

    this.deps.metrics?.recordOperation("store", "select", "success");
    await this.writeCache(key, value);

    return { key, value, source: "store" };
  }

  // ── Cache helpers ───────────────────────────────────────────────────────

  private async readCache(key: string): Promise<string | null> {
    const { guarded, cache, metrics, logger } = this.deps;

    try {
      const value = await guarded(Dependency.CACHE, () => cache.get(key));
      metrics?.recordOperation("cache", "get", value === null ? "miss" : "hit");
      if (value === null) {
        logger.debug({ key }, "cache miss");
      }
      return value;
    } catch (error: unknown) {
      metrics?.recordOperation("cache", "get", "error");
      logger.error(
        { key, err: error instanceof Error ? error.message : String(error) },
        "cache read failed; falling back to store",
      );
      return null;
    }
  }

  private async writeCache(key: string, value: string): Promise<void> {
    const { guarded, cache, cacheTtlSeconds, metrics, logger } = this.deps;

    try {
      await guarded(Dependency.CACHE, () => cache.set(key, value, cacheTtlSeconds));
      metrics?.recordOperation("cache", "set", "success");
    } catch (error: unknown) {
      metrics?.recordOperation("cache", "set", "error");
      logger.error(
        { key, err: error instanceof Error ? error.message : String(error) },
        "cache write failed",
      );
    }
  }
}
