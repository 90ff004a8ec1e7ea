// ---------------------------------------------------------------------------
// Per-dependency breaker overrides.
// Reads a YAML file, validates it with Zod, and merges it over the defaults.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parse } from "yaml";
import type { BreakerConfig, BreakersConfig, DependencyName } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const BreakerOverrideSchema = z
  .object({
    failureThreshold: z.number().int().positive().optional(),
    recoveryTimeoutMs: z.number().int().nonnegative().optional(),
  })
  .strict();

export const BreakerFileSchema = z.object({
  breakers: z.record(BreakerOverrideSchema).default({}),
});

/** `config/breakers.yaml` at the project root. */
export const DEFAULT_BREAKERS_FILE = fileURLToPath(
  new URL("../../config/breakers.yaml", import.meta.url),
);

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Load breaker overrides from `filePath`.  A missing file yields no
 * overrides; an unreadable or invalid one is a {@link ConfigurationError}.
 */
export function loadBreakerOverrides(filePath: string): BreakersConfig["overrides"] {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let document: unknown;
  try {
    document = parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read breaker settings from ${filePath}`, {
      cause: err,
    });
  }

  // An empty or comment-only file parses to null.
  const result = BreakerFileSchema.safeParse(document ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid breaker settings in ${filePath}: ${details}`, {
      cause: result.error,
    });
  }

  return result.data.breakers;
}

/** Effective config for `name`: its overrides over the shared defaults. */
export function resolveBreakerConfig(
  breakers: BreakersConfig,
  name: DependencyName,
): BreakerConfig {
  const override = breakers.overrides[name] ?? {};
  return {
    failureThreshold: override.failureThreshold ?? breakers.defaults.failureThreshold,
    recoveryTimeoutMs: override.recoveryTimeoutMs ?? breakers.defaults.recoveryTimeoutMs,
  };
}
