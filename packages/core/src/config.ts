/**
 * Load and validate AutodiffConfig from file, merge with defaults.
 */
import { Effect } from "effect";
import { ConfigError } from "./errors.js";
import {
  defaultAutodiffConfig,
  isNodeStorage,
  type AutodiffConfig,
  type GradientCheckConfig,
  type LogLevelName,
} from "./types.js";

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isLogLevelName(v: unknown): v is LogLevelName {
  return typeof v === "string" && LOG_LEVELS.some((l) => l === v);
}

function field<T>(
  obj: Record<string, unknown>,
  key: string,
  guard: (v: unknown) => v is T,
  fallback: T,
  expected: string,
): T {
  const v = obj[key];
  if (v === undefined) return fallback;
  if (!guard(v)) {
    throw new ConfigError({ message: `${key} must be ${expected}, got ${JSON.stringify(v)}` });
  }
  return v;
}

const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isNumber = (v: unknown): v is number => typeof v === "number";

/**
 * Merge a parsed JSON value over the defaults.
 * Unknown keys are ignored; known keys of the wrong type throw ConfigError.
 */
export function parseAutodiffConfig(raw: unknown): AutodiffConfig {
  if (!isRecord(raw)) {
    throw new ConfigError({ message: "autodiff config must be a JSON object" });
  }
  const d = defaultAutodiffConfig;

  let gradientCheck: GradientCheckConfig = d.gradientCheck;
  if (raw.gradientCheck !== undefined) {
    if (!isRecord(raw.gradientCheck)) {
      throw new ConfigError({ message: "gradientCheck must be an object" });
    }
    gradientCheck = {
      epsilon: field(raw.gradientCheck, "epsilon", isNumber, d.gradientCheck.epsilon, "a number"),
      tolerance: field(raw.gradientCheck, "tolerance", isNumber, d.gradientCheck.tolerance, "a number"),
    };
  }

  const config: AutodiffConfig = {
    tracking: field(raw, "tracking", isBoolean, d.tracking, "a boolean"),
    storage: field(raw, "storage", isNodeStorage, d.storage, `"array" or "linked-list"`),
    initialCapacity: field(raw, "initialCapacity", isNumber, d.initialCapacity, "a number"),
    nodeDumpLimit: field(raw, "nodeDumpLimit", isNumber, d.nodeDumpLimit, "a number"),
    logLevel: field(raw, "logLevel", isLogLevelName, d.logLevel, LOG_LEVELS.join(" | ")),
    gradientCheck,
  };
  validateAutodiffConfig(config);
  return config;
}

/** Validate an AutodiffConfig, throwing ConfigError on invalid values. */
export function validateAutodiffConfig(config: AutodiffConfig): void {
  if (!Number.isInteger(config.initialCapacity) || config.initialCapacity < 0) {
    throw new ConfigError({ message: `initialCapacity must be an integer >= 0, got ${config.initialCapacity}` });
  }
  if (!Number.isInteger(config.nodeDumpLimit) || config.nodeDumpLimit < 0) {
    throw new ConfigError({ message: `nodeDumpLimit must be an integer >= 0, got ${config.nodeDumpLimit}` });
  }
  if (!(config.gradientCheck.epsilon > 0)) {
    throw new ConfigError({ message: `gradientCheck.epsilon must be > 0, got ${config.gradientCheck.epsilon}` });
  }
  if (!(config.gradientCheck.tolerance >= 0)) {
    throw new ConfigError({ message: `gradientCheck.tolerance must be >= 0, got ${config.gradientCheck.tolerance}` });
  }
}

/** Load an AutodiffConfig from a JSON file path, merging with defaults. */
export function loadAutodiffConfig(path?: string): Effect.Effect<AutodiffConfig, ConfigError> {
  if (!path) return Effect.succeed({ ...defaultAutodiffConfig });

  return Effect.tryPromise({
    try: async () => {
      const fs = await import("node:fs/promises");
      const raw = await fs.readFile(path, "utf-8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (cause) {
        throw new ConfigError({ message: `Failed to parse autodiff config at ${path}: invalid JSON`, cause });
      }
      return parseAutodiffConfig(parsed);
    },
    catch: (cause) =>
      cause instanceof ConfigError
        ? cause
        : new ConfigError({ message: `Failed to read autodiff config at ${path}`, cause }),
  });
}
