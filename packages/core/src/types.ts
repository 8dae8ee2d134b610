/**
 * Core types for the tapegrad system.
 */

// ── Node storage ───────────────────────────────────────────────────────────
export type NodeStorage = "array" | "linked-list";

export const nodeStorages: readonly NodeStorage[] = ["array", "linked-list"];

export function isNodeStorage(s: unknown): s is NodeStorage {
  return s === "array" || s === "linked-list";
}

// ── Log level ──────────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

// ── Autodiff config ────────────────────────────────────────────────────────
export interface GradientCheckConfig {
  /** Central-difference step. */
  readonly epsilon: number;
  /** Largest accepted |analytic - numeric| per component. */
  readonly tolerance: number;
}

export interface AutodiffConfig {
  /** Whether new tapes start out recording nodes. */
  readonly tracking: boolean;
  readonly storage: NodeStorage;
  /** Pre-sized node capacity for array storage (0 = grow on demand). */
  readonly initialCapacity: number;
  /** Default bound for node dumps. */
  readonly nodeDumpLimit: number;
  readonly logLevel: LogLevelName;
  readonly gradientCheck: GradientCheckConfig;
}

export const defaultAutodiffConfig: AutodiffConfig = {
  tracking: true,
  storage: "array",
  initialCapacity: 0,
  nodeDumpLimit: 100,
  logLevel: "info",
  gradientCheck: {
    epsilon: 1e-6,
    tolerance: 1e-6,
  },
};
