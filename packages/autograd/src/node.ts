/**
 * Fixed-shape node records stored on a tape.
 *
 * Every node is binary: unary operations point their second parent at the
 * node's own index with a zero weight, and roots point both parents at
 * themselves. The backward scan therefore needs no per-kind branching.
 */
import type { Field } from "@tapegrad/core";

// ── GradientNode ───────────────────────────────────────────────────────────
export interface GradientNode<T> {
  /** ∂out/∂parent0 */
  readonly dx: T;
  /** ∂out/∂parent1 */
  readonly dy: T;
  readonly px: number;
  readonly py: number;
}

// ── HessianNode ────────────────────────────────────────────────────────────
export interface HessianNode<T> extends GradientNode<T> {
  /** ∂²out/∂parent0² */
  readonly dxx: T;
  /** ∂²out/∂parent0∂parent1 */
  readonly dxy: T;
  /** ∂²out/∂parent1² */
  readonly dyy: T;
}

/** Local second partials of a binary operation: [dxx, dxy, dyy]. */
export type SecondPartials<T> = readonly [dxx: T, dxy: T, dyy: T];

export function gradientRoot<T>(F: Field<T>, index: number): GradientNode<T> {
  return { dx: F.zero, dy: F.zero, px: index, py: index };
}

export function hessianRoot<T>(F: Field<T>, index: number): HessianNode<T> {
  return { dx: F.zero, dy: F.zero, dxx: F.zero, dxy: F.zero, dyy: F.zero, px: index, py: index };
}
