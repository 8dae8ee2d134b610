/**
 * Vector-calculus helpers built on reverse accumulation.
 *
 * Each helper records the component function(s) onto the given tape at the
 * point `x` (variables already created on that tape) and accumulates from
 * the variable the function returns. Partials are read at `x[k].index`, so other roots on the
 * tape do not shift the results.
 */
import { AutogradError, type Field } from "@tapegrad/core";
import type { HessianTape } from "./hessian-tape.js";
import type { Tape } from "./tape.js";
import type { Variable } from "./variable.js";

/** A scalar function recorded onto tape `K`. */
export type TapeFunction<T, K> = (tape: K, x: readonly Variable<T>[]) => Variable<T>;

// ── Internals ──────────────────────────────────────────────────────────────

function partials<T>(all: readonly T[], x: readonly Variable<T>[]): T[] {
  return x.map((v) => all[v.index]);
}

function dot<T>(F: Field<T>, a: readonly T[], b: readonly T[]): T {
  let sum = F.zero;
  for (let k = 0; k < a.length; k++) sum = F.add(sum, F.mul(a[k], b[k]));
  return sum;
}

function requireLength(op: string, what: string, actual: number, expected: number): void {
  if (actual !== expected) {
    throw new AutogradError({ message: `${op}: expected ${expected} ${what}, got ${actual}` });
  }
}

function gradientRow<T, K extends Tape<T, unknown>>(
  tape: K,
  f: TapeFunction<T, K>,
  x: readonly Variable<T>[],
  seed?: T,
): T[] {
  const out = f(tape, x);
  return partials(tape.reverseAccumulate({ seed, index: out.index }), x);
}

// ── First order ────────────────────────────────────────────────────────────

/** ∇f(x) */
export function gradient<T, K extends Tape<T, unknown>>(
  tape: K,
  f: TapeFunction<T, K>,
  x: readonly Variable<T>[],
): T[] {
  return gradientRow(tape, f, x);
}

/** ∇ᵥf(x) = ∇f(x) · v */
export function directionalDerivative<T, K extends Tape<T, unknown>>(
  tape: K,
  v: readonly T[],
  f: TapeFunction<T, K>,
  x: readonly Variable<T>[],
): T {
  requireLength("directionalDerivative", "direction components", v.length, x.length);
  return dot(tape.field, gradientRow(tape, f, x), v);
}

/** Rows are the gradients of each component. */
export function jacobian<T, K extends Tape<T, unknown>>(
  tape: K,
  fs: readonly TapeFunction<T, K>[],
  x: readonly Variable<T>[],
): T[][] {
  return fs.map((f) => gradientRow(tape, f, x));
}

/** Jacobian-vector product J(x)·v. */
export function jvp<T, K extends Tape<T, unknown>>(
  tape: K,
  fs: readonly TapeFunction<T, K>[],
  x: readonly Variable<T>[],
  v: readonly T[],
): T[] {
  requireLength("jvp", "vector components", v.length, x.length);
  return fs.map((f) => dot(tape.field, gradientRow(tape, f, x), v));
}

/** Vector-Jacobian product vᵀ·J(x), one seeded sweep per component. */
export function vjp<T, K extends Tape<T, unknown>>(
  tape: K,
  v: readonly T[],
  fs: readonly TapeFunction<T, K>[],
  x: readonly Variable<T>[],
): T[] {
  requireLength("vjp", "vector components", v.length, fs.length);
  const F = tape.field;
  const result = x.map(() => F.zero);
  fs.forEach((f, i) => {
    const row = gradientRow(tape, f, x, v[i]);
    for (let k = 0; k < row.length; k++) result[k] = F.add(result[k], row[k]);
  });
  return result;
}

/** ∇·F(x) */
export function divergence<T, K extends Tape<T, unknown>>(
  tape: K,
  fs: readonly TapeFunction<T, K>[],
  x: readonly Variable<T>[],
): T {
  requireLength("divergence", "components", fs.length, x.length);
  const F = tape.field;
  let sum = F.zero;
  fs.forEach((f, i) => {
    sum = F.add(sum, gradientRow(tape, f, x)[i]);
  });
  return sum;
}

/** ∇×F(x) for a field in three dimensions. */
export function curl<T, K extends Tape<T, unknown>>(
  tape: K,
  fs: readonly TapeFunction<T, K>[],
  x: readonly Variable<T>[],
): [T, T, T] {
  requireLength("curl", "components", fs.length, 3);
  requireLength("curl", "variables", x.length, 3);
  const F = tape.field;
  const [d1, d2, d3] = fs.map((f) => gradientRow(tape, f, x));
  return [F.sub(d3[1], d2[2]), F.sub(d1[2], d3[0]), F.sub(d2[0], d1[1])];
}

// ── Second order ───────────────────────────────────────────────────────────

/** ∇²f(x) restricted to the variables in `x`. */
export function hessian<T>(
  tape: HessianTape<T>,
  f: TapeFunction<T, HessianTape<T>>,
  x: readonly Variable<T>[],
): T[][] {
  const out = f(tape, x);
  const full = tape.reverseAccumulateHessian({ index: out.index });
  return x.map((r) => x.map((c) => full[r.index][c.index]));
}

/** Δf(x), the trace of the Hessian. */
export function laplacian<T>(
  tape: HessianTape<T>,
  f: TapeFunction<T, HessianTape<T>>,
  x: readonly Variable<T>[],
): T {
  const F = tape.field;
  return hessian(tape, f, x).reduce((sum, row, k) => F.add(sum, row[k]), F.zero);
}
