/**
 * Scalar capability contract consumed by the tape.
 *
 * A tape is parameterised by a `Field<T>`: the arithmetic and the named
 * elementary functions it needs to compute forward values and local
 * partial derivatives. Values follow IEEE-754 NaN/Infinity propagation.
 */

export interface Field<T> {
  readonly name: string;
  readonly zero: T;
  readonly one: T;
  fromNumber(n: number): T;
  isZero(a: T): boolean;

  // arithmetic
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
  neg(a: T): T;

  // exponential / logarithmic
  exp(a: T): T;
  exp2(a: T): T;
  exp10(a: T): T;
  ln(a: T): T;
  /** Logarithm of `a` in base `base`. */
  log(a: T, base: T): T;
  log2(a: T): T;
  log10(a: T): T;

  // power / root
  pow(a: T, b: T): T;
  sqrt(a: T): T;
  cbrt(a: T): T;
  /** The `n`-th root of `a`. */
  root(a: T, n: T): T;

  // trigonometric
  sin(a: T): T;
  cos(a: T): T;
  tan(a: T): T;
  asin(a: T): T;
  acos(a: T): T;
  atan(a: T): T;

  // hyperbolic
  sinh(a: T): T;
  cosh(a: T): T;
  tanh(a: T): T;
  asinh(a: T): T;
  acosh(a: T): T;
  atanh(a: T): T;

  /** Render a value for node dumps and CLI output. */
  format(a: T): string;
}

// ── Real numbers ───────────────────────────────────────────────────────────

export const realField: Field<number> = {
  name: "real",
  zero: 0,
  one: 1,
  fromNumber: (n) => n,
  isZero: (a) => a === 0,

  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  neg: (a) => -a,

  exp: Math.exp,
  exp2: (a) => 2 ** a,
  exp10: (a) => 10 ** a,
  ln: Math.log,
  log: (a, base) => Math.log(a) / Math.log(base),
  log2: Math.log2,
  log10: Math.log10,

  pow: (a, b) => a ** b,
  sqrt: Math.sqrt,
  cbrt: Math.cbrt,
  root: (a, n) => a ** (1 / n),

  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,

  sinh: Math.sinh,
  cosh: Math.cosh,
  tanh: Math.tanh,
  asinh: Math.asinh,
  acosh: Math.acosh,
  atanh: Math.atanh,

  format: (a) => String(a),
};
