/**
 * Tape-based reverse-mode autodiff over scalars.
 *
 * A tape is an append-only arena of fixed-shape nodes. Every recording
 * method computes the forward value with the tape's `Field`, computes the
 * local partial derivatives with respect to its *variable* operands, appends
 * one node and returns a new `Variable`. Parents always precede their
 * children, so the nodes are topologically sorted by construction and the
 * accumulators are plain backward scans (see gradient-tape.ts and
 * hessian-tape.ts).
 *
 * First-order weights are computed eagerly; second-order partials are passed
 * as thunks that only a Hessian tape evaluates.
 */
import {
  AutogradError,
  IndexOutOfRangeError,
  NoRootNodesError,
  type Field,
  type NodeStorage,
} from "@tapegrad/core";
import type { SecondPartials } from "./node.js";
import { createNodeStore, type NodeStore } from "./store.js";
import { Variable } from "./variable.js";

// ── Options ────────────────────────────────────────────────────────────────
export interface TapeOptions {
  /** Record nodes from the start (default true). */
  readonly tracking?: boolean;
  /** Backing store for the nodes (default "array"). */
  readonly storage?: NodeStorage;
  /** Slots to reserve for array storage. */
  readonly capacity?: number;
}

export interface AccumulateOptions<T> {
  /** Adjoint of the differentiated node (default: the field's one). */
  readonly seed?: T;
  /** Node to differentiate (default: the newest node). */
  readonly index?: number;
}

// ── Custom operations ──────────────────────────────────────────────────────
export interface CustomUnary<T> {
  readonly f: (x: T) => T;
  readonly dfx: (x: T) => T;
  /** Required when recording on a Hessian tape. */
  readonly dfxx?: (x: T) => T;
}

export interface CustomBinary<T> {
  readonly f: (x: T, y: T) => T;
  readonly dfx: (x: T, y: T) => T;
  readonly dfy: (x: T, y: T) => T;
  /** The second partials are required when recording on a Hessian tape. */
  readonly dfxx?: (x: T, y: T) => T;
  readonly dfxy?: (x: T, y: T) => T;
  readonly dfyy?: (x: T, y: T) => T;
}

/** A recorded variable or a plain constant. */
export type Operand<T> = Variable<T> | T;

function isVariable<T>(v: Operand<T>): v is Variable<T> {
  return v instanceof Variable;
}

// ── Tape ───────────────────────────────────────────────────────────────────
export abstract class Tape<T, N> {
  readonly field: Field<T>;
  /** When false, operations compute values but append no nodes. */
  isTracking: boolean;

  protected readonly nodes: NodeStore<N>;
  private _variableCount = 0;

  // constants lifted into the field once
  private readonly two: T;
  private readonly three: T;
  private readonly half: T;
  private readonly minusOneAndHalf: T;
  private readonly ln2: T;
  private readonly ln10: T;

  private readonly noCurvature: () => T;
  private readonly flat: () => SecondPartials<T>;

  constructor(field: Field<T>, options: TapeOptions = {}) {
    this.field = field;
    this.isTracking = options.tracking ?? true;
    this.nodes = createNodeStore<N>(options.storage ?? "array", options.capacity ?? 0);

    this.two = field.fromNumber(2);
    this.three = field.fromNumber(3);
    this.half = field.fromNumber(0.5);
    this.minusOneAndHalf = field.fromNumber(-1.5);
    this.ln2 = field.fromNumber(Math.LN2);
    this.ln10 = field.fromNumber(Math.LN10);

    const zero = field.zero;
    const flat: SecondPartials<T> = [zero, zero, zero];
    this.noCurvature = () => zero;
    this.flat = () => flat;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get variableCount(): number {
    return this._variableCount;
  }

  get storage(): NodeStorage {
    return this.nodes.kind;
  }

  /** The node at `index`; throws IndexOutOfRangeError past the end. */
  node(index: number): N {
    return this.nodes.at(index);
  }

  // ── Node construction (per tape kind) ────────────────────────────────────

  protected abstract readonly kind: string;
  protected abstract rootNode(index: number): N;
  protected abstract unaryNode(px: number, self: number, dx: T, dxx: () => T): N;
  protected abstract binaryNode(px: number, py: number, dx: T, dy: T, second: () => SecondPartials<T>): N;

  /** Header, weights and parents of one node, one entry per log line. */
  abstract describeNode(index: number): string[];

  /** Gradient of the node at `options.index` with respect to every variable. */
  abstract reverseAccumulate(options?: AccumulateOptions<T>): T[];

  // ── Variables ────────────────────────────────────────────────────────────

  /**
   * Append a root node and return its variable.
   * Roots are expected to be created before any operation is recorded:
   * gradients are read from the first `variableCount` slots.
   */
  createVariable(seed: T): Variable<T> {
    const index = this.nodes.length;
    this.nodes.push(this.rootNode(index));
    this._variableCount++;
    return new Variable(index, seed);
  }

  createVariables(seeds: readonly T[]): Variable<T>[] {
    return seeds.map((s) => this.createVariable(s));
  }

  // ── Recording helpers ────────────────────────────────────────────────────

  protected unary(x: Variable<T>, value: T, dx: T, dxx: () => T): Variable<T> {
    const index = this.nodes.length;
    if (!this.isTracking) return new Variable(index, value);
    this.nodes.push(this.unaryNode(x.index, index, dx, dxx));
    return new Variable(index, value);
  }

  protected binary(
    x: Variable<T>,
    y: Variable<T>,
    value: T,
    dx: T,
    dy: T,
    second: () => SecondPartials<T>,
  ): Variable<T> {
    const index = this.nodes.length;
    if (!this.isTracking) return new Variable(index, value);
    this.nodes.push(this.binaryNode(x.index, y.index, dx, dy, second));
    return new Variable(index, value);
  }

  /**
   * Resolve the node an accumulation starts from.
   * Any recorded node may be differentiated; a root yields its own seed.
   */
  protected accumulationTarget(index?: number): number {
    if (this._variableCount === 0) {
      throw new NoRootNodesError({ message: `The ${this.kind} contains no root nodes.` });
    }
    const count = this.nodes.length;
    const target = index ?? count - 1;
    if (!Number.isInteger(target) || target < 0 || target >= count) {
      throw new IndexOutOfRangeError({
        message: `Index ${target} is out of range for a ${this.kind} with ${count} nodes.`,
        index: target,
        nodeCount: count,
      });
    }
    return target;
  }

  private bothConstants(op: string): AutogradError {
    return new AutogradError({ message: `${op}: at least one operand must be a variable` });
  }

  private missingSecondOrder(op: string): AutogradError {
    return new AutogradError({
      message: `${op}: second derivatives are required to record on a ${this.kind}`,
    });
  }

  // ── Basic operations ─────────────────────────────────────────────────────

  add(x: Variable<T>, y: Variable<T>): Variable<T>;
  add(x: T, y: Variable<T>): Variable<T>;
  add(x: Variable<T>, y: T): Variable<T>;
  add(x: Operand<T>, y: Operand<T>): Variable<T> {
    const F = this.field;
    if (isVariable(x)) {
      if (isVariable(y)) return this.binary(x, y, F.add(x.value, y.value), F.one, F.one, this.flat);
      return this.unary(x, F.add(x.value, y), F.one, this.noCurvature);
    }
    if (isVariable(y)) return this.unary(y, F.add(x, y.value), F.one, this.noCurvature);
    throw this.bothConstants("add");
  }

  subtract(x: Variable<T>, y: Variable<T>): Variable<T>;
  subtract(x: T, y: Variable<T>): Variable<T>;
  subtract(x: Variable<T>, y: T): Variable<T>;
  subtract(x: Operand<T>, y: Operand<T>): Variable<T> {
    const F = this.field;
    if (isVariable(x)) {
      if (isVariable(y)) return this.binary(x, y, F.sub(x.value, y.value), F.one, F.neg(F.one), this.flat);
      return this.unary(x, F.sub(x.value, y), F.one, this.noCurvature);
    }
    if (isVariable(y)) return this.unary(y, F.sub(x, y.value), F.neg(F.one), this.noCurvature);
    throw this.bothConstants("subtract");
  }

  multiply(x: Variable<T>, y: Variable<T>): Variable<T>;
  multiply(x: T, y: Variable<T>): Variable<T>;
  multiply(x: Variable<T>, y: T): Variable<T>;
  multiply(x: Operand<T>, y: Operand<T>): Variable<T> {
    const F = this.field;
    if (isVariable(x)) {
      if (isVariable(y)) {
        return this.binary(x, y, F.mul(x.value, y.value), y.value, x.value, () => [F.zero, F.one, F.zero]);
      }
      return this.unary(x, F.mul(x.value, y), y, this.noCurvature);
    }
    if (isVariable(y)) return this.unary(y, F.mul(x, y.value), x, this.noCurvature);
    throw this.bothConstants("multiply");
  }

  divide(x: Variable<T>, y: Variable<T>): Variable<T>;
  divide(x: T, y: Variable<T>): Variable<T>;
  divide(x: Variable<T>, y: T): Variable<T>;
  divide(x: Operand<T>, y: Operand<T>): Variable<T> {
    const F = this.field;
    if (isVariable(x)) {
      if (isVariable(y)) {
        const u = F.div(F.one, y.value);
        return this.binary(
          x, y,
          F.mul(x.value, u),
          F.div(F.one, y.value),
          F.mul(F.mul(F.neg(x.value), u), u),
          () => {
            const dfxy = F.neg(F.mul(u, u));
            return [F.zero, dfxy, F.mul(F.mul(F.mul(F.neg(this.two), u), x.value), dfxy)];
          },
        );
      }
      const u = F.div(F.one, y);
      return this.unary(x, F.mul(x.value, u), u, this.noCurvature);
    }
    if (isVariable(y)) {
      const u = F.div(F.one, y.value);
      return this.unary(
        y,
        F.mul(x, u),
        F.mul(F.mul(F.neg(x), u), u),
        () => F.mul(F.mul(F.mul(F.neg(this.two), u), x), F.neg(F.mul(u, u))),
      );
    }
    throw this.bothConstants("divide");
  }

  /**
   * Truncated remainder `x % y` (real only).
   * The divisor's weight is `-floor(x / y)`; the dividend's is 1.
   */
  modulo(this: Tape<number, N>, x: Variable<number>, y: Variable<number>): Variable<number>;
  modulo(this: Tape<number, N>, x: number, y: Variable<number>): Variable<number>;
  modulo(this: Tape<number, N>, x: Variable<number>, y: number): Variable<number>;
  modulo(this: Tape<number, N>, x: Operand<number>, y: Operand<number>): Variable<number> {
    if (isVariable(x)) {
      if (isVariable(y)) {
        return this.binary(x, y, x.value % y.value, 1, -Math.floor(x.value / y.value), this.flat);
      }
      return this.unary(x, x.value % y, 1, this.noCurvature);
    }
    if (isVariable(y)) return this.unary(y, x % y.value, -Math.floor(x / y.value), this.noCurvature);
    throw this.bothConstants("modulo");
  }

  negate(x: Variable<T>): Variable<T> {
    const F = this.field;
    return this.unary(x, F.neg(x.value), F.neg(F.one), this.noCurvature);
  }

  // ── Exponential functions ────────────────────────────────────────────────

  exp(x: Variable<T>): Variable<T> {
    const exp = this.field.exp(x.value);
    return this.unary(x, exp, exp, () => exp);
  }

  exp2(x: Variable<T>): Variable<T> {
    const F = this.field;
    const exp2 = F.exp2(x.value);
    const df = F.mul(this.ln2, exp2);
    return this.unary(x, exp2, df, () => F.mul(this.ln2, df));
  }

  exp10(x: Variable<T>): Variable<T> {
    const F = this.field;
    const exp10 = F.exp10(x.value);
    const df = F.mul(this.ln10, exp10);
    return this.unary(x, exp10, df, () => F.mul(this.ln10, df));
  }

  // ── Hyperbolic functions ─────────────────────────────────────────────────

  acosh(x: Variable<T>): Variable<T> {
    const F = this.field;
    const u = F.sub(x.value, F.one);
    const v = F.add(x.value, F.one);
    return this.unary(
      x,
      F.acosh(x.value),
      F.div(F.one, F.mul(F.sqrt(u), F.sqrt(v))),
      () => F.mul(F.mul(F.neg(x.value), F.pow(u, this.minusOneAndHalf)), F.pow(v, this.minusOneAndHalf)),
    );
  }

  asinh(x: Variable<T>): Variable<T> {
    const F = this.field;
    const u = F.add(F.mul(x.value, x.value), F.one);
    return this.unary(
      x,
      F.asinh(x.value),
      F.div(F.one, F.sqrt(u)),
      () => F.mul(F.neg(x.value), F.pow(u, this.minusOneAndHalf)),
    );
  }

  atanh(x: Variable<T>): Variable<T> {
    const F = this.field;
    const df = F.div(F.one, F.sub(F.one, F.mul(x.value, x.value)));
    return this.unary(x, F.atanh(x.value), df, () => F.mul(F.mul(F.mul(this.two, df), x.value), df));
  }

  cosh(x: Variable<T>): Variable<T> {
    const F = this.field;
    const cosh = F.cosh(x.value);
    return this.unary(x, cosh, F.sinh(x.value), () => cosh);
  }

  sinh(x: Variable<T>): Variable<T> {
    const F = this.field;
    const sinh = F.sinh(x.value);
    return this.unary(x, sinh, F.cosh(x.value), () => sinh);
  }

  tanh(x: Variable<T>): Variable<T> {
    const F = this.field;
    const tanh = F.tanh(x.value);
    const u = F.div(F.one, F.cosh(x.value));
    const df = F.mul(u, u);
    return this.unary(x, tanh, df, () => F.mul(F.mul(F.neg(this.two), df), tanh));
  }

  // ── Logarithmic functions ────────────────────────────────────────────────

  ln(x: Variable<T>): Variable<T> {
    const F = this.field;
    const df = F.div(F.one, x.value);
    return this.unary(x, F.ln(x.value), df, () => F.neg(F.mul(df, df)));
  }

  /** Logarithm of `x` in base `b`. */
  log(x: Variable<T>, b: Variable<T>): Variable<T>;
  log(x: T, b: Variable<T>): Variable<T>;
  log(x: Variable<T>, b: T): Variable<T>;
  log(x: Operand<T>, b: Operand<T>): Variable<T> {
    const F = this.field;
    // ∂/∂b of log_b(x), and its derivative in b
    const dBase = (lnx: T, bv: T, lnb: T): T => F.div(F.neg(lnx), F.mul(F.mul(bv, lnb), lnb));
    const dBaseBase = (dfb: T, bv: T, lnb: T): T =>
      F.div(F.mul(F.neg(dfb), F.add(F.div(this.two, lnb), F.one)), bv);

    if (isVariable(x)) {
      if (isVariable(b)) {
        const lnx = F.ln(x.value);
        const lnb = F.ln(b.value);
        const dfx = F.div(F.one, F.mul(x.value, lnb));
        const dfb = dBase(lnx, b.value, lnb);
        return this.binary(x, b, F.log(x.value, b.value), dfx, dfb, () => [
          F.neg(F.div(dfx, x.value)),
          F.neg(F.div(dfx, F.mul(lnb, b.value))),
          dBaseBase(dfb, b.value, lnb),
        ]);
      }
      const dfx = F.div(F.one, F.mul(x.value, F.ln(b)));
      return this.unary(x, F.log(x.value, b), dfx, () => F.neg(F.div(dfx, x.value)));
    }
    if (isVariable(b)) {
      const lnb = F.ln(b.value);
      const dfb = dBase(F.ln(x), b.value, lnb);
      return this.unary(b, F.log(x, b.value), dfb, () => dBaseBase(dfb, b.value, lnb));
    }
    throw this.bothConstants("log");
  }

  log2(x: Variable<T>): Variable<T> {
    const F = this.field;
    const u = F.div(F.one, x.value);
    return this.unary(
      x,
      F.log2(x.value),
      F.div(F.one, F.mul(this.ln2, x.value)),
      () => F.div(F.neg(F.mul(u, u)), this.ln2),
    );
  }

  log10(x: Variable<T>): Variable<T> {
    const F = this.field;
    const u = F.div(F.one, x.value);
    return this.unary(
      x,
      F.log10(x.value),
      F.div(F.one, F.mul(this.ln10, x.value)),
      () => F.div(F.neg(F.mul(u, u)), this.ln10),
    );
  }

  // ── Power functions ──────────────────────────────────────────────────────

  pow(x: Variable<T>, y: Variable<T>): Variable<T>;
  pow(x: T, y: Variable<T>): Variable<T>;
  pow(x: Variable<T>, y: T): Variable<T>;
  pow(x: Operand<T>, y: Operand<T>): Variable<T> {
    const F = this.field;
    if (isVariable(x)) {
      const n = isVariable(y) ? y.value : y;
      const pow = F.pow(x.value, n);
      const nm1 = F.sub(n, F.one);
      const pownmo = F.pow(x.value, nm1);
      const dfx = F.mul(n, pownmo);
      const dfxx = () => F.mul(F.mul(nm1, n), F.pow(x.value, F.sub(n, this.two)));
      if (!isVariable(y)) return this.unary(x, pow, dfx, dfxx);

      const lnx = F.ln(x.value);
      const dfy = F.mul(lnx, pow);
      return this.binary(x, y, pow, dfx, dfy, () => [
        dfxx(),
        F.mul(F.add(F.one, F.mul(lnx, n)), pownmo),
        F.mul(lnx, dfy),
      ]);
    }
    if (isVariable(y)) {
      const pow = F.pow(x, y.value);
      const lnc = F.ln(x);
      return this.unary(y, pow, F.mul(lnc, pow), () => F.mul(F.mul(lnc, lnc), pow));
    }
    throw this.bothConstants("pow");
  }

  // ── Root functions ───────────────────────────────────────────────────────

  cbrt(x: Variable<T>): Variable<T> {
    const F = this.field;
    const cbrt = F.cbrt(x.value);
    const df = F.div(F.one, F.mul(F.mul(this.three, cbrt), cbrt));
    return this.unary(x, cbrt, df, () => F.div(F.mul(F.neg(this.two), df), F.mul(this.three, x.value)));
  }

  /** The `n`-th root of `x`. */
  root(x: Variable<T>, n: Variable<T>): Variable<T>;
  root(x: T, n: Variable<T>): Variable<T>;
  root(x: Variable<T>, n: T): Variable<T>;
  root(x: Operand<T>, n: Operand<T>): Variable<T> {
    const F = this.field;
    const xv = isVariable(x) ? x.value : x;
    const nv = isVariable(n) ? n.value : n;
    const root = F.root(xv, nv);
    const lnx = F.ln(xv);
    const u = F.div(F.one, nv);
    const uu = F.mul(u, u);
    const w = F.div(F.one, xv);
    const dfx = F.div(root, F.mul(nv, xv));
    const dfn = F.div(F.mul(F.neg(lnx), root), F.mul(nv, nv));
    const dfxx = () => F.mul(F.mul(F.mul(F.sub(uu, u), root), w), w);
    const dfnn = () => {
      const dfnScaled = F.mul(F.mul(F.neg(lnx), root), uu);
      return F.mul(F.neg(F.add(F.mul(this.two, u), F.mul(lnx, uu))), dfnScaled);
    };

    if (isVariable(x)) {
      if (isVariable(n)) {
        return this.binary(x, n, root, dfx, dfn, () => [
          dfxx(),
          F.mul(F.mul(F.neg(root), F.add(F.mul(lnx, u), F.one)), F.mul(w, uu)),
          dfnn(),
        ]);
      }
      return this.unary(x, root, dfx, dfxx);
    }
    if (isVariable(n)) return this.unary(n, root, dfn, dfnn);
    throw this.bothConstants("root");
  }

  sqrt(x: Variable<T>): Variable<T> {
    const F = this.field;
    const sqrt = F.sqrt(x.value);
    const df = F.div(this.half, sqrt);
    return this.unary(x, sqrt, df, () => F.mul(F.div(F.neg(this.half), x.value), df));
  }

  // ── Trigonometric functions ──────────────────────────────────────────────

  acos(x: Variable<T>): Variable<T> {
    const F = this.field;
    const u = F.sub(F.one, F.mul(x.value, x.value));
    return this.unary(
      x,
      F.acos(x.value),
      F.div(F.neg(F.one), F.sqrt(u)),
      () => F.mul(F.neg(x.value), F.pow(u, this.minusOneAndHalf)),
    );
  }

  asin(x: Variable<T>): Variable<T> {
    const F = this.field;
    const u = F.sub(F.one, F.mul(x.value, x.value));
    return this.unary(
      x,
      F.asin(x.value),
      F.div(F.one, F.sqrt(u)),
      () => F.mul(x.value, F.pow(u, this.minusOneAndHalf)),
    );
  }

  atan(x: Variable<T>): Variable<T> {
    const F = this.field;
    const df = F.div(F.one, F.add(F.one, F.mul(x.value, x.value)));
    return this.unary(x, F.atan(x.value), df, () => F.mul(F.mul(F.mul(F.neg(this.two), df), x.value), df));
  }

  /** Four-quadrant arctangent of `y / x` (real only). */
  atan2(this: Tape<number, N>, y: Variable<number>, x: Variable<number>): Variable<number>;
  atan2(this: Tape<number, N>, y: number, x: Variable<number>): Variable<number>;
  atan2(this: Tape<number, N>, y: Variable<number>, x: number): Variable<number>;
  atan2(this: Tape<number, N>, y: Operand<number>, x: Operand<number>): Variable<number> {
    const yv = isVariable(y) ? y.value : y;
    const xv = isVariable(x) ? x.value : x;
    const a = 1 / (xv * xv + yv * yv);
    const value = Math.atan2(yv, xv);
    // ∂²/∂y² = -2xy·a², ∂²/∂x² = 2xy·a²
    const dyy = () => -2 * xv * (a * a) * yv;

    if (isVariable(y)) {
      if (isVariable(x)) {
        return this.binary(y, x, value, xv * a, -yv * a, () => {
          const curvature = dyy();
          return [curvature, (yv * yv - xv * xv) * (a * a), -curvature];
        });
      }
      return this.unary(y, value, xv * a, dyy);
    }
    if (isVariable(x)) return this.unary(x, value, -yv * a, () => -dyy());
    throw this.bothConstants("atan2");
  }

  cos(x: Variable<T>): Variable<T> {
    const F = this.field;
    const cos = F.cos(x.value);
    return this.unary(x, cos, F.neg(F.sin(x.value)), () => F.neg(cos));
  }

  sin(x: Variable<T>): Variable<T> {
    const F = this.field;
    const sin = F.sin(x.value);
    return this.unary(x, sin, F.cos(x.value), () => F.neg(sin));
  }

  tan(x: Variable<T>): Variable<T> {
    const F = this.field;
    const tan = F.tan(x.value);
    const sec = F.div(F.one, F.cos(x.value));
    const df = F.mul(sec, sec);
    return this.unary(x, tan, df, () => F.mul(F.mul(this.two, df), tan));
  }

  // ── Custom operations ────────────────────────────────────────────────────

  /** Record `op.f(x)` with caller-supplied derivatives evaluated at `x`. */
  custom(x: Variable<T>, op: CustomUnary<T>): Variable<T> {
    const xv = x.value;
    return this.unary(x, op.f(xv), op.dfx(xv), () => {
      if (!op.dfxx) throw this.missingSecondOrder("custom");
      return op.dfxx(xv);
    });
  }

  /** Record `op.f(x, y)` with caller-supplied partials evaluated at `(x, y)`. */
  customBinary(x: Variable<T>, y: Variable<T>, op: CustomBinary<T>): Variable<T> {
    const xv = x.value;
    const yv = y.value;
    return this.binary(x, y, op.f(xv, yv), op.dfx(xv, yv), op.dfy(xv, yv), () => {
      if (!op.dfxx || !op.dfxy || !op.dfyy) throw this.missingSecondOrder("customBinary");
      return [op.dfxx(xv, yv), op.dfxy(xv, yv), op.dfyy(xv, yv)];
    });
  }
}
