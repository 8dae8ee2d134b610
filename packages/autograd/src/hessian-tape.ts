/**
 * Second-order tape: nodes also keep their local second partials, and the
 * Hessian of a node is accumulated by edge pushing (Gower & Mello) in the
 * same backward scan that propagates the adjoints.
 *
 * For each node `i`, from the target down:
 *   1. push: every nonlinear edge {i, p} in W is redistributed onto the
 *      parents of `i`, weighted by the local first partials;
 *   2. create: the node's own curvature, scaled by its adjoint, becomes
 *      edges between its parents;
 *   3. adjoint: the usual first-order update.
 * W is kept symmetric in one flat square buffer.
 */
import { hessianRoot, type HessianNode, type SecondPartials } from "./node.js";
import { Tape, type AccumulateOptions } from "./tape.js";

export interface GradientAndHessian<T> {
  readonly gradient: T[];
  readonly hessian: T[][];
}

export class HessianTape<T> extends Tape<T, HessianNode<T>> {
  protected readonly kind = "Hessian tape";

  protected rootNode(index: number): HessianNode<T> {
    return hessianRoot(this.field, index);
  }

  protected unaryNode(px: number, self: number, dx: T, dxx: () => T): HessianNode<T> {
    const zero = this.field.zero;
    return { dx, dy: zero, dxx: dxx(), dxy: zero, dyy: zero, px, py: self };
  }

  protected binaryNode(
    px: number,
    py: number,
    dx: T,
    dy: T,
    second: () => SecondPartials<T>,
  ): HessianNode<T> {
    const [dxx, dxy, dyy] = second();
    return { dx, dy, dxx, dxy, dyy, px, py };
  }

  /** First-order sweep only; same result as a gradient tape. */
  reverseAccumulate(options: AccumulateOptions<T> = {}): T[] {
    const target = this.accumulationTarget(options.index);
    const F = this.field;
    const adjoints = new Array<T>(Math.max(target + 1, this.variableCount)).fill(F.zero);
    adjoints[target] = options.seed ?? F.one;

    this.nodes.scanBackward(target, 0, (node, i) => {
      if (node.px === i) return;
      const adj = adjoints[i];
      adjoints[node.px] = F.add(adjoints[node.px], F.mul(adj, node.dx));
      if (node.py !== i) adjoints[node.py] = F.add(adjoints[node.py], F.mul(adj, node.dy));
    });

    return adjoints.slice(0, this.variableCount);
  }

  reverseAccumulateHessian(options: AccumulateOptions<T> = {}): T[][] {
    return this.accumulate(options).hessian;
  }

  reverseAccumulateWithHessian(options: AccumulateOptions<T> = {}): GradientAndHessian<T> {
    return this.accumulate(options);
  }

  describeNode(index: number): string[] {
    const node = this.node(index);
    if (node.px === index) return [`Root Node: ${index}`];
    const F = this.field;
    return [
      `Node: ${index}`,
      `  dx: ${F.format(node.dx)}, dy: ${F.format(node.dy)}`,
      `  dxx: ${F.format(node.dxx)}, dxy: ${F.format(node.dxy)}, dyy: ${F.format(node.dyy)}`,
      `  px: ${node.px}, py: ${node.py}`,
    ];
  }

  // ── Edge pushing ─────────────────────────────────────────────────────────

  private accumulate(options: AccumulateOptions<T>): GradientAndHessian<T> {
    const target = this.accumulationTarget(options.index);
    const F = this.field;
    const two = F.fromNumber(2);
    const size = Math.max(target + 1, this.variableCount);
    const adjoints = new Array<T>(size).fill(F.zero);
    const w = new Array<T>(size * size).fill(F.zero);
    adjoints[target] = options.seed ?? F.one;

    const bump = (r: number, c: number, v: T): void => {
      const k = r * size + c;
      w[k] = F.add(w[k], v);
    };

    this.nodes.scanBackward(target, 0, (node, i) => {
      if (node.px === i) return;
      const { px, py, dx, dy } = node;
      const unary = py === i;

      // push
      for (let p = 0; p <= i; p++) {
        const wip = w[i * size + p];
        if (F.isZero(wip)) continue;
        if (p !== i) {
          if (px === p) bump(p, p, F.mul(F.mul(two, dx), wip));
          else {
            const v = F.mul(dx, wip);
            bump(px, p, v);
            bump(p, px, v);
          }
          if (unary) continue;
          if (py === p) bump(p, p, F.mul(F.mul(two, dy), wip));
          else {
            const v = F.mul(dy, wip);
            bump(py, p, v);
            bump(p, py, v);
          }
        } else {
          bump(px, px, F.mul(F.mul(dx, dx), wip));
          if (unary) continue;
          const cross = F.mul(F.mul(dx, dy), wip);
          bump(px, py, cross);
          bump(py, px, cross);
          bump(py, py, F.mul(F.mul(dy, dy), wip));
        }
      }

      const adj = adjoints[i];
      if (F.isZero(adj)) return;

      // create
      bump(px, px, F.mul(adj, node.dxx));
      if (!unary) {
        const cross = F.mul(adj, node.dxy);
        bump(px, py, cross);
        bump(py, px, cross);
        bump(py, py, F.mul(adj, node.dyy));
      }

      // adjoint
      adjoints[px] = F.add(adjoints[px], F.mul(adj, dx));
      if (!unary) adjoints[py] = F.add(adjoints[py], F.mul(adj, dy));
    });

    const n = this.variableCount;
    const hessian: T[][] = [];
    for (let r = 0; r < n; r++) hessian.push(w.slice(r * size, r * size + n));
    return { gradient: adjoints.slice(0, n), hessian };
  }
}
