/**
 * First-order tape: each node keeps its two local partials and parent
 * indices, and `reverseAccumulate` runs one backward scan over an adjoint
 * buffer.
 */
import { gradientRoot, type GradientNode } from "./node.js";
import { Tape, type AccumulateOptions } from "./tape.js";

export class GradientTape<T> extends Tape<T, GradientNode<T>> {
  protected readonly kind = "gradient tape";

  protected rootNode(index: number): GradientNode<T> {
    return gradientRoot(this.field, index);
  }

  protected unaryNode(px: number, self: number, dx: T): GradientNode<T> {
    return { dx, dy: this.field.zero, px, py: self };
  }

  protected binaryNode(px: number, py: number, dx: T, dy: T): GradientNode<T> {
    return { dx, dy, px, py };
  }

  /**
   * Gradient of node `options.index` (default: the newest) with respect to
   * every root, in creation order. Adjoints flow only from nodes at or
   * below the target, so later nodes are ignored.
   */
  reverseAccumulate(options: AccumulateOptions<T> = {}): T[] {
    const target = this.accumulationTarget(options.index);
    const F = this.field;
    const adjoints = new Array<T>(Math.max(target + 1, this.variableCount)).fill(F.zero);
    adjoints[target] = options.seed ?? F.one;

    this.nodes.scanBackward(target, 0, (node, i) => {
      if (node.px === i) return; // root
      const adj = adjoints[i];
      adjoints[node.px] = F.add(adjoints[node.px], F.mul(adj, node.dx));
      if (node.py !== i) adjoints[node.py] = F.add(adjoints[node.py], F.mul(adj, node.dy));
    });

    return adjoints.slice(0, this.variableCount);
  }

  describeNode(index: number): string[] {
    const node = this.node(index);
    if (node.px === index) return [`Root Node: ${index}`];
    const F = this.field;
    return [
      `Node: ${index}`,
      `  dx: ${F.format(node.dx)}, dy: ${F.format(node.dy)}`,
      `  px: ${node.px}, py: ${node.py}`,
    ];
  }
}
