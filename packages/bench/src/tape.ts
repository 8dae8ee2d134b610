/**
 * Tape microbenchmarks: recording and accumulation per storage strategy.
 */
import { nodeStorages, realField, type NodeStorage } from "@tapegrad/core";
import { GradientTape, HessianTape, type Tape, type Variable } from "@tapegrad/autograd";

export interface BenchResult {
  name: string;
  shape: string;
  avgMs: number;
  iters: number;
  extra?: string;
}

export interface TapeBenchOptions {
  /** Approximate nodes per recorded chain. */
  nodes?: number;
  iters?: number;
  /** Hessian sweeps allocate nodes² weights, so they run on a shorter chain. */
  hessianNodes?: number;
}

function run(fn: () => void, iters: number): number {
  for (let i = 0; i < 3; i++) fn(); // warmup
  const start = performance.now();
  for (let i = 0; i < iters; i++) fn();
  return (performance.now() - start) / iters;
}

/** Record v ← sin(v) + x·y repeatedly; three nodes per step after the two roots. */
export function recordChain<K extends Tape<number, unknown>>(tape: K, nodes: number): Variable<number> {
  const [x, y] = tape.createVariables([1.1, 0.7]);
  let v = x;
  const steps = Math.max(1, Math.floor((nodes - 2) / 3));
  for (let i = 0; i < steps; i++) v = tape.add(tape.sin(v), tape.multiply(x, y));
  return v;
}

export function benchRecord(storage: NodeStorage, nodes: number, iters = 100): BenchResult {
  let count = 0;
  const avgMs = run(() => {
    const tape = new GradientTape(realField, { storage });
    recordChain(tape, nodes);
    count = tape.nodeCount;
  }, iters);
  return { name: "record", shape: `${storage} n=${count}`, avgMs, iters };
}

export function benchGradient(storage: NodeStorage, nodes: number, iters = 100): BenchResult {
  const tape = new GradientTape(realField, { storage });
  recordChain(tape, nodes);
  const avgMs = run(() => tape.reverseAccumulate(), iters);
  const perNode = (avgMs * 1e6) / tape.nodeCount;
  return {
    name: "gradient",
    shape: `${storage} n=${tape.nodeCount}`,
    avgMs,
    iters,
    extra: `${perNode.toFixed(1)} ns/node`,
  };
}

export function benchHessian(storage: NodeStorage, nodes: number, iters = 10): BenchResult {
  const tape = new HessianTape(realField, { storage });
  recordChain(tape, nodes);
  const avgMs = run(() => tape.reverseAccumulateHessian(), iters);
  return { name: "hessian", shape: `${storage} n=${tape.nodeCount}`, avgMs, iters };
}

export function runTapeBenches(options: TapeBenchOptions = {}): BenchResult[] {
  const nodes = options.nodes ?? 10_000;
  const iters = options.iters ?? 100;
  const hessianNodes = options.hessianNodes ?? Math.min(nodes, 500);
  const results: BenchResult[] = [];
  for (const storage of nodeStorages) {
    results.push(benchRecord(storage, nodes, iters));
    results.push(benchGradient(storage, nodes, iters));
    results.push(benchHessian(storage, hessianNodes, Math.max(1, Math.floor(iters / 10))));
  }
  return results;
}
