/**
 * Command: tapegrad bench
 *
 * Times recording, gradient sweeps and Hessian sweeps for each node
 * storage strategy.
 */
import { runTapeBenches } from "@tapegrad/bench";
import { parseKV, intArg } from "../parse.js";

export async function benchCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const nodes = intArg(kv, "nodes", 10_000);
  const iters = intArg(kv, "iters", 100);
  const hessianNodes = intArg(kv, "hessianNodes", Math.min(nodes, 500));

  console.log(`Benchmarking: nodes=${nodes} iters=${iters}\n`);
  console.log("── Tape Benchmarks ──\n");

  for (const r of runTapeBenches({ nodes, iters, hessianNodes })) {
    const extra = r.extra ? ` (${r.extra})` : "";
    console.log(`${r.name} [${r.shape}]: ${r.avgMs.toFixed(3)}ms${extra}`);
  }
}
