#!/usr/bin/env node
/**
 * tapegrad CLI, the main entry point.
 *
 * Commands: demo, bench
 */
import { demoCmd } from "./commands/demo.js";
import { benchCmd } from "./commands/bench.js";

const USAGE = `
tapegrad: tape-based reverse-mode automatic differentiation

Commands:
  demo             Differentiate cos(x) / ((x + y)·sin(z)) at a point
  bench            Benchmark tape recording and accumulation

Options:
  --help, -h       Show this help

Examples:
  tapegrad demo --x=1.23 --y=0.66 --z=2.34
  tapegrad demo --hessian --dump --limit=5
  tapegrad demo --config=autodiff.json
  tapegrad bench --nodes=10000 --iters=100
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "demo") {
    await demoCmd(args.slice(1));
  } else if (command === "bench") {
    await benchCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
