/**
 * Command: tapegrad demo
 *
 * Records f(x, y, z) = cos(x) / ((x + y)·sin(z)) and prints its value,
 * gradient and (with --hessian) Hessian. --dump logs the recorded nodes.
 */
import { Effect, Layer } from "effect";
import { loadAutodiffConfig, realField } from "@tapegrad/core";
import {
  dumpNodes,
  gradientTapeFromConfig,
  hessianTapeFromConfig,
  type Tape,
  type Variable,
} from "@tapegrad/autograd";
import { ConfigFrom, loggerLayer, withSpan } from "@tapegrad/effect-runtime";
import { boolArg, floatArg, intArg, parseKV, strArg } from "../parse.js";

function record<K extends Tape<number, unknown>>(tape: K, point: readonly number[]): Variable<number> {
  const [x, y, z] = tape.createVariables(point);
  return tape.divide(tape.cos(x), tape.multiply(tape.add(x, y), tape.sin(z)));
}

const fmt = (v: number) => v.toPrecision(12);
const NAMES = ["x", "y", "z"];

export async function demoCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const point = [floatArg(kv, "x", 1.23), floatArg(kv, "y", 0.66), floatArg(kv, "z", 2.34)];
  const wantHessian = boolArg(kv, "hessian", false);
  const wantDump = boolArg(kv, "dump", false);

  // an empty path yields the defaults
  const config = await Effect.runPromise(loadAutodiffConfig(strArg(kv, "config", "")));
  const limit = intArg(kv, "limit", config.nodeDumpLimit);

  const report = (out: Variable<number>, gradient: readonly number[]) => {
    console.log(`f(${point.join(", ")}) = ${fmt(out.value)}\n`);
    gradient.forEach((g, k) => console.log(`∂f/∂${NAMES[k]} = ${fmt(g)}`));
  };

  const dump = (tape: Tape<number, unknown>) => {
    if (!wantDump) return Effect.succeed(0);
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once("SIGINT", onInterrupt);
    console.log("");
    return dumpNodes(tape, { limit, signal: controller.signal }).pipe(
      Effect.catchTag("NodeDumpCancelledError", (e) =>
        Effect.logWarning(`dumped ${e.dumped} of ${tape.nodeCount} nodes`).pipe(Effect.as(e.dumped)),
      ),
      Effect.ensuring(Effect.sync(() => process.off("SIGINT", onInterrupt))),
    );
  };

  const program = Effect.gen(function* () {
    if (wantHessian) {
      const tape = yield* hessianTapeFromConfig(realField);
      const out = record(tape, point);
      yield* Effect.logDebug(`recorded ${tape.nodeCount} nodes (${tape.storage})`);
      const { gradient, hessian } = yield* withSpan(
        "accumulate",
        Effect.sync(() => tape.reverseAccumulateWithHessian()),
      );
      report(out, gradient);
      console.log("\nHessian:");
      for (const row of hessian) console.log(`  [${row.map(fmt).join(", ")}]`);
      yield* dump(tape);
    } else {
      const tape = yield* gradientTapeFromConfig(realField);
      const out = record(tape, point);
      yield* Effect.logDebug(`recorded ${tape.nodeCount} nodes (${tape.storage})`);
      const gradient = yield* withSpan("accumulate", Effect.sync(() => tape.reverseAccumulate()));
      report(out, gradient);
      yield* dump(tape);
    }
  });

  await Effect.runPromise(
    program.pipe(Effect.provide(Layer.merge(ConfigFrom(config), loggerLayer(config.logLevel)))),
  );
}
