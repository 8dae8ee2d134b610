/**
 * Diagnostic node dump through the Effect logger.
 */
import { Effect } from "effect";
import { AutodiffConfigService, NodeDumpCancelledError } from "@tapegrad/core";
import type { Tape } from "./tape.js";

export interface DumpOptions {
  /** Maximum number of nodes to log (default 100). */
  readonly limit?: number;
  /** Checked before each node. */
  readonly signal?: AbortSignal;
}

/** Log the first `limit` nodes; succeeds with the number dumped. */
export function dumpNodes<T, N>(
  tape: Tape<T, N>,
  options: DumpOptions = {},
): Effect.Effect<number, NodeDumpCancelledError> {
  return Effect.gen(function* () {
    const count = Math.max(0, Math.min(Math.floor(options.limit ?? 100), tape.nodeCount));
    for (let i = 0; i < count; i++) {
      if (options.signal?.aborted) {
        yield* Effect.logWarning("Node dump cancelled");
        return yield* Effect.fail(
          new NodeDumpCancelledError({ message: `Node dump cancelled after ${i} nodes`, dumped: i }),
        );
      }
      for (const line of tape.describeNode(i)) yield* Effect.logInfo(line);
    }
    return count;
  });
}

/** `dumpNodes` with the limit taken from the configured `nodeDumpLimit`. */
export function dumpTape<T, N>(
  tape: Tape<T, N>,
  signal?: AbortSignal,
): Effect.Effect<number, NodeDumpCancelledError, AutodiffConfigService> {
  return Effect.flatMap(AutodiffConfigService, (config) =>
    dumpNodes(tape, { limit: config.nodeDumpLimit, signal }),
  );
}
