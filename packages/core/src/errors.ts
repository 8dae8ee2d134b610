/**
 * Typed error classes for the tape, its accumulators and configuration.
 */
import { Data } from "effect";

/** Misuse of the recording API that is not an accumulation failure. */
export class AutogradError extends Data.TaggedError("AutogradError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Accumulation was requested on a tape that has no variables. */
export class NoRootNodesError extends Data.TaggedError("NoRootNodesError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class IndexOutOfRangeError extends Data.TaggedError("IndexOutOfRangeError")<{
  readonly message: string;
  readonly index: number;
  readonly nodeCount: number;
  readonly cause?: unknown;
}> {}

export class NodeDumpCancelledError extends Data.TaggedError("NodeDumpCancelledError")<{
  readonly message: string;
  /** Nodes logged before the signal was observed. */
  readonly dumped: number;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
