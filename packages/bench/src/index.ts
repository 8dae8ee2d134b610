export {
  type BenchResult,
  type TapeBenchOptions,
  recordChain,
  benchRecord,
  benchGradient,
  benchHessian,
  runTapeBenches,
} from "./tape.js";
