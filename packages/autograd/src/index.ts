export { Variable } from "./variable.js";
export {
  type GradientNode,
  type HessianNode,
  type SecondPartials,
  gradientRoot,
  hessianRoot,
} from "./node.js";
export {
  type NodeStore,
  ArrayNodeStore,
  LinkedListNodeStore,
  createNodeStore,
} from "./store.js";
export {
  Tape,
  type TapeOptions,
  type AccumulateOptions,
  type CustomUnary,
  type CustomBinary,
  type Operand,
} from "./tape.js";
export { GradientTape } from "./gradient-tape.js";
export { HessianTape, type GradientAndHessian } from "./hessian-tape.js";
export {
  type TapeFunction,
  gradient,
  directionalDerivative,
  jacobian,
  jvp,
  vjp,
  divergence,
  curl,
  hessian,
  laplacian,
} from "./calculus.js";
export {
  type RealBuild,
  type GradientCheckResult,
  numericalGradient,
  checkGradient,
} from "./check.js";
export { type DumpOptions, dumpNodes, dumpTape } from "./dump.js";
export { tapeOptionsFrom, gradientTapeFromConfig, hessianTapeFromConfig } from "./factory.js";
