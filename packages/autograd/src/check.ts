/**
 * Finite-difference checks for recorded gradients (real field only).
 */
import { defaultAutodiffConfig, realField, type GradientCheckConfig } from "@tapegrad/core";
import { GradientTape } from "./gradient-tape.js";
import type { Variable } from "./variable.js";

export type RealBuild = (tape: GradientTape<number>, x: Variable<number>[]) => Variable<number>;

export interface GradientCheckResult {
  readonly value: number;
  readonly analytic: number[];
  readonly numeric: number[];
  readonly maxAbsError: number;
  readonly ok: boolean;
}

/** Central differences: (f(x + εeₖ) − f(x − εeₖ)) / 2ε for each k. */
export function numericalGradient(
  f: (x: number[]) => number,
  point: readonly number[],
  epsilon = defaultAutodiffConfig.gradientCheck.epsilon,
): number[] {
  return point.map((_, k) => {
    const plus = [...point];
    const minus = [...point];
    plus[k] += epsilon;
    minus[k] -= epsilon;
    return (f(plus) - f(minus)) / (2 * epsilon);
  });
}

/**
 * Record `build` on a fresh tape at `point` and compare its gradient with
 * central differences of the same function evaluated untracked.
 */
export function checkGradient(
  build: RealBuild,
  point: readonly number[],
  config: GradientCheckConfig = defaultAutodiffConfig.gradientCheck,
): GradientCheckResult {
  const tape = new GradientTape(realField);
  const out = build(tape, tape.createVariables(point));
  const analytic = tape.reverseAccumulate();

  const evaluate = (x: number[]): number => {
    const scratch = new GradientTape(realField, { tracking: false });
    return build(scratch, scratch.createVariables(x)).value;
  };
  const numeric = numericalGradient(evaluate, point, config.epsilon);

  let maxAbsError = 0;
  for (let k = 0; k < analytic.length; k++) {
    maxAbsError = Math.max(maxAbsError, Math.abs(analytic[k] - numeric[k]));
  }
  return { value: out.value, analytic, numeric, maxAbsError, ok: maxAbsError <= config.tolerance };
}
