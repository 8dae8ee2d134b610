import { describe, it, expect } from "vitest";
import { realField, IndexOutOfRangeError, NoRootNodesError } from "@tapegrad/core";
import { GradientTape, Tape, Variable } from "@tapegrad/autograd";

const X = 1.23;
const Y = 2.34;
const C = 2.5;

type Unary = (tape: GradientTape<number>, x: Variable<number>) => Variable<number>;
type Binary = (tape: GradientTape<number>, x: Variable<number>, y: Variable<number>) => Variable<number>;

function unaryGradient(op: Unary, x0: number): { value: number; gradient: number } {
  const tape = new GradientTape(realField);
  const x = tape.createVariable(x0);
  const out = op(tape, x);
  return { value: out.value, gradient: tape.reverseAccumulate()[0] };
}

function binaryGradient(op: Binary, x0: number, y0: number): { value: number; gradient: number[] } {
  const tape = new GradientTape(realField);
  const x = tape.createVariable(x0);
  const y = tape.createVariable(y0);
  const out = op(tape, x, y);
  return { value: out.value, gradient: tape.reverseAccumulate() };
}

/** f(x, y, z) = cos(x) / ((x + y)·sin(z)) */
function recordF<K extends Tape<number, unknown>>(tape: K, point: readonly number[]): Variable<number> {
  const [x, y, z] = tape.createVariables(point);
  return tape.divide(tape.cos(x), tape.multiply(tape.add(x, y), tape.sin(z)));
}

describe("GradientTape unary operations", () => {
  const cases: [string, Unary, number, number][] = [
    ["acos", (t, x) => t.acos(x), 0.123, -1.007651429146436],
    ["asin", (t, x) => t.asin(x), 0.123, 1.007651429146436],
    ["acosh", (t, x) => t.acosh(x), X, 1.396315794095838],
    ["asinh", (t, x) => t.asinh(x), X, 0.6308300845448597],
    ["atan", (t, x) => t.atan(x), X, 0.3979465955668749],
    ["atanh", (t, x) => t.atanh(x), X, -1.94969779684149],
    ["cbrt", (t, x) => t.cbrt(x), X, 0.2903634877210767],
    ["cos", (t, x) => t.cos(x), X, -0.942488801931697],
    ["cosh", (t, x) => t.cosh(x), X, 1.564468479304407],
    ["exp", (t, x) => t.exp(x), X, 3.421229536289673],
    ["exp2", (t, x) => t.exp2(x), X, 1.625894476644487],
    ["exp10", (t, x) => t.exp10(x), X, 39.10350518430174],
    ["ln", (t, x) => t.ln(x), X, 0.813008130081301],
    ["log2", (t, x) => t.log2(x), X, 1.172922797470702],
    ["log10", (t, x) => t.log10(x), X, 0.35308494463679],
    ["sin", (t, x) => t.sin(x), X, 0.3342377271245026],
    ["sinh", (t, x) => t.sinh(x), X, 1.856761056985266],
    ["sqrt", (t, x) => t.sqrt(x), X, 0.4508348173337161],
    ["tan", (t, x) => t.tan(x), X, 8.95136077522624],
    ["tanh", (t, x) => t.tanh(x), X, 0.2900600799721436],
    ["negate", (t, x) => t.negate(x), X, -1],
  ];

  for (const [name, op, x0, expected] of cases) {
    it(`${name} gradient`, () => {
      expect(unaryGradient(op, x0).gradient).toBeCloseTo(expected, 10);
    });
  }

  it("computes forward values", () => {
    expect(unaryGradient((t, x) => t.acos(x), 0.123).value).toBeCloseTo(1.447484051603025, 12);
    expect(unaryGradient((t, x) => t.asin(x), 0.123).value).toBeCloseTo(0.123312275191872, 12);
    expect(unaryGradient((t, x) => t.acosh(x), X).value).toBeCloseTo(0.6658635291565548, 12);
    expect(unaryGradient((t, x) => t.asinh(x), X).value).toBeCloseTo(1.035037896192308, 12);
    expect(unaryGradient((t, x) => t.atan(x), X).value).toBeCloseTo(0.88817377437768, 12);
    expect(unaryGradient((t, x) => t.tan(x), X).value).toBeCloseTo(2.819815734268152, 12);
    expect(unaryGradient((t, x) => t.tanh(x), X).value).toBeCloseTo(0.84257932565893, 12);
  });
});

describe("GradientTape binary operations", () => {
  const cases: [string, Binary, number, number][] = [
    ["atan2", (t, x, y) => t.atan2(x, y), 0.334835801674179, -0.1760034342133505],
    ["divide", (t, x, y) => t.divide(x, y), 0.4273504273504274, -0.2246329169406093],
    ["log", (t, x, y) => t.log(x, y), 0.9563103467806, -0.1224030239537303],
    ["pow", (t, x, y) => t.pow(x, y), 3.088081166620949, 0.3360299854573856],
    ["root", (t, x, y) => t.root(x, y), 0.3795771135606888, -0.04130373687338086],
    ["add", (t, x, y) => t.add(x, y), 1, 1],
    ["subtract", (t, x, y) => t.subtract(x, y), 1, -1],
    ["multiply", (t, x, y) => t.multiply(x, y), Y, X],
    ["modulo", (t, x, y) => t.modulo(x, y), 1, 0],
  ];

  for (const [name, op, dx, dy] of cases) {
    it(`${name} gradient`, () => {
      const [gx, gy] = binaryGradient(op, X, Y).gradient;
      expect(gx).toBeCloseTo(dx, 10);
      expect(gy).toBeCloseTo(dy, 10);
    });
  }

  it("computes forward values", () => {
    expect(binaryGradient((t, x, y) => t.atan2(x, y), X, Y).value).toBeCloseTo(0.4839493878600246, 12);
    expect(binaryGradient((t, x, y) => t.log(x, y), X, Y).value).toBeCloseTo(0.2435028442982799, 12);
    expect(binaryGradient((t, x, y) => t.pow(x, y), X, Y).value).toBeCloseTo(1.623222151685371, 12);
    expect(binaryGradient((t, x, y) => t.root(x, y), X, Y).value).toBeCloseTo(1.092498848250374, 12);
  });

  it("modulo weights the divisor by -floor(x / y)", () => {
    const { value, gradient } = binaryGradient((t, x, y) => t.modulo(x, y), 7.5, 2);
    expect(value).toBe(1.5);
    expect(gradient).toEqual([1, -3]);
  });
});

describe("GradientTape constant operands", () => {
  const lnC = Math.log(C);
  const cases: [string, Unary, number, number][] = [
    ["log(x, c)", (t, x) => t.log(x, C), X, 1 / (X * lnC)],
    ["log(c, b)", (t, b) => t.log(C, b), Y, -lnC / (Y * Math.log(Y) ** 2)],
    ["root(x, c)", (t, x) => t.root(x, C), X, X ** (1 / C) / (C * X)],
    ["root(c, n)", (t, n) => t.root(C, n), Y, (-lnC * C ** (1 / Y)) / (Y * Y)],
    ["atan2(y, c)", (t, y) => t.atan2(y, C), X, C / (C * C + X * X)],
    ["atan2(c, x)", (t, x) => t.atan2(C, x), X, -C / (X * X + C * C)],
  ];

  for (const [name, op, x0, expected] of cases) {
    it(`${name} gradient`, () => {
      expect(unaryGradient(op, x0).gradient).toBeCloseTo(expected, 10);
    });
  }

  it("records constant-left and constant-right variants as unary nodes", () => {
    const tape = new GradientTape(realField);
    const x = tape.createVariable(2);
    const a = tape.subtract(5, x);
    expect(a.value).toBe(3);
    expect(tape.reverseAccumulate()).toEqual([-1]);

    const b = tape.divide(2, x);
    expect(b.value).toBe(1);
    expect(tape.reverseAccumulate()[0]).toBeCloseTo(-0.5, 12);

    const c = tape.multiply(x, 4);
    expect(c.value).toBe(8);
    expect(tape.reverseAccumulate()).toEqual([4]);

    const d = tape.add(3, x);
    expect(d.value).toBe(5);
    expect(tape.reverseAccumulate()).toEqual([1]);
    expect(tape.nodeCount).toBe(5);
  });

  it("differentiates powers with a constant base or exponent", () => {
    const tape = new GradientTape(realField);
    const [x, y] = tape.createVariables([2, 3]);
    expect(tape.pow(x, 3).value).toBe(8);
    expect(tape.reverseAccumulate()[0]).toBeCloseTo(12, 12);

    expect(tape.pow(2, y).value).toBe(8);
    expect(tape.reverseAccumulate()[1]).toBeCloseTo(8 * Math.LN2, 12);
  });

  it("takes the remainder with a constant dividend or divisor", () => {
    const tape = new GradientTape(realField);
    const x = tape.createVariable(2);
    expect(tape.modulo(7.5, x).value).toBe(1.5);
    expect(tape.reverseAccumulate()).toEqual([-3]);
    expect(tape.modulo(x, 1.5).value).toBe(0.5);
    expect(tape.reverseAccumulate()).toEqual([1]);
  });
});

describe("GradientTape composite functions", () => {
  it("sin(x)·ln(x)/exp(-x)", () => {
    const tape = new GradientTape(realField);
    const x = tape.createVariable(X);
    const out = tape.divide(tape.multiply(tape.sin(x), tape.ln(x)), tape.exp(tape.negate(x)));
    expect(out.value).toBeCloseTo(0.6675110878078776, 12);
    expect(tape.reverseAccumulate()[0]).toBeCloseTo(3.525753368769319, 10);
  });

  it("cos(x)/((x+y)·sin(z))", () => {
    const tape = new GradientTape(realField);
    recordF(tape, [X, 0.66, Y]);
    const [gx, gy, gz] = tape.reverseAccumulate();
    expect(gx).toBeCloseTo(-0.8243135949243512, 10);
    expect(gy).toBeCloseTo(-0.13023459678281554, 10);
    expect(gz).toBeCloseTo(0.2382974299363868, 10);
  });

  it("scales the gradient by the seed", () => {
    const tape = new GradientTape(realField);
    const [x, y] = tape.createVariables([3, 4]);
    tape.multiply(x, y);
    expect(tape.reverseAccumulate({ seed: 2 })).toEqual([8, 6]);
  });

  it("accumulates through a variable used twice", () => {
    const tape = new GradientTape(realField);
    const x = tape.createVariable(3);
    tape.multiply(x, x);
    expect(tape.reverseAccumulate()).toEqual([6]);
  });

  it("records custom operations", () => {
    const tape = new GradientTape(realField);
    const [x, y] = tape.createVariables([3, 4]);
    const sq = tape.custom(x, { f: (v) => v * v, dfx: (v) => 2 * v });
    expect(sq.value).toBe(9);
    expect(tape.reverseAccumulate()).toEqual([6, 0]);

    const hyp = tape.customBinary(x, y, {
      f: (a, b) => Math.hypot(a, b),
      dfx: (a, b) => a / Math.hypot(a, b),
      dfy: (a, b) => b / Math.hypot(a, b),
    });
    expect(hyp.value).toBe(5);
    const [gx, gy] = tape.reverseAccumulate();
    expect(gx).toBeCloseTo(0.6, 12);
    expect(gy).toBeCloseTo(0.8, 12);
  });
});

describe("GradientTape partial accumulation", () => {
  it("accumulating to the last node equals the default", () => {
    const tape = new GradientTape(realField);
    recordF(tape, [X, 0.66, Y]);
    expect(tape.reverseAccumulate({ index: tape.nodeCount - 1 })).toEqual(tape.reverseAccumulate());
  });

  it("accumulating to an intermediate gives that node's gradient", () => {
    const tape = new GradientTape(realField);
    const [x, y, z] = tape.createVariables([X, 0.66, Y]);
    const c = tape.cos(x);
    const s = tape.add(x, y);
    tape.divide(c, tape.multiply(s, tape.sin(z)));

    expect(tape.reverseAccumulate({ index: s.index })).toEqual([1, 1, 0]);
    expect(tape.reverseAccumulate({ index: c.index })[0]).toBeCloseTo(-Math.sin(X), 14);
  });

  it("accumulating to a root yields the seed at that leaf", () => {
    const tape = new GradientTape(realField);
    const [x, y] = tape.createVariables([1, 2]);
    tape.multiply(x, y);
    expect(tape.reverseAccumulate({ index: y.index, seed: 5 })).toEqual([0, 5]);
  });
});

describe("GradientTape tracking", () => {
  it("computes values without recording when tracking is off", () => {
    const tracked = new GradientTape(realField);
    const untracked = new GradientTape(realField, { tracking: false });
    const a = recordF(tracked, [X, 0.66, Y]);
    const b = recordF(untracked, [X, 0.66, Y]);

    expect(b.value).toBe(a.value);
    expect(untracked.nodeCount).toBe(3);
    expect(untracked.variableCount).toBe(3);
    expect(tracked.nodeCount).toBe(8);
  });

  it("resumes recording after tracking is re-enabled", () => {
    const tape = new GradientTape(realField);
    const x = tape.createVariable(2);
    tape.isTracking = false;
    tape.exp(x);
    expect(tape.nodeCount).toBe(1);
    tape.isTracking = true;
    tape.multiply(x, 5);
    expect(tape.nodeCount).toBe(2);
    expect(tape.reverseAccumulate()).toEqual([5]);
  });
});

describe("GradientTape errors", () => {
  it("rejects accumulation without root nodes", () => {
    const tape = new GradientTape(realField);
    expect(() => tape.reverseAccumulate()).toThrow(NoRootNodesError);
    expect(() => tape.reverseAccumulate()).toThrow("The gradient tape contains no root nodes.");
  });

  it("rejects out-of-range indices", () => {
    const tape = new GradientTape(realField);
    const x = tape.createVariable(1);
    tape.sin(x);
    expect(() => tape.reverseAccumulate({ index: 2 })).toThrow(IndexOutOfRangeError);
    expect(() => tape.reverseAccumulate({ index: -1 })).toThrow(IndexOutOfRangeError);
  });
});

describe("GradientTape storage", () => {
  it("linked-list storage matches array storage", () => {
    const array = new GradientTape(realField, { storage: "array" });
    const list = new GradientTape(realField, { storage: "linked-list" });
    recordF(array, [X, 0.66, Y]);
    recordF(list, [X, 0.66, Y]);
    expect(list.storage).toBe("linked-list");
    expect(list.reverseAccumulate()).toEqual(array.reverseAccumulate());
  });

  it("describes nodes for dumps", () => {
    const tape = new GradientTape(realField);
    const [x, y] = tape.createVariables([2, 3]);
    tape.multiply(x, y);
    tape.sin(x);
    expect(tape.describeNode(0)).toEqual(["Root Node: 0"]);
    expect(tape.describeNode(2)).toEqual(["Node: 2", "  dx: 3, dy: 2", "  px: 0, py: 1"]);
    expect(tape.describeNode(3)[2]).toBe("  px: 0, py: 3");
  });
});
