/**
 * Tests for expression evaluation
 */

import { describe, expect, test } from "vitest";
import { DivisionByZeroError, ExpressionError } from "../../src/errors";
import { compileExpression, roundHalfEven, SafeEvaluator } from "../../src/expression";

const evaluate = (source: string, variables: Record<string, number> = {}): number =>
  compileExpression(source).evaluate(variables);

describe("arithmetic", () => {
  test.each([
    ["1 + 2 * 3", 7],
    ["(1 + 2) * 3", 9],
    ["7 / 2", 3.5],
    ["7 // 2", 3],
    ["-7 // 2", -4],
    ["-7 % 3", 2],
    ["7 % -3", -2],
    ["2 ** 3 ** 2", 512],
    ["-2 ** 2", -4],
    ["2 ** -1", 0.5],
    ["+5 - -5", 10],
    ["True + 1", 2],
  ])("%s = %d", (source, expected) => {
    expect(evaluate(source)).toBe(expected);
  });

  test("should read variables", () => {
    expect(evaluate("source_x * 100", { source_x: 500000 })).toBe(50000000);
  });

  test("should raise DivisionByZeroError", () => {
    expect(() => evaluate("1 / 0")).toThrow(DivisionByZeroError);
    expect(() => evaluate("1 // x", { x: 0 })).toThrow(DivisionByZeroError);
    expect(() => evaluate("5 % 0")).toThrow("Division by zero");
    expect(() => evaluate("0 ** -1")).toThrow(DivisionByZeroError);
  });

  test("should list available variables for an unknown one", () => {
    expect(() => evaluate("zz + 1", { b: 1, a: 2 })).toThrow("Unknown variable: 'zz'. Available: a, b");
  });

  test("should not resolve inherited object properties", () => {
    expect(() => evaluate("constructor", {})).toThrow(ExpressionError);
  });
});

describe("comparisons and logic", () => {
  test("should chain comparisons", () => {
    expect(compileExpression("1 < 2 < 3").evaluateCondition({})).toBe(true);
    expect(compileExpression("1 < 3 < 2").evaluateCondition({})).toBe(false);
  });

  test("should combine with and/or", () => {
    const condition = compileExpression("trace_index >= 2 and trace_index != 4 or trace_index == 0");
    expect([0, 1, 2, 3, 4, 5].filter((i) => condition.evaluateCondition({ trace_index: i }))).toEqual([0, 2, 3, 5]);
  });

  test("should treat non-zero numbers as true", () => {
    expect(compileExpression("x").evaluateCondition({ x: -1 })).toBe(true);
    expect(compileExpression("x").evaluateCondition({ x: 0 })).toBe(false);
  });

  test("should evaluate a comparison to 1 or 0", () => {
    expect(evaluate("3 > 2")).toBe(1);
    expect(evaluate("3 < 2")).toBe(0);
  });

  test("should short-circuit and skip later operands", () => {
    expect(compileExpression("x != 0 and 10 / x > 1").evaluateCondition({ x: 0 })).toBe(false);
  });
});

describe("functions", () => {
  test.each([
    ["abs(-3)", 3],
    ["int(-3.7)", -3],
    ["float(2)", 2],
    ["round(2.5)", 2],
    ["round(3.5)", 4],
    ["round(1.25, 1)", 1.2],
    ["min(4, 2, 8)", 2],
    ["max(4, 2, 8)", 8],
  ])("%s = %d", (source, expected) => {
    expect(evaluate(source)).toBe(expected);
  });

  test("should check arity", () => {
    expect(() => evaluate("min(1)")).toThrow("min() takes at least 2 argument(s), got 1");
    expect(() => evaluate("abs(1, 2)")).toThrow("abs() takes 1 argument(s), got 2");
    expect(() => evaluate("round(1, 2, 3)")).toThrow("round() takes 1 or 2 argument(s), got 3");
  });

  test("should reject fractional round digits", () => {
    expect(() => evaluate("round(1.5, 0.5)")).toThrow("round() digits must be an integer");
  });
});

describe("roundHalfEven", () => {
  test("should round ties to even", () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
  });
});

describe("SafeEvaluator", () => {
  test("should evaluate against its bound variables", () => {
    const evaluator = new SafeEvaluator({ source_x: 500000, source_y: 6000000 });
    expect(evaluator.evaluate("source_x * 100")).toBe(50000000);
    expect(evaluator.evaluateCondition("source_x > 4e5")).toBe(true);
    expect(evaluator.evaluate("source_y - source_x")).toBe(5500000);
  });
});
