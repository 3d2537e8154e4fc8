/**
 * Safe evaluator for header expressions
 *
 * Walks the parsed tree against a flat name → number environment. There is
 * no path from an expression to host code: only arithmetic, comparisons,
 * boolean logic and the six allow-listed functions exist.
 *
 * @example
 * ```typescript
 * const evaluator = new SafeEvaluator({ source_x: 500000, source_y: 6000000 });
 * evaluator.evaluate("source_x * 100");          // 50000000
 * evaluator.evaluateCondition("source_x > 4e5"); // true
 * ```
 */

import { DivisionByZeroError, ExpressionError } from "../errors";
import type { BinaryOperator, CompareOperator, Expr, SafeFunction } from "./ast";
import { parseExpression } from "./parser";

/**
 * Variable environment: header field name → value
 */
export type Variables = Readonly<Record<string, number>>;

type Value = number | boolean;

function toNumber(value: Value): number {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

function truthy(value: Value): boolean {
  return typeof value === "boolean" ? value : value !== 0;
}

/**
 * Round half to even, optionally to a number of decimal digits
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  return rounded / factor;
}

function flooredModulo(left: number, right: number): number {
  const result = left % right;
  return result !== 0 && Math.sign(result) !== Math.sign(right) ? result + right : result;
}

function applyBinary(op: BinaryOperator, left: number, right: number, source: string): number {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      if (right === 0) throw new DivisionByZeroError(source);
      return left / right;
    case "//":
      if (right === 0) throw new DivisionByZeroError(source);
      return Math.floor(left / right);
    case "%":
      if (right === 0) throw new DivisionByZeroError(source);
      return flooredModulo(left, right);
    case "**":
      if (left === 0 && right < 0) throw new DivisionByZeroError(source);
      return left ** right;
  }
}

function applyCompare(op: CompareOperator, left: number, right: number): boolean {
  switch (op) {
    case ">":
      return left > right;
    case "<":
      return left < right;
    case ">=":
      return left >= right;
    case "<=":
      return left <= right;
    case "==":
      return left === right;
    case "!=":
      return left !== right;
  }
}

function arityError(name: SafeFunction, expected: string, got: number, source: string): ExpressionError {
  return new ExpressionError(`${name}() takes ${expected} argument(s), got ${got}`, "arity", source);
}

function callFunction(name: SafeFunction, args: readonly number[], source: string): number {
  switch (name) {
    case "abs": {
      const [x] = args;
      if (args.length !== 1 || x === undefined) throw arityError(name, "1", args.length, source);
      return Math.abs(x);
    }
    case "int": {
      const [x] = args;
      if (args.length !== 1 || x === undefined) throw arityError(name, "1", args.length, source);
      if (!Number.isFinite(x)) {
        throw new ExpressionError(`Cannot convert ${x} to integer`, "type", source);
      }
      return Math.trunc(x);
    }
    case "float": {
      const [x] = args;
      if (args.length !== 1 || x === undefined) throw arityError(name, "1", args.length, source);
      return x;
    }
    case "round": {
      const [x, digits] = args;
      if (args.length < 1 || args.length > 2 || x === undefined) {
        throw arityError(name, "1 or 2", args.length, source);
      }
      if (digits !== undefined && !Number.isInteger(digits)) {
        throw new ExpressionError("round() digits must be an integer", "type", source);
      }
      return roundHalfEven(x, digits ?? 0);
    }
    case "min":
    case "max": {
      if (args.length < 2) throw arityError(name, "at least 2", args.length, source);
      return name === "min" ? Math.min(...args) : Math.max(...args);
    }
  }
}

/**
 * A parsed expression that can be evaluated repeatedly
 *
 * Parse once, evaluate per trace.
 */
export class CompiledExpression {
  constructor(
    public readonly source: string,
    public readonly ast: Expr
  ) {}

  /**
   * Evaluate to a number; boolean results become 1 or 0
   *
   * @throws {ExpressionError} Unknown variable, bad call, or other evaluation failure
   * @throws {DivisionByZeroError} Division, floor division or modulo by zero
   */
  evaluate(variables: Variables): number {
    return toNumber(this.evaluateNode(this.ast, variables));
  }

  /**
   * Evaluate and coerce the result to a boolean
   */
  evaluateCondition(variables: Variables): boolean {
    return truthy(this.evaluateNode(this.ast, variables));
  }

  private evaluateNode(node: Expr, variables: Variables): Value {
    switch (node.kind) {
      case "number":
      case "boolean":
        return node.value;

      case "variable": {
        const value = Object.prototype.hasOwnProperty.call(variables, node.name)
          ? variables[node.name]
          : undefined;
        if (value === undefined) {
          throw new ExpressionError(
            `Unknown variable: '${node.name}'. Available: ${Object.keys(variables).sort().join(", ")}`,
            "unknown_variable",
            this.source,
            node.pos
          );
        }
        return value;
      }

      case "unary": {
        const operand = toNumber(this.evaluateNode(node.operand, variables));
        return node.op === "-" ? -operand : operand;
      }

      case "binary": {
        const left = toNumber(this.evaluateNode(node.left, variables));
        const right = toNumber(this.evaluateNode(node.right, variables));
        return applyBinary(node.op, left, right, this.source);
      }

      case "compare": {
        let left = toNumber(this.evaluateNode(node.first, variables));
        for (const link of node.links) {
          const right = toNumber(this.evaluateNode(link.right, variables));
          if (!applyCompare(link.op, left, right)) return false;
          left = right;
        }
        return true;
      }

      case "bool": {
        const decisive = node.op === "or";
        for (const operand of node.operands) {
          if (truthy(this.evaluateNode(operand, variables)) === decisive) return decisive;
        }
        return !decisive;
      }

      case "call": {
        const args = node.args.map((arg) => toNumber(this.evaluateNode(arg, variables)));
        return callFunction(node.name, args, this.source);
      }
    }
  }
}

/**
 * Parse an expression for repeated evaluation
 *
 * @throws {ExpressionError} If the source is outside the language
 */
export function compileExpression(source: string): CompiledExpression {
  return new CompiledExpression(source.trim(), parseExpression(source));
}

/**
 * Evaluator bound to one variable environment
 */
export class SafeEvaluator {
  private readonly cache = new Map<string, CompiledExpression>();

  constructor(public readonly variables: Variables) {}

  evaluate(expression: string): number {
    return this.compiled(expression).evaluate(this.variables);
  }

  evaluateCondition(condition: string): boolean {
    return this.compiled(condition).evaluateCondition(this.variables);
  }

  private compiled(source: string): CompiledExpression {
    let compiled = this.cache.get(source);
    if (compiled === undefined) {
      compiled = compileExpression(source);
      this.cache.set(source, compiled);
    }
    return compiled;
  }
}
