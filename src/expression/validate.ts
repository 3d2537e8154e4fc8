/**
 * Static checks for expressions, without evaluating them
 *
 * Used at configuration time and by editors before a pass starts, so a
 * broken expression is reported once instead of once per trace.
 */

import { ExpressionError } from "../errors";
import type { Expr } from "./ast";
import { isSafeFunction, walk } from "./ast";
import { parseExpression } from "./parser";

/**
 * Check syntax, variable references and function names
 *
 * @param expression Expression source
 * @param availableVariables Names the expression may read
 * @returns Error message, or undefined when the expression is valid
 */
export function validateExpression(
  expression: string,
  availableVariables: readonly string[]
): string | undefined {
  let ast: Expr;
  try {
    ast = parseExpression(expression);
  } catch (error) {
    if (error instanceof ExpressionError) {
      return error.kind === "syntax"
        ? error.message.replace("Syntax error in expression", "Syntax error")
        : error.message;
    }
    throw error;
  }

  const allowed = new Set(availableVariables);
  let problem: string | undefined;
  walk(ast, (node) => {
    if (problem !== undefined) return;
    if (node.kind === "variable" && !allowed.has(node.name) && !isSafeFunction(node.name)) {
      problem = `Unknown variable: '${node.name}'`;
    }
  });
  return problem;
}
