/**
 * Safe expression language for computed header edits and trace conditions
 */

export type { BinaryOperator, BoolOperator, CompareOperator, Expr, SafeFunction, UnaryOperator } from "./ast";
export { isSafeFunction, referencedVariables, SAFE_FUNCTIONS, walk } from "./ast";
export type { Variables } from "./evaluator";
export { CompiledExpression, compileExpression, roundHalfEven, SafeEvaluator } from "./evaluator";
export { parseExpression, tokenize } from "./parser";
export { validateExpression } from "./validate";
