/**
 * Syntax tree of the header expression language
 *
 * Only constructs the language allows have a node kind; anything else is
 * rejected while parsing.
 */

export type BinaryOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";
export type UnaryOperator = "+" | "-";
export type CompareOperator = ">" | "<" | ">=" | "<=" | "==" | "!=";
export type BoolOperator = "and" | "or";

/**
 * Functions callable from expressions
 */
export const SAFE_FUNCTIONS = ["abs", "int", "round", "min", "max", "float"] as const;

export type SafeFunction = (typeof SAFE_FUNCTIONS)[number];

export function isSafeFunction(name: string): name is SafeFunction {
  return SAFE_FUNCTIONS.some((fn) => fn === name);
}

export type Expr =
  | { readonly kind: "number"; readonly value: number; readonly pos: number }
  | { readonly kind: "boolean"; readonly value: boolean; readonly pos: number }
  | { readonly kind: "variable"; readonly name: string; readonly pos: number }
  | { readonly kind: "unary"; readonly op: UnaryOperator; readonly operand: Expr; readonly pos: number }
  | {
      readonly kind: "binary";
      readonly op: BinaryOperator;
      readonly left: Expr;
      readonly right: Expr;
      readonly pos: number;
    }
  | {
      readonly kind: "compare";
      readonly first: Expr;
      readonly links: readonly { readonly op: CompareOperator; readonly right: Expr }[];
      readonly pos: number;
    }
  | { readonly kind: "bool"; readonly op: BoolOperator; readonly operands: readonly Expr[]; readonly pos: number }
  | { readonly kind: "call"; readonly name: SafeFunction; readonly args: readonly Expr[]; readonly pos: number };

/**
 * Visit every node depth-first
 */
export function walk(node: Expr, visit: (node: Expr) => void): void {
  visit(node);
  switch (node.kind) {
    case "number":
    case "boolean":
    case "variable":
      return;
    case "unary":
      walk(node.operand, visit);
      return;
    case "binary":
      walk(node.left, visit);
      walk(node.right, visit);
      return;
    case "compare":
      walk(node.first, visit);
      for (const link of node.links) walk(link.right, visit);
      return;
    case "bool":
      for (const operand of node.operands) walk(operand, visit);
      return;
    case "call":
      for (const arg of node.args) walk(arg, visit);
      return;
  }
}

/**
 * Names of all variables an expression reads
 */
export function referencedVariables(node: Expr): string[] {
  const names = new Set<string>();
  walk(node, (n) => {
    if (n.kind === "variable") names.add(n.name);
  });
  return [...names];
}
