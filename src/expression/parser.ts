/**
 * Tokenizer and recursive-descent parser for header expressions
 *
 * Precedence, lowest first: `or`, `and`, comparisons (chainable),
 * `+ -`, `* / // %`, unary `+ -`, `**` (right-associative, binds tighter
 * than a unary operator on its left).
 */

import { ExpressionError } from "../errors";
import type { BinaryOperator, CompareOperator, Expr } from "./ast";
import { isSafeFunction, SAFE_FUNCTIONS } from "./ast";

type Token =
  | { readonly type: "number"; readonly value: number; readonly pos: number }
  | { readonly type: "name"; readonly value: string; readonly pos: number }
  | { readonly type: "op"; readonly value: string; readonly pos: number }
  | { readonly type: "eof"; readonly pos: number };

const OPERATORS = ["**", "//", ">=", "<=", "==", "!=", "+", "-", "*", "/", "%", ">", "<", "(", ")", ","];

const COMPARE_OPERATORS: readonly CompareOperator[] = [">", "<", ">=", "<=", "==", "!="];

function isCompareOperator(value: string): value is CompareOperator {
  return COMPARE_OPERATORS.some((op) => op === value);
}

// Keywords with no place in the language; rejected by name rather than
// treated as unknown variables.
const UNSUPPORTED_KEYWORDS = new Set([
  "not",
  "in",
  "is",
  "if",
  "else",
  "for",
  "lambda",
  "import",
  "None",
  "yield",
  "await",
]);

const NUMBER_PATTERN = /^(?:\d(?:_?\d)*)?(?:\.\d(?:_?\d)*|\.)?(?:[eE][+-]?\d(?:_?\d)*)?/;

function unsupported(what: string, source: string, pos: number): ExpressionError {
  return new ExpressionError(`${what} is not supported`, "unsupported", source, pos);
}

function syntaxError(message: string, source: string, pos: number): ExpressionError {
  return new ExpressionError(`Syntax error in expression: ${message}`, "syntax", source, pos);
}

/**
 * Split expression source into tokens
 *
 * @throws {ExpressionError} On characters and literals outside the language
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (/[0-9.]/.test(char)) {
      const match = NUMBER_PATTERN.exec(source.slice(i));
      const text = match?.[0] ?? "";
      if (text === "" || text === ".") {
        throw unsupported("Attribute access", source, i);
      }
      const value = Number(text.replace(/_/g, ""));
      if (Number.isNaN(value)) {
        throw syntaxError(`invalid number literal '${text}'`, source, i);
      }
      const next = source.charAt(i + text.length);
      if (/[A-Za-z_]/.test(next)) {
        throw syntaxError(`invalid number literal '${text}${next}'`, source, i);
      }
      tokens.push({ type: "number", value, pos: i });
      i += text.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      let end = i + 1;
      while (end < source.length && /[A-Za-z0-9_]/.test(source.charAt(end))) end++;
      tokens.push({ type: "name", value: source.slice(i, end), pos: i });
      i = end;
      continue;
    }

    if (char === '"' || char === "'") {
      throw unsupported("String literal", source, i);
    }
    if (char === "[" || char === "]" || char === "{" || char === "}") {
      throw unsupported(char === "[" || char === "]" ? "Subscripting" : "Collection literal", source, i);
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, i));
    if (op !== undefined) {
      tokens.push({ type: "op", value: op, pos: i });
      i += op.length;
      continue;
    }

    if (char === "=") {
      throw unsupported("Assignment", source, i);
    }
    throw syntaxError(`unexpected character '${char}'`, source, i);
  }

  tokens.push({ type: "eof", pos: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly source: string
  ) {}

  parse(): Expr {
    if (this.peek().type === "eof") {
      throw syntaxError("empty expression", this.source, 0);
    }
    const expr = this.parseOr();
    const next = this.peek();
    if (next.type !== "eof") {
      if (next.type === "op" && next.value === ",") {
        throw unsupported("Tuple", this.source, next.pos);
      }
      throw syntaxError(`unexpected ${describe(next)}`, this.source, next.pos);
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { type: "eof", pos: this.source.length };
  }

  private advance(): Token {
    const token = this.peek();
    this.index++;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.type === "op" && token.value === value;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.type === "name" && token.value === value;
  }

  private expectOp(value: string): void {
    const token = this.advance();
    if (token.type !== "op" || token.value !== value) {
      throw syntaxError(`expected '${value}' but found ${describe(token)}`, this.source, token.pos);
    }
  }

  private parseOr(): Expr {
    return this.parseBool("or", () => this.parseAnd());
  }

  private parseAnd(): Expr {
    return this.parseBool("and", () => this.parseComparison());
  }

  private parseBool(op: "and" | "or", operand: () => Expr): Expr {
    const pos = this.peek().pos;
    const operands = [operand()];
    while (this.isKeyword(op)) {
      this.advance();
      operands.push(operand());
    }
    const [only] = operands;
    return operands.length === 1 && only !== undefined ? only : { kind: "bool", op, operands, pos };
  }

  private parseComparison(): Expr {
    const pos = this.peek().pos;
    const first = this.parseAdditive();
    const links: { op: CompareOperator; right: Expr }[] = [];
    for (;;) {
      const token = this.peek();
      if (token.type === "name" && (token.value === "in" || token.value === "is" || token.value === "not")) {
        throw unsupported(`Operator '${token.value}'`, this.source, token.pos);
      }
      if (token.type !== "op" || !isCompareOperator(token.value)) break;
      this.advance();
      links.push({ op: token.value, right: this.parseAdditive() });
    }
    return links.length === 0 ? first : { kind: "compare", first, links, pos };
  }

  private parseAdditive(): Expr {
    let left = this.parseTerm();
    while (this.isOp("+") || this.isOp("-")) {
      const token = this.advance();
      const op: BinaryOperator = token.type === "op" && token.value === "-" ? "-" : "+";
      left = { kind: "binary", op, left, right: this.parseTerm(), pos: token.pos };
    }
    return left;
  }

  private parseTerm(): Expr {
    let left = this.parseFactor();
    for (;;) {
      const token = this.peek();
      if (token.type !== "op") break;
      let op: BinaryOperator;
      if (token.value === "*") op = "*";
      else if (token.value === "/") op = "/";
      else if (token.value === "//") op = "//";
      else if (token.value === "%") op = "%";
      else break;
      this.advance();
      left = { kind: "binary", op, left, right: this.parseFactor(), pos: token.pos };
    }
    return left;
  }

  private parseFactor(): Expr {
    if (this.isOp("+") || this.isOp("-")) {
      const token = this.advance();
      const op = token.type === "op" && token.value === "-" ? "-" : "+";
      return { kind: "unary", op, operand: this.parseFactor(), pos: token.pos };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parsePrimary();
    if (this.isOp("**")) {
      const token = this.advance();
      return { kind: "binary", op: "**", left: base, right: this.parseFactor(), pos: token.pos };
    }
    return base;
  }

  private parsePrimary(): Expr {
    const token = this.advance();

    if (token.type === "number") {
      return { kind: "number", value: token.value, pos: token.pos };
    }

    if (token.type === "name") {
      if (token.value === "True" || token.value === "False") {
        return { kind: "boolean", value: token.value === "True", pos: token.pos };
      }
      if (token.value === "and" || token.value === "or") {
        throw syntaxError(`unexpected '${token.value}'`, this.source, token.pos);
      }
      if (UNSUPPORTED_KEYWORDS.has(token.value)) {
        throw unsupported(`Keyword '${token.value}'`, this.source, token.pos);
      }
      if (this.isOp("(")) {
        return this.parseCall(token.value, token.pos);
      }
      return { kind: "variable", name: token.value, pos: token.pos };
    }

    if (token.type === "op" && token.value === "(") {
      const inner = this.parseOr();
      if (this.isOp(",")) {
        throw unsupported("Tuple", this.source, this.peek().pos);
      }
      this.expectOp(")");
      return inner;
    }

    throw syntaxError(`unexpected ${describe(token)}`, this.source, token.pos);
  }

  private parseCall(name: string, pos: number): Expr {
    if (!isSafeFunction(name)) {
      throw new ExpressionError(
        `Unsupported function: '${name}'. Allowed: ${SAFE_FUNCTIONS.join(", ")}`,
        "unknown_function",
        this.source,
        pos
      );
    }
    this.expectOp("(");
    const args: Expr[] = [];
    if (!this.isOp(")")) {
      for (;;) {
        args.push(this.parseOr());
        if (!this.isOp(",")) break;
        this.advance();
        if (this.isOp(")")) break;
      }
    }
    this.expectOp(")");
    return { kind: "call", name, args, pos };
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case "eof":
      return "end of expression";
    case "number":
      return `number ${token.value}`;
    case "name":
      return `name '${token.value}'`;
    case "op":
      return `'${token.value}'`;
  }
}

/**
 * Parse expression source into a syntax tree
 *
 * @throws {ExpressionError} With kind `syntax`, `unsupported` or `unknown_function`
 */
export function parseExpression(source: string): Expr {
  const trimmed = source.trim();
  return new Parser(tokenize(trimmed), trimmed).parse();
}
