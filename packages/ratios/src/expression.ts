/**
 * @ledgerlens/ratios — Measure expression language.
 *
 * Derived measures and ratios are written as arithmetic over measure
 * names:
 *
 *   net_income + depreciation_amortization
 *   (gross_margin / revenue) * 100
 *   (1 + growth) ** 2
 *
 * Grammar (lowest to highest precedence):
 *
 *   expression := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "%") unary)*
 *   unary      := "-" unary | power
 *   power      := primary ["**" unary]
 *   primary    := number | identifier | "(" expression ")"
 *
 * So "-2 ** 2" is -4 and "2 ** 3 ** 2" is 512. "%" is floored modulo:
 * the result takes the sign of the divisor. There is no unary "+".
 *
 * The text is parsed into a typed tree, never handed to eval().
 */

import type { MeasureMap } from "@ledgerlens/types";
import { ExpressionError } from "./types.js";

// =============================================================================
// Syntax Tree
// =============================================================================

export type BinaryOperator = "+" | "-" | "*" | "/" | "%" | "**";

export type ExpressionNode =
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "variable"; readonly name: string }
  | { readonly type: "negate"; readonly operand: ExpressionNode }
  | {
      readonly type: "binary";
      readonly op: BinaryOperator;
      readonly left: ExpressionNode;
      readonly right: ExpressionNode;
    };

// =============================================================================
// Tokenizer
// =============================================================================

type Token =
  | { type: "number"; value: number }
  | { type: "identifier"; name: string }
  | { type: "op"; op: BinaryOperator }
  | { type: "lparen" }
  | { type: "rparen" };

const NUMBER = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const rest = source.slice(i);

    const number = NUMBER.exec(rest);
    if (number !== null) {
      const value = Number(number[0]);
      if (!Number.isFinite(value)) {
        throw new ExpressionError("NON_FINITE", `Number out of range: ${number[0]}`);
      }
      tokens.push({ type: "number", value });
      i += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER.exec(rest);
    if (identifier !== null) {
      tokens.push({ type: "identifier", name: identifier[0] });
      i += identifier[0].length;
      continue;
    }

    if (rest.startsWith("**")) {
      tokens.push({ type: "op", op: "**" });
      i += 2;
      continue;
    }

    switch (ch) {
      case "+":
      case "-":
      case "*":
      case "/":
      case "%":
        tokens.push({ type: "op", op: ch });
        break;
      case "(":
        tokens.push({ type: "lparen" });
        break;
      case ")":
        tokens.push({ type: "rparen" });
        break;
      default:
        throw new ExpressionError(
          "SYNTAX",
          `Invalid expression syntax: unexpected "${ch}" in ${JSON.stringify(source)}`,
        );
    }
    i++;
  }

  return tokens;
}

// =============================================================================
// Parser (recursive descent)
// =============================================================================

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly source: string,
  ) {}

  parse(): ExpressionNode {
    if (this.tokens.length === 0) {
      throw this.syntaxError("empty expression");
    }
    const node = this.expression();
    if (this.pos < this.tokens.length) {
      throw this.syntaxError("unexpected trailing input");
    }
    return node;
  }

  private expression(): ExpressionNode {
    let left = this.term();
    for (;;) {
      const op = this.peekOperator("+", "-");
      if (op === undefined) return left;
      this.pos++;
      left = { type: "binary", op, left, right: this.term() };
    }
  }

  private term(): ExpressionNode {
    let left = this.unary();
    for (;;) {
      const op = this.peekOperator("*", "/", "%");
      if (op === undefined) return left;
      this.pos++;
      left = { type: "binary", op, left, right: this.unary() };
    }
  }

  private unary(): ExpressionNode {
    if (this.peekOperator("-") !== undefined) {
      this.pos++;
      return { type: "negate", operand: this.unary() };
    }
    return this.power();
  }

  private power(): ExpressionNode {
    const base = this.primary();
    if (this.peekOperator("**") === undefined) {
      return base;
    }
    this.pos++;
    return { type: "binary", op: "**", left: base, right: this.unary() };
  }

  private primary(): ExpressionNode {
    const token = this.tokens[this.pos];
    this.pos++;
    switch (token?.type) {
      case "number":
        return { type: "number", value: token.value };
      case "identifier":
        return { type: "variable", name: token.name };
      case "lparen": {
        const inner = this.expression();
        if (this.tokens[this.pos]?.type !== "rparen") {
          throw this.syntaxError("expected ')'");
        }
        this.pos++;
        return inner;
      }
      default:
        throw this.syntaxError("expected a number, a measure name or '('");
    }
  }

  private peekOperator<T extends BinaryOperator>(...ops: T[]): T | undefined {
    const token = this.tokens[this.pos];
    if (token?.type !== "op") return undefined;
    return ops.find((op) => op === token.op);
  }

  private syntaxError(detail: string): ExpressionError {
    return new ExpressionError(
      "SYNTAX",
      `Invalid expression syntax: ${JSON.stringify(this.source)} (${detail})`,
    );
  }
}

// =============================================================================
// Evaluation
// =============================================================================

function flooredModulo(left: number, right: number): number {
  const remainder = left % right;
  return remainder !== 0 && (remainder < 0) !== (right < 0) ? remainder + right : remainder;
}

function applyOperator(op: BinaryOperator, left: number, right: number): number {
  if ((op === "/" || op === "%") && right === 0) {
    throw new ExpressionError("DIVISION_BY_ZERO", `Division by zero (${String(left)} ${op} 0)`);
  }
  if (op === "**" && left === 0 && right < 0) {
    throw new ExpressionError("DIVISION_BY_ZERO", `Zero raised to a negative power (0 ** ${String(right)})`);
  }

  let result: number;
  switch (op) {
    case "+":
      result = left + right;
      break;
    case "-":
      result = left - right;
      break;
    case "*":
      result = left * right;
      break;
    case "/":
      result = left / right;
      break;
    case "%":
      result = flooredModulo(left, right);
      break;
    case "**":
      result = left ** right;
      break;
  }

  if (!Number.isFinite(result)) {
    throw new ExpressionError(
      "NON_FINITE",
      `Result of ${String(left)} ${op} ${String(right)} is not a finite number`,
    );
  }
  return result;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse expression text into a syntax tree.
 * Throws ExpressionError("SYNTAX") on anything outside the grammar.
 */
export function parseExpression(source: string): ExpressionNode {
  return new Parser(tokenize(source), source).parse();
}

/**
 * Evaluate a parsed expression with measure values as variables.
 */
export function evaluateExpressionNode(node: ExpressionNode, variables: MeasureMap): number {
  switch (node.type) {
    case "number":
      return node.value;
    case "variable": {
      const value = Object.hasOwn(variables, node.name) ? variables[node.name] : undefined;
      if (value === undefined) {
        throw new ExpressionError("UNKNOWN_VARIABLE", `Unknown variable in expression: "${node.name}"`);
      }
      return value;
    }
    case "negate":
      return -evaluateExpressionNode(node.operand, variables);
    case "binary":
      return applyOperator(
        node.op,
        evaluateExpressionNode(node.left, variables),
        evaluateExpressionNode(node.right, variables),
      );
  }
}

/**
 * Parse and evaluate expression text.
 *
 * evaluateExpression("(a - b) / a * 100", { a: 200, b: 150 }) → 25
 */
export function evaluateExpression(source: string, variables: MeasureMap): number {
  return evaluateExpressionNode(parseExpression(source), variables);
}
