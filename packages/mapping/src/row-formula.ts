/**
 * @ledgerlens/mapping — Row formula language.
 *
 * Formula rows compute their value from other rows:
 *
 *   =1+2            row 1 plus row 2
 *   =SUM(4;5;6)-10  sum of rows 4, 5, 6 minus row 10
 *   =(1-2)*0.5      numbers containing "." are literals, not row ids
 *
 * The text is tokenized and parsed into a typed tree, then evaluated.
 * No eval(), no new Function().
 *
 * Rules:
 * - Integer tokens are row ids; unknown ids resolve to 0
 * - Only digits, ".", "+", "-", "*", "/", "(", ")", ",", ";", whitespace
 *   and the keyword SUM may appear; anything else is UNSAFE_FORMULA
 * - Division by zero throws
 */

import { MappingError } from "./types.js";

export const FORMULA_MARKER = "=";

// =============================================================================
// Syntax Tree
// =============================================================================

export type RowFormulaNode =
  | { readonly type: "row"; readonly id: number }
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "sum"; readonly args: readonly RowFormulaNode[] }
  | { readonly type: "negate"; readonly operand: RowFormulaNode }
  | {
      readonly type: "binary";
      readonly op: "+" | "-" | "*" | "/";
      readonly left: RowFormulaNode;
      readonly right: RowFormulaNode;
    };

// =============================================================================
// Tokenizer
// =============================================================================

type Token =
  | { type: "row"; id: number }
  | { type: "number"; value: number }
  | { type: "sum" }
  | { type: "op"; op: "+" | "-" | "*" | "/" }
  | { type: "lparen" }
  | { type: "rparen" }
  | { type: "separator"; char: ";" | "," };

const DIGIT = /[0-9.]/;
const WORD = /[A-Za-z_]/;

function tokenize(body: string, source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < body.length) {
    const ch = body.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (DIGIT.test(ch)) {
      let j = i;
      while (j < body.length && DIGIT.test(body.charAt(j))) j++;
      const text = body.slice(i, j);
      if (!text.includes(".")) {
        tokens.push({ type: "row", id: Number.parseInt(text, 10) });
      } else if (/^\d*\.\d+$|^\d+\.\d*$/.test(text)) {
        tokens.push({ type: "number", value: Number(text) });
      } else {
        throw new MappingError("FORMULA_SYNTAX", `Invalid number "${text}" in formula: ${source}`);
      }
      i = j;
      continue;
    }

    if (WORD.test(ch)) {
      let j = i;
      while (j < body.length && WORD.test(body.charAt(j))) j++;
      const word = body.slice(i, j);
      if (word !== "SUM") {
        throw new MappingError("UNSAFE_FORMULA", `Invalid characters in formula: ${source}`);
      }
      tokens.push({ type: "sum" });
      i = j;
      continue;
    }

    switch (ch) {
      case "+":
      case "-":
      case "*":
      case "/":
        tokens.push({ type: "op", op: ch });
        break;
      case "(":
        tokens.push({ type: "lparen" });
        break;
      case ")":
        tokens.push({ type: "rparen" });
        break;
      case ";":
      case ",":
        tokens.push({ type: "separator", char: ch });
        break;
      default:
        throw new MappingError("UNSAFE_FORMULA", `Invalid characters in formula: ${source}`);
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

  parse(): RowFormulaNode {
    if (this.tokens.length === 0) {
      throw this.syntaxError("empty expression");
    }
    const node = this.expression();
    if (this.pos < this.tokens.length) {
      throw this.syntaxError("unexpected trailing input");
    }
    return node;
  }

  // expression := term (("+" | "-") term)*
  private expression(): RowFormulaNode {
    let left = this.term();
    for (;;) {
      const token = this.peek();
      if (token?.type !== "op" || (token.op !== "+" && token.op !== "-")) {
        return left;
      }
      this.pos++;
      left = { type: "binary", op: token.op, left, right: this.term() };
    }
  }

  // term := unary (("*" | "/") unary)*
  private term(): RowFormulaNode {
    let left = this.unary();
    for (;;) {
      const token = this.peek();
      if (token?.type !== "op" || (token.op !== "*" && token.op !== "/")) {
        return left;
      }
      this.pos++;
      left = { type: "binary", op: token.op, left, right: this.unary() };
    }
  }

  // unary := ("+" | "-") unary | primary
  private unary(): RowFormulaNode {
    const token = this.peek();
    if (token?.type === "op" && token.op === "-") {
      this.pos++;
      return { type: "negate", operand: this.unary() };
    }
    if (token?.type === "op" && token.op === "+") {
      this.pos++;
      return this.unary();
    }
    return this.primary();
  }

  // primary := row | number | SUM "(" args ")" | "(" expression ")"
  private primary(): RowFormulaNode {
    const token = this.next();
    switch (token?.type) {
      case "row":
        return { type: "row", id: token.id };
      case "number":
        return { type: "number", value: token.value };
      case "sum":
        return this.sumCall();
      case "lparen": {
        const inner = this.expression();
        this.expect("rparen");
        return inner;
      }
      default:
        throw this.syntaxError("expected a row id, a number, SUM or '('");
    }
  }

  // args := [arg] (";" [arg])*   with arg := ["+" | "-"] (row | number)
  private sumCall(): RowFormulaNode {
    this.expect("lparen");
    const args: RowFormulaNode[] = [];

    for (;;) {
      const token = this.peek();
      if (token?.type === "rparen") {
        this.pos++;
        return { type: "sum", args };
      }
      if (token?.type === "separator" && token.char === ";") {
        this.pos++;
        continue;
      }
      args.push(this.sumArgument());
      const after = this.peek();
      if (after?.type !== "rparen" && !(after?.type === "separator" && after.char === ";")) {
        throw this.syntaxError("SUM arguments must be separated by ';'");
      }
    }
  }

  private sumArgument(): RowFormulaNode {
    let negative = false;
    const sign = this.peek();
    if (sign?.type === "op" && (sign.op === "-" || sign.op === "+")) {
      negative = sign.op === "-";
      this.pos++;
    }
    const token = this.next();
    let node: RowFormulaNode;
    if (token?.type === "row") {
      node = { type: "row", id: token.id };
    } else if (token?.type === "number") {
      node = { type: "number", value: token.value };
    } else {
      throw this.syntaxError("SUM arguments must be row ids or numbers");
    }
    return negative ? { type: "negate", operand: node } : node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.pos];
    this.pos++;
    return token;
  }

  private expect(type: "lparen" | "rparen"): void {
    const token = this.next();
    if (token?.type !== type) {
      throw this.syntaxError(`expected '${type === "lparen" ? "(" : ")"}'`);
    }
  }

  private syntaxError(detail: string): MappingError {
    return new MappingError("FORMULA_SYNTAX", `Invalid formula ${this.source}: ${detail}`);
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Whether the text is a formula at all.
 * Text not starting with "=" evaluates to zero.
 */
export function isFormula(text: string): boolean {
  return text.trim().startsWith(FORMULA_MARKER);
}

/**
 * Parse formula text (with its leading "=") into a syntax tree.
 * Throws MappingError on unsafe characters or malformed structure.
 */
export function parseRowFormula(text: string): RowFormulaNode {
  const trimmed = text.trim();
  if (!trimmed.startsWith(FORMULA_MARKER)) {
    throw new MappingError("FORMULA_SYNTAX", `Formula must start with "${FORMULA_MARKER}": ${text}`);
  }
  const body = trimmed.slice(FORMULA_MARKER.length);
  return new Parser(tokenize(body, text), text).parse();
}

/**
 * Evaluate a parsed formula against known row values.
 * Unknown row ids contribute 0.
 */
export function evaluateRowFormulaNode(
  node: RowFormulaNode,
  values: ReadonlyMap<number, number>,
): number {
  switch (node.type) {
    case "row":
      return values.get(node.id) ?? 0;
    case "number":
      return node.value;
    case "sum":
      return node.args.reduce((acc, arg) => acc + evaluateRowFormulaNode(arg, values), 0);
    case "negate":
      return -evaluateRowFormulaNode(node.operand, values);
    case "binary": {
      const left = evaluateRowFormulaNode(node.left, values);
      const right = evaluateRowFormulaNode(node.right, values);
      switch (node.op) {
        case "+":
          return left + right;
        case "-":
          return left - right;
        case "*":
          return left * right;
        case "/":
          if (right === 0) {
            throw new MappingError("DIVISION_BY_ZERO", "Division by zero in row formula");
          }
          return left / right;
      }
    }
  }
}

/**
 * Evaluate formula text against known row values.
 *
 * Text not starting with "=" (including empty text) evaluates to 0.
 */
export function evaluateRowFormula(
  text: string,
  values: ReadonlyMap<number, number>,
): number {
  if (!isFormula(text)) {
    return 0;
  }
  return evaluateRowFormulaNode(parseRowFormula(text), values);
}

/**
 * Collect every row id referenced by a formula, in reading order.
 */
export function rowReferences(node: RowFormulaNode): readonly number[] {
  switch (node.type) {
    case "row":
      return [node.id];
    case "number":
      return [];
    case "sum":
      return node.args.flatMap(rowReferences);
    case "negate":
      return rowReferences(node.operand);
    case "binary":
      return [...rowReferences(node.left), ...rowReferences(node.right)];
  }
}
