// apps/normalizer/src/expression.ts
//
// Restricted arithmetic for compute fields and computed_filter conditions.
//
//   expr    := term (("+" | "-") term)*
//   term    := unary (("*" | "/") unary)*
//   unary   := ("+" | "-") unary | primary
//   primary := NUMBER | "(" expr ")"
//
// `{name}` placeholders are substituted with the numeric value of the field
// (0 when absent or non-numeric) before tokenizing. Division by zero is 0 so
// capacity percentages never fail a whole extraction.

import { toNumber } from "./values";

export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(`Expression error in '${expression}': ${message}`);
    this.name = "ExpressionError";
  }
}

type BinaryOp = "+" | "-" | "*" | "/";

type Token =
  | { kind: "num"; value: number }
  | { kind: "op"; value: BinaryOp }
  | { kind: "lparen" }
  | { kind: "rparen" };

export type ExprNode =
  | { type: "num"; value: number }
  | { type: "unary"; op: "+" | "-"; operand: ExprNode }
  | { type: "binary"; op: BinaryOp; left: ExprNode; right: ExprNode };

const FIELD_REF_RE = /\{(\w+)\}/g;
const NUMBER_RE = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;

export function substituteFieldRefs(expression: string, context: Readonly<Record<string, unknown>>): string {
  return expression.replace(FIELD_REF_RE, (_m, name: string) => {
    const n = toNumber(Object.prototype.hasOwnProperty.call(context, name) ? context[name] : 0);
    return n === undefined ? "0" : String(n);
  });
}

function isBinaryOp(ch: string): ch is BinaryOp {
  return ch === "+" || ch === "-" || ch === "*" || ch === "/";
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (isBinaryOp(ch)) {
      tokens.push({ kind: "op", value: ch });
      i++;
      continue;
    }
    if (ch === "(") {
      tokens.push({ kind: "lparen" });
      i++;
      continue;
    }
    if (ch === ")") {
      tokens.push({ kind: "rparen" });
      i++;
      continue;
    }
    NUMBER_RE.lastIndex = i;
    const m = NUMBER_RE.exec(text);
    if (!m) throw new Error(`unexpected character '${ch}' at ${i}`);
    tokens.push({ kind: "num", value: Number(m[0]) });
    i += m[0].length;
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExprNode {
    if (!this.tokens.length) throw new Error("empty expression");
    const node = this.expr();
    if (this.pos < this.tokens.length) throw new Error(`unexpected token at position ${this.pos}`);
    return node;
  }

  private peekOp(...ops: BinaryOp[]): BinaryOp | null {
    const t = this.tokens[this.pos];
    if (t && t.kind === "op" && ops.includes(t.value)) return t.value;
    return null;
  }

  private expr(): ExprNode {
    let left = this.term();
    while (true) {
      const op = this.peekOp("+", "-");
      if (!op) return left;
      this.pos++;
      left = { type: "binary", op, left, right: this.term() };
    }
  }

  private term(): ExprNode {
    let left = this.unary();
    while (true) {
      const op = this.peekOp("*", "/");
      if (!op) return left;
      this.pos++;
      left = { type: "binary", op, left, right: this.unary() };
    }
  }

  private unary(): ExprNode {
    const op = this.peekOp("+", "-");
    if (op === "+" || op === "-") {
      this.pos++;
      return { type: "unary", op, operand: this.unary() };
    }
    return this.primary();
  }

  private primary(): ExprNode {
    const t = this.tokens[this.pos];
    if (!t) throw new Error("unexpected end of expression");
    if (t.kind === "num") {
      this.pos++;
      return { type: "num", value: t.value };
    }
    if (t.kind === "lparen") {
      this.pos++;
      const inner = this.expr();
      const close = this.tokens[this.pos];
      if (!close || close.kind !== "rparen") throw new Error("missing closing parenthesis");
      this.pos++;
      return inner;
    }
    throw new Error(`unsupported operator at position ${this.pos}`);
  }
}

export function parseExpression(text: string): ExprNode {
  return new Parser(tokenize(text)).parse();
}

function applyBinary(op: BinaryOp, left: number, right: number): number {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return right === 0 ? 0 : left / right;
  }
}

export function evaluateNode(node: ExprNode): number {
  switch (node.type) {
    case "num":
      return node.value;
    case "unary": {
      const v = evaluateNode(node.operand);
      return node.op === "-" ? -v : v;
    }
    case "binary":
      return applyBinary(node.op, evaluateNode(node.left), evaluateNode(node.right));
  }
}

export function evaluateExpression(expression: string, context: Readonly<Record<string, unknown>>): number {
  const substituted = substituteFieldRefs(expression, context);
  try {
    return evaluateNode(parseExpression(substituted));
  } catch (err) {
    throw new ExpressionError(err instanceof Error ? err.message : String(err), expression);
  }
}
