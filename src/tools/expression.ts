/**
 * Arithmetic expression evaluator: a tokenizer plus a recursive-descent
 * parser over a fixed grammar. Only the whitelisted functions and constants
 * below can be referenced; nothing is ever executed as code.
 *
 *   expr    := term (("+" | "-") term)*
 *   term    := unary (("*" | "/" | "%") unary)*
 *   unary   := ("+" | "-") unary | power
 *   power   := primary (("^" | "**") unary)?      right-associative
 *   primary := number | name | name "(" args? ")" | "(" expr ")"
 *   args    := expr ("," expr)*
 */

type Token =
  | { kind: "num"; value: number; pos: number }
  | { kind: "name"; value: string; pos: number }
  | { kind: "op"; value: string; pos: number }
  | { kind: "end"; pos: number };

interface MathFunction {
  /** Accepted argument counts: exact, or [min, max] (max Infinity = variadic). */
  arity: number | [number, number];
  fn: (...args: number[]) => number;
}

const FUNCTIONS: Readonly<Record<string, MathFunction>> = {
  sqrt: { arity: 1, fn: Math.sqrt },
  cbrt: { arity: 1, fn: Math.cbrt },
  abs: { arity: 1, fn: Math.abs },
  round: { arity: [1, 2], fn: roundTo },
  floor: { arity: 1, fn: Math.floor },
  ceil: { arity: 1, fn: Math.ceil },
  exp: { arity: 1, fn: Math.exp },
  log: { arity: [1, 2], fn: (x: number, base?: number) => (base === undefined ? Math.log(x) : Math.log(x) / Math.log(base)) },
  log10: { arity: 1, fn: Math.log10 },
  log2: { arity: 1, fn: Math.log2 },
  sin: { arity: 1, fn: Math.sin },
  cos: { arity: 1, fn: Math.cos },
  tan: { arity: 1, fn: Math.tan },
  asin: { arity: 1, fn: Math.asin },
  acos: { arity: 1, fn: Math.acos },
  atan: { arity: 1, fn: Math.atan },
  sinh: { arity: 1, fn: Math.sinh },
  cosh: { arity: 1, fn: Math.cosh },
  tanh: { arity: 1, fn: Math.tanh },
  min: { arity: [1, Infinity], fn: Math.min },
  max: { arity: [1, Infinity], fn: Math.max },
  pow: { arity: 2, fn: Math.pow },
  hypot: { arity: [1, Infinity], fn: Math.hypot },
};

const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
  tau: 2 * Math.PI,
};

function roundTo(x: number, digits?: number): number {
  if (digits === undefined) return Math.round(x);
  if (!Number.isInteger(digits)) throw new ExpressionError("round() digits must be an integer");
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

/** Raised for any lexical, syntactic or domain error in an expression. */
export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExpressionError";
  }
}

/** Names callable from an expression, sorted. */
export function allowedFunctions(): string[] {
  return Object.keys(FUNCTIONS).sort();
}

/** Named constants usable in an expression, sorted. */
export function allowedConstants(): string[] {
  return Object.keys(CONSTANTS).sort();
}

const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*/;

export function tokenize(src: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const rest = src.slice(i);
    const num = NUMBER_RE.exec(rest);
    if (num) {
      tokens.push({ kind: "num", value: Number(num[0]), pos: i });
      i += num[0].length;
      continue;
    }
    const name = NAME_RE.exec(rest);
    if (name) {
      tokens.push({ kind: "name", value: name[0], pos: i });
      i += name[0].length;
      continue;
    }
    if (rest.startsWith("**")) {
      tokens.push({ kind: "op", value: "**", pos: i });
      i += 2;
      continue;
    }
    if ("+-*/%^(),".includes(ch)) {
      tokens.push({ kind: "op", value: ch, pos: i });
      i++;
      continue;
    }
    throw new ExpressionError(`Unexpected character '${ch}' at position ${i}`);
  }
  tokens.push({ kind: "end", pos: src.length });
  return tokens;
}

class Parser {
  private pos = 0;

  public constructor(private readonly tokens: Token[]) {}

  public parse(): number {
    const value = this.expr();
    const t = this.peek();
    if (t.kind !== "end") throw new ExpressionError(`Unexpected ${describe(t)} at position ${t.pos}`);
    return value;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const t = this.tokens[this.pos];
    if (t.kind !== "end") this.pos++;
    return t;
  }

  private isOp(...ops: string[]): boolean {
    const t = this.peek();
    return t.kind === "op" && ops.includes(t.value);
  }

  private expect(op: string): void {
    const t = this.next();
    if (t.kind !== "op" || t.value !== op) {
      throw new ExpressionError(`Expected '${op}' but found ${describe(t)} at position ${t.pos}`);
    }
  }

  private expr(): number {
    let left = this.term();
    while (this.isOp("+", "-")) {
      const op = this.next();
      const right = this.term();
      left = op.kind === "op" && op.value === "+" ? left + right : left - right;
    }
    return left;
  }

  private term(): number {
    let left = this.unary();
    while (this.isOp("*", "/", "%")) {
      const op = this.next();
      const right = this.unary();
      if (op.kind !== "op") break;
      if ((op.value === "/" || op.value === "%") && right === 0) {
        throw new ExpressionError(op.value === "/" ? "division by zero" : "modulo by zero");
      }
      if (op.value === "*") left *= right;
      else if (op.value === "/") left /= right;
      // Floored modulo: the result takes the sign of the divisor.
      else left = left - right * Math.floor(left / right);
    }
    return left;
  }

  private unary(): number {
    if (this.isOp("+", "-")) {
      const op = this.next();
      const v = this.unary();
      return op.kind === "op" && op.value === "-" ? -v : v;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.isOp("^", "**")) {
      this.next();
      const exponent = this.unary();
      return base ** exponent;
    }
    return base;
  }

  private primary(): number {
    const t = this.next();
    if (t.kind === "num") return t.value;
    if (t.kind === "name") {
      if (this.isOp("(")) return this.call(t.value, t.pos);
      if (Object.hasOwn(CONSTANTS, t.value)) return CONSTANTS[t.value];
      throw new ExpressionError(`Unknown identifier '${t.value}'`);
    }
    if (t.kind === "op" && t.value === "(") {
      const v = this.expr();
      this.expect(")");
      return v;
    }
    throw new ExpressionError(`Unexpected ${describe(t)} at position ${t.pos}`);
  }

  private call(name: string, pos: number): number {
    if (!Object.hasOwn(FUNCTIONS, name)) {
      throw new ExpressionError(`Unknown function '${name}' at position ${pos}`);
    }
    const { arity, fn } = FUNCTIONS[name];
    this.expect("(");
    const args: number[] = [];
    if (!this.isOp(")")) {
      args.push(this.expr());
      while (this.isOp(",")) {
        this.next();
        args.push(this.expr());
      }
    }
    this.expect(")");
    const [min, max] = typeof arity === "number" ? [arity, arity] : arity;
    if (args.length < min || args.length > max) {
      const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min}-${max}`;
      throw new ExpressionError(`${name}() takes ${expected} argument(s), got ${args.length}`);
    }
    return fn(...args);
  }
}

function describe(t: Token): string {
  switch (t.kind) {
    case "end":
      return "end of expression";
    case "num":
      return `number ${t.value}`;
    case "name":
      return `'${t.value}'`;
    case "op":
      return `'${t.value}'`;
  }
}

/**
 * Evaluate an arithmetic expression.
 *
 * @throws {ExpressionError} On syntax errors, unknown names, division by zero,
 *   or a result that is not a finite number (math domain / overflow).
 */
export function evaluate(expression: string): number {
  const value = new Parser(tokenize(expression)).parse();
  if (Number.isNaN(value)) throw new ExpressionError("math domain error");
  if (!Number.isFinite(value)) throw new ExpressionError("result is not a finite number");
  return value;
}
