import type {
  BinaryNode,
  CalculationErrorKind,
  CalculationFailure,
  ExpressionNode,
  Operator,
} from "../core/types.js";

// ============================================================================
// Errors
// ============================================================================

export class CalculationError extends Error {
  constructor(
    message: string,
    public readonly kind: CalculationErrorKind,
    public readonly position?: number
  ) {
    super(message);
    this.name = "CalculationError";
  }

  toFailure(): CalculationFailure {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.position !== undefined ? { position: this.position } : {}),
    };
  }
}

/**
 * Message shown to the user for a failed evaluation
 */
export function getUserMessage(failure: CalculationFailure): string {
  switch (failure.kind) {
    case "DIVISION_BY_ZERO":
      return "Cannot divide by zero!";
    case "INVALID_EXPRESSION":
      return "Invalid expression! Please check your input.";
    case "EVALUATION_ERROR":
      return `An error occurred: ${failure.message}`;
  }
}

// ============================================================================
// Tokenizer
// ============================================================================

export type Lexeme =
  | { kind: "number"; raw: string; position: number }
  | { kind: "operator"; operator: Operator; symbol: string; position: number };

const OPERATORS = new Map<string, Operator>([
  ["+", "+"],
  ["-", "-"],
  ["−", "-"],
  ["*", "*"],
  ["×", "*"],
  ["/", "/"],
  ["÷", "/"],
  ["%", "%"],
]);

const NUMBER_CHAR = /[0-9.]/;
const WHITESPACE = /\s/;

export function tokenize(expression: string): Lexeme[] {
  const lexemes: Lexeme[] = [];
  let pos = 0;

  while (pos < expression.length) {
    const char = expression[pos];

    if (WHITESPACE.test(char)) {
      pos++;
      continue;
    }

    const operator = OPERATORS.get(char);
    if (operator) {
      lexemes.push({ kind: "operator", operator, symbol: char, position: pos });
      pos++;
      continue;
    }

    if (NUMBER_CHAR.test(char)) {
      const start = pos;
      while (pos < expression.length && NUMBER_CHAR.test(expression[pos])) {
        pos++;
      }
      const raw = expression.slice(start, pos);
      validateNumber(raw, start);
      lexemes.push({ kind: "number", raw, position: start });
      continue;
    }

    throw new CalculationError(
      `Unexpected character "${char}" at position ${pos}`,
      "INVALID_EXPRESSION",
      pos
    );
  }

  return lexemes;
}

function validateNumber(raw: string, position: number): void {
  const dots = raw.split(".").length - 1;
  if (dots > 1 || raw === ".") {
    throw new CalculationError(
      `Malformed number "${raw}" at position ${position}`,
      "INVALID_EXPRESSION",
      position
    );
  }
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Recursive-descent parser over two precedence levels:
 *
 *   additive       := multiplicative (("+" | "-") multiplicative)*
 *   multiplicative := unary (("*" | "/" | "%") unary)*
 *   unary          := ("+" | "-") unary | number
 */
class Parser {
  private index = 0;

  constructor(
    private readonly lexemes: Lexeme[],
    private readonly length: number
  ) {}

  parse(): ExpressionNode {
    if (this.lexemes.length === 0) {
      throw new CalculationError("Expression is empty", "INVALID_EXPRESSION", 0);
    }

    const node = this.parseAdditive();
    const extra = this.peek();
    if (extra) {
      throw this.unexpected(extra);
    }

    return node;
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();

    for (;;) {
      const next = this.peek();
      if (next?.kind !== "operator" || (next.operator !== "+" && next.operator !== "-")) {
        return left;
      }
      this.index++;
      const right = this.parseMultiplicative();
      left = binary(next.operator, left, right, next.position);
    }
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();

    for (;;) {
      const next = this.peek();
      if (next?.kind !== "operator" || next.operator === "+" || next.operator === "-") {
        return left;
      }
      this.index++;
      const right = this.parseUnary();
      left = binary(next.operator, left, right, next.position);
    }
  }

  private parseUnary(): ExpressionNode {
    const next = this.peek();

    if (!next) {
      throw new CalculationError(
        "Unexpected end of expression",
        "INVALID_EXPRESSION",
        this.length
      );
    }

    if (next.kind === "number") {
      this.index++;
      return { type: "number", value: Number(next.raw), raw: next.raw, position: next.position };
    }

    if (next.operator === "+" || next.operator === "-") {
      this.index++;
      const operand = this.parseUnary();
      return { type: "unary", operator: next.operator, operand, position: next.position };
    }

    throw this.unexpected(next);
  }

  private peek(): Lexeme | undefined {
    return this.lexemes[this.index];
  }

  private unexpected(lexeme: Lexeme): CalculationError {
    const text = lexeme.kind === "number" ? lexeme.raw : lexeme.symbol;
    return new CalculationError(
      `Unexpected "${text}" at position ${lexeme.position}`,
      "INVALID_EXPRESSION",
      lexeme.position
    );
  }
}

function binary(
  operator: Operator,
  left: ExpressionNode,
  right: ExpressionNode,
  position: number
): BinaryNode {
  return { type: "binary", operator, left, right, position };
}

export function parse(expression: string): ExpressionNode {
  return new Parser(tokenize(expression), expression.length).parse();
}

// ============================================================================
// Evaluation
// ============================================================================

export function evaluateNode(node: ExpressionNode): number {
  switch (node.type) {
    case "number":
      if (!Number.isFinite(node.value)) {
        throw new CalculationError(
          `Number ${node.raw.slice(0, 12)}... is too large`,
          "EVALUATION_ERROR",
          node.position
        );
      }
      return node.value;
    case "unary": {
      const operand = evaluateNode(node.operand);
      return node.operator === "-" ? -operand : operand;
    }
    case "binary": {
      const left = evaluateNode(node.left);
      const right = evaluateNode(node.right);
      const result = applyOperator(node.operator, left, right, node.position);
      if (!Number.isFinite(result)) {
        throw new CalculationError(
          "Numerical result out of range",
          "EVALUATION_ERROR",
          node.position
        );
      }
      return result;
    }
  }
}

function applyOperator(operator: Operator, left: number, right: number, position: number): number {
  switch (operator) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      if (right === 0) {
        throw new CalculationError("Division by zero", "DIVISION_BY_ZERO", position);
      }
      return left / right;
    case "%":
      if (right === 0) {
        throw new CalculationError("Modulo by zero", "DIVISION_BY_ZERO", position);
      }
      return floorMod(left, right);
  }
}

/**
 * Remainder carrying the sign of the divisor: -7 % 3 = 2, 7 % -3 = -2
 */
export function floorMod(left: number, right: number): number {
  const remainder = left % right;
  if (remainder !== 0 && (remainder < 0) !== (right < 0)) {
    return remainder + right;
  }
  return remainder;
}

/**
 * Parse and compute an expression. Throws CalculationError.
 */
export function calculate(expression: string): number {
  return evaluateNode(parse(expression));
}
