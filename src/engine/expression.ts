import type {
  CalculatorAction,
  ErrorPolicy,
  EvaluationResult,
  HistoryEntry,
} from "../core/types.js";
import { CalculationError, calculate } from "./evaluator.js";
import { DEFAULT_PRECISION, formatResult } from "./format.js";

// ============================================================================
// Types
// ============================================================================

export interface ExpressionEngineOptions {
  precision?: number;
  errorPolicy?: ErrorPolicy;
  historySize?: number;
}

export const DEFAULT_HISTORY_SIZE = 50;

// ============================================================================
// ExpressionEngine
// ============================================================================

/**
 * Owns the expression being typed and turns it into results.
 *
 * Input is never validated on append; a malformed expression only
 * surfaces as a failed EvaluationResult when evaluated.
 */
export class ExpressionEngine {
  private expression = "";
  private history: HistoryEntry[] = [];
  private readonly precision: number;
  private readonly errorPolicy: ErrorPolicy;
  private readonly historySize: number;

  constructor(options?: ExpressionEngineOptions) {
    this.precision = options?.precision ?? DEFAULT_PRECISION;
    this.errorPolicy = options?.errorPolicy ?? "clear";
    this.historySize = options?.historySize ?? DEFAULT_HISTORY_SIZE;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get value(): string {
    return this.expression;
  }

  /**
   * Text for the display: the expression, or "0" when empty
   */
  get display(): string {
    return this.expression === "" ? "0" : this.expression;
  }

  get isEmpty(): boolean {
    return this.expression === "";
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  append(token: string): void {
    this.expression += token;
  }

  backspace(): void {
    this.expression = this.expression.slice(0, -1);
  }

  clear(): void {
    this.expression = "";
  }

  // ==========================================================================
  // Evaluation
  // ==========================================================================

  evaluate(): EvaluationResult {
    const expression = this.expression;

    try {
      const value = calculate(expression);
      const display = formatResult(value, this.precision);

      this.expression = display;
      this.record(expression, display);

      return { ok: true, expression, value, display };
    } catch (error) {
      if (this.errorPolicy === "clear") {
        this.expression = "";
      }

      const failure =
        error instanceof CalculationError
          ? error.toFailure()
          : {
              kind: "EVALUATION_ERROR" as const,
              message: error instanceof Error ? error.message : String(error),
            };

      return { ok: false, expression, error: failure };
    }
  }

  dispatch(action: CalculatorAction): EvaluationResult | null {
    switch (action.type) {
      case "APPEND":
        this.append(action.token);
        return null;
      case "BACKSPACE":
        this.backspace();
        return null;
      case "CLEAR":
        this.clear();
        return null;
      case "EVALUATE":
        return this.evaluate();
    }
  }

  // ==========================================================================
  // History
  // ==========================================================================

  getHistory(): readonly HistoryEntry[] {
    return this.history;
  }

  clearHistory(): void {
    this.history = [];
  }

  private record(expression: string, result: string): void {
    if (this.historySize <= 0) {
      return;
    }

    this.history.push({ expression, result, timestamp: new Date() });

    if (this.history.length > this.historySize) {
      this.history = this.history.slice(this.history.length - this.historySize);
    }
  }
}

export function createExpressionEngine(options?: ExpressionEngineOptions): ExpressionEngine {
  return new ExpressionEngine(options);
}
