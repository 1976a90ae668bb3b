// ============================================================================
// Operator Types
// ============================================================================

/**
 * Normalized binary operators understood by the evaluator
 */
export type Operator = "+" | "-" | "*" | "/" | "%";

export type UnaryOperator = "+" | "-";

// ============================================================================
// Syntax Tree Types
// ============================================================================

export interface NumberNode {
  type: "number";
  value: number;
  raw: string;
  position: number;
}

export interface UnaryNode {
  type: "unary";
  operator: UnaryOperator;
  operand: ExpressionNode;
  position: number;
}

export interface BinaryNode {
  type: "binary";
  operator: Operator;
  left: ExpressionNode;
  right: ExpressionNode;
  position: number;
}

export type ExpressionNode = NumberNode | UnaryNode | BinaryNode;

// ============================================================================
// Evaluation Types
// ============================================================================

export type CalculationErrorKind =
  | "DIVISION_BY_ZERO"
  | "INVALID_EXPRESSION"
  | "EVALUATION_ERROR";

export interface CalculationFailure {
  kind: CalculationErrorKind;
  message: string;
  position?: number;
}

export type EvaluationResult =
  | {
      ok: true;
      expression: string;
      value: number;
      display: string;
    }
  | {
      ok: false;
      expression: string;
      error: CalculationFailure;
    };

export interface HistoryEntry {
  expression: string;
  result: string;
  timestamp: Date;
}

/**
 * What happens to the expression after a failed evaluation
 */
export type ErrorPolicy = "clear" | "keep";

// ============================================================================
// Action Types
// ============================================================================

export type CalculatorAction =
  | { type: "APPEND"; token: string }
  | { type: "BACKSPACE" }
  | { type: "CLEAR" }
  | { type: "EVALUATE" };

export type Direction = "up" | "down" | "left" | "right";

/**
 * Everything a key press can mean to the interactive window
 */
export type KeyCommand =
  | CalculatorAction
  | { type: "MOVE"; direction: Direction }
  | { type: "PRESS_FOCUSED" }
  | { type: "QUIT" };

// ============================================================================
// Keypad Types
// ============================================================================

export type ButtonKind = "DIGIT" | "OPERATOR" | "ACTION" | "EQUALS";

export interface KeypadButton {
  label: string;
  kind: ButtonKind;
  action: CalculatorAction;
  span: number;
}

export interface FocusPosition {
  row: number;
  col: number;
}

export interface ErrorDialog {
  title: string;
  message: string;
}

// ============================================================================
// CLI Types
// ============================================================================

export type OutputFormat = "console" | "json";

export interface CliOptions {
  config?: string;
}

export interface EvalOptions extends CliOptions {
  format?: string;
  precision?: string;
}

export interface StartOptions extends CliOptions {
  banner?: boolean;
}

export interface InitOptions {
  force?: boolean;
}
