import type { Key } from "readline";
import type {
  ButtonKind,
  CalculatorAction,
  Direction,
  FocusPosition,
  KeyCommand,
  KeypadButton,
} from "../core/types.js";

// ============================================================================
// Layout
// ============================================================================

export const KEYPAD_LAYOUT: readonly (readonly string[])[] = [
  ["C", "←", "%", "÷"],
  ["7", "8", "9", "×"],
  ["4", "5", "6", "−"],
  ["1", "2", "3", "+"],
  ["0", ".", "="],
];

export const KEYPAD_COLUMNS = 4;

const OPERATOR_LABELS = new Set(["÷", "×", "−", "+", "%"]);

export function getButtonKind(label: string): ButtonKind {
  if (label === "C" || label === "←") return "ACTION";
  if (label === "=") return "EQUALS";
  if (OPERATOR_LABELS.has(label)) return "OPERATOR";
  return "DIGIT";
}

export function getButtonAction(label: string): CalculatorAction {
  switch (label) {
    case "C":
      return { type: "CLEAR" };
    case "←":
      return { type: "BACKSPACE" };
    case "=":
      return { type: "EVALUATE" };
    default:
      return { type: "APPEND", token: label };
  }
}

/**
 * Build the button grid. "=" fills the rest of the last row.
 */
export function buildKeypad(layout: readonly (readonly string[])[] = KEYPAD_LAYOUT): KeypadButton[][] {
  return layout.map((row) =>
    row.map((label, index) => ({
      label,
      kind: getButtonKind(label),
      action: getButtonAction(label),
      span: label === "=" && index === row.length - 1 ? KEYPAD_COLUMNS - index : 1,
    }))
  );
}

// ============================================================================
// Focus
// ============================================================================

export function moveFocus(
  keypad: KeypadButton[][],
  focus: FocusPosition,
  direction: Direction
): FocusPosition {
  const lastRow = keypad.length - 1;
  let { row, col } = focus;

  switch (direction) {
    case "up":
      row = Math.max(0, row - 1);
      break;
    case "down":
      row = Math.min(lastRow, row + 1);
      break;
    case "left":
      col = Math.max(0, col - 1);
      break;
    case "right":
      col = col + 1;
      break;
  }

  // Rows are ragged: the last row has fewer, wider buttons
  col = Math.min(col, keypad[row].length - 1);
  return { row, col };
}

export function getFocusedButton(
  keypad: KeypadButton[][],
  focus: FocusPosition
): KeypadButton | undefined {
  return keypad[focus.row]?.[focus.col];
}

// ============================================================================
// Key Mapping
// ============================================================================

const KEY_TOKENS = new Map<string, string>([
  ["+", "+"],
  ["-", "−"],
  ["−", "−"],
  ["*", "×"],
  ["x", "×"],
  ["×", "×"],
  ["/", "÷"],
  ["÷", "÷"],
  ["%", "%"],
  [".", "."],
  [",", "."],
]);

const ARROWS = new Map<string, Direction>([
  ["up", "up"],
  ["down", "down"],
  ["left", "left"],
  ["right", "right"],
]);

/**
 * Translate a readline keypress into a command, or null when the key
 * means nothing to the calculator
 */
export function resolveKeypress(str: string | undefined, key: Key | undefined): KeyCommand | null {
  if (key?.ctrl && key.name === "c") {
    return { type: "QUIT" };
  }

  if (key?.ctrl || key?.meta) {
    return null;
  }

  switch (key?.name) {
    case "return":
    case "enter":
      return { type: "EVALUATE" };
    case "backspace":
      return { type: "BACKSPACE" };
    case "escape":
    case "delete":
      return { type: "CLEAR" };
    case "space":
      return { type: "PRESS_FOCUSED" };
  }

  const direction = key?.name ? ARROWS.get(key.name) : undefined;
  if (direction) {
    return { type: "MOVE", direction };
  }

  if (str === undefined || str.length !== 1) {
    return null;
  }

  if (/^[0-9]$/.test(str)) {
    return { type: "APPEND", token: str };
  }

  const token = KEY_TOKENS.get(str);
  if (token) {
    return { type: "APPEND", token };
  }

  switch (str) {
    case "=":
      return { type: "EVALUATE" };
    case "c":
    case "C":
      return { type: "CLEAR" };
    case "q":
    case "Q":
      return { type: "QUIT" };
    default:
      return null;
  }
}
