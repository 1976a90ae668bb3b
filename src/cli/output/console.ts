import chalk from "chalk";
import type { ButtonKind, ErrorDialog, FocusPosition, KeypadButton } from "../../core/types.js";
import { ConfigError } from "../../services/config.js";
import type { ThemeConfig } from "../../services/config.js";

type ChalkFn = typeof chalk.red;

// ============================================================================
// Constants
// ============================================================================

const BOX = {
  TOP_LEFT: "┌",
  TOP_RIGHT: "┐",
  BOTTOM_LEFT: "└",
  BOTTOM_RIGHT: "┘",
  HORIZONTAL: "─",
  VERTICAL: "│",
  T_RIGHT: "├",
  T_LEFT: "┤",
};

const EMOJI = {
  CROSS: "❌",
  WARNING: "⚠️",
  ABACUS: "🧮",
};

export const CELL_WIDTH = 7;
const CELL_GAP = 1;

// ============================================================================
// Types
// ============================================================================

export interface FrameState {
  display: string;
  previous?: string;
  focus: FocusPosition;
  dialog: ErrorDialog | null;
}

// ============================================================================
// KeypadRenderer
// ============================================================================

/**
 * Renders the calculator window (display, button grid and error dialog)
 * as lines of text
 */
export class KeypadRenderer {
  private readonly innerWidth: number;
  private readonly boxWidth: number;

  constructor(
    private readonly keypad: KeypadButton[][],
    private readonly theme: ThemeConfig
  ) {
    const columns = Math.max(...keypad.map((row) => row.reduce((sum, b) => sum + b.span, 0)));
    this.innerWidth = columns * CELL_WIDTH + (columns - 1) * CELL_GAP;
    this.boxWidth = this.innerWidth + 4;
  }

  get width(): number {
    return this.boxWidth;
  }

  render(state: FrameState): string[] {
    const lines: string[] = [];

    lines.push(this.boxLine("top"));
    lines.push(this.boxContent(chalk.gray(this.alignRight(state.previous ?? ""))));
    lines.push(this.boxContent(this.renderDisplay(state.display)));
    lines.push(this.boxLine("separator"));

    this.keypad.forEach((row, rowIndex) => {
      const cells = row.map((button, colIndex) =>
        this.renderButton(button, rowIndex === state.focus.row && colIndex === state.focus.col)
      );
      lines.push(this.boxContent(cells.join(" ".repeat(CELL_GAP))));
    });

    lines.push(this.boxLine("bottom"));

    if (state.dialog) {
      lines.push(...this.renderDialog(state.dialog));
    } else {
      lines.push(chalk.gray("arrows move · space press · = evaluate · q quit"));
    }

    return lines;
  }

  // ==========================================================================
  // Display
  // ==========================================================================

  private renderDisplay(text: string): string {
    const style = chalk.bgHex(this.theme.display).hex(this.theme.background).bold;
    return style(this.alignRight(this.truncateLeft(text)));
  }

  /**
   * Keep the end of an expression that no longer fits, as typing happens there
   */
  private truncateLeft(text: string): string {
    if (text.length <= this.innerWidth) {
      return text;
    }
    return "…" + text.slice(text.length - (this.innerWidth - 1));
  }

  private alignRight(text: string): string {
    return text.padStart(this.innerWidth);
  }

  // ==========================================================================
  // Buttons
  // ==========================================================================

  private renderButton(button: KeypadButton, focused: boolean): string {
    const width = button.span * CELL_WIDTH + (button.span - 1) * CELL_GAP;
    const text = centre(focused ? `[${button.label}]` : button.label, width);
    const style = focused
      ? chalk.bgHex(this.theme.focus).white.bold
      : this.getButtonStyle(button.kind);
    return style(text);
  }

  private getButtonStyle(kind: ButtonKind): ChalkFn {
    switch (kind) {
      case "DIGIT":
        return chalk.bgHex(this.theme.button).hex(this.theme.display).bold;
      case "OPERATOR":
      case "ACTION":
        return chalk.bgHex(this.theme.operator).white.bold;
      case "EQUALS":
        return chalk.bgHex(this.theme.equals).white.bold;
    }
  }

  // ==========================================================================
  // Dialog
  // ==========================================================================

  private renderDialog(dialog: ErrorDialog): string[] {
    const lines: string[] = [];

    lines.push(this.boxLine("top"));
    lines.push(this.boxContent(chalk.red.bold(dialog.title)));
    lines.push(this.boxLine("separator"));
    for (const line of wrapText(dialog.message, this.innerWidth)) {
      lines.push(this.boxContent(line));
    }
    lines.push(this.boxContent(""));
    lines.push(this.boxContent(chalk.gray("Press any key to continue")));
    lines.push(this.boxLine("bottom"));

    return lines;
  }

  // ==========================================================================
  // Box Drawing Helpers
  // ==========================================================================

  private boxLine(type: "top" | "bottom" | "separator"): string {
    const horizontal = BOX.HORIZONTAL.repeat(this.boxWidth - 2);

    switch (type) {
      case "top":
        return chalk.gray(BOX.TOP_LEFT + horizontal + BOX.TOP_RIGHT);
      case "bottom":
        return chalk.gray(BOX.BOTTOM_LEFT + horizontal + BOX.BOTTOM_RIGHT);
      case "separator":
        return chalk.gray(BOX.T_RIGHT + horizontal + BOX.T_LEFT);
    }
  }

  private boxContent(content: string): string {
    const padding = Math.max(0, this.innerWidth - getVisibleWidth(content));
    return chalk.gray(BOX.VERTICAL) + " " + content + " ".repeat(padding) + " " + chalk.gray(BOX.VERTICAL);
  }
}

// ============================================================================
// Text Helpers
// ============================================================================

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

/**
 * Visible width of a string, counting emoji as two columns
 */
export function getVisibleWidth(str: string): number {
  const stripped = stripAnsi(str);
  let width = 0;
  for (const char of stripped) {
    const code = char.codePointAt(0) ?? 0;
    if (
      (code >= 0x1f300 && code <= 0x1faff) ||
      (code >= 0x2600 && code <= 0x26ff) ||
      (code >= 0x2700 && code <= 0x27bf)
    ) {
      width += 2;
    } else {
      width += 1;
    }
  }
  return width;
}

export function centre(text: string, width: number): string {
  const space = Math.max(0, width - text.length);
  const left = Math.floor(space / 2);
  return " ".repeat(left) + text + " ".repeat(space - left);
}

/**
 * Word-wrap to a column width; words longer than a line are split
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    let rest = word;
    while (rest.length > width) {
      if (current) {
        lines.push(current);
        current = "";
      }
      lines.push(rest.slice(0, width));
      rest = rest.slice(width);
    }

    if (!current) {
      current = rest;
    } else if (current.length + 1 + rest.length <= width) {
      current += " " + rest;
    } else {
      lines.push(current);
      current = rest;
    }
  }

  if (current) {
    lines.push(current);
  }

  return lines;
}

// ============================================================================
// Standalone Helper Functions
// ============================================================================

/**
 * Print an error message
 */
export function printError(message: string): void {
  console.error(chalk.red(`${EMOJI.CROSS} ${message}`));
}

/**
 * Print a warning message
 */
export function printWarning(message: string): void {
  console.error(chalk.yellow(`${EMOJI.WARNING} ${message}`));
}

export function printResult(expression: string, result: string): void {
  console.log(`${chalk.gray(`${EMOJI.ABACUS} ${expression} =`)} ${chalk.green.bold(result)}`);
}

/**
 * Print an error raised before a calculation could start, with any
 * configuration issues listed beneath it
 */
export function printSetupError(error: unknown): void {
  if (error instanceof ConfigError) {
    printError(error.message);
    for (const issue of error.issues) {
      printError(`  ${issue}`);
    }
    return;
  }
  printError(error instanceof Error ? error.message : String(error));
}
