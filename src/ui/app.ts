import { clearScreenDown, cursorTo, emitKeypressEvents, moveCursor } from "readline";
import type { Key } from "readline";
import { ReadStream } from "tty";
import type {
  CalculatorAction,
  ErrorDialog,
  EvaluationResult,
  FocusPosition,
  HistoryEntry,
  KeyCommand,
  KeypadButton,
} from "../core/types.js";
import { ExpressionEngine } from "../engine/expression.js";
import { getUserMessage } from "../engine/evaluator.js";
import { KeypadRenderer } from "../cli/output/console.js";
import type { DeskcalcConfig } from "../services/config.js";
import { buildKeypad, getFocusedButton, moveFocus, resolveKeypress } from "./keypad.js";

// ============================================================================
// Types
// ============================================================================

export interface CalculatorAppOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  config: DeskcalcConfig;
}

const HIDE_CURSOR = "\x1B[?25l";
const SHOW_CURSOR = "\x1B[?25h";

// ============================================================================
// CalculatorApp
// ============================================================================

/**
 * Interactive calculator window.
 *
 * Holds the engine and only reads from it for rendering; every change to the
 * expression goes through ExpressionEngine.dispatch().
 */
export class CalculatorApp {
  private readonly engine: ExpressionEngine;
  private readonly keypad: KeypadButton[][];
  private readonly renderer: KeypadRenderer;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private focus: FocusPosition = { row: 0, col: 0 };
  private dialog: ErrorDialog | null = null;
  private previous: string | undefined;
  private finish: (() => void) | null = null;
  private renderedLines = 0;

  constructor(options: CalculatorAppOptions) {
    this.input = options.input;
    this.output = options.output;
    this.engine = new ExpressionEngine({
      precision: options.config.precision,
      errorPolicy: options.config.errorPolicy,
      historySize: options.config.historySize,
    });
    this.keypad = buildKeypad();
    this.renderer = new KeypadRenderer(this.keypad, options.config.theme);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start listening for keys. Resolves once the user quits.
   */
  run(): Promise<void> {
    return new Promise((resolve) => {
      this.finish = resolve;

      emitKeypressEvents(this.input);
      if (this.input instanceof ReadStream && this.input.isTTY) {
        this.input.setRawMode(true);
      }
      this.input.on("keypress", this.onKeypress);
      this.input.resume();

      this.output.write(HIDE_CURSOR);
      this.render();
    });
  }

  stop(): void {
    this.input.removeListener("keypress", this.onKeypress);
    if (this.input instanceof ReadStream && this.input.isTTY) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.output.write(SHOW_CURSOR);

    const finish = this.finish;
    this.finish = null;
    finish?.();
  }

  private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
    this.handleKeypress(str, key);
  };

  // ==========================================================================
  // Input
  // ==========================================================================

  handleKeypress(str: string | undefined, key: Key | undefined): void {
    const command = resolveKeypress(str, key);

    if (command?.type === "QUIT" && (!this.dialog || key?.ctrl)) {
      this.stop();
      return;
    }

    // An open dialog swallows the key that closes it
    if (this.dialog) {
      this.dialog = null;
      this.render();
      return;
    }

    if (command) {
      this.execute(command);
    }
  }

  execute(command: KeyCommand): void {
    switch (command.type) {
      case "QUIT":
        this.stop();
        return;
      case "MOVE":
        this.focus = moveFocus(this.keypad, this.focus, command.direction);
        break;
      case "PRESS_FOCUSED": {
        const button = getFocusedButton(this.keypad, this.focus);
        if (button) {
          this.apply(button.action);
        }
        break;
      }
      default:
        this.apply(command);
    }

    this.render();
  }

  private apply(action: CalculatorAction): void {
    const result = this.engine.dispatch(action);
    if (result) {
      this.showResult(result);
    }
  }

  private showResult(result: EvaluationResult): void {
    if (result.ok) {
      this.previous = `${result.expression} =`;
      return;
    }

    this.previous = undefined;
    this.dialog = { title: "Error", message: getUserMessage(result.error) };
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  renderFrame(): string[] {
    return this.renderer.render({
      display: this.engine.display,
      previous: this.previous,
      focus: this.focus,
      dialog: this.dialog,
    });
  }

  /**
   * Redraw in place over the previous frame, leaving anything printed
   * above the window (the banner) alone
   */
  private render(): void {
    const lines = this.renderFrame();

    if (this.renderedLines > 0) {
      moveCursor(this.output, 0, -this.renderedLines);
    }
    cursorTo(this.output, 0);
    clearScreenDown(this.output);
    this.output.write(lines.join("\n") + "\n");
    this.renderedLines = lines.length;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getDisplay(): string {
    return this.engine.display;
  }

  getDialog(): ErrorDialog | null {
    return this.dialog;
  }

  getFocus(): FocusPosition {
    return this.focus;
  }

  getHistory(): readonly HistoryEntry[] {
    return this.engine.getHistory();
  }
}
