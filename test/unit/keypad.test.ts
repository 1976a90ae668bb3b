import { describe, it, expect } from "vitest";
import {
  buildKeypad,
  getButtonAction,
  getButtonKind,
  getFocusedButton,
  moveFocus,
  resolveKeypress,
} from "../../src/ui/keypad.js";

describe("Keypad", () => {
  const keypad = buildKeypad();

  describe("buildKeypad", () => {
    it("should lay out the buttons in five rows", () => {
      expect(keypad.map((row) => row.map((button) => button.label))).toEqual([
        ["C", "←", "%", "÷"],
        ["7", "8", "9", "×"],
        ["4", "5", "6", "−"],
        ["1", "2", "3", "+"],
        ["0", ".", "="],
      ]);
    });

    it("should let the equals button span two columns", () => {
      expect(keypad[4][2].span).toBe(2);
      expect(keypad[4][0].span).toBe(1);
      expect(keypad[0][3].span).toBe(1);
    });
  });

  describe("getButtonKind", () => {
    it("should classify each label", () => {
      expect(getButtonKind("C")).toBe("ACTION");
      expect(getButtonKind("←")).toBe("ACTION");
      expect(getButtonKind("=")).toBe("EQUALS");
      expect(getButtonKind("÷")).toBe("OPERATOR");
      expect(getButtonKind("%")).toBe("OPERATOR");
      expect(getButtonKind("7")).toBe("DIGIT");
      expect(getButtonKind(".")).toBe("DIGIT");
    });
  });

  describe("getButtonAction", () => {
    it("should map control buttons to engine actions", () => {
      expect(getButtonAction("C")).toEqual({ type: "CLEAR" });
      expect(getButtonAction("←")).toEqual({ type: "BACKSPACE" });
      expect(getButtonAction("=")).toEqual({ type: "EVALUATE" });
    });

    it("should append everything else", () => {
      expect(getButtonAction("×")).toEqual({ type: "APPEND", token: "×" });
      expect(getButtonAction("0")).toEqual({ type: "APPEND", token: "0" });
    });
  });

  describe("moveFocus", () => {
    it("should stop at the edges", () => {
      expect(moveFocus(keypad, { row: 0, col: 0 }, "left")).toEqual({ row: 0, col: 0 });
      expect(moveFocus(keypad, { row: 0, col: 0 }, "up")).toEqual({ row: 0, col: 0 });
      expect(moveFocus(keypad, { row: 1, col: 3 }, "right")).toEqual({ row: 1, col: 3 });
    });

    it("should clamp the column on the shorter last row", () => {
      expect(moveFocus(keypad, { row: 3, col: 3 }, "down")).toEqual({ row: 4, col: 2 });
      expect(moveFocus(keypad, { row: 4, col: 2 }, "right")).toEqual({ row: 4, col: 2 });
      expect(moveFocus(keypad, { row: 4, col: 2 }, "down")).toEqual({ row: 4, col: 2 });
    });

    it("should move between rows", () => {
      expect(moveFocus(keypad, { row: 4, col: 2 }, "up")).toEqual({ row: 3, col: 2 });
    });
  });

  describe("getFocusedButton", () => {
    it("should return the button under focus", () => {
      expect(getFocusedButton(keypad, { row: 2, col: 1 })?.label).toBe("5");
      expect(getFocusedButton(keypad, { row: 9, col: 0 })).toBeUndefined();
    });
  });

  describe("resolveKeypress", () => {
    it("should append digits and the decimal point", () => {
      expect(resolveKeypress("7", { name: "7" })).toEqual({ type: "APPEND", token: "7" });
      expect(resolveKeypress(".", {})).toEqual({ type: "APPEND", token: "." });
    });

    it("should translate ASCII operators to keypad symbols", () => {
      expect(resolveKeypress("+", {})).toEqual({ type: "APPEND", token: "+" });
      expect(resolveKeypress("-", {})).toEqual({ type: "APPEND", token: "−" });
      expect(resolveKeypress("*", {})).toEqual({ type: "APPEND", token: "×" });
      expect(resolveKeypress("x", { name: "x" })).toEqual({ type: "APPEND", token: "×" });
      expect(resolveKeypress("/", {})).toEqual({ type: "APPEND", token: "÷" });
      expect(resolveKeypress("%", {})).toEqual({ type: "APPEND", token: "%" });
    });

    it("should evaluate on = and Enter", () => {
      expect(resolveKeypress("=", {})).toEqual({ type: "EVALUATE" });
      expect(resolveKeypress("\r", { name: "return" })).toEqual({ type: "EVALUATE" });
    });

    it("should map editing keys", () => {
      expect(resolveKeypress("\x7f", { name: "backspace" })).toEqual({ type: "BACKSPACE" });
      expect(resolveKeypress("\x1b", { name: "escape" })).toEqual({ type: "CLEAR" });
      expect(resolveKeypress(undefined, { name: "delete" })).toEqual({ type: "CLEAR" });
      expect(resolveKeypress("c", { name: "c" })).toEqual({ type: "CLEAR" });
    });

    it("should map navigation keys", () => {
      expect(resolveKeypress(undefined, { name: "up" })).toEqual({ type: "MOVE", direction: "up" });
      expect(resolveKeypress(undefined, { name: "right" })).toEqual({ type: "MOVE", direction: "right" });
      expect(resolveKeypress(" ", { name: "space" })).toEqual({ type: "PRESS_FOCUSED" });
    });

    it("should quit on q and Ctrl+C", () => {
      expect(resolveKeypress("q", { name: "q" })).toEqual({ type: "QUIT" });
      expect(resolveKeypress("\x03", { name: "c", ctrl: true })).toEqual({ type: "QUIT" });
    });

    it("should ignore other keys", () => {
      expect(resolveKeypress("a", { name: "a" })).toBeNull();
      expect(resolveKeypress("7", { name: "7", meta: true })).toBeNull();
      expect(resolveKeypress(undefined, { name: "f1" })).toBeNull();
    });
  });
});
