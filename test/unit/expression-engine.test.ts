import { describe, it, expect, beforeEach } from "vitest";
import { ExpressionEngine, createExpressionEngine } from "../../src/engine/expression.js";
import type { EvaluationResult } from "../../src/core/types.js";

function enter(engine: ExpressionEngine, tokens: string[]): void {
  for (const token of tokens) {
    engine.append(token);
  }
}

function expectFailure(result: EvaluationResult) {
  if (result.ok) {
    throw new Error(`Expected failure, got ${result.display}`);
  }
  return result.error;
}

describe("ExpressionEngine", () => {
  let engine: ExpressionEngine;

  beforeEach(() => {
    engine = createExpressionEngine();
  });

  describe("editing", () => {
    it("should start empty and display 0", () => {
      expect(engine.value).toBe("");
      expect(engine.display).toBe("0");
      expect(engine.isEmpty).toBe(true);
    });

    it("should append tokens without validation", () => {
      enter(engine, ["5", "+", "+"]);
      expect(engine.value).toBe("5++");
      expect(engine.display).toBe("5++");
    });

    it("should remove the last character on backspace", () => {
      enter(engine, ["1", "2", "+"]);
      engine.backspace();
      expect(engine.value).toBe("12");
    });

    it("should treat backspace on an empty expression as a no-op", () => {
      engine.backspace();
      expect(engine.value).toBe("");
      expect(engine.display).toBe("0");
    });

    it("should clear any expression", () => {
      enter(engine, ["9", "×", "9"]);
      engine.clear();
      expect(engine.value).toBe("");
      engine.clear();
      expect(engine.value).toBe("");
    });
  });

  describe("evaluate", () => {
    it("should compute with standard precedence", () => {
      enter(engine, ["2", "+", "3", "×", "4"]);
      const result = engine.evaluate();
      expect(result).toEqual({ ok: true, expression: "2+3×4", value: 14, display: "14" });
      expect(engine.value).toBe("14");
    });

    it("should format fractional and whole results", () => {
      enter(engine, ["1", "÷", "4"]);
      expect(engine.evaluate().ok).toBe(true);
      expect(engine.display).toBe("0.25");

      engine.clear();
      enter(engine, ["4", "÷", "2"]);
      engine.evaluate();
      expect(engine.display).toBe("2");
    });

    it("should hide floating point noise", () => {
      enter(engine, ["0", ".", "1", "+", "0", ".", "2"]);
      engine.evaluate();
      expect(engine.display).toBe("0.3");
    });

    it("should fail on division by zero and reset the expression", () => {
      enter(engine, ["5", "÷", "0"]);
      const error = expectFailure(engine.evaluate());
      expect(error.kind).toBe("DIVISION_BY_ZERO");
      expect(engine.value).toBe("");
      expect(engine.display).toBe("0");
    });

    it("should fail on a trailing operator and reset the expression", () => {
      enter(engine, ["5", "+"]);
      const error = expectFailure(engine.evaluate());
      expect(error.kind).toBe("INVALID_EXPRESSION");
      expect(engine.value).toBe("");
    });

    it("should fail on an empty expression", () => {
      expect(expectFailure(engine.evaluate()).kind).toBe("INVALID_EXPRESSION");
    });

    it("should report the expression that was evaluated", () => {
      enter(engine, ["5", "+"]);
      expect(engine.evaluate().expression).toBe("5+");
    });
  });

  describe("chaining", () => {
    it("should continue from the previous result", () => {
      enter(engine, ["2", "+", "2"]);
      engine.evaluate();
      expect(engine.value).toBe("4");

      engine.append("+1");
      const result = engine.evaluate();
      expect(result.ok && result.value).toBe(5);
      expect(engine.value).toBe("5");
    });

    it("should continue from a negative result", () => {
      enter(engine, ["2", "−", "5"]);
      engine.evaluate();
      expect(engine.value).toBe("−3");

      enter(engine, ["×", "2"]);
      engine.evaluate();
      expect(engine.value).toBe("−6");
    });

    it("should continue from a very small result", () => {
      engine.append("1÷10000000");
      engine.evaluate();
      expect(engine.value).toBe("0.0000001");

      engine.append("+1");
      const result = engine.evaluate();
      expect(result.ok).toBe(true);
      expect(engine.value).toBe("1.0000001");
    });

    it("should continue from a result beyond the fixed range", () => {
      engine.append("99999999999×99999999999");
      const product = engine.evaluate();
      expect(product.ok).toBe(true);
      expect(engine.value).toMatch(/^\d{22}$/);

      engine.append("+1");
      const result = engine.evaluate();
      expect(result.ok).toBe(true);
      expect(engine.value).toMatch(/^\d{22}$/);
    });
  });

  describe("options", () => {
    it("should keep the input after a failure with the keep policy", () => {
      const keeping = new ExpressionEngine({ errorPolicy: "keep" });
      enter(keeping, ["5", "+"]);
      expect(keeping.evaluate().ok).toBe(false);
      expect(keeping.value).toBe("5+");
    });

    it("should round to the configured precision", () => {
      const rounding = new ExpressionEngine({ precision: 2 });
      enter(rounding, ["1", "÷", "3"]);
      rounding.evaluate();
      expect(rounding.value).toBe("0.33");
    });
  });

  describe("dispatch", () => {
    it("should apply editing actions and return null", () => {
      expect(engine.dispatch({ type: "APPEND", token: "7" })).toBeNull();
      expect(engine.dispatch({ type: "APPEND", token: "8" })).toBeNull();
      expect(engine.dispatch({ type: "BACKSPACE" })).toBeNull();
      expect(engine.value).toBe("7");
      expect(engine.dispatch({ type: "CLEAR" })).toBeNull();
      expect(engine.value).toBe("");
    });

    it("should return the result of an evaluation", () => {
      engine.dispatch({ type: "APPEND", token: "6×7" });
      const result = engine.dispatch({ type: "EVALUATE" });
      expect(result).toEqual({ ok: true, expression: "6×7", value: 42, display: "42" });
    });
  });

  describe("history", () => {
    it("should record successful evaluations only", () => {
      enter(engine, ["2", "+", "2"]);
      engine.evaluate();
      enter(engine, ["÷", "0"]);
      engine.evaluate();

      const history = engine.getHistory();
      expect(history).toHaveLength(1);
      expect(history[0].expression).toBe("2+2");
      expect(history[0].result).toBe("4");
      expect(history[0].timestamp).toBeInstanceOf(Date);
    });

    it("should drop the oldest entries beyond the history size", () => {
      const limited = new ExpressionEngine({ historySize: 2 });
      for (const expression of ["1+1", "2+2", "3+3"]) {
        limited.clear();
        limited.append(expression);
        limited.evaluate();
      }

      expect(limited.getHistory().map((entry) => entry.expression)).toEqual(["2+2", "3+3"]);
    });

    it("should record nothing with a history size of zero", () => {
      const silent = new ExpressionEngine({ historySize: 0 });
      silent.append("1+1");
      silent.evaluate();
      expect(silent.getHistory()).toHaveLength(0);
    });

    it("should clear history", () => {
      engine.append("1+1");
      engine.evaluate();
      engine.clearHistory();
      expect(engine.getHistory()).toHaveLength(0);
    });
  });
});
