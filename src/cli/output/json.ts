import type { EvaluationResult } from "../../core/types.js";
import { getUserMessage } from "../../engine/evaluator.js";

/**
 * Shape of an evaluation result in JSON output. Failures carry both the
 * technical description and the message a user would see.
 */
export type JsonEvaluation =
  | { expression: string; ok: true; result: string; value: number }
  | {
      expression: string;
      ok: false;
      error: { kind: string; message: string; userMessage: string; position?: number };
    };

function toJson(result: EvaluationResult): JsonEvaluation {
  if (result.ok) {
    return {
      expression: result.expression,
      ok: true,
      result: result.display,
      value: result.value,
    };
  }

  return {
    expression: result.expression,
    ok: false,
    error: {
      ...result.error,
      userMessage: getUserMessage(result.error),
    },
  };
}

export class JsonOutput {
  formatResult(result: EvaluationResult): string {
    return JSON.stringify(toJson(result), null, 2);
  }

  print(result: EvaluationResult): void {
    console.log(this.formatResult(result));
  }
}
