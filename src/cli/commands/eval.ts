import { Command } from "commander";
import type { EvalOptions, OutputFormat } from "../../core/types.js";
import { createExpressionEngine } from "../../engine/expression.js";
import type { ExpressionEngineOptions } from "../../engine/expression.js";
import { getUserMessage } from "../../engine/evaluator.js";
import { loadConfig } from "../../services/config.js";
import { printError, printResult, printSetupError } from "../output/console.js";
import { JsonOutput } from "../output/json.js";

// ============================================================================
// Eval Command
// ============================================================================

export const EXIT_OK = 0;
export const EXIT_CALCULATION_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;

export const evalCommand = new Command("eval")
  .description("Evaluate an expression once and print the result")
  .argument("<expression...>", "Expression, e.g. 2+3*4 or -5+3 (arguments are joined with spaces)")
  .option("--format <format>", "Output format: console or json", "console")
  .option("-p, --precision <places>", "Decimal places to round to (0-15)")
  .option("-c, --config <path>", "Path to a configuration file")
  // A leading minus belongs to the expression, not to an option
  .allowUnknownOption()
  .action(async (parts: string[], options: EvalOptions) => {
    const exitCode = await runEval(parts.join(" "), options);
    process.exit(exitCode);
  });

// ============================================================================
// Main Eval Flow
// ============================================================================

export async function runEval(expression: string, options: EvalOptions): Promise<number> {
  const format = parseFormat(options.format);
  if (!format) {
    printError(`Unknown format "${options.format}". Use console or json.`);
    return EXIT_CONFIG_ERROR;
  }

  let engineOptions: ExpressionEngineOptions;
  try {
    engineOptions = await resolveEngineOptions(options);
  } catch (error) {
    printSetupError(error);
    return EXIT_CONFIG_ERROR;
  }

  const engine = createExpressionEngine(engineOptions);
  engine.append(expression);
  const result = engine.evaluate();

  if (format === "json") {
    new JsonOutput().print(result);
  } else if (result.ok) {
    printResult(result.expression, result.display);
  } else {
    printError(getUserMessage(result.error));
  }

  return result.ok ? EXIT_OK : EXIT_CALCULATION_ERROR;
}

// ============================================================================
// Helpers
// ============================================================================

async function resolveEngineOptions(options: EvalOptions): Promise<ExpressionEngineOptions> {
  const config = await loadConfig(options.config);
  return {
    precision: options.precision !== undefined ? parsePrecision(options.precision) : config.precision,
    errorPolicy: config.errorPolicy,
    historySize: 0,
  };
}

function parseFormat(value: string | undefined): OutputFormat | null {
  switch (value ?? "console") {
    case "console":
      return "console";
    case "json":
      return "json";
    default:
      return null;
  }
}

function parsePrecision(value: string): number {
  const precision = Number(value);
  if (!Number.isInteger(precision) || precision < 0 || precision > 15) {
    throw new Error(`Invalid precision "${value}": expected an integer from 0 to 15`);
  }
  return precision;
}
