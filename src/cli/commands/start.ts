import { Command } from "commander";
import chalk from "chalk";
import figlet from "figlet";
import type { StartOptions } from "../../core/types.js";
import { loadConfig } from "../../services/config.js";
import { CalculatorApp } from "../../ui/app.js";
import { printSetupError } from "../output/console.js";

// ============================================================================
// ASCII Art Banner
// ============================================================================

export function renderBanner(): string[] {
  const banner = figlet.textSync("DESKCALC", { font: "Standard" });

  // Color each line with gradient
  const colors = [chalk.red, chalk.yellow, chalk.green, chalk.cyan, chalk.blue, chalk.magenta];
  return banner.split("\n").map((line, i) => colors[i % colors.length](line));
}

// ============================================================================
// Start Command
// ============================================================================

export const startCommand = new Command("start")
  .description("Open the interactive calculator (default)")
  .option("-c, --config <path>", "Path to a configuration file")
  .option("--no-banner", "Skip the start-up banner")
  .action(async (options: StartOptions) => {
    const exitCode = await runStart(options);
    process.exit(exitCode);
  });

export async function runStart(options: StartOptions): Promise<number> {
  if (!process.stdin.isTTY) {
    printSetupError(new Error("The interactive calculator needs a terminal. Use `deskcalc eval` for piped input."));
    return 1;
  }

  try {
    const config = await loadConfig(options.config);

    if (config.banner && options.banner !== false) {
      console.log();
      for (const line of renderBanner()) {
        console.log(line);
      }
      console.log();
    }

    const app = new CalculatorApp({ input: process.stdin, output: process.stdout, config });
    await app.run();
    return 0;
  } catch (error) {
    printSetupError(error);
    return 2;
  }
}
