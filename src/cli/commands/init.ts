import { Command } from "commander";
import ora from "ora";
import chalk from "chalk";
import { writeFile } from "fs/promises";
import { join } from "path";
import type { InitOptions } from "../../core/types.js";
import {
  CONFIG_FILE_NAME,
  fileExists,
  getDefaultConfig,
  stringifyConfig,
} from "../../services/config.js";
import { printError, printWarning } from "../output/console.js";

export const initCommand = new Command("init")
  .description(`Write a ${CONFIG_FILE_NAME} with the default settings to the current directory`)
  .option("-f, --force", "Overwrite existing configuration")
  .action(async (options: InitOptions) => {
    const exitCode = await runInit(process.cwd(), options);
    process.exit(exitCode);
  });

export async function runInit(cwd: string, options: InitOptions): Promise<number> {
  const spinner = ora("Initializing deskcalc...").start();
  const configPath = join(cwd, CONFIG_FILE_NAME);

  try {
    if (!options.force && (await fileExists(configPath))) {
      spinner.fail("Configuration already exists");
      printWarning(`${configPath} was left untouched. Use --force to overwrite it.`);
      return 1;
    }

    await writeFile(configPath, stringifyConfig(getDefaultConfig()), "utf-8");

    spinner.succeed("deskcalc initialized");
    console.log(chalk.gray(`\nConfiguration written to: ${configPath}`));
    console.log(chalk.green("\nYou can now run:"));
    console.log(chalk.cyan("  deskcalc"));
    return 0;
  } catch (error) {
    spinner.fail("Initialization failed");
    printError(error instanceof Error ? error.message : "Unknown error");
    return 1;
  }
}
