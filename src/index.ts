#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { startCommand } from "./cli/commands/start.js";
import { evalCommand } from "./cli/commands/eval.js";
import { initCommand } from "./cli/commands/init.js";

const program = new Command();

program
  .name("deskcalc")
  .description(chalk.yellow("A keyboard-driven calculator for the terminal"))
  .version("1.0.0");

program.addCommand(startCommand, { isDefault: true });
program.addCommand(evalCommand);
program.addCommand(initCommand);

program.parse();
