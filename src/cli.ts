#!/usr/bin/env node
import chalk from "chalk";
import { createProgram } from "./program.js";
import { describeError } from "./lib/errors.js";

try {
  await createProgram().parseAsync(process.argv);
} catch (e) {
  console.error(chalk.red(describeError(e)));
  process.exitCode = 1;
}
