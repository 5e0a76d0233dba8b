#!/usr/bin/env tsx

import { Command } from "commander";
import chalk from "chalk";

import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";
import { configCommand } from "./config.js";

const program = new Command();

program
    .name("chargewatch")
    .description("Battery threshold alerts with adaptive polling")
    .version("0.3.0");

program.addCommand(runCommand);
program.addCommand(statusCommand);
program.addCommand(configCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});
