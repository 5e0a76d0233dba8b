import { Command } from "commander";
import chalk from "chalk";
import {
    ConfigStore,
    SystemBatterySource,
    createLogger,
    describeError,
    formatStatusReport,
} from "@chargewatch/monitor";

export const statusCommand = new Command("status")
    .description("Read the battery once and show it against the thresholds")
    .option("-c, --config <path>", "Config file (default ~/.chargewatch/config.json)")
    .action(async (options: { config?: string }) => {
        const config = new ConfigStore(createLogger("config", { level: "warn" }), options.config).load();
        try {
            const snapshot = await new SystemBatterySource().poll();
            console.log(formatStatusReport(snapshot, config));
        } catch (e) {
            console.error(chalk.red(`Failed to read battery: ${describeError(e)}`));
            process.exitCode = 1;
        }
    });
