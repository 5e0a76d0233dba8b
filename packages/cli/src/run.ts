import { Command } from "commander";
import chalk from "chalk";
import {
    ChargeWatch,
    ConsoleNotificationSink,
    FanoutNotificationSink,
    LogNotificationSink,
    createLogger,
    type NotificationSink,
} from "@chargewatch/monitor";

interface RunOptions {
    simulate?: boolean;
    config?: string;
    state?: string;
    stateless?: boolean;
    console?: boolean;
}

export const runCommand = new Command("run")
    .description("Monitor the battery until interrupted")
    .option("--simulate", "Drive the monitor with the synthetic battery trace")
    .option("-c, --config <path>", "Config file (default ~/.chargewatch/config.json)")
    .option("--state <path>", "State file (default ~/.chargewatch/state.json, unused with --simulate)")
    .option("--stateless", "Do not keep monitor state across restarts")
    .option("--console", "Also print alerts as boxes on stdout")
    .action(async (options: RunOptions) => {
        const logSink = new LogNotificationSink(createLogger("notify"));
        const sink: NotificationSink = options.console
            ? new FanoutNotificationSink([logSink, new ConsoleNotificationSink()])
            : logSink;

        const watch = new ChargeWatch({
            configPath: options.config,
            statePath: options.stateless ? false : options.state,
            sink,
        });

        const mode = options.simulate ? "simulate" : "live";
        console.log(chalk.green(`[ChargeWatch] Monitoring (${mode}) with config ${watch.configPath}`));

        const shutdown = () => {
            console.log(chalk.yellow("\n[ChargeWatch] Stopping..."));
            watch.stop();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);

        await watch.start(mode);
    });
