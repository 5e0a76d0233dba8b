import { Command } from "commander";
import chalk from "chalk";
import {
    CONFIG_FILE_KEYS,
    ConfigStore,
    ConfigurationError,
    chargeWatchConfigSchema,
    createLogger,
    snakeToCamel,
    toConfigFile,
    type ChargeWatchConfig,
    type ConfigFileKey,
} from "@chargewatch/monitor";

function isConfigKey(key: string): key is ConfigFileKey {
    return CONFIG_FILE_KEYS.some((k) => k === key);
}

function parseValue(raw: string): number | boolean | string {
    if (raw === "true") return true;
    if (raw === "false") return false;
    const n = Number(raw);
    return raw.trim() !== "" && Number.isFinite(n) ? n : raw;
}

/**
 * Apply `key=value` assignments (snake_case keys) to a config.
 * @throws ConfigurationError on unknown keys, malformed pairs or invalid values
 */
export function applyAssignments(config: ChargeWatchConfig, assignments: string[]): ChargeWatchConfig {
    const patch: Record<string, unknown> = {};
    for (const assignment of assignments) {
        const eq = assignment.indexOf("=");
        if (eq <= 0) {
            throw new ConfigurationError(`Expected key=value, got '${assignment}'`);
        }
        const key = assignment.slice(0, eq).trim();
        if (!isConfigKey(key)) {
            throw new ConfigurationError(`Unknown config key '${key}'. Known keys: ${CONFIG_FILE_KEYS.join(", ")}`);
        }
        patch[snakeToCamel(key)] = parseValue(assignment.slice(eq + 1).trim());
    }

    const result = chargeWatchConfigSchema.safeParse({ ...config, ...patch });
    if (!result.success) {
        const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`);
        throw new ConfigurationError(`Invalid configuration:\n${issues.join("\n")}`, issues);
    }
    return result.data;
}

export function formatConfig(config: ChargeWatchConfig): string {
    const file = toConfigFile(config);
    return CONFIG_FILE_KEYS.map((k) => `${chalk.gray(k.padEnd(28))}${String(file[k])}`).join("\n");
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

export const configCommand = new Command("config")
    .description("Show or change the configuration")
    .option("-c, --config <path>", "Config file (default ~/.chargewatch/config.json)")
    .option("-s, --set <key=value>", "Set a value (repeatable), e.g. --set min_threshold=25", collect, [])
    .action(async (options: { config?: string; set: string[] }) => {
        const store = new ConfigStore(createLogger("config", { level: "warn" }), options.config);
        let config = store.load();

        if (options.set.length > 0) {
            config = applyAssignments(config, options.set);
            store.save(config);
            console.log(chalk.green(`Saved ${store.path}`));
        } else {
            console.log(chalk.bold(store.path));
        }
        console.log(formatConfig(config));
    });
