// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * JSON-file configuration store.
 * Reads ~/.chargewatch/config.json (or an explicit path), fills missing keys
 * from defaults, validates with Zod and writes atomically.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

import { ConfigurationError, describeError } from "../exceptions.js";
import type { Logger } from "../logger.js";
import {
  CONFIG_FILE_KEYS,
  chargeWatchConfigSchema,
  defaultConfig,
  snakeToCamel,
  toConfigFile,
  type ChargeWatchConfig,
} from "../types/config.js";
import { ConfigWatcher, type ConfigWatcherOptions } from "./watcher.js";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".chargewatch");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.json");

/** The part of the store the monitor writes through. */
export interface ConfigSaver {
  save(config: ChargeWatchConfig): void;
}

export class ConfigStore implements ConfigSaver {
  readonly path: string;

  constructor(
    private readonly log: Logger,
    configPath: string = DEFAULT_CONFIG_PATH,
  ) {
    this.path = configPath;
    mkdirSync(dirname(this.path), { recursive: true });
  }

  /**
   * Load the config. A missing file is created with defaults; missing keys
   * are filled in and written back.
   * @throws ConfigurationError on unreadable JSON or invalid values
   */
  load(): ChargeWatchConfig {
    if (!existsSync(this.path)) {
      this.log.info({ path: this.path }, "config file not found, writing defaults");
      this.save(defaultConfig);
      return { ...defaultConfig };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (err) {
      throw new ConfigurationError(`Failed to read config at '${this.path}': ${describeError(err)}`);
    }

    if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
      throw new ConfigurationError(`Config at '${this.path}' must be a JSON object`);
    }

    const fileKeys = Object.keys(raw);
    const missing = CONFIG_FILE_KEYS.filter((k) => !fileKeys.includes(k));
    const candidate = Object.fromEntries(
      Object.entries(raw).map(([k, v]) => [snakeToCamel(k), v]),
    );

    const result = chargeWatchConfigSchema.safeParse(candidate);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`);
      throw new ConfigurationError(`Invalid configuration in '${this.path}':\n${issues.join("\n")}`, issues);
    }

    if (missing.length > 0) {
      this.log.info({ missing }, "config completed with default values");
      try {
        this.save(result.data);
      } catch (err) {
        this.log.debug({ err: describeError(err) }, "could not write completed config back");
      }
    }

    return result.data;
  }

  /** Atomic write: temp file, then rename over the target. */
  save(config: ChargeWatchConfig): void {
    const tmpPath = `${this.path}.tmp`;
    try {
      writeFileSync(tmpPath, `${JSON.stringify(toConfigFile(config), null, 2)}\n`, "utf8");
      renameSync(tmpPath, this.path);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw new ConfigurationError(`Failed to save config to '${this.path}': ${describeError(err)}`);
    }
    this.log.debug({ path: this.path }, "config saved");
  }

  /** Watch the file for external edits. The caller starts and closes the watcher. */
  watch(options: Partial<ConfigWatcherOptions> = {}): ConfigWatcher {
    return new ConfigWatcher(this, this.log, options);
  }
}
