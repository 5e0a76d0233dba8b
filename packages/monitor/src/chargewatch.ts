// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/chargewatch.ts
// ChargeWatch: main facade. Wires the config store, its watcher, a battery
// source, a notification sink and the monitor together.
//
// Usage:
//   const watch = new ChargeWatch({ configPath: "./config.json" })
//   const done = watch.start("live")
//   ...
//   watch.stop(); await done

import { ConfigStore } from "./config/store.js";
import { createLogger, type Logger, type ModuleName } from "./logger.js";
import { BatteryMonitor, type MonitorMode } from "./monitor/monitor.js";
import { LogNotificationSink, type NotificationSink } from "./notify/sinks.js";
import { SystemBatterySource } from "./sources/system.js";
import { JsonMonitorStateStore, type MonitorStateStore } from "./state/state-store.js";
import type { BatterySource } from "./types/battery.js";
import type { ChargeWatchConfig } from "./types/config.js";

export interface ChargeWatchOptions {
    configPath?: string;
    /** Default: log sink */
    sink?: NotificationSink;
    /** Default: systeminformation */
    source?: BatterySource;
    /** Path of the JSON state file; `false` keeps no state across restarts */
    statePath?: string | false;
    /** Logger factory; default createLogger with debug level when debug_enabled is set */
    logger?: (module: ModuleName) => Logger;
}

export class ChargeWatch {
    private readonly store: ConfigStore;
    private readonly config: ChargeWatchConfig;
    private readonly monitor: BatteryMonitor;

    /**
     * Loads the config immediately.
     * @throws ConfigurationError when the config file is invalid
     */
    constructor(opts: ChargeWatchOptions = {}) {
        const bootLogger = opts.logger ?? ((module: ModuleName) => createLogger(module));
        this.store = new ConfigStore(bootLogger("config"), opts.configPath);
        this.config = this.store.load();

        const makeLogger =
            opts.logger ??
            ((module: ModuleName) => createLogger(module, this.config.debugEnabled ? { level: "debug" } : {}));

        const stateStore: MonitorStateStore | undefined =
            opts.statePath === false ? undefined : new JsonMonitorStateStore(opts.statePath);

        this.monitor = new BatteryMonitor({
            config: this.config,
            configSaver: this.store,
            sink: opts.sink ?? new LogNotificationSink(makeLogger("notify")),
            log: makeLogger("monitor"),
            liveSource: opts.source ?? new SystemBatterySource(),
            stateStore,
            simulatorLog: makeLogger("simulator"),
        });
    }

    get configPath(): string {
        return this.store.path;
    }

    getMonitor(): BatteryMonitor {
        return this.monitor;
    }

    /** Start watching the config and run the monitor until stop(). */
    async start(mode: MonitorMode = "live"): Promise<void> {
        // Reload failures are logged by the watcher; the monitor keeps its config.
        const watcher = this.store.watch();
        watcher.on("change", (config: ChargeWatchConfig) => this.monitor.pushConfig(config));
        watcher.start(this.config);

        try {
            await this.monitor.start(mode);
        } finally {
            watcher.close();
        }
    }

    stop(): void {
        this.monitor.stop();
    }
}
