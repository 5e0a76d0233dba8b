// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/config/watcher.ts
// ConfigWatcher: notices external edits of the config file and emits the
// reloaded config. The monitor never reads the file itself; it only receives
// what this watcher emits.
//
// Events:
//   "change" (config: ChargeWatchConfig)  reloaded and different from the last emitted one
//   "error"  (err: Error)                 reload failed; the previous config stays in force

import EventEmitter from "events";
import { watch, type FSWatcher } from "fs";
import { basename, dirname } from "path";

import { describeError } from "../exceptions.js";
import type { Logger } from "../logger.js";
import { sameConfig, type ChargeWatchConfig } from "../types/config.js";

export interface ConfigWatcherOptions {
    /** Editors emit several events per save; wait this long before reloading */
    debounceMs: number;
}

interface ReloadableConfig {
    readonly path: string;
    load(): ChargeWatchConfig;
}

export class ConfigWatcher extends EventEmitter {
    private fsWatcher: FSWatcher | null = null;
    private debounceTimer: NodeJS.Timeout | null = null;
    private lastEmitted: ChargeWatchConfig | null = null;
    private readonly options: ConfigWatcherOptions;

    constructor(
        private readonly store: ReloadableConfig,
        private readonly log: Logger,
        options: Partial<ConfigWatcherOptions> = {},
    ) {
        super();
        this.options = { debounceMs: options.debounceMs ?? 100 };
    }

    /**
     * Start watching. `current` is the config already in force, so that a
     * reload producing the same values is not re-emitted.
     */
    start(current?: ChargeWatchConfig): void {
        if (this.fsWatcher) return;
        this.lastEmitted = current ?? null;

        // Watch the directory: an atomic save replaces the file, which would
        // silently end a watch on the file itself.
        const fileName = basename(this.store.path);
        this.fsWatcher = watch(dirname(this.store.path), (_event, changed) => {
            if (changed !== null && changed.toString() !== fileName) return;
            this.schedule();
        });
        this.fsWatcher.on("error", (err) => {
            this.log.error({ err: describeError(err) }, "config watcher failed");
            this.emitError(err);
        });
        this.log.info({ path: this.store.path }, "watching config file");
    }

    close(): void {
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
            this.debounceTimer = null;
        }
        if (this.fsWatcher) {
            this.fsWatcher.close();
            this.fsWatcher = null;
        }
    }

    /** Reload now. Returns the config if one was emitted. */
    reload(): ChargeWatchConfig | null {
        let config: ChargeWatchConfig;
        try {
            config = this.store.load();
        } catch (err) {
            this.log.error({ err: describeError(err) }, "config reload failed, keeping previous config");
            this.emitError(err instanceof Error ? err : new Error(String(err)));
            return null;
        }

        if (this.lastEmitted && sameConfig(this.lastEmitted, config)) {
            this.log.debug("config file touched without changes");
            return null;
        }

        this.lastEmitted = config;
        this.log.info("config file changed, delivering new config");
        this.emit("change", config);
        return config;
    }

    // An unhandled "error" event would throw out of a timer callback.
    private emitError(err: Error): void {
        if (this.listenerCount("error") > 0) this.emit("error", err);
    }

    private schedule(): void {
        if (this.debounceTimer) clearTimeout(this.debounceTimer);
        this.debounceTimer = setTimeout(() => {
            this.debounceTimer = null;
            this.reload();
        }, this.options.debounceMs);
    }
}
