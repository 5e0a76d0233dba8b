// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
// packages/monitor/tests/unit/helpers.ts
// Shared fakes for the monitor tests: no files, no real battery.

import pino from "pino";
import { defaultConfig, type ChargeWatchConfig } from "../../src/types/config.js";
import { createSnapshot, type BatterySnapshot } from "../../src/types/battery.js";
import type { NotificationSink } from "../../src/notify/sinks.js";
import type { ConfigSaver } from "../../src/config/store.js";
import type { MonitorStateStore, PersistedMonitorState } from "../../src/state/state-store.js";

export const silentLog = pino({ level: "silent" });

export function makeConfig(overrides: Partial<ChargeWatchConfig> = {}): ChargeWatchConfig {
    return {
        ...defaultConfig,
        minThreshold: 20,
        maxThreshold: 80,
        checkIntervalCharging: 30,
        checkIntervalDischarging: 600,
        notificationInterval: 60,
        maxNotifications: 3,
        ...overrides,
    };
}

export function reading(capacity: number, isCharging: boolean): BatterySnapshot {
    return createSnapshot({ capacity, isCharging });
}

export interface SentAlert {
    kind: "low" | "high";
    level: number;
    threshold: number;
    remaining: number;
}

export class RecordingSink implements NotificationSink {
    readonly name = "recording";
    readonly sent: SentAlert[] = [];
    failWith: Error | null = null;

    async notifyLow(level: number, threshold: number, remaining: number): Promise<void> {
        this.sent.push({ kind: "low", level, threshold, remaining });
        if (this.failWith) throw this.failWith;
    }

    async notifyHigh(level: number, threshold: number, remaining: number): Promise<void> {
        this.sent.push({ kind: "high", level, threshold, remaining });
        if (this.failWith) throw this.failWith;
    }
}

export class MemoryConfigSaver implements ConfigSaver {
    readonly saved: ChargeWatchConfig[] = [];

    save(config: ChargeWatchConfig): void {
        this.saved.push({ ...config });
    }
}

export class MemoryStateStore implements MonitorStateStore {
    readonly saved: PersistedMonitorState[] = [];
    loads = 0;

    constructor(private current: PersistedMonitorState | null = null) { }

    load(): PersistedMonitorState | null {
        this.loads++;
        return this.current;
    }

    save(state: PersistedMonitorState): void {
        this.current = { ...state };
        this.saved.push({ ...state });
    }
}

/** Seconds after a fixed origin, as a Date. */
export function at(seconds: number): Date {
    return new Date(Date.UTC(2026, 0, 1) + seconds * 1_000);
}
