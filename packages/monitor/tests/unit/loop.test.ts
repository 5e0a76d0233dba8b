// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
// packages/monitor/tests/unit/loop.test.ts
// BatteryMonitor run loop: fake timers, in-process sources only.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { BatteryMonitor } from "../../src/monitor/monitor.js";
import { BatteryReadError, ChargeWatchError } from "../../src/exceptions.js";
import type { BatterySnapshot, BatterySource } from "../../src/types/battery.js";
import { MemoryConfigSaver, MemoryStateStore, RecordingSink, makeConfig, reading, silentLog } from "./helpers.js";

class ScriptedSource implements BatterySource {
    readonly name = "scripted";
    polls = 0;

    constructor(private readonly script: Array<BatterySnapshot | Error>, private readonly fallback: BatterySnapshot) { }

    async poll(): Promise<BatterySnapshot> {
        const step = this.script[this.polls] ?? this.fallback;
        this.polls++;
        if (step instanceof Error) throw step;
        return step;
    }
}

describe("BatteryMonitor run loop", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("drives the simulator through a low and a high alert", async () => {
        const sink = new RecordingSink();
        const monitor = new BatteryMonitor({
            config: makeConfig({
                minThreshold: 21,
                maxThreshold: 81,
                checkIntervalCharging: 120,
                checkIntervalDischarging: 120,
            }),
            configSaver: new MemoryConfigSaver(),
            sink,
            log: silentLog,
        });

        const running = monitor.start("simulate");
        await vi.advanceTimersByTimeAsync(2_000_000);
        monitor.stop();
        await running;

        const kinds = sink.sent.map((a) => a.kind);
        expect(kinds.slice(0, 4)).toEqual(["low", "low", "low", "high"]);
        expect(monitor.isRunning).toBe(false);
    });

    it("carries a reloaded notification cap into the simulator", async () => {
        const sink = new RecordingSink();
        const config = makeConfig({
            minThreshold: 21,
            maxThreshold: 81,
            checkIntervalCharging: 120,
            checkIntervalDischarging: 120,
        });
        const monitor = new BatteryMonitor({ config, configSaver: new MemoryConfigSaver(), sink, log: silentLog });

        const running = monitor.start("simulate");
        await vi.advanceTimersByTimeAsync(0);
        monitor.pushConfig({ ...config, maxNotifications: 1 });
        await vi.advanceTimersByTimeAsync(1_000_000);
        monitor.stop();
        await running;

        // one low, then the simulator starts charging instead of waiting for a third
        expect(sink.sent.slice(0, 2).map((a) => `${a.kind}:${a.level}`)).toEqual(["low:19", "high:81"]);
    });

    it("ignores saved state and saves nothing in a simulated run", async () => {
        const store = new MemoryStateStore({ lastLevel: 19, lastCharging: false, notificationsShown: 3, lastNotificationAt: null });
        const sink = new RecordingSink();
        const monitor = new BatteryMonitor({
            config: makeConfig({ minThreshold: 21, maxThreshold: 81, checkIntervalCharging: 120, checkIntervalDischarging: 120 }),
            configSaver: new MemoryConfigSaver(),
            sink,
            log: silentLog,
            stateStore: store,
        });

        const running = monitor.start("simulate");
        await vi.advanceTimersByTimeAsync(1_000_000);
        monitor.stop();
        await running;

        expect(sink.sent.slice(0, 4).map((a) => a.kind)).toEqual(["low", "low", "low", "high"]);
        expect(store.saved).toHaveLength(0);
    });

    it("leaves a live run on the same store unaffected by an earlier simulated run", async () => {
        const store = new MemoryStateStore();
        const simulated = new BatteryMonitor({
            config: makeConfig({ minThreshold: 21, maxThreshold: 81, checkIntervalDischarging: 120 }),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
            stateStore: store,
        });
        const first = simulated.start("simulate");
        await vi.advanceTimersByTimeAsync(500_000);
        simulated.stop();
        await first;

        const sink = new RecordingSink();
        const source = new ScriptedSource([reading(50, false), reading(10, false), reading(9, false)], reading(9, false));
        const live = new BatteryMonitor({
            config: makeConfig({ checkIntervalDischarging: 600, notificationInterval: 60 }),
            configSaver: new MemoryConfigSaver(),
            sink,
            log: silentLog,
            liveSource: source,
            stateStore: store,
        });
        const second = live.start("live");
        await vi.advanceTimersByTimeAsync(600_000);
        live.stop();
        await second;

        expect(sink.sent).toEqual([{ kind: "low", level: 10, threshold: 20, remaining: 2 }]);
        expect(store.saved.at(-1)).toMatchObject({ lastLevel: 10, lastCharging: false, notificationsShown: 1 });
    });

    it("polls once at start, then once per interval", async () => {
        const source = new ScriptedSource([], reading(50, false));
        const monitor = new BatteryMonitor({
            config: makeConfig({ checkIntervalDischarging: 600 }),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
            liveSource: source,
        });

        const running = monitor.start("live");
        await vi.advanceTimersByTimeAsync(0);
        expect(source.polls).toBe(1);

        await vi.advanceTimersByTimeAsync(599_000);
        expect(source.polls).toBe(1);
        await vi.advanceTimersByTimeAsync(1_000);
        expect(source.polls).toBe(2);

        monitor.stop();
        await running;
    });

    it("skips a cycle when the source fails and keeps going", async () => {
        const source = new ScriptedSource([new BatteryReadError("scripted", "ioctl failed")], reading(50, false));
        const monitor = new BatteryMonitor({
            config: makeConfig({ checkIntervalDischarging: 600 }),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
            liveSource: source,
        });

        const running = monitor.start("live");
        await vi.advanceTimersByTimeAsync(0);
        expect(monitor.getState().initialized).toBe(false);

        await vi.advanceTimersByTimeAsync(600_000);
        expect(source.polls).toBe(2);
        expect(monitor.getState().initialized).toBe(true);

        monitor.stop();
        await running;
    });

    it("restarts the timer with the interval of a pushed config", async () => {
        const source = new ScriptedSource([], reading(50, false));
        const monitor = new BatteryMonitor({
            config: makeConfig({ checkIntervalDischarging: 600 }),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
            liveSource: source,
        });

        const running = monitor.start("live");
        await vi.advanceTimersByTimeAsync(100_000);
        expect(source.polls).toBe(1);

        monitor.pushConfig(makeConfig({ checkIntervalDischarging: 50 }));
        await vi.advanceTimersByTimeAsync(0);
        expect(monitor.getConfig().checkIntervalDischarging).toBe(50);

        await vi.advanceTimersByTimeAsync(49_000);
        expect(source.polls).toBe(1);
        await vi.advanceTimersByTimeAsync(1_000);
        expect(source.polls).toBe(2);

        monitor.stop();
        await running;
    });

    it("uses the simulator when the config asks for it", async () => {
        const source = new ScriptedSource([], reading(50, false));
        const monitor = new BatteryMonitor({
            config: makeConfig({ useSimulator: true, minThreshold: 21, maxThreshold: 81 }),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
            liveSource: source,
        });

        const running = monitor.start("live");
        await vi.advanceTimersByTimeAsync(0);
        monitor.stop();
        await running;

        expect(source.polls).toBe(0);
        // simulator starts at 23 and steps down by 2
        expect(monitor.getState().lastLevel).toBe(21);
    });

    it("ignores a second start while running", async () => {
        const source = new ScriptedSource([], reading(50, false));
        const monitor = new BatteryMonitor({
            config: makeConfig(),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
            liveSource: source,
        });

        const running = monitor.start("live");
        await vi.advanceTimersByTimeAsync(0);
        await monitor.start("live");
        expect(monitor.isRunning).toBe(true);
        expect(source.polls).toBe(1);

        monitor.stop();
        await running;
        expect(monitor.isRunning).toBe(false);
    });

    it("refuses live mode without a live source", async () => {
        const monitor = new BatteryMonitor({
            config: makeConfig(),
            configSaver: new MemoryConfigSaver(),
            sink: new RecordingSink(),
            log: silentLog,
        });

        await expect(monitor.start("live")).rejects.toThrow(ChargeWatchError);
        expect(monitor.isRunning).toBe(false);
    });
});
