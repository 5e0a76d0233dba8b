// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/monitor/monitor.ts
// BatteryMonitor: polls a battery source, decides whether a reading produces
// a notification, and adapts its own poll period.
//
// Each reading goes through check():
//   unchanged reading (same capacity, same charging flag) ──→ ignored
//   first reading ──→ initialized, charging flag recorded, nothing evaluated
//   charging flag flipped ──→ phase reset (count 0, last notification cleared)
//   charging    ──→ high evaluator  (capacity ≥ maxThreshold)
//   discharging ──→ low evaluator   (capacity ≤ minThreshold)
// A crossing is delivered only through the throttle gate (throttle.ts).
//
// Run loop: one task waits on stop | pending config | timer tick. All state
// changes happen inside that task.
//
// A persisted phase is only resumed by the first live reading, and only when
// its charging flag matches; simulated runs neither read nor write the store.

import type { ConfigSaver } from "../config/store.js";
import { ChargeWatchError, describeError } from "../exceptions.js";
import type { Logger } from "../logger.js";
import type { NotificationSink } from "../notify/sinks.js";
import { BatterySimulator } from "../simulator/simulator.js";
import { SimulatedBatterySource } from "../sources/simulated.js";
import type { MonitorStateStore, PersistedMonitorState } from "../state/state-store.js";
import type { BatterySnapshot, BatterySource } from "../types/battery.js";
import type { ChargeWatchConfig } from "../types/config.js";
import { adaptInterval } from "./interval.js";
import { evaluateThrottle, remainingAfterNext } from "./throttle.js";

export type MonitorMode = "live" | "simulate";

export interface MonitorState {
    initialized: boolean;
    /** -1 = no reading accepted yet */
    lastLevel: number;
    lastCharging: boolean;
    /** Notifications delivered since the last charging-flag flip */
    notificationsShown: number;
    /** Epoch ms of the last notification in this phase; null = none */
    lastNotificationAt: number | null;
}

export interface BatteryMonitorOptions {
    config: ChargeWatchConfig;
    /** Receives the config whenever interval adaptation changes it */
    configSaver: ConfigSaver;
    sink: NotificationSink;
    log: Logger;
    /** Source for "live" mode. Required unless the monitor only runs simulated. */
    liveSource?: BatterySource;
    stateStore?: MonitorStateStore;
    /** Logger handed to the simulator in simulated runs */
    simulatorLog?: Logger;
}

type LoopEvent =
    | { kind: "stop" }
    | { kind: "config"; config: ChargeWatchConfig }
    | { kind: "tick" };

type Direction = "low" | "high";

export class BatteryMonitor {
    private config: ChargeWatchConfig;
    private readonly state: MonitorState = {
        initialized: false,
        lastLevel: -1,
        lastCharging: false,
        notificationsShown: 0,
        lastNotificationAt: null,
    };

    private stateStore: MonitorStateStore | null;
    /** Saved phase waiting for the first reading to confirm it */
    private restored: PersistedMonitorState | null = null;
    private simulator: BatterySimulator | null = null;
    private pendingConfig: ChargeWatchConfig | null = null;
    private wake: (() => void) | null = null;
    private abort: AbortController | null = null;

    constructor(private readonly options: BatteryMonitorOptions) {
        this.config = options.config;
        this.stateStore = options.stateStore ?? null;
        this.restored = this.loadPersistedState();
    }

    // ── Public state ────────────────────────────────────────────────────────

    getState(): Readonly<MonitorState> {
        return { ...this.state };
    }

    getConfig(): Readonly<ChargeWatchConfig> {
        return { ...this.config };
    }

    get notificationsShown(): number {
        return this.state.notificationsShown;
    }

    get isRunning(): boolean {
        return this.abort !== null;
    }

    /** Poll period in seconds for the current charging direction. */
    currentIntervalSeconds(): number {
        return this.state.lastCharging ? this.config.checkIntervalCharging : this.config.checkIntervalDischarging;
    }

    // ── State transition ────────────────────────────────────────────────────

    async check(now: Date, snapshot: BatterySnapshot): Promise<void> {
        const { log } = this.options;
        const s = this.state;

        if (s.initialized && snapshot.capacity === s.lastLevel && snapshot.isCharging === s.lastCharging) {
            log.debug({ capacity: snapshot.capacity }, "battery state unchanged, skipping evaluation");
            return;
        }

        log.debug({ capacity: snapshot.capacity, isCharging: snapshot.isCharging }, "evaluating reading");
        s.lastLevel = snapshot.capacity;

        if (!s.initialized) {
            s.initialized = true;
            s.lastCharging = snapshot.isCharging;
            this.resumePhase(snapshot.isCharging);
            this.persistState();
            return;
        }

        if (s.lastCharging !== snapshot.isCharging) {
            log.info({ isCharging: snapshot.isCharging }, "charging state changed, notification quota reset");
            s.notificationsShown = 0;
            s.lastNotificationAt = null;
            s.lastCharging = snapshot.isCharging;
        }

        if (snapshot.isCharging) {
            await this.evaluate("high", now, snapshot.capacity);
        } else {
            await this.evaluate("low", now, snapshot.capacity);
        }

        this.persistState();
    }

    private async evaluate(direction: Direction, now: Date, capacity: number): Promise<void> {
        const threshold = direction === "high" ? this.config.maxThreshold : this.config.minThreshold;
        const crossed = direction === "high" ? capacity >= threshold : capacity <= threshold;
        if (!crossed) return;

        const { log, sink } = this.options;
        const verdict = evaluateThrottle(this.state, this.config, now.getTime());
        if (verdict !== "allow") {
            log.debug({ direction, capacity, verdict }, "notification throttled");
            return;
        }

        const remaining = remainingAfterNext(this.state, this.config);
        try {
            if (direction === "high") {
                await sink.notifyHigh(capacity, threshold, remaining);
            } else {
                await sink.notifyLow(capacity, threshold, remaining);
            }
        } catch (err) {
            // Delivery is best effort: a failed notification still uses up quota.
            log.error({ err: describeError(err), sink: sink.name, direction }, "notification delivery failed");
        }

        this.state.notificationsShown++;
        this.state.lastNotificationAt = now.getTime();
        log.info({ direction, capacity, threshold, shown: this.state.notificationsShown }, "notification raised");

        this.adaptPollInterval(direction, capacity, threshold);
    }

    private adaptPollInterval(direction: Direction, capacity: number, threshold: number): void {
        const current = direction === "high" ? this.config.checkIntervalCharging : this.config.checkIntervalDischarging;
        const next = adaptInterval(current, threshold, capacity);
        if (next === current) return;

        this.config =
            direction === "high"
                ? { ...this.config, checkIntervalCharging: next }
                : { ...this.config, checkIntervalDischarging: next };
        this.options.log.info({ direction, from: current, to: next }, "poll interval adapted");

        try {
            this.options.configSaver.save(this.config);
        } catch (err) {
            this.options.log.error({ err: describeError(err) }, "could not persist adapted interval");
        }
    }

    // ── Config delivery ─────────────────────────────────────────────────────

    /**
     * Hand over a new config. Never blocks: while the loop runs, the latest
     * pending config is applied between ticks; otherwise it applies at once.
     */
    pushConfig(config: ChargeWatchConfig): void {
        if (!this.isRunning) {
            this.applyConfig(config);
            return;
        }
        this.pendingConfig = config;
        this.wake?.();
    }

    private applyConfig(config: ChargeWatchConfig): void {
        this.config = config;
        this.simulator?.updateLimits({
            minThreshold: config.minThreshold,
            maxThreshold: config.maxThreshold,
            maxNotifications: config.maxNotifications,
        });
        this.options.log.info({ intervalSeconds: this.currentIntervalSeconds() }, "new configuration applied");
    }

    // ── Run loop ────────────────────────────────────────────────────────────

    /** Run until stop() is called. Resolves once the loop has exited. */
    async start(mode: MonitorMode = "live"): Promise<void> {
        if (this.abort) {
            this.options.log.warn("monitor already running");
            return;
        }

        const source = this.selectSource(mode);
        const abort = new AbortController();
        this.abort = abort;
        this.options.log.info(
            { source: source.name, intervalSeconds: this.currentIntervalSeconds() },
            "monitoring started",
        );

        try {
            // First reading right away rather than one full interval later.
            await this.tick(source);
            for (;;) {
                const event = await this.nextEvent(abort.signal);
                if (event.kind === "stop") break;
                if (event.kind === "config") {
                    this.applyConfig(event.config);
                    continue;
                }
                await this.tick(source);
            }
        } finally {
            this.abort = null;
            this.pendingConfig = null;
            this.simulator = null;
            this.options.log.info("monitoring stopped");
        }
    }

    /** Cooperative: an in-flight poll or notification completes first. */
    stop(): void {
        this.abort?.abort();
    }

    private async tick(source: BatterySource): Promise<void> {
        let snapshot: BatterySnapshot;
        try {
            snapshot = await source.poll();
        } catch (err) {
            this.options.log.error({ err: describeError(err), source: source.name }, "battery read failed, skipping cycle");
            return;
        }
        await this.check(new Date(), snapshot);
    }

    private nextEvent(signal: AbortSignal): Promise<LoopEvent> {
        return new Promise<LoopEvent>((resolve) => {
            if (signal.aborted) {
                resolve({ kind: "stop" });
                return;
            }
            const queued = this.takePendingConfig();
            if (queued) {
                resolve({ kind: "config", config: queued });
                return;
            }

            const finish = (event: LoopEvent) => {
                clearTimeout(timer);
                signal.removeEventListener("abort", onAbort);
                this.wake = null;
                resolve(event);
            };
            const onAbort = () => finish({ kind: "stop" });
            const timer = setTimeout(() => finish({ kind: "tick" }), this.currentIntervalSeconds() * 1_000);

            signal.addEventListener("abort", onAbort, { once: true });
            this.wake = () => {
                const config = this.takePendingConfig();
                if (config) finish({ kind: "config", config });
            };
        });
    }

    private takePendingConfig(): ChargeWatchConfig | null {
        const config = this.pendingConfig;
        this.pendingConfig = null;
        return config;
    }

    private selectSource(mode: MonitorMode): BatterySource {
        if (mode === "simulate" || this.config.useSimulator) {
            if (this.stateStore) {
                this.options.log.info("simulated run, monitor state will not be restored or saved");
                this.stateStore = null;
                this.restored = null;
            }
            const simulator = new BatterySimulator({
                minThreshold: this.config.minThreshold,
                maxThreshold: this.config.maxThreshold,
                maxNotifications: this.config.maxNotifications,
                log: this.options.simulatorLog,
            });
            this.simulator = simulator;
            return new SimulatedBatterySource(simulator, () => this.state.notificationsShown);
        }
        if (!this.options.liveSource) {
            throw new ChargeWatchError("BatteryMonitor: live mode needs a liveSource");
        }
        return this.options.liveSource;
    }

    // ── Persistence ─────────────────────────────────────────────────────────

    private loadPersistedState(): PersistedMonitorState | null {
        if (!this.stateStore) return null;
        try {
            return this.stateStore.load();
        } catch (err) {
            this.options.log.error({ err: describeError(err) }, "could not restore monitor state, starting fresh");
            return null;
        }
    }

    /**
     * Carry the saved phase's counters over when the battery is still moving
     * in the same direction; a flip while stopped starts a new phase.
     */
    private resumePhase(isCharging: boolean): void {
        const saved = this.restored;
        this.restored = null;
        if (!saved) return;

        if (saved.lastCharging !== isCharging) {
            this.options.log.info({ isCharging }, "charging state changed while stopped, starting a new phase");
            return;
        }
        this.state.notificationsShown = saved.notificationsShown;
        this.state.lastNotificationAt = saved.lastNotificationAt;
        this.options.log.debug({ ...saved }, "monitor phase resumed");
    }

    private persistState(): void {
        const store = this.stateStore;
        if (!store) return;

        const { lastLevel, lastCharging, notificationsShown, lastNotificationAt } = this.state;
        try {
            store.save({ lastLevel, lastCharging, notificationsShown, lastNotificationAt });
        } catch (err) {
            this.options.log.error({ err: describeError(err) }, "could not persist monitor state");
        }
    }
}
