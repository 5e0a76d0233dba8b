// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/simulator/simulator.ts
// BatterySimulator: deterministic synthetic trace that keeps the monitor's
// trigger paths busy.
//
// Phase graph:
//   RAMPING_DOWN ──(capacity ≤ min)──→ HOLDING_AT_MIN
//   HOLDING_AT_MIN: min, min-step, min, ... ──(monitor quota used up)──→ RAMPING_UP (charging)
//   RAMPING_UP ──(capacity ≥ max)──→ HOLDING_AT_MAX
//   HOLDING_AT_MAX: max+step, max, ... ──(monitor quota used up)──→ RAMPING_DOWN (discharging)
//
// The simulator reads the monitor's notification count on every step, and
// updateLimits() takes a reloaded config, so a change in the throttle policy
// changes the trace too.

import type { Logger } from "../logger.js";
import { clampCapacity, createSnapshot, type BatterySnapshot } from "../types/battery.js";

export type SimulatorPhase = "ramping-down" | "holding-at-min" | "ramping-up" | "holding-at-max";

export interface SimulatorState {
    capacity: number;
    isCharging: boolean;
    phase: SimulatorPhase;
}

export interface SimulatorLimits {
    minThreshold: number;
    maxThreshold: number;
    maxNotifications: number;
}

export interface SimulatorOptions extends SimulatorLimits {
    /** Percentage points per step. Default 2 */
    step?: number;
    /** Default minThreshold + step */
    startCapacity?: number;
    /** Default false (start by discharging) */
    startCharging?: boolean;
    log?: Logger;
}

export class BatterySimulator {
    private readonly step: number;
    private limits: SimulatorLimits;
    private state: SimulatorState;

    constructor(private readonly options: SimulatorOptions) {
        this.step = options.step ?? 2;
        this.limits = {
            minThreshold: options.minThreshold,
            maxThreshold: options.maxThreshold,
            maxNotifications: options.maxNotifications,
        };
        const isCharging = options.startCharging ?? false;
        this.state = {
            capacity: clampCapacity(options.startCapacity ?? options.minThreshold + this.step),
            isCharging,
            phase: isCharging ? "ramping-up" : "ramping-down",
        };
    }

    getState(): SimulatorState {
        return { ...this.state };
    }

    /** Takes effect from the next step; the current phase and capacity are kept. */
    updateLimits(limits: SimulatorLimits): void {
        this.limits = { ...limits };
        this.options.log?.debug({ ...limits }, "simulator limits updated");
    }

    /**
     * Advance one step.
     * @param notificationsShown the monitor's notification count for the current phase
     */
    next(notificationsShown: number): BatterySnapshot {
        const { minThreshold: min, maxThreshold: max, maxNotifications } = this.limits;
        const s = this.state;

        switch (s.phase) {
            case "ramping-down":
                s.capacity -= this.step;
                if (s.capacity <= min) {
                    this.options.log?.debug({ capacity: s.capacity }, "simulator reached minimum threshold");
                    s.phase = "holding-at-min";
                }
                break;

            case "holding-at-min":
                if (notificationsShown >= maxNotifications) {
                    this.options.log?.debug({ notificationsShown }, "low quota used up, switching to charging");
                    s.isCharging = true;
                    s.phase = "ramping-up";
                    s.capacity = max - this.step;
                    break;
                }
                s.capacity = s.capacity <= min - this.step ? min : min - this.step;
                break;

            case "ramping-up":
                s.capacity += this.step;
                if (s.capacity >= max) {
                    this.options.log?.debug({ capacity: s.capacity }, "simulator reached maximum threshold");
                    s.phase = "holding-at-max";
                }
                break;

            case "holding-at-max":
                if (notificationsShown >= maxNotifications) {
                    this.options.log?.debug({ notificationsShown }, "high quota used up, switching to discharging");
                    s.isCharging = false;
                    s.phase = "ramping-down";
                    s.capacity = min + this.step;
                    break;
                }
                s.capacity = s.capacity >= max + this.step ? max : max + this.step;
                break;
        }

        s.capacity = clampCapacity(s.capacity);
        return createSnapshot({
            capacity: s.capacity,
            isCharging: s.isCharging,
            isPluggedIn: s.isCharging,
            cycleCount: 0,
            designCapacity: 100,
            maxCapacity: 100,
        });
    }
}
