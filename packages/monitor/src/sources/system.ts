// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/sources/system.ts
// SystemBatterySource: reads the host battery through systeminformation
// (IOKit on macOS, sysfs on Linux, WMI on Windows).

import si, { type Systeminformation } from "systeminformation";

import { BatteryReadError } from "../exceptions.js";
import { createSnapshot, type BatterySnapshot, type BatterySource } from "../types/battery.js";

type BatteryReader = () => Promise<Systeminformation.BatteryData>;

export class SystemBatterySource implements BatterySource {
    readonly name = "system";

    constructor(private readonly read: BatteryReader = () => si.battery()) { }

    async poll(): Promise<BatterySnapshot> {
        let data: Systeminformation.BatteryData;
        try {
            data = await this.read();
        } catch (err) {
            throw new BatteryReadError(this.name, err);
        }

        if (!data.hasBattery) {
            throw new BatteryReadError(this.name, "no battery present");
        }

        // Fields the platform cannot report come back null or negative.
        const remaining = knownNumber(data.timeRemaining);

        return createSnapshot({
            capacity: Math.round(knownNumber(data.percent) ?? 0),
            isCharging: data.isCharging,
            isPluggedIn: data.acConnected,
            cycleCount: knownNumber(data.cycleCount) ?? 0,
            designCapacity: knownNumber(data.designedCapacity) ?? 0,
            maxCapacity: knownNumber(data.maxCapacity) ?? 0,
            voltage: knownNumber(data.voltage) ?? 0,
            amperage: 0,
            timeToFullMinutes: data.isCharging ? remaining : null,
            timeToEmptyMinutes: data.isCharging ? null : remaining,
        });
    }
}

function knownNumber(value: unknown): number | null {
    return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : null;
}
