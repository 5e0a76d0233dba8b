// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** One reading of the power source. Frozen once built. */
export interface BatterySnapshot {
    readonly capacity: number;            // 0–100
    readonly isCharging: boolean;
    readonly isPluggedIn: boolean;
    readonly cycleCount: number;
    readonly designCapacity: number;      // mAh or mWh, as reported
    readonly maxCapacity: number;         // same unit as designCapacity
    readonly voltage: number;             // V
    readonly amperage: number;            // A, negative while discharging
    readonly timeToFullMinutes: number | null;
    readonly timeToEmptyMinutes: number | null;
    readonly healthPct: number;           // maxCapacity / designCapacity * 100
}

export type SnapshotInput = Omit<BatterySnapshot, "healthPct">;

/**
 * Anything that can produce a snapshot on demand: the host's power
 * management facility, or the simulator. Must be safe to call repeatedly.
 */
export interface BatterySource {
    readonly name: string;
    poll(): Promise<BatterySnapshot>;
}

export function calculateHealthPct(maxCapacity: number, designCapacity: number): number {
    if (designCapacity <= 0) return 0;
    return (maxCapacity * 100) / designCapacity;
}

export function clampCapacity(capacity: number): number {
    return Math.min(100, Math.max(0, capacity));
}

export function createSnapshot(input: Partial<SnapshotInput> & Pick<SnapshotInput, "capacity" | "isCharging">): BatterySnapshot {
    const maxCapacity = input.maxCapacity ?? 0;
    const designCapacity = input.designCapacity ?? 0;
    return Object.freeze({
        capacity: clampCapacity(input.capacity),
        isCharging: input.isCharging,
        isPluggedIn: input.isPluggedIn ?? input.isCharging,
        cycleCount: input.cycleCount ?? 0,
        designCapacity,
        maxCapacity,
        voltage: input.voltage ?? 0,
        amperage: input.amperage ?? 0,
        timeToFullMinutes: input.timeToFullMinutes ?? null,
        timeToEmptyMinutes: input.timeToEmptyMinutes ?? null,
        healthPct: calculateHealthPct(maxCapacity, designCapacity),
    });
}
