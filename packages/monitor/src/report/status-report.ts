// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import chalk from "chalk";

import type { BatterySnapshot } from "../types/battery.js";
import type { ChargeWatchConfig } from "../types/config.js";

export function formatDuration(minutes: number | null): string {
    if (minutes === null) return "unknown";
    const total = Math.round(minutes);
    const h = Math.floor(total / 60);
    const m = total % 60;
    return h > 0 ? `${h}h ${m}m` : `${m}m`;
}

function row(label: string, value: string): string {
    return `${chalk.gray(`${label}:`.padEnd(15))}${value}`;
}

/** One-shot terminal report of a reading against the configured thresholds. */
export function formatStatusReport(snapshot: BatterySnapshot, config: ChargeWatchConfig): string {
    const direction = snapshot.isCharging ? "charging" : "discharging";
    const power = snapshot.isPluggedIn ? "on AC power" : "on battery";

    let chargeColor = chalk.green;
    if (!snapshot.isCharging && snapshot.capacity <= config.minThreshold) chargeColor = chalk.red;
    if (snapshot.isCharging && snapshot.capacity >= config.maxThreshold) chargeColor = chalk.yellow;

    const lines = [
        chalk.bold("ChargeWatch: battery status"),
        row("Charge", `${chargeColor(`${snapshot.capacity}%`)} (${direction}, ${power})`),
        row("Health", `${snapshot.healthPct.toFixed(1)}% (cycles: ${snapshot.cycleCount})`),
        row("Voltage", `${snapshot.voltage.toFixed(2)} V`),
        snapshot.isCharging
            ? row("Time to full", formatDuration(snapshot.timeToFullMinutes))
            : row("Time to empty", formatDuration(snapshot.timeToEmptyMinutes)),
        row("Thresholds", `low ≤ ${config.minThreshold}%, high ≥ ${config.maxThreshold}%`),
        row(
            "Watching",
            snapshot.isCharging
                ? `high threshold, every ${config.checkIntervalCharging}s`
                : `low threshold, every ${config.checkIntervalDischarging}s`,
        ),
    ];

    if (!snapshot.isCharging && snapshot.capacity <= config.minThreshold) {
        lines.push(chalk.red.bold(`Below low threshold: plug in the charger.`));
    } else if (snapshot.isCharging && snapshot.capacity >= config.maxThreshold) {
        lines.push(chalk.yellow.bold(`Above high threshold: the charger can be unplugged.`));
    }

    return lines.join("\n");
}
