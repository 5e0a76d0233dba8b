// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/notify/sinks.ts
// Notification sinks: where a throttled alert ends up. Desktop dialogs and
// notification centres live outside this package; these sinks cover logs and
// the terminal.

import chalk from "chalk";

import { NotificationError } from "../exceptions.js";
import type { Logger } from "../logger.js";

export interface NotificationSink {
    readonly name: string;
    /** Charge fell to `level`, at or below `threshold`, while discharging. */
    notifyLow(level: number, threshold: number, remaining: number): Promise<void>;
    /** Charge rose to `level`, at or above `threshold`, while charging. */
    notifyHigh(level: number, threshold: number, remaining: number): Promise<void>;
}

export type AlertKind = "low" | "high";

export function formatAlertMessage(kind: AlertKind, level: number, remaining: number): string {
    const lines =
        kind === "low"
            ? [`Battery discharged to ${level}%.`, "Please plug in the charger."]
            : [`Battery charged to ${level}%.`, "You can unplug the charger."];
    lines.push(`Notifications remaining: ${remaining}`);
    return lines.join("\n");
}

export class LogNotificationSink implements NotificationSink {
    readonly name = "log";

    constructor(private readonly log: Logger) { }

    async notifyLow(level: number, threshold: number, remaining: number): Promise<void> {
        this.log.warn({ kind: "low", charge: level, threshold, remaining }, formatAlertMessage("low", level, remaining));
    }

    async notifyHigh(level: number, threshold: number, remaining: number): Promise<void> {
        this.log.warn({ kind: "high", charge: level, threshold, remaining }, formatAlertMessage("high", level, remaining));
    }
}

/** Boxed alert on a terminal stream. */
export class ConsoleNotificationSink implements NotificationSink {
    readonly name = "console";

    constructor(private readonly write: (text: string) => void = (text) => { process.stdout.write(text); }) { }

    async notifyLow(level: number, threshold: number, remaining: number): Promise<void> {
        this.write(renderBox(`LOW BATTERY (≤ ${threshold}%)`, formatAlertMessage("low", level, remaining), "low"));
    }

    async notifyHigh(level: number, threshold: number, remaining: number): Promise<void> {
        this.write(renderBox(`BATTERY CHARGED (≥ ${threshold}%)`, formatAlertMessage("high", level, remaining), "high"));
    }
}

/**
 * Delivers to every sink, even when an earlier one fails, then rejects with
 * the first failure.
 */
export class FanoutNotificationSink implements NotificationSink {
    readonly name: string;

    constructor(private readonly sinks: NotificationSink[]) {
        this.name = sinks.map((s) => s.name).join("+");
    }

    notifyLow(level: number, threshold: number, remaining: number): Promise<void> {
        return this.deliver((sink) => sink.notifyLow(level, threshold, remaining));
    }

    notifyHigh(level: number, threshold: number, remaining: number): Promise<void> {
        return this.deliver((sink) => sink.notifyHigh(level, threshold, remaining));
    }

    private async deliver(send: (sink: NotificationSink) => Promise<void>): Promise<void> {
        const results = await Promise.allSettled(this.sinks.map((sink) => send(sink)));
        const failedAt = results.findIndex((r) => r.status === "rejected");
        if (failedAt === -1) return;

        const failed = results[failedAt];
        const reason = failed && failed.status === "rejected" ? failed.reason : undefined;
        throw new NotificationError(this.sinks[failedAt]?.name ?? this.name, reason);
    }
}

function renderBox(title: string, body: string, kind: AlertKind): string {
    const lines = [title, ...body.split("\n")];
    const width = Math.max(...lines.map((l) => l.length));
    const paint = kind === "low" ? chalk.red : chalk.green;
    const border = paint(`+${"-".repeat(width + 2)}+`);

    const rows = lines.map((line, i) => {
        const padded = line.padEnd(width);
        return `${paint("|")} ${i === 0 ? chalk.bold(padded) : padded} ${paint("|")}`;
    });
    return [border, ...rows, border].join("\n") + "\n";
}
